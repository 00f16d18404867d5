/**
 * Chat-completion providers behind the LLM oracle.
 * Supports OpenAI (and OpenAI-compatible endpoints), Groq, AWS Bedrock, and
 * OpenRouter (via Vercel AI SDK).
 */

import OpenAI from "openai";
import { BedrockRuntimeClient, InvokeModelCommand } from "@aws-sdk/client-bedrock-runtime";
import { generateText, type CoreMessage } from "ai";
import { createOpenRouter } from "@openrouter/ai-sdk-provider";
import { z } from "zod";

import type { EngineConfig } from "./config.js";
import { BEDROCK_ANTHROPIC_MODELS, BEDROCK_META_MODELS, GROQ_API_BASE_URL } from "./constants.js";
import { EngineError } from "./errors.js";

// ===========================================
// Message Types
// ===========================================

export type ContentPart =
  | { type: "text"; text: string }
  | { type: "image"; base64: string; mimeType: string };

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string | ContentPart[];
}

export interface CompletionOptions {
  temperature?: number;
  maxTokens?: number;
  /** Ask for a bare JSON object where the provider supports it. */
  json?: boolean;
}

export interface LLMProvider {
  readonly name: string;
  readonly model: string;
  readonly capabilities: { supportsImages: boolean };
  complete(messages: ChatMessage[], options?: CompletionOptions): Promise<string>;
}

const DEFAULT_TEMPERATURE = 0.1;
const DEFAULT_MAX_TOKENS = 1024;

/** Text content of a message, images dropped. */
export function flattenText(content: ChatMessage["content"]): string {
  if (typeof content === "string") return content;
  return content
    .flatMap((part) => (part.type === "text" ? [part.text] : []))
    .join("\n");
}

function splitSystem(messages: ChatMessage[]): { system: string; rest: ChatMessage[] } {
  const system = messages
    .filter((m) => m.role === "system")
    .map((m) => flattenText(m.content))
    .join("\n\n");
  return { system, rest: messages.filter((m) => m.role !== "system") };
}

// ===========================================
// OpenAI / Groq Provider
// ===========================================

class OpenAIProvider implements LLMProvider {
  private client: OpenAI;
  readonly name: string;
  readonly model: string;
  readonly capabilities: { supportsImages: boolean };

  constructor(config: EngineConfig) {
    if (config.LLM_PROVIDER === "groq") {
      this.name = "groq";
      this.client = new OpenAI({ apiKey: config.GROQ_API_KEY, baseURL: GROQ_API_BASE_URL });
      this.model = config.GROQ_MODEL;
      this.capabilities = { supportsImages: false };
    } else {
      this.name = "openai";
      this.client = new OpenAI({
        apiKey: config.OPENAI_API_KEY,
        baseURL: config.OPENAI_BASE_URL || undefined,
      });
      this.model = config.OPENAI_MODEL;
      this.capabilities = { supportsImages: true };
    }
  }

  private toOpenAIMessages(messages: ChatMessage[]): OpenAI.ChatCompletionMessageParam[] {
    return messages.map((msg): OpenAI.ChatCompletionMessageParam => {
      if (msg.role === "system") return { role: "system", content: flattenText(msg.content) };
      if (msg.role === "assistant") return { role: "assistant", content: flattenText(msg.content) };
      if (typeof msg.content === "string") return { role: "user", content: msg.content };

      const parts = msg.content.map((part): OpenAI.ChatCompletionContentPart => {
        if (part.type === "text") return { type: "text", text: part.text };
        if (this.capabilities.supportsImages) {
          return {
            type: "image_url",
            image_url: { url: `data:${part.mimeType};base64,${part.base64}`, detail: "high" },
          };
        }
        // Groq: no image input
        return { type: "text", text: "[Screenshot attached]" };
      });
      return { role: "user", content: parts };
    });
  }

  async complete(messages: ChatMessage[], options: CompletionOptions = {}): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: this.toOpenAIMessages(messages),
      temperature: options.temperature ?? DEFAULT_TEMPERATURE,
      max_tokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
      ...(options.json ? { response_format: { type: "json_object" as const } } : {}),
    });
    return response.choices[0]?.message.content ?? "";
  }
}

// ===========================================
// OpenRouter Provider (Vercel AI SDK)
// ===========================================

class OpenRouterProvider implements LLMProvider {
  private openrouter: ReturnType<typeof createOpenRouter>;
  readonly name = "openrouter";
  readonly model: string;
  readonly capabilities = { supportsImages: true };

  constructor(config: EngineConfig) {
    this.openrouter = createOpenRouter({ apiKey: config.OPENROUTER_API_KEY });
    this.model = config.OPENROUTER_MODEL;
  }

  private toCoreMessages(messages: ChatMessage[]): CoreMessage[] {
    return messages.map((msg): CoreMessage => {
      if (msg.role !== "user") return { role: "assistant", content: flattenText(msg.content) };
      if (typeof msg.content === "string") return { role: "user", content: msg.content };
      return {
        role: "user",
        content: msg.content.map((part) =>
          part.type === "text"
            ? { type: "text" as const, text: part.text }
            : { type: "image" as const, image: part.base64, mimeType: part.mimeType },
        ),
      };
    });
  }

  async complete(messages: ChatMessage[], options: CompletionOptions = {}): Promise<string> {
    const { system, rest } = splitSystem(messages);
    const result = await generateText({
      model: this.openrouter.chat(this.model),
      system,
      messages: this.toCoreMessages(rest),
      temperature: options.temperature ?? DEFAULT_TEMPERATURE,
      maxTokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
    });
    return result.text;
  }
}

// ===========================================
// AWS Bedrock Provider
// ===========================================

const anthropicResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
});
const metaResponseSchema = z.object({ generation: z.string() });
const titanResponseSchema = z.object({ results: z.array(z.object({ outputText: z.string() })) });

class BedrockProvider implements LLMProvider {
  private client: BedrockRuntimeClient;
  readonly name = "bedrock";
  readonly model: string;
  readonly capabilities: { supportsImages: boolean };

  constructor(config: EngineConfig) {
    this.client = new BedrockRuntimeClient({ region: config.AWS_REGION });
    this.model = config.BEDROCK_MODEL;
    // Only Anthropic models on Bedrock take images
    this.capabilities = { supportsImages: this.isAnthropicModel() };
  }

  private isAnthropicModel(): boolean {
    return BEDROCK_ANTHROPIC_MODELS.some((id) => this.model.includes(id));
  }

  private isMetaModel(): boolean {
    return BEDROCK_META_MODELS.some((id) => this.model.toLowerCase().includes(id));
  }

  private buildRequest(messages: ChatMessage[], options: CompletionOptions): string {
    const { system, rest } = splitSystem(messages);
    const maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
    const temperature = options.temperature ?? DEFAULT_TEMPERATURE;

    if (this.isAnthropicModel()) {
      return JSON.stringify({
        anthropic_version: "bedrock-2023-05-31",
        max_tokens: maxTokens,
        temperature,
        system,
        messages: rest.map((msg) => ({
          role: msg.role,
          content:
            typeof msg.content === "string"
              ? msg.content
              : msg.content.map((part) =>
                  part.type === "text"
                    ? { type: "text", text: part.text }
                    : {
                        type: "image",
                        source: { type: "base64", media_type: part.mimeType, data: part.base64 },
                      },
                ),
        })),
      });
    }

    // Meta and other models: single flattened prompt, no images
    const lastUser = rest.filter((m) => m.role === "user").map((m) => flattenText(m.content)).pop() ?? "";
    if (this.isMetaModel()) {
      return JSON.stringify({
        prompt: `<|begin_of_text|><|start_header_id|>system<|end_header_id|>\n\n${system}<|eot_id|><|start_header_id|>user<|end_header_id|>\n\n${lastUser}\n\nRespond with ONLY a valid JSON object, no other text.<|eot_id|><|start_header_id|>assistant<|end_header_id|>\n\n`,
        max_gen_len: maxTokens,
        temperature,
      });
    }
    return JSON.stringify({
      inputText: `${system}\n\n${lastUser}\n\nRespond with ONLY a valid JSON object.`,
      textGenerationConfig: { maxTokenCount: maxTokens, temperature },
    });
  }

  private extractResponse(body: unknown): string {
    if (this.isAnthropicModel()) {
      const parsed = anthropicResponseSchema.parse(body);
      return parsed.content.map((block) => block.text ?? "").join("");
    }
    if (this.isMetaModel()) return metaResponseSchema.parse(body).generation;
    return titanResponseSchema.parse(body).results[0]?.outputText ?? "";
  }

  async complete(messages: ChatMessage[], options: CompletionOptions = {}): Promise<string> {
    const command = new InvokeModelCommand({
      modelId: this.model,
      body: new TextEncoder().encode(this.buildRequest(messages, options)),
      contentType: "application/json",
      accept: "application/json",
    });
    const response = await this.client.send(command);
    const body: unknown = JSON.parse(new TextDecoder().decode(response.body));
    return this.extractResponse(body);
  }
}

// ===========================================
// Factory
// ===========================================

export function getLlmProvider(config: EngineConfig): LLMProvider {
  switch (config.LLM_PROVIDER) {
    case "bedrock":
      return new BedrockProvider(config);
    case "openrouter":
      return new OpenRouterProvider(config);
    case "openai":
    case "groq":
      return new OpenAIProvider(config);
    default:
      throw new EngineError("CONFIG", `Unknown LLM_PROVIDER: ${String(config.LLM_PROVIDER)}`);
  }
}
