/**
 * Environment configuration. Values come from process.env, with a local
 * .env file loaded through dotenv.
 */

import "dotenv/config";

import {
  DEFAULT_BEDROCK_MODEL,
  DEFAULT_GROQ_MODEL,
  DEFAULT_LOG_DIR,
  DEFAULT_MAX_CYCLES,
  DEFAULT_MAX_RETRIES,
  DEFAULT_OPENAI_MODEL,
  DEFAULT_OPENROUTER_MODEL,
  DEFAULT_RETRY_DELAY,
  LOCAL_SCREENSHOT_PATH,
} from "./constants.js";
import { EngineError } from "./errors.js";

export const LLM_PROVIDERS = ["openai", "groq", "openrouter", "bedrock"] as const;
export type LlmProviderName = (typeof LLM_PROVIDERS)[number];

type Env = Record<string, string | undefined>;

function isProviderName(value: string): value is LlmProviderName {
  return LLM_PROVIDERS.some((name) => name === value);
}

function intOr(raw: string | undefined, fallback: number): number {
  const value = parseInt(raw ?? "", 10);
  return Number.isFinite(value) ? value : fallback;
}

function floatOr(raw: string | undefined, fallback: number): number {
  const value = parseFloat(raw ?? "");
  return Number.isFinite(value) ? value : fallback;
}

export function loadConfig(source: Env = process.env) {
  const env = (key: string, fallback = ""): string => source[key] ?? fallback;
  const provider = env("LLM_PROVIDER", "openai").trim().toLowerCase();

  const config = {
    // ADB
    ADB_PATH: env("ADB_PATH", "adb"),
    DEVICE_SERIAL: env("DEVICE_SERIAL"),
    APP_PACKAGE: env("APP_PACKAGE"),
    SCREENSHOT_PATH: env("SCREENSHOT_PATH", LOCAL_SCREENSHOT_PATH),

    // Step budgets
    MAX_CYCLES: intOr(source.MAX_CYCLES, DEFAULT_MAX_CYCLES),
    MAX_RETRIES: intOr(source.MAX_RETRIES, DEFAULT_MAX_RETRIES),
    RETRY_DELAY: floatOr(source.RETRY_DELAY, DEFAULT_RETRY_DELAY),

    // Session logging; empty disables it
    LOG_DIR: env("LOG_DIR", DEFAULT_LOG_DIR),

    // Optional JSON file of heuristic overrides
    TUNING_FILE: env("TUNING_FILE"),

    // LLM Provider: "openai", "groq", "openrouter" or "bedrock"
    LLM_PROVIDER: isProviderName(provider) ? provider : undefined,
    LLM_PROVIDER_RAW: provider,

    OPENAI_API_KEY: env("OPENAI_API_KEY"),
    OPENAI_MODEL: env("OPENAI_MODEL", DEFAULT_OPENAI_MODEL),
    OPENAI_BASE_URL: env("OPENAI_BASE_URL"),

    GROQ_API_KEY: env("GROQ_API_KEY"),
    GROQ_MODEL: env("GROQ_MODEL", DEFAULT_GROQ_MODEL),

    OPENROUTER_API_KEY: env("OPENROUTER_API_KEY"),
    OPENROUTER_MODEL: env("OPENROUTER_MODEL", DEFAULT_OPENROUTER_MODEL),

    AWS_REGION: env("AWS_REGION", "us-east-1"),
    BEDROCK_MODEL: env("BEDROCK_MODEL", DEFAULT_BEDROCK_MODEL),

    getModel(): string {
      if (config.LLM_PROVIDER === "groq") return config.GROQ_MODEL;
      if (config.LLM_PROVIDER === "bedrock") return config.BEDROCK_MODEL;
      if (config.LLM_PROVIDER === "openrouter") return config.OPENROUTER_MODEL;
      return config.OPENAI_MODEL;
    },

    validate(): void {
      if (config.LLM_PROVIDER === undefined) {
        throw new EngineError("CONFIG", `Unknown LLM_PROVIDER "${config.LLM_PROVIDER_RAW}"`, {
          allowed: LLM_PROVIDERS,
        });
      }
      if (config.LLM_PROVIDER === "groq" && !config.GROQ_API_KEY) {
        throw new EngineError("CONFIG", "GROQ_API_KEY is required when using Groq provider");
      }
      if (config.LLM_PROVIDER === "openai" && !config.OPENAI_API_KEY) {
        throw new EngineError("CONFIG", "OPENAI_API_KEY is required when using OpenAI provider");
      }
      if (config.LLM_PROVIDER === "openrouter" && !config.OPENROUTER_API_KEY) {
        throw new EngineError("CONFIG", "OPENROUTER_API_KEY is required when using OpenRouter provider");
      }
      if (config.MAX_CYCLES < 1) {
        throw new EngineError("CONFIG", "MAX_CYCLES must be at least 1");
      }
      // Bedrock uses the AWS credential chain
    },
  };
  return config;
}

export type EngineConfig = ReturnType<typeof loadConfig>;

export const Config: EngineConfig = loadConfig();
