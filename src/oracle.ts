/**
 * The decision oracle: proposes actions, judges outcomes and decides what to
 * do about interruptions. LlmOracle implements it over any LLMProvider.
 */

import { readFile } from "fs/promises";
import { z } from "zod";

import { MAX_SNAPSHOT_CHARS } from "./constants.js";
import { errorMessage } from "./errors.js";
import { extractJsonObject, isJsonObject, type JsonObject } from "./json-extract.js";
import type { ChatMessage, ContentPart, LLMProvider } from "./llm-providers.js";
import {
  CHOOSE_CANDIDATE_PROMPT,
  EVALUATE_OUTCOME_PROMPT,
  INTERRUPTION_PROMPT,
  PROPOSE_ACTION_PROMPT,
} from "./prompts.js";
import {
  GATE_TYPES,
  RECOVERY_KINDS,
  type EvaluationVerdict,
  type Interruption,
  type InterruptionDecision,
  type Point,
  type RawAction,
  type ScreenSize,
  type UINode,
} from "./types.js";

export interface ProposeActionInput {
  screenshotPath: string;
  snapshot: string;
  intent: string;
  /** Size of the image space the returned coordinates should be in. */
  modelSize?: ScreenSize;
}

export interface EvaluateOutcomeInput {
  goal: string;
  stepDescription: string;
  expectedHint: string;
  lastAction: string;
  snapshot: string;
  screenshotPath: string;
}

export interface InterruptionDecisionInput {
  interruption: Interruption;
  goal: string;
  stepDescription: string;
  snapshot: string;
  screenshotPath: string;
}

export interface ChooseCandidateInput {
  screenshotPath: string;
  intent: string;
  candidates: UINode[];
}

export interface Oracle {
  proposeAction(input: ProposeActionInput): Promise<RawAction>;
  evaluateOutcome(input: EvaluateOutcomeInput): Promise<EvaluationVerdict>;
  decideInterruption(input: InterruptionDecisionInput): Promise<InterruptionDecision>;
  /** Index into `candidates`, or null when none fits. */
  chooseCandidate?(input: ChooseCandidateInput): Promise<number | null>;
}

// ===========================================
// Reply Parsing
// ===========================================

const PARSE_FALLBACK_WAIT_S = 0.2;

const upperCase = (value: unknown) => (typeof value === "string" ? value.trim().toUpperCase() : value);

const pointSchema = z
  .array(z.coerce.number().finite())
  .min(2)
  .transform((v): Point => [v[0], v[1]]);

const numberish = z.coerce.number().finite().optional().catch(undefined);
const stringish = z.string().optional().catch(undefined);

const rawActionSchema = z.object({
  action: z.string().catch(""),
  coordinate: pointSchema.optional().catch(undefined),
  coordinate2: pointSchema.optional().catch(undefined),
  direction: stringish,
  text: stringish,
  button: stringish,
  time: numberish,
  seconds: numberish,
  duration: numberish,
  status: stringish,
  content_desc: stringish,
  resource_id: stringish,
});

const verdictSchema = z.object({
  ok: z.boolean().catch(false),
  recovery: z.preprocess(upperCase, z.enum(RECOVERY_KINDS)).catch("REDO_STEP"),
  reason: z.string().catch(""),
  suggestions: z.array(z.string()).catch([]),
  gate_type: z.preprocess(upperCase, z.enum(GATE_TYPES)).catch("NONE"),
  confidence: z.number().min(0).max(1).catch(0),
});

const interruptionDecisionSchema = z.object({
  decision: z.preprocess(upperCase, z.enum(["PASS_THROUGH", "DISMISS", "HANDLE"])).catch("PASS_THROUGH"),
  rationale: z.string().catch(""),
  actions: z.array(z.union([z.string(), z.record(z.unknown())])).catch([]),
});

function snakeKey(key: string): string {
  return key
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .replace(/-/g, "_")
    .toLowerCase();
}

function snakeKeys(value: JsonObject): JsonObject {
  return Object.fromEntries(Object.entries(value).map(([key, v]) => [snakeKey(key), v]));
}

/**
 * Reads an action object, unwrapping tool-call envelopes
 * (`{"name": ..., "arguments": {...}}`).
 */
export function toRawAction(value: JsonObject): RawAction {
  const args = value.arguments;
  const inner = snakeKeys(isJsonObject(args) ? args : value);
  const parsed = rawActionSchema.parse(inner);
  return {
    action: parsed.action,
    coordinate: parsed.coordinate,
    coordinate2: parsed.coordinate2,
    direction: parsed.direction,
    text: parsed.text,
    button: parsed.button,
    time: parsed.time ?? parsed.seconds ?? parsed.duration,
    status: parsed.status,
    contentDesc: parsed.content_desc,
    resourceId: parsed.resource_id,
  };
}

export function toVerdict(value: JsonObject): EvaluationVerdict {
  const parsed = verdictSchema.parse(snakeKeys(value));
  return {
    ok: parsed.ok,
    recovery: parsed.ok ? "NONE" : parsed.recovery,
    reason: parsed.reason,
    suggestions: parsed.suggestions.map((s) => s.trim()).filter((s) => s.length > 0),
    gateType: parsed.gate_type,
    confidence: parsed.confidence,
  };
}

export function toInterruptionDecision(value: JsonObject): InterruptionDecision {
  const parsed = interruptionDecisionSchema.parse(value);
  return {
    decision: parsed.decision,
    rationale: parsed.rationale,
    actions: parsed.actions.map((action) => (typeof action === "string" ? action : toRawAction(action))),
  };
}

export function failedVerdict(reason: string): EvaluationVerdict {
  return { ok: false, recovery: "REDO_STEP", reason, suggestions: [], gateType: "NONE", confidence: 0 };
}

// ===========================================
// LLM-backed Oracle
// ===========================================

export interface LlmOracleOptions {
  maxSnapshotChars?: number;
  readImage?: (path: string) => Promise<string>;
}

async function readImageBase64(path: string): Promise<string> {
  return (await readFile(path)).toString("base64");
}

function describeNode(node: UINode, index: number): string {
  const [x1, y1, x2, y2] = node.bounds;
  const label = [node.text, node.contentDesc, node.resourceId].filter(Boolean).join(" | ");
  return `${index}: ${label || node.className} [${x1},${y1}][${x2},${y2}]`;
}

export class LlmOracle implements Oracle {
  private readonly maxSnapshotChars: number;
  private readonly readImage: (path: string) => Promise<string>;

  constructor(
    private readonly provider: LLMProvider,
    options: LlmOracleOptions = {},
  ) {
    this.maxSnapshotChars = options.maxSnapshotChars ?? MAX_SNAPSHOT_CHARS;
    this.readImage = options.readImage ?? readImageBase64;
  }

  private async userMessage(text: string, screenshotPath?: string): Promise<ChatMessage> {
    const parts: ContentPart[] = [{ type: "text", text }];
    if (screenshotPath && this.provider.capabilities.supportsImages) {
      try {
        parts.push({ type: "image", base64: await this.readImage(screenshotPath), mimeType: "image/png" });
      } catch (err) {
        console.log(`[oracle] Screenshot unavailable, sending text only: ${errorMessage(err)}`);
      }
    }
    return { role: "user", content: parts };
  }

  private truncate(snapshot: string): string {
    return snapshot.length > this.maxSnapshotChars ? snapshot.slice(0, this.maxSnapshotChars) : snapshot;
  }

  private async ask(system: string, text: string, screenshotPath?: string): Promise<JsonObject | null> {
    const reply = await this.provider.complete(
      [{ role: "system", content: system }, await this.userMessage(text, screenshotPath)],
      { json: true },
    );
    const parsed = extractJsonObject(reply);
    if (!parsed) console.log(`[oracle] Could not parse reply: ${reply.slice(0, 200)}`);
    return parsed;
  }

  async proposeAction(input: ProposeActionInput): Promise<RawAction> {
    const size = input.modelSize ? `\nSCREENSHOT_SIZE: ${input.modelSize.width}x${input.modelSize.height}` : "";
    const parsed = await this.ask(
      PROPOSE_ACTION_PROMPT,
      `INSTRUCTION: ${input.intent}${size}\n\nUI_HIERARCHY:\n${this.truncate(input.snapshot)}`,
      input.screenshotPath,
    );
    if (!parsed) return { action: "wait", time: PARSE_FALLBACK_WAIT_S };
    return toRawAction(parsed);
  }

  async evaluateOutcome(input: EvaluateOutcomeInput): Promise<EvaluationVerdict> {
    try {
      const parsed = await this.ask(
        EVALUATE_OUTCOME_PROMPT,
        [
          `GOAL: ${input.goal}`,
          `STEP: ${input.stepDescription}`,
          `LAST_ACTION: ${input.lastAction || "(none yet)"}`,
          `EXPECTED: ${input.expectedHint}`,
          "",
          `UI_HIERARCHY:\n${this.truncate(input.snapshot)}`,
        ].join("\n"),
        input.screenshotPath,
      );
      return parsed ? toVerdict(parsed) : failedVerdict("Could not parse evaluator reply");
    } catch (err) {
      return failedVerdict(`Evaluation error: ${errorMessage(err)}`);
    }
  }

  async decideInterruption(input: InterruptionDecisionInput): Promise<InterruptionDecision> {
    try {
      const { kind, coverage } = input.interruption;
      const parsed = await this.ask(
        INTERRUPTION_PROMPT,
        [
          `GOAL: ${input.goal}`,
          `STEP: ${input.stepDescription}`,
          `DETECTED: kind=${kind} coverage=${coverage.toFixed(2)}`,
          "",
          `UI_HIERARCHY:\n${this.truncate(input.snapshot)}`,
        ].join("\n"),
        input.screenshotPath,
      );
      if (parsed) return toInterruptionDecision(parsed);
      return { decision: "PASS_THROUGH", rationale: "Could not parse interruption reply", actions: [] };
    } catch (err) {
      return { decision: "PASS_THROUGH", rationale: `Interruption decision error: ${errorMessage(err)}`, actions: [] };
    }
  }

  async chooseCandidate(input: ChooseCandidateInput): Promise<number | null> {
    try {
      const parsed = await this.ask(
        CHOOSE_CANDIDATE_PROMPT,
        `INSTRUCTION: ${input.intent}\n\nCANDIDATES:\n${input.candidates.map(describeNode).join("\n")}`,
        input.screenshotPath,
      );
      const index = parsed ? Number(parsed.index) : NaN;
      return Number.isInteger(index) && index >= 0 && index < input.candidates.length ? index : null;
    } catch (err) {
      console.log(`[oracle] Candidate choice failed: ${errorMessage(err)}`);
      return null;
    }
  }
}
