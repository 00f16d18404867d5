/**
 * Shared data model for the step engine.
 */

/** Device-space rectangle: left, top, right, bottom in pixels. */
export type Bounds = readonly [x1: number, y1: number, x2: number, y2: number];

export type Point = readonly [x: number, y: number];

export interface ScreenSize {
  width: number;
  height: number;
}

export interface UINode {
  readonly className: string;
  readonly bounds: Bounds;
  readonly text: string;
  readonly contentDesc: string;
  readonly resourceId: string;
  readonly clickable: boolean;
  readonly focusable: boolean;
  readonly scrollable: boolean;
  /** Position in document order. */
  readonly index: number;
}

export const ACTION_KINDS = [
  "key",
  "click",
  "long_press",
  "swipe",
  "type",
  "system_button",
  "open",
  "wait",
  "terminate",
] as const;

export type ActionKind = (typeof ACTION_KINDS)[number];

export type SystemButton = "back" | "home" | "recents" | "menu" | "enter";

/** A fully resolved action. Coordinates are device-space integer pixels. */
export type ResolvedAction =
  | { kind: "click"; coordinate: Point }
  | { kind: "long_press"; coordinate: Point; time: number }
  | { kind: "swipe"; coordinate: Point; coordinate2: Point }
  | { kind: "type"; text: string }
  | { kind: "key"; text: string }
  | { kind: "system_button"; button: SystemButton }
  | { kind: "open"; text: string }
  | { kind: "wait"; time: number }
  | { kind: "terminate"; status: "success" | "failure" };

/**
 * A loosely typed action proposal as it comes back from the oracle.
 * Coordinates are in model space.
 */
export interface RawAction {
  action: string;
  coordinate?: Point;
  coordinate2?: Point;
  direction?: string;
  text?: string;
  button?: string;
  time?: number;
  status?: string;
  contentDesc?: string;
  resourceId?: string;
}

export type DispatchStatus = "success" | "failure" | "error";

export interface DispatchResult {
  status: DispatchStatus;
  detail: string;
  /** Last attempted action, set on terminal failures. */
  action?: ResolvedAction;
}

export type InterruptionKind = "ad" | "login" | "permission" | "unknown" | "none";

export interface Interruption {
  present: boolean;
  kind: InterruptionKind;
  /** Largest candidate area over screen area, in [0, 1]. */
  coverage: number;
  candidates: UINode[];
}

export type InterruptionVerdict = "PASS_THROUGH" | "DISMISS" | "HANDLE";

export interface InterruptionDecision {
  decision: InterruptionVerdict;
  rationale: string;
  /** Structured actions, or natural-language intents. */
  actions: Array<RawAction | string>;
}

export const RECOVERY_KINDS = [
  "NONE",
  "REDO_STEP",
  "HANDLE_INTERRUPT",
  "REQUIRE_AUTH",
  "GRANT_PERMISSION",
  "REPLAN",
  "ABORT",
] as const;

export type RecoveryKind = (typeof RECOVERY_KINDS)[number];

export const GATE_TYPES = ["NONE", "AUTH", "PERMISSION", "AD_OR_OTHER"] as const;

export type GateType = (typeof GATE_TYPES)[number];

export interface EvaluationVerdict {
  ok: boolean;
  recovery: RecoveryKind;
  reason: string;
  suggestions: string[];
  gateType: GateType;
  confidence: number;
}

export interface CycleState {
  cycle: number;
  maxCycles: number;
  done: boolean;
  lastVerdict?: EvaluationVerdict;
}

/** One step handed in by the scenario planner. */
export interface ExecutorStep {
  stepId: number;
  description: string;
  actionType: string;
  /** Natural-language intent sent to the dispatcher. */
  query: string;
  alternativeActions: string[];
  expectedState?: string;
}

/** Screenshot, snapshot and screen size captured together. */
export interface Perception {
  screenshotPath: string;
  snapshot: string;
  nodes: UINode[];
  screen: ScreenSize;
}

export interface StepOutcome {
  success: boolean;
  cycles: number;
  reason: string;
  notes: string[];
  recoveries: RecoveryKind[];
}
