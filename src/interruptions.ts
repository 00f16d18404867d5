/**
 * Interruption guard.
 * Spots overlays that block a step (ads, login walls, permission prompts),
 * classifies them, and clears them with deterministic taps first and oracle
 * guidance second.
 */

import type { DeviceSession } from "./device.js";
import type { ActionDispatcher } from "./dispatcher.js";
import { errorMessage } from "./errors.js";
import type { Oracle } from "./oracle.js";
import { centerOf, findBySelector, parseSnapshot } from "./snapshot-parser.js";
import { seconds, sleep as defaultSleep, type Sleep } from "./timing.js";
import { DEFAULT_TUNING, type EngineTuning, type InterruptionTuning } from "./tuning.js";
import type {
  Interruption,
  InterruptionDecision,
  InterruptionKind,
  Perception,
  Point,
  ScreenSize,
  UINode,
} from "./types.js";

const NOT_PRESENT: Interruption = { present: false, kind: "none", coverage: 0, candidates: [] };

/** Tie-break order for the kind vote. */
const KIND_PRIORITY: readonly InterruptionKind[] = ["permission", "login", "ad", "unknown"];

// ===========================================
// Node Signals
// ===========================================

function tokens(text: string): string[] {
  return text.toLowerCase().split(/[^a-z0-9]+/).filter(Boolean);
}

/** Whole-word (or whole-phrase) match of `cue` in `label`. */
export function matchesCue(label: string, cue: string): boolean {
  const words = tokens(label);
  const needle = tokens(cue);
  if (needle.length === 0 || needle.length > words.length) return false;
  for (let i = 0; i + needle.length <= words.length; i++) {
    if (needle.every((word, j) => words[i + j] === word)) return true;
  }
  return false;
}

/** Text, description and resource id; ids split into words on `_`, `/`, `:` and `.`. */
function cueLabel(node: UINode): string {
  return `${node.text} ${node.contentDesc} ${node.resourceId}`;
}

function hasAnyCue(label: string, cues: readonly string[]): boolean {
  return cues.some((cue) => matchesCue(label, cue));
}

/** Node area over screen area, clamped to [0, 1]. */
export function nodeCoverage(node: UINode, screen: ScreenSize): number {
  const [x1, y1, x2, y2] = node.bounds;
  const area = Math.max(1, x2 - x1) * Math.max(1, y2 - y1);
  return Math.min(1, area / Math.max(1, screen.width * screen.height));
}

function intersectsCenter(node: UINode, screen: ScreenSize, tuning: InterruptionTuning): boolean {
  const { left, top, right, bottom } = tuning.centralRegion;
  const cx1 = Math.floor(screen.width * left);
  const cy1 = Math.floor(screen.height * top);
  const cx2 = Math.floor(screen.width * right);
  const cy2 = Math.floor(screen.height * bottom);
  const [x1, y1, x2, y2] = node.bounds;
  return !(x2 < cx1 || x1 > cx2 || y2 < cy1 || y1 > cy2);
}

function simpleClassName(className: string): string {
  return className.slice(className.lastIndexOf(".") + 1);
}

function isBlocklisted(node: UINode, tuning: InterruptionTuning): boolean {
  const id = node.resourceId.toLowerCase();
  return id.length > 0 && tuning.blocklistIds.some((fragment) => id.includes(fragment.toLowerCase()));
}

function hasCue(node: UINode, tuning: InterruptionTuning): boolean {
  const label = cueLabel(node);
  return (
    hasAnyCue(label, tuning.adCues) ||
    hasAnyCue(label, tuning.loginCues) ||
    hasAnyCue(label, tuning.permissionCues) ||
    isBlocklisted(node, tuning)
  );
}

/**
 * Candidate blocking nodes: dialog classes, anything covering most of the
 * screen, cue keywords, and big interactive overlays over the middle of the
 * screen. Plain containers count as overlays only alongside a cue or modal
 * signal.
 */
export function findOverlayCandidates(
  nodes: readonly UINode[],
  screen: ScreenSize,
  tuning: InterruptionTuning,
): UINode[] {
  return nodes.filter((node) => {
    const coverage = nodeCoverage(node, screen);
    const layout = tuning.layoutClasses.includes(simpleClassName(node.className));
    const modal = tuning.dialogClasses.includes(node.className) || coverage > tuning.modalCoverage;
    const cue = hasCue(node, tuning);
    const overlay =
      coverage > tuning.overlayCoverage &&
      (node.clickable || node.focusable) &&
      !node.scrollable &&
      intersectsCenter(node, screen, tuning);
    return modal || cue || (overlay && !layout);
  });
}

export function classifyNode(node: UINode, tuning: InterruptionTuning): Exclude<InterruptionKind, "none"> {
  const label = cueLabel(node);
  if (hasAnyCue(label, tuning.permissionCues) || node.resourceId.includes("permissioncontroller")) {
    return "permission";
  }
  if (hasAnyCue(label, tuning.loginCues)) return "login";
  if (hasAnyCue(label, tuning.adCues) || isBlocklisted(node, tuning)) return "ad";
  return "unknown";
}

function voteKind(candidates: readonly UINode[], tuning: InterruptionTuning): InterruptionKind {
  const votes = new Map<InterruptionKind, number>();
  for (const node of candidates) {
    const kind = classifyNode(node, tuning);
    votes.set(kind, (votes.get(kind) ?? 0) + 1);
  }
  const top = Math.max(...votes.values());
  return KIND_PRIORITY.find((kind) => votes.get(kind) === top) ?? "unknown";
}

// ===========================================
// Guard
// ===========================================

export interface InterruptionGuardDeps {
  device: DeviceSession;
  oracle: Oracle;
  dispatcher: ActionDispatcher;
  tuning?: EngineTuning;
  sleep?: Sleep;
}

export interface InterruptionContext {
  goal: string;
  stepDescription: string;
  perception: Perception;
}

export class InterruptionGuard {
  private readonly device: DeviceSession;
  private readonly oracle: Oracle;
  private readonly dispatcher: ActionDispatcher;
  private readonly tuning: EngineTuning;
  private readonly sleep: Sleep;

  constructor(deps: InterruptionGuardDeps) {
    this.device = deps.device;
    this.oracle = deps.oracle;
    this.dispatcher = deps.dispatcher;
    this.tuning = deps.tuning ?? DEFAULT_TUNING;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  /** Recomputed from the given snapshot on every call. */
  async detect(snapshot: string | readonly UINode[], screen: ScreenSize): Promise<Interruption> {
    const tuning = this.tuning.interruption;
    const nodes = typeof snapshot === "string" ? parseSnapshot(snapshot) : snapshot;
    const candidates = findOverlayCandidates(nodes, screen, tuning);

    if (candidates.length === 0) {
      if (await this.systemAlertShowing()) {
        return { present: true, kind: "permission", coverage: tuning.systemAlertCoverage, candidates: [] };
      }
      return { ...NOT_PRESENT, candidates: [] };
    }

    return {
      present: true,
      kind: voteKind(candidates, tuning),
      coverage: Math.max(...candidates.map((node) => nodeCoverage(node, screen))),
      candidates,
    };
  }

  async decide(interruption: Interruption, context: InterruptionContext): Promise<InterruptionDecision> {
    if (!interruption.present) {
      return { decision: "PASS_THROUGH", rationale: "no interruption", actions: [] };
    }

    const step = context.stepDescription.toLowerCase();
    const expected =
      (interruption.kind === "permission" || interruption.kind === "login") &&
      this.tuning.interruption.allowlistSteps.some((word) => step.includes(word.toLowerCase()));
    if (expected) {
      return { decision: "HANDLE", rationale: `${interruption.kind} prompt is part of this step`, actions: [] };
    }

    try {
      return await this.oracle.decideInterruption({
        interruption,
        goal: context.goal,
        stepDescription: context.stepDescription,
        snapshot: context.perception.snapshot,
        screenshotPath: context.perception.screenshotPath,
      });
    } catch (err) {
      return { decision: "PASS_THROUGH", rationale: `decision failed: ${errorMessage(err)}`, actions: [] };
    }
  }

  /**
   * Applies the decision and reports whether the screen is clear afterwards.
   * Blocklisted overlays are tapped near their top-right corner before any
   * oracle action runs.
   */
  async handle(interruption: Interruption, decision: InterruptionDecision, perception: Perception): Promise<boolean> {
    const tuning = this.tuning.interruption;
    await this.dismissBlocklisted(interruption, perception.screen);

    const actions = decision.actions.slice(0, tuning.maxOracleActions);
    for (const action of actions) {
      const result =
        typeof action === "string"
          ? await this.dispatcher.executeIntent(action, perception)
          : await this.dispatcher.executeRaw(action, perception, {
              retries: tuning.actionRetries,
              delayS: tuning.actionDelayS,
              adaptive: false,
            });
      const label = typeof action === "string" ? action : action.action;
      console.log(`[guard] ${decision.decision} action "${label}": ${result.status}`);
      await this.sleep(seconds(tuning.settleS));
    }

    if (actions.length === 0) await this.fallbackTap(interruption, decision, perception);

    try {
      const after = await this.detect(await this.device.snapshot(), perception.screen);
      if (after.present) console.log(`[guard] Still blocked by ${after.kind} overlay`);
      return !after.present;
    } catch (err) {
      console.log(`[guard] Could not re-check the screen: ${errorMessage(err)}`);
      return false;
    }
  }

  /** detect, decide and handle in one go. PASS_THROUGH counts as clear. */
  async resolve(context: InterruptionContext): Promise<boolean> {
    const interruption = await this.detect(context.perception.nodes, context.perception.screen);
    if (!interruption.present) return true;
    console.log(
      `[guard] ${interruption.kind} overlay, coverage ${interruption.coverage.toFixed(2)}, ` +
        `${interruption.candidates.length} candidate(s)`,
    );
    const decision = await this.decide(interruption, context);
    console.log(`[guard] Decision: ${decision.decision} (${decision.rationale})`);
    if (decision.decision === "PASS_THROUGH") return true;
    return this.handle(interruption, decision, context.perception);
  }

  private async systemAlertShowing(): Promise<boolean> {
    try {
      return await this.device.hasSystemAlert();
    } catch (err) {
      console.log(`[guard] System alert check failed: ${errorMessage(err)}`);
      return false;
    }
  }

  private async dismissBlocklisted(interruption: Interruption, screen: ScreenSize): Promise<void> {
    const tuning = this.tuning.interruption;
    for (const node of interruption.candidates) {
      if (!isBlocklisted(node, tuning)) continue;
      const [x1, y1, x2, y2] = node.bounds;
      const point: Point = [
        Math.min(Math.max(0, Math.round(x2 - (x2 - x1) * tuning.dismissOffset.x)), screen.width - 1),
        Math.min(Math.max(0, Math.round(y1 + (y2 - y1) * tuning.dismissOffset.y)), screen.height - 1),
      ];
      console.log(`[guard] Dismissing blocklisted ${node.resourceId} at (${point.join(", ")})`);
      await this.dispatcher.executeWithRetry(
        { kind: "click", coordinate: point },
        tuning.dismissRetries,
        tuning.dismissDelayS,
      );
    }
  }

  /**
   * With no oracle actions: DISMISS taps a close-looking element, HANDLE of a
   * permission prompt taps the allow button.
   */
  private async fallbackTap(
    interruption: Interruption,
    decision: InterruptionDecision,
    perception: Perception,
  ): Promise<void> {
    let target: UINode | undefined;
    if (decision.decision === "DISMISS") {
      const cues = this.tuning.interruption.closeCues;
      target = perception.nodes.find((node) => hasAnyCue(cueLabel(node), cues));
    } else if (decision.decision === "HANDLE" && interruption.kind === "permission") {
      for (const selector of this.tuning.step.allowSelectors) {
        target = findBySelector(perception.nodes, selector);
        if (target) break;
      }
    }
    if (!target) return;
    await this.dispatcher.executeWithRetry(
      { kind: "click", coordinate: centerOf(target.bounds) },
      this.tuning.interruption.actionRetries,
      this.tuning.interruption.actionDelayS,
    );
    await this.sleep(seconds(this.tuning.interruption.settleS));
  }
}
