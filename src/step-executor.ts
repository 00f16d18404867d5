/**
 * Step execution state machine.
 *
 *   perceive -> precheck -> execute -> evaluate -> finish
 *                   ^                      |
 *                   +---- recover <--------+
 *
 * Each pass through evaluate is one cycle; the step fails once the cycle
 * budget is spent. Nothing escapes executeStepWithGuard: every failure path
 * ends as `false` plus notes on the StepOutcome.
 */

import type { DeviceSession } from "./device.js";
import { isTransientSessionError } from "./device.js";
import type { ActionDispatcher } from "./dispatcher.js";
import { errorMessage } from "./errors.js";
import type { InterruptionGuard } from "./interruptions.js";
import { StepLogger } from "./logger.js";
import { failedVerdict, type Oracle } from "./oracle.js";
import { centerOf, findBySelector, parseSnapshot } from "./snapshot-parser.js";
import { seconds, sleep as defaultSleep, type Sleep } from "./timing.js";
import { DEFAULT_TUNING, type EngineTuning } from "./tuning.js";
import type {
  CycleState,
  DispatchResult,
  EvaluationVerdict,
  ExecutorStep,
  Perception,
  Point,
  RecoveryKind,
  StepOutcome,
} from "./types.js";

type Phase =
  | { name: "perceive"; screenshotPath?: string; preferOracle: boolean }
  | { name: "precheck"; perception: Perception; preferOracle: boolean }
  | { name: "execute"; perception: Perception; preferOracle: boolean }
  | { name: "evaluate"; dispatch: DispatchResult; actionLatencyMs: number }
  | { name: "recover"; verdict: EvaluationVerdict; perception: Perception }
  | { name: "finish"; success: boolean; reason: string };

interface StepRun {
  goal: string;
  step: ExecutorStep;
  state: CycleState;
  notes: string[];
  recoveries: RecoveryKind[];
  logger: StepLogger;
}

export interface StepExecutorDeps {
  device: DeviceSession;
  oracle: Oracle;
  dispatcher: ActionDispatcher;
  guard: InterruptionGuard;
  tuning?: EngineTuning;
  sleep?: Sleep;
  /** Directory for per-step JSON logs; empty disables them. */
  logDir?: string;
}

export interface RunStepOptions {
  /** Screenshot the caller just took, used in place of the first capture. */
  screenshotPath?: string;
  maxCycles?: number;
}

/** What the evaluator should look for when the step did not say. */
export function expectedHintFor(step: ExecutorStep): string {
  if (step.expectedState) return step.expectedState;
  const description = step.description.toLowerCase();
  const action = step.actionType.toLowerCase();
  if (description.includes("comment")) {
    return "Comment UI visible (input field or comments list present)";
  }
  if (action.includes("click") || action.includes("tap")) {
    return "Target element reflects clicked state or expected screen appears";
  }
  if (action.includes("type") || action.includes("input")) {
    return "Text field contains newly entered text and the send/submit button is enabled";
  }
  if (action.includes("swipe") || action.includes("scroll")) {
    return "Content position changed in scrollable region";
  }
  return "Screen reflects successful completion of the described step";
}

export class StepExecutor {
  private readonly device: DeviceSession;
  private readonly oracle: Oracle;
  private readonly dispatcher: ActionDispatcher;
  private readonly guard: InterruptionGuard;
  private readonly tuning: EngineTuning;
  private readonly sleep: Sleep;
  private readonly logDir: string;

  constructor(deps: StepExecutorDeps) {
    this.device = deps.device;
    this.oracle = deps.oracle;
    this.dispatcher = deps.dispatcher;
    this.guard = deps.guard;
    this.tuning = deps.tuning ?? DEFAULT_TUNING;
    this.sleep = deps.sleep ?? defaultSleep;
    this.logDir = deps.logDir ?? "";
  }

  async executeStepWithGuard(
    goal: string,
    step: ExecutorStep,
    screenshotPath?: string,
    maxCycles = this.tuning.step.maxCycles,
  ): Promise<boolean> {
    const outcome = await this.runStep(goal, step, { screenshotPath, maxCycles });
    return outcome.success;
  }

  async runStep(goal: string, step: ExecutorStep, options: RunStepOptions = {}): Promise<StepOutcome> {
    const maxCycles = Math.max(1, options.maxCycles ?? this.tuning.step.maxCycles);
    const run: StepRun = {
      goal,
      step,
      state: { cycle: 0, maxCycles, done: false },
      notes: [],
      recoveries: [],
      logger: new StepLogger(this.logDir, goal, step.stepId, step.description),
    };
    console.log(`\n[step ${step.stepId}] ${step.description} (intent: "${step.query}", max ${maxCycles} cycles)`);

    let phase: Phase = { name: "perceive", screenshotPath: options.screenshotPath, preferOracle: false };
    try {
      while (phase.name !== "finish") {
        phase = await this.advance(phase, run);
      }
    } catch (err) {
      phase = { name: "finish", success: false, reason: `Step failed with error: ${errorMessage(err)}` };
    }
    run.state.done = true;
    this.note(run, `${phase.success ? "Succeeded" : "Failed"}: ${phase.reason}`);

    run.logger.finalize(phase.success, phase.reason, run.notes);

    return {
      success: phase.success,
      cycles: run.state.cycle,
      reason: phase.reason,
      notes: run.notes,
      recoveries: run.recoveries,
    };
  }

  // ===========================================
  // Transitions
  // ===========================================

  private async advance(phase: Exclude<Phase, { name: "finish" }>, run: StepRun): Promise<Phase> {
    switch (phase.name) {
      case "perceive": {
        const perception = await this.perceive(run, phase.screenshotPath);
        return { name: "precheck", perception, preferOracle: phase.preferOracle };
      }

      case "precheck": {
        const started = Date.now();
        const verdict = await this.evaluate(run, phase.perception, "");
        run.logger.logCycle({
          cycle: run.state.cycle + 1,
          phase: "precheck",
          elementCount: phase.perception.nodes.length,
          verdict,
          oracleLatencyMs: Date.now() - started,
          actionLatencyMs: 0,
        });
        if (verdict.ok) return { name: "finish", success: true, reason: `Already satisfied: ${verdict.reason}` };
        return { name: "execute", perception: phase.perception, preferOracle: phase.preferOracle };
      }

      case "execute": {
        const started = Date.now();
        let dispatch = await this.dispatcher.executeIntent(run.step.query, phase.perception, {
          preferOracle: phase.preferOracle,
        });
        this.note(run, `Cycle ${run.state.cycle + 1}: ${run.step.actionType} "${run.step.query}" -> ${dispatch.status} (${dispatch.detail})`);
        for (const alternative of run.step.alternativeActions) {
          if (dispatch.status === "success") break;
          dispatch = await this.dispatcher.executeIntent(alternative, await this.perceive(run));
          this.note(run, `Alternative "${alternative}" -> ${dispatch.status} (${dispatch.detail})`);
        }
        return { name: "evaluate", dispatch, actionLatencyMs: Date.now() - started };
      }

      case "evaluate": {
        await this.sleep(seconds(this.tuning.step.settleS));
        const perception = await this.perceive(run);
        const started = Date.now();
        const lastAction = `${run.step.actionType} "${run.step.query}" (${phase.dispatch.status})`;
        const verdict = await this.evaluate(run, perception, lastAction);
        run.state.cycle += 1;
        run.state.lastVerdict = verdict;
        run.logger.logCycle({
          cycle: run.state.cycle,
          phase: "evaluate",
          elementCount: perception.nodes.length,
          dispatch: { status: phase.dispatch.status, detail: phase.dispatch.detail },
          verdict,
          oracleLatencyMs: Date.now() - started,
          actionLatencyMs: phase.actionLatencyMs,
        });

        if (verdict.ok) return { name: "finish", success: true, reason: verdict.reason || "Step verified" };
        if (verdict.recovery === "ABORT") return { name: "finish", success: false, reason: verdict.reason };
        if (run.state.cycle >= run.state.maxCycles) {
          return {
            name: "finish",
            success: false,
            reason: `Not verified after ${run.state.maxCycles} cycle(s): ${verdict.reason}`,
          };
        }
        return { name: "recover", verdict, perception };
      }

      case "recover":
        return this.recover(run, phase.verdict, phase.perception);
    }
  }

  private async recover(run: StepRun, verdict: EvaluationVerdict, perception: Perception): Promise<Phase> {
    run.recoveries.push(verdict.recovery);
    this.note(run, `Recovery ${verdict.recovery}: ${verdict.reason}`);
    const resolved = await this.applyRecovery(run, verdict, perception);
    run.logger.logRecovery(verdict.recovery, resolved);

    if (verdict.recovery === "GRANT_PERMISSION" && !resolved) {
      return { name: "finish", success: false, reason: `Could not grant permission: ${verdict.reason}` };
    }
    return { name: "perceive", preferOracle: verdict.recovery === "REPLAN" };
  }

  /** Carries out one recovery. True when it did what it set out to do. */
  private async applyRecovery(run: StepRun, verdict: EvaluationVerdict, perception: Perception): Promise<boolean> {
    const { step: tuning } = this.tuning;

    switch (verdict.recovery) {
      case "GRANT_PERMISSION":
        return this.grantPermission(run, perception);

      case "HANDLE_INTERRUPT": {
        const cleared = await this.guard.resolve({
          goal: run.goal,
          stepDescription: run.step.description,
          perception,
        });
        if (cleared) return true;
        if (verdict.suggestions.length > 0) {
          return this.runSuggestions(run, verdict.suggestions, tuning.interruptFallbackIntent);
        }
        return this.tapCloseCorners(run, perception);
      }

      case "REQUIRE_AUTH":
        return this.runSuggestions(
          run,
          verdict.suggestions.length > 0 ? verdict.suggestions : [tuning.authFallbackIntent],
          tuning.authFallbackIntent,
        );

      case "REPLAN":
        return true;

      case "REDO_STEP":
      case "NONE":
      case "ABORT":
        if (verdict.suggestions.length === 0) return true;
        return this.runSuggestions(run, verdict.suggestions);
    }
  }

  // ===========================================
  // Perception & Evaluation
  // ===========================================

  private async capture(screenshotPath?: string): Promise<Perception> {
    const shot = screenshotPath ?? (await this.device.screenshot());
    const snapshot = await this.device.snapshot();
    const screen = await this.device.screenSize();
    return { screenshotPath: shot, snapshot, nodes: parseSnapshot(snapshot), screen };
  }

  /** Captures a perception, restarting the session once on a transient fault. */
  private async perceive(run: StepRun, screenshotPath?: string): Promise<Perception> {
    try {
      return await this.capture(screenshotPath);
    } catch (err) {
      if (!isTransientSessionError(err, this.tuning.step.transientMarkers)) throw err;
      this.note(run, `Session fault, restarting: ${errorMessage(err)}`);
      await this.device.restartSession();
      await this.sleep(seconds(this.tuning.step.restartSettleS));
      return this.capture();
    }
  }

  private async evaluate(run: StepRun, perception: Perception, lastAction: string): Promise<EvaluationVerdict> {
    try {
      return await this.oracle.evaluateOutcome({
        goal: run.goal,
        stepDescription: run.step.description,
        expectedHint: expectedHintFor(run.step),
        lastAction,
        snapshot: perception.snapshot,
        screenshotPath: perception.screenshotPath,
      });
    } catch (err) {
      return failedVerdict(`Evaluation error: ${errorMessage(err)}`);
    }
  }

  // ===========================================
  // Recovery Actions
  // ===========================================

  private async grantPermission(run: StepRun, perception: Perception): Promise<boolean> {
    for (const selector of this.tuning.step.allowSelectors) {
      const node = findBySelector(perception.nodes, selector);
      if (!node) continue;
      const result = await this.dispatcher.executeWithRetry({ kind: "click", coordinate: centerOf(node.bounds) });
      this.note(run, `Allow tap on "${node.text || node.contentDesc || node.resourceId}" -> ${result.status}`);
      if (result.status !== "success") return false;
      await this.sleep(seconds(this.tuning.step.permissionSettleS));
      return true;
    }
    this.note(run, "No allow button on screen");
    return false;
  }

  /**
   * Runs each suggestion as an intent on a fresh perception. Blank entries
   * become `fallback`, or are skipped without one. True if any dispatched.
   */
  private async runSuggestions(run: StepRun, suggestions: readonly string[], fallback = ""): Promise<boolean> {
    let anySucceeded = false;
    for (const entry of suggestions.slice(0, this.tuning.step.maxSuggestions)) {
      const suggestion = entry.trim() || fallback;
      if (!suggestion) continue;
      const perception = await this.perceive(run);
      const result = await this.dispatcher.executeIntent(suggestion, perception);
      this.note(run, `Suggestion "${suggestion}" -> ${result.status}`);
      if (result.status === "success") anySucceeded = true;
      await this.sleep(seconds(this.tuning.step.suggestionSettleS));
    }
    return anySucceeded;
  }

  /** Taps the usual close-button spots until the overlay is gone. True once it is. */
  private async tapCloseCorners(run: StepRun, perception: Perception): Promise<boolean> {
    const { width, height } = perception.screen;
    const { cornerCloses, cornerRetries, cornerDelayS, suggestionSettleS } = this.tuning.step;
    for (const [fx, fy] of cornerCloses) {
      const point: Point = [
        Math.min(Math.round(width * fx), width - 1),
        Math.min(Math.round(height * fy), height - 1),
      ];
      const result = await this.dispatcher.executeWithRetry({ kind: "click", coordinate: point }, cornerRetries, cornerDelayS);
      this.note(run, `Corner tap (${point.join(", ")}) -> ${result.status}`);
      await this.sleep(seconds(suggestionSettleS));
      const interruption = await this.guard.detect(await this.device.snapshot(), perception.screen);
      if (!interruption.present) return true;
    }
    return false;
  }

  private note(run: StepRun, message: string): void {
    run.notes.push(message);
    console.log(`[step ${run.step.stepId}] ${message}`);
  }
}
