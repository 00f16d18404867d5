/**
 * Action dispatcher.
 * Resolves oracle proposals into device actions, gates navigation away from
 * the app, and executes with retries. Intents go XML-first: an element whose
 * label matches is tapped directly and the oracle is asked only when the
 * hierarchy has no unique answer.
 */

import {
  isBlockedAction,
  normalizeActionName,
  normalizeButtonName,
} from "./action-normalizer.js";
import {
  buildClickBox,
  directionalSwipe,
  modelSpaceFor,
  normalizePoint,
  parseDirection,
  snapToTappable,
} from "./coordinates.js";
import type { DeviceSession } from "./device.js";
import { errorMessage } from "./errors.js";
import type { Oracle } from "./oracle.js";
import { centerOf, findBySelector, findRelevantNodes } from "./snapshot-parser.js";
import { randomInt, seconds, sleep as defaultSleep, type RandomSource, type Sleep } from "./timing.js";
import { DEFAULT_TUNING, type EngineTuning } from "./tuning.js";
import type {
  DispatchResult,
  Perception,
  Point,
  RawAction,
  ResolvedAction,
  ScreenSize,
  UINode,
} from "./types.js";

export type Resolution =
  | { ok: true; action: ResolvedAction; approximate: boolean; blocked: boolean }
  | { ok: false; reason: string };

export interface DispatcherDeps {
  device: DeviceSession;
  oracle: Oracle;
  tuning?: EngineTuning;
  sleep?: Sleep;
  random?: RandomSource;
}

export interface ExecuteRawOptions {
  retries?: number;
  delayS?: number;
  /** Sample around approximate clicks instead of tapping the exact point. */
  adaptive?: boolean;
}

export function describeAction(action: ResolvedAction): string {
  switch (action.kind) {
    case "click":
      return `click(${action.coordinate.join(", ")})`;
    case "long_press":
      return `long_press(${action.coordinate.join(", ")}, ${action.time}s)`;
    case "swipe":
      return `swipe(${action.coordinate.join(", ")} -> ${action.coordinate2.join(", ")})`;
    case "type":
    case "key":
    case "open":
      return `${action.kind}("${action.text}")`;
    case "system_button":
      return `system_button(${action.button})`;
    case "wait":
      return `wait(${action.time}s)`;
    case "terminate":
      return `terminate(${action.status})`;
  }
}

function positiveOr(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isFinite(value) && value >= 0 ? value : fallback;
}

/** Intent plus any quoted label inside it ('Tap "Comment"'). */
function intentQueries(intent: string): string[] {
  const quoted = Array.from(intent.matchAll(/["'“”‘’]([^"'“”‘’]+)["'“”‘’]/g), (m) => m[1].trim());
  return [intent.trim(), ...quoted].filter((q, i, all) => q.length > 0 && all.indexOf(q) === i);
}

export class ActionDispatcher {
  private readonly device: DeviceSession;
  private readonly oracle: Oracle;
  private readonly tuning: EngineTuning;
  private readonly sleep: Sleep;
  private readonly random: RandomSource;

  constructor(deps: DispatcherDeps) {
    this.device = deps.device;
    this.oracle = deps.oracle;
    this.tuning = deps.tuning ?? DEFAULT_TUNING;
    this.sleep = deps.sleep ?? defaultSleep;
    this.random = deps.random ?? Math.random;
  }

  modelSpace(screen: ScreenSize): ScreenSize {
    return modelSpaceFor(screen, this.tuning.model);
  }

  /** Rewrites actions that would leave the app under test into a short wait. */
  gate(action: ResolvedAction): ResolvedAction {
    const button = action.kind === "system_button" ? action.button : undefined;
    if (!isBlockedAction(action.kind, button)) return action;
    console.log(`[dispatch] Blocked ${describeAction(action)}, waiting instead`);
    return { kind: "wait", time: this.tuning.dispatch.blockedWaitS };
  }

  // ===========================================
  // Resolution
  // ===========================================

  resolve(raw: RawAction, perception: Perception): Resolution {
    const { dispatch, snap } = this.tuning;
    const { nodes, screen } = perception;
    const kind = normalizeActionName(raw.action, dispatch.similarityCutoff);

    if (isBlockedAction(kind, raw.button)) {
      console.log(`[dispatch] Blocked "${raw.action}" (${kind}), waiting instead`);
      return { ok: true, action: { kind: "wait", time: dispatch.blockedWaitS }, approximate: false, blocked: true };
    }

    const model = this.modelSpace(screen);
    const toDevice = (p: Point): Point => normalizePoint(p, screen, model);
    const selected = (): Point | undefined => {
      const node = findBySelector(nodes, {
        text: raw.text,
        contentDesc: raw.contentDesc,
        resourceId: raw.resourceId,
      });
      return node ? centerOf(node.bounds) : undefined;
    };
    const resolved = (action: ResolvedAction, approximate = false): Resolution => ({
      ok: true,
      action,
      approximate,
      blocked: false,
    });

    switch (kind) {
      case "click":
      case "long_press": {
        const approximate = raw.coordinate !== undefined;
        let coordinate = raw.coordinate ? toDevice(raw.coordinate) : selected();
        if (!coordinate) return { ok: false, reason: `${kind} has no coordinate and no matching element` };
        if (kind === "long_press") {
          return resolved({ kind, coordinate, time: positiveOr(raw.time, dispatch.longPressS) });
        }
        if (approximate && snap.enabled) coordinate = snapToTappable(coordinate, nodes, screen, snap);
        return resolved({ kind, coordinate }, approximate);
      }

      case "swipe": {
        const direction = parseDirection(raw.direction);
        const start = raw.coordinate ? toDevice(raw.coordinate) : direction ? undefined : selected();
        if (raw.coordinate2 && start) {
          return resolved({ kind, coordinate: start, coordinate2: toDevice(raw.coordinate2) });
        }
        if (direction) {
          const [from, to] = directionalSwipe(direction, screen, start);
          return resolved({ kind, coordinate: from, coordinate2: to });
        }
        return { ok: false, reason: "swipe needs two coordinates or a direction" };
      }

      case "type":
      case "open": {
        if (!raw.text) return { ok: false, reason: `${kind} needs text` };
        return resolved({ kind, text: raw.text });
      }

      case "key":
        return resolved({ kind, text: raw.text?.trim() || "enter" });

      case "system_button": {
        const button = normalizeButtonName(raw.button);
        if (button === "menu" || button === "enter") return resolved({ kind, button });
        return { ok: false, reason: `unsupported system button "${raw.button ?? ""}"` };
      }

      case "wait":
        return resolved({ kind, time: positiveOr(raw.time, dispatch.defaultWaitS) });

      case "terminate":
        return resolved({ kind: "wait", time: dispatch.blockedWaitS });
    }
  }

  // ===========================================
  // Execution
  // ===========================================

  /**
   * Runs one action with a retry budget. `wait` sleeps locally. Never throws:
   * exhaustion yields a failure carrying the last attempted action.
   */
  async executeWithRetry(
    input: ResolvedAction,
    retries = this.tuning.dispatch.retries,
    delayS = this.tuning.dispatch.delayS,
  ): Promise<DispatchResult> {
    const action = this.gate(input);
    if (action.kind === "wait") {
      await this.sleep(seconds(action.time));
      return { status: "success", detail: `waited ${action.time}s` };
    }

    const attempts = Math.max(1, retries);
    let lastDetail = "";
    for (let attempt = 1; attempt <= attempts; attempt++) {
      let result: DispatchResult;
      try {
        result = await this.device.dispatch(action);
      } catch (err) {
        result = { status: "error", detail: errorMessage(err) };
      }
      if (result.status === "success") return result;

      lastDetail = result.detail;
      console.log(`[dispatch] ${describeAction(action)} attempt ${attempt}/${attempts} failed: ${result.detail}`);
      if (attempt < attempts) await this.sleep(seconds(delayS));
    }
    return { status: "failure", detail: lastDetail || "all attempts failed", action };
  }

  /**
   * Taps random points inside the click box until one succeeds, then falls
   * back to the original point.
   */
  async adaptiveFuzzyClick(point: Point, perception: Perception): Promise<DispatchResult> {
    const { clickBox } = this.tuning;
    const [x1, y1, x2, y2] = buildClickBox(point, perception.nodes, perception.screen, clickBox);

    for (let i = 0; i < clickBox.samples; i++) {
      const sample: Point = [randomInt(this.random, x1, x2), randomInt(this.random, y1, y2)];
      const result = await this.executeWithRetry(
        { kind: "click", coordinate: sample },
        clickBox.retriesEach,
        clickBox.delayEachS,
      );
      if (result.status === "success") return result;
    }
    return this.executeWithRetry({ kind: "click", coordinate: point }, clickBox.fallbackRetries);
  }

  async executeRaw(raw: RawAction, perception: Perception, options: ExecuteRawOptions = {}): Promise<DispatchResult> {
    const resolution = this.resolve(raw, perception);
    if (!resolution.ok) {
      console.log(`[dispatch] Could not resolve "${raw.action}": ${resolution.reason}`);
      return { status: "failure", detail: resolution.reason };
    }
    const { action, approximate } = resolution;
    if (action.kind === "click" && approximate && (options.adaptive ?? true)) {
      return this.adaptiveFuzzyClick(action.coordinate, perception);
    }
    return this.executeWithRetry(action, options.retries, options.delayS);
  }

  /**
   * Carries out a natural-language intent on the perceived screen.
   * With `preferOracle` the hierarchy shortcut is skipped.
   */
  async executeIntent(
    intent: string,
    perception: Perception,
    options: { preferOracle?: boolean } = {},
  ): Promise<DispatchResult> {
    if (!options.preferOracle) {
      for (const query of intentQueries(intent)) {
        const matches = findRelevantNodes(perception.nodes, query);
        if (matches.length === 0) continue;
        const target = matches.length === 1 ? matches[0] : await this.disambiguate(intent, matches, perception);
        console.log(`[dispatch] "${intent}" matched element ${target.index} in the hierarchy`);
        return this.executeWithRetry({ kind: "click", coordinate: centerOf(target.bounds) });
      }
    }

    let raw: RawAction;
    try {
      raw = await this.oracle.proposeAction({
        screenshotPath: perception.screenshotPath,
        snapshot: perception.snapshot,
        intent,
        modelSize: this.modelSpace(perception.screen),
      });
    } catch (err) {
      return { status: "error", detail: `Action proposal failed: ${errorMessage(err)}` };
    }
    return this.executeRaw(raw, perception);
  }

  private async disambiguate(intent: string, candidates: UINode[], perception: Perception): Promise<UINode> {
    if (!this.oracle.chooseCandidate) return candidates[0];
    try {
      const index = await this.oracle.chooseCandidate({
        screenshotPath: perception.screenshotPath,
        intent,
        candidates,
      });
      return index !== null && index >= 0 && index < candidates.length ? candidates[index] : candidates[0];
    } catch (err) {
      console.log(`[dispatch] Disambiguation failed, using first match: ${errorMessage(err)}`);
      return candidates[0];
    }
  }
}
