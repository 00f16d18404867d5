/**
 * Maps whatever action name the oracle produced onto one of the canonical
 * action kinds, and gates the actions that would leave the app under test.
 */

import { ACTION_KINDS, type ActionKind } from "./types.js";

const CANONICAL = new Set<string>(ACTION_KINDS);

function isActionKind(name: string): name is ActionKind {
  return CANONICAL.has(name);
}

export const ACTION_SYNONYMS: Readonly<Record<string, ActionKind>> = {
  left_click: "click",
  right_click: "click",
  tap: "click",
  touch: "click",
  press: "click",
  single_click: "click",
  double_click: "click",
  double_tap: "click",
  long_click: "long_press",
  hold: "long_press",
  press_and_hold: "long_press",
  long_tap: "long_press",
  scroll: "swipe",
  drag: "swipe",
  slide: "swipe",
  flick: "swipe",
  input: "type",
  enter: "type",
  write: "type",
  text: "type",
  keypress: "key",
  key_press: "key",
  button: "key",
  launch: "open",
  start: "open",
  run: "open",
  sleep: "wait",
  pause: "wait",
  delay: "wait",
  stop: "terminate",
  end: "terminate",
  finish: "terminate",
};

// Checked in order after exact and similarity matching fail.
const KEYWORD_FALLBACKS: ReadonlyArray<[string[], ActionKind]> = [
  [["click", "tap", "touch", "press"], "click"],
  [["long", "hold"], "long_press"],
  [["swipe", "scroll", "drag"], "swipe"],
  [["type", "input", "text"], "type"],
  [["key", "button"], "key"],
];

export const DEFAULT_SIMILARITY_CUTOFF = 0.6;

function matchingCharacters(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) return 0;
  let bestLen = 0;
  let bestA = 0;
  let bestB = 0;
  // Longest common substring, earliest on ties.
  let prev = new Array<number>(b.length + 1).fill(0);
  for (let i = 1; i <= a.length; i++) {
    const row = new Array<number>(b.length + 1).fill(0);
    for (let j = 1; j <= b.length; j++) {
      if (a[i - 1] !== b[j - 1]) continue;
      row[j] = prev[j - 1] + 1;
      if (row[j] > bestLen) {
        bestLen = row[j];
        bestA = i - bestLen;
        bestB = j - bestLen;
      }
    }
    prev = row;
  }
  if (bestLen === 0) return 0;
  return (
    bestLen +
    matchingCharacters(a.slice(0, bestA), b.slice(0, bestB)) +
    matchingCharacters(a.slice(bestA + bestLen), b.slice(bestB + bestLen))
  );
}

/**
 * Ratcliff/Obershelp similarity: twice the matched characters over the total
 * length, in [0, 1].
 */
export function similarityRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;
  return (2 * matchingCharacters(a, b)) / total;
}

// Canonical names first so they win ties against synonyms.
const MATCH_TABLE: ReadonlyArray<[string, ActionKind]> = [
  ...ACTION_KINDS.map((kind): [string, ActionKind] => [kind, kind]),
  ...Object.entries(ACTION_SYNONYMS),
];

function closestMatch(name: string, cutoff: number): ActionKind | null {
  let best: { kind: ActionKind; ratio: number } | null = null;
  for (const [option, kind] of MATCH_TABLE) {
    const ratio = similarityRatio(name, option);
    if (ratio >= cutoff && (best === null || ratio > best.ratio)) best = { kind, ratio };
  }
  return best?.kind ?? null;
}

/** Total: every input maps to a canonical kind, `click` as the last resort. */
export function normalizeActionName(
  name: string | undefined | null,
  cutoff = DEFAULT_SIMILARITY_CUTOFF,
): ActionKind {
  const cleaned = (name ?? "").trim().toLowerCase().replace(/[\s-]+/g, "_");
  if (!cleaned) return "click";
  if (isActionKind(cleaned)) return cleaned;

  if (Object.hasOwn(ACTION_SYNONYMS, cleaned)) return ACTION_SYNONYMS[cleaned];

  const similar = closestMatch(cleaned, cutoff);
  if (similar) return similar;

  for (const [keywords, kind] of KEYWORD_FALLBACKS) {
    if (keywords.some((k) => cleaned.includes(k))) return kind;
  }
  return "click";
}

const NAVIGATION_BUTTONS = new Set(["back", "home", "recent", "recents", "overview", "app_switch"]);

export function normalizeButtonName(button: string | undefined): string {
  return (button ?? "").trim().toLowerCase().replace(/[\s-]+/g, "_");
}

/**
 * Actions that would end the step or navigate out of the app under test.
 * They are rewritten to a short wait no matter what arguments came with them.
 */
export function isBlockedAction(kind: ActionKind, button?: string): boolean {
  if (kind === "terminate") return true;
  return kind === "system_button" && NAVIGATION_BUTTONS.has(normalizeButtonName(button));
}
