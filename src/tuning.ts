/**
 * Heuristic constants for snapping, interruption detection, dispatch and the
 * step loop. Every value is defaulted here and can be overridden per app from
 * a JSON file (see TUNING_FILE) without touching code.
 */

import { readFileSync } from "fs";
import { z } from "zod";

import { EngineError, errorMessage } from "./errors.js";

const fraction = z.number().min(0).max(1);
const keywordList = (defaults: string[]) => z.array(z.string()).default(defaults);

const snapSchema = z.object({
  enabled: z.boolean().default(true),
  /** Candidates farther than this from the point are ignored. */
  maxDistPx: z.number().positive().default(160),
  clickableFactor: z.number().positive().default(0.6),
  keywordFactor: z.number().positive().default(0.7),
  railFactor: z.number().positive().default(0.75),
  preferRightRail: z.boolean().default(true),
  /** Width of the right rail as a share of screen width. */
  rightRailRatio: fraction.default(0.28),
  preferKeywords: keywordList(["comment", "comments", "like", "share", "send", "reply"]),
  /** Class-name fragments that mark a node as interactive-looking. */
  interactiveClassHints: keywordList([
    "button",
    "imagebutton",
    "checkbox",
    "switch",
    "tab",
    "edittext",
    "imageview",
  ]),
});

const clickBoxSchema = z.object({
  boxRatio: fraction.default(0.12),
  minBoxPx: z.number().int().positive().default(16),
  /** A clickable node lends its bounds only when its center is this close. */
  maxDistPx: z.number().positive().default(240),
  samples: z.number().int().min(0).default(8),
  retriesEach: z.number().int().min(1).default(1),
  delayEachS: z.number().min(0).default(0.2),
  fallbackRetries: z.number().int().min(1).default(2),
});

const regionSchema = z.object({
  left: fraction,
  top: fraction,
  right: fraction,
  bottom: fraction,
});

const interruptionSchema = z.object({
  modalCoverage: fraction.default(0.6),
  overlayCoverage: fraction.default(0.33),
  centralRegion: regionSchema.default({ left: 0.2, top: 0.15, right: 0.8, bottom: 0.85 }),
  dialogClasses: keywordList([
    "android.app.Dialog",
    "androidx.appcompat.app.AlertDialog",
    "android.widget.PopupWindow$PopupDecorView",
    "com.google.android.material.bottomsheet.BottomSheetDialog",
  ]),
  /** Simple class names that are plain containers. */
  layoutClasses: keywordList([
    "ViewGroup",
    "FrameLayout",
    "LinearLayout",
    "RelativeLayout",
    "RecyclerView",
    "ViewPager",
    "ViewPager2",
    "View",
    "ScrollView",
    "NestedScrollView",
    "ConstraintLayout",
    "CoordinatorLayout",
  ]),
  adCues: keywordList(["ad", "advert", "sponsored", "promo", "offer", "upgrade", "try premium"]),
  loginCues: keywordList(["sign in", "log in", "continue with", "google", "facebook", "apple"]),
  permissionCues: keywordList(["allow", "deny", "while using the app", "only this time"]),
  closeCues: keywordList(["close", "skip", "not now", "no thanks", "cancel", "dismiss", "x"]),
  /** Resource-id fragments of known overlays, dismissed without asking the oracle. */
  blocklistIds: keywordList(["ad_container", "interstitial", "promo_banner"]),
  /** Step-description words for which login and permission walls are expected. */
  allowlistSteps: keywordList(["login", "log in", "sign in", "camera", "microphone", "location"]),
  maxOracleActions: z.number().int().min(0).default(3),
  settleS: z.number().min(0).default(0.8),
  actionRetries: z.number().int().min(1).default(2),
  actionDelayS: z.number().min(0).default(1.0),
  dismissRetries: z.number().int().min(1).default(2),
  dismissDelayS: z.number().min(0).default(0.8),
  /** Dismiss tap offset from the node's top-right corner, as a share of the node's size. */
  dismissOffset: z.object({ x: fraction, y: fraction }).default({ x: 0.05, y: 0.08 }),
  systemAlertCoverage: fraction.default(0.6),
});

const dispatchSchema = z.object({
  retries: z.number().int().min(1).default(3),
  delayS: z.number().min(0).default(1.5),
  blockedWaitS: z.number().min(0).default(0.2),
  defaultWaitS: z.number().min(0).default(0.2),
  /** Minimum similarity ratio for fuzzy action-name matching. */
  similarityCutoff: fraction.default(0.6),
  longPressS: z.number().positive().default(1.0),
});

const modelSchema = z.object({
  /** "model": oracle coordinates are in the resized image space; "device": raw pixels. */
  coordinateSpace: z.enum(["model", "device"]).default("model"),
  factor: z.number().int().positive().default(28),
  minPixels: z.number().int().positive().default(256 * 28 * 28),
  maxPixels: z.number().int().positive().default(1280 * 28 * 28),
});

const selectorSchema = z.object({
  text: z.string().optional(),
  contentDesc: z.string().optional(),
  resourceId: z.string().optional(),
});

const stepSchema = z.object({
  maxCycles: z.number().int().min(1).default(3),
  maxSuggestions: z.number().int().min(0).default(3),
  settleS: z.number().min(0).default(0.2),
  suggestionSettleS: z.number().min(0).default(0.25),
  permissionSettleS: z.number().min(0).default(0.3),
  restartSettleS: z.number().min(0).default(1.0),
  /** Tried in order when a permission must be granted. */
  allowSelectors: z.array(selectorSchema).default([
    { text: "Allow while using the app" },
    { text: "Allow only this time" },
    { text: "Allow once" },
    { text: "Allow" },
    { contentDesc: "Allow" },
    { resourceId: "android:id/button1" },
    { resourceId: "com.android.permissioncontroller:id/permission_allow_button" },
  ]),
  /** Screen-relative spots where close buttons usually sit. */
  cornerCloses: z.array(z.tuple([fraction, fraction])).default([
    [0.97, 0.03],
    [0.95, 0.07],
    [0.05, 0.05],
    [0.5, 0.92],
  ]),
  cornerRetries: z.number().int().min(1).default(1),
  cornerDelayS: z.number().min(0).default(0.1),
  /** Error-message fragments of a session fault worth one restart. */
  transientMarkers: keywordList(["instrumentation process is not running", "uiautomator"]),
  interruptFallbackIntent: z.string().default("close ad"),
  authFallbackIntent: z.string().default("Sign in"),
});

export const tuningSchema = z.object({
  snap: snapSchema.default({}),
  clickBox: clickBoxSchema.default({}),
  interruption: interruptionSchema.default({}),
  dispatch: dispatchSchema.default({}),
  model: modelSchema.default({}),
  step: stepSchema.default({}),
});

export type EngineTuning = z.infer<typeof tuningSchema>;
export type TuningInput = z.input<typeof tuningSchema>;
export type SnapTuning = EngineTuning["snap"];
export type ClickBoxTuning = EngineTuning["clickBox"];
export type InterruptionTuning = EngineTuning["interruption"];
export type DispatchTuning = EngineTuning["dispatch"];
export type ModelTuning = EngineTuning["model"];
export type StepTuning = EngineTuning["step"];
export type Selector = z.infer<typeof selectorSchema>;

export const DEFAULT_TUNING: EngineTuning = tuningSchema.parse({});

/**
 * Validates overrides and fills in every missing value from the defaults.
 * Sections merge field by field; lists are replaced, not appended.
 */
export function resolveTuning(overrides: unknown = {}): EngineTuning {
  const result = tuningSchema.safeParse(overrides ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new EngineError("CONFIG", `Invalid tuning: ${issues}`);
  }
  return result.data;
}

export function loadTuningFile(path: string): EngineTuning {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new EngineError("CONFIG", `Could not read tuning file ${path}: ${errorMessage(err)}`, { path }, err);
  }
  return resolveTuning(raw);
}
