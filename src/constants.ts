/**
 * Fixed values for the step engine: keycodes, device paths, default models.
 * Tunable heuristics live in tuning.ts, not here.
 */

// ===========================================
// API Endpoints
// ===========================================
export const GROQ_API_BASE_URL = "https://api.groq.com/openai/v1";

// ===========================================
// ADB Key Codes
// ===========================================
export const KEYCODE_HOME = "3";
export const KEYCODE_BACK = "4";
export const KEYCODE_VOLUME_UP = "24";
export const KEYCODE_VOLUME_DOWN = "25";
export const KEYCODE_POWER = "26";
export const KEYCODE_CAMERA = "27";
export const KEYCODE_CLEAR = "28";
export const KEYCODE_ENTER = "66";
export const KEYCODE_DEL = "67";
export const KEYCODE_MENU = "82";
export const KEYCODE_APP_SWITCH = "187";

/** Named keys accepted by the `key` action. Unknown names fall back to enter. */
export const NAMED_KEYCODES: Readonly<Record<string, string>> = {
  volume_up: KEYCODE_VOLUME_UP,
  volume_down: KEYCODE_VOLUME_DOWN,
  power: KEYCODE_POWER,
  camera: KEYCODE_CAMERA,
  clear: KEYCODE_CLEAR,
  enter: KEYCODE_ENTER,
  delete: KEYCODE_DEL,
  del: KEYCODE_DEL,
  backspace: KEYCODE_DEL,
  menu: KEYCODE_MENU,
};

export const SWIPE_DURATION_MS = "300";

// ===========================================
// Default Models
// ===========================================
export const DEFAULT_GROQ_MODEL = "llama-3.3-70b-versatile";
export const DEFAULT_OPENAI_MODEL = "gpt-4o";
export const DEFAULT_BEDROCK_MODEL = "anthropic.claude-3-5-sonnet-20240620-v1:0";
export const DEFAULT_OPENROUTER_MODEL = "anthropic/claude-3.5-sonnet";

export const BEDROCK_ANTHROPIC_MODELS = ["anthropic"];
export const BEDROCK_META_MODELS = ["meta", "llama"];

// ===========================================
// File Paths
// ===========================================
export const DEVICE_DUMP_PATH = "/sdcard/window_dump.xml";
export const LOCAL_SCREENSHOT_PATH = "step_screenshot.png";

// ===========================================
// Engine Defaults
// ===========================================
export const DEFAULT_MAX_CYCLES = 3;
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_RETRY_DELAY = 1.5;
export const DEFAULT_LOG_DIR = "logs";

/** Snapshot payload sent to the oracle is truncated past this many characters. */
export const MAX_SNAPSHOT_CHARS = 120_000;
