/**
 * DeviceSession over ADB.
 * Every device interaction is an `adb` invocation; the process runner is
 * injectable so commands can be checked without a device attached.
 */

import { spawnSync } from "child_process";
import { writeFileSync } from "fs";

import {
  DEFAULT_MAX_RETRIES,
  DEFAULT_RETRY_DELAY,
  DEVICE_DUMP_PATH,
  KEYCODE_APP_SWITCH,
  KEYCODE_BACK,
  KEYCODE_ENTER,
  KEYCODE_HOME,
  KEYCODE_MENU,
  LOCAL_SCREENSHOT_PATH,
  NAMED_KEYCODES,
  SWIPE_DURATION_MS,
} from "./constants.js";
import type { DeviceSession } from "./device.js";
import { EngineError, errorMessage } from "./errors.js";
import { seconds, sleep as defaultSleep, type Sleep } from "./timing.js";
import type { DispatchResult, ResolvedAction, ScreenSize, SystemButton } from "./types.js";

export interface ProcessResult {
  stdout: Buffer;
  stderr: string;
  status: number | null;
  error?: Error;
}

export type ProcessRunner = (command: string, args: string[]) => ProcessResult;

const spawnRunner: ProcessRunner = (command, args) => {
  const result = spawnSync(command, args, { maxBuffer: 64 * 1024 * 1024 });
  return {
    stdout: result.stdout ?? Buffer.alloc(0),
    stderr: result.stderr?.toString().trim() ?? "",
    status: result.status,
    error: result.error,
  };
};

export interface AdbDeviceOptions {
  adbPath?: string;
  /** Target device when more than one is attached. */
  serial?: string;
  /** Relaunched after a session restart. */
  appPackage?: string;
  screenshotPath?: string;
  retries?: number;
  /** Backoff base in seconds; doubles on every failed attempt. */
  retryDelayS?: number;
  runner?: ProcessRunner;
  sleep?: Sleep;
}

const BUTTON_KEYCODES: Record<SystemButton, string> = {
  back: KEYCODE_BACK,
  home: KEYCODE_HOME,
  recents: KEYCODE_APP_SWITCH,
  menu: KEYCODE_MENU,
  enter: KEYCODE_ENTER,
};

const SYSTEM_ALERT_FOCUS =
  /mCurrentFocus=.*(permissioncontroller|packageinstaller|Application Error|Application Not Responding|AlertDialog)/i;

/** Escapes text for `adb shell input text`. */
export function escapeInputText(text: string): string {
  return text
    .replaceAll("\\", "\\\\")
    .replaceAll('"', '\\"')
    .replaceAll("'", "\\'")
    .replaceAll(" ", "%s")
    .replaceAll("&", "\\&")
    .replaceAll("|", "\\|")
    .replaceAll(";", "\\;")
    .replaceAll("(", "\\(")
    .replaceAll(")", "\\)")
    .replaceAll("<", "\\<")
    .replaceAll(">", "\\>");
}

/** Keycode for a `key` action: numbers and KEYCODE_* pass through, names map, anything else is enter. */
export function keycodeFor(key: string): string {
  const trimmed = key.trim();
  if (/^\d+$/.test(trimmed) || /^KEYCODE_[A-Z0-9_]+$/.test(trimmed)) return trimmed;
  const name = trimmed.toLowerCase().replace(/[\s-]+/g, "_");
  return Object.hasOwn(NAMED_KEYCODES, name) ? NAMED_KEYCODES[name] : KEYCODE_ENTER;
}

/** `input` arguments for an action, or null for actions handled off-device. */
export function inputArgs(action: ResolvedAction): string[] | null {
  switch (action.kind) {
    case "click":
      return ["shell", "input", "tap", String(action.coordinate[0]), String(action.coordinate[1])];
    case "long_press": {
      const [x, y] = action.coordinate.map(String);
      return ["shell", "input", "swipe", x, y, x, y, String(seconds(action.time))];
    }
    case "swipe":
      return [
        "shell",
        "input",
        "swipe",
        ...action.coordinate.map(String),
        ...action.coordinate2.map(String),
        SWIPE_DURATION_MS,
      ];
    case "type":
      return ["shell", "input", "text", escapeInputText(action.text)];
    case "key":
      return ["shell", "input", "keyevent", keycodeFor(action.text)];
    case "system_button":
      return ["shell", "input", "keyevent", BUTTON_KEYCODES[action.button]];
    case "open":
      return ["shell", "monkey", "-p", action.text, "-c", "android.intent.category.LAUNCHER", "1"];
    case "wait":
    case "terminate":
      return null;
  }
}

export class AdbDevice implements DeviceSession {
  private readonly adbPath: string;
  private readonly serial: string;
  private readonly appPackage: string;
  private readonly screenshotPath: string;
  private readonly retries: number;
  private readonly retryDelayS: number;
  private readonly runner: ProcessRunner;
  private readonly sleep: Sleep;
  private cachedScreen: ScreenSize | null = null;

  constructor(options: AdbDeviceOptions = {}) {
    this.adbPath = options.adbPath ?? "adb";
    this.serial = options.serial ?? "";
    this.appPackage = options.appPackage ?? "";
    this.screenshotPath = options.screenshotPath ?? LOCAL_SCREENSHOT_PATH;
    this.retries = options.retries ?? DEFAULT_MAX_RETRIES;
    this.retryDelayS = options.retryDelayS ?? DEFAULT_RETRY_DELAY;
    this.runner = options.runner ?? spawnRunner;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Runs one adb command, retrying with exponential backoff while adb
   * reports an error on stderr.
   */
  async runAdbCommand(args: string[], retries = this.retries): Promise<ProcessResult> {
    const fullArgs = this.serial ? ["-s", this.serial, ...args] : args;
    let result: ProcessResult = { stdout: Buffer.alloc(0), stderr: "", status: null };

    for (let attempt = 0; attempt <= retries; attempt++) {
      result = this.runner(this.adbPath, fullArgs);
      if (result.error) {
        throw new EngineError("DEVICE_COMMAND", `Could not run ${this.adbPath}: ${result.error.message}`, { args }, result.error);
      }
      if (!result.stderr.toLowerCase().includes("error")) return result;
      if (attempt < retries) {
        const delay = seconds(this.retryDelayS * Math.pow(2, attempt));
        console.log(`[adb] Error (attempt ${attempt + 1}/${retries + 1}): ${result.stderr}`);
        await this.sleep(delay);
      }
    }
    console.log(`[adb] Error (all retries exhausted): ${result.stderr}`);
    return result;
  }

  private async shellText(args: string[]): Promise<string> {
    return (await this.runAdbCommand(args)).stdout.toString("utf-8").trim();
  }

  async snapshot(): Promise<string> {
    const dump = await this.shellText(["shell", "uiautomator", "dump", DEVICE_DUMP_PATH]);
    const xml = await this.shellText(["exec-out", "cat", DEVICE_DUMP_PATH]);
    if (!xml.includes("<hierarchy")) {
      throw new EngineError("DEVICE_SESSION", `uiautomator dump failed: ${dump || "empty output"}`);
    }
    return xml;
  }

  async screenshot(): Promise<string> {
    const result = await this.runAdbCommand(["exec-out", "screencap", "-p"]);
    if (result.stdout.length === 0) {
      throw new EngineError("DEVICE_COMMAND", `screencap returned no image: ${result.stderr || "empty output"}`);
    }
    writeFileSync(this.screenshotPath, result.stdout);
    return this.screenshotPath;
  }

  async screenSize(): Promise<ScreenSize> {
    if (this.cachedScreen) return { ...this.cachedScreen };
    const output = await this.shellText(["shell", "wm", "size"]);
    // Override size wins over the physical panel size
    const match = output.match(/Override size:\s*(\d+)x(\d+)/) ?? output.match(/Physical size:\s*(\d+)x(\d+)/);
    if (!match) throw new EngineError("DEVICE_COMMAND", `Could not read screen size from "${output}"`);
    this.cachedScreen = { width: parseInt(match[1], 10), height: parseInt(match[2], 10) };
    return { ...this.cachedScreen };
  }

  async dispatch(action: ResolvedAction): Promise<DispatchResult> {
    if (action.kind === "wait") {
      await this.sleep(seconds(action.time));
      return { status: "success", detail: `waited ${action.time}s` };
    }
    const args = inputArgs(action);
    if (!args) return { status: "failure", detail: `${action.kind} is not dispatchable` };

    try {
      const result = await this.runAdbCommand(args, 0);
      const output = `${result.stdout.toString("utf-8").trim()} ${result.stderr}`.trim();
      if (result.status !== 0 || /error|exception/i.test(result.stderr)) {
        return { status: "failure", detail: output || `adb exited with ${String(result.status)}` };
      }
      return { status: "success", detail: `${args.slice(1, 3).join(" ")} ok` };
    } catch (err) {
      return { status: "error", detail: errorMessage(err) };
    }
  }

  async restartSession(): Promise<void> {
    console.log("[adb] Restarting automation session");
    this.cachedScreen = null;
    // No uiautomator running is fine
    const killed = await this.runAdbCommand(["shell", "pkill", "-f", "uiautomator"], 0);
    if (killed.status !== 0) console.log("[adb] No uiautomator process to stop");
    await this.runAdbCommand(["wait-for-device"]);
    if (this.appPackage) {
      await this.runAdbCommand(["shell", "monkey", "-p", this.appPackage, "-c", "android.intent.category.LAUNCHER", "1"]);
    }
  }

  async hasSystemAlert(): Promise<boolean> {
    const output = await this.shellText(["shell", "dumpsys", "window"]);
    return SYSTEM_ALERT_FOCUS.test(output);
  }
}
