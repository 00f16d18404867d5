import test from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";

import { AdbDevice, escapeInputText, inputArgs, keycodeFor, type AdbDeviceOptions, type ProcessRunner } from "../adb-device.js";
import { isEngineError } from "../errors.js";
import { recordingSleep } from "./fakes.js";

interface Reply {
  stdout?: string;
  stderr?: string;
  status?: number | null;
  error?: Error;
}

function scriptedAdb(respond: (args: string[]) => Reply = () => ({}), options: AdbDeviceOptions = {}) {
  const calls: Array<{ command: string; args: string[] }> = [];
  const runner: ProcessRunner = (command, args) => {
    calls.push({ command, args });
    const reply = respond(args);
    return {
      stdout: Buffer.from(reply.stdout ?? ""),
      stderr: reply.stderr ?? "",
      status: reply.status === undefined ? 0 : reply.status,
      error: reply.error,
    };
  };
  const { sleep, calls: sleeps } = recordingSleep();
  const device = new AdbDevice({ runner, sleep, ...options });
  return { device, calls, sleeps };
}

const argsOf = (calls: Array<{ args: string[] }>) => calls.map((c) => c.args);

// ===========================================
// Input arguments
// ===========================================

test("actions map to adb input commands", () => {
  assert.deepEqual(inputArgs({ kind: "long_press", coordinate: [5, 6], time: 1 }), [
    "shell", "input", "swipe", "5", "6", "5", "6", "1000",
  ]);
  assert.deepEqual(inputArgs({ kind: "swipe", coordinate: [540, 1281], coordinate2: [540, 321] }), [
    "shell", "input", "swipe", "540", "1281", "540", "321", "300",
  ]);
  assert.deepEqual(inputArgs({ kind: "system_button", button: "back" }), ["shell", "input", "keyevent", "4"]);
  assert.deepEqual(inputArgs({ kind: "open", text: "com.example.feed" }), [
    "shell", "monkey", "-p", "com.example.feed", "-c", "android.intent.category.LAUNCHER", "1",
  ]);
  assert.equal(inputArgs({ kind: "wait", time: 1 }), null);
});

test("typed text is escaped for the shell", () => {
  assert.equal(escapeInputText("hi there & co"), "hi%sthere%s\\&%sco");
  assert.equal(escapeInputText(`it's (ok)`), "it\\'s%s\\(ok\\)");
});

test("key names resolve to keycodes", () => {
  assert.equal(keycodeFor("67"), "67");
  assert.equal(keycodeFor("KEYCODE_DEL"), "KEYCODE_DEL");
  assert.equal(keycodeFor("Volume Up"), "24");
  assert.equal(keycodeFor("backspace"), "67");
  assert.equal(keycodeFor("back"), "66");
  assert.equal(keycodeFor("constructor"), "66");
});

// ===========================================
// Dispatch
// ===========================================

test("taps go to the selected device", async () => {
  const { device, calls } = scriptedAdb(undefined, { adbPath: "/opt/adb", serial: "emulator-5554" });

  const result = await device.dispatch({ kind: "click", coordinate: [10, 20] });

  assert.deepEqual(result, { status: "success", detail: "input tap ok" });
  assert.deepEqual(calls, [
    { command: "/opt/adb", args: ["-s", "emulator-5554", "shell", "input", "tap", "10", "20"] },
  ]);
});

test("wait and terminate never reach adb", async () => {
  const { device, calls, sleeps } = scriptedAdb();

  assert.deepEqual(await device.dispatch({ kind: "wait", time: 1.5 }), { status: "success", detail: "waited 1.5s" });
  assert.deepEqual(await device.dispatch({ kind: "terminate", status: "success" }), {
    status: "failure",
    detail: "terminate is not dispatchable",
  });
  assert.deepEqual(sleeps, [1500]);
  assert.equal(calls.length, 0);
});

test("a failing input command is reported without retrying", async () => {
  const exitCode = scriptedAdb(() => ({ status: 1 }));
  assert.deepEqual(await exitCode.device.dispatch({ kind: "type", text: "hi" }), {
    status: "failure",
    detail: "adb exited with 1",
  });

  const exception = scriptedAdb(() => ({ stderr: "Exception occurred while executing 'tap'" }));
  assert.deepEqual(await exception.device.dispatch({ kind: "click", coordinate: [1, 1] }), {
    status: "failure",
    detail: "Exception occurred while executing 'tap'",
  });

  const adbError = scriptedAdb(() => ({ stderr: "error: device offline", status: 1 }));
  await adbError.device.dispatch({ kind: "click", coordinate: [1, 1] });
  assert.equal(adbError.calls.length, 1);
  assert.deepEqual(adbError.sleeps, []);
});

test("a missing adb binary is an error result", async () => {
  const { device } = scriptedAdb(() => ({ error: new Error("spawn adb ENOENT") }));
  assert.deepEqual(await device.dispatch({ kind: "click", coordinate: [1, 1] }), {
    status: "error",
    detail: "Could not run adb: spawn adb ENOENT",
  });
});

// ===========================================
// Command retries
// ===========================================

test("adb errors are retried with doubling delays", async () => {
  const { device, calls, sleeps } = scriptedAdb(() => ({ stderr: "error: device offline" }), {
    retries: 2,
    retryDelayS: 1,
  });

  const result = await device.runAdbCommand(["devices"]);

  assert.equal(result.stderr, "error: device offline");
  assert.equal(calls.length, 3);
  assert.deepEqual(sleeps, [1000, 2000]);
});

test("a command that recovers stops retrying", async () => {
  let attempts = 0;
  const { device, calls, sleeps } = scriptedAdb(() => {
    attempts++;
    return attempts === 1 ? { stderr: "error: closed" } : { stdout: "List of devices attached" };
  });

  const result = await device.runAdbCommand(["devices"]);

  assert.equal(result.stdout.toString(), "List of devices attached");
  assert.equal(calls.length, 2);
  assert.deepEqual(sleeps, [1500]);
});

// ===========================================
// Perception
// ===========================================

test("snapshots dump the hierarchy and read it back", async () => {
  const xml = '<?xml version="1.0" encoding="UTF-8"?><hierarchy rotation="0"></hierarchy>';
  const { device, calls } = scriptedAdb((args) =>
    args[0] === "exec-out" ? { stdout: xml } : { stdout: "UI hierchary dumped to: /sdcard/window_dump.xml" },
  );

  assert.equal(await device.snapshot(), xml);
  assert.deepEqual(argsOf(calls), [
    ["shell", "uiautomator", "dump", "/sdcard/window_dump.xml"],
    ["exec-out", "cat", "/sdcard/window_dump.xml"],
  ]);
});

test("a dump without a hierarchy is a session fault", async () => {
  const { device } = scriptedAdb((args) =>
    args[0] === "exec-out" ? {} : { stdout: "ERROR: null root node returned by UiTestAutomationBridge." },
  );

  await assert.rejects(
    device.snapshot(),
    (err) =>
      isEngineError(err, "DEVICE_SESSION") &&
      err.message === "uiautomator dump failed: ERROR: null root node returned by UiTestAutomationBridge.",
  );
});

test("screenshots are written to the configured path", async () => {
  const dir = mkdtempSync(join(tmpdir(), "adb-device-"));
  try {
    const path = join(dir, "screen.png");
    const { device } = scriptedAdb(() => ({ stdout: "PNGDATA" }), { screenshotPath: path });
    assert.equal(await device.screenshot(), path);
    assert.equal(readFileSync(path, "utf-8"), "PNGDATA");

    const empty = scriptedAdb(() => ({}), { screenshotPath: path });
    await assert.rejects(empty.device.screenshot(), (err) => isEngineError(err, "DEVICE_COMMAND"));
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

test("the override size wins and is cached", async () => {
  const { device, calls } = scriptedAdb(() => ({ stdout: "Physical size: 1080x2400\nOverride size: 720x1600" }));

  assert.deepEqual(await device.screenSize(), { width: 720, height: 1600 });
  assert.deepEqual(await device.screenSize(), { width: 720, height: 1600 });
  assert.equal(calls.length, 1);

  const physical = scriptedAdb(() => ({ stdout: "Physical size: 1080x2400" }));
  assert.deepEqual(await physical.device.screenSize(), { width: 1080, height: 2400 });

  const garbage = scriptedAdb(() => ({ stdout: "no display" }));
  await assert.rejects(garbage.device.screenSize(), (err) => isEngineError(err, "DEVICE_COMMAND"));
});

test("system alerts are read from the focused window", async () => {
  const permission = scriptedAdb(() => ({
    stdout: "  mCurrentFocus=Window{4f1 u0 com.google.android.permissioncontroller/.GrantPermissionsActivity}",
  }));
  assert.equal(await permission.device.hasSystemAlert(), true);

  const app = scriptedAdb(() => ({ stdout: "  mCurrentFocus=Window{4f1 u0 com.example.feed/.MainActivity}" }));
  assert.equal(await app.device.hasSystemAlert(), false);
});

// ===========================================
// Session restart
// ===========================================

test("a restart stops uiautomator, waits for the device and relaunches the app", async () => {
  const { device, calls } = scriptedAdb(
    (args) => (args[1] === "pkill" ? { status: 1 } : { stdout: "Physical size: 1080x1920" }),
    { appPackage: "com.example.feed" },
  );

  await device.screenSize();
  await device.restartSession();
  await device.screenSize();

  assert.deepEqual(argsOf(calls), [
    ["shell", "wm", "size"],
    ["shell", "pkill", "-f", "uiautomator"],
    ["wait-for-device"],
    ["shell", "monkey", "-p", "com.example.feed", "-c", "android.intent.category.LAUNCHER", "1"],
    ["shell", "wm", "size"],
  ]);
});
