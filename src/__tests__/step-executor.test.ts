import test from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { setTimeout as delay } from "timers/promises";
import { z } from "zod";

import { createEngine } from "../engine.js";
import { expectedHintFor } from "../step-executor.js";
import type { DispatchResult, ExecutorStep, ResolvedAction } from "../types.js";
import {
  COMMENT_BUTTON,
  FakeDevice,
  FakeOracle,
  LIKE_BUTTON,
  hierarchy,
  recordingSleep,
  verdict,
} from "./fakes.js";

const GOAL = "Leave a comment on the first video";

const openComments: ExecutorStep = {
  stepId: 1,
  description: "Open the comments",
  actionType: "click",
  query: "comment_button",
  alternativeActions: [],
};

const feed = hierarchy(LIKE_BUTTON, COMMENT_BUTTON);

const promo = hierarchy(
  COMMENT_BUTTON,
  { bounds: "[90,400][990,1500]", cls: "android.widget.LinearLayout", desc: "Sponsored offer", clickable: true },
  { bounds: "[900,420][980,500]", text: "Close", clickable: true },
);

function setup(snapshots: string | string[] = feed) {
  const device = new FakeDevice(snapshots);
  const oracle = new FakeOracle();
  const { sleep, calls } = recordingSleep();
  const { executor } = createEngine({ device, oracle, sleep });
  return { device, oracle, executor, sleeps: calls };
}

test("a matching element is tapped and verified in one cycle", async () => {
  const { device, oracle, executor, sleeps } = setup();
  oracle.verdicts = [verdict(false, "REDO_STEP", "comments closed"), verdict(true, "NONE", "Comments visible")];

  const outcome = await executor.runStep(GOAL, openComments);

  assert.deepEqual(outcome, {
    success: true,
    cycles: 1,
    reason: "Comments visible",
    notes: ['Cycle 1: click "comment_button" -> success (ok)', "Succeeded: Comments visible"],
    recoveries: [],
  });
  assert.deepEqual(device.dispatched, [{ kind: "click", coordinate: [1020, 1240] }]);
  assert.equal(oracle.proposeCalls.length, 0);
  assert.deepEqual(sleeps, [200]);

  const [precheck, evaluation] = oracle.evaluateCalls;
  assert.equal(precheck.lastAction, "");
  assert.equal(precheck.screenshotPath, "shot-1.png");
  assert.equal(evaluation.lastAction, 'click "comment_button" (success)');
  assert.equal(evaluation.screenshotPath, "shot-2.png");
  assert.equal(evaluation.expectedHint, "Comment UI visible (input field or comments list present)");
});

test("executeStepWithGuard uses the caller's screenshot for the first look", async () => {
  const { device, oracle, executor } = setup();
  oracle.verdicts = [verdict(false, "REDO_STEP", "comments closed"), verdict(true, "NONE", "Comments visible")];

  assert.equal(await executor.executeStepWithGuard(GOAL, openComments, "seed.png", 3), true);
  assert.equal(oracle.evaluateCalls[0].screenshotPath, "seed.png");
  assert.equal(device.screenshotCalls, 1);
});

test("an abort verdict ends the step after one cycle and one dispatch", async () => {
  const { device, oracle, executor } = setup();
  oracle.verdicts = [verdict(false, "REDO_STEP", "comments closed"), verdict(false, "ABORT", "Account is suspended")];

  const outcome = await executor.runStep(GOAL, openComments);

  assert.equal(outcome.success, false);
  assert.equal(outcome.cycles, 1);
  assert.equal(outcome.reason, "Account is suspended");
  assert.deepEqual(outcome.recoveries, []);
  assert.equal(device.dispatched.length, 1);
});

test("an already satisfied step dispatches nothing", async () => {
  const { device, oracle, executor } = setup();
  oracle.verdicts = [verdict(true, "NONE", "Already on comments")];

  const outcome = await executor.runStep(GOAL, openComments);

  assert.equal(outcome.success, true);
  assert.equal(outcome.cycles, 0);
  assert.equal(outcome.reason, "Already satisfied: Already on comments");
  assert.equal(device.dispatched.length, 0);
});

test("the step gives up once the cycle budget is spent", async () => {
  const { device, oracle, executor } = setup();
  oracle.verdicts = [verdict(false, "REDO_STEP", "still closed")];

  const outcome = await executor.runStep(GOAL, openComments, { maxCycles: 3 });

  assert.equal(outcome.success, false);
  assert.equal(outcome.cycles, 3);
  assert.equal(outcome.reason, "Not verified after 3 cycle(s): still closed");
  assert.deepEqual(outcome.recoveries, ["REDO_STEP", "REDO_STEP"]);
  assert.equal(device.dispatched.length, 3);
  assert.equal(oracle.evaluateCalls.length, 6);
});

test("a cycle budget below one still runs one cycle", async () => {
  const { oracle, executor } = setup();
  oracle.verdicts = [verdict(false, "REDO_STEP", "still closed")];

  const outcome = await executor.runStep(GOAL, openComments, { maxCycles: 0 });

  assert.equal(outcome.cycles, 1);
  assert.equal(outcome.reason, "Not verified after 1 cycle(s): still closed");
});

// ===========================================
// Recovery
// ===========================================

test("a permission request is granted through the allow button", async () => {
  const allowScreen = hierarchy(
    LIKE_BUTTON,
    COMMENT_BUTTON,
    { bounds: "[700,1700][1000,1800]", cls: "android.widget.Button", text: "Allow", clickable: true },
  );
  const { device, oracle, executor, sleeps } = setup(allowScreen);
  oracle.verdicts = [
    verdict(false, "REDO_STEP", "comments closed"),
    verdict(false, "GRANT_PERMISSION", "needs permission"),
    verdict(true, "NONE", "granted"),
  ];

  const outcome = await executor.runStep(GOAL, openComments);

  assert.equal(outcome.success, true);
  assert.equal(outcome.cycles, 1);
  assert.equal(outcome.reason, "Already satisfied: granted");
  assert.deepEqual(outcome.recoveries, ["GRANT_PERMISSION"]);
  assert.deepEqual(device.clicks(), [
    [1020, 1240],
    [850, 1750],
  ]);
  assert.deepEqual(sleeps, [200, 300]);
});

test("a permission request without an allow button fails the step", async () => {
  const { oracle, executor } = setup();
  oracle.verdicts = [verdict(false, "REDO_STEP", "comments closed"), verdict(false, "GRANT_PERMISSION", "needs permission")];

  const outcome = await executor.runStep(GOAL, openComments);

  assert.equal(outcome.success, false);
  assert.equal(outcome.reason, "Could not grant permission: needs permission");
  assert.ok(outcome.notes.includes("No allow button on screen"));
});

test("replanning hands the next attempt to the oracle", async () => {
  const { device, oracle, executor } = setup();
  oracle.verdicts = [
    verdict(false, "REDO_STEP", "comments closed"),
    verdict(false, "REPLAN", "wrong screen"),
    verdict(false, "REDO_STEP", "comments closed"),
    verdict(true, "NONE", "scrolled"),
  ];
  oracle.proposals = [{ action: "scroll", direction: "down" }];

  const outcome = await executor.runStep(GOAL, openComments);

  assert.equal(outcome.success, true);
  assert.equal(outcome.cycles, 2);
  assert.deepEqual(outcome.recoveries, ["REPLAN"]);
  assert.equal(oracle.proposeCalls.length, 1);
  assert.deepEqual(device.dispatched, [
    { kind: "click", coordinate: [1020, 1240] },
    { kind: "swipe", coordinate: [540, 1281], coordinate2: [540, 321] },
  ]);
});

test("an interruption is cleared by the guard before the next cycle", async () => {
  const { device, oracle, executor } = setup([promo, promo, feed]);
  oracle.verdicts = [
    verdict(false, "REDO_STEP", "comments closed"),
    verdict(false, "HANDLE_INTERRUPT", "promo in the way"),
    verdict(true, "NONE", "comments open"),
  ];
  oracle.decisions = [{ decision: "DISMISS", rationale: "promo", actions: ["Close"] }];

  const outcome = await executor.runStep(GOAL, openComments);

  assert.equal(outcome.success, true);
  assert.equal(outcome.reason, "Already satisfied: comments open");
  assert.deepEqual(outcome.recoveries, ["HANDLE_INTERRUPT"]);
  assert.deepEqual(device.clicks(), [
    [1020, 1240],
    [940, 460],
  ]);
});

test("a stubborn interruption with no suggestions falls back to corner taps", async () => {
  const { device, oracle, executor, sleeps } = setup([promo, promo, promo, feed]);
  oracle.verdicts = [
    verdict(false, "REDO_STEP", "comments closed"),
    verdict(false, "HANDLE_INTERRUPT", "promo in the way"),
    verdict(true, "NONE", "clear"),
  ];
  oracle.decisions = [{ decision: "DISMISS", rationale: "promo", actions: [] }];

  const outcome = await executor.runStep(GOAL, openComments);

  assert.equal(outcome.success, true);
  assert.deepEqual(device.clicks(), [
    [1020, 1240],
    [940, 460],
    [1048, 58],
  ]);
  assert.deepEqual(sleeps, [200, 800, 250]);
  assert.equal(oracle.proposeCalls.length, 0);
  assert.ok(outcome.notes.includes("Corner tap (1048, 58) -> success"));
});

test("a stubborn interruption runs the evaluator's suggestions instead of corner taps", async () => {
  const { device, oracle, executor, sleeps } = setup([promo, promo, promo, promo, feed]);
  oracle.verdicts = [
    verdict(false, "REDO_STEP", "comments closed"),
    verdict(false, "HANDLE_INTERRUPT", "promo in the way", ["Close", " "]),
    verdict(true, "NONE", "clear"),
  ];
  oracle.decisions = [{ decision: "DISMISS", rationale: "promo", actions: [] }];

  const outcome = await executor.runStep(GOAL, openComments);

  assert.equal(outcome.success, true);
  assert.deepEqual(device.clicks(), [
    [1020, 1240],
    [940, 460],
    [940, 460],
  ]);
  assert.deepEqual(sleeps, [200, 800, 250, 0, 250]);
  assert.equal(oracle.proposeCalls[0].intent, "close ad");
  assert.ok(outcome.notes.includes('Suggestion "Close" -> success'));
  assert.ok(outcome.notes.includes('Suggestion "close ad" -> success'));
  assert.equal(
    outcome.notes.some((note) => note.startsWith("Corner tap")),
    false,
  );
});

test("authentication walls run the sign-in suggestion", async () => {
  const signIn = hierarchy(COMMENT_BUTTON, { bounds: "[100,1600][980,1700]", text: "Sign in", clickable: true });
  const { device, oracle, executor } = setup(signIn);
  oracle.verdicts = [
    verdict(false, "REDO_STEP", "comments closed"),
    verdict(false, "REQUIRE_AUTH", "login required"),
    verdict(true, "NONE", "signed in"),
  ];

  const outcome = await executor.runStep(GOAL, openComments);

  assert.equal(outcome.success, true);
  assert.deepEqual(device.clicks(), [
    [1020, 1240],
    [540, 1650],
  ]);
});

test("a camera prompt dialog is detected and granted through the allow selectors", async () => {
  const cameraPrompt = hierarchy({ bounds: "[0,288][1080,1632]", cls: "android.app.Dialog", text: "Allow camera access" });
  const device = new FakeDevice(cameraPrompt);
  const oracle = new FakeOracle();
  const { sleep, calls: sleeps } = recordingSleep();
  const { guard, executor } = createEngine({ device, oracle, sleep });
  oracle.verdicts = [
    verdict(false, "REDO_STEP", "camera closed"),
    verdict(false, "GRANT_PERMISSION", "camera permission requested"),
    verdict(true, "NONE", "camera open"),
  ];

  const interruption = await guard.detect(cameraPrompt, device.screen);
  assert.equal(interruption.present, true);
  assert.equal(interruption.kind, "permission");

  const outcome = await executor.runStep(GOAL, {
    stepId: 2,
    description: "Open the camera",
    actionType: "click",
    query: "camera_button",
    alternativeActions: [],
  });

  assert.equal(outcome.success, true);
  assert.equal(outcome.reason, "Already satisfied: camera open");
  assert.deepEqual(outcome.recoveries, ["GRANT_PERMISSION"]);
  assert.deepEqual(device.clicks(), [[540, 960]]);
  assert.ok(outcome.notes.includes('Allow tap on "Allow camera access" -> success'));
  assert.deepEqual(sleeps, [0, 200, 300]);
});

// ===========================================
// Alternatives
// ===========================================

test("alternatives are tried in order after a failed dispatch", async () => {
  const { device, oracle, executor } = setup();
  oracle.verdicts = [verdict(false, "REDO_STEP", "comments closed"), verdict(true, "NONE", "Comments visible")];
  oracle.proposals = [new Error("no idea"), new Error("no idea")];

  const outcome = await executor.runStep(GOAL, {
    ...openComments,
    query: "reply_button",
    alternativeActions: ["Reply", "comment_button", "Like"],
  });

  assert.equal(outcome.success, true);
  assert.deepEqual(outcome.notes, [
    'Cycle 1: click "reply_button" -> error (Action proposal failed: no idea)',
    'Alternative "Reply" -> error (Action proposal failed: no idea)',
    'Alternative "comment_button" -> success (ok)',
    "Succeeded: Comments visible",
  ]);
  assert.deepEqual(device.dispatched, [{ kind: "click", coordinate: [1020, 1240] }]);
  assert.equal(oracle.evaluateCalls[1].lastAction, 'click "reply_button" (success)');
});

// ===========================================
// Step logs
// ===========================================

class SlowDevice extends FakeDevice {
  async dispatch(action: ResolvedAction): Promise<DispatchResult> {
    await delay(25);
    return super.dispatch(action);
  }
}

const savedLog = z.object({
  entries: z.array(
    z.object({
      phase: z.string(),
      actionLatencyMs: z.number(),
      recovery: z.object({ kind: z.string(), resolved: z.boolean() }).optional(),
    }),
  ),
});

test("step logs carry the dispatch latency and the recovery outcome", async () => {
  const dir = mkdtempSync(join(tmpdir(), "step-executor-"));
  try {
    const device = new SlowDevice([promo, promo, feed]);
    const oracle = new FakeOracle();
    const { executor } = createEngine({ device, oracle, sleep: recordingSleep().sleep, logDir: dir });
    oracle.verdicts = [
      verdict(false, "REDO_STEP", "comments closed"),
      verdict(false, "HANDLE_INTERRUPT", "promo in the way"),
      verdict(true, "NONE", "comments open"),
    ];
    oracle.decisions = [{ decision: "DISMISS", rationale: "promo", actions: ["Close"] }];

    assert.equal(await executor.executeStepWithGuard(GOAL, openComments), true);

    const [file] = readdirSync(dir).filter((name) => !name.endsWith(".partial.json"));
    const { entries } = savedLog.parse(JSON.parse(readFileSync(join(dir, file), "utf-8")));
    assert.deepEqual(
      entries.map((e) => e.phase),
      ["precheck", "evaluate", "precheck"],
    );
    assert.equal(entries[0].recovery, undefined);
    assert.deepEqual(entries[1].recovery, { kind: "HANDLE_INTERRUPT", resolved: true });
    assert.ok(entries[1].actionLatencyMs >= 20);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

test("an unusable log dir does not change the step's outcome", async () => {
  const dir = mkdtempSync(join(tmpdir(), "step-executor-"));
  try {
    writeFileSync(join(dir, "file"), "not a directory");
    const device = new FakeDevice(feed);
    const oracle = new FakeOracle();
    const { executor } = createEngine({ device, oracle, sleep: recordingSleep().sleep, logDir: join(dir, "file", "logs") });
    oracle.verdicts = [verdict(false, "REDO_STEP", "comments closed"), verdict(true, "NONE", "Comments visible")];

    assert.equal(await executor.executeStepWithGuard(GOAL, openComments), true);
    assert.deepEqual(readdirSync(dir), ["file"]);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

// ===========================================
// Session faults
// ===========================================

test("a transient session fault restarts the session once", async () => {
  const { device, oracle, executor, sleeps } = setup();
  device.snapshotErrors = [new Error("ERROR: could not get idle state (uiautomator)")];
  oracle.verdicts = [verdict(true, "NONE", "done")];

  const outcome = await executor.runStep(GOAL, openComments);

  assert.equal(outcome.success, true);
  assert.equal(device.restarts, 1);
  assert.deepEqual(sleeps, [1000]);
  assert.equal(outcome.notes[0], "Session fault, restarting: ERROR: could not get idle state (uiautomator)");
});

test("other faults end the step without throwing", async () => {
  const { device, executor } = setup();
  device.snapshotErrors = [new Error("disk full")];

  const outcome = await executor.runStep(GOAL, openComments);

  assert.deepEqual(outcome, {
    success: false,
    cycles: 0,
    reason: "Step failed with error: disk full",
    notes: ["Failed: Step failed with error: disk full"],
    recoveries: [],
  });
  assert.equal(device.restarts, 0);
});

test("a fault that survives the restart fails the step", async () => {
  const { device, executor } = setup();
  device.snapshotErrors = [
    new Error("instrumentation process is not running"),
    new Error("instrumentation process is not running"),
  ];

  const outcome = await executor.runStep(GOAL, openComments);

  assert.equal(outcome.success, false);
  assert.equal(outcome.reason, "Step failed with error: instrumentation process is not running");
  assert.equal(device.restarts, 1);
});

test("expectedHintFor prefers the step's own expectation", () => {
  assert.equal(expectedHintFor({ ...openComments, expectedState: "Sheet open" }), "Sheet open");
  assert.equal(
    expectedHintFor({ ...openComments, description: "Scroll the feed", actionType: "swipe" }),
    "Content position changed in scrollable region",
  );
  assert.equal(
    expectedHintFor({ ...openComments, description: "Like the video", actionType: "tap" }),
    "Target element reflects clicked state or expected screen appears",
  );
});
