#!/usr/bin/env node
/**
 * stepguard command line.
 *
 * Runs a scenario file step by step on the attached device, recovering from
 * interruptions along the way.
 *
 * Usage:
 *     stepguard --scenario scenarios/post-comment.json [--max-cycles 5] [--continue-on-failure]
 */

import { realpathSync } from "fs";
import { fileURLToPath } from "url";
import { parseArgs } from "util";

import { AdbDevice } from "./adb-device.js";
import { Config } from "./config.js";
import { createEngine } from "./engine.js";
import { errorMessage } from "./errors.js";
import { getLlmProvider } from "./llm-providers.js";
import { LlmOracle } from "./oracle.js";
import { loadScenario, runScenario } from "./scenario.js";
import { DEFAULT_TUNING, loadTuningFile } from "./tuning.js";

const USAGE = "Usage: stepguard --scenario <file.json> [--max-cycles <n>] [--continue-on-failure]";

export interface CliOptions {
  scenario: string;
  maxCycles?: number;
  continueOnFailure: boolean;
}

function readArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      scenario: { type: "string", short: "s" },
      "max-cycles": { type: "string" },
      "continue-on-failure": { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    strict: true,
  }).values;
}

/** Returns the options, or a message explaining what is wrong with the arguments. */
export function parseCliArgs(argv: string[]): CliOptions | string {
  let values: ReturnType<typeof readArgs>;
  try {
    values = readArgs(argv);
  } catch (err) {
    return `${errorMessage(err)}\n${USAGE}`;
  }

  if (values.help === true) return USAGE;
  if (!values.scenario) return `Error: --scenario requires a JSON file path.\n${USAGE}`;

  let maxCycles: number | undefined;
  if (values["max-cycles"] !== undefined) {
    maxCycles = Number(values["max-cycles"]);
    if (!Number.isInteger(maxCycles) || maxCycles < 1) {
      return `Error: --max-cycles must be a positive integer, got "${values["max-cycles"]}".`;
    }
  }

  return {
    scenario: values.scenario,
    maxCycles,
    continueOnFailure: values["continue-on-failure"] === true,
  };
}

// ===========================================
// Entry Point
// ===========================================

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const options = parseCliArgs(argv);
  if (typeof options === "string") {
    console.log(options);
    return options === USAGE ? 0 : 1;
  }

  try {
    Config.validate();
  } catch (err) {
    console.log(`Configuration Error: ${errorMessage(err)}`);
    return 1;
  }

  try {
    const scenario = loadScenario(options.scenario);
    const tuning = Config.TUNING_FILE ? loadTuningFile(Config.TUNING_FILE) : DEFAULT_TUNING;
    const device = new AdbDevice({
      adbPath: Config.ADB_PATH,
      serial: Config.DEVICE_SERIAL,
      appPackage: Config.APP_PACKAGE,
      screenshotPath: Config.SCREENSHOT_PATH,
      retries: Config.MAX_RETRIES,
      retryDelayS: Config.RETRY_DELAY,
    });
    const provider = getLlmProvider(Config);
    console.log(`LLM: ${provider.name} (${provider.model})`);

    const { executor } = createEngine({
      device,
      oracle: new LlmOracle(provider),
      tuning,
      logDir: Config.LOG_DIR,
    });
    const result = await runScenario(executor, scenario, {
      continueOnFailure: options.continueOnFailure,
      maxCycles: options.maxCycles ?? scenario.maxCycles ?? Config.MAX_CYCLES,
    });

    console.log(`\n=== Scenario "${result.name}" ===`);
    for (const step of result.steps) {
      const status = step.success ? "OK" : "FAILED";
      console.log(`  [${status}] ${step.stepId}. ${step.description} (${step.cycles} cycles): ${step.reason}`);
    }
    const skipped = scenario.steps.length - result.steps.length;
    if (skipped > 0) console.log(`  ${skipped} step(s) not run`);
    console.log(`\nResult: ${result.success ? "All steps completed" : "Some steps failed"}`);
    return result.success ? 0 : 1;
  } catch (err) {
    console.log(`Error: ${errorMessage(err)}`);
    return 1;
  }
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return realpathSync(script) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      console.log(`Fatal: ${errorMessage(err)}`);
      process.exitCode = 1;
    });
}
