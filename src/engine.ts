import type { DeviceSession } from "./device.js";
import { ActionDispatcher } from "./dispatcher.js";
import { InterruptionGuard } from "./interruptions.js";
import type { Oracle } from "./oracle.js";
import { StepExecutor } from "./step-executor.js";
import { sleep as defaultSleep, type RandomSource, type Sleep } from "./timing.js";
import { DEFAULT_TUNING, type EngineTuning } from "./tuning.js";

export interface EngineOptions {
  device: DeviceSession;
  oracle: Oracle;
  tuning?: EngineTuning;
  sleep?: Sleep;
  random?: RandomSource;
  logDir?: string;
}

export interface Engine {
  dispatcher: ActionDispatcher;
  guard: InterruptionGuard;
  executor: StepExecutor;
}

/** Wires the dispatcher, guard and executor around one device session. */
export function createEngine(options: EngineOptions): Engine {
  const { device, oracle } = options;
  const tuning = options.tuning ?? DEFAULT_TUNING;
  const sleep = options.sleep ?? defaultSleep;

  const dispatcher = new ActionDispatcher({ device, oracle, tuning, sleep, random: options.random });
  const guard = new InterruptionGuard({ device, oracle, dispatcher, tuning, sleep });
  const executor = new StepExecutor({ device, oracle, dispatcher, guard, tuning, sleep, logDir: options.logDir });

  return { dispatcher, guard, executor };
}
