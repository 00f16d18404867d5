export * from "./types.js";
export { EngineError, isEngineError, errorMessage, type EngineErrorCode } from "./errors.js";
export {
  DEFAULT_TUNING,
  loadTuningFile,
  resolveTuning,
  tuningSchema,
  type EngineTuning,
  type TuningInput,
  type Selector,
} from "./tuning.js";
export {
  parseBounds,
  parseSnapshot,
  centerOf,
  boundsArea,
  isPointInside,
  findBySelector,
  findRelevantNodes,
  type NodeSelector,
} from "./snapshot-parser.js";
export {
  smartResize,
  modelSpaceFor,
  normalizePoint,
  snapToTappable,
  buildClickBox,
  directionalSwipe,
  type ScrollDirection,
} from "./coordinates.js";
export {
  normalizeActionName,
  normalizeButtonName,
  isBlockedAction,
  similarityRatio,
} from "./action-normalizer.js";
export { ActionDispatcher, describeAction, type Resolution, type DispatcherDeps } from "./dispatcher.js";
export {
  InterruptionGuard,
  findOverlayCandidates,
  classifyNode,
  nodeCoverage,
  type InterruptionContext,
} from "./interruptions.js";
export { StepExecutor, expectedHintFor, type RunStepOptions } from "./step-executor.js";
export type { DeviceSession } from "./device.js";
export { AdbDevice, type AdbDeviceOptions, type ProcessRunner } from "./adb-device.js";
export { LlmOracle, type Oracle } from "./oracle.js";
export { getLlmProvider, type LLMProvider, type ChatMessage } from "./llm-providers.js";
export { createEngine, type Engine, type EngineOptions } from "./engine.js";
export {
  loadScenario,
  parseScenario,
  runScenario,
  type Scenario,
  type ScenarioResult,
  type RunScenarioOptions,
} from "./scenario.js";
export { sleep, type Sleep, type RandomSource } from "./timing.js";
