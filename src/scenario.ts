/**
 * Scenario runner.
 *
 * Executes a planned list of steps in order against one step executor.
 * Usage:
 *   stepguard --scenario scenarios/post-comment.json
 */

import { readFileSync } from "fs";
import { z } from "zod";

import { EngineError, errorMessage } from "./errors.js";
import type { StepExecutor } from "./step-executor.js";
import type { ExecutorStep } from "./types.js";

// ===========================================
// Types
// ===========================================

const scenarioStepSchema = z.object({
  stepId: z.number().int().optional(),
  description: z.string().min(1),
  actionType: z.string().default("click"),
  /** Intent handed to the dispatcher; the description when left out. */
  query: z.string().optional(),
  alternativeActions: z.array(z.string()).default([]),
  expectedState: z.string().optional(),
  maxCycles: z.number().int().min(1).optional(),
});

export const scenarioSchema = z.object({
  name: z.string().default("scenario"),
  goal: z.string().min(1),
  maxCycles: z.number().int().min(1).optional(),
  steps: z.array(scenarioStepSchema).min(1),
});

export type Scenario = z.infer<typeof scenarioSchema>;
export type ScenarioStep = z.infer<typeof scenarioStepSchema>;

export interface ScenarioStepResult {
  stepId: number;
  description: string;
  success: boolean;
  cycles: number;
  reason: string;
}

export interface ScenarioResult {
  name: string;
  goal: string;
  steps: ScenarioStepResult[];
  success: boolean;
}

export interface RunScenarioOptions {
  /** Keep going after a failed step instead of stopping. */
  continueOnFailure?: boolean;
  /** Cycle budget for steps that set none of their own. */
  maxCycles?: number;
}

export type StepRunner = Pick<StepExecutor, "runStep">;

// ===========================================
// Loading
// ===========================================

export function parseScenario(raw: unknown): Scenario {
  const result = scenarioSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new EngineError("SCENARIO", `Invalid scenario: ${issues}`);
  }
  return result.data;
}

export function loadScenario(path: string): Scenario {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new EngineError("SCENARIO", `Could not read scenario ${path}: ${errorMessage(err)}`, { path }, err);
  }
  return parseScenario(raw);
}

export function toExecutorStep(step: ScenarioStep, position: number): ExecutorStep {
  return {
    stepId: step.stepId ?? position + 1,
    description: step.description,
    actionType: step.actionType,
    query: step.query ?? step.description,
    alternativeActions: step.alternativeActions,
    expectedState: step.expectedState,
  };
}

// ===========================================
// Runner
// ===========================================

export async function runScenario(
  executor: StepRunner,
  scenario: Scenario,
  options: RunScenarioOptions = {},
): Promise<ScenarioResult> {
  console.log(`\n========================================`);
  console.log(`Scenario: ${scenario.name}`);
  console.log(`Goal: ${scenario.goal}`);
  console.log(`Steps: ${scenario.steps.length}`);
  console.log(`========================================`);

  const results: ScenarioStepResult[] = [];

  for (let i = 0; i < scenario.steps.length; i++) {
    const step = toExecutorStep(scenario.steps[i], i);
    const maxCycles = scenario.steps[i].maxCycles ?? options.maxCycles ?? scenario.maxCycles;

    console.log(`\n--- Step ${i + 1}/${scenario.steps.length}: ${step.description} ---`);
    const outcome = await executor.runStep(scenario.goal, step, { maxCycles });
    results.push({
      stepId: step.stepId,
      description: step.description,
      success: outcome.success,
      cycles: outcome.cycles,
      reason: outcome.reason,
    });

    console.log(`\nStep ${i + 1} ${outcome.success ? "completed" : "failed"} (${outcome.cycles} cycles used)`);
    if (!outcome.success && !options.continueOnFailure) {
      console.log("Stopping: step failed");
      break;
    }
  }

  const success = results.length === scenario.steps.length && results.every((r) => r.success);
  return { name: scenario.name, goal: scenario.goal, steps: results, success };
}
