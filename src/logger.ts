/**
 * Per-step session log.
 * Writes an incremental .partial.json after each cycle (crash-safe) and a
 * final .json summary when the step finishes. Without a log dir nothing is
 * written and entries are only kept in memory. File errors are reported and
 * never thrown; a directory that cannot be created turns writing off.
 */

import { mkdirSync, writeFileSync } from "fs";
import { join } from "path";

import { errorMessage } from "./errors.js";
import type { DispatchStatus, EvaluationVerdict, RecoveryKind } from "./types.js";

export interface CycleLog {
  cycle: number;
  timestamp: string;
  phase: "precheck" | "evaluate";
  elementCount: number;
  dispatch?: { status: DispatchStatus; detail: string };
  verdict: Pick<EvaluationVerdict, "ok" | "recovery" | "reason" | "confidence">;
  recovery?: { kind: RecoveryKind; resolved: boolean };
  oracleLatencyMs: number;
  actionLatencyMs: number;
}

export interface StepSummary {
  sessionId: string;
  goal: string;
  stepId: number;
  description: string;
  startTime: string;
  endTime: string;
  cycles: number;
  success: boolean;
  reason: string;
  notes: string[];
  entries: CycleLog[];
}

export class StepLogger {
  readonly sessionId: string;
  private readonly entries: CycleLog[] = [];
  private readonly startTime: string;
  private logDir: string;

  constructor(
    logDir: string,
    private readonly goal: string,
    private readonly stepId: number,
    private readonly description: string,
  ) {
    this.sessionId = `${Date.now()}-step${stepId}-${Math.random().toString(36).slice(2, 8)}`;
    this.startTime = new Date().toISOString();
    this.logDir = logDir;
    if (!this.logDir) return;
    try {
      mkdirSync(this.logDir, { recursive: true });
    } catch (err) {
      console.log(`[log] Cannot create ${this.logDir}, step logs stay in memory: ${errorMessage(err)}`);
      this.logDir = "";
    }
  }

  get partialPath(): string | null {
    return this.logDir ? join(this.logDir, `${this.sessionId}.partial.json`) : null;
  }

  get finalPath(): string | null {
    return this.logDir ? join(this.logDir, `${this.sessionId}.json`) : null;
  }

  logCycle(entry: Omit<CycleLog, "timestamp">): void {
    this.entries.push({ ...entry, timestamp: new Date().toISOString() });
    this.writePartial();
  }

  /** Attaches a recovery outcome to the latest cycle entry. */
  logRecovery(kind: RecoveryKind, resolved: boolean): void {
    const last = this.entries.at(-1);
    if (!last) return;
    last.recovery = { kind, resolved };
    this.writePartial();
  }

  finalize(success: boolean, reason: string, notes: string[]): StepSummary {
    const summary = this.buildSummary(success, reason, notes);
    const path = this.finalPath;
    if (path && this.write(path, summary)) console.log(`Step log saved: ${path}`);
    return summary;
  }

  private writePartial(): void {
    const path = this.partialPath;
    if (path) this.write(path, this.buildSummary(false, "in progress", []));
  }

  private write(path: string, summary: StepSummary): boolean {
    try {
      writeFileSync(path, JSON.stringify(summary, null, 2));
      return true;
    } catch (err) {
      console.log(`[log] Could not write ${path}: ${errorMessage(err)}`);
      return false;
    }
  }

  private buildSummary(success: boolean, reason: string, notes: string[]): StepSummary {
    return {
      sessionId: this.sessionId,
      goal: this.goal,
      stepId: this.stepId,
      description: this.description,
      startTime: this.startTime,
      endTime: new Date().toISOString(),
      cycles: new Set(this.entries.map((e) => e.cycle)).size,
      success,
      reason,
      notes,
      entries: this.entries,
    };
  }
}
