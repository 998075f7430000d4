/**
 * Relay Run Logger
 *
 * JSONL event log per run plus a summary JSON, so cron runs can be told
 * apart after the fact (sent vs. skipped vs. failed).
 *
 * Log location: <RELAY_RUN_LOGS_DIR>/<run_id>.jsonl
 * Summary:      <RELAY_RUN_LOGS_DIR>/<run_id>.summary.json
 *
 * Usage:
 *   const logger = new RunLogger(logsDir);
 *   logger.logEvent("gate_checked", { today: "2026-10-19", run: true });
 *   logger.writeSummary(report);
 */

import { mkdirSync, appendFileSync, writeFileSync, existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { ulid } from "ulidx";
import { errorMessage } from "../errors.js";
import type { RunReport } from "./types.js";

// === Types ===

export type RunEventType =
  | "run_start"
  | "gate_checked"
  | "candidates_resolved"
  | "generation_done"
  | "dispatch_done"
  | "history_saved"
  | "run_complete"
  | "error";

export interface RunEvent {
  timestamp: string;
  run_id: string;
  event: RunEventType;
  data: Record<string, unknown>;
}

export interface RunSummary extends RunReport {
  run_id: string;
  started_at: string;
  completed_at: string;
}

/** Sink used by the run controller; RunLogger writes to disk. */
export interface RunEventSink {
  logEvent(event: RunEventType, data?: Record<string, unknown>): void;
  writeSummary(report: RunReport): void;
}

// === RunLogger ===

export class RunLogger implements RunEventSink {
  readonly runId: string;
  readonly logPath: string;
  readonly summaryPath: string;
  private readonly startedAt: string;
  private enabled = true;

  constructor(logsDir: string) {
    this.runId = `run_${ulid()}`;
    this.startedAt = new Date().toISOString();
    this.logPath = join(logsDir, `${this.runId}.jsonl`);
    this.summaryPath = join(logsDir, `${this.runId}.summary.json`);

    try {
      mkdirSync(logsDir, { recursive: true });
    } catch (err) {
      // Run logs are diagnostics only; the run itself goes on.
      this.enabled = false;
      console.error(`[RunLogger] Cannot create ${logsDir}, run log disabled: ${errorMessage(err)}`);
    }
  }

  logEvent(event: RunEventType, data: Record<string, unknown> = {}): void {
    if (!this.enabled) return;
    const entry: RunEvent = {
      timestamp: new Date().toISOString(),
      run_id: this.runId,
      event,
      data,
    };
    try {
      appendFileSync(this.logPath, JSON.stringify(entry) + "\n");
    } catch (err) {
      console.error(`[RunLogger] Failed to write event:`, err);
    }
  }

  writeSummary(report: RunReport): void {
    if (!this.enabled) return;
    const full: RunSummary = {
      ...report,
      run_id: this.runId,
      started_at: this.startedAt,
      completed_at: new Date().toISOString(),
    };
    try {
      writeFileSync(this.summaryPath, JSON.stringify(full, null, 2) + "\n");
    } catch (err) {
      console.error(`[RunLogger] Failed to write summary:`, err);
    }
  }
}

/** Events of one run, in order. Unparsable lines are skipped. */
export function readRunEvents(logsDir: string, runId: string): RunEvent[] {
  const logPath = join(logsDir, `${runId}.jsonl`);
  if (!existsSync(logPath)) return [];

  const events: RunEvent[] = [];
  for (const line of readFileSync(logPath, "utf-8").split("\n")) {
    if (!line.trim()) continue;
    try {
      events.push(JSON.parse(line));
    } catch (err) {
      console.warn(`[RunLogger] Skipping bad line in ${logPath}: ${errorMessage(err)}`);
    }
  }
  return events;
}
