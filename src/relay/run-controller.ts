/**
 * Run Controller - one relay run, end to end.
 *
 *   load → prune → gate → resolve → generate → dispatch → append → save
 *
 * History on disk changes only after every part was delivered. run() never
 * throws: the outcome is a RunReport and the caller maps it to an exit code.
 */

import type { RelayConfig } from "../config.js";
import { PartialDispatchFailure, errorMessage } from "../errors.js";
import type { CandidateResolver } from "./candidate-resolver.js";
import type { GenerationOrchestrator } from "./generation-orchestrator.js";
import { appendRecord, pruneHistory, type HistoryStore } from "./history-store.js";
import {
  buildMealPlanPrompt,
  composeMessage,
  extractMealLabels,
  summarizeRecentMeals,
} from "./meal-plan.js";
import type { MessageDispatcher } from "./message-dispatcher.js";
import type { RunEventSink } from "./run-logger.js";
import { evaluateSendGate } from "./send-gate.js";
import { localDate } from "../utils/calendar.js";
import type { RunReport } from "./types.js";

export interface RunControllerDeps {
  store: HistoryStore;
  resolver: CandidateResolver;
  orchestrator: GenerationOrchestrator;
  dispatcher: MessageDispatcher;
  events?: RunEventSink;
}

export type RunSettings = Pick<RelayConfig, "timeZone" | "activeDays" | "retentionDays">;

export class RunController {
  private readonly deps: RunControllerDeps;
  private readonly settings: RunSettings;

  constructor(deps: RunControllerDeps, settings: RunSettings) {
    this.deps = deps;
    this.settings = settings;
  }

  async run(now: Date = new Date()): Promise<RunReport> {
    const report = await this.execute(now);
    this.deps.events?.logEvent("run_complete", { status: report.status });
    this.deps.events?.writeSummary(report);
    return report;
  }

  private async execute(now: Date): Promise<RunReport> {
    const { store, resolver, orchestrator, dispatcher, events } = this.deps;
    events?.logEvent("run_start", { now: now.toISOString() });

    const today = localDate(now, this.settings.timeZone);
    const history = pruneHistory(store.load(), today, this.settings.retentionDays);
    const gate = evaluateSendGate(history, now, this.settings);
    events?.logEvent("gate_checked", { ...gate });

    if (!gate.run) {
      console.log(
        gate.reason === "inactive_day"
          ? `[RunController] ⏭️ Skipping: ${today} is not an active day`
          : `[RunController] ⏭️ Skipping: already sent on ${today}`
      );
      return { status: "skipped", date: today };
    }

    try {
      const candidates = await resolver.resolve();
      events?.logEvent("candidates_resolved", { candidates });

      const prompt = buildMealPlanPrompt(summarizeRecentMeals(history));
      console.log(`[RunController] 📝 Generating meal plan for ${today}...`);
      const generated = await orchestrator.generate(candidates, prompt);
      events?.logEvent("generation_done", {
        ok: generated.ok,
        attempts: generated.attempts,
      });
      if (!generated.ok) {
        throw generated.error;
      }

      // HTML only when it goes out whole; otherwise the unescaped plain form.
      const { timeZone } = this.settings;
      const html = composeMessage(generated.text, now, { timeZone, format: "html" });

      console.log(`[RunController] 📤 Sending to Telegram...`);
      const outcome = dispatcher.fits(html)
        ? await dispatcher.dispatch(html, { parseMode: "HTML" })
        : await dispatcher.dispatch(composeMessage(generated.text, now, { timeZone, format: "plain" }));
      events?.logEvent("dispatch_done", { ...outcome });
      if (!outcome.ok) {
        const delivered = outcome.chunks.filter((c) => c.ok).length;
        const total = outcome.chunks[0]?.total ?? 1;
        const failed = outcome.chunks.find((c) => !c.ok);
        throw new PartialDispatchFailure(delivered, total, failed?.error);
      }

      const items = extractMealLabels(generated.text);
      const updated = appendRecord(history, { date: today, items });
      store.save(updated);
      events?.logEvent("history_saved", { date: today, items });

      console.log(`[RunController] ✅ Meal plan sent (${generated.model})`);
      return { status: "sent", date: today, model: generated.model, items };
    } catch (error) {
      console.error(`[RunController] ❌ Run failed: ${errorMessage(error)}`);
      events?.logEvent("error", { name: error instanceof Error ? error.name : "Error", message: errorMessage(error) });
      return { status: "failed", date: today, error: errorMessage(error) };
    }
  }
}

export const EXIT_CODES = {
  sent: 0,
  skipped: 0,
  failed: 1,
  config: 2,
} as const;

export function exitCodeFor(report: RunReport): number {
  return EXIT_CODES[report.status];
}
