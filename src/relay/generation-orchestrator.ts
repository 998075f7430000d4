/**
 * Generation Orchestrator - one pass over the ranked candidates.
 *
 *   success → return, later candidates untouched
 *   quota   → next candidate, no retry
 *   other   → one retry with the "models/<id>" form, then next candidate
 */

import { QuotaError, TerminalGenerationFailure, errorMessage } from "../errors.js";
import type { GenerationAttempt, GenerationProvider, GenerationResult } from "./types.js";

export interface GenerationOrchestratorOptions {
  /** Pause between distinct candidates */
  candidateDelayMs?: number;
}

const DEFAULT_CANDIDATE_DELAY_MS = 750;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

type AttemptOutcome =
  | { kind: "success"; text: string }
  | { kind: "quota"; error: unknown }
  | { kind: "failure"; error: unknown };

export class GenerationOrchestrator {
  private readonly provider: GenerationProvider;
  private readonly candidateDelayMs: number;

  constructor(provider: GenerationProvider, options: GenerationOrchestratorOptions = {}) {
    this.provider = provider;
    this.candidateDelayMs = options.candidateDelayMs ?? DEFAULT_CANDIDATE_DELAY_MS;
  }

  async generate(candidates: readonly string[], prompt: string): Promise<GenerationResult> {
    const distinct = [...new Set(candidates)];
    const attempts: GenerationAttempt[] = [];
    let lastError: unknown = new Error("No model candidates to try");

    for (const [i, candidate] of distinct.entries()) {
      if (i > 0 && this.candidateDelayMs > 0) {
        await sleep(this.candidateDelayMs);
      }

      for (const model of [candidate, `models/${candidate}`]) {
        const outcome = await this.attempt(model, prompt);

        if (outcome.kind === "success") {
          attempts.push({ model, ok: true, quota: false });
          console.log(`[GenerationOrchestrator] ✅ ${model} answered (${outcome.text.length} chars)`);
          return { ok: true, text: outcome.text, model: candidate, attempts };
        }

        lastError = outcome.error;
        attempts.push({
          model,
          ok: false,
          quota: outcome.kind === "quota",
          error: errorMessage(outcome.error),
        });

        if (outcome.kind === "quota") {
          console.warn(`[GenerationOrchestrator] ${model} quota exhausted, skipping to next model`);
          break;
        }
        console.warn(`[GenerationOrchestrator] ${model} failed: ${errorMessage(outcome.error)}`);
      }
    }

    return { ok: false, error: new TerminalGenerationFailure(attempts.length, lastError), attempts };
  }

  private async attempt(model: string, prompt: string): Promise<AttemptOutcome> {
    try {
      const text = await this.provider.generateContent(model, prompt);
      if (!text.trim()) {
        return { kind: "failure", error: new Error(`Empty response from ${model}`) };
      }
      return { kind: "success", text };
    } catch (error) {
      return error instanceof QuotaError ? { kind: "quota", error } : { kind: "failure", error };
    }
  }
}
