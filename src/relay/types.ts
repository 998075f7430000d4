/**
 * Meal Plan Relay - Type Definitions
 */

import type { TerminalGenerationFailure } from "../errors.js";

// === History ===

export interface HistoryRecord {
  date: string;                      // "YYYY-MM-DD"
  items: string[];                   // dish names extracted from the plan
}

export interface HistoryState {
  records: HistoryRecord[];          // ordered by date
  lastSentDate: string | null;       // date of the most recently appended record
}

/** On-disk shape of the history file */
export interface StoredHistory {
  recipes: Array<{ date: string; meals: string[] }>;
  last_sent: string | null;
}

// === Provider ===

export interface ModelDescriptor {
  name: string;                      // "models/gemini-2.0-flash"
  supportedGenerationMethods: string[];
}

export interface GenerationProvider {
  /** All pages of the model listing. Throws on non-2xx or transport error. */
  listModels(): Promise<ModelDescriptor[]>;
  /**
   * First candidate's first text part. Throws QuotaError or
   * TransientProviderError.
   */
  generateContent(model: string, prompt: string): Promise<string>;
}

export interface GenerationAttempt {
  model: string;
  ok: boolean;
  quota: boolean;
  error?: string;
}

export type GenerationResult =
  | { ok: true; text: string; model: string; attempts: GenerationAttempt[] }
  | { ok: false; error: TerminalGenerationFailure; attempts: GenerationAttempt[] };

// === Transport ===

export type ParseMode = "HTML";

export type SendResult =
  | { ok: true; messageId: number }
  | { ok: false; error: string };

export interface MessageTransport {
  send(text: string, parseMode?: ParseMode): Promise<SendResult>;
}

export interface ChunkResult {
  index: number;                     // 1-based
  total: number;
  ok: boolean;
  error?: string;
}

export interface DispatchOutcome {
  ok: boolean;
  chunked: boolean;
  chunks: ChunkResult[];
}

// === Run ===

export type RunStatus = "sent" | "skipped" | "failed";

export interface RunReport {
  status: RunStatus;
  date: string;
  model?: string;
  items?: string[];
  error?: string;
}
