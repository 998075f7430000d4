/**
 * History Store - dated log of dishes already sent
 *
 * File: recipe_history.json (see StoredHistory for the on-disk shape)
 *
 * The file is read once at run start and written once, atomically, after a
 * successful dispatch. A crash before save() leaves the previous file intact.
 */

import { existsSync, readFileSync, renameSync, writeFileSync, mkdirSync, rmSync } from "node:fs";
import { dirname } from "node:path";
import { DEFAULT_RETENTION_DAYS } from "../config.js";
import { DuplicateHistoryRecordError, PersistenceError, errorMessage } from "../errors.js";
import { addDays, isIsoDate } from "../utils/calendar.js";
import type { HistoryRecord, HistoryState, StoredHistory } from "./types.js";

export function emptyHistory(): HistoryState {
  return { records: [], lastSentDate: null };
}

/**
 * Drop records strictly older than `today - retentionDays`.
 * Pure; preserves order.
 */
export function pruneHistory(
  state: HistoryState,
  today: string,
  retentionDays: number = DEFAULT_RETENTION_DAYS
): HistoryState {
  const cutoff = addDays(today, -retentionDays);
  return {
    records: state.records.filter((r) => r.date >= cutoff),
    lastSentDate: state.lastSentDate,
  };
}

/**
 * Add a record and mark its date as the last sent date.
 * Throws DuplicateHistoryRecordError (state untouched) if the date is taken.
 */
export function appendRecord(state: HistoryState, record: HistoryRecord): HistoryState {
  if (state.records.some((r) => r.date === record.date)) {
    throw new DuplicateHistoryRecordError(record.date);
  }
  return {
    records: [...state.records, { date: record.date, items: [...record.items] }],
    lastSentDate: record.date,
  };
}

// === Serialization ===

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export interface ParsedHistory {
  state: HistoryState;
  dropped: number;
  /** last_sent was behind the newest record and was moved up to it */
  repaired: boolean;
}

/**
 * Map the stored JSON to a HistoryState, dropping malformed entries.
 * lastSentDate is never older than the newest record.
 * Returns null when the top-level shape is unusable.
 */
export function parseStoredHistory(raw: unknown): ParsedHistory | null {
  if (!isRecord(raw) || !Array.isArray(raw.recipes)) return null;

  const records: HistoryRecord[] = [];
  let dropped = 0;
  for (const entry of raw.recipes) {
    const date = isRecord(entry) ? entry.date : undefined;
    const meals = isRecord(entry) ? entry.meals : undefined;
    if (
      typeof date !== "string" ||
      !isIsoDate(date) ||
      !Array.isArray(meals) ||
      !meals.every((m): m is string => typeof m === "string") ||
      records.some((r) => r.date === date)
    ) {
      dropped++;
      continue;
    }
    records.push({ date, items: [...meals] });
  }
  records.sort((a, b) => a.date.localeCompare(b.date));

  const lastSent = raw.last_sent;
  const stored = typeof lastSent === "string" && isIsoDate(lastSent) ? lastSent : null;
  const newest = records.at(-1)?.date ?? null;
  const repaired = newest !== null && (stored === null || newest > stored);
  const lastSentDate = repaired ? newest : stored;

  return { state: { records, lastSentDate }, dropped, repaired };
}

export function toStoredHistory(state: HistoryState): StoredHistory {
  return {
    recipes: state.records.map((r) => ({ date: r.date, meals: [...r.items] })),
    last_sent: state.lastSentDate,
  };
}

// === HistoryStore ===

export class HistoryStore {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  /**
   * Never throws. Missing file → empty history; unreadable or corrupt file →
   * empty history plus a warning.
   */
  load(): HistoryState {
    if (!existsSync(this.filePath)) {
      console.log(`[HistoryStore] No history at ${this.filePath}, starting fresh`);
      return emptyHistory();
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.filePath, "utf-8"));
    } catch (err) {
      console.warn(`[HistoryStore] Unreadable history, treating as empty: ${errorMessage(err)}`);
      return emptyHistory();
    }

    const parsed = parseStoredHistory(raw);
    if (!parsed) {
      console.warn(`[HistoryStore] Malformed history in ${this.filePath}, treating as empty`);
      return emptyHistory();
    }
    if (parsed.dropped > 0) {
      console.warn(`[HistoryStore] Dropped ${parsed.dropped} malformed record(s)`);
    }
    if (parsed.repaired) {
      console.warn(`[HistoryStore] last_sent behind newest record, using ${parsed.state.lastSentDate}`);
    }
    return parsed.state;
  }

  /** Write via a temp file + rename so readers never see a half-written file. */
  save(state: HistoryState): void {
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      mkdirSync(dirname(this.filePath), { recursive: true });
      writeFileSync(tmpPath, JSON.stringify(toStoredHistory(state), null, 2) + "\n", "utf-8");
      renameSync(tmpPath, this.filePath);
    } catch (err) {
      try {
        rmSync(tmpPath, { force: true });
      } catch (cleanupErr) {
        console.warn(`[HistoryStore] Could not remove ${tmpPath}: ${errorMessage(cleanupErr)}`);
      }
      throw new PersistenceError(`Failed to write history to ${this.filePath}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }
}
