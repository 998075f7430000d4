/**
 * Send Gate - decides whether this invocation should do anything at all.
 */

import { DEFAULT_ACTIVE_DAYS } from "../config.js";
import { localDate, localWeekday } from "../utils/calendar.js";
import type { HistoryState } from "./types.js";

export interface SendGateOptions {
  timeZone: string;
  activeDays?: readonly number[];    // 0 = Sunday; default Mon-Fri
}

export type GateDecision =
  | { run: true; today: string }
  | { run: false; today: string; reason: "inactive_day" | "already_sent" };

export function evaluateSendGate(
  state: HistoryState,
  now: Date,
  options: SendGateOptions
): GateDecision {
  const today = localDate(now, options.timeZone);
  const activeDays = options.activeDays ?? DEFAULT_ACTIVE_DAYS;

  if (!activeDays.includes(localWeekday(now, options.timeZone))) {
    return { run: false, today, reason: "inactive_day" };
  }
  if (state.lastSentDate === today) {
    return { run: false, today, reason: "already_sent" };
  }
  return { run: true, today };
}

export function shouldRun(state: HistoryState, now: Date, options: SendGateOptions): boolean {
  return evaluateSendGate(state, now, options).run;
}
