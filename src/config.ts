/**
 * Relay configuration.
 *
 * Built once from the environment by the job entry point and passed down by
 * reference. Components never read process.env themselves.
 */

import { ConfigurationError } from "./errors.js";

// Telegram rejects messages above 4096 chars; the rest is room for the [i/N] marker.
export const TELEGRAM_SAFE_LIMIT = 4000;

export const DEFAULT_RETENTION_DAYS = 14;
export const DEFAULT_ACTIVE_DAYS: readonly number[] = [1, 2, 3, 4, 5]; // Mon-Fri
export const DEFAULT_FALLBACK_MODELS: readonly string[] = [
  "gemini-2.5-flash",
  "gemini-2.0-flash",
  "gemini-1.5-flash",
  "gemini-2.0-flash-exp",
];

export interface RelayConfig {
  geminiApiKey: string;
  telegramBotToken: string;
  telegramChatId: string;
  historyFile: string;
  timeZone: string;
  activeDays: readonly number[];
  retentionDays: number;
  fallbackModels: readonly string[];
  requestTimeoutMs: number;
  candidateDelayMs: number;
  chunkDelayMs: number;
  runLogsDir: string;
}

type Env = Record<string, string | undefined>;

function required(env: Env, name: string): string {
  const value = env[name]?.trim();
  if (!value) {
    throw new ConfigurationError(`${name} must be set`);
  }
  return value;
}

function integer(env: Env, name: string, fallback: number, min = 0): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError(`${name} must be an integer >= ${min} (got "${raw}")`);
  }
  return value;
}

function list(env: Env, name: string): string[] | undefined {
  const raw = env[name]?.trim();
  if (!raw) return undefined;
  const items = raw.split(",").map((s) => s.trim()).filter(Boolean);
  return items.length > 0 ? items : undefined;
}

function parseActiveDays(env: Env): readonly number[] {
  const items = list(env, "RELAY_ACTIVE_DAYS");
  if (!items) return DEFAULT_ACTIVE_DAYS;

  const days = items.map(Number);
  if (days.some((d) => !Number.isInteger(d) || d < 0 || d > 6)) {
    throw new ConfigurationError(
      `RELAY_ACTIVE_DAYS must list weekdays 0-6 (0 = Sunday), got "${env.RELAY_ACTIVE_DAYS}"`
    );
  }
  return [...new Set(days)];
}

function parseTimeZone(env: Env): string {
  const tz = env.RELAY_TIMEZONE?.trim() || Intl.DateTimeFormat().resolvedOptions().timeZone;
  try {
    new Intl.DateTimeFormat("en-CA", { timeZone: tz });
  } catch {
    throw new ConfigurationError(`RELAY_TIMEZONE is not a valid IANA time zone: "${tz}"`);
  }
  return tz;
}

export function loadConfig(env: Env = process.env): RelayConfig {
  return {
    geminiApiKey: required(env, "GEMINI_API_KEY"),
    telegramBotToken: required(env, "TELEGRAM_BOT_TOKEN"),
    telegramChatId: required(env, "TELEGRAM_CHAT_ID"),
    historyFile: env.HISTORY_FILE?.trim() || "recipe_history.json",
    timeZone: parseTimeZone(env),
    activeDays: parseActiveDays(env),
    retentionDays: integer(env, "HISTORY_RETENTION_DAYS", DEFAULT_RETENTION_DAYS, 1),
    fallbackModels: list(env, "GEMINI_FALLBACK_MODELS") ?? DEFAULT_FALLBACK_MODELS,
    requestTimeoutMs: integer(env, "REQUEST_TIMEOUT_MS", 30_000, 1),
    candidateDelayMs: integer(env, "CANDIDATE_DELAY_MS", 750),
    chunkDelayMs: integer(env, "CHUNK_DELAY_MS", 500),
    runLogsDir: env.RELAY_RUN_LOGS_DIR?.trim() || "logs/relay-runs",
  };
}
