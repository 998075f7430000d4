/**
 * Error taxonomy for the relay.
 *
 * Component-local failures (a resolver query, a single candidate) are absorbed
 * and turned into fallbacks. Only the run controller decides whether a run
 * failed, and it is the only place these errors are logged as terminal.
 */

export class RelayError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or malformed environment. Startup-fatal, never retried. */
export class ConfigurationError extends RelayError {}

/** A provider call failed. `status` is the HTTP status when one was received. */
export class ProviderError extends RelayError {
  readonly status: number | undefined;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.status = status;
  }
}

/** 429 / RESOURCE_EXHAUSTED. The candidate is abandoned without retry. */
export class QuotaError extends ProviderError {}

/** Network failure, 5xx, other 4xx or a malformed payload. */
export class TransientProviderError extends ProviderError {}

/** Every candidate was exhausted. `cause` is the last observed error. */
export class TerminalGenerationFailure extends RelayError {
  readonly attempts: number;

  constructor(attempts: number, lastError: unknown) {
    const detail = lastError instanceof Error ? lastError.message : String(lastError);
    super(`All model candidates failed after ${attempts} attempt(s): ${detail}`, {
      cause: lastError,
    });
    this.attempts = attempts;
  }
}

/** Some chunks (possibly none) were delivered before a send failed. */
export class PartialDispatchFailure extends RelayError {
  readonly delivered: number;
  readonly total: number;

  constructor(delivered: number, total: number, cause?: unknown) {
    super(`Delivered ${delivered}/${total} message part(s) before a send failed`, { cause });
    this.delivered = delivered;
    this.total = total;
  }
}

/** History could not be written. */
export class PersistenceError extends RelayError {}

/** A record for this date is already in the history. */
export class DuplicateHistoryRecordError extends RelayError {
  readonly date: string;

  constructor(date: string) {
    super(`History already has a record for ${date}`);
    this.date = date;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
