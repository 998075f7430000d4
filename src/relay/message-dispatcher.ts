/**
 * Message Dispatcher - delivers text that may exceed Telegram's size limit.
 *
 * Text that fits goes out as one message, in the parse mode the caller
 * asks for. Longer text is split on line boundaries and always sent as
 * plain text parts: a tag cut in half would break HTML parsing for the
 * whole part.
 */

import { TELEGRAM_SAFE_LIMIT } from "../config.js";
import type { ChunkResult, DispatchOutcome, MessageTransport, ParseMode } from "./types.js";

export interface MessageDispatcherOptions {
  maxChunk?: number;
  /** Pause between parts so they arrive in order */
  chunkDelayMs?: number;
}

export interface DispatchOptions {
  /** Applies to single-message sends only */
  parseMode?: ParseMode;
}

const DEFAULT_CHUNK_DELAY_MS = 500;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Split into parts of at most `maxChunk` chars, cutting after the last
 * newline in range (hard cut when there is none). `parts.join("") === text`.
 */
export function splitMessage(text: string, maxChunk: number = TELEGRAM_SAFE_LIMIT): string[] {
  if (maxChunk < 1) {
    throw new RangeError(`maxChunk must be positive, got ${maxChunk}`);
  }

  const chunks: string[] = [];
  let rest = text;
  while (rest.length > maxChunk) {
    const window = rest.slice(0, maxChunk);
    const newline = window.lastIndexOf("\n");
    const cut = newline > 0 ? newline + 1 : maxChunk;
    chunks.push(rest.slice(0, cut));
    rest = rest.slice(cut);
  }
  if (rest.length > 0) chunks.push(rest);
  return chunks;
}

/** "[2/3]\n" on every part but the first */
export function partMarker(index: number, total: number): string {
  return index > 1 ? `[${index}/${total}]\n` : "";
}

export class MessageDispatcher {
  private readonly transport: MessageTransport;
  private readonly maxChunk: number;
  private readonly chunkDelayMs: number;

  constructor(transport: MessageTransport, options: MessageDispatcherOptions = {}) {
    this.transport = transport;
    this.maxChunk = options.maxChunk ?? TELEGRAM_SAFE_LIMIT;
    this.chunkDelayMs = options.chunkDelayMs ?? DEFAULT_CHUNK_DELAY_MS;
  }

  /** Whether `text` goes out as a single formatted message. */
  fits(text: string): boolean {
    return text.length <= this.maxChunk;
  }

  async dispatch(text: string, options: DispatchOptions = {}): Promise<DispatchOutcome> {
    if (this.fits(text)) {
      const result = await this.transport.send(text, options.parseMode);
      const chunk: ChunkResult = result.ok
        ? { index: 1, total: 1, ok: true }
        : { index: 1, total: 1, ok: false, error: result.error };
      if (!result.ok) {
        console.error(`[MessageDispatcher] Send failed: ${result.error}`);
      }
      return { ok: result.ok, chunked: false, chunks: [chunk] };
    }

    const parts = splitMessage(text, this.maxChunk);
    const total = parts.length;
    const chunks: ChunkResult[] = [];
    if (options.parseMode) {
      console.warn(`[MessageDispatcher] ${options.parseMode} dropped: text needs ${total} parts`);
    }
    console.log(`[MessageDispatcher] ${text.length} chars → ${total} part(s), sending as plain text`);

    for (const [i, part] of parts.entries()) {
      const index = i + 1;
      if (i > 0 && this.chunkDelayMs > 0) {
        await sleep(this.chunkDelayMs);
      }

      const result = await this.transport.send(partMarker(index, total) + part);
      if (!result.ok) {
        chunks.push({ index, total, ok: false, error: result.error });
        console.error(`[MessageDispatcher] Part ${index}/${total} failed: ${result.error}`);
        // Stop at the first failure. Parts already delivered are not retracted.
        return { ok: false, chunked: true, chunks };
      }
      chunks.push({ index, total, ok: true });
    }

    return { ok: true, chunked: true, chunks };
  }
}
