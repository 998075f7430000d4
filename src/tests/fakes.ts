/**
 * In-process stand-ins for Gemini and Telegram.
 */

import type {
  GenerationProvider,
  MessageTransport,
  ModelDescriptor,
  ParseMode,
  SendResult,
} from "../relay/types.js";
import type { RunEventSink, RunEventType } from "../relay/run-logger.js";
import type { RunReport } from "../relay/types.js";

export type Reply = string | Error;

/**
 * Scripted provider. `replies[model]` is consumed one entry per call; the
 * last entry repeats. Unknown models fail with a generic error.
 */
export class FakeProvider implements GenerationProvider {
  readonly calls: string[] = [];
  readonly prompts: string[] = [];
  listCalls = 0;

  constructor(
    private readonly replies: Record<string, Reply[]> = {},
    private readonly models: ModelDescriptor[] | Error = []
  ) {}

  async listModels(): Promise<ModelDescriptor[]> {
    this.listCalls++;
    if (this.models instanceof Error) throw this.models;
    return this.models;
  }

  async generateContent(model: string, prompt: string): Promise<string> {
    this.calls.push(model);
    this.prompts.push(prompt);
    const script = this.replies[model];
    if (!script || script.length === 0) {
      throw new Error(`no reply scripted for ${model}`);
    }
    const reply = script.length > 1 ? script.shift() : script[0];
    if (reply instanceof Error) throw reply;
    return reply ?? "";
  }
}

export interface SentMessage {
  text: string;
  parseMode?: ParseMode;
}

/** Records every send; `results` is consumed in order, then every send succeeds. */
export class FakeTransport implements MessageTransport {
  readonly sent: SentMessage[] = [];
  private nextId = 1;

  constructor(private readonly results: Array<SendResult["ok"] | string> = []) {}

  async send(text: string, parseMode?: ParseMode): Promise<SendResult> {
    this.sent.push(parseMode ? { text, parseMode } : { text });
    const scripted = this.results.shift();
    if (typeof scripted === "string") return { ok: false, error: scripted };
    if (scripted === false) return { ok: false, error: "Bad Request" };
    return { ok: true, messageId: this.nextId++ };
  }
}

export class MemoryEventSink implements RunEventSink {
  readonly events: Array<{ event: RunEventType; data: Record<string, unknown> }> = [];
  summary: RunReport | null = null;

  logEvent(event: RunEventType, data: Record<string, unknown> = {}): void {
    this.events.push({ event, data });
  }

  writeSummary(report: RunReport): void {
    this.summary = report;
  }
}

export function model(name: string, methods: string[] = ["generateContent"]): ModelDescriptor {
  return { name, supportedGenerationMethods: methods };
}
