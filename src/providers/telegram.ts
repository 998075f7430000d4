/**
 * Telegram transport over grammy's Bot API client.
 */

import { Bot, GrammyError, HttpError } from "grammy";
import type { MessageTransport, ParseMode, SendResult } from "../relay/types.js";

/** The part of grammy's Api this transport uses. */
export interface SendMessageApi {
  sendMessage(
    chatId: string,
    text: string,
    other?: { parse_mode?: ParseMode }
  ): Promise<{ message_id: number }>;
}

export function describeSendError(error: unknown): string {
  if (error instanceof GrammyError) {
    return `Telegram API error ${error.error_code}: ${error.description}`;
  }
  if (error instanceof HttpError) {
    return `Telegram network error: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}

export class TelegramTransport implements MessageTransport {
  private readonly api: SendMessageApi;
  private readonly chatId: string;

  constructor(api: SendMessageApi, chatId: string) {
    this.api = api;
    this.chatId = chatId;
  }

  static fromToken(token: string, chatId: string, timeoutMs: number): TelegramTransport {
    const bot = new Bot(token, {
      client: { timeoutSeconds: Math.max(1, Math.ceil(timeoutMs / 1000)) },
    });
    return new TelegramTransport(bot.api, chatId);
  }

  async send(text: string, parseMode?: ParseMode): Promise<SendResult> {
    try {
      const message = await this.api.sendMessage(
        this.chatId,
        text,
        parseMode ? { parse_mode: parseMode } : {}
      );
      return { ok: true, messageId: message.message_id };
    } catch (error) {
      return { ok: false, error: describeSendError(error) };
    }
  }
}
