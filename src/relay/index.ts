/**
 * Meal Plan Relay - wiring
 */

import { resolve } from "node:path";
import type { RelayConfig } from "../config.js";
import { GeminiClient } from "../providers/gemini.js";
import { TelegramTransport } from "../providers/telegram.js";
import { CandidateResolver } from "./candidate-resolver.js";
import { GenerationOrchestrator } from "./generation-orchestrator.js";
import { HistoryStore } from "./history-store.js";
import { MessageDispatcher } from "./message-dispatcher.js";
import { RunController } from "./run-controller.js";
import { RunLogger } from "./run-logger.js";

export { RunController, exitCodeFor, EXIT_CODES } from "./run-controller.js";
export type { RunReport, RunStatus } from "./types.js";

/** Paths in the config are resolved against `baseDir`. */
export function createRunController(config: RelayConfig, baseDir: string = process.cwd()): RunController {
  const gemini = new GeminiClient(config.geminiApiKey, { timeoutMs: config.requestTimeoutMs });
  const transport = TelegramTransport.fromToken(
    config.telegramBotToken,
    config.telegramChatId,
    config.requestTimeoutMs
  );

  return new RunController(
    {
      store: new HistoryStore(resolve(baseDir, config.historyFile)),
      resolver: new CandidateResolver(gemini, config.fallbackModels),
      orchestrator: new GenerationOrchestrator(gemini, { candidateDelayMs: config.candidateDelayMs }),
      dispatcher: new MessageDispatcher(transport, { chunkDelayMs: config.chunkDelayMs }),
      events: new RunLogger(resolve(baseDir, config.runLogsDir)),
    },
    config
  );
}
