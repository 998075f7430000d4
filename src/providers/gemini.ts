/**
 * Gemini provider
 *
 * Generation goes through @google/generative-ai. The SDK has no model
 * listing, so that one call is a plain fetch against the REST endpoint.
 */

import { GoogleGenerativeAI, GoogleGenerativeAIFetchError } from "@google/generative-ai";
import { ProviderError, QuotaError, TransientProviderError, errorMessage } from "../errors.js";
import type { GenerationProvider, ModelDescriptor } from "../relay/types.js";

export const GEMINI_BASE_URL = "https://generativelanguage.googleapis.com";
const LIST_PAGE_SIZE = 100;
const MAX_LIST_PAGES = 10;

const QUOTA_PATTERN = /\b429\b|RESOURCE_EXHAUSTED/;

export interface GeminiClientOptions {
  timeoutMs?: number;
  baseUrl?: string;
}

/** Map any SDK/transport failure onto QuotaError or TransientProviderError. */
export function classifyProviderError(error: unknown, model: string): ProviderError {
  if (error instanceof ProviderError) return error;

  const status = error instanceof GoogleGenerativeAIFetchError ? error.status : undefined;
  const message = `${model}: ${errorMessage(error)}`;
  if (status === 429 || QUOTA_PATTERN.test(errorMessage(error))) {
    return new QuotaError(message, status ?? 429, { cause: error });
  }
  return new TransientProviderError(message, status, { cause: error });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseModelPage(body: unknown): { models: ModelDescriptor[]; nextPageToken?: string } {
  if (!isRecord(body)) {
    throw new TransientProviderError("Model listing is not a JSON object");
  }
  const models: ModelDescriptor[] = [];
  const entries = Array.isArray(body.models) ? body.models : [];
  for (const entry of entries) {
    if (!isRecord(entry) || typeof entry.name !== "string") continue;
    const methods = Array.isArray(entry.supportedGenerationMethods)
      ? entry.supportedGenerationMethods.filter((m): m is string => typeof m === "string")
      : [];
    models.push({ name: entry.name, supportedGenerationMethods: methods });
  }
  const token = typeof body.nextPageToken === "string" && body.nextPageToken ? body.nextPageToken : undefined;
  return { models, nextPageToken: token };
}

export class GeminiClient implements GenerationProvider {
  private readonly client: GoogleGenerativeAI;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly baseUrl: string;

  constructor(apiKey: string, options: GeminiClientOptions = {}) {
    this.apiKey = apiKey;
    this.client = new GoogleGenerativeAI(apiKey);
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.baseUrl = options.baseUrl ?? GEMINI_BASE_URL;
  }

  async listModels(): Promise<ModelDescriptor[]> {
    const all: ModelDescriptor[] = [];
    let pageToken: string | undefined;

    for (let page = 0; page < MAX_LIST_PAGES; page++) {
      const url = new URL("/v1beta/models", this.baseUrl);
      url.searchParams.set("key", this.apiKey);
      url.searchParams.set("pageSize", String(LIST_PAGE_SIZE));
      if (pageToken) url.searchParams.set("pageToken", pageToken);

      let response: Response;
      try {
        response = await fetch(url, { signal: AbortSignal.timeout(this.timeoutMs) });
      } catch (error) {
        throw new TransientProviderError(`Model listing request failed: ${errorMessage(error)}`, undefined, {
          cause: error,
        });
      }
      if (!response.ok) {
        throw new TransientProviderError(
          `Model listing returned ${response.status} ${response.statusText}`,
          response.status
        );
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (error) {
        throw new TransientProviderError(`Model listing is not valid JSON: ${errorMessage(error)}`, response.status, {
          cause: error,
        });
      }

      const { models, nextPageToken } = parseModelPage(body);
      all.push(...models);
      if (!nextPageToken) break;
      pageToken = nextPageToken;
    }
    return all;
  }

  async generateContent(model: string, prompt: string): Promise<string> {
    try {
      const generative = this.client.getGenerativeModel({ model }, { timeout: this.timeoutMs });
      const result = await generative.generateContent({
        contents: [{ role: "user", parts: [{ text: prompt }] }],
      });

      const text = result.response.candidates?.[0]?.content?.parts?.[0]?.text;
      if (typeof text !== "string" || !text.trim()) {
        const reason = result.response.promptFeedback?.blockReason ?? "no text part";
        throw new TransientProviderError(`${model}: malformed response (${reason})`);
      }
      return text;
    } catch (error) {
      throw classifyProviderError(error, model);
    }
  }
}
