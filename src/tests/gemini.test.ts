/**
 * Gemini provider tests
 *
 * fetch is stubbed; the SDK and the listing call both go through it.
 */

import { describe, test, expect, afterEach, vi } from "vitest";
import { GeminiClient, classifyProviderError } from "../providers/gemini.js";
import { QuotaError, TransientProviderError } from "../errors.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function stubFetch(...responses: Response[]) {
  const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => {
    const next = responses.shift();
    if (!next) throw new TypeError("fetch failed");
    return next;
  });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function requestedUrl(fetchMock: ReturnType<typeof stubFetch>, call: number): string {
  return String(fetchMock.mock.calls[call]?.[0]);
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("GeminiClient.listModels", () => {
  test("follows nextPageToken and keeps name + methods", async () => {
    const fetchMock = stubFetch(
      jsonResponse({
        models: [{ name: "models/gemini-2.0-flash", supportedGenerationMethods: ["generateContent"] }],
        nextPageToken: "page-2",
      }),
      jsonResponse({
        models: [
          { name: "models/embedding-001", supportedGenerationMethods: ["embedContent"] },
          { displayName: "no name" },
        ],
      })
    );

    const models = await new GeminiClient("test-key").listModels();

    expect(models).toEqual([
      { name: "models/gemini-2.0-flash", supportedGenerationMethods: ["generateContent"] },
      { name: "models/embedding-001", supportedGenerationMethods: ["embedContent"] },
    ]);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(requestedUrl(fetchMock, 0)).toBe(
      "https://generativelanguage.googleapis.com/v1beta/models?key=test-key&pageSize=100"
    );
    expect(requestedUrl(fetchMock, 1)).toContain("pageToken=page-2");
  });

  test("non-2xx is a TransientProviderError with the status", async () => {
    stubFetch(jsonResponse({ error: { message: "unavailable" } }, 503));

    await expect(new GeminiClient("test-key").listModels()).rejects.toMatchObject({
      name: "TransientProviderError",
      status: 503,
    });
  });

  test("transport failure is a TransientProviderError", async () => {
    stubFetch();

    await expect(new GeminiClient("test-key").listModels()).rejects.toBeInstanceOf(TransientProviderError);
  });
});

describe("GeminiClient.generateContent", () => {
  test("returns the first candidate's first text part", async () => {
    const fetchMock = stubFetch(
      jsonResponse({
        candidates: [
          { content: { role: "model", parts: [{ text: "🌅 DESAYUNO:\nTigrillo" }, { text: "ignored" }] } },
          { content: { role: "model", parts: [{ text: "second candidate" }] } },
        ],
      })
    );

    const text = await new GeminiClient("test-key").generateContent("gemini-2.0-flash", "Propón 3 recetas");

    expect(text).toBe("🌅 DESAYUNO:\nTigrillo");
    expect(requestedUrl(fetchMock, 0)).toContain("/models/gemini-2.0-flash:generateContent");
    const init = fetchMock.mock.calls[0]?.[1];
    const body = JSON.parse(String(init?.body));
    expect(body.contents).toEqual([{ role: "user", parts: [{ text: "Propón 3 recetas" }] }]);
  });

  test("429 becomes a QuotaError", async () => {
    stubFetch(
      jsonResponse({ error: { code: 429, message: "Resource has been exhausted", status: "RESOURCE_EXHAUSTED" } }, 429)
    );

    const error = await new GeminiClient("test-key")
      .generateContent("gemini-2.0-flash", "p")
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(QuotaError);
    expect(error).toMatchObject({ status: 429 });
  });

  test("500 becomes a TransientProviderError", async () => {
    stubFetch(jsonResponse({ error: { code: 500, message: "Internal error", status: "INTERNAL" } }, 500));

    const error = await new GeminiClient("test-key")
      .generateContent("gemini-2.0-flash", "p")
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransientProviderError);
    expect(error).toMatchObject({ status: 500 });
  });

  test("a response without text is malformed", async () => {
    stubFetch(jsonResponse({ candidates: [] }));

    await expect(new GeminiClient("test-key").generateContent("gemini-2.0-flash", "p")).rejects.toThrow(
      "gemini-2.0-flash: malformed response (no text part)"
    );
  });
});

describe("classifyProviderError", () => {
  test("quota wording without a status is still a quota error", () => {
    expect(classifyProviderError(new Error("[429 Too Many Requests] quota exceeded"), "m")).toBeInstanceOf(QuotaError);
    expect(classifyProviderError(new Error("RESOURCE_EXHAUSTED"), "m")).toBeInstanceOf(QuotaError);
  });

  test("a non-429 error that mentions a quota project is transient", () => {
    const error = classifyProviderError(
      new Error("[403 Forbidden] Your application is using a quota project that is not enabled"),
      "gemini-pro"
    );
    expect(error).toBeInstanceOf(TransientProviderError);
  });

  test("anything else is transient", () => {
    const error = classifyProviderError(new TypeError("fetch failed"), "gemini-pro");
    expect(error).toBeInstanceOf(TransientProviderError);
    expect(error.message).toBe("gemini-pro: fetch failed");
  });

  test("provider errors pass through unchanged", () => {
    const original = new QuotaError("already classified", 429);
    expect(classifyProviderError(original, "m")).toBe(original);
  });
});
