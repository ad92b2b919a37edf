import { isProviderError, isProviderErrorKind } from "@quillgate/errors";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { classifyGemini, createGeminiAdapter } from "../adapters/gemini.js";
import { classifyHuggingFace, createHuggingFaceAdapter } from "../adapters/huggingface.js";
import { createBuiltinAdapters, createProviderAdapter } from "../adapters/index.js";
import { classifyOpenRouter, createOpenRouterAdapter } from "../adapters/openrouter.js";
import { envCredentialSource } from "../credentials.js";
import type { AdapterContext, GenerationRequest } from "../types.js";

// ---------------------------------------------------------------------------
// Test helpers
// ---------------------------------------------------------------------------

const fetchMock = vi.fn<typeof fetch>();

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function lastCall(): { url: string; headers: Headers; body: unknown } {
  const call = fetchMock.mock.calls.at(-1);
  if (call === undefined) throw new Error("fetch was not called");
  const [url, init] = call;
  return {
    url: typeof url === "string" ? url : url.toString(),
    headers: new Headers(init?.headers),
    body: typeof init?.body === "string" ? JSON.parse(init.body) : undefined,
  };
}

async function failure(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(
    () => {
      throw new Error("Expected promise to reject");
    },
    (error: unknown) => error,
  );
}

function makeRequest(overrides?: Partial<GenerationRequest>): GenerationRequest {
  return {
    requestId: "req-1",
    userId: "user-1",
    prompt: "Say hello there",
    temperature: 0.7,
    maxTokens: 256,
    ...overrides,
  };
}

const allKeys = envCredentialSource({
  GEMINI_API_KEY: "test-secret",
  OPENROUTER_API_KEY: "test-secret",
  HF_TOKEN: "test-secret",
});

function context(model: string, overrides?: Partial<AdapterContext>): AdapterContext {
  return { model, credential: allKeys, ...overrides };
}

const titleSchema = {
  jsonSchema: { type: "object", properties: { title: { type: "string" } }, required: ["title"] },
  validator: z.object({ title: z.string() }),
};

beforeEach(() => {
  vi.stubGlobal("fetch", fetchMock);
});

afterEach(() => {
  fetchMock.mockReset();
  vi.unstubAllGlobals();
});

// ---------------------------------------------------------------------------
// Gemini
// ---------------------------------------------------------------------------

describe("gemini adapter", () => {
  const adapter = createGeminiAdapter();

  it("sends generateContent and normalizes the reply", async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        candidates: [{ content: { parts: [{ text: "Hello" }, { text: " world" }] }, finishReason: "STOP" }],
        usageMetadata: { promptTokenCount: 12, candidatesTokenCount: 3 },
        modelVersion: "gemini-2.0-flash-001",
      }),
    );

    const response = await adapter.generate(
      makeRequest({ systemPrompt: "Be brief" }),
      context("gemini-2.0-flash-001"),
    );

    expect(response).toMatchObject({
      payload: "Hello world",
      text: "Hello world",
      tokensIn: 12,
      tokensOut: 3,
      provider: "gemini",
      model: "gemini-2.0-flash-001",
      usageEstimated: false,
    });

    const call = lastCall();
    expect(call.url).toBe(
      "https://generativelanguage.googleapis.com/v1beta/models/gemini-2.0-flash-001:generateContent",
    );
    expect(call.headers.get("x-goog-api-key")).toBe("test-secret");
    expect(call.body).toEqual({
      contents: [{ role: "user", parts: [{ text: "Say hello there" }] }],
      systemInstruction: { parts: [{ text: "Be brief" }] },
      generationConfig: { temperature: 0.7, maxOutputTokens: 256, topP: 0.9 },
    });
  });

  it("estimates usage when the backend omits it", async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ candidates: [{ content: { parts: [{ text: "Hello world" }] } }] }),
    );

    const response = await adapter.generate(makeRequest(), context("gemini-pro"));
    expect(response.tokensIn).toBe(3);
    expect(response.tokensOut).toBe(2);
    expect(response.usageEstimated).toBe(true);
    expect(response.model).toBe("gemini-pro");
  });

  it("asks for JSON and validates structured replies", async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ candidates: [{ content: { parts: [{ text: '{"title":"Hi"}' }] } }] }),
    );

    const response = await adapter.generate(makeRequest({ schema: titleSchema }), context("gemini-pro"));
    expect(response.payload).toEqual({ title: "Hi" });
    const body = lastCall().body;
    expect(body).toMatchObject({ generationConfig: { responseMimeType: "application/json" } });
  });

  it("fails with AuthError before calling out when the key is missing", async () => {
    const error = await failure(
      adapter.generate(makeRequest(), context("gemini-pro", { credential: () => undefined })),
    );
    expect(isProviderErrorKind(error, "AuthError")).toBe(true);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("maps an invalid key on 400 to AuthError", async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ error: { message: "API key not valid. Please pass a valid API key." } }, 400),
    );
    const error = await failure(adapter.generate(makeRequest(), context("gemini-pro")));
    expect(isProviderErrorKind(error, "AuthError")).toBe(true);
  });

  it("maps a blocked prompt to ContentPolicyViolation", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ promptFeedback: { blockReason: "SAFETY" } }));
    const error = await failure(adapter.generate(makeRequest(), context("gemini-pro")));
    expect(isProviderErrorKind(error, "ContentPolicyViolation")).toBe(true);
    if (isProviderError(error)) expect(error.message).toBe("Prompt blocked: SAFETY");
  });

  it("maps a safety finish reason to ContentPolicyViolation", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ candidates: [{ finishReason: "SAFETY" }] }));
    const error = await failure(adapter.generate(makeRequest(), context("gemini-pro")));
    expect(isProviderErrorKind(error, "ContentPolicyViolation")).toBe(true);
  });

  it("maps an empty reply to UnknownError", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ candidates: [{ content: { parts: [] } }] }));
    const error = await failure(adapter.generate(makeRequest(), context("gemini-pro")));
    expect(isProviderErrorKind(error, "UnknownError")).toBe(true);
  });

  it.each([
    [400, "", "InvalidRequest"],
    [403, "", "AuthError"],
    [404, "", "UnknownError"],
    [429, "", "RateLimited"],
    [503, "", "TransientServerError"],
    [504, "", "Timeout"],
  ] as const)("classifies %i as %s", (status, body, kind) => {
    expect(classifyGemini(status, body)).toBe(kind);
  });
});

// ---------------------------------------------------------------------------
// OpenRouter
// ---------------------------------------------------------------------------

describe("openrouter adapter", () => {
  it("sends a chat completion with attribution headers", async () => {
    const adapter = createOpenRouterAdapter({ httpReferer: "https://app.example", title: "Quillgate" });
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        model: "openai/gpt-4-turbo",
        choices: [{ message: { content: "Hi!" }, finish_reason: "stop" }],
        usage: { prompt_tokens: 20, completion_tokens: 2 },
      }),
    );

    const response = await adapter.generate(
      makeRequest({ systemPrompt: "Be brief" }),
      context("openai/gpt-4-turbo"),
    );
    expect(response).toMatchObject({
      payload: "Hi!",
      tokensIn: 20,
      tokensOut: 2,
      provider: "openrouter",
      usageEstimated: false,
    });

    const call = lastCall();
    expect(call.url).toBe("https://openrouter.ai/api/v1/chat/completions");
    expect(call.headers.get("authorization")).toBe("Bearer test-secret");
    expect(call.headers.get("http-referer")).toBe("https://app.example");
    expect(call.headers.get("x-title")).toBe("Quillgate");
    expect(call.body).toEqual({
      model: "openai/gpt-4-turbo",
      messages: [
        { role: "system", content: "Be brief" },
        { role: "user", content: "Say hello there" },
      ],
      temperature: 0.7,
      max_tokens: 256,
    });
  });

  it("omits attribution headers when unset", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ choices: [{ message: { content: "Hi" } }] }));
    await createOpenRouterAdapter().generate(makeRequest(), context("meta/llama"));
    expect(lastCall().headers.has("http-referer")).toBe(false);
  });

  it("requests JSON mode for openai models only", async () => {
    const adapter = createOpenRouterAdapter();
    fetchMock.mockImplementation(() =>
      Promise.resolve(jsonResponse({ choices: [{ message: { content: '{"title":"x"}' } }] })),
    );

    await adapter.generate(makeRequest({ schema: titleSchema }), context("openai/gpt-4o"));
    expect(lastCall().body).toMatchObject({ response_format: { type: "json_object" } });

    await adapter.generate(makeRequest({ schema: titleSchema }), context("meta/llama"));
    expect(lastCall().body).not.toHaveProperty("response_format");
  });

  it("maps a content filter stop to ContentPolicyViolation", async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ choices: [{ message: { content: "" }, finish_reason: "content_filter" }] }),
    );
    const error = await failure(createOpenRouterAdapter().generate(makeRequest(), context("m")));
    expect(isProviderErrorKind(error, "ContentPolicyViolation")).toBe(true);
  });

  it("lists models", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ data: [{ id: "openai/gpt-4o" }, { id: "meta/llama" }] }));
    const adapter = createOpenRouterAdapter();
    await expect(adapter.listModels?.({ credential: allKeys })).resolves.toEqual(["openai/gpt-4o", "meta/llama"]);
    expect(lastCall().url).toBe("https://openrouter.ai/api/v1/models");
  });

  it.each([
    [402, "", "AuthError"],
    [403, '{"error":{"message":"Input was flagged by moderation"}}', "ContentPolicyViolation"],
    [403, "", "AuthError"],
    [408, "", "Timeout"],
    [502, "", "TransientServerError"],
    [500, "", "TransientServerError"],
  ] as const)("classifies %i %s as %s", (status, body, kind) => {
    expect(classifyOpenRouter(status, body)).toBe(kind);
  });
});

// ---------------------------------------------------------------------------
// Hugging Face
// ---------------------------------------------------------------------------

describe("huggingface adapter", () => {
  const adapter = createHuggingFaceAdapter();

  it("estimates usage when the router omits it", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ choices: [{ message: { content: "Hello world" } }] }));

    const response = await adapter.generate(
      makeRequest({ systemPrompt: "sys" }),
      context("openai/gpt-oss-120b:groq"),
    );
    expect(response).toMatchObject({
      text: "Hello world",
      tokensIn: 5,
      tokensOut: 2,
      usageEstimated: true,
      model: "openai/gpt-oss-120b:groq",
    });
    expect(lastCall().url).toBe("https://router.huggingface.co/v1/chat/completions");
  });

  it("fails with AuthError when HF_TOKEN is missing", async () => {
    const error = await failure(adapter.generate(makeRequest(), context("m", { credential: () => undefined })));
    expect(isProviderErrorKind(error, "AuthError")).toBe(true);
    if (isProviderError(error)) expect(error.message).toBe("HF_TOKEN is not set");
  });

  it("maps 503 to TransientServerError with the upstream message", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ error: "Model is currently loading" }, 503));
    const error = await failure(adapter.generate(makeRequest(), context("m")));
    expect(isProviderErrorKind(error, "TransientServerError")).toBe(true);
    if (isProviderError(error)) expect(error.message).toBe("HTTP 503: Model is currently loading");
  });

  it("cannot list models", () => {
    expect(adapter.listModels).toBeUndefined();
  });

  it.each([
    [422, "Input flagged as unsafe", "ContentPolicyViolation"],
    [400, "bad parameter", "InvalidRequest"],
    [504, "", "Timeout"],
    [429, "", "RateLimited"],
  ] as const)("classifies %i %s as %s", (status, body, kind) => {
    expect(classifyHuggingFace(status, body)).toBe(kind);
  });
});

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

describe("createProviderAdapter", () => {
  it("builds every built-in adapter", () => {
    expect([...createBuiltinAdapters().keys()]).toEqual(["gemini", "openrouter", "huggingface"]);
  });

  it("rejects unknown providers", () => {
    expect(() => createProviderAdapter("mistral")).toThrow(
      'Unknown provider: "mistral". Supported: gemini, openrouter, huggingface',
    );
  });
});
