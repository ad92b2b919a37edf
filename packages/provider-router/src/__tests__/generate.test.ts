import { GenerationConfigurationError } from "@quillgate/errors";
import { InMemoryCredentials, InMemoryUsageStore, MockAdapter } from "@quillgate/test-utils";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { createGenerationStack, DEFAULT_MAX_TOKENS, DEFAULT_TEMPERATURE } from "../generate.js";
import { buildContentWriterPrompt, DEFAULT_SYSTEM_PROMPT } from "../system-prompt.js";

function mockAdapters(): { gemini: MockAdapter; openrouter: MockAdapter; huggingface: MockAdapter } {
  return {
    gemini: MockAdapter.always("gemini", { text: "from gemini" }),
    openrouter: MockAdapter.always("openrouter", { text: "from openrouter" }),
    huggingface: MockAdapter.always("huggingface", { text: "from huggingface" }),
  };
}

function stack(options: { keys?: Record<string, string>; settings?: unknown; store?: InMemoryUsageStore } = {}) {
  const adapters = mockAdapters();
  const credentials = new InMemoryCredentials(
    options.keys ?? { GEMINI_API_KEY: "test-secret", OPENROUTER_API_KEY: "test-secret", HF_TOKEN: "test-secret" },
  );
  const built = createGenerationStack({
    credentials: credentials.source,
    adapters: new Map(Object.entries(adapters)),
    settings: options.settings ?? {},
    random: () => 0,
    sleep: async () => undefined,
    ...(options.store ? { store: options.store } : {}),
  });
  return { ...built, adapters, credentials };
}

describe("generate", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "info").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns text from the highest-priority configured provider", async () => {
    const { generate, adapters } = stack();

    const text: string = await generate({ prompt: "Write about tides", userId: "user-1" });

    expect(text).toBe("from gemini");
    const call = adapters.gemini.lastCall;
    expect(call?.request).toMatchObject({
      prompt: "Write about tides",
      userId: "user-1",
      systemPrompt: DEFAULT_SYSTEM_PROMPT,
      temperature: DEFAULT_TEMPERATURE,
      maxTokens: DEFAULT_MAX_TOKENS,
    });
    expect(call?.request.requestId).toMatch(/^[0-9a-f-]{36}$/);
    expect(call?.context.model).toBe("gemini-2.0-flash-001");
  });

  it("uses the requested provider alias first", async () => {
    const { generate, adapters } = stack();
    await expect(generate({ prompt: "Hi", userId: "u", provider: "HF" })).resolves.toBe("from huggingface");
    expect(adapters.gemini.callCount).toBe(0);
  });

  it("falls back to the configured provider preference", async () => {
    const { generate } = stack({ settings: { providerOverride: "or" } });
    await expect(generate({ prompt: "Hi", userId: "u" })).resolves.toBe("from openrouter");
  });

  it("skips an unconfigured preferred provider", async () => {
    const { generate, tracker } = stack({ keys: { HF_TOKEN: "test-secret" } });
    await expect(generate({ prompt: "Hi", userId: "u", provider: "gemini" })).resolves.toBe("from huggingface");
    expect(tracker.records().map((r) => `${r.provider}:${r.outcomeKind}`)).toEqual([
      "gemini:skipped",
      "huggingface:success",
    ]);
  });

  it("passes model, sampling and request id through", async () => {
    const { generate, adapters } = stack();
    await generate({
      prompt: "Hi",
      userId: "u",
      model: "gemini-1.5-pro",
      temperature: 0.2,
      maxTokens: 50,
      systemPrompt: "Be terse",
      requestId: "req-fixed",
    });
    expect(adapters.gemini.lastCall?.context.model).toBe("gemini-1.5-pro");
    expect(adapters.gemini.lastCall?.request).toMatchObject({
      requestId: "req-fixed",
      temperature: 0.2,
      maxTokens: 50,
      systemPrompt: "Be terse",
    });
  });

  it("returns the validated value for structured requests", async () => {
    const adapters = mockAdapters();
    const schema = {
      jsonSchema: { type: "object", properties: { title: { type: "string" } } },
      validator: z.object({ title: z.string() }),
    };
    const structured = new MockAdapter("gemini", [{ payload: { title: "Tides" }, text: '{"title":"Tides"}' }]);
    const { generate: generateStructured } = createGenerationStack({
      credentials: new InMemoryCredentials({ GEMINI_API_KEY: "test-secret" }).source,
      adapters: new Map([
        ["gemini", structured],
        ["openrouter", adapters.openrouter],
        ["huggingface", adapters.huggingface],
      ]),
    });

    const result: { title: string } = await generateStructured({ prompt: "Title?", userId: "u", schema });

    expect(result).toEqual({ title: "Tides" });
    expect(structured.lastCall?.request.schema).toBe(schema);
  });

  it("raises a configuration error when no credentials are set", async () => {
    const { generate } = stack({ keys: {} });
    await expect(generate({ prompt: "Hi", userId: "u" })).rejects.toThrow(GenerationConfigurationError);
  });

  it("applies registry settings from configuration", () => {
    const { registry, settings } = stack({
      settings: { priorityOrder: ["huggingface"], modelOverrides: { gemini: "gemini-1.5-pro" } },
    });
    expect(registry.names()).toEqual(["huggingface", "gemini", "openrouter"]);
    expect(registry.get("gemini")?.defaultModel).toBe("gemini-1.5-pro");
    expect(settings.retry.maxAttempts).toBe(3);
  });

  it("writes usage to the configured store", async () => {
    const store = new InMemoryUsageStore();
    const { generate } = stack({ store });
    await generate({ prompt: "Hi", userId: "user-9", requestId: "req-9" });
    expect(store.records).toMatchObject([{ requestId: "req-9", userId: "user-9", outcomeKind: "success" }]);
  });
});

describe("buildContentWriterPrompt", () => {
  it("embeds the style guidelines", () => {
    const prompt = buildContentWriterPrompt({ tone: "Friendly", targetLength: 500 });
    expect(prompt).toContain("- Tone: Friendly\n");
    expect(prompt).toContain("- Target Audience: Professional\n");
    expect(prompt).toContain("- Target Length: 500 words\n");
  });

  it("defaults to the professional informational style", () => {
    expect(DEFAULT_SYSTEM_PROMPT).toContain("- Output Format: markdown\n");
  });
});
