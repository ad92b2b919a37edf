import { GenerationConfigurationError } from "@quillgate/errors";
import type { AdapterConfig, ProviderAdapter } from "../types.js";
import { createGeminiAdapter } from "./gemini.js";
import { createHuggingFaceAdapter } from "./huggingface.js";
import { createOpenRouterAdapter, type OpenRouterConfig } from "./openrouter.js";

export { createGeminiAdapter, classifyGemini } from "./gemini.js";
export { classifyHttpStatus, describeErrorBody, parseRetryAfter, requestJson } from "./http.js";
export type { JsonRequest, StatusClassifier } from "./http.js";
export { classifyHuggingFace, createHuggingFaceAdapter } from "./huggingface.js";
export { createOpenAICompatibleAdapter } from "./openai-compatible.js";
export type { OpenAICompatibleOptions } from "./openai-compatible.js";
export { classifyOpenRouter, createOpenRouterAdapter } from "./openrouter.js";
export type { OpenRouterConfig } from "./openrouter.js";
export { fromJsonSchema, stripCodeFences, withSchemaInstruction } from "./structured.js";
export { estimateTokens } from "./tokens.js";

const SUPPORTED = ["gemini", "openrouter", "huggingface"] as const;

export interface BuiltinAdapterConfig extends AdapterConfig {
  readonly openrouter?: Pick<OpenRouterConfig, "httpReferer" | "title">;
}

/**
 * Create the adapter for a built-in provider name.
 */
export function createProviderAdapter(name: string, config: BuiltinAdapterConfig = {}): ProviderAdapter {
  const shared: AdapterConfig = config.timeoutMs !== undefined ? { timeoutMs: config.timeoutMs } : {};
  switch (name) {
    case "gemini":
      return createGeminiAdapter(shared);
    case "openrouter":
      return createOpenRouterAdapter({ ...shared, ...config.openrouter });
    case "huggingface":
      return createHuggingFaceAdapter(shared);
    default:
      throw new GenerationConfigurationError(
        `Unknown provider: "${name}". Supported: ${SUPPORTED.join(", ")}`,
        SUPPORTED,
      );
  }
}

/** Adapters for every built-in provider, keyed by name */
export function createBuiltinAdapters(
  config: BuiltinAdapterConfig = {},
): ReadonlyMap<string, ProviderAdapter> {
  return new Map(
    SUPPORTED.map((name): [string, ProviderAdapter] => [name, createProviderAdapter(name, config)]),
  );
}
