/**
 * OpenRouter adapter: OpenAI-compatible gateway to many hosted models.
 */

import type { ErrorKind } from "@quillgate/errors";
import type { AdapterConfig, ProviderAdapter } from "../types.js";
import { classifyHttpStatus } from "./http.js";
import { createOpenAICompatibleAdapter } from "./openai-compatible.js";

const OPENROUTER_BASE_URL = "https://openrouter.ai/api/v1";

export interface OpenRouterConfig extends AdapterConfig {
  /** Passed through as the HTTP-Referer attribution header */
  readonly httpReferer?: string;
  /** Passed through as the X-Title attribution header */
  readonly title?: string;
}

export function classifyOpenRouter(status: number, body: string): ErrorKind {
  const lower = body.toLowerCase();
  if (status === 401) return "AuthError";
  // Out of credits: this key cannot serve anything until topped up
  if (status === 402) return "AuthError";
  if (status === 403) {
    if (lower.includes("moderation") || lower.includes("flagged")) return "ContentPolicyViolation";
    return "AuthError";
  }
  if (status === 408) return "Timeout";
  if (status === 429) return "RateLimited";
  if (status === 400) return "InvalidRequest";
  if (status === 502 || status === 503) return "TransientServerError";
  return classifyHttpStatus(status);
}

export function createOpenRouterAdapter(config: OpenRouterConfig = {}): ProviderAdapter {
  const headers: Record<string, string> = {};
  if (config.httpReferer) headers["HTTP-Referer"] = config.httpReferer;
  if (config.title) headers["X-Title"] = config.title;

  return createOpenAICompatibleAdapter({
    id: "openrouter",
    baseUrl: config.baseUrl ?? OPENROUTER_BASE_URL,
    credentialId: "OPENROUTER_API_KEY",
    classify: classifyOpenRouter,
    headers,
    ...(config.timeoutMs !== undefined ? { timeoutMs: config.timeoutMs } : {}),
    supportsJsonMode: (model) => model.startsWith("openai/"),
    listModels: true,
  });
}
