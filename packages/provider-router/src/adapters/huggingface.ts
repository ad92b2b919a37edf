/**
 * Hugging Face adapter: OpenAI-compatible inference router.
 * Usage is frequently omitted by routed backends and then estimated.
 */

import type { ErrorKind } from "@quillgate/errors";
import type { AdapterConfig, ProviderAdapter } from "../types.js";
import { classifyHttpStatus } from "./http.js";
import { createOpenAICompatibleAdapter } from "./openai-compatible.js";

const HUGGINGFACE_BASE_URL = "https://router.huggingface.co/v1";

export function classifyHuggingFace(status: number, body: string): ErrorKind {
  if (status === 401 || status === 403) return "AuthError";
  if (status === 429) return "RateLimited";
  // 503 while a model is loading
  if (status === 503) return "TransientServerError";
  if (status === 504) return "Timeout";
  if (status === 400 || status === 422) {
    const lower = body.toLowerCase();
    if (lower.includes("content policy") || lower.includes("unsafe")) return "ContentPolicyViolation";
    return "InvalidRequest";
  }
  return classifyHttpStatus(status);
}

export function createHuggingFaceAdapter(config: AdapterConfig = {}): ProviderAdapter {
  return createOpenAICompatibleAdapter({
    id: "huggingface",
    baseUrl: config.baseUrl ?? HUGGINGFACE_BASE_URL,
    credentialId: "HF_TOKEN",
    classify: classifyHuggingFace,
    ...(config.timeoutMs !== undefined ? { timeoutMs: config.timeoutMs } : {}),
  });
}
