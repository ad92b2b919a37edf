/**
 * Gemini adapter: Google Generative Language `generateContent` REST API.
 */

import { createProviderError, type ErrorKind } from "@quillgate/errors";
import { z } from "zod";
import type {
  AdapterConfig,
  AdapterContext,
  GenerationRequest,
  NormalizedResponse,
  ProviderAdapter,
} from "../types.js";
import { classifyHttpStatus, requestJson } from "./http.js";
import { decodePayload, effectivePrompt } from "./structured.js";
import { estimateTokens } from "./tokens.js";

const GEMINI_BASE_URL = "https://generativelanguage.googleapis.com/v1beta";
const GEMINI_TOP_P = 0.9;

/** Finish reasons that mean the output was withheld on policy grounds */
const BLOCKED_FINISH_REASONS: ReadonlySet<string> = new Set([
  "SAFETY",
  "BLOCKLIST",
  "PROHIBITED_CONTENT",
  "SPII",
]);

const GenerateContentSchema = z
  .object({
    candidates: z
      .array(
        z
          .object({
            content: z
              .object({ parts: z.array(z.object({ text: z.string().optional() }).passthrough()).optional() })
              .passthrough()
              .optional(),
            finishReason: z.string().optional(),
          })
          .passthrough(),
      )
      .optional(),
    promptFeedback: z.object({ blockReason: z.string().optional() }).passthrough().optional(),
    usageMetadata: z
      .object({
        promptTokenCount: z.number().optional(),
        candidatesTokenCount: z.number().optional(),
      })
      .passthrough()
      .optional(),
    modelVersion: z.string().optional(),
  })
  .passthrough();

export function classifyGemini(status: number, body: string): ErrorKind {
  if (status === 400) {
    const lower = body.toLowerCase();
    if (lower.includes("api_key_invalid") || lower.includes("api key not valid")) return "AuthError";
    return "InvalidRequest";
  }
  if (status === 401 || status === 403) return "AuthError";
  if (status === 404) return "UnknownError";
  if (status === 429) return "RateLimited";
  if (status === 500 || status === 503) return "TransientServerError";
  if (status === 504) return "Timeout";
  return classifyHttpStatus(status);
}

export function createGeminiAdapter(config: AdapterConfig = {}): ProviderAdapter {
  const baseUrl = config.baseUrl ?? GEMINI_BASE_URL;
  const id = "gemini";

  return {
    id,

    async generate(request: GenerationRequest, context: AdapterContext): Promise<NormalizedResponse> {
      const apiKey = context.credential("GEMINI_API_KEY");
      if (apiKey === undefined) {
        throw createProviderError("AuthError", id, "GEMINI_API_KEY is not set");
      }

      const prompt = effectivePrompt(request);
      const body = {
        contents: [{ role: "user", parts: [{ text: prompt }] }],
        ...(request.systemPrompt
          ? { systemInstruction: { parts: [{ text: request.systemPrompt }] } }
          : {}),
        generationConfig: {
          temperature: request.temperature,
          maxOutputTokens: request.maxTokens,
          topP: GEMINI_TOP_P,
          ...(request.schema ? { responseMimeType: "application/json" } : {}),
        },
      };

      const startTime = Date.now();
      const raw = await requestJson({
        providerId: id,
        url: `${baseUrl}/models/${encodeURIComponent(context.model)}:generateContent`,
        init: {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
            "x-goog-api-key": apiKey,
          },
          body: JSON.stringify(body),
        },
        classify: classifyGemini,
        ...(config.timeoutMs !== undefined ? { timeoutMs: config.timeoutMs } : {}),
        ...(context.signal ? { signal: context.signal } : {}),
      });
      const latencyMs = Date.now() - startTime;

      const parsed = GenerateContentSchema.safeParse(raw);
      if (!parsed.success) {
        throw createProviderError("UnknownError", id, "Unexpected generateContent response shape");
      }

      const blockReason = parsed.data.promptFeedback?.blockReason;
      if (blockReason !== undefined) {
        throw createProviderError("ContentPolicyViolation", id, `Prompt blocked: ${blockReason}`);
      }

      const candidate = parsed.data.candidates?.[0];
      const finishReason = candidate?.finishReason;
      if (finishReason !== undefined && BLOCKED_FINISH_REASONS.has(finishReason)) {
        throw createProviderError("ContentPolicyViolation", id, `Response blocked: ${finishReason}`);
      }

      const text = (candidate?.content?.parts ?? []).map((p) => p.text ?? "").join("");
      if (text.trim() === "") {
        throw createProviderError("UnknownError", id, "No content in response");
      }

      const payload = decodePayload(id, request, text);

      const usage = parsed.data.usageMetadata;
      const reported =
        usage?.promptTokenCount !== undefined && usage.candidatesTokenCount !== undefined
          ? { tokensIn: usage.promptTokenCount, tokensOut: usage.candidatesTokenCount }
          : undefined;

      return {
        payload,
        text,
        tokensIn:
          reported?.tokensIn ?? estimateTokens(`${request.systemPrompt ?? ""} ${prompt}`),
        tokensOut: reported?.tokensOut ?? estimateTokens(text),
        latencyMs,
        provider: id,
        model: parsed.data.modelVersion ?? context.model,
        usageEstimated: reported === undefined,
      };
    },
  };
}
