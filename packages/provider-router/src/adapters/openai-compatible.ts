/**
 * Adapter core for OpenAI-compatible chat completion endpoints.
 * OpenRouter and the Hugging Face router both speak this protocol.
 */

import { createProviderError } from "@quillgate/errors";
import { z } from "zod";
import type {
  AdapterContext,
  GenerationRequest,
  NormalizedResponse,
  ProviderAdapter,
} from "../types.js";
import { requestJson, type StatusClassifier } from "./http.js";
import { decodePayload, effectivePrompt } from "./structured.js";
import { estimateTokens } from "./tokens.js";

const ChatCompletionSchema = z
  .object({
    model: z.string().optional(),
    choices: z.array(
      z
        .object({
          message: z.object({ content: z.string().nullish() }).passthrough().optional(),
          finish_reason: z.string().nullish(),
        })
        .passthrough(),
    ),
    usage: z
      .object({
        prompt_tokens: z.number().optional(),
        completion_tokens: z.number().optional(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

const ModelListSchema = z.object({
  data: z.array(z.object({ id: z.string() }).passthrough()),
});

export interface OpenAICompatibleOptions {
  readonly id: string;
  readonly baseUrl: string;
  readonly credentialId: string;
  readonly classify: StatusClassifier;
  readonly timeoutMs?: number;
  /** Sent with every request, unchanged */
  readonly headers?: Readonly<Record<string, string>>;
  readonly topP?: number;
  /** Whether to ask for `response_format: json_object` on structured requests */
  readonly supportsJsonMode?: (model: string) => boolean;
  /** Expose GET /models as listModels() */
  readonly listModels?: boolean;
}

interface Message {
  readonly role: "system" | "user";
  readonly content: string;
}

function buildMessages(request: GenerationRequest): Message[] {
  const messages: Message[] = [];
  if (request.systemPrompt) {
    messages.push({ role: "system", content: request.systemPrompt });
  }
  messages.push({ role: "user", content: effectivePrompt(request) });
  return messages;
}

export function createOpenAICompatibleAdapter(options: OpenAICompatibleOptions): ProviderAdapter {
  const { id, baseUrl, credentialId, classify } = options;

  function authHeaders(context: Omit<AdapterContext, "model">): Record<string, string> {
    const apiKey = context.credential(credentialId);
    if (apiKey === undefined) {
      throw createProviderError("AuthError", id, `${credentialId} is not set`);
    }
    return {
      Authorization: `Bearer ${apiKey}`,
      ...options.headers,
    };
  }

  const adapter: ProviderAdapter = {
    id,

    async generate(request: GenerationRequest, context: AdapterContext): Promise<NormalizedResponse> {
      const headers = authHeaders(context);
      const messages = buildMessages(request);
      const jsonMode = request.schema !== undefined && (options.supportsJsonMode?.(context.model) ?? false);

      const body = {
        model: context.model,
        messages,
        temperature: request.temperature,
        max_tokens: request.maxTokens,
        ...(options.topP !== undefined ? { top_p: options.topP } : {}),
        ...(jsonMode ? { response_format: { type: "json_object" } } : {}),
      };

      const startTime = Date.now();
      const raw = await requestJson({
        providerId: id,
        url: `${baseUrl}/chat/completions`,
        init: {
          method: "POST",
          headers: { ...headers, "Content-Type": "application/json" },
          body: JSON.stringify(body),
        },
        classify,
        ...(options.timeoutMs !== undefined ? { timeoutMs: options.timeoutMs } : {}),
        ...(context.signal ? { signal: context.signal } : {}),
      });
      const latencyMs = Date.now() - startTime;

      const parsed = ChatCompletionSchema.safeParse(raw);
      if (!parsed.success) {
        throw createProviderError("UnknownError", id, "Unexpected chat completion response shape");
      }

      const choice = parsed.data.choices[0];
      if (choice?.finish_reason === "content_filter") {
        throw createProviderError("ContentPolicyViolation", id, "Response blocked by content filter");
      }

      const text = choice?.message?.content;
      if (text === undefined || text === null || text.trim() === "") {
        throw createProviderError("UnknownError", id, "No content in response");
      }

      const payload = decodePayload(id, request, text);

      const usage = parsed.data.usage;
      const reported =
        usage?.prompt_tokens !== undefined && usage.completion_tokens !== undefined
          ? { tokensIn: usage.prompt_tokens, tokensOut: usage.completion_tokens }
          : undefined;

      return {
        payload,
        text,
        tokensIn: reported?.tokensIn ?? estimateTokens(messages.map((m) => m.content).join(" ")),
        tokensOut: reported?.tokensOut ?? estimateTokens(text),
        latencyMs,
        provider: id,
        model: parsed.data.model ?? context.model,
        usageEstimated: reported === undefined,
      };
    },
  };

  if (!options.listModels) return adapter;

  return {
    ...adapter,
    async listModels(context: Omit<AdapterContext, "model">): Promise<readonly string[]> {
      const raw = await requestJson({
        providerId: id,
        url: `${baseUrl}/models`,
        init: { method: "GET", headers: authHeaders(context) },
        classify,
        ...(options.timeoutMs !== undefined ? { timeoutMs: options.timeoutMs } : {}),
        ...(context.signal ? { signal: context.signal } : {}),
      });
      const parsed = ModelListSchema.safeParse(raw);
      if (!parsed.success) {
        throw createProviderError("UnknownError", id, "Unexpected model list response shape");
      }
      return parsed.data.data.map((m) => m.id);
    },
  };
}
