/**
 * Shared HTTP utility for adapters: fetch + timeout + status translation.
 *
 * Every failure leaves this module as a ProviderError, except an abort
 * raised by the caller's own signal, which is rethrown untouched so the
 * router can tell cancellation from an upstream timeout.
 */

import {
  createProviderError,
  type ErrorKind,
  isProviderError,
  isServerError,
} from "@quillgate/errors";
import { DEFAULT_REQUEST_TIMEOUT_MS } from "../types.js";

/** Maps a non-2xx upstream reply to the routing taxonomy */
export type StatusClassifier = (status: number, body: string) => ErrorKind;

export interface JsonRequest {
  readonly providerId: string;
  readonly url: string;
  readonly init: RequestInit;
  readonly classify: StatusClassifier;
  readonly timeoutMs?: number;
  readonly signal?: AbortSignal;
}

/** Maximum allowed retry-after in ms (5 minutes) */
const MAX_RETRY_AFTER_MS = 300_000;

/** Longest slice of an upstream error body kept in messages */
const MAX_BODY_EXCERPT = 300;

/**
 * Parse a Retry-After header value (delta-seconds or HTTP-date).
 */
export function parseRetryAfter(value: string | null | undefined): number | undefined {
  if (value === null || value === undefined || value.trim() === "") return undefined;

  const seconds = Number(value);
  if (!Number.isNaN(seconds) && seconds >= 0) {
    return Math.min(seconds * 1000, MAX_RETRY_AFTER_MS);
  }

  const date = Date.parse(value);
  if (!Number.isNaN(date)) {
    const delayMs = Math.max(0, date - Date.now());
    return Math.min(delayMs, MAX_RETRY_AFTER_MS);
  }

  return undefined;
}

/**
 * Generic HTTP status fallback shared by the per-provider tables.
 */
export function classifyHttpStatus(status: number): ErrorKind {
  if (status === 401 || status === 403) return "AuthError";
  if (status === 429) return "RateLimited";
  if (status === 408 || status === 504) return "Timeout";
  if (status === 400 || status === 413 || status === 422) return "InvalidRequest";
  if (isServerError(status)) return "TransientServerError";
  return "UnknownError";
}

/**
 * Pull a human-readable message out of an upstream error body.
 * Understands `{ error: { message } }`, `{ error: "..." }` and `{ message }`.
 */
export function describeErrorBody(body: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return body.slice(0, MAX_BODY_EXCERPT);
  }

  if (typeof parsed === "object" && parsed !== null) {
    if ("error" in parsed) {
      const err = parsed.error;
      if (typeof err === "string") return err;
      if (typeof err === "object" && err !== null && "message" in err && typeof err.message === "string") {
        return err.message;
      }
    }
    if ("message" in parsed && typeof parsed.message === "string") {
      return parsed.message;
    }
  }
  return body.slice(0, MAX_BODY_EXCERPT);
}

/**
 * Send a request and return the parsed JSON body.
 *
 * @throws ProviderError for upstream failures; the caller's abort reason when `signal` fires
 */
export async function requestJson(req: JsonRequest): Promise<unknown> {
  const { providerId, signal } = req;
  const timeoutMs = req.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  const controller = new AbortController();
  let timedOut = false;
  const timeout = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);

  // Link external signal to internal controller
  const onExternalAbort = () => controller.abort(signal?.reason);
  if (signal?.aborted) {
    controller.abort(signal.reason);
  } else {
    signal?.addEventListener("abort", onExternalAbort, { once: true });
  }

  try {
    const response = await fetch(req.url, {
      ...req.init,
      signal: controller.signal,
    });

    if (!response.ok) {
      const body = await response.text().catch(() => "");
      const kind = req.classify(response.status, body);
      throw createProviderError(
        kind,
        providerId,
        `HTTP ${response.status}: ${describeErrorBody(body)}`,
        {
          status: response.status,
          retryAfterMs: parseRetryAfter(response.headers.get("retry-after")),
        },
      );
    }

    const text = await response.text();
    try {
      return JSON.parse(text);
    } catch (error) {
      throw createProviderError("UnknownError", providerId, "Upstream returned a non-JSON body", {
        status: response.status,
        ...(error instanceof Error ? { cause: error } : {}),
      });
    }
  } catch (error) {
    if (isProviderError(error)) {
      throw error;
    }

    if (signal?.aborted) {
      throw error;
    }

    if (timedOut) {
      throw createProviderError("Timeout", providerId, `Request timed out after ${timeoutMs}ms`);
    }

    // fetch rejects with TypeError on connection-level failures
    if (error instanceof TypeError) {
      throw createProviderError("TransientServerError", providerId, `Network error: ${error.message}`, {
        cause: error,
      });
    }

    throw createProviderError(
      "UnknownError",
      providerId,
      error instanceof Error ? error.message : String(error),
      error instanceof Error ? { cause: error } : undefined,
    );
  } finally {
    clearTimeout(timeout);
    signal?.removeEventListener("abort", onExternalAbort);
  }
}
