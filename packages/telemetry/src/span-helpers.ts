/**
 * Span helper for routing code.
 *
 * Runs a function inside an active span, records the outcome on it and
 * always ends it. The span is handed to the function so it can attach
 * attributes that are only known afterwards (served model, token counts).
 */

import { type Span, SpanStatusCode, trace } from "@opentelemetry/api";
import type { SpanAttributes } from "./types.js";

const TRACER_NAME = "quillgate";

/**
 * Execute an async function within a named span.
 *
 * Failures are recorded as exceptions with ERROR status and an `error.type`
 * attribute holding the error's name, then re-thrown. Without a registered
 * tracer provider the span is a no-op.
 *
 * @param name - Span name (e.g., "provider_router.attempt")
 */
export async function withSpan<T>(
  name: string,
  attributes: SpanAttributes,
  fn: (span: Span) => Promise<T>,
): Promise<T> {
  const tracer = trace.getTracer(TRACER_NAME);
  return tracer.startActiveSpan(name, { attributes }, async (span) => {
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      if (error instanceof Error) {
        span.recordException(error);
        span.setAttribute("error.type", error.name);
      }
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : String(error),
      });
      throw error;
    } finally {
      span.end();
    }
  });
}
