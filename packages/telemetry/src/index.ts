/**
 * @quillgate/telemetry: OpenTelemetry tracing and metrics for provider routing.
 *
 * Public API:
 * - setupTelemetry() / shutdownTelemetry(): SDK lifecycle
 * - isTelemetryEnabled(): check OTEL_ENABLED env var
 * - withSpan(): DRY span creation helper
 * - getProviderAttempts() / getProviderLatency() / getTokenUsage() / getCostTotal(): OTel metrics
 *
 * Selective OTel API re-exports for advanced users.
 */

// Selective OTel re-exports for advanced users
export { context, SpanStatusCode, trace } from "@opentelemetry/api";
export { getCostTotal, getProviderAttempts, getProviderLatency, getTokenUsage } from "./metrics.js";
export { isTelemetryEnabled, setupTelemetry, shutdownTelemetry } from "./setup.js";
export { withSpan } from "./span-helpers.js";
export type { SpanAttributes, SpanAttributeValue, TelemetryConfig } from "./types.js";
