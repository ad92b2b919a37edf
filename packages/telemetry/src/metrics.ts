/**
 * OTel metrics for provider routing.
 *
 * Lazily initialized: meters are only created on first access.
 * When no meter provider is registered, these return no-op instruments.
 */

import type { Counter, Histogram } from "@opentelemetry/api";
import { metrics } from "@opentelemetry/api";

const METER_NAME = "quillgate";

let _providerAttempts: Counter | undefined;
let _providerLatency: Histogram | undefined;
let _tokenUsage: Counter | undefined;
let _costTotal: Counter | undefined;

/**
 * Counter of provider attempts, labelled by provider and outcome.
 */
export function getProviderAttempts(): Counter {
  if (_providerAttempts === undefined) {
    _providerAttempts = metrics.getMeter(METER_NAME).createCounter("quillgate.provider.attempts", {
      description: "Total provider attempts",
    });
  }
  return _providerAttempts;
}

/**
 * Histogram of attempt latency in milliseconds.
 */
export function getProviderLatency(): Histogram {
  if (_providerLatency === undefined) {
    _providerLatency = metrics.getMeter(METER_NAME).createHistogram("quillgate.provider.latency_ms", {
      description: "Provider attempt latency in milliseconds",
      unit: "ms",
    });
  }
  return _providerLatency;
}

export function getTokenUsage(): Counter {
  if (_tokenUsage === undefined) {
    _tokenUsage = metrics.getMeter(METER_NAME).createCounter("quillgate.tokens.total", {
      description: "Total tokens consumed",
    });
  }
  return _tokenUsage;
}

/**
 * Counter of estimated spend in USD across all providers.
 */
export function getCostTotal(): Counter {
  if (_costTotal === undefined) {
    _costTotal = metrics.getMeter(METER_NAME).createCounter("quillgate.cost.total", {
      description: "Total estimated cost",
      unit: "USD",
    });
  }
  return _costTotal;
}
