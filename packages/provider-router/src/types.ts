/**
 * Core types for @quillgate/provider-router
 *
 * Credential-aware routing of generation requests across upstream
 * language-model backends, with per-provider retry, failover and
 * usage accounting.
 */

import type { ErrorKind, SkippedProvider } from "@quillgate/errors";
import type { z } from "zod";

// ---------------------------------------------------------------------------
// Provider Registry
// ---------------------------------------------------------------------------

export type Capability = "text" | "structured";

/** Currency units per token */
export interface Pricing {
  readonly inRate: number;
  readonly outRate: number;
}

export interface ProviderDescriptor {
  readonly name: string;
  readonly requiredCredentials: ReadonlySet<string>;
  readonly capabilities: ReadonlySet<Capability>;
  readonly defaultModel: string;
  /** Lower rank is tried first */
  readonly priorityRank: number;
  readonly pricing: Pricing;
}

/** Plain-data form of a descriptor, before the registry validates and freezes it */
export interface ProviderDefinition {
  readonly name: string;
  readonly requiredCredentials: readonly string[];
  readonly capabilities: readonly Capability[];
  readonly defaultModel: string;
  readonly priorityRank: number;
  readonly pricing: Pricing;
}

export interface ProviderRegistry {
  get(name: string): ProviderDescriptor | undefined;
  has(name: string): boolean;
  /** Descriptors in ascending priority rank */
  list(): readonly ProviderDescriptor[];
  names(): readonly string[];
}

export interface RegistryOptions {
  /** Explicit ordering; listed names take ranks 1..n, the rest follow in their original order */
  readonly priorityOrder?: readonly string[];
  /** Per-provider replacement for the descriptor's default model */
  readonly modelOverrides?: Readonly<Record<string, string>>;
}

// ---------------------------------------------------------------------------
// Credentials
// ---------------------------------------------------------------------------

/** Live credential lookup; blank values count as missing */
export type CredentialSource = (credentialId: string) => string | undefined;

// ---------------------------------------------------------------------------
// Request / Response
// ---------------------------------------------------------------------------

/**
 * Structured output contract: `jsonSchema` is shown to the model,
 * `validator` checks the parsed reply.
 */
export interface ResponseSchema<T> {
  readonly jsonSchema: Readonly<Record<string, unknown>>;
  readonly validator: z.ZodType<T, z.ZodTypeDef, unknown>;
}

export interface GenerationRequest {
  readonly requestId: string;
  readonly userId: string;
  readonly prompt: string;
  readonly systemPrompt?: string;
  readonly schema?: ResponseSchema<unknown>;
  /**
   * Applies to the first provider of the chain only; ignored when
   * providerOverride names a provider that did not end up first.
   */
  readonly modelOverride?: string;
  /** Preferred provider; a priority hint, not a pin */
  readonly providerOverride?: string;
  readonly temperature: number;
  readonly maxTokens: number;
}

export interface NormalizedResponse {
  /** Reply text, or the validated structured value when the request had a schema */
  readonly payload: unknown;
  /** Raw reply text as returned upstream */
  readonly text: string;
  readonly tokensIn: number;
  readonly tokensOut: number;
  readonly latencyMs: number;
  readonly provider: string;
  readonly model: string;
  /** True when the backend omitted usage and tokens were approximated */
  readonly usageEstimated: boolean;
}

// ---------------------------------------------------------------------------
// Adapter Interface
// ---------------------------------------------------------------------------

export interface AdapterContext {
  /** Model resolved by the router for this attempt */
  readonly model: string;
  readonly credential: CredentialSource;
  readonly signal?: AbortSignal;
}

export interface ProviderAdapter {
  readonly id: string;
  /** Fails with a ProviderError carrying one ErrorKind */
  generate(request: GenerationRequest, context: AdapterContext): Promise<NormalizedResponse>;
  listModels?(context: Omit<AdapterContext, "model">): Promise<readonly string[]>;
}

export interface AdapterConfig {
  /** Per-attempt upstream timeout (default 60s) */
  readonly timeoutMs?: number;
  readonly baseUrl?: string;
}

export const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;

// ---------------------------------------------------------------------------
// Routing
// ---------------------------------------------------------------------------

export type AttemptOutcome =
  | { readonly kind: "success"; readonly response: NormalizedResponse }
  | { readonly kind: "failed"; readonly errorKind: ErrorKind; readonly message: string }
  | { readonly kind: "skipped"; readonly reason: string };

export type OutcomeKind = AttemptOutcome["kind"];

export interface FallbackChain {
  readonly providers: readonly ProviderDescriptor[];
  readonly skipped: readonly SkippedProvider[];
}

export type RetryDecision =
  | { readonly action: "retry"; readonly delayMs: number }
  | { readonly action: "failover" }
  | { readonly action: "abort" };

export interface RetryPolicyConfig {
  readonly maxAttempts?: number;
  readonly baseDelayMs?: number;
  readonly maxDelayMs?: number;
  /** Fraction of the exponential delay added as random jitter, in [0, 1] */
  readonly jitterFactor?: number;
  readonly random?: () => number;
}

// ---------------------------------------------------------------------------
// Usage
// ---------------------------------------------------------------------------

export interface UsageRecord {
  readonly requestId: string;
  readonly provider: string;
  readonly userId: string;
  readonly tokensIn: number;
  readonly tokensOut: number;
  readonly cost: number;
  readonly outcomeKind: OutcomeKind;
  readonly errorKind?: ErrorKind;
  readonly message?: string;
  readonly estimated: boolean;
  readonly timestamp: Date;
}

export interface UsageEntry {
  readonly requestId: string;
  readonly provider: string;
  readonly userId: string;
  readonly outcome: AttemptOutcome;
  readonly tokensIn: number;
  readonly tokensOut: number;
  readonly pricing: Pricing;
  readonly estimated?: boolean;
}

/** External append-only persistence for usage records */
export interface UsageStore {
  append(record: UsageRecord): Promise<void>;
}

export interface UsageQuery {
  readonly userId?: string;
  readonly provider?: string;
  /** Inclusive lower bound */
  readonly from?: Date;
  /** Exclusive upper bound */
  readonly to?: Date;
}

export interface UsageAggregate {
  readonly calls: number;
  readonly successes: number;
  readonly failures: number;
  readonly skipped: number;
  readonly tokensIn: number;
  readonly tokensOut: number;
  readonly cost: number;
  readonly estimatedCalls: number;
}
