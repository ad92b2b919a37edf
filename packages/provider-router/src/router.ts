import {
  AllProvidersFailedError,
  createProviderError,
  GenerationCancelledError,
  GenerationConfigurationError,
  getErrorMessage,
  InvalidGenerationRequestError,
  isProviderError,
  type ProviderError,
  type ProviderFailure,
  type SkippedProvider,
} from "@quillgate/errors";
import { getProviderAttempts, getProviderLatency, withSpan } from "@quillgate/telemetry";
import type { CredentialDetector } from "./credentials.js";
import { RetryPolicy } from "./retry-policy.js";
import { sleep as abortableSleep } from "./sleep.js";
import type {
  AttemptOutcome,
  Capability,
  FallbackChain,
  GenerationRequest,
  NormalizedResponse,
  Pricing,
  ProviderAdapter,
  ProviderDescriptor,
  ProviderRegistry,
} from "./types.js";
import type { UsageTracker } from "./usage-tracker.js";

const ZERO_PRICING: Pricing = { inRate: 0, outRate: 0 };

/** Reason recorded for an override that is unknown or lacks credentials */
export const OVERRIDE_UNAVAILABLE = "override unavailable";

export interface RequestRouterOptions {
  readonly registry: ProviderRegistry;
  readonly detector: CredentialDetector;
  readonly adapters: ReadonlyMap<string, ProviderAdapter>;
  readonly tracker: UsageTracker;
  readonly retryPolicy?: RetryPolicy;
  /** Backoff wait; must reject when the signal aborts */
  readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/** Registry and detector are swapped together by reload() */
interface RoutingState {
  readonly registry: ProviderRegistry;
  readonly detector: CredentialDetector;
}

function log(requestId: string, message: string): string {
  return `[provider-router] Request ${requestId}: ${message}`;
}

function requiredCapability(request: GenerationRequest): Capability {
  return request.schema ? "structured" : "text";
}

/**
 * Reject requests no provider could serve.
 */
export function validateGenerationRequest(request: GenerationRequest): void {
  const problems: string[] = [];
  if (request.requestId.trim() === "") problems.push("requestId must not be empty");
  if (request.userId.trim() === "") problems.push("userId must not be empty");
  if (request.prompt.trim() === "") problems.push("prompt must not be empty");
  if (!(request.temperature >= 0 && request.temperature <= 2)) {
    problems.push(`temperature must be within [0, 2], got ${request.temperature}`);
  }
  if (!Number.isInteger(request.maxTokens) || request.maxTokens <= 0) {
    problems.push(`maxTokens must be a positive integer, got ${request.maxTokens}`);
  }
  if (request.modelOverride !== undefined && request.modelOverride.trim() === "") {
    problems.push("modelOverride must not be empty when set");
  }

  if (problems.length > 0) {
    throw new InvalidGenerationRequestError("router", `Invalid generation request: ${problems.join("; ")}`);
  }
}

function toProviderError(error: unknown, provider: string): ProviderError {
  if (isProviderError(error)) return error;
  return createProviderError(
    "UnknownError",
    provider,
    getErrorMessage(error),
    error instanceof Error ? { cause: error } : undefined,
  );
}

/**
 * Credential-aware request router:
 * - Fallback chain from detected credentials and priority ranks
 * - Provider override as a priority hint
 * - Per-provider retry with exponential backoff and jitter
 * - Sequential failover, abort on caller-side errors
 * - Every attempt recorded in the usage ledger, in order
 */
export class RequestRouter {
  private state: RoutingState;
  private readonly adapters: ReadonlyMap<string, ProviderAdapter>;
  private readonly tracker: UsageTracker;
  private readonly retryPolicy: RetryPolicy;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(options: RequestRouterOptions) {
    this.adapters = options.adapters;
    this.assertAdapters(options.registry);
    this.state = { registry: options.registry, detector: options.detector };
    this.tracker = options.tracker;
    this.retryPolicy = options.retryPolicy ?? new RetryPolicy();
    this.sleep = options.sleep ?? abortableSleep;
  }

  get registry(): ProviderRegistry {
    return this.state.registry;
  }

  get detector(): CredentialDetector {
    return this.state.detector;
  }

  /**
   * Replace the registry, and the detector built over it, in one step.
   * Requests already running keep the state they started with.
   */
  reload(registry: ProviderRegistry, detector?: CredentialDetector): void {
    this.assertAdapters(registry);
    this.state = {
      registry,
      detector: detector ?? this.state.detector.withRegistry(registry),
    };
  }

  /**
   * Ordered providers to attempt for a request, plus overrides that were dropped.
   *
   * @throws GenerationConfigurationError when nothing usable can serve the request
   */
  resolveChain(request: GenerationRequest): FallbackChain {
    return this.resolveWith(this.state, request);
  }

  /**
   * Execute a request through the fallback chain.
   *
   * @throws InvalidGenerationRequestError for a requestId that already succeeded
   * @throws InvalidGenerationRequestError / ContentPolicyViolationError verbatim
   * @throws AllProvidersFailedError after exhausting the chain
   * @throws GenerationCancelledError when `signal` aborts
   */
  async execute(request: GenerationRequest, signal?: AbortSignal): Promise<NormalizedResponse> {
    validateGenerationRequest(request);
    if (this.tracker.hasSucceeded(request.requestId)) {
      throw new InvalidGenerationRequestError(
        "router",
        `Request ${request.requestId} has already been served; use a new requestId`,
      );
    }

    return withSpan(
      "provider_router.execute",
      { "request.id": request.requestId, "user.id": request.userId },
      async () => {
        const state = this.state;
        const chain = this.resolveWith(state, request);

        for (const skip of chain.skipped) {
          console.warn(log(request.requestId, `provider ${skip.provider} skipped (${skip.reason})`));
          await this.record(request, skip.provider, state.registry.get(skip.provider)?.pricing ?? ZERO_PRICING, {
            kind: "skipped",
            reason: skip.reason,
          });
        }

        const failures: ProviderFailure[] = [];
        let lastError: ProviderError | undefined;

        for (const [index, descriptor] of chain.providers.entries()) {
          const model = this.modelFor(request, descriptor, index);

          const failure = await this.runProvider(state, request, descriptor, model, signal);
          if (failure.kind === "success") return failure.response;

          failures.push({
            provider: descriptor.name,
            errorKind: failure.error.kind,
            message: failure.error.message,
            attempts: failure.attempts,
          });
          lastError = failure.error;

          const next = chain.providers[index + 1];
          if (next !== undefined) {
            console.warn(
              log(
                request.requestId,
                `failing over from ${descriptor.name} to ${next.name} after ${failure.error.kind}`,
              ),
            );
          }
        }

        throw new AllProvidersFailedError(failures, chain.skipped, lastError);
      },
    );
  }

  /**
   * Models offered by a provider, for backends that can list them.
   * Returns an empty list for backends that cannot.
   */
  async listModels(provider: string, signal?: AbortSignal): Promise<readonly string[]> {
    const adapter = this.adapters.get(provider);
    if (adapter?.listModels === undefined) return [];
    return adapter.listModels({
      credential: this.state.detector.credentials,
      ...(signal ? { signal } : {}),
    });
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private resolveWith(state: RoutingState, request: GenerationRequest): FallbackChain {
    const usable = state.detector.requireUsable();
    const capability = requiredCapability(request);
    const eligible = state.registry
      .list()
      .filter((d) => usable.has(d.name) && d.capabilities.has(capability));

    const skipped: SkippedProvider[] = [];
    let providers: readonly ProviderDescriptor[] = eligible;

    const override = request.providerOverride;
    if (override !== undefined) {
      const descriptor = state.registry.get(override);
      if (descriptor === undefined || !usable.has(override)) {
        skipped.push({ provider: override, reason: OVERRIDE_UNAVAILABLE });
      } else if (!descriptor.capabilities.has(capability)) {
        skipped.push({ provider: override, reason: `override lacks ${capability} capability` });
      } else {
        providers = [descriptor, ...eligible.filter((d) => d.name !== override)];
      }
    }

    if (providers.length === 0) {
      throw new GenerationConfigurationError(
        `No usable provider supports ${capability} output (usable: ${[...usable].join(", ")})`,
        state.registry.names(),
      );
    }

    return { providers, skipped };
  }

  /** Attempt one provider until success, failover or abort */
  private async runProvider(
    state: RoutingState,
    request: GenerationRequest,
    descriptor: ProviderDescriptor,
    model: string,
    signal: AbortSignal | undefined,
  ): Promise<
    | { readonly kind: "success"; readonly response: NormalizedResponse }
    | { readonly kind: "exhausted"; readonly error: ProviderError; readonly attempts: number }
  > {
    const adapter = this.adapterFor(descriptor.name);
    const provider = descriptor.name;

    for (let attempt = 1; ; attempt++) {
      if (signal?.aborted) {
        throw new GenerationCancelledError(request.requestId, provider, signal.reason);
      }

      const startTime = Date.now();
      let response: NormalizedResponse;
      try {
        response = await withSpan(
          "provider_router.attempt",
          { provider, model, attempt },
          async (span) => {
            const served = await adapter.generate(request, {
              model,
              credential: state.detector.credentials,
              ...(signal ? { signal } : {}),
            });
            span.setAttributes({
              "model.served": served.model,
              "tokens.in": served.tokensIn,
              "tokens.out": served.tokensOut,
              "usage.estimated": served.usageEstimated,
            });
            return served;
          },
        );
      } catch (error) {
        getProviderLatency().record(Date.now() - startTime, { provider });

        if (signal?.aborted) {
          getProviderAttempts().add(1, { provider, outcome: "cancelled" });
          await this.record(request, provider, descriptor.pricing, {
            kind: "failed",
            errorKind: "Timeout",
            message: "cancelled",
          });
          throw new GenerationCancelledError(request.requestId, provider, signal.reason);
        }

        const providerError = toProviderError(error, provider);
        getProviderAttempts().add(1, { provider, outcome: providerError.kind });
        await this.record(request, provider, descriptor.pricing, {
          kind: "failed",
          errorKind: providerError.kind,
          message: providerError.message,
        });

        const decision = this.retryPolicy.decide(providerError.kind, attempt, providerError.retryAfterMs);
        if (decision.action === "abort") {
          throw providerError;
        }
        if (decision.action === "failover") {
          return { kind: "exhausted", error: providerError, attempts: attempt };
        }

        console.warn(
          log(
            request.requestId,
            `${provider} attempt ${attempt} failed with ${providerError.kind}, retrying in ${Math.round(decision.delayMs)}ms`,
          ),
        );
        try {
          await this.sleep(decision.delayMs, signal);
        } catch (sleepError) {
          if (signal?.aborted) {
            throw new GenerationCancelledError(request.requestId, provider, signal.reason);
          }
          throw sleepError;
        }
        continue;
      }

      // Ledger failures past this point are not provider failures
      getProviderAttempts().add(1, { provider, outcome: "success" });
      getProviderLatency().record(Date.now() - startTime, { provider });
      await this.record(
        request,
        provider,
        descriptor.pricing,
        { kind: "success", response },
        response.tokensIn,
        response.tokensOut,
        response.usageEstimated,
      );
      console.info(
        log(
          request.requestId,
          `served by ${provider}/${response.model} (${response.tokensIn} in, ${response.tokensOut} out${response.usageEstimated ? ", estimated" : ""})`,
        ),
      );
      return { kind: "success", response };
    }
  }

  /**
   * The model override goes to the head of the chain, unless a provider
   * override was asked for and the head is some other provider.
   */
  private modelFor(request: GenerationRequest, descriptor: ProviderDescriptor, index: number): string {
    if (index !== 0 || request.modelOverride === undefined) return descriptor.defaultModel;
    const override = request.providerOverride;
    if (override !== undefined && override !== descriptor.name) return descriptor.defaultModel;
    return request.modelOverride;
  }

  private async record(
    request: GenerationRequest,
    provider: string,
    pricing: Pricing,
    outcome: AttemptOutcome,
    tokensIn = 0,
    tokensOut = 0,
    estimated = false,
  ): Promise<void> {
    await this.tracker.record({
      requestId: request.requestId,
      provider,
      userId: request.userId,
      outcome,
      tokensIn,
      tokensOut,
      pricing,
      estimated,
    });
  }

  private adapterFor(provider: string): ProviderAdapter {
    const adapter = this.adapters.get(provider);
    if (adapter === undefined) {
      throw new GenerationConfigurationError(`No adapter registered for provider "${provider}"`, [
        ...this.adapters.keys(),
      ]);
    }
    return adapter;
  }

  private assertAdapters(registry: ProviderRegistry): void {
    for (const name of registry.names()) {
      this.adapterFor(name);
    }
  }
}
