/**
 * MockAdapter for testing @quillgate/provider-router consumers.
 *
 * Sequences through pre-configured steps in order.
 * Tracks all incoming requests for assertions.
 */

import type {
  AdapterContext,
  GenerationRequest,
  NormalizedResponse,
  ProviderAdapter,
} from "@quillgate/provider-router";

export type MockAdapterHandler = (
  request: GenerationRequest,
  context: AdapterContext,
) => Promise<NormalizedResponse>;

/** A response (merged over defaults), an error to throw, or a custom handler */
export type MockAdapterStep = Partial<NormalizedResponse> | Error | MockAdapterHandler;

export interface MockAdapterCall {
  readonly request: GenerationRequest;
  readonly context: AdapterContext;
}

export class MockAdapter implements ProviderAdapter {
  readonly id: string;
  private readonly steps: readonly MockAdapterStep[];
  private readonly fallback: MockAdapterStep | undefined;
  private stepIndex = 0;
  readonly calls: MockAdapterCall[] = [];
  /** Returned by listModels(); undefined makes listing fail */
  models: readonly string[] | undefined;

  constructor(id: string, steps: readonly MockAdapterStep[] = [], fallback?: MockAdapterStep) {
    this.id = id;
    this.steps = steps;
    this.fallback = fallback;
  }

  /** Adapter that answers every call with the same step */
  static always(id: string, step: MockAdapterStep = {}): MockAdapter {
    return new MockAdapter(id, [], step);
  }

  async generate(request: GenerationRequest, context: AdapterContext): Promise<NormalizedResponse> {
    if (context.signal?.aborted) {
      throw context.signal.reason ?? new DOMException("Aborted", "AbortError");
    }

    this.calls.push({ request, context });
    const step = this.steps[this.stepIndex] ?? this.fallback;
    this.stepIndex++;

    if (step === undefined) {
      throw new Error(`MockAdapter "${this.id}": no response configured for call #${this.stepIndex}`);
    }
    if (step instanceof Error) {
      throw step;
    }
    if (typeof step === "function") {
      return step(request, context);
    }
    return createMockResponse({ provider: this.id, model: context.model, ...step });
  }

  async listModels(): Promise<readonly string[]> {
    if (this.models === undefined) {
      throw new Error(`MockAdapter "${this.id}": no models configured`);
    }
    return this.models;
  }

  get callCount(): number {
    return this.calls.length;
  }

  get lastCall(): MockAdapterCall | undefined {
    return this.calls[this.calls.length - 1];
  }

  /** Models passed to generate(), in call order */
  get modelsUsed(): readonly string[] {
    return this.calls.map((c) => c.context.model);
  }

  reset(): void {
    this.calls.length = 0;
    this.stepIndex = 0;
  }
}

/**
 * Handler that never settles on its own and rejects once the attempt's
 * signal aborts.
 */
export function hangUntilAborted(): MockAdapterHandler {
  return (_request, context) =>
    new Promise<NormalizedResponse>((_resolve, reject) => {
      const signal = context.signal;
      if (signal === undefined) return;
      signal.addEventListener(
        "abort",
        () => reject(signal.reason ?? new DOMException("Aborted", "AbortError")),
        { once: true },
      );
    });
}

/**
 * Helper to create a standard success response for mock adapters.
 */
export function createMockResponse(overrides?: Partial<NormalizedResponse>): NormalizedResponse {
  return {
    payload: overrides?.text ?? "Hello, world!",
    text: "Hello, world!",
    tokensIn: 10,
    tokensOut: 20,
    latencyMs: 5,
    provider: "test-provider",
    model: "test-model",
    usageEstimated: false,
    ...overrides,
  };
}
