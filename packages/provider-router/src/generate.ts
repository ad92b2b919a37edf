import { randomUUID } from "node:crypto";
import { createBuiltinAdapters } from "./adapters/index.js";
import { resolveProviderAlias, type RouterSettings, validateRouterSettings } from "./config.js";
import { CredentialDetector, envCredentialSource } from "./credentials.js";
import { BUILTIN_PROVIDERS, createProviderRegistry } from "./registry.js";
import { RetryPolicy } from "./retry-policy.js";
import { RequestRouter } from "./router.js";
import { DEFAULT_SYSTEM_PROMPT } from "./system-prompt.js";
import type {
  CredentialSource,
  GenerationRequest,
  ProviderAdapter,
  ProviderDefinition,
  ProviderRegistry,
  ResponseSchema,
  UsageStore,
} from "./types.js";
import { UsageTracker } from "./usage-tracker.js";

export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_MAX_TOKENS = 4000;

interface GenerateInputBase {
  readonly prompt: string;
  readonly userId: string;
  /** Model for the first provider tried; pair it with `provider` for vendor-specific ids */
  readonly model?: string;
  /** Preferred provider (aliases accepted); falls back to the configured global preference */
  readonly provider?: string;
  readonly temperature?: number;
  readonly maxTokens?: number;
  readonly systemPrompt?: string;
  readonly requestId?: string;
  readonly signal?: AbortSignal;
}

export interface GenerateTextInput extends GenerateInputBase {
  readonly schema?: undefined;
}

export interface GenerateStructuredInput<T> extends GenerateInputBase {
  readonly schema: ResponseSchema<T>;
}

export interface Generate {
  (input: GenerateTextInput): Promise<string>;
  <T>(input: GenerateStructuredInput<T>): Promise<T>;
}

/**
 * Build the single public entry point over a router.
 * Returns the reply text, or the schema-validated value for structured input.
 */
export function createGenerator(router: RequestRouter, settings: Pick<RouterSettings, "providerOverride">): Generate {
  function generate(input: GenerateTextInput): Promise<string>;
  function generate<T>(input: GenerateStructuredInput<T>): Promise<T>;
  async function generate(
    input: GenerateTextInput | GenerateStructuredInput<unknown>,
  ): Promise<unknown> {
    const provider =
      input.provider !== undefined ? resolveProviderAlias(input.provider) : settings.providerOverride;

    const request: GenerationRequest = {
      requestId: input.requestId ?? randomUUID(),
      userId: input.userId,
      prompt: input.prompt,
      systemPrompt: input.systemPrompt ?? DEFAULT_SYSTEM_PROMPT,
      temperature: input.temperature ?? DEFAULT_TEMPERATURE,
      maxTokens: input.maxTokens ?? DEFAULT_MAX_TOKENS,
      ...(input.schema !== undefined ? { schema: input.schema } : {}),
      ...(input.model !== undefined ? { modelOverride: input.model } : {}),
      ...(provider !== undefined ? { providerOverride: provider } : {}),
    };

    const response = await router.execute(request, input.signal);
    return response.payload;
  }

  return generate;
}

export interface GenerationStackOptions {
  /** Environment map for credentials (default process.env) */
  readonly env?: Readonly<Record<string, string | undefined>>;
  /** Programmatic settings; validated and defaulted */
  readonly settings?: unknown;
  readonly credentials?: CredentialSource;
  readonly providers?: readonly ProviderDefinition[];
  /** Replaces the built-in adapters; keys must cover every provider */
  readonly adapters?: ReadonlyMap<string, ProviderAdapter>;
  readonly store?: UsageStore;
  readonly random?: () => number;
  readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface GenerationStack {
  readonly settings: RouterSettings;
  readonly registry: ProviderRegistry;
  readonly detector: CredentialDetector;
  readonly tracker: UsageTracker;
  readonly router: RequestRouter;
  readonly generate: Generate;
}

/**
 * Wire registry, detector, adapters, retry policy, tracker, router and
 * generator from settings and an environment map.
 */
export function createGenerationStack(options: GenerationStackOptions = {}): GenerationStack {
  const settings = validateRouterSettings(options.settings ?? {});

  const registry = createProviderRegistry(options.providers ?? BUILTIN_PROVIDERS, {
    modelOverrides: settings.modelOverrides,
    ...(settings.priorityOrder !== undefined ? { priorityOrder: settings.priorityOrder } : {}),
  });

  const detector = new CredentialDetector(
    registry,
    options.credentials ?? envCredentialSource(options.env ?? process.env),
    { cacheTtlMs: settings.credentialCacheMs },
  );

  const adapters =
    options.adapters ??
    createBuiltinAdapters({ timeoutMs: settings.requestTimeoutMs, openrouter: settings.openrouter });

  const tracker = new UsageTracker(options.store ? { store: options.store } : {});

  const router = new RequestRouter({
    registry,
    detector,
    adapters,
    tracker,
    retryPolicy: new RetryPolicy({
      ...settings.retry,
      ...(options.random ? { random: options.random } : {}),
    }),
    ...(options.sleep ? { sleep: options.sleep } : {}),
  });

  return {
    settings,
    registry,
    detector,
    tracker,
    router,
    generate: createGenerator(router, settings),
  };
}
