/**
 * @quillgate/provider-router
 *
 * Credential-aware routing of generation requests across upstream
 * language-model backends: auto-detected fallback chains, per-provider
 * retry with backoff, sequential failover and usage accounting.
 */

export const PACKAGE_NAME = "@quillgate/provider-router" as const;

export {
  classifyGemini,
  classifyHttpStatus,
  classifyHuggingFace,
  classifyOpenRouter,
  createBuiltinAdapters,
  createGeminiAdapter,
  createHuggingFaceAdapter,
  createOpenAICompatibleAdapter,
  createOpenRouterAdapter,
  createProviderAdapter,
  estimateTokens,
  fromJsonSchema,
  parseRetryAfter,
  requestJson,
  stripCodeFences,
  withSchemaInstruction,
} from "./adapters/index.js";
export type {
  BuiltinAdapterConfig,
  JsonRequest,
  OpenAICompatibleOptions,
  OpenRouterConfig,
  StatusClassifier,
} from "./adapters/index.js";
export {
  loadRouterSettings,
  resolveProviderAlias,
  type RouterSettings,
  type RouterSettingsInput,
  validateRouterSettings,
} from "./config.js";
export {
  CredentialDetector,
  type CredentialDetectorOptions,
  DEFAULT_CREDENTIAL_CACHE_MS,
  envCredentialSource,
} from "./credentials.js";
export {
  createGenerationStack,
  createGenerator,
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  type Generate,
  type GenerateStructuredInput,
  type GenerateTextInput,
  type GenerationStack,
  type GenerationStackOptions,
} from "./generate.js";
export { BUILTIN_PROVIDERS, createProviderRegistry } from "./registry.js";
export {
  DEFAULT_BASE_DELAY_MS,
  DEFAULT_JITTER_FACTOR,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_MAX_DELAY_MS,
  RetryPolicy,
} from "./retry-policy.js";
export {
  OVERRIDE_UNAVAILABLE,
  RequestRouter,
  type RequestRouterOptions,
  validateGenerationRequest,
} from "./router.js";
export { sleep } from "./sleep.js";
export {
  buildContentWriterPrompt,
  DEFAULT_SYSTEM_PROMPT,
  DEFAULT_WRITING_STYLE,
  type WritingStyle,
} from "./system-prompt.js";
export { DEFAULT_REQUEST_TIMEOUT_MS } from "./types.js";
export type {
  AdapterConfig,
  AdapterContext,
  AttemptOutcome,
  Capability,
  CredentialSource,
  FallbackChain,
  GenerationRequest,
  NormalizedResponse,
  OutcomeKind,
  Pricing,
  ProviderAdapter,
  ProviderDefinition,
  ProviderDescriptor,
  ProviderRegistry,
  RegistryOptions,
  ResponseSchema,
  RetryDecision,
  RetryPolicyConfig,
  UsageAggregate,
  UsageEntry,
  UsageQuery,
  UsageRecord,
  UsageStore,
} from "./types.js";
export { DEFAULT_COST_PRECISION, roundCost, UsageTracker, type UsageTrackerOptions } from "./usage-tracker.js";
