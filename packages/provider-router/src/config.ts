import { ValidationError, type ValidationIssue } from "@quillgate/errors";
import { z } from "zod";
import { DEFAULT_CREDENTIAL_CACHE_MS } from "./credentials.js";
import {
  DEFAULT_BASE_DELAY_MS,
  DEFAULT_JITTER_FACTOR,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_MAX_DELAY_MS,
} from "./retry-policy.js";
import { DEFAULT_REQUEST_TIMEOUT_MS } from "./types.js";

/** Accepted spellings of the built-in provider names */
const PROVIDER_ALIASES: Readonly<Record<string, string>> = {
  gemini: "gemini",
  google: "gemini",
  openrouter: "openrouter",
  or: "openrouter",
  huggingface: "huggingface",
  hf: "huggingface",
  hf_response_api: "huggingface",
};

/**
 * Canonical provider name for a user-supplied one.
 * Unrecognized names are returned lowercased so routing can report them as unavailable.
 */
export function resolveProviderAlias(name: string): string {
  const key = name.trim().toLowerCase();
  return PROVIDER_ALIASES[key] ?? key;
}

// ---------------------------------------------------------------------------
// Settings schema
// ---------------------------------------------------------------------------

const ProviderNameSchema = z.string().trim().min(1).transform(resolveProviderAlias);

const RetrySettingsSchema = z
  .object({
    maxAttempts: z.number().int().positive().default(DEFAULT_MAX_ATTEMPTS),
    baseDelayMs: z.number().nonnegative().default(DEFAULT_BASE_DELAY_MS),
    maxDelayMs: z.number().nonnegative().default(DEFAULT_MAX_DELAY_MS),
    jitterFactor: z.number().min(0).max(1).default(DEFAULT_JITTER_FACTOR),
  })
  .refine((r) => r.baseDelayMs <= r.maxDelayMs, {
    message: "baseDelayMs must not exceed maxDelayMs",
    path: ["baseDelayMs"],
  });

const RouterSettingsSchema = z.object({
  providerOverride: ProviderNameSchema.optional(),
  modelOverrides: z.record(ProviderNameSchema, z.string().trim().min(1)).default({}),
  priorityOrder: z
    .array(ProviderNameSchema)
    .refine((names) => new Set(names).size === names.length, {
      message: "Providers must not repeat",
    })
    .optional(),
  openrouter: z
    .object({
      httpReferer: z.string().min(1).optional(),
      title: z.string().min(1).optional(),
    })
    .default({}),
  retry: RetrySettingsSchema.default({}),
  credentialCacheMs: z.number().int().nonnegative().default(DEFAULT_CREDENTIAL_CACHE_MS),
  requestTimeoutMs: z.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT_MS),
});

export type RouterSettings = z.output<typeof RouterSettingsSchema>;
export type RouterSettingsInput = z.input<typeof RouterSettingsSchema>;

function toIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((i) => ({
    field: i.path.join(".") || "(root)",
    message: i.message,
    code: i.code,
  }));
}

function invalidConfig(source: string, issues: readonly ValidationIssue[]): ValidationError {
  return new ValidationError({
    code: "GENERATION_INVALID_CONFIG",
    message: `Invalid ${source}: ${issues.map((i) => `${i.field}: ${i.message}`).join("; ")}`,
    issues,
  });
}

/**
 * Validate a programmatic settings object and fill in defaults.
 *
 * @throws ValidationError (GENERATION_INVALID_CONFIG) with field-level issues
 */
export function validateRouterSettings(value: unknown): RouterSettings {
  const result = RouterSettingsSchema.safeParse(value);
  if (!result.success) {
    throw invalidConfig("router settings", toIssues(result.error));
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// Environment
// ---------------------------------------------------------------------------

/** Blank env values count as unset */
const optionalString = z.preprocess(
  (v) => (typeof v === "string" && v.trim() === "" ? undefined : v),
  z.string().trim().optional(),
);

const optionalNumber = z.preprocess(
  (v) => (typeof v === "string" && v.trim() === "" ? undefined : v),
  z.coerce.number().optional(),
);

const EnvSchema = z.object({
  GPT_PROVIDER: optionalString,
  GEMINI_MODEL: optionalString,
  OPENROUTER_MODEL: optionalString,
  HF_MODEL: optionalString,
  OPENROUTER_HTTP_REFERER: optionalString,
  OPENROUTER_X_TITLE: optionalString,
  LLM_PROVIDER_PRIORITY: optionalString,
  LLM_MAX_ATTEMPTS: optionalNumber,
  LLM_RETRY_BASE_DELAY_MS: optionalNumber,
  LLM_RETRY_MAX_DELAY_MS: optionalNumber,
  LLM_RETRY_JITTER: optionalNumber,
  LLM_CREDENTIAL_CACHE_MS: optionalNumber,
  LLM_REQUEST_TIMEOUT_MS: optionalNumber,
});

function defined<V>(obj: Readonly<Record<string, V | undefined>>): Record<string, V> {
  const out: Record<string, V> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}

/**
 * Read router settings from an environment map.
 * Credentials are not part of the settings; they are read live by the detector.
 *
 * @throws ValidationError (GENERATION_INVALID_CONFIG) naming the offending variables
 */
export function loadRouterSettings(
  env: Readonly<Record<string, string | undefined>> = process.env,
): RouterSettings {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw invalidConfig("environment", toIssues(parsed.error));
  }
  const e = parsed.data;

  const modelOverrides = defined({
    gemini: e.GEMINI_MODEL,
    openrouter: e.OPENROUTER_MODEL,
    huggingface: e.HF_MODEL,
  });

  const priorityOrder = e.LLM_PROVIDER_PRIORITY?.split(",")
    .map((s) => s.trim())
    .filter((s) => s !== "");

  return validateRouterSettings({
    ...(e.GPT_PROVIDER !== undefined ? { providerOverride: e.GPT_PROVIDER } : {}),
    modelOverrides,
    ...(priorityOrder !== undefined && priorityOrder.length > 0 ? { priorityOrder } : {}),
    openrouter: defined({ httpReferer: e.OPENROUTER_HTTP_REFERER, title: e.OPENROUTER_X_TITLE }),
    retry: defined({
      maxAttempts: e.LLM_MAX_ATTEMPTS,
      baseDelayMs: e.LLM_RETRY_BASE_DELAY_MS,
      maxDelayMs: e.LLM_RETRY_MAX_DELAY_MS,
      jitterFactor: e.LLM_RETRY_JITTER,
    }),
    ...defined({
      credentialCacheMs: e.LLM_CREDENTIAL_CACHE_MS,
      requestTimeoutMs: e.LLM_REQUEST_TIMEOUT_MS,
    }),
  });
}
