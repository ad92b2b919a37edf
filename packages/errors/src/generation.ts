/**
 * Generation errors: upstream provider routing, retry and failover.
 *
 * Abstract base: ProviderError (one attempt against one provider failed)
 * Concrete per-attempt kinds:
 *   - ProviderAuthError              (AuthError)
 *   - ProviderRateLimitedError       (RateLimited)
 *   - ProviderTimeoutError           (Timeout)
 *   - ProviderUnavailableError       (TransientServerError)
 *   - InvalidGenerationRequestError  (InvalidRequest)
 *   - ContentPolicyViolationError    (ContentPolicyViolation)
 *   - ProviderUnknownError           (UnknownError)
 * Routing-level:
 *   - GenerationConfigurationError   (no usable provider)
 *   - AllProvidersFailedError        (fallback chain exhausted)
 *   - GenerationCancelledError       (caller aborted)
 *   - DuplicateSuccessRecordError    (usage ledger invariant)
 */

import { QuillgateError } from "./base.js";
import { ERROR_CATALOG, type ErrorDomain, type GrpcStatusCode, type HttpStatusCode } from "./catalog.js";

// ---------------------------------------------------------------------------
// Error kind taxonomy
// ---------------------------------------------------------------------------

/** Normalized classification of a single failed provider attempt */
export type ErrorKind =
  | "AuthError"
  | "RateLimited"
  | "Timeout"
  | "TransientServerError"
  | "InvalidRequest"
  | "ContentPolicyViolation"
  | "UnknownError";

export const ERROR_KINDS: readonly ErrorKind[] = [
  "AuthError",
  "RateLimited",
  "Timeout",
  "TransientServerError",
  "InvalidRequest",
  "ContentPolicyViolation",
  "UnknownError",
];

/** Upstream detail attached to a provider error */
export interface ProviderErrorDetail {
  /** HTTP status returned by the upstream, when there was a response */
  readonly status?: number;
  /** Delay the upstream asked for before retrying */
  readonly retryAfterMs?: number;
  readonly cause?: Error;
}

// ---------------------------------------------------------------------------
// Abstract Base
// ---------------------------------------------------------------------------

export abstract class ProviderError extends QuillgateError {
  abstract readonly kind: ErrorKind;
  readonly providerId: string;
  readonly status: number | undefined;
  readonly retryAfterMs: number | undefined;

  constructor(providerId: string, message: string, detail?: ProviderErrorDetail) {
    super(
      message,
      { provider: providerId },
      undefined,
      detail?.cause ? { cause: detail.cause } : undefined,
    );
    this.providerId = providerId;
    this.status = detail?.status;
    this.retryAfterMs = detail?.retryAfterMs;
  }
}

// ---------------------------------------------------------------------------
// Concrete per-attempt errors
// ---------------------------------------------------------------------------

export class ProviderAuthError extends ProviderError {
  readonly _tag = "PermissionError" as const;
  readonly kind = "AuthError" as const;
  readonly code = "GENERATION_PROVIDER_AUTH_FAILED" as const;
  readonly httpStatus: HttpStatusCode = ERROR_CATALOG.GENERATION_PROVIDER_AUTH_FAILED.httpStatus;
  readonly grpcCode: GrpcStatusCode = ERROR_CATALOG.GENERATION_PROVIDER_AUTH_FAILED.grpcCode;
  readonly domain: ErrorDomain = ERROR_CATALOG.GENERATION_PROVIDER_AUTH_FAILED.domain;
  readonly isExpected: boolean = ERROR_CATALOG.GENERATION_PROVIDER_AUTH_FAILED.isExpected;
}

export class ProviderRateLimitedError extends ProviderError {
  readonly _tag = "RateLimitError" as const;
  readonly kind = "RateLimited" as const;
  readonly code = "GENERATION_PROVIDER_RATE_LIMITED" as const;
  readonly httpStatus: HttpStatusCode = ERROR_CATALOG.GENERATION_PROVIDER_RATE_LIMITED.httpStatus;
  readonly grpcCode: GrpcStatusCode = ERROR_CATALOG.GENERATION_PROVIDER_RATE_LIMITED.grpcCode;
  readonly domain: ErrorDomain = ERROR_CATALOG.GENERATION_PROVIDER_RATE_LIMITED.domain;
  readonly isExpected: boolean = ERROR_CATALOG.GENERATION_PROVIDER_RATE_LIMITED.isExpected;
}

export class ProviderTimeoutError extends ProviderError {
  readonly _tag = "TimeoutError" as const;
  readonly kind = "Timeout" as const;
  readonly code = "GENERATION_PROVIDER_TIMEOUT" as const;
  readonly httpStatus: HttpStatusCode = ERROR_CATALOG.GENERATION_PROVIDER_TIMEOUT.httpStatus;
  readonly grpcCode: GrpcStatusCode = ERROR_CATALOG.GENERATION_PROVIDER_TIMEOUT.grpcCode;
  readonly domain: ErrorDomain = ERROR_CATALOG.GENERATION_PROVIDER_TIMEOUT.domain;
  readonly isExpected: boolean = ERROR_CATALOG.GENERATION_PROVIDER_TIMEOUT.isExpected;
}

export class ProviderUnavailableError extends ProviderError {
  readonly _tag = "ExternalError" as const;
  readonly kind = "TransientServerError" as const;
  readonly code = "GENERATION_PROVIDER_UNAVAILABLE" as const;
  readonly httpStatus: HttpStatusCode = ERROR_CATALOG.GENERATION_PROVIDER_UNAVAILABLE.httpStatus;
  readonly grpcCode: GrpcStatusCode = ERROR_CATALOG.GENERATION_PROVIDER_UNAVAILABLE.grpcCode;
  readonly domain: ErrorDomain = ERROR_CATALOG.GENERATION_PROVIDER_UNAVAILABLE.domain;
  readonly isExpected: boolean = ERROR_CATALOG.GENERATION_PROVIDER_UNAVAILABLE.isExpected;
}

export class InvalidGenerationRequestError extends ProviderError {
  readonly _tag = "ValidationError" as const;
  readonly kind = "InvalidRequest" as const;
  readonly code = "GENERATION_INVALID_REQUEST" as const;
  readonly httpStatus: HttpStatusCode = ERROR_CATALOG.GENERATION_INVALID_REQUEST.httpStatus;
  readonly grpcCode: GrpcStatusCode = ERROR_CATALOG.GENERATION_INVALID_REQUEST.grpcCode;
  readonly domain: ErrorDomain = ERROR_CATALOG.GENERATION_INVALID_REQUEST.domain;
  readonly isExpected: boolean = ERROR_CATALOG.GENERATION_INVALID_REQUEST.isExpected;
}

export class ContentPolicyViolationError extends ProviderError {
  readonly _tag = "ValidationError" as const;
  readonly kind = "ContentPolicyViolation" as const;
  readonly code = "GENERATION_CONTENT_BLOCKED" as const;
  readonly httpStatus: HttpStatusCode = ERROR_CATALOG.GENERATION_CONTENT_BLOCKED.httpStatus;
  readonly grpcCode: GrpcStatusCode = ERROR_CATALOG.GENERATION_CONTENT_BLOCKED.grpcCode;
  readonly domain: ErrorDomain = ERROR_CATALOG.GENERATION_CONTENT_BLOCKED.domain;
  readonly isExpected: boolean = ERROR_CATALOG.GENERATION_CONTENT_BLOCKED.isExpected;
}

export class ProviderUnknownError extends ProviderError {
  readonly _tag = "ExternalError" as const;
  readonly kind = "UnknownError" as const;
  readonly code = "GENERATION_PROVIDER_ERROR" as const;
  readonly httpStatus: HttpStatusCode = ERROR_CATALOG.GENERATION_PROVIDER_ERROR.httpStatus;
  readonly grpcCode: GrpcStatusCode = ERROR_CATALOG.GENERATION_PROVIDER_ERROR.grpcCode;
  readonly domain: ErrorDomain = ERROR_CATALOG.GENERATION_PROVIDER_ERROR.domain;
  readonly isExpected: boolean = ERROR_CATALOG.GENERATION_PROVIDER_ERROR.isExpected;
}

/**
 * Build the concrete provider error for a kind.
 * Adapters use this at the end of their translation tables.
 */
export function createProviderError(
  kind: ErrorKind,
  providerId: string,
  message: string,
  detail?: ProviderErrorDetail,
): ProviderError {
  switch (kind) {
    case "AuthError":
      return new ProviderAuthError(providerId, message, detail);
    case "RateLimited":
      return new ProviderRateLimitedError(providerId, message, detail);
    case "Timeout":
      return new ProviderTimeoutError(providerId, message, detail);
    case "TransientServerError":
      return new ProviderUnavailableError(providerId, message, detail);
    case "InvalidRequest":
      return new InvalidGenerationRequestError(providerId, message, detail);
    case "ContentPolicyViolation":
      return new ContentPolicyViolationError(providerId, message, detail);
    case "UnknownError":
      return new ProviderUnknownError(providerId, message, detail);
  }
}

// ---------------------------------------------------------------------------
// Routing-level errors
// ---------------------------------------------------------------------------

export class GenerationConfigurationError extends QuillgateError {
  readonly _tag = "ExternalError" as const;
  readonly code = "GENERATION_NOT_CONFIGURED" as const;
  readonly httpStatus: HttpStatusCode = ERROR_CATALOG.GENERATION_NOT_CONFIGURED.httpStatus;
  readonly grpcCode: GrpcStatusCode = ERROR_CATALOG.GENERATION_NOT_CONFIGURED.grpcCode;
  readonly domain: ErrorDomain = ERROR_CATALOG.GENERATION_NOT_CONFIGURED.domain;
  readonly isExpected: boolean = ERROR_CATALOG.GENERATION_NOT_CONFIGURED.isExpected;
  readonly knownProviders: readonly string[];

  constructor(message: string, knownProviders: readonly string[] = []) {
    super(message);
    this.knownProviders = knownProviders;
  }
}

/** Terminal failure of one attempted provider */
export interface ProviderFailure {
  readonly provider: string;
  readonly errorKind: ErrorKind;
  readonly message: string;
  readonly attempts: number;
}

/** A provider that was bypassed without an attempt */
export interface SkippedProvider {
  readonly provider: string;
  readonly reason: string;
}

export class AllProvidersFailedError extends QuillgateError {
  readonly _tag = "ExternalError" as const;
  readonly code = "GENERATION_ALL_PROVIDERS_FAILED" as const;
  readonly httpStatus: HttpStatusCode = ERROR_CATALOG.GENERATION_ALL_PROVIDERS_FAILED.httpStatus;
  readonly grpcCode: GrpcStatusCode = ERROR_CATALOG.GENERATION_ALL_PROVIDERS_FAILED.grpcCode;
  readonly domain: ErrorDomain = ERROR_CATALOG.GENERATION_ALL_PROVIDERS_FAILED.domain;
  readonly isExpected: boolean = ERROR_CATALOG.GENERATION_ALL_PROVIDERS_FAILED.isExpected;
  readonly failures: readonly ProviderFailure[];
  readonly skipped: readonly SkippedProvider[];

  constructor(
    failures: readonly ProviderFailure[],
    skipped: readonly SkippedProvider[] = [],
    lastError?: Error,
  ) {
    const summary = failures.map((f) => `${f.provider}: ${f.errorKind}`).join(", ");
    super(
      `All providers failed: [${summary}]${lastError ? `. Last error: ${lastError.message}` : ""}`,
      undefined,
      undefined,
      lastError ? { cause: lastError } : undefined,
    );
    this.failures = failures;
    this.skipped = skipped;
  }
}

export class GenerationCancelledError extends QuillgateError {
  readonly _tag = "TimeoutError" as const;
  readonly code = "GENERATION_CANCELLED" as const;
  readonly httpStatus: HttpStatusCode = ERROR_CATALOG.GENERATION_CANCELLED.httpStatus;
  readonly grpcCode: GrpcStatusCode = ERROR_CATALOG.GENERATION_CANCELLED.grpcCode;
  readonly domain: ErrorDomain = ERROR_CATALOG.GENERATION_CANCELLED.domain;
  readonly isExpected: boolean = ERROR_CATALOG.GENERATION_CANCELLED.isExpected;
  readonly requestId: string;
  readonly provider: string | undefined;

  constructor(requestId: string, provider?: string, reason?: unknown) {
    super(
      `Request ${requestId} cancelled${provider ? ` during ${provider}` : ""}`,
      undefined,
      undefined,
      reason instanceof Error ? { cause: reason } : undefined,
    );
    this.requestId = requestId;
    this.provider = provider;
  }
}

export class DuplicateSuccessRecordError extends QuillgateError {
  readonly _tag = "ConflictError" as const;
  readonly code = "USAGE_DUPLICATE_SUCCESS" as const;
  readonly httpStatus: HttpStatusCode = ERROR_CATALOG.USAGE_DUPLICATE_SUCCESS.httpStatus;
  readonly grpcCode: GrpcStatusCode = ERROR_CATALOG.USAGE_DUPLICATE_SUCCESS.grpcCode;
  readonly domain: ErrorDomain = ERROR_CATALOG.USAGE_DUPLICATE_SUCCESS.domain;
  readonly isExpected: boolean = ERROR_CATALOG.USAGE_DUPLICATE_SUCCESS.isExpected;
  readonly requestId: string;

  constructor(requestId: string) {
    super(`Request ${requestId} already has a successful usage record`);
    this.requestId = requestId;
  }
}
