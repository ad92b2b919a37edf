/**
 * Error Catalog - Single Source of Truth
 *
 * Each error code maps to an HTTP status, a gRPC canonical code, a domain
 * and whether the condition is expected (caller-side) or not.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: internal, validation, generation, usage
 */

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS - System failures and unknown errors
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    httpStatus: 500,
    grpcCode: "INTERNAL" as const,
    isExpected: false,
    title: "Internal server error",
    description: "An unexpected error occurred",
  },

  // ============================================================================
  // VALIDATION ERRORS - Bad input or configuration
  // ============================================================================
  VALIDATION_FAILED: {
    domain: "validation",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT" as const,
    isExpected: true,
    title: "Validation failed",
    description: "The input failed validation",
  },
  GENERATION_INVALID_CONFIG: {
    domain: "generation",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT" as const,
    isExpected: true,
    title: "Invalid router configuration",
    description: "The provider router settings or registry are invalid",
  },

  // ============================================================================
  // GENERATION ERRORS - Upstream provider routing and failover
  // ============================================================================
  GENERATION_PROVIDER_AUTH_FAILED: {
    domain: "generation",
    httpStatus: 401,
    grpcCode: "UNAUTHENTICATED" as const,
    isExpected: true,
    title: "Provider authentication failed",
    description: "The credential for the upstream provider is missing, invalid or expired",
  },
  GENERATION_PROVIDER_RATE_LIMITED: {
    domain: "generation",
    httpStatus: 429,
    grpcCode: "RESOURCE_EXHAUSTED" as const,
    isExpected: true,
    title: "Provider rate limited",
    description: "The upstream provider rate-limited the request",
  },
  GENERATION_PROVIDER_TIMEOUT: {
    domain: "generation",
    httpStatus: 504,
    grpcCode: "DEADLINE_EXCEEDED" as const,
    isExpected: false,
    title: "Provider timeout",
    description: "The upstream provider did not respond within the timeout",
  },
  GENERATION_PROVIDER_UNAVAILABLE: {
    domain: "generation",
    httpStatus: 503,
    grpcCode: "UNAVAILABLE" as const,
    isExpected: false,
    title: "Provider unavailable",
    description: "The upstream provider returned a transient server error",
  },
  GENERATION_PROVIDER_ERROR: {
    domain: "generation",
    httpStatus: 502,
    grpcCode: "UNKNOWN" as const,
    isExpected: false,
    title: "Provider error",
    description: "The upstream provider failed in an unrecognized way",
  },
  GENERATION_INVALID_REQUEST: {
    domain: "generation",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT" as const,
    isExpected: true,
    title: "Invalid generation request",
    description: "The request is malformed and no provider can serve it",
  },
  GENERATION_CONTENT_BLOCKED: {
    domain: "generation",
    httpStatus: 422,
    grpcCode: "FAILED_PRECONDITION" as const,
    isExpected: true,
    title: "Content policy violation",
    description: "The request or its output was blocked by a provider content policy",
  },
  GENERATION_NOT_CONFIGURED: {
    domain: "generation",
    httpStatus: 503,
    grpcCode: "FAILED_PRECONDITION" as const,
    isExpected: false,
    title: "No usable provider",
    description: "No configured provider can serve the request",
  },
  GENERATION_ALL_PROVIDERS_FAILED: {
    domain: "generation",
    httpStatus: 503,
    grpcCode: "UNAVAILABLE" as const,
    isExpected: false,
    title: "All providers failed",
    description: "Every provider in the fallback chain has been exhausted",
  },
  GENERATION_CANCELLED: {
    domain: "generation",
    httpStatus: 499,
    grpcCode: "CANCELLED" as const,
    isExpected: true,
    title: "Generation cancelled",
    description: "The caller cancelled the request",
  },

  // ============================================================================
  // USAGE ERRORS - Usage ledger invariants
  // ============================================================================
  USAGE_DUPLICATE_SUCCESS: {
    domain: "usage",
    httpStatus: 409,
    grpcCode: "ALREADY_EXISTS" as const,
    isExpected: false,
    title: "Duplicate success record",
    description: "A request already has a successful usage record",
  },
} as const;

// ============================================================================
// TYPE EXPORTS
// ============================================================================

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

export type ErrorDomain = ErrorCatalogEntry["domain"];

export type GrpcStatusCode = ErrorCatalogEntry["grpcCode"];

export type HttpStatusCode = ErrorCatalogEntry["httpStatus"];
