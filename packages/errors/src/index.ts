/**
 * @quillgate/errors
 *
 * Shared error taxonomy for the Quillgate generation layer.
 *
 * Every error carries a `.code` from the catalog that discriminates the
 * specific condition. Provider failures additionally carry a normalized
 * `.kind` (see {@link ErrorKind}) that drives retry and failover.
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { type ErrorJSON, isError, isQuillgateError, QuillgateError } from "./base.js";

export {
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
} from "./catalog.js";

export {
  getAllErrorCodes,
  getCatalogEntry,
  getErrorMessage,
  isServerError,
  isValidErrorCode,
  validateCatalog,
} from "./utils.js";

// ============================================================================
// BASE ERROR TYPES
// ============================================================================

export { InternalError } from "./bases/internal-error.js";
export { type ValidationCode, ValidationError } from "./bases/validation-error.js";

export type { QuillgateErrorOptions, ValidationIssue } from "./types.js";

// ============================================================================
// GENERATION ERRORS
// ============================================================================

export {
  AllProvidersFailedError,
  ContentPolicyViolationError,
  createProviderError,
  DuplicateSuccessRecordError,
  ERROR_KINDS,
  type ErrorKind,
  GenerationCancelledError,
  GenerationConfigurationError,
  InvalidGenerationRequestError,
  ProviderAuthError,
  ProviderError,
  type ProviderErrorDetail,
  type ProviderFailure,
  ProviderRateLimitedError,
  ProviderTimeoutError,
  ProviderUnavailableError,
  ProviderUnknownError,
  type SkippedProvider,
} from "./generation.js";

// ============================================================================
// TYPE GUARDS
// ============================================================================

export {
  hasCode,
  isAllProvidersFailedError,
  isExpectedError,
  isGenerationCancelledError,
  isInternalError,
  isProviderError,
  isProviderErrorKind,
  isValidationError,
} from "./guards.js";

export const PACKAGE_NAME = "@quillgate/errors" as const;
