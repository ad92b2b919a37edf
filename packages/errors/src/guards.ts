/**
 * Type guards for the generation error family + code-level discrimination.
 */

import type { QuillgateError } from "./base.js";
import { InternalError } from "./bases/internal-error.js";
import { ValidationError } from "./bases/validation-error.js";
import type { ErrorCode } from "./catalog.js";
import {
  AllProvidersFailedError,
  type ErrorKind,
  GenerationCancelledError,
  ProviderError,
} from "./generation.js";

/** Check if an error is a ValidationError (bad input, config) */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

/** Check if an error is an InternalError (bug/unknown origin) */
export function isInternalError(error: unknown): error is InternalError {
  return error instanceof InternalError;
}

/** Check if an error is a classified failure of one provider attempt */
export function isProviderError(error: unknown): error is ProviderError {
  return error instanceof ProviderError;
}

/** Check if an error is a provider failure of a specific kind */
export function isProviderErrorKind<K extends ErrorKind>(
  error: unknown,
  kind: K,
): error is ProviderError & { readonly kind: K } {
  return error instanceof ProviderError && error.kind === kind;
}

export function isAllProvidersFailedError(error: unknown): error is AllProvidersFailedError {
  return error instanceof AllProvidersFailedError;
}

export function isGenerationCancelledError(error: unknown): error is GenerationCancelledError {
  return error instanceof GenerationCancelledError;
}

/**
 * Check if a QuillgateError has a specific error code.
 * Narrows the type to include the specific code literal.
 */
export function hasCode<C extends ErrorCode>(
  error: QuillgateError,
  code: C,
): error is QuillgateError & { readonly code: C } {
  return error.code === code;
}

/**
 * Check if an error represents an expected condition (4xx-class).
 * Returns false for non-QuillgateError values.
 */
export function isExpectedError(error: unknown): boolean {
  if (
    error !== null &&
    typeof error === "object" &&
    "isExpected" in error &&
    typeof error.isExpected === "boolean"
  ) {
    return error.isExpected;
  }
  return false;
}
