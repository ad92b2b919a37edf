import { QuillgateError } from "../base.js";
import { ERROR_CATALOG, type ErrorDomain, type GrpcStatusCode, type HttpStatusCode } from "../catalog.js";
import type { QuillgateErrorOptions, ValidationIssue } from "../types.js";

export type ValidationCode = "VALIDATION_FAILED" | "GENERATION_INVALID_CONFIG";

/**
 * Errors caused by invalid input or configuration.
 * HTTP 400-class. The `.code` field discriminates the specific error.
 */
export class ValidationError extends QuillgateError {
  readonly _tag = "ValidationError" as const;
  override readonly code: ValidationCode;
  override readonly httpStatus: HttpStatusCode;
  override readonly grpcCode: GrpcStatusCode;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;

  /** Structured validation issues */
  readonly issues: readonly ValidationIssue[];

  constructor(
    options: QuillgateErrorOptions<ValidationCode> & { issues?: readonly ValidationIssue[] },
  );
  constructor(
    message: string,
    issues?: readonly ValidationIssue[],
    metadata?: Record<string, string>,
    traceId?: string,
  );
  constructor(
    messageOrOptions:
      | string
      | (QuillgateErrorOptions<ValidationCode> & { issues?: readonly ValidationIssue[] }),
    issues?: readonly ValidationIssue[],
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    const opts =
      typeof messageOrOptions === "string"
        ? {
            code: "VALIDATION_FAILED" as const,
            message: messageOrOptions,
            issues,
            metadata,
            traceId,
            cause: undefined,
          }
        : messageOrOptions;
    super(opts.message, opts.metadata, opts.traceId, opts.cause ? { cause: opts.cause } : undefined);
    const entry = ERROR_CATALOG[opts.code];
    this.code = opts.code;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.issues = opts.issues ?? [];
  }
}
