import type { ErrorCode, ErrorDomain, GrpcStatusCode, HttpStatusCode } from "./catalog.js";

/**
 * Serialized form of a QuillgateError (see {@link QuillgateError.toJSON}).
 */
export interface ErrorJSON {
  _tag: string;
  name: string;
  code: ErrorCode;
  message: string;
  httpStatus: HttpStatusCode;
  grpcCode: GrpcStatusCode;
  domain: ErrorDomain;
  isExpected: boolean;
  timestamp: string;
  metadata?: Record<string, string>;
  traceId?: string;
  stack?: string;
}

/**
 * Root of the Quillgate error hierarchy.
 *
 * Subclasses pin `code` to a catalog entry and copy its HTTP status,
 * gRPC code, domain and expectedness.
 */
export abstract class QuillgateError extends Error {
  abstract readonly _tag: string;
  abstract readonly code: ErrorCode;
  abstract readonly httpStatus: HttpStatusCode;
  abstract readonly grpcCode: GrpcStatusCode;
  abstract readonly domain: ErrorDomain;
  abstract readonly isExpected: boolean;

  readonly timestamp: Date;
  readonly metadata: Record<string, string> | undefined;
  readonly traceId: string | undefined;

  constructor(
    message: string,
    metadata?: Record<string, string>,
    traceId?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
    this.timestamp = new Date();
    this.metadata = metadata;
    this.traceId = traceId;
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      message: this.message,
      httpStatus: this.httpStatus,
      grpcCode: this.grpcCode,
      domain: this.domain,
      isExpected: this.isExpected,
      timestamp: this.timestamp.toISOString(),
      ...(this.metadata !== undefined ? { metadata: this.metadata } : {}),
      ...(this.traceId !== undefined ? { traceId: this.traceId } : {}),
      ...(this.stack !== undefined ? { stack: this.stack } : {}),
    };
  }

  override toString(): string {
    let str = `${this.name} [${this.code}]: ${this.message}`;
    if (this.metadata !== undefined) {
      str += ` ${JSON.stringify(this.metadata)}`;
    }
    if (this.traceId !== undefined) {
      str += ` [trace: ${this.traceId}]`;
    }
    return str;
  }
}

/** Check if a value is a QuillgateError */
export function isQuillgateError(error: unknown): error is QuillgateError {
  return error instanceof QuillgateError;
}

/** Check if a value is any Error */
export function isError(error: unknown): error is Error {
  return error instanceof Error;
}
