import { QuillgateError } from "../base.js";
import { ERROR_CATALOG } from "../catalog.js";

/**
 * Unexpected failures: bugs and errors of unknown origin.
 * HTTP 500.
 */
export class InternalError extends QuillgateError {
  readonly _tag = "InternalError" as const;
  readonly code = "INTERNAL_ERROR" as const;
  readonly httpStatus = ERROR_CATALOG.INTERNAL_ERROR.httpStatus;
  readonly grpcCode = ERROR_CATALOG.INTERNAL_ERROR.grpcCode;
  readonly domain = ERROR_CATALOG.INTERNAL_ERROR.domain;
  readonly isExpected = ERROR_CATALOG.INTERNAL_ERROR.isExpected;
}
