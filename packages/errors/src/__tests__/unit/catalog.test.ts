import { describe, expect, it } from "vitest";
import {
  ERROR_CATALOG,
  getAllErrorCodes,
  getCatalogEntry,
  isServerError,
  isValidErrorCode,
  validateCatalog,
} from "../../index.js";

describe("ERROR_CATALOG", () => {
  it("should have all expected domains", () => {
    const domains = new Set(Object.values(ERROR_CATALOG).map((e) => e.domain));

    expect(domains).toContain("internal");
    expect(domains).toContain("validation");
    expect(domains).toContain("generation");
    expect(domains).toContain("usage");
  });

  it("should have valid HTTP status codes for all entries", () => {
    for (const entry of Object.values(ERROR_CATALOG)) {
      expect(entry.httpStatus).toBeGreaterThanOrEqual(100);
      expect(entry.httpStatus).toBeLessThan(600);
    }
  });

  it("should pass catalog validation", () => {
    expect(validateCatalog()).toEqual({ valid: true, errors: [] });
  });

  it("should mark caller-side conditions as expected", () => {
    expect(ERROR_CATALOG.GENERATION_PROVIDER_AUTH_FAILED.isExpected).toBe(true);
    expect(ERROR_CATALOG.GENERATION_CANCELLED.isExpected).toBe(true);
    expect(ERROR_CATALOG.GENERATION_ALL_PROVIDERS_FAILED.isExpected).toBe(false);
  });
});

describe("catalog helpers", () => {
  it("getCatalogEntry returns the entry for a code", () => {
    const entry = getCatalogEntry("GENERATION_PROVIDER_RATE_LIMITED");
    expect(entry.httpStatus).toBe(429);
    expect(entry.grpcCode).toBe("RESOURCE_EXHAUSTED");
  });

  it("isValidErrorCode recognizes catalog codes only", () => {
    expect(isValidErrorCode("GENERATION_CANCELLED")).toBe(true);
    expect(isValidErrorCode("NOT_A_CODE")).toBe(false);
  });

  it("getAllErrorCodes lists every catalog key", () => {
    expect(getAllErrorCodes()).toHaveLength(Object.keys(ERROR_CATALOG).length);
  });

  it("classifies HTTP statuses", () => {
    expect(isServerError(499)).toBe(false);
    expect(isServerError(500)).toBe(true);
    expect(isServerError(503)).toBe(true);
    expect(isServerError(600)).toBe(false);
  });
});
