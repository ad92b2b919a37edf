import { describe, expect, it } from "vitest";
import { getCostTotal, getProviderAttempts, getProviderLatency, getTokenUsage } from "../metrics.js";

describe("metrics", () => {
  it("should return the same instrument on repeated access", () => {
    expect(getProviderAttempts()).toBe(getProviderAttempts());
    expect(getProviderLatency()).toBe(getProviderLatency());
    expect(getTokenUsage()).toBe(getTokenUsage());
    expect(getCostTotal()).toBe(getCostTotal());
  });

  it("should accept recordings without a registered meter provider", () => {
    expect(() => {
      getProviderAttempts().add(1, { provider: "gemini", outcome: "success" });
      getProviderLatency().record(120, { provider: "gemini" });
      getTokenUsage().add(300, { provider: "gemini" });
      getCostTotal().add(0.0002, { provider: "gemini" });
    }).not.toThrow();
  });
});
