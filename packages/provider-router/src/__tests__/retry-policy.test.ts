import { describe, expect, it } from "vitest";
import { RetryPolicy } from "../retry-policy.js";

describe("RetryPolicy", () => {
  const noJitter = new RetryPolicy({ random: () => 0 });

  it("uses the default budget and backoff", () => {
    expect(noJitter.maxAttempts).toBe(3);
    expect(noJitter.decide("RateLimited", 1)).toEqual({ action: "retry", delayMs: 1_000 });
    expect(noJitter.decide("RateLimited", 2)).toEqual({ action: "retry", delayMs: 2_000 });
    expect(noJitter.decide("RateLimited", 3)).toEqual({ action: "failover" });
  });

  it("retries Timeout and TransientServerError up to the budget", () => {
    expect(noJitter.decide("Timeout", 2).action).toBe("retry");
    expect(noJitter.decide("TransientServerError", 3).action).toBe("failover");
  });

  it("fails over immediately on AuthError", () => {
    expect(noJitter.decide("AuthError", 1)).toEqual({ action: "failover" });
  });

  it("aborts on caller-side errors", () => {
    expect(noJitter.decide("InvalidRequest", 1)).toEqual({ action: "abort" });
    expect(noJitter.decide("ContentPolicyViolation", 1)).toEqual({ action: "abort" });
  });

  it("retries UnknownError once", () => {
    expect(noJitter.decide("UnknownError", 1).action).toBe("retry");
    expect(noJitter.decide("UnknownError", 2)).toEqual({ action: "failover" });
  });

  it("caps the exponential delay at maxDelayMs", () => {
    const policy = new RetryPolicy({ maxAttempts: 10, baseDelayMs: 1_000, maxDelayMs: 5_000, random: () => 0 });
    expect(policy.delayFor(3)).toBe(4_000);
    expect(policy.delayFor(4)).toBe(5_000);
    expect(policy.delayFor(8)).toBe(5_000);
  });

  it("adds jitter proportional to the delay", () => {
    const policy = new RetryPolicy({ random: () => 0.5, jitterFactor: 1 });
    expect(policy.delayFor(1)).toBe(1_500);
    const half = new RetryPolicy({ random: () => 1, jitterFactor: 0.5 });
    expect(half.delayFor(2)).toBe(3_000);
  });

  it("honors a larger Retry-After hint", () => {
    expect(noJitter.decide("RateLimited", 1, 7_000)).toEqual({ action: "retry", delayMs: 7_000 });
    expect(noJitter.decide("RateLimited", 1, 10)).toEqual({ action: "retry", delayMs: 1_000 });
  });

  it("clamps the jitter factor into [0, 1]", () => {
    expect(new RetryPolicy({ jitterFactor: 3 }).jitterFactor).toBe(1);
    expect(new RetryPolicy({ jitterFactor: -1 }).jitterFactor).toBe(0);
  });

  it("rejects a non-positive attempt budget", () => {
    expect(() => new RetryPolicy({ maxAttempts: 0 })).toThrow(RangeError);
  });

  it("a budget of one never retries", () => {
    const policy = new RetryPolicy({ maxAttempts: 1 });
    expect(policy.decide("Timeout", 1)).toEqual({ action: "failover" });
    expect(policy.decide("UnknownError", 1)).toEqual({ action: "failover" });
  });
});
