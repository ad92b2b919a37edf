import type { ErrorKind } from "@quillgate/errors";
import type { RetryDecision, RetryPolicyConfig } from "./types.js";

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_BASE_DELAY_MS = 1_000;
export const DEFAULT_MAX_DELAY_MS = 10_000;
export const DEFAULT_JITTER_FACTOR = 1.0;

/** UnknownError gets this many attempts at most before failing over */
const UNKNOWN_ERROR_ATTEMPTS = 2;

/** What the router does with each error kind once retries are not an option */
const TERMINAL_ACTION: Readonly<Record<ErrorKind, "failover" | "abort">> = {
  AuthError: "failover",
  RateLimited: "failover",
  Timeout: "failover",
  TransientServerError: "failover",
  InvalidRequest: "abort",
  ContentPolicyViolation: "abort",
  UnknownError: "failover",
};

const RETRYABLE: ReadonlySet<ErrorKind> = new Set<ErrorKind>([
  "RateLimited",
  "Timeout",
  "TransientServerError",
  "UnknownError",
]);

/**
 * Per-provider retry rule.
 *
 * Backoff: `min(maxDelay, base * 2^(attempt-1))` plus up to `jitterFactor`
 * of that again at random, raised to any upstream Retry-After hint.
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly jitterFactor: number;
  private readonly random: () => number;

  constructor(config: RetryPolicyConfig = {}) {
    this.maxAttempts = config.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    this.baseDelayMs = config.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
    this.maxDelayMs = config.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
    this.jitterFactor = Math.max(0, Math.min(1, config.jitterFactor ?? DEFAULT_JITTER_FACTOR));
    this.random = config.random ?? Math.random;

    if (!Number.isInteger(this.maxAttempts) || this.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${this.maxAttempts}`);
    }
  }

  /**
   * Decide what follows a failed attempt.
   *
   * @param attempt - 1-based number of the attempt that just failed
   * @param retryAfterMs - upstream Retry-After hint, if any
   */
  decide(errorKind: ErrorKind, attempt: number, retryAfterMs?: number): RetryDecision {
    if (!RETRYABLE.has(errorKind)) {
      return { action: TERMINAL_ACTION[errorKind] };
    }

    const budget =
      errorKind === "UnknownError"
        ? Math.min(UNKNOWN_ERROR_ATTEMPTS, this.maxAttempts)
        : this.maxAttempts;

    if (attempt >= budget) {
      return { action: TERMINAL_ACTION[errorKind] };
    }

    return { action: "retry", delayMs: this.delayFor(attempt, retryAfterMs) };
  }

  /** Backoff before the attempt following `attempt` */
  delayFor(attempt: number, retryAfterMs?: number): number {
    const exponential = Math.min(this.maxDelayMs, this.baseDelayMs * 2 ** (attempt - 1));
    const jittered = exponential + this.random() * exponential * this.jitterFactor;
    return Math.max(jittered, retryAfterMs ?? 0);
  }
}
