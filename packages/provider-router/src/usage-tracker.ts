import { DuplicateSuccessRecordError, getErrorMessage } from "@quillgate/errors";
import { getCostTotal, getTokenUsage } from "@quillgate/telemetry";
import type {
  UsageAggregate,
  UsageEntry,
  UsageQuery,
  UsageRecord,
  UsageStore,
} from "./types.js";

export const DEFAULT_COST_PRECISION = 6;

export interface UsageTrackerOptions {
  /** Decimal places kept on computed costs (default 6) */
  readonly precision?: number;
  readonly store?: UsageStore;
  readonly now?: () => Date;
}

const EMPTY_AGGREGATE: UsageAggregate = {
  calls: 0,
  successes: 0,
  failures: 0,
  skipped: 0,
  tokensIn: 0,
  tokensOut: 0,
  cost: 0,
  estimatedCalls: 0,
};

export function roundCost(value: number, precision: number = DEFAULT_COST_PRECISION): number {
  const factor = 10 ** precision;
  return Math.round(value * factor) / factor;
}

function matches(record: UsageRecord, query: UsageQuery): boolean {
  if (query.userId !== undefined && record.userId !== query.userId) return false;
  if (query.provider !== undefined && record.provider !== query.provider) return false;
  if (query.from !== undefined && record.timestamp < query.from) return false;
  if (query.to !== undefined && record.timestamp >= query.to) return false;
  return true;
}

function fold(acc: UsageAggregate, record: UsageRecord, precision: number): UsageAggregate {
  return {
    calls: acc.calls + 1,
    successes: acc.successes + (record.outcomeKind === "success" ? 1 : 0),
    failures: acc.failures + (record.outcomeKind === "failed" ? 1 : 0),
    skipped: acc.skipped + (record.outcomeKind === "skipped" ? 1 : 0),
    tokensIn: acc.tokensIn + record.tokensIn,
    tokensOut: acc.tokensOut + record.tokensOut,
    cost: roundCost(acc.cost + record.cost, precision),
    estimatedCalls: acc.estimatedCalls + (record.estimated ? 1 : 0),
  };
}

/**
 * Append-only ledger of provider attempts with cost accounting.
 *
 * Records land in memory synchronously inside record(), so one request's
 * entries keep their call order. Reads work on a copy of the ledger.
 */
export class UsageTracker {
  private readonly ledger: UsageRecord[] = [];
  private readonly succeeded = new Set<string>();
  private readonly listeners = new Set<(record: UsageRecord) => void>();
  private readonly precision: number;
  private readonly store: UsageStore | undefined;
  private readonly now: () => Date;

  constructor(options: UsageTrackerOptions = {}) {
    this.precision = options.precision ?? DEFAULT_COST_PRECISION;
    this.store = options.store;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Price and append one attempt.
   *
   * @throws DuplicateSuccessRecordError on a second success for the same request
   */
  async record(entry: UsageEntry): Promise<UsageRecord> {
    const { outcome } = entry;

    if (outcome.kind === "success") {
      if (this.succeeded.has(entry.requestId)) {
        throw new DuplicateSuccessRecordError(entry.requestId);
      }
      this.succeeded.add(entry.requestId);
    }

    const tokensIn = outcome.kind === "skipped" ? 0 : entry.tokensIn;
    const tokensOut = outcome.kind === "skipped" ? 0 : entry.tokensOut;
    const cost = roundCost(
      tokensIn * entry.pricing.inRate + tokensOut * entry.pricing.outRate,
      this.precision,
    );

    const record: UsageRecord = Object.freeze({
      requestId: entry.requestId,
      provider: entry.provider,
      userId: entry.userId,
      tokensIn,
      tokensOut,
      cost,
      outcomeKind: outcome.kind,
      ...(outcome.kind === "failed" ? { errorKind: outcome.errorKind, message: outcome.message } : {}),
      ...(outcome.kind === "skipped" ? { message: outcome.reason } : {}),
      estimated: entry.estimated ?? false,
      timestamp: this.now(),
    });

    this.ledger.push(record);

    if (tokensIn + tokensOut > 0) {
      getTokenUsage().add(tokensIn + tokensOut, { provider: record.provider });
    }
    if (cost > 0) {
      getCostTotal().add(cost, { provider: record.provider });
    }

    for (const listener of this.listeners) {
      try {
        listener(record);
      } catch (error) {
        console.warn(
          `[provider-router] Request ${record.requestId}: usage listener failed: ${getErrorMessage(error)}`,
        );
      }
    }

    if (this.store) {
      try {
        await this.store.append(record);
      } catch (error) {
        console.warn(
          `[provider-router] Request ${record.requestId}: usage store append failed: ${getErrorMessage(error)}`,
        );
      }
    }

    return record;
  }

  /** Whether a success has already been recorded for the request */
  hasSucceeded(requestId: string): boolean {
    return this.succeeded.has(requestId);
  }

  /** Subscribe to appended records. Returns a disposer function. */
  onRecord(listener: (record: UsageRecord) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  records(): readonly UsageRecord[] {
    return [...this.ledger];
  }

  recordsFor(requestId: string): readonly UsageRecord[] {
    return this.ledger.filter((r) => r.requestId === requestId);
  }

  aggregate(query: UsageQuery = {}): UsageAggregate {
    return this.records()
      .filter((r) => matches(r, query))
      .reduce((acc, r) => fold(acc, r, this.precision), EMPTY_AGGREGATE);
  }

  aggregateByProvider(query: UsageQuery = {}): ReadonlyMap<string, UsageAggregate> {
    const result = new Map<string, UsageAggregate>();
    for (const record of this.records()) {
      if (!matches(record, query)) continue;
      result.set(record.provider, fold(result.get(record.provider) ?? EMPTY_AGGREGATE, record, this.precision));
    }
    return result;
  }
}
