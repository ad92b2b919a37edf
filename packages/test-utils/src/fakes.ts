import type { CredentialSource, UsageRecord, UsageStore } from "@quillgate/provider-router";

/**
 * Mutable credential map standing in for the process environment.
 */
export class InMemoryCredentials {
  private readonly values = new Map<string, string>();
  /** Number of lookups served, for cache assertions */
  reads = 0;

  constructor(initial: Readonly<Record<string, string>> = {}) {
    for (const [key, value] of Object.entries(initial)) {
      this.values.set(key, value);
    }
  }

  set(id: string, value: string): this {
    this.values.set(id, value);
    return this;
  }

  delete(id: string): this {
    this.values.delete(id);
    return this;
  }

  readonly source: CredentialSource = (id) => {
    this.reads++;
    const value = this.values.get(id);
    return value !== undefined && value.trim() !== "" ? value : undefined;
  };
}

/**
 * Usage store that keeps appended records in memory.
 * Set `failWith` to make every append reject.
 */
export class InMemoryUsageStore implements UsageStore {
  readonly records: UsageRecord[] = [];
  failWith: Error | undefined;

  async append(record: UsageRecord): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.records.push(record);
  }
}
