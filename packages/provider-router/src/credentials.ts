import { GenerationConfigurationError } from "@quillgate/errors";
import type { CredentialSource, ProviderRegistry } from "./types.js";

export const DEFAULT_CREDENTIAL_CACHE_MS = 30_000;

/**
 * Credential source backed by an environment map, read on every call
 * so rotated or newly exported keys are picked up.
 */
export function envCredentialSource(
  env: Readonly<Record<string, string | undefined>> = process.env,
): CredentialSource {
  return (credentialId) => {
    const value = env[credentialId];
    return value !== undefined && value.trim() !== "" ? value : undefined;
  };
}

interface Snapshot {
  readonly usable: ReadonlySet<string>;
  readonly takenAt: number;
}

export interface CredentialDetectorOptions {
  readonly cacheTtlMs?: number;
  readonly now?: () => number;
}

/**
 * Determines which registry providers have every required credential.
 *
 * Snapshots are cached for `cacheTtlMs` and replaced whole, so a reader
 * sees either the previous detection or the new one.
 */
export class CredentialDetector {
  private readonly registry: ProviderRegistry;
  private readonly source: CredentialSource;
  private readonly options: CredentialDetectorOptions;
  private readonly cacheTtlMs: number;
  private readonly now: () => number;
  private snapshot: Snapshot | undefined;

  constructor(
    registry: ProviderRegistry,
    source: CredentialSource,
    options: CredentialDetectorOptions = {},
  ) {
    this.registry = registry;
    this.source = source;
    this.options = options;
    this.cacheTtlMs = options.cacheTtlMs ?? DEFAULT_CREDENTIAL_CACHE_MS;
    this.now = options.now ?? Date.now;
  }

  /** Names of the providers whose credentials are all present */
  detect(): ReadonlySet<string> {
    const now = this.now();
    const current = this.snapshot;
    if (current !== undefined && now - current.takenAt < this.cacheTtlMs) {
      return current.usable;
    }

    const usable = new Set<string>();
    for (const descriptor of this.registry.list()) {
      let complete = true;
      for (const id of descriptor.requiredCredentials) {
        const value = this.source(id);
        if (value === undefined || value.trim() === "") {
          complete = false;
          break;
        }
      }
      if (complete) usable.add(descriptor.name);
    }

    const next: Snapshot = { usable, takenAt: now };
    this.snapshot = next;
    return next.usable;
  }

  isUsable(provider: string): boolean {
    return this.detect().has(provider);
  }

  /** Drop the cached snapshot; the next detect() re-reads the source */
  invalidate(): void {
    this.snapshot = undefined;
  }

  /**
   * @throws GenerationConfigurationError when no provider is usable
   */
  requireUsable(): ReadonlySet<string> {
    const usable = this.detect();
    if (usable.size === 0) {
      throw new GenerationConfigurationError(
        `No LLM provider is configured. Set one of: ${this.requiredCredentialNames().join(", ")}`,
        this.registry.names(),
      );
    }
    return usable;
  }

  /** Fresh detector over another registry, sharing this one's source and cache settings */
  withRegistry(registry: ProviderRegistry): CredentialDetector {
    return new CredentialDetector(registry, this.source, this.options);
  }

  /** Credential reader handed to adapters */
  get credentials(): CredentialSource {
    return this.source;
  }

  private requiredCredentialNames(): string[] {
    return this.registry.list().flatMap((d) => [...d.requiredCredentials]);
  }
}
