export type ReadEntryStatus = "pending" | "ready" | "failed";

export interface ReadEntry<T = unknown> {
  readId: string;
  status: ReadEntryStatus;
  result?: T;
  error?: string;
  createdAt: string;
  expiresAt: string;
}

interface StoredEntry {
  entry: ReadEntry;
  ownerId: string;
  expiresAtMs: number;
}

export interface ReadResultCacheOptions {
  ttlMs: number;
  now?: () => number;
  generateId?: () => string;
}

export const DEFAULT_READ_RESULT_TTL_MS = 5 * 60 * 1000;

/** Where backgrounded gateway reads land so a caller can poll for them. */
export class ReadResultCache {
  private readonly entries = new Map<string, StoredEntry>();
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly generateId: () => string;

  constructor(options: Partial<ReadResultCacheOptions> = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_READ_RESULT_TTL_MS;
    this.now = options.now ?? Date.now;
    this.generateId = options.generateId ?? (() => crypto.randomUUID());
  }

  get size(): number {
    this.prune();
    return this.entries.size;
  }

  /** Starts a pending entry that only `ownerId` may read back. */
  open(ownerId: string): string {
    this.prune();

    const readId = this.generateId();
    this.write(readId, { status: "pending" }, ownerId);
    return readId;
  }

  complete(readId: string, result: unknown): void {
    this.write(readId, { status: "ready", result });
  }

  fail(readId: string, error: unknown): void {
    this.write(readId, {
      status: "failed",
      error: error instanceof Error ? error.message : String(error),
    });
  }

  get(readId: string, ownerId: string): ReadEntry | null {
    this.prune();

    const stored = this.entries.get(readId);
    return stored && stored.ownerId === ownerId ? stored.entry : null;
  }

  private write(readId: string, update: Pick<ReadEntry, "status" | "result" | "error">, ownerId?: string): void {
    const nowMs = this.now();
    const existing = this.entries.get(readId);
    const owner = ownerId ?? existing?.ownerId;
    if (owner === undefined) {
      return;
    }

    const expiresAtMs = nowMs + this.ttlMs;

    this.entries.set(readId, {
      ownerId: owner,
      expiresAtMs,
      entry: {
        readId,
        ...update,
        createdAt: existing?.entry.createdAt ?? new Date(nowMs).toISOString(),
        expiresAt: new Date(expiresAtMs).toISOString(),
      },
    });
  }

  private prune(): void {
    const nowMs = this.now();
    for (const [readId, stored] of this.entries) {
      if (stored.expiresAtMs <= nowMs) {
        this.entries.delete(readId);
      }
    }
  }
}
