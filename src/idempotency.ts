import { createHash } from 'node:crypto';
import { LRUCache } from 'lru-cache';
import PQueue from 'p-queue';
import { logger } from './logging/index.js';
import type { TaigaRecord } from './taiga-client.js';

// ============================================
// IDEMPOTENCY STORE
// ============================================

interface IdempotencyEntry {
  value: TaigaRecord;
  expiresAt: number;
}

export interface IdempotencyStoreOptions {
  ttlSeconds?: number;
  maxEntries?: number;
  /** Milliseconds since epoch. */
  now?: () => number;
}

export const DEFAULT_IDEMPOTENCY_TTL_SECONDS = 24 * 60 * 60;
export const DEFAULT_IDEMPOTENCY_MAX_ENTRIES = 10000;

/**
 * In-memory record of create results keyed by caller-supplied idempotency tokens.
 *
 * Expiry is lazy: every `get` and `store` first drops entries whose deadline has passed.
 * Access is serialized through a single-slot queue; callers never hold it across
 * a remote call. Values are deep-copied in both directions.
 */
export class IdempotencyStore {
  private entries: LRUCache<string, IdempotencyEntry>;
  private queue = new PQueue({ concurrency: 1 });
  private ttlMs: number;
  private now: () => number;

  constructor(options: IdempotencyStoreOptions = {}) {
    this.ttlMs = (options.ttlSeconds ?? DEFAULT_IDEMPOTENCY_TTL_SECONDS) * 1000;
    this.now = options.now ?? Date.now;
    this.entries = new LRUCache<string, IdempotencyEntry>({
      max: options.maxEntries ?? DEFAULT_IDEMPOTENCY_MAX_ENTRIES,
    });
  }

  async get(key: string): Promise<TaigaRecord | null> {
    return this.queue.add(
      () => {
        this.purgeExpired();
        const entry = this.entries.get(key);
        if (!entry) return null;

        logger.debug('Idempotency cache hit', { key }, 'idempotency');
        return structuredClone(entry.value);
      },
      { throwOnTimeout: true }
    );
  }

  async store(key: string, value: TaigaRecord): Promise<void> {
    await this.queue.add(
      () => {
        this.purgeExpired();
        this.entries.set(key, {
          value: structuredClone(value),
          expiresAt: this.now() + this.ttlMs,
        });
      },
      { throwOnTimeout: true }
    );
  }

  get size(): number {
    return this.entries.size;
  }

  private purgeExpired(): void {
    const now = this.now();
    const expired: string[] = [];
    for (const [key, entry] of this.entries.entries()) {
      if (entry.expiresAt <= now) {
        expired.push(key);
      }
    }
    for (const key of expired) {
      this.entries.delete(key);
    }
  }
}

/**
 * `<token>:<sha256 hex of "<entityId>:<subject>">`. The same token reused for a
 * different subject or parent yields a different key.
 */
export function makeIdempotencyCacheKey(token: string, entityId: number | string, subject: string): string {
  const digest = createHash('sha256').update(`${entityId}:${subject}`, 'utf8').digest('hex');
  return `${token}:${digest}`;
}
