import type { SharedStore } from './index.js';
import {
  takeFromBucket,
  type BucketOutcome,
  type BucketParams,
  type BucketState,
} from './token-bucket.js';

interface Expiring<T> {
  value: T;
  expiresAt: number;
}

/**
 * In-process {@link SharedStore} for tests and single-instance development.
 * Each call runs to completion before the next starts, which makes
 * `takeToken` atomic without locking.
 */
export class MemoryStore implements SharedStore {
  private values = new Map<string, Expiring<string>>();
  private buckets = new Map<string, Expiring<BucketState>>();

  constructor(private readonly now: () => number = Date.now) {}

  async get(key: string): Promise<string | null> {
    return this.read(this.values, key) ?? null;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.values.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
  }

  async del(keys: string[]): Promise<void> {
    for (const key of keys) {
      this.values.delete(key);
      this.buckets.delete(key);
    }
  }

  async takeToken(key: string, bucket: BucketParams): Promise<BucketOutcome> {
    const outcome = takeFromBucket(this.read(this.buckets, key) ?? null, bucket);

    if (outcome.next) {
      this.buckets.set(key, {
        value: outcome.next,
        expiresAt: this.now() + bucket.ttlSeconds * 1000,
      });
    }

    return { allowed: outcome.allowed, tokens: outcome.tokens };
  }

  /** Current bucket state, for assertions */
  peekBucket(key: string): BucketState | undefined {
    return this.read(this.buckets, key);
  }

  clear(): void {
    this.values.clear();
    this.buckets.clear();
  }

  private read<T>(map: Map<string, Expiring<T>>, key: string): T | undefined {
    const entry = map.get(key);
    if (!entry) {
      return undefined;
    }
    if (entry.expiresAt <= this.now()) {
      map.delete(key);
      return undefined;
    }
    return entry.value;
  }
}
