import type { BucketOutcome, BucketParams } from './token-bucket.js';

export type { BucketOutcome, BucketParams, BucketState } from './token-bucket.js';

/**
 * Key/value store shared by every instance of the service.
 *
 * Plain values back the tenant cache; `takeToken` is the only way rate-limit
 * state changes and must be atomic per key.
 */
export interface SharedStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  del(keys: string[]): Promise<void>;
  takeToken(key: string, bucket: BucketParams): Promise<BucketOutcome>;
}

export { createRedisStore } from './redis.js';
export { MemoryStore } from './memory.js';
