import type { Redis, Result } from 'ioredis';

import type { SharedStore } from './index.js';
import { TAKE_TOKEN_SCRIPT, type BucketOutcome, type BucketParams } from './token-bucket.js';

declare module 'ioredis' {
  interface RedisCommander<Context> {
    takeToken(
      key: string,
      capacity: number,
      refillPerSecond: number,
      nowMs: number,
      ttlSeconds: number
    ): Result<[number, string], Context>;
  }
}

export function createRedisStore(redis: Redis): SharedStore {
  redis.defineCommand('takeToken', {
    numberOfKeys: 1,
    lua: TAKE_TOKEN_SCRIPT,
  });

  return {
    async get(key: string): Promise<string | null> {
      return redis.get(key);
    },

    async set(key: string, value: string, ttlSeconds: number): Promise<void> {
      await redis.setex(key, ttlSeconds, value);
    },

    async del(keys: string[]): Promise<void> {
      if (keys.length === 0) {
        return;
      }
      await redis.del(...keys);
    },

    async takeToken(key: string, bucket: BucketParams): Promise<BucketOutcome> {
      const [allowed, tokens] = await redis.takeToken(
        key,
        bucket.capacity,
        bucket.refillPerSecond,
        bucket.nowMs,
        bucket.ttlSeconds
      );

      return {
        allowed: allowed === 1,
        tokens: Number.parseFloat(tokens),
      };
    },
  };
}
