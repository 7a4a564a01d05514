import { describe, it, expect, vi, beforeEach } from 'vitest';

import { createRedisStore } from './redis.js';
import { TAKE_TOKEN_SCRIPT } from './token-bucket.js';

const createMockRedis = () => ({
  defineCommand: vi.fn(),
  takeToken: vi.fn(),
  get: vi.fn(),
  setex: vi.fn(),
  del: vi.fn(),
});

describe('Redis store', () => {
  let mockRedis: ReturnType<typeof createMockRedis>;

  beforeEach(() => {
    mockRedis = createMockRedis();
  });

  it('should register the token bucket script as a single-key command', () => {
    createRedisStore(mockRedis as never);

    expect(mockRedis.defineCommand).toHaveBeenCalledWith('takeToken', {
      numberOfKeys: 1,
      lua: TAKE_TOKEN_SCRIPT,
    });
  });

  it('should pass bucket parameters to the script and parse its reply', async () => {
    mockRedis.takeToken.mockResolvedValue([1, '3.25']);
    const store = createRedisStore(mockRedis as never);

    const outcome = await store.takeToken('ratelimit:tenant:t-1', {
      capacity: 10,
      refillPerSecond: 0.5,
      nowMs: 1_700_000_000_000,
      ttlSeconds: 120,
    });

    expect(mockRedis.takeToken).toHaveBeenCalledWith(
      'ratelimit:tenant:t-1',
      10,
      0.5,
      1_700_000_000_000,
      120
    );
    expect(outcome).toEqual({ allowed: true, tokens: 3.25 });
  });

  it('should report a denied check', async () => {
    mockRedis.takeToken.mockResolvedValue([0, '0.4']);
    const store = createRedisStore(mockRedis as never);

    const outcome = await store.takeToken('ratelimit:tenant:t-1', {
      capacity: 10,
      refillPerSecond: 1,
      nowMs: 0,
      ttlSeconds: 120,
    });

    expect(outcome).toEqual({ allowed: false, tokens: 0.4 });
  });

  it('should write values with a TTL', async () => {
    mockRedis.setex.mockResolvedValue('OK');
    const store = createRedisStore(mockRedis as never);

    await store.set('tenant:ctx:slug:acme', '{}', 5);

    expect(mockRedis.setex).toHaveBeenCalledWith('tenant:ctx:slug:acme', 5, '{}');
  });

  it('should skip DEL when there are no keys', async () => {
    const store = createRedisStore(mockRedis as never);

    await store.del([]);

    expect(mockRedis.del).not.toHaveBeenCalled();
  });

  it('should delete every key in one call', async () => {
    mockRedis.del.mockResolvedValue(2);
    const store = createRedisStore(mockRedis as never);

    await store.del(['a', 'b']);

    expect(mockRedis.del).toHaveBeenCalledWith('a', 'b');
  });
});
