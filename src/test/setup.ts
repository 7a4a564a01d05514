import { vi } from 'vitest';

// Configuration is parsed at import time
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL ??= 'silent';
process.env.DATABASE_URL ??= 'postgres://localhost:5432/tenant_gate_test';
process.env.REDIS_URL ??= 'redis://localhost:6379';
process.env.ADMIN_API_KEY ??= 'test-admin-key';
process.env.TOKEN_SECRET ??= 'test-secret-test-secret-test-secret';

// Mock Redis client
vi.mock('../shared/redis/client.js', () => ({
  redis: {
    get: vi.fn(),
    setex: vi.fn(),
    del: vi.fn(),
    publish: vi.fn(),
    ping: vi.fn(),
    defineCommand: vi.fn(),
  },
  createSubscriber: vi.fn(),
  connectRedis: vi.fn(),
  pingRedis: vi.fn(),
  closeRedis: vi.fn(),
}));

// Mock database client
vi.mock('../shared/database/client.js', () => ({
  db: {
    select: vi.fn(),
    insert: vi.fn(),
    update: vi.fn(),
    delete: vi.fn(),
  },
  pingDatabase: vi.fn(),
  closeDatabase: vi.fn(),
}));
