export interface BucketParams {
  /** Maximum tokens the bucket holds (burst) */
  capacity: number;
  /** Tokens added per second */
  refillPerSecond: number;
  /** Caller clock, epoch milliseconds */
  nowMs: number;
  /** Expiry of the persisted state */
  ttlSeconds: number;
}

export interface BucketState {
  tokens: number;
  lastRefillMs: number;
}

export interface BucketOutcome {
  allowed: boolean;
  /** Tokens left after this check (fractional) */
  tokens: number;
}

/**
 * Refill-and-decrement on a single bucket. A missing state is a full bucket.
 * `next` is only set when a token was taken; a denied check changes nothing.
 */
export function takeFromBucket(
  state: BucketState | null,
  params: BucketParams
): BucketOutcome & { next: BucketState | null } {
  const last = state?.lastRefillMs ?? params.nowMs;
  const current = state?.tokens ?? params.capacity;
  const now = Math.max(last, params.nowMs);

  const elapsedSeconds = (now - last) / 1000;
  const tokens = Math.min(params.capacity, current + elapsedSeconds * params.refillPerSecond);

  if (tokens < 1) {
    return { allowed: false, tokens, next: null };
  }

  const remaining = tokens - 1;
  return {
    allowed: true,
    tokens: remaining,
    next: { tokens: remaining, lastRefillMs: now },
  };
}

/**
 * Redis-side twin of {@link takeFromBucket}. Runs as one script so the
 * read-refill-decrement-write sequence is atomic per key.
 *
 * KEYS[1] bucket hash, ARGV: capacity, refill per second, now (ms), ttl (s).
 * Returns { allowed (0|1), tokens as string }.
 */
export const TAKE_TOKEN_SCRIPT = `
local key = KEYS[1]
local capacity = tonumber(ARGV[1])
local rate = tonumber(ARGV[2])
local now = tonumber(ARGV[3])
local ttl = tonumber(ARGV[4])

local state = redis.call('HMGET', key, 'tokens', 'ts')
local tokens = tonumber(state[1])
local last = tonumber(state[2])
if tokens == nil or last == nil then
  tokens = capacity
  last = now
end

now = math.max(last, now)
tokens = math.min(capacity, tokens + ((now - last) / 1000) * rate)

if tokens < 1 then
  return {0, tostring(tokens)}
end

tokens = tokens - 1
redis.call('HSET', key, 'tokens', tostring(tokens), 'ts', tostring(now))
redis.call('EXPIRE', key, ttl)
return {1, tostring(tokens)}
`;
