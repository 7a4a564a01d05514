import type { Logger } from 'pino';

import type { SubscriptionTier, TenantContext } from '../../modules/tenant/tenant.types.js';
import { StoreUnavailableError } from '../errors/index.js';
import {
  rateLimitDegradedTotal,
  rateLimitHitsTotal,
  rateLimitRemaining,
} from '../metrics/index.js';
import type { BucketOutcome, SharedStore } from '../store/index.js';
import { withTimeout } from '../timeout/index.js';

/** What to do when the shared store cannot be reached */
export type DegradationPolicy = 'fail-open' | 'fail-closed';

export interface BucketLimits {
  requestsPerMinute: number;
  burst: number;
}

export const TIER_LIMITS: Record<SubscriptionTier, BucketLimits> = {
  free: { requestsPerMinute: 60, burst: 10 },
  basic: { requestsPerMinute: 120, burst: 20 },
  premium: { requestsPerMinute: 600, burst: 100 },
  enterprise: { requestsPerMinute: 3000, burst: 500 },
};

export type RateLimitDecision =
  | {
      admitted: true;
      limit: number;
      remaining: number;
      degraded: boolean;
    }
  | {
      admitted: false;
      limit: number;
      remaining: 0;
      /** Seconds until one token is available (fractional) */
      retryAfterSeconds: number;
      degraded: boolean;
    };

export interface RateLimiterOptions {
  store: SharedStore;
  logger: Logger;
  degradation: DegradationPolicy;
  timeoutMs: number;
  /** Minimum lifetime of a bucket's persisted state */
  stateTtlSeconds: number;
  /** Retry hint for requests denied under fail-closed */
  degradedRetryAfterSeconds: number;
  now?: () => number;
}

export interface RateLimiter {
  admit(tenant: TenantContext): Promise<RateLimitDecision>;
}

/**
 * Tier defaults with the tenant's own override applied field by field
 */
export function resolveBucketLimits(tenant: TenantContext): BucketLimits {
  const defaults = TIER_LIMITS[tenant.tier];
  return {
    requestsPerMinute: tenant.rateLimit?.requestsPerMinute ?? defaults.requestsPerMinute,
    burst: tenant.rateLimit?.burst ?? defaults.burst,
  };
}

export function getTenantRateLimitKey(tenantId: string): string {
  return `ratelimit:tenant:${tenantId}`;
}

/**
 * State must outlive a full refill, otherwise an evicted bucket would come
 * back full before it had earned it.
 */
export function bucketTtlSeconds(limits: BucketLimits, minimumSeconds: number): number {
  const fullRefillSeconds = Math.ceil((limits.burst * 60) / limits.requestsPerMinute);
  return Math.max(minimumSeconds, fullRefillSeconds);
}

/**
 * Per-tenant token bucket backed by the shared store.
 *
 * The refill and the decrement happen in one atomic store call, so concurrent
 * admissions for a tenant never overdraw the bucket. A store failure or
 * timeout is handled here and only here, according to `degradation`.
 */
export function createRateLimiter(options: RateLimiterOptions): RateLimiter {
  const { store, logger, degradation, timeoutMs } = options;
  const now = options.now ?? Date.now;

  function degrade(tenant: TenantContext, limits: BucketLimits, error: unknown): RateLimitDecision {
    const cause = new StoreUnavailableError('rate limit check', { cause: error });
    rateLimitDegradedTotal.inc({ policy: degradation });
    logger.warn(
      { err: cause, tenantId: tenant.id, policy: degradation },
      'Rate limiter running in degraded mode'
    );

    if (degradation === 'fail-open') {
      return { admitted: true, limit: limits.burst, remaining: limits.burst, degraded: true };
    }

    return {
      admitted: false,
      limit: limits.burst,
      remaining: 0,
      retryAfterSeconds: options.degradedRetryAfterSeconds,
      degraded: true,
    };
  }

  return {
    async admit(tenant: TenantContext): Promise<RateLimitDecision> {
      const limits = resolveBucketLimits(tenant);
      const refillPerSecond = limits.requestsPerMinute / 60;

      let outcome: BucketOutcome;
      try {
        outcome = await withTimeout(
          store.takeToken(getTenantRateLimitKey(tenant.id), {
            capacity: limits.burst,
            refillPerSecond,
            nowMs: now(),
            ttlSeconds: bucketTtlSeconds(limits, options.stateTtlSeconds),
          }),
          timeoutMs,
          'rate limit check'
        );
      } catch (error) {
        return degrade(tenant, limits, error);
      }

      const remaining = Math.max(0, Math.floor(outcome.tokens));
      rateLimitRemaining.set({ tenant_id: tenant.id }, remaining);

      if (outcome.allowed) {
        return { admitted: true, limit: limits.burst, remaining, degraded: false };
      }

      rateLimitHitsTotal.inc({ tenant_id: tenant.id });

      return {
        admitted: false,
        limit: limits.burst,
        remaining: 0,
        retryAfterSeconds: (1 - outcome.tokens) / refillPerSecond,
        degraded: false,
      };
    },
  };
}
