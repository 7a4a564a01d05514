import type { Logger } from 'pino';

import { toTenantContext, type TenantRepository } from './tenant.repository.js';
import type { TenantRow } from './tenant.schema.js';
import {
  tenantContextSchema,
  type TenantContext,
  type TenantHints,
  type TenantLookupKind,
} from './tenant.types.js';
import {
  TenantInactiveError,
  TenantLookupUnavailableError,
  TenantNotFoundError,
} from '../../shared/errors/index.js';
import { tenantCacheLookupsTotal } from '../../shared/metrics/index.js';
import type { SharedStore } from '../../shared/store/index.js';
import { withTimeout } from '../../shared/timeout/index.js';

const TENANT_CACHE_PREFIX = 'tenant:ctx:';
const IPV4_HOST = /^\d{1,3}(\.\d{1,3}){3}$/;

export interface TenantCandidate {
  kind: TenantLookupKind;
  value: string;
}

export interface TenantResolverOptions {
  repository: Pick<TenantRepository, 'findById' | 'findBySlug' | 'findBySubdomain'>;
  cache: SharedStore;
  logger: Logger;
  /** Keep short: a cached active tenant stays admissible until it expires */
  cacheTtlSeconds: number;
  timeoutMs: number;
  reservedSubdomains: readonly string[];
}

export interface TenantResolver {
  resolve(hints: TenantHints): Promise<TenantContext>;
  /** Drop every cached entry of a tenant */
  invalidate(tenant: Pick<TenantContext, 'id' | 'slug' | 'subdomain'>): Promise<void>;
}

export function tenantCacheKey(kind: TenantLookupKind, value: string): string {
  return `${TENANT_CACHE_PREFIX}${kind}:${value}`;
}

/**
 * Extract the tenant label from a Host header: "acme.example.com:8080" -> "acme".
 * Needs at least three labels; IP addresses and reserved labels yield null.
 */
export function parseSubdomain(
  host: string | undefined,
  reservedSubdomains: readonly string[]
): string | null {
  if (!host) {
    return null;
  }

  const hostname = host.trim().toLowerCase().replace(/:\d+$/, '');
  if (IPV4_HOST.test(hostname)) {
    return null;
  }

  const labels = hostname.split('.');
  const [label] = labels;
  if (labels.length < 3 || !label || reservedSubdomains.includes(label)) {
    return null;
  }

  return label;
}

/**
 * Candidates in priority order: slug header, Host subdomain, tenant id header.
 */
export function collectCandidates(
  hints: TenantHints,
  reservedSubdomains: readonly string[]
): TenantCandidate[] {
  const candidates: TenantCandidate[] = [];

  const slug = hints.slug?.trim().toLowerCase();
  if (slug) {
    candidates.push({ kind: 'slug', value: slug });
  }

  const subdomain = parseSubdomain(hints.host, reservedSubdomains);
  if (subdomain) {
    candidates.push({ kind: 'subdomain', value: subdomain });
  }

  const tenantId = hints.tenantId?.trim();
  if (tenantId) {
    candidates.push({ kind: 'id', value: tenantId });
  }

  return candidates;
}

export function createTenantResolver(options: TenantResolverOptions): TenantResolver {
  const { repository, cache, logger, cacheTtlSeconds, timeoutMs } = options;

  const finders: Record<TenantLookupKind, (value: string) => Promise<TenantRow | null>> = {
    slug: (value) => repository.findBySlug(value),
    subdomain: (value) => repository.findBySubdomain(value),
    id: (value) => repository.findById(value),
  };

  function cacheKeys(tenant: Pick<TenantContext, 'id' | 'slug' | 'subdomain'>): string[] {
    return [
      tenantCacheKey('slug', tenant.slug),
      tenantCacheKey('subdomain', tenant.subdomain),
      tenantCacheKey('id', tenant.id),
    ];
  }

  async function readCache(key: string): Promise<TenantContext | null> {
    let raw: string | null;
    try {
      raw = await withTimeout(cache.get(key), timeoutMs, 'tenant cache read');
    } catch (err) {
      tenantCacheLookupsTotal.inc({ result: 'error' });
      logger.warn({ err, key }, 'Tenant cache unavailable, reading from repository');
      return null;
    }

    if (raw === null) {
      tenantCacheLookupsTotal.inc({ result: 'miss' });
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      parsed = undefined;
    }

    const result = tenantContextSchema.safeParse(parsed);
    if (!result.success) {
      tenantCacheLookupsTotal.inc({ result: 'miss' });
      logger.warn({ key }, 'Discarding malformed tenant cache entry');
      return null;
    }

    tenantCacheLookupsTotal.inc({ result: 'hit' });
    return result.data;
  }

  async function writeCache(tenant: TenantContext): Promise<void> {
    const value = JSON.stringify(tenant);
    try {
      await withTimeout(
        Promise.all(cacheKeys(tenant).map((key) => cache.set(key, value, cacheTtlSeconds))),
        timeoutMs,
        'tenant cache write'
      );
    } catch (err) {
      logger.warn({ err, tenantId: tenant.id }, 'Failed to cache tenant');
    }
  }

  async function lookup(candidate: TenantCandidate): Promise<TenantContext | null> {
    const cached = await readCache(tenantCacheKey(candidate.kind, candidate.value));
    if (cached) {
      return cached;
    }

    let row: TenantRow | null;
    try {
      row = await withTimeout(
        finders[candidate.kind](candidate.value),
        timeoutMs,
        `tenant lookup by ${candidate.kind}`
      );
    } catch (err) {
      logger.error({ err, kind: candidate.kind }, 'Tenant lookup failed');
      throw new TenantLookupUnavailableError({ cause: err });
    }

    if (!row) {
      return null;
    }

    const tenant = toTenantContext(row);
    await writeCache(tenant);
    return tenant;
  }

  return {
    async resolve(hints: TenantHints): Promise<TenantContext> {
      const candidates = collectCandidates(hints, options.reservedSubdomains);

      if (candidates.length === 0) {
        throw new TenantNotFoundError(
          'Tenant identifier required (X-Tenant-Slug header, subdomain or X-Tenant-Id header)'
        );
      }

      for (const candidate of candidates) {
        const tenant = await lookup(candidate);
        if (!tenant) {
          continue;
        }

        if (!tenant.isActive) {
          throw new TenantInactiveError(tenant.id);
        }

        logger.debug({ tenantId: tenant.id, via: candidate.kind }, 'Tenant resolved');
        return tenant;
      }

      throw new TenantNotFoundError();
    },

    async invalidate(tenant: Pick<TenantContext, 'id' | 'slug' | 'subdomain'>): Promise<void> {
      try {
        await withTimeout(cache.del(cacheKeys(tenant)), timeoutMs, 'tenant cache invalidation');
        logger.info({ tenantId: tenant.id }, 'Tenant cache invalidated');
      } catch (err) {
        // Entries expire on their own within cacheTtlSeconds
        logger.error({ err, tenantId: tenant.id }, 'Tenant cache invalidation failed');
      }
    },
  };
}
