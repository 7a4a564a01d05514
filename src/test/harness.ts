import { pino } from 'pino';

import {
  ACME_ID,
  ALICE_ID,
  BETA_ID,
  BOB_ID,
  CAROL_ID,
  DAVE_ID,
  DORMANT_ID,
  InMemoryIdentityRepository,
  InMemoryTenantRepository,
  createTenantRow,
} from './fakes.js';
import {
  createAdmissionPipeline,
  type AdmissionPipeline,
} from '../modules/admission/admission.pipeline.js';
import { createTokenCodec, type TokenCodec } from '../modules/auth/token.codec.js';
import type { Identity } from '../modules/identity/identity.types.js';
import { createRbacAuthorizer, type RbacAuthorizer } from '../modules/rbac/rbac.authorizer.js';
import { createTenantResolver, type TenantResolver } from '../modules/tenant/tenant.resolver.js';
import {
  createRateLimiter,
  type DegradationPolicy,
  type RateLimiter,
} from '../shared/rate-limiter/index.js';
import { MemoryStore, type SharedStore } from '../shared/store/index.js';

export const TEST_TOKEN_SECRET = 'test-secret-test-secret-test-secret';

export const IDENTITIES = {
  alice: { subjectId: ALICE_ID, tenantId: ACME_ID, role: 'admin' },
  bob: { subjectId: BOB_ID, tenantId: ACME_ID, role: 'member' },
  carol: { subjectId: CAROL_ID, tenantId: ACME_ID, role: 'viewer' },
  dave: { subjectId: DAVE_ID, tenantId: BETA_ID, role: 'admin' },
} satisfies Record<string, Identity>;

export interface AdmissionHarness {
  clock: { nowMs: number };
  store: MemoryStore;
  tenants: InMemoryTenantRepository;
  identities: InMemoryIdentityRepository;
  resolver: TenantResolver;
  rateLimiter: RateLimiter;
  tokenCodec: TokenCodec;
  authorizer: RbacAuthorizer;
  pipeline: AdmissionPipeline;
  /** Signed token for a known identity */
  tokenFor(identity: Identity): string;
}

export interface AdmissionHarnessOptions {
  degradation?: DegradationPolicy;
  /** Store used by the rate limiter, defaults to the harness MemoryStore */
  rateLimitStore?: SharedStore;
}

/**
 * Acme (free tier, 60/min burst 10) with an admin, a member and a viewer;
 * Beta with one admin; Dormant, which is inactive.
 */
export function createAdmissionHarness(options: AdmissionHarnessOptions = {}): AdmissionHarness {
  const logger = pino({ level: 'silent' });
  const clock = { nowMs: 1_700_000_000_000 };
  const now = (): number => clock.nowMs;
  const store = new MemoryStore(now);

  const tenants = new InMemoryTenantRepository([
    createTenantRow(),
    createTenantRow({ id: BETA_ID, name: 'Beta', slug: 'beta', subdomain: 'beta' }),
    createTenantRow({
      id: DORMANT_ID,
      name: 'Dormant',
      slug: 'dormant',
      subdomain: 'dormant',
      isActive: false,
    }),
  ]);
  const identities = new InMemoryIdentityRepository(Object.values(IDENTITIES));

  const resolver = createTenantResolver({
    repository: tenants,
    cache: store,
    logger,
    cacheTtlSeconds: 5,
    timeoutMs: 50,
    reservedSubdomains: ['www', 'api', 'app'],
  });
  const rateLimiter = createRateLimiter({
    store: options.rateLimitStore ?? store,
    logger,
    degradation: options.degradation ?? 'fail-open',
    timeoutMs: 50,
    stateTtlSeconds: 120,
    degradedRetryAfterSeconds: 1,
    now,
  });
  const tokenCodec = createTokenCodec({
    secret: TEST_TOKEN_SECRET,
    issuer: 'tenant-gate',
    ttlSeconds: 900,
    now,
  });
  const authorizer = createRbacAuthorizer({ identityRepository: identities, logger, timeoutMs: 50 });
  const pipeline = createAdmissionPipeline({ resolver, rateLimiter, tokenCodec, authorizer, logger });

  return {
    clock,
    store,
    tenants,
    identities,
    resolver,
    rateLimiter,
    tokenCodec,
    authorizer,
    pipeline,
    tokenFor: (identity) => tokenCodec.issue(identity, { id: identity.tenantId }).token,
  };
}
