import { describe, it, expect, vi, beforeEach } from 'vitest';
import { pino } from 'pino';

import {
  collectCandidates,
  createTenantResolver,
  parseSubdomain,
  tenantCacheKey,
  type TenantResolver,
} from './tenant.resolver.js';
import {
  TenantInactiveError,
  TenantLookupUnavailableError,
  TenantNotFoundError,
} from '../../shared/errors/index.js';
import { MemoryStore, type SharedStore } from '../../shared/store/index.js';
import {
  ACME_ID,
  BETA_ID,
  DORMANT_ID,
  InMemoryTenantRepository,
  createTenantRow,
} from '../../test/fakes.js';

const RESERVED = ['www', 'api', 'app'];

describe('Tenant Resolver', () => {
  describe('parseSubdomain', () => {
    it.each([
      ['acme.example.com', 'acme'],
      ['ACME.Example.com:8080', 'acme'],
      ['beta.eu.example.com', 'beta'],
    ])('should read %s as %s', (host, expected) => {
      expect(parseSubdomain(host, RESERVED)).toBe(expected);
    });

    it.each([undefined, 'localhost', 'example.com:3000', '127.0.0.1', 'www.example.com', 'api.example.com'])(
      'should find no tenant in %s',
      (host) => {
        expect(parseSubdomain(host, RESERVED)).toBeNull();
      }
    );
  });

  describe('collectCandidates', () => {
    it('should order slug, subdomain then id', () => {
      expect(
        collectCandidates(
          { tenantId: ` ${ACME_ID} `, host: 'beta.example.com', slug: ' Gamma ' },
          RESERVED
        )
      ).toEqual([
        { kind: 'slug', value: 'gamma' },
        { kind: 'subdomain', value: 'beta' },
        { kind: 'id', value: ACME_ID },
      ]);
    });

    it('should skip empty hints', () => {
      expect(collectCandidates({ slug: '  ', host: 'www.example.com' }, RESERVED)).toEqual([]);
    });
  });

  describe('resolve', () => {
    let nowMs: number;
    let store: MemoryStore;
    let repository: InMemoryTenantRepository;
    let resolver: TenantResolver;

    const createResolver = (cache: SharedStore = store): TenantResolver =>
      createTenantResolver({
        repository,
        cache,
        logger: pino({ level: 'silent' }),
        cacheTtlSeconds: 5,
        timeoutMs: 50,
        reservedSubdomains: RESERVED,
      });

    beforeEach(() => {
      nowMs = 1_700_000_000_000;
      store = new MemoryStore(() => nowMs);
      repository = new InMemoryTenantRepository([
        createTenantRow(),
        createTenantRow({ id: BETA_ID, name: 'Beta', slug: 'beta', subdomain: 'beta-co' }),
        createTenantRow({
          id: DORMANT_ID,
          name: 'Dormant',
          slug: 'dormant',
          subdomain: 'dormant',
          isActive: false,
        }),
      ]);
      resolver = createResolver();
    });

    it('should require at least one hint', async () => {
      await expect(resolver.resolve({})).rejects.toThrow(TenantNotFoundError);
    });

    it('should prefer the slug over the subdomain', async () => {
      const tenant = await resolver.resolve({ slug: 'beta', host: 'acme.example.com' });

      expect(tenant.id).toBe(BETA_ID);
    });

    it('should fall through to later candidates', async () => {
      const tenant = await resolver.resolve({ slug: 'nobody', host: 'beta-co.example.com' });

      expect(tenant.id).toBe(BETA_ID);
    });

    it('should reject when no candidate resolves', async () => {
      await expect(
        resolver.resolve({ slug: 'nobody', tenantId: 'not-a-uuid' })
      ).rejects.toThrow('Tenant not found');
    });

    it('should reject an inactive tenant', async () => {
      await expect(resolver.resolve({ tenantId: DORMANT_ID })).rejects.toBeInstanceOf(
        TenantInactiveError
      );
    });

    it('should return equal contexts for unchanged hints and state', async () => {
      const first = await resolver.resolve({ host: 'acme.example.com' });
      const second = await resolver.resolve({ host: 'acme.example.com' });

      expect(second).toEqual(first);
    });

    it('should cache the tenant under every key', async () => {
      await resolver.resolve({ slug: 'acme' });

      const cached = await store.get(tenantCacheKey('id', ACME_ID));
      expect(cached).not.toBeNull();
      expect(await store.get(tenantCacheKey('subdomain', 'acme'))).toBe(cached);
      expect(await store.get(tenantCacheKey('slug', 'acme'))).toBe(cached);
    });

    it('should serve from cache until the entry expires', async () => {
      await resolver.resolve({ slug: 'acme' });
      const findSpy = vi.spyOn(repository, 'findBySlug');

      await repository.update(ACME_ID, { isActive: false });
      await expect(resolver.resolve({ slug: 'acme' })).resolves.toMatchObject({ isActive: true });
      expect(findSpy).not.toHaveBeenCalled();

      nowMs += 5000;
      await expect(resolver.resolve({ slug: 'acme' })).rejects.toBeInstanceOf(TenantInactiveError);
    });

    it('should see a deactivation immediately after invalidation', async () => {
      await resolver.resolve({ slug: 'acme' });
      await repository.update(ACME_ID, { isActive: false });

      await resolver.invalidate({ id: ACME_ID, slug: 'acme', subdomain: 'acme' });

      await expect(resolver.resolve({ tenantId: ACME_ID })).rejects.toBeInstanceOf(
        TenantInactiveError
      );
    });

    it('should ignore a malformed cache entry', async () => {
      await store.set(tenantCacheKey('slug', 'acme'), '{"id":"x"}', 5);

      await expect(resolver.resolve({ slug: 'acme' })).resolves.toMatchObject({ id: ACME_ID });
    });

    it('should read through to the repository when the cache fails', async () => {
      const broken: SharedStore = {
        get: vi.fn().mockRejectedValue(new Error('connection refused')),
        set: vi.fn().mockRejectedValue(new Error('connection refused')),
        del: vi.fn(),
        takeToken: vi.fn(),
      };

      await expect(createResolver(broken).resolve({ slug: 'acme' })).resolves.toMatchObject({
        id: ACME_ID,
      });
    });

    it('should report the repository as unavailable when it fails', async () => {
      vi.spyOn(repository, 'findBySlug').mockRejectedValue(new Error('db down'));

      await expect(resolver.resolve({ slug: 'acme' })).rejects.toBeInstanceOf(
        TenantLookupUnavailableError
      );
    });
  });
});
