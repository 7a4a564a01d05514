import { describe, it, expect, beforeEach } from 'vitest';
import jwt from 'jsonwebtoken';

import { createTokenCodec, parseBearerToken, type TokenCodec } from './token.codec.js';
import type { Identity } from '../identity/identity.types.js';
import {
  TenantMismatchError,
  TokenExpiredError,
  TokenInvalidError,
} from '../../shared/errors/index.js';

const SECRET = 'test-secret-test-secret-test-secret';
const ACME_ID = '11111111-1111-4111-8111-111111111111';
const BETA_ID = '22222222-2222-4222-8222-222222222222';
const ALICE_ID = 'aaaaaaaa-aaaa-4aaa-8aaa-aaaaaaaaaaaa';

const ACME = { id: ACME_ID };

const alice: Identity = { subjectId: ALICE_ID, tenantId: ACME_ID, role: 'member' };

describe('Token Codec', () => {
  let nowMs: number;
  let codec: TokenCodec;

  beforeEach(() => {
    nowMs = 1_700_000_000_000;
    codec = createTokenCodec({
      secret: SECRET,
      issuer: 'tenant-gate',
      ttlSeconds: 900,
      now: () => nowMs,
    });
  });

  describe('issue', () => {
    it('should sign the identity claims with issuer and expiry', () => {
      const issued = codec.issue(alice, ACME);

      expect(issued.tokenType).toBe('Bearer');
      expect(issued.expiresIn).toBe(900);
      expect(issued.expiresAt).toBe(new Date((1_700_000_000 + 900) * 1000).toISOString());
      expect(jwt.decode(issued.token)).toEqual({
        sub: ALICE_ID,
        tenant_id: ACME_ID,
        role: 'member',
        iss: 'tenant-gate',
        iat: 1_700_000_000,
        exp: 1_700_000_900,
      });
    });

    it('should refuse to issue a token for another tenant', () => {
      expect(() => codec.issue(alice, { id: BETA_ID })).toThrow(TenantMismatchError);
    });
  });

  describe('verify', () => {
    it('should return the identity for a valid token of the same tenant', () => {
      const { token } = codec.issue(alice, ACME);

      expect(codec.verify(token, { id: ACME_ID })).toEqual(alice);
    });

    it('should accept a token one second before expiry', () => {
      const { token } = codec.issue(alice, ACME);
      nowMs += 899_000;

      expect(codec.verify(token, { id: ACME_ID })).toEqual(alice);
    });

    it('should reject a token at its expiry time', () => {
      const { token } = codec.issue(alice, ACME);
      nowMs += 900_000;

      expect(() => codec.verify(token, { id: ACME_ID })).toThrow(TokenExpiredError);
    });

    it('should reject a token bound to another tenant', () => {
      const { token } = codec.issue(alice, ACME);

      const error = captureError(() => codec.verify(token, { id: BETA_ID }));

      expect(error).toBeInstanceOf(TenantMismatchError);
      expect(error).toMatchObject({ tokenTenantId: ACME_ID, requestTenantId: BETA_ID });
    });

    it('should report expiry before tenant binding', () => {
      const { token } = codec.issue(alice, ACME);
      nowMs += 3_600_000;

      expect(() => codec.verify(token, { id: BETA_ID })).toThrow(TokenExpiredError);
    });

    it('should reject a token whose payload was altered', () => {
      const { token } = codec.issue(alice, ACME);
      const [header, , signature] = token.split('.');
      const forged = Buffer.from(
        JSON.stringify({
          sub: ALICE_ID,
          tenant_id: ACME_ID,
          role: 'admin',
          iss: 'tenant-gate',
          iat: 1_700_000_000,
          exp: 1_700_000_900,
        })
      ).toString('base64url');

      expect(() => codec.verify(`${header}.${forged}.${signature}`, { id: ACME_ID })).toThrow(
        TokenInvalidError
      );
    });

    it('should reject a token signed with another secret even for another tenant', () => {
      const other = createTokenCodec({
        secret: 'another-test-secret-another-test-secret',
        issuer: 'tenant-gate',
        ttlSeconds: 900,
        now: () => nowMs,
      });
      const { token } = other.issue(alice, ACME);

      expect(() => codec.verify(token, { id: BETA_ID })).toThrow(TokenInvalidError);
    });

    it('should reject a token from another issuer', () => {
      const other = createTokenCodec({
        secret: SECRET,
        issuer: 'someone-else',
        ttlSeconds: 900,
        now: () => nowMs,
      });
      const { token } = other.issue(alice, ACME);

      expect(() => codec.verify(token, { id: ACME_ID })).toThrow(TokenInvalidError);
    });

    it('should reject a correctly signed token with an unknown role', () => {
      const token = jwt.sign(
        { tenant_id: ACME_ID, role: 'owner', iat: 1_700_000_000 },
        SECRET,
        { algorithm: 'HS256', subject: ALICE_ID, issuer: 'tenant-gate', expiresIn: 900 }
      );

      expect(() => codec.verify(token, { id: ACME_ID })).toThrow('Invalid token: malformed claims');
    });

    it('should reject a correctly signed token without expiry', () => {
      const token = jwt.sign({ tenant_id: ACME_ID, role: 'member', iat: 1_700_000_000 }, SECRET, {
        algorithm: 'HS256',
        subject: ALICE_ID,
        issuer: 'tenant-gate',
      });

      expect(() => codec.verify(token, { id: ACME_ID })).toThrow(TokenInvalidError);
    });

    it('should reject garbage', () => {
      expect(() => codec.verify('not-a-token', { id: ACME_ID })).toThrow(TokenInvalidError);
    });
  });

  describe('parseBearerToken', () => {
    it('should extract the token from a Bearer header', () => {
      expect(parseBearerToken('Bearer abc.def.ghi')).toBe('abc.def.ghi');
      expect(parseBearerToken('bearer abc.def.ghi')).toBe('abc.def.ghi');
    });

    it('should reject a missing header', () => {
      expect(() => parseBearerToken(undefined)).toThrow('Missing Authorization header');
    });

    it.each(['Basic dXNlcjpwYXNz', 'Bearer', 'Bearer a b', 'abc.def.ghi'])(
      'should reject "%s"',
      (header) => {
        expect(() => parseBearerToken(header)).toThrow(
          'Authorization header must use the Bearer scheme'
        );
      }
    );
  });
});

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}
