import jwt from 'jsonwebtoken';

import { tokenClaimsSchema, type IssuedToken, type TokenClaims } from './auth.types.js';
import type { Identity } from '../identity/identity.types.js';
import type { TenantContext } from '../tenant/tenant.types.js';
import {
  TenantMismatchError,
  TokenExpiredError,
  TokenInvalidError,
} from '../../shared/errors/index.js';

const ALGORITHM = 'HS256';

export interface TokenCodecOptions {
  secret: string;
  issuer: string;
  ttlSeconds: number;
  /** Milliseconds since epoch */
  now?: () => number;
}

type TenantRef = Pick<TenantContext, 'id'>;

export interface TokenCodec {
  /** The identity must belong to `tenant` */
  issue(identity: Identity, tenant: TenantRef): IssuedToken;
  /**
   * Integrity first, then expiry, then tenant binding. The returned identity
   * always belongs to `tenant`.
   */
  verify(token: string, tenant: TenantRef): Identity;
}

/**
 * Pull the token out of an Authorization header. Anything but
 * "Bearer <token>" is rejected.
 */
export function parseBearerToken(header: string | undefined): string {
  if (!header) {
    throw new TokenInvalidError('Missing Authorization header');
  }

  const [scheme, token, ...rest] = header.trim().split(/\s+/);
  if (scheme?.toLowerCase() !== 'bearer' || !token || rest.length > 0) {
    throw new TokenInvalidError('Authorization header must use the Bearer scheme');
  }

  return token;
}

export function createTokenCodec(options: TokenCodecOptions): TokenCodec {
  const { secret, issuer, ttlSeconds } = options;
  const now = options.now ?? Date.now;
  const nowSeconds = (): number => Math.floor(now() / 1000);

  function decode(token: string): TokenClaims {
    let payload: string | jwt.JwtPayload;
    try {
      payload = jwt.verify(token, secret, {
        algorithms: [ALGORITHM],
        issuer,
        clockTimestamp: nowSeconds(),
      });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw new TokenExpiredError();
      }
      if (error instanceof jwt.JsonWebTokenError) {
        throw new TokenInvalidError(`Invalid token: ${error.message}`);
      }
      throw error;
    }

    const parsed = tokenClaimsSchema.safeParse(payload);
    if (!parsed.success) {
      throw new TokenInvalidError('Invalid token: malformed claims');
    }

    return parsed.data;
  }

  return {
    issue(identity: Identity, tenant: TenantRef): IssuedToken {
      if (identity.tenantId !== tenant.id) {
        throw new TenantMismatchError(identity.tenantId, tenant.id);
      }

      const iat = nowSeconds();
      const token = jwt.sign({ tenant_id: tenant.id, role: identity.role, iat }, secret, {
        algorithm: ALGORITHM,
        subject: identity.subjectId,
        issuer,
        expiresIn: ttlSeconds,
      });

      return {
        token,
        tokenType: 'Bearer',
        expiresIn: ttlSeconds,
        expiresAt: new Date((iat + ttlSeconds) * 1000).toISOString(),
      };
    },

    verify(token: string, tenant: TenantRef): Identity {
      const claims = decode(token);

      if (claims.tenant_id !== tenant.id) {
        throw new TenantMismatchError(claims.tenant_id, tenant.id);
      }

      return { subjectId: claims.sub, tenantId: claims.tenant_id, role: claims.role };
    },
  };
}
