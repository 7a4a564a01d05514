import type { Logger } from 'pino';

import type {
  AdmissionContext,
  AdmissionRequest,
  AdmissionResult,
  AdmissionStage,
  RateLimitSnapshot,
} from './admission.types.js';
import { parseBearerToken, type TokenCodec } from '../auth/token.codec.js';
import type { Identity } from '../identity/identity.types.js';
import { denialToError, type RbacAuthorizer } from '../rbac/rbac.authorizer.js';
import type { TenantResolver } from '../tenant/tenant.resolver.js';
import type { TenantContext } from '../tenant/tenant.types.js';
import {
  AdmissionError,
  RateLimitExceededError,
  TenantMismatchError,
} from '../../shared/errors/index.js';
import {
  admissionDecisionsTotal,
  admissionDurationSeconds,
} from '../../shared/metrics/index.js';
import type { RateLimiter } from '../../shared/rate-limiter/index.js';

export interface AdmissionPipelineDeps {
  resolver: Pick<TenantResolver, 'resolve'>;
  rateLimiter: RateLimiter;
  tokenCodec: Pick<TokenCodec, 'verify'>;
  authorizer: RbacAuthorizer;
  logger: Logger;
}

/**
 * Stages run in a fixed order: tenant, rate-limit, token, authorize. The
 * first failure ends the run. A token taken by the rate-limit stage is
 * spent even when a later stage rejects.
 */
export interface AdmissionPipeline {
  admit(request: AdmissionRequest): Promise<AdmissionResult>;
}

function freezeContext(
  tenant: TenantContext,
  identity: Identity,
  rateLimit: RateLimitSnapshot
): AdmissionContext {
  return Object.freeze({
    tenant: Object.freeze({
      ...tenant,
      rateLimit: tenant.rateLimit ? Object.freeze({ ...tenant.rateLimit }) : null,
    }),
    identity: Object.freeze({ ...identity }),
    rateLimit: Object.freeze({ ...rateLimit }),
  });
}

function elapsedSeconds(startTime: bigint): number {
  return Number(process.hrtime.bigint() - startTime) / 1e9;
}

export function createAdmissionPipeline(deps: AdmissionPipelineDeps): AdmissionPipeline {
  const { resolver, rateLimiter, tokenCodec, authorizer, logger } = deps;

  return {
    async admit(request: AdmissionRequest): Promise<AdmissionResult> {
      const startTime = process.hrtime.bigint();
      let stage: AdmissionStage = 'tenant';
      let rateLimit: RateLimitSnapshot | undefined;

      try {
        const tenant = await resolver.resolve(request.hints);

        stage = 'rate-limit';
        const decision = await rateLimiter.admit(tenant);
        rateLimit = {
          limit: decision.limit,
          remaining: decision.remaining,
          degraded: decision.degraded,
        };
        if (!decision.admitted) {
          throw new RateLimitExceededError(decision.retryAfterSeconds);
        }

        stage = 'token';
        const identity = tokenCodec.verify(parseBearerToken(request.authorization), tenant);

        stage = 'authorize';
        const authorization = await authorizer.authorize(identity, request.action, request.target);
        if (!authorization.allowed) {
          throw denialToError(request.action, authorization);
        }

        admissionDecisionsTotal.inc({ outcome: 'admitted', stage: 'complete', code: 'OK' });
        admissionDurationSeconds.observe({ outcome: 'admitted' }, elapsedSeconds(startTime));

        return { ok: true, context: freezeContext(tenant, identity, rateLimit) };
      } catch (error) {
        if (!(error instanceof AdmissionError)) {
          admissionDecisionsTotal.inc({ outcome: 'error', stage, code: 'INTERNAL' });
          admissionDurationSeconds.observe({ outcome: 'error' }, elapsedSeconds(startTime));
          logger.error({ err: error, stage, action: request.action }, 'Admission stage failed');
          throw error;
        }

        admissionDecisionsTotal.inc({ outcome: 'rejected', stage, code: error.code });
        admissionDurationSeconds.observe({ outcome: 'rejected' }, elapsedSeconds(startTime));

        if (error instanceof TenantMismatchError) {
          // Likely a token replayed against another tenant
          logger.warn(
            {
              tokenTenantId: error.tokenTenantId,
              requestTenantId: error.requestTenantId,
              action: request.action,
            },
            'Token presented to the wrong tenant'
          );
        } else {
          logger.debug({ stage, code: error.code, action: request.action }, 'Request rejected');
        }

        return rateLimit
          ? { ok: false, stage, error, rateLimit }
          : { ok: false, stage, error };
      }
    },
  };
}
