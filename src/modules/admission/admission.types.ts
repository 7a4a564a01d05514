import type { Identity } from '../identity/identity.types.js';
import type { Action, AuthorizationTarget } from '../rbac/rbac.types.js';
import type { TenantContext, TenantHints } from '../tenant/tenant.types.js';
import type { AdmissionError } from '../../shared/errors/index.js';

export type AdmissionStage = 'tenant' | 'rate-limit' | 'token' | 'authorize';

export interface AdmissionRequest {
  hints: TenantHints;
  /** Raw Authorization header */
  authorization?: string;
  action: Action;
  target?: AuthorizationTarget;
}

export interface RateLimitSnapshot {
  limit: number;
  remaining: number;
  degraded: boolean;
}

export interface AdmissionContext {
  readonly tenant: Readonly<Omit<TenantContext, 'rateLimit'>> & {
    readonly rateLimit: Readonly<NonNullable<TenantContext['rateLimit']>> | null;
  };
  readonly identity: Readonly<Identity>;
  readonly rateLimit: Readonly<RateLimitSnapshot>;
}

export type AdmissionResult =
  | { ok: true; context: AdmissionContext }
  | {
      ok: false;
      stage: AdmissionStage;
      error: AdmissionError;
      /** Present once the rate-limit stage has run */
      rateLimit?: RateLimitSnapshot;
    };
