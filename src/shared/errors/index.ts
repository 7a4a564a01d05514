/**
 * Admission error taxonomy.
 *
 * Every error a request can be rejected with extends {@link AdmissionError} and
 * maps to exactly one HTTP status. {@link StoreUnavailableError} is internal: the
 * rate limiter converts it into an admit or deny decision and it never reaches
 * a response.
 */

export type AdmissionErrorCode =
  | 'TENANT_NOT_FOUND'
  | 'TENANT_INACTIVE'
  | 'TOKEN_INVALID'
  | 'TOKEN_EXPIRED'
  | 'TENANT_MISMATCH'
  | 'FORBIDDEN'
  | 'LAST_ADMIN_VIOLATION'
  | 'RATE_LIMIT_EXCEEDED'
  | 'TENANT_LOOKUP_UNAVAILABLE';

export interface AdmissionErrorBody {
  error: string;
  code: AdmissionErrorCode;
  message: string;
  retryAfter?: number;
}

const STATUS_TEXT: Record<number, string> = {
  401: 'Unauthorized',
  403: 'Forbidden',
  404: 'Not Found',
  429: 'Too Many Requests',
  503: 'Service Unavailable',
};

export abstract class AdmissionError extends Error {
  abstract readonly code: AdmissionErrorCode;
  abstract readonly statusCode: number;

  toJSON(): AdmissionErrorBody {
    return {
      error: STATUS_TEXT[this.statusCode] ?? 'Error',
      code: this.code,
      message: this.message,
    };
  }
}

export class TenantNotFoundError extends AdmissionError {
  readonly code = 'TENANT_NOT_FOUND';
  readonly statusCode = 404;

  constructor(message = 'Tenant not found') {
    super(message);
    this.name = 'TenantNotFoundError';
  }
}

export class TenantInactiveError extends AdmissionError {
  readonly code = 'TENANT_INACTIVE';
  readonly statusCode = 403;

  constructor(public readonly tenantId: string) {
    super('Tenant account is inactive');
    this.name = 'TenantInactiveError';
  }
}

export class TokenInvalidError extends AdmissionError {
  readonly code = 'TOKEN_INVALID';
  readonly statusCode = 401;

  constructor(message = 'Invalid token') {
    super(message);
    this.name = 'TokenInvalidError';
  }
}

export class TokenExpiredError extends AdmissionError {
  readonly code = 'TOKEN_EXPIRED';
  readonly statusCode = 401;

  constructor() {
    super('Token has expired');
    this.name = 'TokenExpiredError';
  }
}

export class TenantMismatchError extends AdmissionError {
  readonly code = 'TENANT_MISMATCH';
  readonly statusCode = 403;

  constructor(
    public readonly tokenTenantId: string,
    public readonly requestTenantId: string
  ) {
    super('Token was not issued for this tenant');
    this.name = 'TenantMismatchError';
  }
}

export type ForbiddenReason = 'insufficient_role' | 'ownership_mismatch';

export class ForbiddenError extends AdmissionError {
  readonly code = 'FORBIDDEN';
  readonly statusCode = 403;

  constructor(
    public readonly reason: ForbiddenReason,
    message: string
  ) {
    super(message);
    this.name = 'ForbiddenError';
  }
}

export class LastAdminViolationError extends AdmissionError {
  readonly code = 'LAST_ADMIN_VIOLATION';
  readonly statusCode = 403;

  constructor() {
    super('The last admin of a tenant cannot be removed or demoted');
    this.name = 'LastAdminViolationError';
  }
}

export class RateLimitExceededError extends AdmissionError {
  readonly code = 'RATE_LIMIT_EXCEEDED';
  readonly statusCode = 429;

  constructor(public readonly retryAfterSeconds: number) {
    super('Rate limit exceeded');
    this.name = 'RateLimitExceededError';
  }

  override toJSON(): AdmissionErrorBody {
    return { ...super.toJSON(), retryAfter: this.retryAfterSeconds };
  }
}

/** The tenant repository failed or did not answer in time. */
export class TenantLookupUnavailableError extends AdmissionError {
  readonly code = 'TENANT_LOOKUP_UNAVAILABLE';
  readonly statusCode = 503;

  constructor(options?: { cause?: unknown }) {
    super('Tenant lookup is temporarily unavailable', options);
    this.name = 'TenantLookupUnavailableError';
  }
}

export class StoreUnavailableError extends Error {
  constructor(operation: string, options?: { cause?: unknown }) {
    super(`Shared store unavailable during ${operation}`, options);
    this.name = 'StoreUnavailableError';
  }
}
