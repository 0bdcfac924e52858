/**
 * Error taxonomy for the query pipeline.
 *
 * Every error carries a literal `kind` so callers branch on it instead of on
 * class identity. `security_violation` has its own branch everywhere it is
 * handled and is never folded into a generic failure.
 */

export type UpstreamService = 'embedding' | 'synthesis' | 'vector-index';

export abstract class AppError extends Error {
  abstract readonly kind:
    | 'throttled'
    | 'security_violation'
    | 'upstream'
    | 'unauthorized'
    | 'forbidden'
    | 'not_found';
}

export class ThrottledError extends AppError {
  readonly kind = 'throttled' as const;

  constructor(
    readonly tenantId: string,
    readonly operation: string,
    readonly limit: number,
    readonly windowSeconds: number
  ) {
    super(`Rate limit exceeded: ${limit} per ${windowSeconds}s for ${operation}`);
    this.name = 'ThrottledError';
  }
}

export interface SecurityViolationDetails {
  tenantId: string;
  partition: string;
  pointId: string;
  observedTenantId: unknown;
}

/**
 * Raised when similarity search returns a record owned by another tenant.
 * Indicates a cross-tenant leak in the index itself.
 */
export class SecurityViolationError extends AppError {
  readonly kind = 'security_violation' as const;

  constructor(readonly details: SecurityViolationDetails) {
    super('Tenant isolation violation detected');
    this.name = 'SecurityViolationError';
  }
}

export class UpstreamError extends AppError {
  readonly kind = 'upstream' as const;

  constructor(
    readonly service: UpstreamService,
    cause: unknown
  ) {
    super(`${service} call failed: ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause,
    });
    this.name = 'UpstreamError';
  }
}

export class UnauthorizedError extends AppError {
  readonly kind = 'unauthorized' as const;

  constructor(message = 'Invalid API key') {
    super(message);
    this.name = 'UnauthorizedError';
  }
}

export class ForbiddenError extends AppError {
  readonly kind = 'forbidden' as const;

  constructor(message = 'Tenant account inactive') {
    super(message);
    this.name = 'ForbiddenError';
  }
}

export class NotFoundError extends AppError {
  readonly kind = 'not_found' as const;

  constructor(readonly resource: string) {
    super(`${resource} not found`);
    this.name = 'NotFoundError';
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function isSecurityViolation(error: unknown): error is SecurityViolationError {
  return error instanceof SecurityViolationError;
}

export interface HttpError {
  statusCode: number;
  body: { error: string; requestId: string; details?: string };
}

/**
 * Map a pipeline error to the HTTP reply the routes send.
 * Anything outside the taxonomy is a 500.
 */
export function toHttpError(error: unknown, requestId: string): HttpError {
  if (!isAppError(error)) {
    return { statusCode: 500, body: { error: 'Internal server error', requestId } };
  }

  switch (error.kind) {
    case 'throttled':
      return { statusCode: 429, body: { error: error.message, requestId } };
    case 'security_violation':
      return { statusCode: 500, body: { error: 'Security violation detected', requestId } };
    case 'upstream':
      return { statusCode: 503, body: { error: 'Upstream service unavailable', requestId, details: error.message } };
    case 'unauthorized':
      return { statusCode: 401, body: { error: error.message, requestId } };
    case 'forbidden':
      return { statusCode: 403, body: { error: error.message, requestId } };
    case 'not_found':
      return { statusCode: 404, body: { error: error.message, requestId } };
  }
}
