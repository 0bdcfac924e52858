import type { FastifyReply, FastifyRequest } from 'fastify';
import type { TenantContext } from '@knowledge-assistant/shared';
import { ForbiddenError, UnauthorizedError, toHttpError } from '../errors';
import type { TenantRepository } from '../repositories/tenants';

declare module 'fastify' {
  interface FastifyRequest {
    tenant: TenantContext | null;
  }
}

export const API_KEY_HEADER = 'x-api-key';

/**
 * Resolve the tenant behind an API key.
 *
 * @throws UnauthorizedError for a missing or unknown key
 * @throws ForbiddenError for an inactive tenant
 */
export async function authenticate(
  tenants: TenantRepository,
  apiKey: string | undefined
): Promise<TenantContext> {
  if (!apiKey) {
    throw new UnauthorizedError('Missing API key');
  }

  const tenant = await tenants.findByApiKey(apiKey);
  if (!tenant) {
    throw new UnauthorizedError();
  }
  if (!tenant.isActive) {
    throw new ForbiddenError();
  }

  return { tenantId: tenant.id, tenantName: tenant.name };
}

/**
 * preHandler hook: authenticate the request and attach its tenant.
 */
export function requireTenant(tenants: TenantRepository) {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    const header = request.headers[API_KEY_HEADER];
    const apiKey = Array.isArray(header) ? header[0] : header;

    try {
      request.tenant = await authenticate(tenants, apiKey);
    } catch (error) {
      request.log.warn({ error }, 'Authentication failed');
      const { statusCode, body } = toHttpError(error, request.id);
      return reply.code(statusCode).send(body);
    }
  };
}

/**
 * The tenant attached by `requireTenant`.
 */
export function tenantOf(request: FastifyRequest): TenantContext {
  if (!request.tenant) {
    throw new UnauthorizedError();
  }
  return request.tenant;
}
