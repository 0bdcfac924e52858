import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { QueryResponse } from '@knowledge-assistant/shared';
import { isSecurityViolation, toHttpError } from '../errors';
import { requireTenant, tenantOf } from '../plugins/tenant-auth';
import type { TenantRepository } from '../repositories/tenants';
import type { QueryOrchestrator } from '../services/orchestrator';

const QueryRequestSchema = z.object({
  question: z.string().min(1).max(1000),
});

export interface QueryRoutesOptions {
  orchestrator: QueryOrchestrator;
  tenants: TenantRepository;
}

export const queryRoutes: FastifyPluginAsync<QueryRoutesOptions> = async (fastify, options) => {
  fastify.addHook('preHandler', requireTenant(options.tenants));

  /**
   * POST /api/v1/query
   * Answer a question from the tenant's knowledge base.
   */
  fastify.post('/', async (request, reply) => {
    const requestId = request.id;

    const validation = QueryRequestSchema.safeParse(request.body);
    if (!validation.success) {
      return reply.code(400).send({
        error: 'Invalid request',
        details: validation.error.issues,
      });
    }

    const tenant = tenantOf(request);
    const { question } = validation.data;

    fastify.log.info({ requestId, tenantId: tenant.tenantId }, 'Processing query');

    try {
      const result = await options.orchestrator.query(tenant, question, requestId);
      const response: QueryResponse = { requestId, ...result };
      return response;
    } catch (error) {
      if (isSecurityViolation(error)) {
        fastify.log.fatal({ requestId, tenantId: tenant.tenantId, alert: true }, 'Query aborted: tenant isolation violation');
      } else {
        fastify.log.error({ requestId, error }, 'Query processing failed');
      }

      const { statusCode, body } = toHttpError(error, requestId);
      return reply.code(statusCode).send(body);
    }
  });
};
