import type { FastifyPluginAsync } from 'fastify';
import type { ReadinessResponse, ServiceStatus } from '@knowledge-assistant/shared';

export type HealthCheck = () => Promise<boolean>;

export interface HealthRoutesOptions {
  checks: Record<string, HealthCheck>;
}

export const healthRoutes: FastifyPluginAsync<HealthRoutesOptions> = async (fastify, options) => {
  fastify.get('/', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      service: 'knowledge-assistant-api',
      version: '0.1.0',
    };
  });

  fastify.get('/ready', async (request, reply) => {
    const entries = await Promise.all(
      Object.entries(options.checks).map(async ([name, check]): Promise<[string, ServiceStatus]> => {
        try {
          return [name, (await check()) ? 'healthy' : 'unhealthy'];
        } catch (error) {
          request.log.warn({ error, service: name }, 'Health check threw');
          return [name, 'unhealthy'];
        }
      })
    );

    const services = Object.fromEntries(entries);
    const healthy = entries.every(([, status]) => status === 'healthy');
    const response: ReadinessResponse = { status: healthy ? 'healthy' : 'degraded', services };

    return reply.code(healthy ? 200 : 503).send(response);
  });
};
