import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import { generateRequestId } from '@knowledge-assistant/shared';
import type { DocumentRepository } from './repositories/documents';
import type { TenantRepository } from './repositories/tenants';
import { documentRoutes } from './routes/documents';
import { healthRoutes, type HealthCheck } from './routes/health';
import { queryRoutes } from './routes/query';
import type { DocumentIngestor } from './services/ingestion';
import type { QueryOrchestrator } from './services/orchestrator';

export interface AppDependencies {
  orchestrator: QueryOrchestrator;
  ingestor: DocumentIngestor;
  documents: DocumentRepository;
  tenants: TenantRepository;
  healthChecks: Record<string, HealthCheck>;
}

export interface AppOptions {
  logger?: boolean | { level: string };
  corsOrigins?: string[];
}

/**
 * Build the HTTP application. Nothing here opens a connection; every
 * collaborator comes in through `deps`.
 */
export async function buildApp(deps: AppDependencies, options: AppOptions = {}): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: options.logger ?? true,
    requestIdLogLabel: 'reqId',
    requestIdHeader: 'x-request-id',
    genReqId: () => generateRequestId(),
    disableRequestLogging: false,
  });

  fastify.decorateRequest('tenant', null);

  // Register plugins
  await fastify.register(helmet, {
    contentSecurityPolicy: false,
  });

  await fastify.register(cors, {
    origin: options.corsOrigins ?? false,
    credentials: true,
  });

  // Register routes
  await fastify.register(healthRoutes, { prefix: '/health', checks: deps.healthChecks });
  await fastify.register(queryRoutes, {
    prefix: '/api/v1/query',
    orchestrator: deps.orchestrator,
    tenants: deps.tenants,
  });
  await fastify.register(documentRoutes, {
    prefix: '/api/v1/documents',
    ingestor: deps.ingestor,
    documents: deps.documents,
    tenants: deps.tenants,
  });

  return fastify;
}
