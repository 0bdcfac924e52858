import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { toHttpError } from '../errors';
import { requireTenant, tenantOf } from '../plugins/tenant-auth';
import type { DocumentRepository } from '../repositories/documents';
import type { TenantRepository } from '../repositories/tenants';
import type { DocumentIngestor } from '../services/ingestion';

/**
 * Document management routes.
 *
 * - POST /documents - Ingest a document
 * - GET /documents - List the tenant's documents
 * - DELETE /documents/:id - Delete a document and its fragments
 */

const UploadSchema = z.object({
  name: z.string().min(1).max(500),
  content: z.string().min(1),
  contentType: z.string().min(1).max(100).optional(),
});

export interface DocumentRoutesOptions {
  ingestor: DocumentIngestor;
  documents: DocumentRepository;
  tenants: TenantRepository;
}

export const documentRoutes: FastifyPluginAsync<DocumentRoutesOptions> = async (fastify, options) => {
  fastify.addHook('preHandler', requireTenant(options.tenants));

  fastify.post('/', async (request, reply) => {
    const validation = UploadSchema.safeParse(request.body);
    if (!validation.success) {
      return reply.code(400).send({
        error: 'Invalid request',
        details: validation.error.issues,
      });
    }

    try {
      const result = await options.ingestor.ingest(tenantOf(request), validation.data);
      return reply.code(201).send(result);
    } catch (error) {
      fastify.log.error({ requestId: request.id, error }, 'Document ingestion failed');
      const { statusCode, body } = toHttpError(error, request.id);
      return reply.code(statusCode).send(body);
    }
  });

  fastify.get('/', async (request, reply) => {
    try {
      const documents = await options.documents.list(tenantOf(request).tenantId);
      return { count: documents.length, documents };
    } catch (error) {
      fastify.log.error({ requestId: request.id, error }, 'Failed to list documents');
      const { statusCode, body } = toHttpError(error, request.id);
      return reply.code(statusCode).send(body);
    }
  });

  fastify.delete<{ Params: { id: string } }>('/:id', async (request, reply) => {
    const { id } = request.params;

    try {
      await options.ingestor.remove(tenantOf(request), id);
      return reply.code(204).send();
    } catch (error) {
      fastify.log.error({ requestId: request.id, error, documentId: id }, 'Failed to delete document');
      const { statusCode, body } = toHttpError(error, request.id);
      return reply.code(statusCode).send(body);
    }
  });
};
