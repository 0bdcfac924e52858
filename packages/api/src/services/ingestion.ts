import type { Chunk, IngestionRequest, IngestionResponse, TenantContext } from '@knowledge-assistant/shared';
import { NotFoundError, UpstreamError } from '../errors';
import type { DocumentRepository } from '../repositories/documents';
import type { AuditEntry, AuditLogRepository } from '../repositories/logs';
import type { Embedder } from '../utils/embeddings';
import { logger } from '../utils/logger';
import type { Chunker } from './chunking';
import type { TenantRetriever } from './retrieval';

/**
 * Document Ingestion
 *
 * Flow:
 * 1. Store document metadata + raw content
 * 2. Chunk (token windows with overlap)
 * 3. Embed chunks in batches
 * 4. Upsert fragments into the tenant's partition
 *
 * Documents are immutable once chunked; a re-upload is a new document.
 * A failure after the row is created removes the row and any fragments.
 * Cached answers built on a removed document are left to expire by TTL.
 */

const DEFAULT_CONTENT_TYPE = 'text/markdown';

export interface DocumentIngestorOptions {
  documents: DocumentRepository;
  chunker: Chunker;
  embedder: Embedder;
  retriever: TenantRetriever;
  auditLog: AuditLogRepository;
}

export class DocumentIngestor {
  constructor(private readonly deps: DocumentIngestorOptions) {}

  async ingest(tenant: TenantContext, request: IngestionRequest): Promise<IngestionResponse> {
    const startTime = Date.now();
    const { tenantId } = tenant;

    const documentId = await this.deps.documents.create(tenantId, {
      name: request.name,
      content: request.content,
      contentType: request.contentType ?? DEFAULT_CONTENT_TYPE,
    });

    let chunks: Chunk[];
    try {
      chunks = await this.index(tenantId, documentId, request);
      await this.deps.documents.setChunkCount(tenantId, documentId, chunks.length);
    } catch (error) {
      await this.rollback(tenantId, documentId);
      throw error;
    }

    await this.audit({
      tenantId,
      action: 'document_upload',
      resourceType: 'document',
      resourceId: documentId,
      metadata: { name: request.name, chunks: chunks.length },
    });

    logger.info(
      { tenantId, documentId, chunks: chunks.length, latency: Date.now() - startTime },
      'Document ingested'
    );

    return {
      documentId,
      name: request.name,
      chunksCount: chunks.length,
      message: `Document uploaded successfully with ${chunks.length} chunks`,
    };
  }

  private async index(tenantId: string, documentId: string, request: IngestionRequest): Promise<Chunk[]> {
    const chunks = this.deps.chunker.chunk(request.content);
    if (chunks.length === 0) {
      return chunks;
    }

    let embeddings: number[][];
    try {
      embeddings = await this.deps.embedder.embedBatch(chunks.map((chunk) => chunk.text));
    } catch (error) {
      throw new UpstreamError('embedding', error);
    }

    await this.deps.retriever.storeChunks(
      tenantId,
      documentId,
      request.name,
      chunks.map((chunk, i) => ({ ...chunk, embedding: embeddings[i] }))
    );
    return chunks;
  }

  /**
   * Remove the row and any fragments of a failed upload. Cleanup failures are
   * logged; the caller rethrows the original error.
   */
  private async rollback(tenantId: string, documentId: string): Promise<void> {
    try {
      await this.deps.retriever.deleteDocument(tenantId, documentId);
      await this.deps.documents.delete(tenantId, documentId);
    } catch (error) {
      logger.error({ error, tenantId, documentId }, 'Failed to roll back document upload');
    }
  }

  /**
   * Delete a document and its fragments.
   *
   * @throws NotFoundError if the tenant has no such document
   */
  async remove(tenant: TenantContext, documentId: string): Promise<void> {
    const { tenantId } = tenant;

    if (!(await this.deps.documents.exists(tenantId, documentId))) {
      throw new NotFoundError('Document');
    }

    // Fragments first: a failure here leaves the row, so the delete can be retried
    await this.deps.retriever.deleteDocument(tenantId, documentId);
    await this.deps.documents.delete(tenantId, documentId);

    await this.audit({
      tenantId,
      action: 'document_delete',
      resourceType: 'document',
      resourceId: documentId,
    });

    logger.info({ tenantId, documentId }, 'Document deleted');
  }

  private async audit(entry: AuditEntry): Promise<void> {
    try {
      await this.deps.auditLog.record(entry);
    } catch (error) {
      logger.error({ error, action: entry.action }, 'Failed to store audit log');
    }
  }
}
