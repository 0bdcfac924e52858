import { createHash, randomUUID } from 'node:crypto';
import { z } from 'zod';
import {
  sortByScoreDesc,
  type Chunk,
  type Fragment,
  type FragmentPayload,
} from '@knowledge-assistant/shared';
import { SecurityViolationError, UpstreamError } from '../errors';
import type { IndexPoint, ScoredPoint, VectorIndex } from '../utils/qdrant';
import { logger } from '../utils/logger';

/**
 * Retrieval Service
 *
 * Tenant-isolated similarity search. Every tenant owns one partition, named
 * from its id alone.
 *
 * Isolation is enforced twice:
 * 1. The query itself filters on `tenant_id`
 * 2. Every returned record's stored `tenant_id` is compared to the caller's
 *
 * A mismatch in (2) means the index is leaking across tenants. The whole
 * search fails with SecurityViolationError; no record is dropped quietly.
 */

const TENANT_FIELD = 'tenant_id';
const DOCUMENT_FIELD = 'document_id';

const FragmentPayloadSchema = z.object({
  tenant_id: z.string(),
  document_id: z.string(),
  document_name: z.string(),
  chunk_text: z.string(),
  chunk_index: z.number().int().nonnegative(),
  total_chunks: z.number().int().positive(),
  token_count: z.number().int().nonnegative(),
});

export interface EmbeddedChunk extends Chunk {
  embedding: number[];
}

export interface SearchOptions {
  topK: number;
  scoreThreshold: number;
}

/**
 * Partition name for a tenant: a digest of the tenant id, so it depends on
 * nothing else and is always a valid collection name.
 */
export function partitionName(tenantId: string): string {
  const digest = createHash('sha256').update(tenantId, 'utf8').digest('hex').slice(0, 32);
  return `tenant_${digest}_documents`;
}

export class TenantRetriever {
  constructor(
    private readonly index: VectorIndex,
    private readonly dimensions: number
  ) {}

  /**
   * Search the tenant's partition.
   *
   * @returns Fragments by descending score; empty when the tenant has no
   *   partition yet
   * @throws SecurityViolationError if any record belongs to another tenant
   * @throws UpstreamError if the index call fails
   */
  async search(tenantId: string, queryVector: number[], options: SearchOptions): Promise<Fragment[]> {
    const startTime = Date.now();
    const partition = partitionName(tenantId);

    let results: ScoredPoint[];
    try {
      if (!(await this.index.hasPartition(partition))) {
        logger.info({ tenantId, partition }, 'Tenant has no partition yet, nothing to retrieve');
        return [];
      }

      results = await this.index.search(partition, {
        vector: queryVector,
        limit: options.topK,
        scoreThreshold: options.scoreThreshold,
        match: [{ key: TENANT_FIELD, value: tenantId }],
      });
    } catch (error) {
      logger.error({ error, tenantId }, 'Vector search failed');
      throw new UpstreamError('vector-index', error);
    }

    // Validate all records before building any result
    for (const result of results) {
      const observedTenantId = result.payload?.[TENANT_FIELD];
      if (observedTenantId !== tenantId) {
        throw new SecurityViolationError({
          tenantId,
          partition,
          pointId: String(result.id),
          observedTenantId,
        });
      }
    }

    const fragments = sortByScoreDesc(results).map((result) => toFragment(result));

    logger.info({ latency: Date.now() - startTime, tenantId, resultsCount: fragments.length }, 'Vector retrieval completed');
    return fragments;
  }

  /**
   * Index a document's chunks in the tenant's partition, creating it first if
   * needed. Returns the number of points written.
   */
  async storeChunks(
    tenantId: string,
    documentId: string,
    documentName: string,
    chunks: EmbeddedChunk[]
  ): Promise<number> {
    const partition = partitionName(tenantId);

    const points: IndexPoint[] = chunks.map((chunk) => {
      const payload: FragmentPayload = {
        tenant_id: tenantId,
        document_id: documentId,
        document_name: documentName,
        chunk_text: chunk.text,
        chunk_index: chunk.index,
        total_chunks: chunks.length,
        token_count: chunk.tokenCount,
      };
      return { id: randomUUID(), vector: chunk.embedding, payload: { ...payload } };
    });

    try {
      await this.index.ensurePartition(partition, this.dimensions, [TENANT_FIELD, DOCUMENT_FIELD]);
      await this.index.upsert(partition, points);
    } catch (error) {
      logger.error({ error, tenantId, documentId }, 'Failed to store chunks');
      throw new UpstreamError('vector-index', error);
    }

    logger.info({ tenantId, documentId, points: points.length }, 'Stored document chunks');
    return points.length;
  }

  /**
   * Remove a document's fragments. The delete is filtered on the tenant as
   * well as the document.
   */
  async deleteDocument(tenantId: string, documentId: string): Promise<void> {
    const partition = partitionName(tenantId);

    try {
      if (!(await this.index.hasPartition(partition))) {
        return;
      }
      await this.index.deleteWhere(partition, [
        { key: TENANT_FIELD, value: tenantId },
        { key: DOCUMENT_FIELD, value: documentId },
      ]);
    } catch (error) {
      logger.error({ error, tenantId, documentId }, 'Failed to delete document fragments');
      throw new UpstreamError('vector-index', error);
    }
  }
}

function toFragment(result: ScoredPoint): Fragment {
  const parsed = FragmentPayloadSchema.safeParse(result.payload);
  if (!parsed.success) {
    throw new UpstreamError(
      'vector-index',
      new Error(`Malformed payload on point ${String(result.id)}: ${parsed.error.message}`)
    );
  }

  const payload = parsed.data;
  return {
    id: String(result.id),
    documentId: payload.document_id,
    documentName: payload.document_name,
    chunkText: payload.chunk_text,
    chunkIndex: payload.chunk_index,
    score: result.score,
  };
}
