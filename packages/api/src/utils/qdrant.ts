import { QdrantClient } from '@qdrant/js-client-rest';
import type { AppConfig } from '../config';
import { logger } from './logger';

/**
 * Similarity index boundary.
 *
 * Partitions are Qdrant collections. The retrieval service only talks to this
 * interface, so tests can run against an in-process index.
 */

export interface FieldMatch {
  key: string;
  value: string;
}

export interface IndexPoint {
  id: string;
  vector: number[];
  payload: Record<string, unknown>;
}

export interface ScoredPoint {
  id: string | number;
  score: number;
  payload: Record<string, unknown> | null;
}

export interface IndexSearchRequest {
  vector: number[];
  limit: number;
  scoreThreshold: number;
  match: FieldMatch[];
}

export interface VectorIndex {
  hasPartition(name: string): Promise<boolean>;
  /**
   * Create the partition if it does not exist, with a keyword index on each
   * of `indexedFields`.
   */
  ensurePartition(name: string, dimensions: number, indexedFields: string[]): Promise<void>;
  upsert(name: string, points: IndexPoint[]): Promise<void>;
  search(name: string, request: IndexSearchRequest): Promise<ScoredPoint[]>;
  deleteWhere(name: string, match: FieldMatch[]): Promise<void>;
  ping(): Promise<void>;
}

function toFilter(match: FieldMatch[]) {
  return {
    must: match.map((condition) => ({
      key: condition.key,
      match: { value: condition.value },
    })),
  };
}

export class QdrantVectorIndex implements VectorIndex {
  constructor(private readonly client: QdrantClient) {}

  async hasPartition(name: string): Promise<boolean> {
    const { exists } = await this.client.collectionExists(name);
    return exists;
  }

  async ensurePartition(name: string, dimensions: number, indexedFields: string[]): Promise<void> {
    if (await this.hasPartition(name)) {
      return;
    }

    await this.client.createCollection(name, {
      vectors: { size: dimensions, distance: 'Cosine' },
    });

    for (const field of indexedFields) {
      await this.client.createPayloadIndex(name, {
        field_name: field,
        field_schema: 'keyword',
        wait: true,
      });
    }

    logger.info({ collection: name, dimensions }, 'Created Qdrant collection');
  }

  async upsert(name: string, points: IndexPoint[]): Promise<void> {
    if (points.length === 0) {
      return;
    }

    await this.client.upsert(name, {
      wait: true,
      points,
    });
  }

  async search(name: string, request: IndexSearchRequest): Promise<ScoredPoint[]> {
    const results = await this.client.search(name, {
      vector: request.vector,
      limit: request.limit,
      score_threshold: request.scoreThreshold,
      filter: toFilter(request.match),
      with_payload: true,
    });

    return results.map((result) => ({
      id: result.id,
      score: result.score,
      payload: result.payload ?? null,
    }));
  }

  async deleteWhere(name: string, match: FieldMatch[]): Promise<void> {
    await this.client.delete(name, {
      wait: true,
      filter: toFilter(match),
    });
  }

  async ping(): Promise<void> {
    await this.client.getCollections();
  }
}

export function createQdrantClient(config: AppConfig['qdrant']): QdrantClient {
  return new QdrantClient({ url: config.url, apiKey: config.apiKey });
}
