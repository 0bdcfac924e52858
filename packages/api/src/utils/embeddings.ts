import { createHash } from 'node:crypto';
import type OpenAI from 'openai';
import { EMBEDDING_CONFIG } from '@knowledge-assistant/shared';
import type { KeyValueStore } from './redis';
import { logger } from './logger';

/**
 * Embeddings Utility
 *
 * Model: text-embedding-3-small (1536 dimensions) unless configured otherwise.
 *
 * CRITICAL: documents and questions must be embedded with the same model, or
 * similarity scores are meaningless.
 *
 * Strategy for questions:
 * 1. Check Redis cache first (24h TTL)
 * 2. If miss → call the embedding API
 * 3. Store result in Redis for future hits
 */

export interface Embedder {
  embed(text: string): Promise<number[]>;
  embedBatch(texts: string[]): Promise<number[][]>;
}

export interface OpenAIEmbedderOptions {
  client: OpenAI;
  model: string;
  dimensions: number;
  batchSize?: number;
}

export class OpenAIEmbedder implements Embedder {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly dimensions: number;
  private readonly batchSize: number;

  constructor(options: OpenAIEmbedderOptions) {
    this.client = options.client;
    this.model = options.model;
    this.dimensions = options.dimensions;
    this.batchSize = options.batchSize ?? EMBEDDING_CONFIG.MAX_BATCH_SIZE;
  }

  async embed(text: string): Promise<number[]> {
    const [embedding] = await this.request([text]);
    return embedding;
  }

  /**
   * Embed many texts, at most `batchSize` per API request.
   * Output order matches input order.
   */
  async embedBatch(texts: string[]): Promise<number[][]> {
    const embeddings: number[][] = [];

    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      embeddings.push(...(await this.request(batch)));
    }

    return embeddings;
  }

  private async request(input: string[]): Promise<number[][]> {
    const startTime = Date.now();

    try {
      const response = await this.client.embeddings.create({
        model: this.model,
        input,
      });

      const embeddings = [...response.data]
        .sort((a, b) => a.index - b.index)
        .map((item) => item.embedding);

      if (embeddings.length !== input.length) {
        throw new Error(`Expected ${input.length} embeddings, received ${embeddings.length}`);
      }
      for (const embedding of embeddings) {
        if (embedding.length !== this.dimensions) {
          throw new Error(`Expected ${this.dimensions} dimensions, received ${embedding.length}`);
        }
      }

      logger.debug({ latency: Date.now() - startTime, inputs: input.length, model: this.model }, 'Embeddings generated');
      return embeddings;
    } catch (error) {
      logger.error({ error }, 'Embedding service call failed');
      throw error;
    }
  }
}

/**
 * Caches single-text embeddings (questions) in the key/value store.
 * Batch calls are ingestion traffic and go straight through.
 */
export class CachedEmbedder implements Embedder {
  constructor(
    private readonly inner: Embedder,
    private readonly store: KeyValueStore,
    private readonly ttlSeconds: number = EMBEDDING_CONFIG.CACHE_TTL
  ) {}

  async embed(text: string): Promise<number[]> {
    const key = embeddingCacheKey(text);

    const cached = await this.read(key);
    if (cached) {
      return cached;
    }

    const embedding = await this.inner.embed(text);

    try {
      await this.store.setWithExpiry(key, JSON.stringify(embedding), this.ttlSeconds);
    } catch (error) {
      logger.warn({ error }, 'Failed to cache embedding');
    }

    return embedding;
  }

  embedBatch(texts: string[]): Promise<number[][]> {
    return this.inner.embedBatch(texts);
  }

  private async read(key: string): Promise<number[] | null> {
    try {
      const raw = await this.store.get(key);
      if (!raw) return null;

      const value: unknown = JSON.parse(raw);
      if (Array.isArray(value) && value.every((n): n is number => typeof n === 'number')) {
        return value;
      }
      return null;
    } catch (error) {
      logger.warn({ error }, 'Embedding cache read failed');
      return null;
    }
  }
}

export function embeddingCacheKey(text: string): string {
  return `embed:${createHash('sha256').update(text, 'utf8').digest('hex')}`;
}
