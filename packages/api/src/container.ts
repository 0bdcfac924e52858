import type { AppConfig } from './config';
import type { AppDependencies } from './app';
import { PostgresDocumentRepository } from './repositories/documents';
import { PostgresAuditLogRepository, PostgresQueryLogRepository } from './repositories/logs';
import { PostgresTenantRepository } from './repositories/tenants';
import { AnswerCache } from './services/cache';
import { Chunker } from './services/chunking';
import { DocumentIngestor } from './services/ingestion';
import { QueryOrchestrator } from './services/orchestrator';
import { RateLimiter } from './services/rate-limit';
import { TenantRetriever } from './services/retrieval';
import { LLMSynthesizer } from './services/synthesis';
import { checkDatabaseHealth, createSql, initDatabase } from './utils/db';
import { CachedEmbedder, OpenAIEmbedder } from './utils/embeddings';
import { createLLMClient, createOpenAI } from './utils/llm';
import { logger } from './utils/logger';
import { QdrantVectorIndex, createQdrantClient } from './utils/qdrant';
import { RedisKeyValueStore, checkRedisHealth, createRedisClient } from './utils/redis';

export interface Services extends AppDependencies {
  close(): Promise<void>;
}

/**
 * Construct every component once for the life of the process.
 * `close()` releases the connections opened here.
 */
export async function createServices(config: AppConfig): Promise<Services> {
  const sql = createSql(config.database);
  if (config.database.autoMigrate) {
    await initDatabase(sql);
  }

  const redis = createRedisClient(config.redis);
  const store = new RedisKeyValueStore(redis);

  const index = new QdrantVectorIndex(createQdrantClient(config.qdrant));
  const retriever = new TenantRetriever(index, config.embeddings.dimensions);

  const openai = createOpenAI(config);
  const embedder = new CachedEmbedder(
    new OpenAIEmbedder({
      client: openai,
      model: config.embeddings.model,
      dimensions: config.embeddings.dimensions,
    }),
    store,
    config.embeddings.cacheTtlSeconds
  );

  const tenants = new PostgresTenantRepository(sql);
  const documents = new PostgresDocumentRepository(sql);
  const queryLog = new PostgresQueryLogRepository(sql);
  const auditLog = new PostgresAuditLogRepository(sql);

  const orchestrator = new QueryOrchestrator({
    rateLimiter: new RateLimiter({
      store,
      perMinute: config.rateLimit.queriesPerMinute,
      perHour: config.rateLimit.queriesPerHour,
    }),
    embedder,
    retriever,
    cache: new AnswerCache({ store, defaultTtlSeconds: config.cache.ttlSeconds }),
    synthesizer: new LLMSynthesizer(createLLMClient(config, openai)),
    queryLog,
    auditLog,
    retrieval: {
      topK: config.rag.topK,
      scoreThreshold: config.rag.similarityThreshold,
    },
  });

  const ingestor = new DocumentIngestor({
    documents,
    chunker: new Chunker({
      chunkSize: config.rag.chunkSize,
      chunkOverlap: config.rag.chunkOverlap,
    }),
    embedder,
    retriever,
    auditLog,
  });

  return {
    orchestrator,
    ingestor,
    documents,
    tenants,
    healthChecks: {
      database: () => checkDatabaseHealth(sql),
      redis: () => checkRedisHealth(redis),
      qdrant: async () => {
        await index.ping();
        return true;
      },
    },
    async close() {
      logger.info('Closing connections');
      await Promise.allSettled([sql.end({ timeout: 5 }), redis.quit()]);
    },
  };
}
