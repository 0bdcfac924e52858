import dotenv from 'dotenv';
import { z } from 'zod';
import {
  CACHE_POLICY,
  CHUNKING_CONFIG,
  EMBEDDING_CONFIG,
  RAG_DEFAULTS,
  RATE_LIMIT,
} from '@knowledge-assistant/shared';

dotenv.config();

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const EnvSchema = z
  .object({
    // Server
    NODE_ENV: z.string().default('development'),
    HOST: z.string().default('0.0.0.0'),
    PORT: z.coerce.number().int().positive().default(3000),
    CORS_ORIGINS: z.string().default('http://localhost:3001'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

    // Database
    DB_HOST: z.string().default('localhost'),
    DB_PORT: z.coerce.number().int().positive().default(5432),
    DB_NAME: z.string().default('knowledge_db'),
    DB_USER: z.string().default('postgres'),
    DB_PASSWORD: z.string().default('postgres'),
    DB_AUTO_MIGRATE: booleanFlag,

    // Redis
    REDIS_URL: z.string().optional(),
    REDIS_HOST: z.string().default('localhost'),
    REDIS_PORT: z.coerce.number().int().positive().default(6379),
    REDIS_PASSWORD: z.string().optional(),

    // Qdrant
    QDRANT_URL: z.string().url().default('http://localhost:6333'),
    QDRANT_API_KEY: z.string().optional(),

    // OpenAI (embeddings, and completions unless Groq is selected)
    OPENAI_API_KEY: z.string().default(''),
    EMBEDDING_MODEL: z.string().default(EMBEDDING_CONFIG.MODEL),
    EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(EMBEDDING_CONFIG.DIMENSIONS),
    LLM_PROVIDER: z.enum(['openai', 'groq']).default('openai'),
    COMPLETION_MODEL: z.string().default('gpt-4.1-mini'),

    // Groq
    GROQ_API_KEY: z.string().default(''),
    GROQ_MODEL: z.string().default('llama-3.3-70b-versatile'),

    // RAG parameters
    CHUNK_SIZE: z.coerce.number().int().positive().default(CHUNKING_CONFIG.CHUNK_SIZE),
    CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(CHUNKING_CONFIG.CHUNK_OVERLAP),
    TOP_K_CHUNKS: z.coerce.number().int().positive().default(RAG_DEFAULTS.TOP_K_CHUNKS),
    SIMILARITY_THRESHOLD: z.coerce.number().min(0).max(1).default(RAG_DEFAULTS.SIMILARITY_THRESHOLD),

    // Rate limiting
    QUERIES_PER_MINUTE: z.coerce.number().int().positive().default(RATE_LIMIT.QUERIES_PER_MINUTE),
    QUERIES_PER_HOUR: z.coerce.number().int().positive().default(RATE_LIMIT.QUERIES_PER_HOUR),

    // Caching
    CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(CACHE_POLICY.DEFAULT_TTL),
    EMBEDDING_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(EMBEDDING_CONFIG.CACHE_TTL),
  })
  .refine((env) => env.CHUNK_OVERLAP < env.CHUNK_SIZE, {
    message: 'CHUNK_OVERLAP must be smaller than CHUNK_SIZE',
    path: ['CHUNK_OVERLAP'],
  });

export type LLMProvider = 'openai' | 'groq';

export interface AppConfig {
  env: string;
  host: string;
  port: number;
  corsOrigins: string[];
  logLevel: string;
  database: {
    host: string;
    port: number;
    database: string;
    user: string;
    password: string;
    autoMigrate: boolean;
  };
  redis: {
    url?: string;
    host: string;
    port: number;
    password?: string;
  };
  qdrant: {
    url: string;
    apiKey?: string;
  };
  openai: {
    apiKey: string;
    completionModel: string;
  };
  groq: {
    apiKey: string;
    model: string;
  };
  llmProvider: LLMProvider;
  embeddings: {
    model: string;
    dimensions: number;
    cacheTtlSeconds: number;
  };
  rag: {
    chunkSize: number;
    chunkOverlap: number;
    topK: number;
    similarityThreshold: number;
  };
  rateLimit: {
    queriesPerMinute: number;
    queriesPerHour: number;
  };
  cache: {
    ttlSeconds: number;
  };
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Build the application config from environment variables.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const e = parsed.data;

  return {
    env: e.NODE_ENV,
    host: e.HOST,
    port: e.PORT,
    corsOrigins: e.CORS_ORIGINS.split(',').map((origin) => origin.trim()),
    logLevel: e.LOG_LEVEL,
    database: {
      host: e.DB_HOST,
      port: e.DB_PORT,
      database: e.DB_NAME,
      user: e.DB_USER,
      password: e.DB_PASSWORD,
      autoMigrate: e.DB_AUTO_MIGRATE,
    },
    redis: {
      url: e.REDIS_URL || undefined,
      host: e.REDIS_HOST,
      port: e.REDIS_PORT,
      password: e.REDIS_PASSWORD || undefined,
    },
    qdrant: {
      url: e.QDRANT_URL,
      apiKey: e.QDRANT_API_KEY || undefined,
    },
    openai: {
      apiKey: e.OPENAI_API_KEY,
      completionModel: e.COMPLETION_MODEL,
    },
    groq: {
      apiKey: e.GROQ_API_KEY,
      model: e.GROQ_MODEL,
    },
    llmProvider: e.LLM_PROVIDER,
    embeddings: {
      model: e.EMBEDDING_MODEL,
      dimensions: e.EMBEDDING_DIMENSIONS,
      cacheTtlSeconds: e.EMBEDDING_CACHE_TTL_SECONDS,
    },
    rag: {
      chunkSize: e.CHUNK_SIZE,
      chunkOverlap: e.CHUNK_OVERLAP,
      topK: e.TOP_K_CHUNKS,
      similarityThreshold: e.SIMILARITY_THRESHOLD,
    },
    rateLimit: {
      queriesPerMinute: e.QUERIES_PER_MINUTE,
      queriesPerHour: e.QUERIES_PER_HOUR,
    },
    cache: {
      ttlSeconds: e.CACHE_TTL_SECONDS,
    },
  };
}

/**
 * Credentials that must be present before the server starts.
 * Returns one message per missing key.
 */
export function missingCredentials(config: AppConfig): string[] {
  const missing: string[] = [];

  if (!config.openai.apiKey.trim()) {
    missing.push('OPENAI_API_KEY is not set (required for embeddings)');
  }

  if (config.llmProvider === 'groq' && !config.groq.apiKey.trim()) {
    missing.push('GROQ_API_KEY is not set (LLM_PROVIDER=groq)');
  }

  return missing;
}
