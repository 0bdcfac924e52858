/**
 * Shared constants for the knowledge assistant.
 */

export const LATENCY_BUDGETS = {
  EMBEDDING: 500, // ms
  RETRIEVAL: 200, // ms
  SYNTHESIS: 5000, // ms
  TOTAL: 8000, // ms
} as const;

export const RAG_DEFAULTS = {
  TOP_K_CHUNKS: 5,
  SIMILARITY_THRESHOLD: 0.7,
} as const;

export const CHUNKING_CONFIG = {
  CHUNK_SIZE: 500,
  CHUNK_OVERLAP: 50,
  // A sentence boundary is only used when it falls this far into the window
  SENTENCE_BOUNDARY_RATIO: 0.7,
} as const;

export const EMBEDDING_CONFIG = {
  MODEL: 'text-embedding-3-small',
  DIMENSIONS: 1536,
  CACHE_TTL: 86400, // 24 hours
  MAX_BATCH_SIZE: 100,
} as const;

export const CACHE_POLICY = {
  KEY_PREFIX: 'cache:llm:',
  KEY_DELIMITER: ':',
  DEFAULT_TTL: 3600, // 1 hour
  MIN_CONFIDENCE: 0.7,
  TIME_SENSITIVE_MARKERS: ['today', 'now', 'current', 'latest', 'deadline'],
  PERSONAL_MARKERS: ['my', 'i ', 'me ', 'mine'],
} as const;

export const RATE_LIMIT = {
  MINUTE_WINDOW: 60, // seconds
  HOUR_WINDOW: 3600, // seconds
  QUERIES_PER_MINUTE: 10,
  QUERIES_PER_HOUR: 100,
} as const;
