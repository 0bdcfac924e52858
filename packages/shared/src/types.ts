/**
 * Core types for the knowledge assistant.
 * Shared across the API and its clients.
 */

/**
 * The authenticated caller's tenant. Always resolved from credentials,
 * never taken from request content.
 */
export interface TenantContext {
  tenantId: string;
  tenantName: string;
}

/**
 * A token-bounded slice of a document, produced only by the chunker.
 * `tokenCount` is the size of the untrimmed token window.
 */
export interface Chunk {
  text: string;
  index: number;
  tokenCount: number;
}

/**
 * Payload stored with every indexed fragment.
 * Field names follow the index's snake_case payload convention.
 */
export interface FragmentPayload {
  tenant_id: string;
  document_id: string;
  document_name: string;
  chunk_text: string;
  chunk_index: number;
  total_chunks: number;
  token_count: number;
}

/**
 * A fragment returned by tenant-scoped similarity search.
 */
export interface Fragment {
  id: string;
  documentId: string;
  documentName: string;
  chunkText: string;
  chunkIndex: number;
  score: number;
}

export interface SourceReference {
  documentName: string;
  relevantExcerpt: string;
}

export interface TokenUsage {
  prompt: number;
  completion: number;
  total: number;
}

/**
 * Value stored under a cache fingerprint.
 */
export interface CachedAnswer {
  answer: string | null;
  sources: SourceReference[];
  confidence: number;
  insufficientContext: boolean;
}

export interface QueryResult extends CachedAnswer {
  cached: boolean;
  processingTimeMs: number;
}

export interface QueryRequest {
  question: string;
}

export interface QueryResponse extends QueryResult {
  requestId: string;
}

export interface DocumentSummary {
  id: string;
  name: string;
  contentType: string;
  uploadedAt: string;
}

export interface IngestionRequest {
  name: string;
  content: string;
  contentType?: string;
}

export interface IngestionResponse {
  documentId: string;
  name: string;
  chunksCount: number;
  message: string;
}

export type ServiceStatus = 'healthy' | 'unhealthy';

export interface ReadinessResponse {
  status: 'healthy' | 'degraded';
  services: Record<string, ServiceStatus>;
}
