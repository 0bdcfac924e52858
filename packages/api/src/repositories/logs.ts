import type { SourceReference } from '@knowledge-assistant/shared';
import type { Sql } from '../utils/db';

/**
 * Query log and audit trail.
 *
 * Both are append-only. Callers treat writes as best effort: a failed insert
 * is logged and never fails the request that produced it.
 */

export interface QueryLogEntry {
  tenantId: string;
  requestId: string;
  question: string;
  answer: string | null;
  sources: SourceReference[];
  confidence: number;
  insufficientContext: boolean;
  cached: boolean;
  retrievedChunksCount: number;
  llmTokensUsed: number;
  processingTimeMs: number;
}

export type AuditAction =
  | 'query_execute'
  | 'security_violation'
  | 'document_upload'
  | 'document_delete';

export interface AuditEntry {
  tenantId: string;
  action: AuditAction;
  resourceType: 'query' | 'document';
  resourceId?: string;
  metadata?: Record<string, unknown>;
}

export interface QueryLogRepository {
  record(entry: QueryLogEntry): Promise<void>;
}

export interface AuditLogRepository {
  record(entry: AuditEntry): Promise<void>;
}

export class PostgresQueryLogRepository implements QueryLogRepository {
  constructor(private readonly sql: Sql) {}

  async record(entry: QueryLogEntry): Promise<void> {
    await this.sql`
      INSERT INTO queries (
        tenant_id,
        request_id,
        question,
        answer,
        sources,
        confidence,
        insufficient_context,
        cached,
        retrieved_chunks_count,
        llm_tokens_used,
        processing_time_ms
      ) VALUES (
        ${entry.tenantId},
        ${entry.requestId},
        ${entry.question},
        ${entry.answer},
        ${JSON.stringify(entry.sources)},
        ${entry.confidence},
        ${entry.insufficientContext},
        ${entry.cached},
        ${entry.retrievedChunksCount},
        ${entry.llmTokensUsed},
        ${entry.processingTimeMs}
      )
    `;
  }
}

export class PostgresAuditLogRepository implements AuditLogRepository {
  constructor(private readonly sql: Sql) {}

  async record(entry: AuditEntry): Promise<void> {
    await this.sql`
      INSERT INTO audit_logs (tenant_id, action, resource_type, resource_id, metadata)
      VALUES (
        ${entry.tenantId},
        ${entry.action},
        ${entry.resourceType},
        ${entry.resourceId ?? null},
        ${JSON.stringify(entry.metadata ?? {})}
      )
    `;
  }
}
