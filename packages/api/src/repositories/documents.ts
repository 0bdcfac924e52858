import type { DocumentSummary } from '@knowledge-assistant/shared';
import type { Sql } from '../utils/db';

/**
 * Document metadata. Every statement is scoped by tenant id.
 */

export interface NewDocument {
  name: string;
  content: string;
  contentType: string;
}

export interface DocumentRepository {
  create(tenantId: string, document: NewDocument): Promise<string>;
  setChunkCount(tenantId: string, documentId: string, chunksCount: number): Promise<void>;
  list(tenantId: string): Promise<DocumentSummary[]>;
  exists(tenantId: string, documentId: string): Promise<boolean>;
  delete(tenantId: string, documentId: string): Promise<boolean>;
}

interface DocumentRow {
  id: string;
  name: string;
  content_type: string;
  uploaded_at: Date;
}

// Document ids are UUIDs; anything else cannot match and would make
// Postgres reject the cast.
const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export class PostgresDocumentRepository implements DocumentRepository {
  constructor(private readonly sql: Sql) {}

  async create(tenantId: string, document: NewDocument): Promise<string> {
    const rows = await this.sql<{ id: string }[]>`
      INSERT INTO documents (tenant_id, name, content, content_type)
      VALUES (${tenantId}, ${document.name}, ${document.content}, ${document.contentType})
      RETURNING id::text AS id
    `;
    return rows[0].id;
  }

  async setChunkCount(tenantId: string, documentId: string, chunksCount: number): Promise<void> {
    await this.sql`
      UPDATE documents
      SET chunks_count = ${chunksCount}
      WHERE id = ${documentId} AND tenant_id = ${tenantId}
    `;
  }

  async list(tenantId: string): Promise<DocumentSummary[]> {
    const rows = await this.sql<DocumentRow[]>`
      SELECT id::text AS id, name, content_type, uploaded_at
      FROM documents
      WHERE tenant_id = ${tenantId}
      ORDER BY uploaded_at DESC
    `;

    return rows.map((row) => ({
      id: row.id,
      name: row.name,
      contentType: row.content_type,
      uploadedAt: row.uploaded_at.toISOString(),
    }));
  }

  async exists(tenantId: string, documentId: string): Promise<boolean> {
    if (!UUID_PATTERN.test(documentId)) return false;

    const rows = await this.sql`
      SELECT 1 FROM documents
      WHERE id = ${documentId} AND tenant_id = ${tenantId}
    `;
    return rows.length > 0;
  }

  async delete(tenantId: string, documentId: string): Promise<boolean> {
    if (!UUID_PATTERN.test(documentId)) return false;

    const result = await this.sql`
      DELETE FROM documents
      WHERE id = ${documentId} AND tenant_id = ${tenantId}
    `;
    return result.count > 0;
  }
}
