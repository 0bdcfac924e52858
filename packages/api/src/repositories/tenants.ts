import { createHash } from 'node:crypto';
import type { Sql } from '../utils/db';

/**
 * Tenant lookup for API key authentication.
 * Keys are stored as SHA-256 hex digests, never in clear.
 */

export interface TenantRecord {
  id: string;
  name: string;
  isActive: boolean;
}

export interface TenantRepository {
  findByApiKey(apiKey: string): Promise<TenantRecord | null>;
}

export function hashApiKey(apiKey: string): string {
  return createHash('sha256').update(apiKey, 'utf8').digest('hex');
}

interface TenantRow {
  id: string;
  name: string;
  is_active: boolean;
}

export class PostgresTenantRepository implements TenantRepository {
  constructor(private readonly sql: Sql) {}

  async findByApiKey(apiKey: string): Promise<TenantRecord | null> {
    const rows = await this.sql<TenantRow[]>`
      SELECT id::text AS id, name, is_active
      FROM tenants
      WHERE api_key_hash = ${hashApiKey(apiKey)}
      LIMIT 1
    `;

    const row = rows[0];
    if (!row) return null;

    return { id: row.id, name: row.name, isActive: row.is_active };
  }
}
