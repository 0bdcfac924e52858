import { cosineSimilarity, type DocumentSummary } from '@knowledge-assistant/shared';
import type { Tokenizer } from '../src/services/chunking';
import type { DocumentRepository, NewDocument } from '../src/repositories/documents';
import type {
  AuditEntry,
  AuditLogRepository,
  QueryLogEntry,
  QueryLogRepository,
} from '../src/repositories/logs';
import type { TenantRecord, TenantRepository } from '../src/repositories/tenants';
import type { Embedder } from '../src/utils/embeddings';
import type {
  FieldMatch,
  IndexPoint,
  IndexSearchRequest,
  ScoredPoint,
  VectorIndex,
} from '../src/utils/qdrant';
import type { KeyValueStore } from '../src/utils/redis';

/**
 * Manually advanced clock, in milliseconds.
 */
export class FakeClock {
  constructor(private current = 0) {}

  now = (): number => this.current;

  advance(ms: number): void {
    this.current += ms;
  }
}

/**
 * In-process key/value store with expiry driven by a clock.
 */
export class MemoryKeyValueStore implements KeyValueStore {
  readonly entries = new Map<string, { value: string; expiresAt: number | null }>();

  constructor(private readonly now: () => number = Date.now) {}

  async get(key: string): Promise<string | null> {
    const entry = this.live(key);
    return entry ? entry.value : null;
  }

  async setWithExpiry(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.entries.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
  }

  async incrementWithExpiry(key: string, ttlSeconds: number): Promise<number> {
    const entry = this.live(key);
    const count = entry ? Number(entry.value) + 1 : 1;
    const expiresAt = entry ? entry.expiresAt : this.now() + ttlSeconds * 1000;
    this.entries.set(key, { value: String(count), expiresAt });
    return count;
  }

  ttlOf(key: string): number | null {
    const entry = this.live(key);
    if (!entry || entry.expiresAt === null) return null;
    return (entry.expiresAt - this.now()) / 1000;
  }

  private live(key: string) {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt !== null && this.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }
}

/**
 * One token per character, so window arithmetic can be read off the text.
 */
export const charTokenizer: Tokenizer = {
  encode: (text) => Array.from(text, (char) => char.codePointAt(0) ?? 0),
  decode: (tokens) => String.fromCodePoint(...tokens),
};

interface StoredPoint extends IndexPoint {
  sequence: number;
}

/**
 * Brute-force cosine index. `leaky` makes search ignore its filter, the way a
 * broken index would.
 */
export class InMemoryVectorIndex implements VectorIndex {
  readonly partitions = new Map<string, StoredPoint[]>();
  leaky = false;
  private sequence = 0;

  async hasPartition(name: string): Promise<boolean> {
    return this.partitions.has(name);
  }

  async ensurePartition(name: string): Promise<void> {
    if (!this.partitions.has(name)) {
      this.partitions.set(name, []);
    }
  }

  async upsert(name: string, points: IndexPoint[]): Promise<void> {
    const partition = this.partitions.get(name);
    if (!partition) throw new Error(`No partition ${name}`);
    for (const point of points) {
      partition.push({ ...point, sequence: this.sequence++ });
    }
  }

  async search(name: string, request: IndexSearchRequest): Promise<ScoredPoint[]> {
    const partition = this.partitions.get(name) ?? [];

    return partition
      .filter((point) => this.leaky || matches(point, request.match))
      .map((point) => ({
        id: point.id,
        score: cosineSimilarity(point.vector, request.vector),
        payload: point.payload,
        sequence: point.sequence,
      }))
      .filter((point) => point.score >= request.scoreThreshold)
      .sort((a, b) => b.score - a.score || a.sequence - b.sequence)
      .slice(0, request.limit)
      .map(({ id, score, payload }) => ({ id, score, payload }));
  }

  async deleteWhere(name: string, match: FieldMatch[]): Promise<void> {
    const partition = this.partitions.get(name);
    if (!partition) return;
    this.partitions.set(
      name,
      partition.filter((point) => !matches(point, match))
    );
  }

  async ping(): Promise<void> {}

  /**
   * Write a point straight into a partition, bypassing the retriever.
   */
  plant(name: string, point: IndexPoint): void {
    const partition = this.partitions.get(name) ?? [];
    partition.push({ ...point, sequence: this.sequence++ });
    this.partitions.set(name, partition);
  }
}

function matches(point: IndexPoint, match: FieldMatch[]): boolean {
  return match.every((condition) => point.payload[condition.key] === condition.value);
}

/**
 * Returns the vector registered for a text, or a fixed fallback.
 */
export class StubEmbedder implements Embedder {
  readonly calls: string[] = [];

  constructor(
    private readonly vectors: Record<string, number[]> = {},
    private readonly fallback: number[] = [1, 0, 0]
  ) {}

  async embed(text: string): Promise<number[]> {
    this.calls.push(text);
    return this.vectors[text] ?? this.fallback;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    return Promise.all(texts.map((text) => this.embed(text)));
  }
}

export class RecordingQueryLog implements QueryLogRepository {
  readonly entries: QueryLogEntry[] = [];

  async record(entry: QueryLogEntry): Promise<void> {
    this.entries.push(entry);
  }
}

export class RecordingAuditLog implements AuditLogRepository {
  readonly entries: AuditEntry[] = [];

  async record(entry: AuditEntry): Promise<void> {
    this.entries.push(entry);
  }
}

export class StaticTenantRepository implements TenantRepository {
  constructor(private readonly byKey: Record<string, TenantRecord>) {}

  async findByApiKey(apiKey: string): Promise<TenantRecord | null> {
    return this.byKey[apiKey] ?? null;
  }
}

interface StoredDocument extends NewDocument {
  id: string;
  tenantId: string;
  chunksCount: number;
}

export class InMemoryDocumentRepository implements DocumentRepository {
  readonly rows: StoredDocument[] = [];
  private nextId = 1;

  async create(tenantId: string, document: NewDocument): Promise<string> {
    const id = `doc-${this.nextId++}`;
    this.rows.push({ ...document, id, tenantId, chunksCount: 0 });
    return id;
  }

  async setChunkCount(tenantId: string, documentId: string, chunksCount: number): Promise<void> {
    const row = this.find(tenantId, documentId);
    if (row) row.chunksCount = chunksCount;
  }

  async list(tenantId: string): Promise<DocumentSummary[]> {
    return this.rows
      .filter((row) => row.tenantId === tenantId)
      .map((row) => ({
        id: row.id,
        name: row.name,
        contentType: row.contentType,
        uploadedAt: '2026-01-01T00:00:00.000Z',
      }));
  }

  async exists(tenantId: string, documentId: string): Promise<boolean> {
    return this.find(tenantId, documentId) !== undefined;
  }

  async delete(tenantId: string, documentId: string): Promise<boolean> {
    const index = this.rows.findIndex((row) => row.tenantId === tenantId && row.id === documentId);
    if (index < 0) return false;
    this.rows.splice(index, 1);
    return true;
  }

  private find(tenantId: string, documentId: string) {
    return this.rows.find((row) => row.tenantId === tenantId && row.id === documentId);
  }
}
