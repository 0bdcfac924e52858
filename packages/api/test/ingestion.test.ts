import { describe, expect, it } from 'vitest';
import type { TenantContext } from '@knowledge-assistant/shared';
import { NotFoundError, UpstreamError } from '../src/errors';
import { Chunker } from '../src/services/chunking';
import { DocumentIngestor } from '../src/services/ingestion';
import { TenantRetriever, partitionName } from '../src/services/retrieval';
import {
  InMemoryDocumentRepository,
  InMemoryVectorIndex,
  RecordingAuditLog,
  StubEmbedder,
  charTokenizer,
} from './helpers';

const ACME: TenantContext = { tenantId: 'acme', tenantName: 'Acme Corp' };

function setup() {
  const documents = new InMemoryDocumentRepository();
  const index = new InMemoryVectorIndex();
  const embedder = new StubEmbedder();
  const auditLog = new RecordingAuditLog();
  const ingestor = new DocumentIngestor({
    documents,
    chunker: new Chunker({ chunkSize: 10, chunkOverlap: 0, tokenizer: charTokenizer }),
    embedder,
    retriever: new TenantRetriever(index, 3),
    auditLog,
  });
  return { ingestor, documents, index, embedder, auditLog };
}

describe('DocumentIngestor', () => {
  it('chunks, embeds and indexes an uploaded document', async () => {
    const { ingestor, documents, index, embedder, auditLog } = setup();

    const response = await ingestor.ingest(ACME, { name: 'Handbook', content: 'abcdefghijklmnopqrstuvwxy' });

    expect(response).toEqual({
      documentId: 'doc-1',
      name: 'Handbook',
      chunksCount: 3,
      message: 'Document uploaded successfully with 3 chunks',
    });
    expect(embedder.calls).toEqual(['abcdefghij', 'klmnopqrst', 'uvwxy']);
    expect(documents.rows[0]).toMatchObject({ tenantId: 'acme', contentType: 'text/markdown', chunksCount: 3 });
    expect(index.partitions.get(partitionName('acme'))?.map((point) => point.payload.chunk_text)).toEqual([
      'abcdefghij',
      'klmnopqrst',
      'uvwxy',
    ]);
    expect(auditLog.entries).toEqual([
      {
        tenantId: 'acme',
        action: 'document_upload',
        resourceType: 'document',
        resourceId: 'doc-1',
        metadata: { name: 'Handbook', chunks: 3 },
      },
    ]);
  });

  it('keeps the declared content type', async () => {
    const { ingestor, documents } = setup();

    await ingestor.ingest(ACME, { name: 'notes.txt', content: 'short', contentType: 'text/plain' });

    expect(documents.rows[0].contentType).toBe('text/plain');
  });

  it('surfaces embedding failures and drops the document row', async () => {
    const { ingestor, embedder, documents } = setup();
    embedder.embedBatch = () => Promise.reject(new Error('quota exceeded'));

    await expect(ingestor.ingest(ACME, { name: 'Handbook', content: 'some text' })).rejects.toBeInstanceOf(
      UpstreamError
    );
    expect(await documents.list('acme')).toEqual([]);
  });

  it('drops the document row when indexing fails', async () => {
    const { ingestor, index, documents, auditLog } = setup();
    index.upsert = () => Promise.reject(new Error('collection unavailable'));

    await expect(ingestor.ingest(ACME, { name: 'Handbook', content: 'abcdefghijklmno' })).rejects.toThrow(
      'vector-index call failed: collection unavailable'
    );
    expect(await documents.list('acme')).toEqual([]);
    expect(index.partitions.get(partitionName('acme'))).toEqual([]);
    expect(auditLog.entries).toEqual([]);
  });

  it('removes a document and its fragments', async () => {
    const { ingestor, documents, index, auditLog } = setup();
    await ingestor.ingest(ACME, { name: 'Handbook', content: 'abcdefghijklmno' });

    await ingestor.remove(ACME, 'doc-1');

    expect(documents.rows).toEqual([]);
    expect(index.partitions.get(partitionName('acme'))).toEqual([]);
    expect(auditLog.entries.map((entry) => entry.action)).toEqual(['document_upload', 'document_delete']);
  });

  it("refuses to remove another tenant's document", async () => {
    const { ingestor, documents } = setup();
    await ingestor.ingest(ACME, { name: 'Handbook', content: 'abcdefghij' });

    await expect(
      ingestor.remove({ tenantId: 'globex', tenantName: 'Globex' }, 'doc-1')
    ).rejects.toBeInstanceOf(NotFoundError);
    expect(documents.rows).toHaveLength(1);
  });
});
