/**
 * Canonical Knowledge Store
 *
 * Explicit repository over the relational tables (datasets, documents,
 * document_segments, child_chunks, dataset_permissions). Every query takes its
 * scope as arguments; there is no ambient session or current-user lookup.
 *
 * Rows are validated with zod on the way out so a schema drift surfaces as
 * an error here rather than as a malformed API response.
 */

import { z } from 'zod';
import type { SqlClient, SqlPool } from './db';
import { withClient } from './db';
import { compileMetadataFilter, MetadataFilter } from './metadataFilter';
import type { ChildChunk, Dataset, DocumentSummary, Segment } from './types';
import { logError } from './utils';

// =============================================================================
// Interface
// =============================================================================

export interface KnowledgeStore {
  getDataset(datasetId: string): Promise<Dataset | null>;
  /** True when an explicit grant row exists for the account */
  hasDatasetPermission(datasetId: string, accountId: string, tenantId: string): Promise<boolean>;
  /** Persist backend identification; a struct already present is kept */
  saveDatasetIndexStruct(datasetId: string, indexStruct: string): Promise<void>;
  /** Ids of eligible documents (completed, enabled, not archived) matching the filter */
  findDocumentIdsByMetadata(datasetId: string, filter: MetadataFilter): Promise<string[]>;
  getDocumentsByIds(documentIds: string[]): Promise<DocumentSummary[]>;
  getChildChunksByIndexNodeIds(datasetIds: string[], indexNodeIds: string[]): Promise<ChildChunk[]>;
  /** Enabled segments with status completed */
  getCompletedSegmentsByIds(datasetIds: string[], segmentIds: string[]): Promise<Segment[]>;
  /** Enabled segments with status completed */
  getCompletedSegmentsByIndexNodeIds(datasetIds: string[], indexNodeIds: string[]): Promise<Segment[]>;
  /** Atomic `hit_count = hit_count + 1` for each id */
  incrementSegmentHitCounts(segmentIds: string[]): Promise<void>;
  /** Run `fn` in one transaction; rolled back and rethrown on failure */
  transaction<T>(fn: (tx: KnowledgeStore) => Promise<T>): Promise<T>;
}

// =============================================================================
// Row Schemas
// =============================================================================

const DatasetRowSchema = z.object({
  id: z.string(),
  tenant_id: z.string(),
  name: z.string(),
  permission: z.enum(['only_me', 'all_team_members', 'partial_members']),
  created_by: z.string(),
  indexing_technique: z.enum(['high_quality', 'economy']).nullable(),
  index_struct: z.string().nullable(),
  embedding_model: z.string().nullable(),
  embedding_model_provider: z.string().nullable(),
}).transform((r): Dataset => ({
  id: r.id,
  tenantId: r.tenant_id,
  name: r.name,
  permission: r.permission,
  createdBy: r.created_by,
  indexingTechnique: r.indexing_technique,
  indexStruct: r.index_struct,
  embeddingModel: r.embedding_model,
  embeddingModelProvider: r.embedding_model_provider,
}));

const DocumentRowSchema = z.object({
  id: z.string(),
  dataset_id: z.string(),
  name: z.string(),
  data_source_type: z.string(),
  doc_form: z.enum(['text_model', 'qa_model', 'hierarchical_model']),
  doc_metadata: z.record(z.unknown()).nullable(),
  enabled: z.boolean(),
  archived: z.boolean(),
}).transform((r): DocumentSummary => ({
  id: r.id,
  datasetId: r.dataset_id,
  name: r.name,
  dataSourceType: r.data_source_type,
  docForm: r.doc_form,
  docMetadata: r.doc_metadata,
  enabled: r.enabled,
  archived: r.archived,
}));

const SegmentRowSchema = z.object({
  id: z.string(),
  dataset_id: z.string(),
  document_id: z.string(),
  position: z.coerce.number().int(),
  content: z.string(),
  answer: z.string().nullable(),
  word_count: z.coerce.number().int(),
  hit_count: z.coerce.number().int(),
  index_node_id: z.string().nullable(),
  index_node_hash: z.string().nullable(),
  status: z.enum(['waiting', 'indexing', 'completed', 'error']),
  enabled: z.boolean(),
}).transform((r): Segment => ({
  id: r.id,
  datasetId: r.dataset_id,
  documentId: r.document_id,
  position: r.position,
  content: r.content,
  answer: r.answer,
  wordCount: r.word_count,
  hitCount: r.hit_count,
  indexNodeId: r.index_node_id,
  indexNodeHash: r.index_node_hash,
  status: r.status,
  enabled: r.enabled,
}));

const ChildChunkRowSchema = z.object({
  id: z.string(),
  dataset_id: z.string(),
  document_id: z.string(),
  segment_id: z.string(),
  position: z.coerce.number().int(),
  content: z.string(),
  index_node_id: z.string(),
}).transform((r): ChildChunk => ({
  id: r.id,
  datasetId: r.dataset_id,
  documentId: r.document_id,
  segmentId: r.segment_id,
  position: r.position,
  content: r.content,
  indexNodeId: r.index_node_id,
}));

const IdRowSchema = z.object({ id: z.string() });

// =============================================================================
// SQL
// =============================================================================

const DATASET_COLUMNS = 'id, tenant_id, name, permission, created_by, indexing_technique, index_struct, embedding_model, embedding_model_provider';
const DOCUMENT_COLUMNS = 'id, dataset_id, name, data_source_type, doc_form, doc_metadata, enabled, archived';
const SEGMENT_COLUMNS = 'id, dataset_id, document_id, position, content, answer, word_count, hit_count, index_node_id, index_node_hash, status, enabled';
const CHILD_CHUNK_COLUMNS = 'id, dataset_id, document_id, segment_id, position, content, index_node_id';

const ELIGIBLE_DOCUMENT = "indexing_status = 'completed' AND enabled = true AND archived = false";
const COMPLETED_SEGMENT = "status = 'completed' AND enabled = true";

// =============================================================================
// PostgreSQL Implementation
// =============================================================================

export class PgKnowledgeStore implements KnowledgeStore {
  /**
   * @param pool - shared pool; a client is acquired and released per call
   * @param client - bound client while inside `transaction`
   */
  constructor(
    private readonly pool: SqlPool,
    private readonly client: SqlClient | null = null
  ) {}

  private async rows(text: string, values: unknown[]): Promise<unknown[]> {
    if (this.client) {
      return (await this.client.query(text, values)).rows;
    }
    return withClient(this.pool, async (c) => (await c.query(text, values)).rows);
  }

  async getDataset(datasetId: string): Promise<Dataset | null> {
    const rows = await this.rows(`SELECT ${DATASET_COLUMNS} FROM datasets WHERE id = $1 LIMIT 1`, [datasetId]);
    return rows.length > 0 ? DatasetRowSchema.parse(rows[0]) : null;
  }

  async hasDatasetPermission(datasetId: string, accountId: string, tenantId: string): Promise<boolean> {
    const rows = await this.rows(
      'SELECT 1 AS granted FROM dataset_permissions WHERE dataset_id = $1 AND account_id = $2 AND tenant_id = $3 AND has_permission = true LIMIT 1',
      [datasetId, accountId, tenantId]
    );
    return rows.length > 0;
  }

  async saveDatasetIndexStruct(datasetId: string, indexStruct: string): Promise<void> {
    await this.rows('UPDATE datasets SET index_struct = $2 WHERE id = $1 AND index_struct IS NULL', [datasetId, indexStruct]);
  }

  async findDocumentIdsByMetadata(datasetId: string, filter: MetadataFilter): Promise<string[]> {
    const compiled = compileMetadataFilter(filter, 2);
    const rows = await this.rows(
      `SELECT id FROM documents WHERE dataset_id = $1 AND ${ELIGIBLE_DOCUMENT} AND ${compiled.clause}`,
      [datasetId, ...compiled.values]
    );
    return rows.map((r) => IdRowSchema.parse(r).id);
  }

  async getDocumentsByIds(documentIds: string[]): Promise<DocumentSummary[]> {
    if (documentIds.length === 0) return [];
    const rows = await this.rows(`SELECT ${DOCUMENT_COLUMNS} FROM documents WHERE id = ANY($1)`, [documentIds]);
    return rows.map((r) => DocumentRowSchema.parse(r));
  }

  async getChildChunksByIndexNodeIds(datasetIds: string[], indexNodeIds: string[]): Promise<ChildChunk[]> {
    if (datasetIds.length === 0 || indexNodeIds.length === 0) return [];
    const rows = await this.rows(
      `SELECT ${CHILD_CHUNK_COLUMNS} FROM child_chunks WHERE dataset_id = ANY($1) AND index_node_id = ANY($2)`,
      [datasetIds, indexNodeIds]
    );
    return rows.map((r) => ChildChunkRowSchema.parse(r));
  }

  async getCompletedSegmentsByIds(datasetIds: string[], segmentIds: string[]): Promise<Segment[]> {
    if (datasetIds.length === 0 || segmentIds.length === 0) return [];
    const rows = await this.rows(
      `SELECT ${SEGMENT_COLUMNS} FROM document_segments WHERE dataset_id = ANY($1) AND id = ANY($2) AND ${COMPLETED_SEGMENT}`,
      [datasetIds, segmentIds]
    );
    return rows.map((r) => SegmentRowSchema.parse(r));
  }

  async getCompletedSegmentsByIndexNodeIds(datasetIds: string[], indexNodeIds: string[]): Promise<Segment[]> {
    if (datasetIds.length === 0 || indexNodeIds.length === 0) return [];
    const rows = await this.rows(
      `SELECT ${SEGMENT_COLUMNS} FROM document_segments WHERE dataset_id = ANY($1) AND index_node_id = ANY($2) AND ${COMPLETED_SEGMENT}`,
      [datasetIds, indexNodeIds]
    );
    return rows.map((r) => SegmentRowSchema.parse(r));
  }

  async incrementSegmentHitCounts(segmentIds: string[]): Promise<void> {
    if (segmentIds.length === 0) return;
    await this.rows('UPDATE document_segments SET hit_count = hit_count + 1 WHERE id = ANY($1)', [segmentIds]);
  }

  async transaction<T>(fn: (tx: KnowledgeStore) => Promise<T>): Promise<T> {
    // Nested calls join the outer transaction
    if (this.client) return fn(this);

    return withClient(this.pool, async (client) => {
      await client.query('BEGIN');
      try {
        const result = await fn(new PgKnowledgeStore(this.pool, client));
        await client.query('COMMIT');
        return result;
      } catch (err) {
        try {
          await client.query('ROLLBACK');
        } catch (rollbackErr) {
          logError('Transaction rollback failed', rollbackErr);
        }
        throw err;
      }
    });
  }
}
