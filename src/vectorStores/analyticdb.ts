/** AnalyticDB for PostgreSQL adapter - single ANN query over the collection table */

import { z } from 'zod';
import { withClient, SqlPool } from '../db';
import { errors } from '../errors';
import type { AnalyticdbConfig } from '../schemas';
import type { RagDocument } from '../types';
import { logInfo, logWarn } from '../utils';
import {
  errorMessage,
  finalizeHits,
  resolveSearchOptions,
  SearchOptions,
  toRagDocument,
  VectorStore,
  VectorType,
} from './types';

/** Database holding every namespace/collection table */
export const ANALYTICDB_DATABASE = 'knowledgebase';

const HitRowSchema = z.object({
  id: z.string(),
  score: z.coerce.number(),
  page_content: z.string(),
  metadata_: z.unknown(),
  vector: z.array(z.coerce.number()).nullable().optional(),
});

/** Array literal accepted by the `<=>` operator ('{0.1,0.2}') */
export function toVectorLiteral(vector: number[]): string {
  return `{${vector.join(',')}}`;
}

export class AnalyticdbVectorStore implements VectorStore {
  private readonly collectionName: string;
  private readonly tableName: string;

  constructor(
    collectionName: string,
    config: AnalyticdbConfig,
    private readonly pool: SqlPool
  ) {
    this.collectionName = collectionName.toLowerCase();
    if (!/^[a-z_][a-z0-9_]*$/.test(this.collectionName)) {
      throw errors.configuration(`Invalid AnalyticDB collection name: ${collectionName}`);
    }
    this.tableName = `"${config.namespace}"."${this.collectionName}"`;
  }

  getType(): VectorType { return 'analyticdb'; }
  getCollectionName(): string { return this.collectionName; }

  /** Connectivity probe; failures surface as VECTOR_STORE_CONNECTION_ERROR */
  async ping(): Promise<void> {
    try {
      await withClient(this.pool, (client) => client.query('SELECT 1'));
    } catch (err) {
      throw errors.vectorStoreConnection('analyticdb', errorMessage(err));
    }
  }

  async searchByHybrid(_query: string, queryVector: number[], options?: SearchOptions): Promise<RagDocument[]> {
    const { topK, scoreThreshold, documentIdsFilter } = resolveSearchOptions(options);
    if (documentIdsFilter && documentIdsFilter.length === 0) return [];

    const startTime = Date.now();
    const values: unknown[] = [toVectorLiteral(queryVector)];
    let where = 'WHERE 1=1';
    if (documentIdsFilter) {
      values.push(documentIdsFilter);
      where += ` AND metadata_->>'document_id' = ANY($${values.length})`;
    }
    values.push(topK);
    const sql =
      'SELECT t.id AS id, t.vector AS vector, (1.0 - t.score) AS score, ' +
      't.page_content AS page_content, t.metadata_ AS metadata_ ' +
      'FROM (SELECT id, vector, page_content, metadata_, vector <=> $1 AS score ' +
      `FROM ${this.tableName} ${where} ORDER BY score LIMIT $${values.length}) t`;

    const rows = await withClient(this.pool, async (client) => (await client.query(sql, values)).rows);

    const hits: RagDocument[] = [];
    let malformed = 0;
    for (const raw of rows) {
      const row = HitRowSchema.parse(raw);
      const doc = toRagDocument(row.page_content, row.metadata_, row.score, row.vector ?? undefined);
      if (doc) hits.push(doc);
      else malformed++;
    }
    if (malformed > 0) {
      logWarn('AnalyticDB rows without node/document reference skipped', { collection: this.collectionName, malformed });
    }

    const results = finalizeHits(hits, topK, scoreThreshold);
    logInfo('AnalyticDB search complete', {
      collection: this.collectionName,
      topK,
      filtered: documentIdsFilter !== null,
      rowsReturned: rows.length,
      resultsReturned: results.length,
      elapsedMs: Date.now() - startTime,
    });
    return results;
  }
}
