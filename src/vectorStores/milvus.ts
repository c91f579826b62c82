/**
 * Milvus adapter (RESTful API v2)
 *
 * Hybrid mode sends a BM25 sub-search over the sparse field (raw query text)
 * and an inner-product sub-search over the dense field, fused by Milvus with
 * a weighted ranker. With hybrid disabled only the dense search runs.
 */

import { z } from 'zod';
import { errors } from '../errors';
import type { MilvusConfig } from '../schemas';
import type { RagDocument } from '../types';
import { logInfo, logWarn } from '../utils';
import {
  errorMessage,
  FetchFn,
  finalizeHits,
  resolveSearchOptions,
  SearchOptions,
  toRagDocument,
  VectorStore,
  VectorType,
} from './types';

const CONTENT_FIELD = 'page_content';
const METADATA_FIELD = 'metadata';
const DENSE_FIELD = 'vector';
const SPARSE_FIELD = 'sparse_vector';

/** Sparse (BM25) weight first, dense (IP) weight second */
export const HYBRID_WEIGHTS: readonly [number, number] = [0.3, 0.7];

const MilvusEnvelopeSchema = z.object({
  code: z.number(),
  message: z.string().optional(),
  data: z.unknown().optional(),
});

const SearchHitSchema = z.object({
  distance: z.coerce.number(),
  [CONTENT_FIELD]: z.string().default(''),
  [METADATA_FIELD]: z.unknown(),
}).passthrough();

const HasCollectionSchema = z.object({ has: z.boolean() });

/** Boolean expression restricting hits to the allowed documents */
export function buildDocumentIdsExpr(documentIds: string[]): string {
  return `metadata["document_id"] in [${documentIds.map((id) => JSON.stringify(id)).join(', ')}]`;
}

export class MilvusVectorStore implements VectorStore {
  private readonly baseUrl: string;

  constructor(
    private readonly collectionName: string,
    private readonly config: MilvusConfig,
    private readonly fetchFn: FetchFn = fetch
  ) {
    this.baseUrl = config.uri.replace(/\/+$/, '');
  }

  getType(): VectorType { return 'milvus'; }
  getCollectionName(): string { return this.collectionName; }

  private authToken(): string {
    return this.config.token || `${this.config.user ?? ''}:${this.config.password ?? ''}`;
  }

  private async post(path: string, body: Record<string, unknown>): Promise<unknown> {
    const response = await this.fetchFn(`${this.baseUrl}${path}`, {
      method: 'POST',
      headers: {
        'Authorization': `Bearer ${this.authToken()}`,
        'Content-Type': 'application/json',
        'Accept': 'application/json',
      },
      body: JSON.stringify({ dbName: this.config.database, ...body }),
      signal: AbortSignal.timeout(this.config.timeoutMs),
    });
    if (!response.ok) {
      throw new Error(`Milvus API error: ${response.status} ${await response.text()}`);
    }
    const envelope = MilvusEnvelopeSchema.parse(await response.json());
    if (envelope.code !== 0) {
      throw new Error(`Milvus API error: code ${envelope.code} ${envelope.message ?? ''}`.trim());
    }
    return envelope.data;
  }

  /**
   * Verify the server is reachable and the collection exists.
   * Unreachable -> VECTOR_STORE_CONNECTION_ERROR; missing -> DATASET_NOT_INITIALIZED.
   */
  async ping(): Promise<void> {
    let data: unknown;
    try {
      data = await this.post('/v2/vectordb/collections/has', { collectionName: this.collectionName });
    } catch (err) {
      throw errors.vectorStoreConnection('milvus', errorMessage(err));
    }
    if (!HasCollectionSchema.parse(data).has) {
      logWarn('Milvus collection not found', { collection: this.collectionName });
      throw errors.datasetNotInitialized();
    }
  }

  async searchByHybrid(query: string, queryVector: number[], options?: SearchOptions): Promise<RagDocument[]> {
    const { topK, scoreThreshold, documentIdsFilter } = resolveSearchOptions(options);
    if (documentIdsFilter && documentIdsFilter.length === 0) return [];

    const startTime = Date.now();
    const filter = documentIdsFilter ? buildDocumentIdsExpr(documentIdsFilter) : '';
    const outputFields = [CONTENT_FIELD, METADATA_FIELD];
    const hybrid = this.config.enableHybridSearch;

    const data = hybrid
      ? await this.post('/v2/vectordb/entities/hybrid_search', {
          collectionName: this.collectionName,
          search: [
            { data: [query], annsField: SPARSE_FIELD, limit: topK, filter, searchParams: { metricType: 'BM25' } },
            { data: [queryVector], annsField: DENSE_FIELD, limit: topK, filter, searchParams: { metricType: 'IP' } },
          ],
          rerank: { strategy: 'weighted', params: { weights: [...HYBRID_WEIGHTS] } },
          limit: topK,
          outputFields,
        })
      : await this.post('/v2/vectordb/entities/search', {
          collectionName: this.collectionName,
          data: [queryVector],
          annsField: DENSE_FIELD,
          limit: topK,
          filter,
          outputFields,
          searchParams: { metricType: 'IP' },
        });

    const rawHits = z.array(SearchHitSchema).parse(data ?? []);
    const hits: RagDocument[] = [];
    for (const hit of rawHits) {
      const doc = toRagDocument(hit[CONTENT_FIELD], hit[METADATA_FIELD], hit.distance);
      if (doc) hits.push(doc);
    }

    const results = finalizeHits(hits, topK, scoreThreshold);
    logInfo('Milvus search complete', {
      collection: this.collectionName,
      mode: hybrid ? 'hybrid' : 'dense',
      topK,
      filtered: documentIdsFilter !== null,
      resultsReturned: results.length,
      elapsedMs: Date.now() - startTime,
    });
    return results;
  }
}
