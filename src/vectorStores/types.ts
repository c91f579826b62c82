/** Vector Store Abstraction - uniform hybrid search contract over heterogeneous backends */

import { z } from 'zod';
import { errors } from '../errors';
import type { RagDocument } from '../types';

export type FetchFn = typeof fetch;

export type VectorType = 'analyticdb' | 'milvus' | 'vertex';

export const VECTOR_TYPES: readonly VectorType[] = ['analyticdb', 'milvus', 'vertex'];

export function isVectorType(value: string): value is VectorType {
  return VECTOR_TYPES.some((t) => t === value);
}

export interface SearchOptions {
  /** Positive integer; defaults to DEFAULT_TOP_K */
  topK?: number;
  /** Strict lower bound on similarity; defaults to 0 */
  scoreThreshold?: number;
  /** null/undefined: unrestricted. []: match nothing. */
  documentIdsFilter?: string[] | null;
}

export interface VectorStore {
  getType(): VectorType;
  /** Collection (table / index namespace) the adapter is bound to */
  getCollectionName(): string;
  /** Score-descending hits with score > scoreThreshold, at most topK */
  searchByHybrid(query: string, queryVector: number[], options?: SearchOptions): Promise<RagDocument[]>;
}

/** Adapter with a construction-time reachability check */
export interface ProbedVectorStore extends VectorStore {
  ping(): Promise<void>;
}

export const DEFAULT_TOP_K = 4;

export interface ResolvedSearchOptions {
  topK: number;
  scoreThreshold: number;
  documentIdsFilter: string[] | null;
}

/** Apply defaults and reject a top_k that is not a positive integer */
export function resolveSearchOptions(options: SearchOptions = {}): ResolvedSearchOptions {
  const topK = options.topK ?? DEFAULT_TOP_K;
  if (!Number.isInteger(topK) || topK <= 0) {
    throw errors.validation('top_k must be a positive integer', { topK });
  }
  const scoreThreshold = options.scoreThreshold ?? 0;
  if (!Number.isFinite(scoreThreshold)) {
    throw errors.validation('score_threshold must be a finite number', { scoreThreshold });
  }
  return { topK, scoreThreshold, documentIdsFilter: options.documentIdsFilter ?? null };
}

/** Keep hits strictly above the threshold, best first, truncated to topK */
export function finalizeHits(hits: RagDocument[], topK: number, scoreThreshold: number): RagDocument[] {
  return hits
    .filter((h) => h.metadata.score > scoreThreshold)
    .sort((a, b) => b.metadata.score - a.metadata.score)
    .slice(0, topK);
}

const HitMetadataSchema = z.object({
  doc_id: z.string().min(1),
  document_id: z.string().min(1),
}).passthrough();

/**
 * Build a raw hit from backend payload fields. Returns null when the stored
 * metadata lacks the node or document back-reference.
 */
export function toRagDocument(pageContent: string, metadata: unknown, score: number, vector?: number[]): RagDocument | null {
  const parsed = HitMetadataSchema.safeParse(metadata);
  if (!parsed.success) return null;
  const doc: RagDocument = { pageContent, metadata: { ...parsed.data, score } };
  if (vector) doc.vector = vector;
  return doc;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
