/**
 * Knowledge Retrieval API - Result Reconciliation
 *
 * Vector hits carry only an index node id, a document back-reference and a
 * score. This module joins them against the canonical store:
 *
 * - hits whose document, chunk or segment no longer exists are dropped
 * - hierarchical hits are grouped under their parent segment, keeping the
 *   best child score and every matched child chunk
 * - flat hits map 1:1 onto segments; a segment seen twice keeps its best score
 *
 * Records come out in first-hit order. Ranking is the formatter's job.
 */

import type { KnowledgeStore } from "./knowledgeStore";
import type {
  ChildChunk,
  DocumentSummary,
  RagDocument,
  RetrievalChildChunk,
  RetrievalSegment,
  Segment,
} from "./types";
import { logInfo, uniqueStrings } from "./utils";

export type ReconciliationStore = Pick<
  KnowledgeStore,
  'getDocumentsByIds' | 'getChildChunksByIndexNodeIds' | 'getCompletedSegmentsByIds' | 'getCompletedSegmentsByIndexNodeIds'
>;

interface PendingRecord {
  document: DocumentSummary;
  segment: Segment;
  score: number;
  childChunks: RetrievalChildChunk[] | null;
}

function indexBy<T>(items: T[], key: (item: T) => string): Map<string, T> {
  const map = new Map<string, T>();
  for (const item of items) map.set(key(item), item);
  return map;
}

export async function reconcileHits(store: ReconciliationStore, hits: RagDocument[]): Promise<RetrievalSegment[]> {
  if (hits.length === 0) return [];

  const documents = indexBy(
    await store.getDocumentsByIds(uniqueStrings(hits.map((h) => h.metadata.document_id))),
    (d) => d.id
  );

  const hierarchicalHits: RagDocument[] = [];
  const flatHits: RagDocument[] = [];
  for (const hit of hits) {
    const document = documents.get(hit.metadata.document_id);
    if (!document) continue;
    if (document.docForm === 'hierarchical_model') hierarchicalHits.push(hit);
    else flatHits.push(hit);
  }

  const datasetIds = uniqueStrings([...documents.values()].map((d) => d.datasetId));

  // Child chunk → parent segment lookups, batched
  let chunksByNode = new Map<string, ChildChunk>();
  let parentSegments = new Map<string, Segment>();
  if (hierarchicalHits.length > 0) {
    chunksByNode = indexBy(
      await store.getChildChunksByIndexNodeIds(datasetIds, uniqueStrings(hierarchicalHits.map((h) => h.metadata.doc_id))),
      (c) => c.indexNodeId
    );
    const segmentIds = uniqueStrings([...chunksByNode.values()].map((c) => c.segmentId));
    if (segmentIds.length > 0) {
      parentSegments = indexBy(await store.getCompletedSegmentsByIds(datasetIds, segmentIds), (s) => s.id);
    }
  }

  const flatSegments = new Map<string, Segment>();
  if (flatHits.length > 0) {
    const segments = await store.getCompletedSegmentsByIndexNodeIds(
      datasetIds,
      uniqueStrings(flatHits.map((h) => h.metadata.doc_id))
    );
    for (const segment of segments) {
      if (segment.indexNodeId) flatSegments.set(segment.indexNodeId, segment);
    }
  }

  // Keyed by segment id; Map preserves first-hit order
  const records = new Map<string, PendingRecord>();
  let dropped = 0;

  for (const hit of hits) {
    const document = documents.get(hit.metadata.document_id);
    if (!document) {
      dropped++;
      continue;
    }
    const score = hit.metadata.score;

    if (document.docForm === 'hierarchical_model') {
      const chunk = chunksByNode.get(hit.metadata.doc_id);
      const segment = chunk ? parentSegments.get(chunk.segmentId) : undefined;
      if (!chunk || !segment) {
        dropped++;
        continue;
      }
      const childChunk: RetrievalChildChunk = { id: chunk.id, content: chunk.content, position: chunk.position, score };
      const existing = records.get(segment.id);
      if (existing) {
        existing.childChunks = [...(existing.childChunks ?? []), childChunk];
        existing.score = Math.max(existing.score, score);
      } else {
        records.set(segment.id, { document, segment, score, childChunks: [childChunk] });
      }
      continue;
    }

    const segment = flatSegments.get(hit.metadata.doc_id);
    if (!segment) {
      dropped++;
      continue;
    }
    const existing = records.get(segment.id);
    if (existing) {
      existing.score = Math.max(existing.score, score);
    } else {
      records.set(segment.id, { document, segment, score, childChunks: null });
    }
  }

  if (dropped > 0) {
    logInfo('Dropped stale vector hits', { dropped, kept: records.size });
  }

  return [...records.values()].map((r): RetrievalSegment => ({
    document: r.document,
    segment: r.segment,
    score: r.score,
    ...(r.childChunks ? { childChunks: r.childChunks } : {}),
  }));
}
