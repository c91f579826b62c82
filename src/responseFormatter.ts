/**
 * Knowledge Retrieval API - Response Formatter
 *
 * Projects reconciled segments into the external record schema, ranked by
 * score with 1-based positions.
 */

import type { ContentSigner } from "./contentSigning";
import type { RecordChildChunk, RetrievalRecord, RetrievalSegment } from "./types";

function recordContent(item: RetrievalSegment, signContent: ContentSigner): string {
  const content = signContent(item.segment.content);
  return item.segment.answer ? `question:${content} \nanswer:${item.segment.answer}` : content;
}

export interface FormatOptions {
  datasetName: string;
  signContent: ContentSigner;
}

export function formatRecords(items: RetrievalSegment[], { datasetName, signContent }: FormatOptions): RetrievalRecord[] {
  // Array.prototype.sort is stable, so equal scores keep reconciliation order
  const ranked = items
    .filter((item) => item.document.enabled && !item.document.archived)
    .sort((a, b) => (b.score ?? 0) - (a.score ?? 0));

  return ranked.map((item, index): RetrievalRecord => {
    const { document, segment } = item;
    const score = item.score ?? 0;
    const record: RetrievalRecord = {
      metadata: {
        _source: 'knowledge',
        dataset_id: document.datasetId,
        dataset_name: datasetName,
        document_id: document.id,
        document_name: document.name,
        data_source_type: document.dataSourceType,
        segment_id: segment.id,
        retriever_from: 'external',
        score,
        segment_hit_count: segment.hitCount,
        segment_word_count: segment.wordCount,
        segment_position: segment.position,
        segment_index_node_hash: segment.indexNodeHash,
        doc_metadata: document.docMetadata,
        position: index + 1,
      },
      title: document.name,
      content: recordContent(item, signContent),
      score,
    };
    if (item.childChunks) {
      record.child_chunks = item.childChunks.map((c): RecordChildChunk => ({
        id: c.id,
        content: c.content,
        position: c.position,
        score: c.score,
      }));
    }
    return record;
  });
}
