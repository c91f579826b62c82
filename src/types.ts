/**
 * Knowledge Retrieval API - Shared Types
 */

// ============================================
// Dataset Types
// ============================================

/** Visibility scope of a dataset inside its tenant */
export type DatasetPermissionScope = 'only_me' | 'all_team_members' | 'partial_members';

/** How the dataset was indexed; null until the first indexing run */
export type IndexingTechnique = 'high_quality' | 'economy';

/** Tenant-owned container of documents */
export interface Dataset {
  id: string;
  tenantId: string;
  name: string;
  permission: DatasetPermissionScope;
  /** Account id of the creator */
  createdBy: string;
  indexingTechnique: IndexingTechnique | null;
  /** Persisted backend identification (JSON text), see vectorStores/factory */
  indexStruct: string | null;
  embeddingModel: string | null;
  embeddingModelProvider: string | null;
}

// ============================================
// Document / Segment Types
// ============================================

export type DocumentIndexingStatus =
  | 'waiting'
  | 'parsing'
  | 'cleaning'
  | 'splitting'
  | 'indexing'
  | 'completed'
  | 'error';

/** Indexing form of a document */
export type DocForm = 'text_model' | 'qa_model' | 'hierarchical_model';

/** Fields of a canonical document needed to assemble a retrieval record */
export interface DocumentSummary {
  id: string;
  datasetId: string;
  name: string;
  dataSourceType: string;
  docForm: DocForm;
  docMetadata: Record<string, unknown> | null;
  enabled: boolean;
  archived: boolean;
}

export type SegmentStatus = 'waiting' | 'indexing' | 'completed' | 'error';

/** Atomic retrievable unit of text */
export interface Segment {
  id: string;
  datasetId: string;
  documentId: string;
  position: number;
  content: string;
  /** Present only for Q&A-form documents */
  answer: string | null;
  wordCount: number;
  hitCount: number;
  indexNodeId: string | null;
  indexNodeHash: string | null;
  status: SegmentStatus;
  enabled: boolean;
}

/** Independently indexed piece of a parent segment (hierarchical form) */
export interface ChildChunk {
  id: string;
  datasetId: string;
  documentId: string;
  segmentId: string;
  position: number;
  content: string;
  indexNodeId: string;
}

// ============================================
// Caller Types
// ============================================

export type TenantRole = 'owner' | 'admin' | 'editor' | 'normal' | 'dataset_operator';

/** Authenticated caller, threaded explicitly through every operation */
export interface Principal {
  accountId: string;
  tenantId: string;
  role: TenantRole;
}

// ============================================
// Retrieval Types
// ============================================

/** Raw hit metadata as written by the indexing pipeline */
export interface RagDocumentMetadata {
  /** Index node id of the matched segment or child chunk */
  doc_id: string;
  document_id: string;
  score: number;
  [key: string]: unknown;
}

/** Raw hit produced by a vector backend */
export interface RagDocument {
  pageContent: string;
  vector?: number[];
  metadata: RagDocumentMetadata;
}

export interface RetrievalChildChunk {
  id: string;
  content: string;
  position: number;
  score: number;
}

/** Reconciled hit joined against the canonical store */
export interface RetrievalSegment {
  document: DocumentSummary;
  segment: Segment;
  childChunks?: RetrievalChildChunk[];
  score?: number;
}

// ============================================
// Wire Types
// ============================================

export interface RecordMetadata {
  _source: 'knowledge';
  dataset_id: string;
  dataset_name: string;
  document_id: string;
  document_name: string;
  data_source_type: string;
  segment_id: string;
  retriever_from: 'external';
  score: number;
  segment_hit_count: number;
  segment_word_count: number;
  segment_position: number;
  segment_index_node_hash: string | null;
  doc_metadata: Record<string, unknown> | null;
  position: number;
}

export interface RecordChildChunk {
  id: string;
  content: string;
  position: number;
  score: number;
}

/** One ranked entry of the retrieval response */
export interface RetrievalRecord {
  metadata: RecordMetadata;
  title: string;
  content: string;
  score: number;
  child_chunks?: RecordChildChunk[];
}

export interface RetrievalResponse {
  records: RetrievalRecord[];
}
