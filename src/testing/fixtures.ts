/**
 * Record builders shared by tests
 */

import type { ChildChunk, Dataset, Principal, RagDocument, Segment } from "../types";
import type { StoredDocument } from "./memoryKnowledgeStore";

export function makeDataset(overrides: Partial<Dataset> = {}): Dataset {
  return {
    id: 'ds-1',
    tenantId: 'tenant-a',
    name: 'Handbook',
    permission: 'all_team_members',
    createdBy: 'acct-1',
    indexingTechnique: 'high_quality',
    indexStruct: null,
    embeddingModel: 'text-embedding-004',
    embeddingModelProvider: 'google',
    ...overrides,
  };
}

export function makeDocument(overrides: Partial<StoredDocument> = {}): StoredDocument {
  return {
    id: 'doc-1',
    datasetId: 'ds-1',
    name: 'Refund policy.md',
    dataSourceType: 'upload_file',
    docForm: 'text_model',
    docMetadata: null,
    enabled: true,
    archived: false,
    indexingStatus: 'completed',
    ...overrides,
  };
}

export function makeSegment(overrides: Partial<Segment> = {}): Segment {
  return {
    id: 'seg-1',
    datasetId: 'ds-1',
    documentId: 'doc-1',
    position: 1,
    content: 'Refunds are issued within 14 days.',
    answer: null,
    wordCount: 6,
    hitCount: 0,
    indexNodeId: 'n1',
    indexNodeHash: 'hash-1',
    status: 'completed',
    enabled: true,
    ...overrides,
  };
}

export function makeChildChunk(overrides: Partial<ChildChunk> = {}): ChildChunk {
  return {
    id: 'chunk-1',
    datasetId: 'ds-1',
    documentId: 'doc-1',
    segmentId: 'seg-1',
    position: 1,
    content: 'Refunds are issued',
    indexNodeId: 'c1',
    ...overrides,
  };
}

export function makeHit(nodeId: string, documentId: string, score: number): RagDocument {
  return { pageContent: '', metadata: { doc_id: nodeId, document_id: documentId, score } };
}

export function makePrincipal(overrides: Partial<Principal> = {}): Principal {
  return { accountId: 'acct-1', tenantId: 'tenant-a', role: 'normal', ...overrides };
}
