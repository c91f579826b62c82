/**
 * Knowledge Retrieval API - Retrieval Orchestrator
 *
 * Single entry point for dataset retrieval:
 * 1. Validate the request (no I/O on bad input)
 * 2. Load the dataset and check the caller's access
 * 3. Resolve the metadata filter into a document allow-list
 * 4. Embed the query and run the backend's hybrid search
 * 5. Reconcile hits against the canonical store, rank and record hit counts
 *
 * Dependencies are passed in explicitly; nothing here reads ambient session state.
 */

import { RETRIEVAL_DEFAULT_SCORE_THRESHOLD, RETRIEVAL_DEFAULT_TOP_K } from "./config";
import type { ContentSigner } from "./contentSigning";
import { EmbeddingProvider, resolveEmbeddingModel } from "./embeddings";
import { errors, isApiError } from "./errors";
import type { KnowledgeStore } from "./knowledgeStore";
import { buildMetadataFilter, resolveDocumentIdsFilter } from "./metadataFilter";
import { parseOrThrow } from "./middleware/validation";
import { checkDatasetPermission } from "./permissions";
import { reconcileHits } from "./reconciliation";
import { formatRecords } from "./responseFormatter";
import { DatasetRetrieveSchema } from "./schemas";
import type { Dataset, Principal, RetrievalRecord } from "./types";
import { elapsedMs, escapeQueryForSearch, logError, logInfo, sanitizeForLogging, uniqueStrings } from "./utils";
import type { VectorStoreResolver } from "./vectorStores/factory";

// =============================================================================
// Types
// =============================================================================

export interface RetrievalDeps {
  store: KnowledgeStore;
  vectorStores: VectorStoreResolver;
  embeddings: EmbeddingProvider;
  signContent: ContentSigner;
  /** Increment `hit_count` on returned segments */
  hitCountEnabled: boolean;
}

// =============================================================================
// Dataset Checks
// =============================================================================

async function loadSearchableDataset(store: KnowledgeStore, datasetId: string, principal: Principal): Promise<Dataset> {
  const dataset = await store.getDataset(datasetId);
  if (!dataset) throw errors.datasetNotFound(datasetId);

  await checkDatasetPermission(store, dataset, principal);

  if (!dataset.indexingTechnique) {
    throw errors.datasetNotInitialized();
  }
  if (dataset.indexingTechnique === 'economy') {
    throw errors.validation('Economy datasets have no vector index and cannot be searched here');
  }
  return dataset;
}

// =============================================================================
// Retrieve
// =============================================================================

export async function retrieve(
  deps: RetrievalDeps,
  datasetId: string,
  body: unknown,
  principal: Principal
): Promise<RetrievalRecord[]> {
  const input = parseOrThrow(DatasetRetrieveSchema, body);
  const filter = buildMetadataFilter(input.metadata_condition);
  const topK = input.retrieval_setting?.top_k ?? RETRIEVAL_DEFAULT_TOP_K;
  const scoreThreshold = input.retrieval_setting?.score_threshold ?? RETRIEVAL_DEFAULT_SCORE_THRESHOLD;
  const startTime = Date.now();

  try {
    const dataset = await loadSearchableDataset(deps.store, datasetId, principal);

    const query = input.query.trim();
    if (!query) return [];

    const documentIds = await resolveDocumentIdsFilter(deps.store, dataset.id, filter);
    if (documentIds !== null && documentIds.length === 0) {
      logInfo('Metadata filter matched no documents', { datasetId });
      return [];
    }

    const { model } = resolveEmbeddingModel(dataset);
    const queryVector = await deps.embeddings.embedQuery(query, model);
    const vectorStore = await deps.vectorStores.forDataset(dataset, deps.store);

    const hits = await vectorStore.searchByHybrid(escapeQueryForSearch(query), queryVector, {
      topK,
      scoreThreshold,
      documentIdsFilter: documentIds,
    });

    const records = await deps.store.transaction(async (tx) => {
      const reconciled = await reconcileHits(tx, hits);
      const formatted = formatRecords(reconciled, { datasetName: dataset.name, signContent: deps.signContent });
      if (deps.hitCountEnabled && formatted.length > 0) {
        await tx.incrementSegmentHitCounts(uniqueStrings(formatted.map((r) => r.metadata.segment_id)));
      }
      return formatted;
    });

    logInfo('Retrieval completed', {
      datasetId,
      query: sanitizeForLogging(query),
      backend: vectorStore.getType(),
      topK,
      scoreThreshold,
      filtered: documentIds !== null,
      hits: hits.length,
      records: records.length,
      elapsedMs: elapsedMs(startTime),
    });
    return records;
  } catch (err) {
    if (isApiError(err)) throw err;
    logError('Retrieval failed', err, { datasetId, elapsedMs: elapsedMs(startTime) });
    throw errors.internal();
  }
}
