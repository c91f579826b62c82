/**
 * Vector store stand-in that answers every search from a fixed hit list,
 * applying the same filtering, threshold and truncation rules as the adapters.
 */

import type { RagDocument } from "../types";
import type { VectorStoreResolver } from "../vectorStores/factory";
import { finalizeHits, resolveSearchOptions, SearchOptions, VectorStore } from "../vectorStores/types";

export interface SearchCall {
  query: string;
  vector: number[];
  options: SearchOptions;
}

export function scriptedVectorStores(rawHits: RagDocument[]) {
  const searches: SearchCall[] = [];
  const state = { resolutions: 0 };

  const vectorStore: VectorStore = {
    getType: () => 'analyticdb',
    getCollectionName: () => 'vector_index_ds_1_node',
    async searchByHybrid(query, vector, options = {}) {
      searches.push({ query, vector, options });
      const { topK, scoreThreshold, documentIdsFilter } = resolveSearchOptions(options);
      const allowed = documentIdsFilter
        ? rawHits.filter((h) => documentIdsFilter.includes(h.metadata.document_id))
        : rawHits;
      return finalizeHits(allowed, topK, scoreThreshold);
    },
  };

  const resolver: VectorStoreResolver = {
    async forDataset() {
      state.resolutions++;
      return vectorStore;
    },
  };

  return { resolver, searches, state };
}
