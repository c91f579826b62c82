/** Vertex AI Vector Search adapter - findNeighbors over a deployed index */

import { GoogleAuth } from 'google-auth-library';
import { z } from 'zod';
import { errors } from '../errors';
import type { DistanceMetric, VertexConfig } from '../schemas';
import type { RagDocument } from '../types';
import { logInfo, logWarn } from '../utils';
import { errorMessage, FetchFn, finalizeHits, resolveSearchOptions, SearchOptions, VectorStore, VectorType } from './types';

/** Restrict namespace carrying the collection each datapoint belongs to */
export const COLLECTION_NAMESPACE = 'collection';
export const DOCUMENT_NAMESPACE = 'document_id';

export type AccessTokenProvider = () => Promise<string>;

// Auth caching
interface CachedAuthToken { token: string; expiresAt: number; }
let cachedAuthClient: GoogleAuth | null = null;
let cachedAccessToken: CachedAuthToken | null = null;
const TOKEN_REFRESH_BUFFER_MS = 60_000, TOKEN_DEFAULT_TTL_MS = 50 * 60_000;

function getAuthClient(): GoogleAuth {
  if (!cachedAuthClient) cachedAuthClient = new GoogleAuth({ scopes: ['https://www.googleapis.com/auth/cloud-platform'] });
  return cachedAuthClient;
}

export async function getAccessToken(): Promise<string> {
  const now = Date.now();
  if (cachedAccessToken && cachedAccessToken.expiresAt > now + TOKEN_REFRESH_BUFFER_MS) return cachedAccessToken.token;
  const client = await getAuthClient().getClient();
  const tokenResponse = await client.getAccessToken();
  if (!tokenResponse.token) throw new Error('Failed to get access token');
  const expiry: unknown = tokenResponse.res?.data?.expiry_date;
  cachedAccessToken = { token: tokenResponse.token, expiresAt: typeof expiry === 'number' ? expiry : now + TOKEN_DEFAULT_TTL_MS };
  return cachedAccessToken.token;
}

/** Map a backend distance onto a similarity where larger is better */
export function distanceToSimilarity(metric: DistanceMetric, distance: number): number {
  switch (metric) {
    case 'SQUARED_L2': return 1 / (1 + distance);
    case 'DOT_PRODUCT': return distance;
    case 'COSINE': return Math.max(0, Math.min(1, 1 - distance));
  }
}

const IndexEndpointSchema = z.object({
  deployedIndexes: z.array(z.object({ id: z.string() })).optional(),
});

const FindNeighborsResponseSchema = z.object({
  nearestNeighbors: z.array(z.object({
    neighbors: z.array(z.object({
      datapoint: z.object({ datapointId: z.string() }),
      distance: z.number().optional(),
    })).optional(),
  })).optional(),
});

export class VertexVectorStore implements VectorStore {
  private readonly endpointUrl: string;
  private readonly findNeighborsUrl: string;

  constructor(
    private readonly collectionName: string,
    private readonly config: VertexConfig,
    private readonly fetchFn: FetchFn = fetch,
    private readonly accessToken: AccessTokenProvider = getAccessToken
  ) {
    this.endpointUrl = `https://${config.region}-aiplatform.googleapis.com/v1/${config.indexEndpointResource}`;
    this.findNeighborsUrl = `${this.endpointUrl}:findNeighbors`;
  }

  getType(): VectorType { return 'vertex'; }
  getCollectionName(): string { return this.collectionName; }

  /** Fetches the index endpoint and checks the configured index is deployed on it */
  async ping(): Promise<void> {
    let deployedIds: string[];
    try {
      const response = await this.fetchFn(this.endpointUrl, {
        method: 'GET',
        headers: { 'Authorization': `Bearer ${await this.accessToken()}` },
      });
      if (!response.ok) throw new Error(`Vertex API error: ${response.status} ${await response.text()}`);
      const endpoint = IndexEndpointSchema.parse(await response.json());
      deployedIds = (endpoint.deployedIndexes ?? []).map((d) => d.id);
    } catch (err) {
      throw errors.vectorStoreConnection('vertex', errorMessage(err));
    }
    if (!deployedIds.includes(this.config.deployedIndexId)) {
      logWarn('Vertex deployed index not found', { endpoint: this.config.indexEndpointResource, deployedIndexId: this.config.deployedIndexId });
      throw errors.datasetNotInitialized();
    }
  }

  /**
   * Datapoints are stored as `<index node id>:<document id>` so hits can be
   * mapped back without a payload store; the text is fetched during reconciliation.
   */
  async searchByHybrid(_query: string, queryVector: number[], options?: SearchOptions): Promise<RagDocument[]> {
    const { topK, scoreThreshold, documentIdsFilter } = resolveSearchOptions(options);
    if (documentIdsFilter && documentIdsFilter.length === 0) return [];

    const startTime = Date.now();
    const restricts: Array<{ namespace: string; allowList: string[] }> = [
      { namespace: COLLECTION_NAMESPACE, allowList: [this.collectionName] },
    ];
    if (documentIdsFilter) restricts.push({ namespace: DOCUMENT_NAMESPACE, allowList: documentIdsFilter });

    const requestBody = {
      deployedIndexId: this.config.deployedIndexId,
      queries: [{ datapoint: { datapointId: 'query', featureVector: queryVector, restricts }, neighborCount: topK }],
    };
    const response = await this.fetchFn(this.findNeighborsUrl, {
      method: 'POST',
      headers: { 'Authorization': `Bearer ${await this.accessToken()}`, 'Content-Type': 'application/json' },
      body: JSON.stringify(requestBody),
    });
    if (!response.ok) throw new Error(`Vertex API error: ${response.status} ${await response.text()}`);
    const data = FindNeighborsResponseSchema.parse(await response.json());

    const hits: RagDocument[] = [];
    for (const n of data.nearestNeighbors?.[0]?.neighbors ?? []) {
      const sep = n.datapoint.datapointId.indexOf(':');
      if (sep <= 0 || sep === n.datapoint.datapointId.length - 1) continue;
      const score = n.distance !== undefined ? distanceToSimilarity(this.config.distanceMetric, n.distance) : 0;
      hits.push({
        pageContent: '',
        metadata: {
          doc_id: n.datapoint.datapointId.slice(0, sep),
          document_id: n.datapoint.datapointId.slice(sep + 1),
          score,
        },
      });
    }

    const results = finalizeHits(hits, topK, scoreThreshold);
    logInfo('Vertex Vector Search complete', {
      collection: this.collectionName,
      topK,
      filtered: documentIdsFilter !== null,
      resultsReturned: results.length,
      elapsedMs: Date.now() - startTime,
    });
    return results;
  }
}
