/**
 * Vector Store Factory / Registry
 *
 * Resolves a dataset to its backend adapter:
 *   1. persisted index_struct -> reuse its type and collection verbatim
 *   2. otherwise derive the collection from the dataset id, persist the
 *      struct with the configured default type, and use that
 *
 * Backend configuration is validated before an adapter is built. Pools and
 * adapters are process-wide; each adapter is probed once when first built.
 */

import { Pool } from 'pg';
import type { ZodType, ZodTypeDef } from 'zod';
import * as config from '../config';
import type { SqlPool } from '../db';
import { errors } from '../errors';
import type { KnowledgeStore } from '../knowledgeStore';
import {
  AnalyticdbConfig,
  AnalyticdbConfigSchema,
  IndexStruct,
  IndexStructSchema,
  MilvusConfigSchema,
  VertexConfigSchema,
} from '../schemas';
import type { Dataset } from '../types';
import { logError, logInfo } from '../utils';
import { ANALYTICDB_DATABASE, AnalyticdbVectorStore } from './analyticdb';
import { MilvusVectorStore } from './milvus';
import { FetchFn, isVectorType, ProbedVectorStore, VectorStore, VectorType } from './types';
import { AccessTokenProvider, getAccessToken, VertexVectorStore } from './vertex';

// =============================================================================
// Settings
// =============================================================================

export interface VectorStoreSettings {
  /** Backend for datasets without a persisted index struct */
  defaultType: string;
  analyticdb: unknown;
  milvus: unknown;
  vertex: unknown;
}

export function settingsFromEnv(): VectorStoreSettings {
  return {
    defaultType: config.VECTOR_STORE,
    analyticdb: {
      host: config.ANALYTICDB_HOST,
      port: config.ANALYTICDB_PORT,
      account: config.ANALYTICDB_ACCOUNT,
      password: config.ANALYTICDB_PASSWORD,
      namespace: config.ANALYTICDB_NAMESPACE,
      minConnection: config.ANALYTICDB_MIN_CONNECTION,
      maxConnection: config.ANALYTICDB_MAX_CONNECTION,
    },
    milvus: {
      uri: config.MILVUS_URI,
      token: config.MILVUS_TOKEN || undefined,
      user: config.MILVUS_USER || undefined,
      password: config.MILVUS_PASSWORD || undefined,
      database: config.MILVUS_DATABASE,
      enableHybridSearch: config.MILVUS_ENABLE_HYBRID_SEARCH,
      timeoutMs: config.MILVUS_TIMEOUT_MS,
    },
    vertex: {
      projectId: config.PROJECT_ID === 'local' ? '' : config.PROJECT_ID,
      region: config.VERTEX_VECTOR_SEARCH_REGION,
      indexEndpointResource: config.VERTEX_INDEX_ENDPOINT_RESOURCE,
      deployedIndexId: config.VERTEX_DEPLOYED_INDEX_ID,
      distanceMetric: config.VERTEX_DISTANCE_METRIC,
    },
  };
}

function parseBackendConfig<T>(type: VectorType, schema: ZodType<T, ZodTypeDef, unknown>, raw: unknown): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw errors.configuration(`Incomplete ${type} vector store configuration: ${issue?.message ?? 'invalid value'}`, {
      backend: type,
      fields: result.error.issues.map((i) => i.path.join('.')),
    });
  }
  return result.data;
}

// =============================================================================
// Collection Naming
// =============================================================================

/** Deterministic collection name; stable across re-creation of the dataset's index */
export function collectionNameForDataset(datasetId: string): string {
  return `Vector_index_${datasetId.replace(/-/g, '_')}_Node`;
}

export function serializeIndexStruct(type: VectorType, collectionName: string): string {
  const struct: IndexStruct = { type, vector_store: { class_prefix: collectionName } };
  return JSON.stringify(struct);
}

export interface VectorBinding {
  type: VectorType;
  collectionName: string;
  /** True when the binding was derived and must be written back */
  derived: boolean;
}

export function resolveBinding(dataset: Dataset, defaultType: string): VectorBinding {
  if (dataset.indexStruct) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(dataset.indexStruct);
    } catch {
      throw errors.configuration('Dataset index struct is not valid JSON', { datasetId: dataset.id });
    }
    const struct = IndexStructSchema.safeParse(parsed);
    if (!struct.success) {
      throw errors.configuration('Dataset index struct is malformed', { datasetId: dataset.id });
    }
    if (!isVectorType(struct.data.type)) {
      throw errors.configuration(`Vector store ${struct.data.type} is not supported.`, { datasetId: dataset.id });
    }
    return { type: struct.data.type, collectionName: struct.data.vector_store.class_prefix, derived: false };
  }

  if (!isVectorType(defaultType)) {
    throw errors.configuration(`Vector store ${defaultType} is not supported.`);
  }
  return { type: defaultType, collectionName: collectionNameForDataset(dataset.id), derived: true };
}

// =============================================================================
// Factory
// =============================================================================

export interface VectorStoreResolver {
  forDataset(dataset: Dataset, store: Pick<KnowledgeStore, 'saveDatasetIndexStruct'>): Promise<VectorStore>;
}

export interface VectorStoreFactoryOptions {
  settings?: VectorStoreSettings;
  createPool?: (config: AnalyticdbConfig) => SqlPool;
  fetchFn?: FetchFn;
  accessToken?: AccessTokenProvider;
  /** Probed adapters kept before the least recently used is dropped */
  maxAdapters?: number;
}

const DEFAULT_MAX_ADAPTERS = 500;

function createAnalyticdbPool(cfg: AnalyticdbConfig): SqlPool {
  const pool = new Pool({
    host: cfg.host,
    port: cfg.port,
    user: cfg.account,
    password: cfg.password,
    database: ANALYTICDB_DATABASE,
    min: cfg.minConnection,
    max: cfg.maxConnection,
  });
  pool.on('error', (err) => {
    logError('Idle AnalyticDB client error', err);
  });
  return pool;
}

export class VectorStoreFactory implements VectorStoreResolver {
  private readonly settings: VectorStoreSettings;
  private readonly createPool: (config: AnalyticdbConfig) => SqlPool;
  private readonly fetchFn: FetchFn;
  private readonly accessToken: AccessTokenProvider;
  private readonly pools = new Map<string, SqlPool>();
  private readonly adapters = new Map<string, Promise<ProbedVectorStore>>();
  private readonly maxAdapters: number;

  constructor(options: VectorStoreFactoryOptions = {}) {
    this.settings = options.settings ?? settingsFromEnv();
    this.createPool = options.createPool ?? createAnalyticdbPool;
    this.fetchFn = options.fetchFn ?? fetch;
    this.accessToken = options.accessToken ?? getAccessToken;
    this.maxAdapters = options.maxAdapters ?? DEFAULT_MAX_ADAPTERS;
  }

  async forDataset(dataset: Dataset, store: Pick<KnowledgeStore, 'saveDatasetIndexStruct'>): Promise<VectorStore> {
    const binding = resolveBinding(dataset, this.settings.defaultType);
    const adapter = await this.adapterFor(binding.type, binding.collectionName);

    if (binding.derived) {
      await store.saveDatasetIndexStruct(dataset.id, serializeIndexStruct(binding.type, binding.collectionName));
      logInfo('Dataset index struct persisted', { datasetId: dataset.id, type: binding.type, collection: binding.collectionName });
    }
    return adapter;
  }

  private adapterFor(type: VectorType, collectionName: string): Promise<ProbedVectorStore> {
    const key = `${type}:${collectionName}`;
    const cached = this.adapters.get(key);
    if (cached) {
      // Re-insert to mark as most recently used
      this.adapters.delete(key);
      this.adapters.set(key, cached);
      return cached;
    }

    if (this.adapters.size >= this.maxAdapters) {
      const oldest = this.adapters.keys().next();
      if (!oldest.done) this.adapters.delete(oldest.value);
    }

    const pending = (async () => {
      const adapter = this.build(type, collectionName);
      await adapter.ping();
      return adapter;
    })();
    this.adapters.set(key, pending);
    // Failed probes are not cached so the next request retries
    pending.catch(() => {
      if (this.adapters.get(key) === pending) this.adapters.delete(key);
    });
    return pending;
  }

  private build(type: VectorType, collectionName: string): ProbedVectorStore {
    switch (type) {
      case 'analyticdb': {
        const cfg = parseBackendConfig(type, AnalyticdbConfigSchema, this.settings.analyticdb);
        return new AnalyticdbVectorStore(collectionName, cfg, this.poolFor(cfg));
      }
      case 'milvus': {
        const cfg = parseBackendConfig(type, MilvusConfigSchema, this.settings.milvus);
        return new MilvusVectorStore(collectionName, cfg, this.fetchFn);
      }
      case 'vertex': {
        const cfg = parseBackendConfig(type, VertexConfigSchema, this.settings.vertex);
        return new VertexVectorStore(collectionName, cfg, this.fetchFn, this.accessToken);
      }
    }
  }

  private poolFor(cfg: AnalyticdbConfig): SqlPool {
    const key = `${cfg.host}:${cfg.port}:${cfg.account}`;
    let pool = this.pools.get(key);
    if (!pool) {
      pool = this.createPool(cfg);
      this.pools.set(key, pool);
    }
    return pool;
  }
}
