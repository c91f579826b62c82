/**
 * Vector Store Factory Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { z } from 'zod';
import {
  collectionNameForDataset,
  resolveBinding,
  serializeIndexStruct,
  VectorStoreFactory,
  VectorStoreSettings,
} from './factory';
import type { FetchFn } from './types';
import type { SqlClient, SqlPool } from '../db';
import type { Dataset } from '../types';
import { ApiError } from '../errors';

const ANALYTICDB = {
  host: 'localhost',
  port: 5432,
  account: 'test-user',
  password: 'test-secret',
  namespace: 'knowledge',
  minConnection: 1,
  maxConnection: 5,
};

const VERTEX = {
  projectId: 'test-project',
  region: 'us-central1',
  indexEndpointResource: 'projects/test-project/locations/us-central1/indexEndpoints/123',
  deployedIndexId: 'deployed_1',
};

const SETTINGS: VectorStoreSettings = {
  defaultType: 'analyticdb',
  analyticdb: ANALYTICDB,
  milvus: { uri: 'http://milvus.test:19530', token: 'test-token' },
  vertex: {},
};

function dataset(overrides: Partial<Dataset> = {}): Dataset {
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

function recordingStore() {
  const saved: Array<[string, string]> = [];
  return {
    saved,
    async saveDatasetIndexStruct(datasetId: string, indexStruct: string) {
      saved.push([datasetId, indexStruct]);
    },
  };
}

function fakePoolFactory() {
  const state = { pools: 0, queries: [] as string[] };
  const createPool = (): SqlPool => {
    state.pools++;
    return {
      async connect(): Promise<SqlClient> {
        return {
          async query(text: string) {
            state.queries.push(text);
            return { rows: [] };
          },
          release() {},
        };
      },
    };
  };
  return { createPool, state };
}

function isCode(code: string) {
  return (err: unknown) => err instanceof ApiError && err.code === code;
}

describe('collectionNameForDataset', () => {
  it('replaces dashes and wraps the id', () => {
    assert.strictEqual(collectionNameForDataset('a1b2-c3d4-e5'), 'Vector_index_a1b2_c3d4_e5_Node');
  });
});

describe('resolveBinding', () => {
  it('reuses a persisted index struct verbatim', () => {
    const struct = serializeIndexStruct('milvus', 'Custom_Coll');
    assert.strictEqual(struct, '{"type":"milvus","vector_store":{"class_prefix":"Custom_Coll"}}');
    assert.deepStrictEqual(resolveBinding(dataset({ indexStruct: struct }), 'analyticdb'), {
      type: 'milvus',
      collectionName: 'Custom_Coll',
      derived: false,
    });
  });

  it('derives the collection and default type when nothing is persisted', () => {
    assert.deepStrictEqual(resolveBinding(dataset(), 'analyticdb'), {
      type: 'analyticdb',
      collectionName: 'Vector_index_ds_1_Node',
      derived: true,
    });
  });

  it('rejects unsupported backend types', () => {
    const struct = '{"type":"weaviate","vector_store":{"class_prefix":"C"}}';
    assert.throws(() => resolveBinding(dataset({ indexStruct: struct }), 'analyticdb'), isCode('CONFIGURATION_ERROR'));
    assert.throws(() => resolveBinding(dataset(), 'weaviate'), isCode('CONFIGURATION_ERROR'));
  });

  it('rejects a corrupt index struct', () => {
    assert.throws(() => resolveBinding(dataset({ indexStruct: '{not json' }), 'analyticdb'), isCode('CONFIGURATION_ERROR'));
  });
});

describe('VectorStoreFactory', () => {
  it('builds, probes and persists on first resolution', async () => {
    const { createPool, state } = fakePoolFactory();
    const factory = new VectorStoreFactory({ settings: SETTINGS, createPool });
    const store = recordingStore();

    const adapter = await factory.forDataset(dataset(), store);

    assert.strictEqual(adapter.getType(), 'analyticdb');
    assert.strictEqual(adapter.getCollectionName(), 'vector_index_ds_1_node');
    assert.deepStrictEqual(state.queries, ['SELECT 1']);
    assert.deepStrictEqual(store.saved, [
      ['ds-1', '{"type":"analyticdb","vector_store":{"class_prefix":"Vector_index_ds_1_Node"}}'],
    ]);
  });

  it('reuses the adapter and pool for the same collection', async () => {
    const { createPool, state } = fakePoolFactory();
    const factory = new VectorStoreFactory({ settings: SETTINGS, createPool });
    const persisted = dataset({ indexStruct: serializeIndexStruct('analyticdb', 'Vector_index_ds_1_Node') });
    const store = recordingStore();

    const first = await factory.forDataset(persisted, store);
    const second = await factory.forDataset(persisted, store);

    assert.strictEqual(first, second);
    assert.strictEqual(state.pools, 1);
    assert.deepStrictEqual(state.queries, ['SELECT 1']);
    assert.deepStrictEqual(store.saved, []);
  });

  it('fails construction on incomplete configuration without persisting', async () => {
    const factory = new VectorStoreFactory({
      settings: { ...SETTINGS, analyticdb: { ...ANALYTICDB, host: '' } },
      createPool: fakePoolFactory().createPool,
    });
    const store = recordingStore();

    await assert.rejects(factory.forDataset(dataset(), store), (err: unknown) =>
      err instanceof ApiError &&
      err.code === 'CONFIGURATION_ERROR' &&
      err.message === 'Incomplete analyticdb vector store configuration: ANALYTICDB_HOST is required'
    );
    assert.deepStrictEqual(store.saved, []);
  });

  it('fails fast on an unreachable vertex endpoint without persisting', async () => {
    const fetchFn: FetchFn = async () => {
      throw new TypeError('fetch failed');
    };
    const factory = new VectorStoreFactory({
      settings: { ...SETTINGS, defaultType: 'vertex', vertex: VERTEX },
      fetchFn,
      accessToken: async () => 'test-token',
    });
    const store = recordingStore();

    await assert.rejects(factory.forDataset(dataset(), store), isCode('VECTOR_STORE_CONNECTION_ERROR'));
    assert.deepStrictEqual(store.saved, []);
  });

  it('evicts the least recently used adapter past the cap', async () => {
    const ProbeBodySchema = z.object({ collectionName: z.string() });
    const probed: string[] = [];
    const fetchFn: FetchFn = async (...args: Parameters<FetchFn>) => {
      const [, init] = args;
      probed.push(ProbeBodySchema.parse(JSON.parse(String(init?.body))).collectionName);
      return new Response(JSON.stringify({ code: 0, data: { has: true } }), { status: 200 });
    };
    const factory = new VectorStoreFactory({ settings: { ...SETTINGS, defaultType: 'milvus' }, fetchFn, maxAdapters: 2 });
    const store = recordingStore();

    await factory.forDataset(dataset({ id: 'ds-1' }), store);
    await factory.forDataset(dataset({ id: 'ds-2' }), store);
    await factory.forDataset(dataset({ id: 'ds-1' }), store);
    await factory.forDataset(dataset({ id: 'ds-3' }), store);
    await factory.forDataset(dataset({ id: 'ds-1' }), store);
    await factory.forDataset(dataset({ id: 'ds-2' }), store);

    assert.deepStrictEqual(probed, ['Vector_index_ds_1_Node', 'Vector_index_ds_2_Node', 'Vector_index_ds_3_Node', 'Vector_index_ds_2_Node']);
  });

  it('retries the probe after a connection failure', async () => {
    let calls = 0;
    const fetchFn: FetchFn = async () => {
      calls++;
      if (calls === 1) throw new TypeError('fetch failed');
      return new Response(JSON.stringify({ code: 0, data: { has: true } }), { status: 200 });
    };
    const factory = new VectorStoreFactory({ settings: { ...SETTINGS, defaultType: 'milvus' }, fetchFn });
    const store = recordingStore();

    await assert.rejects(factory.forDataset(dataset(), store), isCode('VECTOR_STORE_CONNECTION_ERROR'));
    const adapter = await factory.forDataset(dataset(), store);

    assert.strictEqual(adapter.getType(), 'milvus');
    assert.strictEqual(adapter.getCollectionName(), 'Vector_index_ds_1_Node');
    assert.strictEqual(calls, 2);
  });
});
