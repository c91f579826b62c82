/**
 * Query Embedding Tests
 *
 * The GenAI SDK call is replaced by an in-process stub.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { classifyModelError, EmbedContentFn, GenAIEmbeddingProvider, resolveEmbeddingModel } from './embeddings';
import { ApiError, errors } from './errors';
import type { Dataset } from './types';

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

function isCode(code: string) {
  return (err: unknown) => err instanceof ApiError && err.code === code;
}

describe('resolveEmbeddingModel', () => {
  it('returns the configured model', () => {
    assert.deepStrictEqual(resolveEmbeddingModel(dataset()), { provider: 'google', model: 'text-embedding-004' });
  });

  it('rejects a dataset without a model', () => {
    assert.throws(() => resolveEmbeddingModel(dataset({ embeddingModel: null })), isCode('PROVIDER_NOT_INITIALIZED'));
    assert.throws(() => resolveEmbeddingModel(dataset({ embeddingModelProvider: null })), isCode('PROVIDER_NOT_INITIALIZED'));
  });

  it('rejects providers the SDK cannot serve', () => {
    assert.throws(() => resolveEmbeddingModel(dataset({ embeddingModelProvider: 'openai' })), isCode('MODEL_CURRENTLY_NOT_SUPPORTED'));
  });
});

describe('classifyModelError', () => {
  it('maps rate limits to quota exceeded', () => {
    assert.strictEqual(classifyModelError(new Error('[429 Too Many Requests] RESOURCE_EXHAUSTED')).code, 'PROVIDER_QUOTA_EXCEEDED');
  });

  it('maps credential failures to provider not initialized with the provider text', () => {
    const err = classifyModelError(new Error('403 PERMISSION_DENIED'));
    assert.strictEqual(err.code, 'PROVIDER_NOT_INITIALIZED');
    assert.strictEqual(err.message, '403 PERMISSION_DENIED');
  });

  it('maps unknown models to not supported', () => {
    const err = classifyModelError(new Error('404 NOT_FOUND models/unknown'), 'unknown');
    assert.strictEqual(err.code, 'MODEL_CURRENTLY_NOT_SUPPORTED');
    assert.deepStrictEqual(err.details, { model: 'unknown' });
  });

  it('maps bad requests to a fixed configuration hint', () => {
    const err = classifyModelError(new Error('400 INVALID_ARGUMENT'));
    assert.strictEqual(err.code, 'PROVIDER_NOT_INITIALIZED');
    assert.strictEqual(
      err.message,
      'No Embedding Model or Reranking Model available. Please configure a valid provider in the Settings -> Model Provider.'
    );
  });

  it('maps anything else to a completion request error', () => {
    const err = classifyModelError('socket hang up');
    assert.strictEqual(err.code, 'COMPLETION_REQUEST_ERROR');
    assert.strictEqual(err.message, 'socket hang up');
  });

  it('passes ApiErrors through', () => {
    const original = errors.datasetNotInitialized();
    assert.strictEqual(classifyModelError(original), original);
  });
});

describe('GenAIEmbeddingProvider', () => {
  it('sends normalized text with the configured dimensions', async () => {
    const calls: Array<Parameters<EmbedContentFn>[0]> = [];
    const provider = new GenAIEmbeddingProvider(async (params) => {
      calls.push(params);
      return { embeddings: [{ values: [0.5, 0.25] }] };
    }, { dimensions: 2 });

    const vector = await provider.embedQuery('  refund \n policy ', 'text-embedding-004');

    assert.deepStrictEqual(vector, [0.5, 0.25]);
    assert.deepStrictEqual(calls, [
      { model: 'text-embedding-004', contents: 'refund policy', config: { outputDimensionality: 2 } },
    ]);
  });

  it('serves repeated and concurrent queries from one call', async () => {
    let calls = 0;
    const provider = new GenAIEmbeddingProvider(async () => {
      calls++;
      return { embeddings: [{ values: [1, 2] }] };
    });

    await Promise.all([provider.embedQuery('q', 'm'), provider.embedQuery('q', 'm')]);
    await provider.embedQuery('q', 'm');

    assert.strictEqual(calls, 1);
  });

  it('returns cached vectors with the precision of the first response', async () => {
    const provider = new GenAIEmbeddingProvider(async () => ({ embeddings: [{ values: [0.1, 0.7] }] }));

    const first = await provider.embedQuery('q', 'm');
    first[0] = 99;
    const second = await provider.embedQuery('q', 'm');

    assert.deepStrictEqual(second, [0.1, 0.7]);
  });

  it('keys the cache by model', async () => {
    let calls = 0;
    const provider = new GenAIEmbeddingProvider(async () => {
      calls++;
      return { embeddings: [{ values: [1] }] };
    });

    await provider.embedQuery('q', 'model-a');
    await provider.embedQuery('q', 'model-b');

    assert.strictEqual(calls, 2);
  });

  it('classifies provider failures without retrying', async () => {
    let calls = 0;
    const provider = new GenAIEmbeddingProvider(async () => {
      calls++;
      throw new Error('429 RESOURCE_EXHAUSTED');
    });

    await assert.rejects(provider.embedQuery('q', 'm'), isCode('PROVIDER_QUOTA_EXCEEDED'));
    assert.strictEqual(calls, 1);
  });

  it('rejects an empty embedding', async () => {
    const provider = new GenAIEmbeddingProvider(async () => ({ embeddings: [] }));
    await assert.rejects(provider.embedQuery('q', 'm'), (err: unknown) =>
      err instanceof ApiError && err.code === 'COMPLETION_REQUEST_ERROR' && err.message === 'No embedding values in response'
    );
  });

  it('times out a stalled provider', async () => {
    const provider = new GenAIEmbeddingProvider(
      () => new Promise((resolve) => setTimeout(() => resolve({ embeddings: [{ values: [1] }] }), 200)),
      { timeoutMs: 10 }
    );
    await assert.rejects(provider.embedQuery('q', 'm'), (err: unknown) =>
      err instanceof ApiError && err.code === 'COMPLETION_REQUEST_ERROR' && err.message === 'Embedding request timed out after 10ms'
    );
  });
});
