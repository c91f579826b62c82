/**
 * Knowledge Retrieval API - Query Embeddings
 *
 * Uses Google's text-embedding models via the Generative AI SDK.
 * Features LRU caching, in-flight de-duplication and a hard timeout.
 * Provider failures are not retried; they are classified into the
 * caller-facing model error categories.
 */

import { EMBEDDING_DIMENSIONS, EMBEDDING_TIMEOUT_MS } from "./config";
import { ApiError, errors } from "./errors";
import { getGenAIClient } from "./genaiClient";
import type { Dataset } from "./types";
import { hashText, logInfo, logWarn } from "./utils";

// =============================================================================
// Constants
// =============================================================================

const CACHE_MAX_SIZE = 1000;
const CACHE_MAX_AGE_MS = 10 * 60 * 1000; // 10 minutes
const MAX_TEXT_LENGTH = 8000;

/** Provider names served by the GenAI SDK */
const SUPPORTED_PROVIDERS = new Set(['google', 'gemini', 'vertex_ai']);

const BAD_REQUEST_MESSAGE =
  'No Embedding Model or Reranking Model available. Please configure a valid provider in the Settings -> Model Provider.';

// =============================================================================
// Types
// =============================================================================

export interface EmbeddingProvider {
  embedQuery(text: string, model: string): Promise<number[]>;
}

export interface EmbeddingModelRef {
  provider: string;
  model: string;
}

interface EmbedContentParams {
  model: string;
  contents: string;
  config: { outputDimensionality: number };
}

interface EmbedContentResult {
  embeddings?: Array<{ values?: number[] }>;
}

export type EmbedContentFn = (params: EmbedContentParams) => Promise<EmbedContentResult>;

interface CacheEntry {
  embedding: number[];
  timestamp: number;
}

export interface GenAIEmbeddingOptions {
  dimensions?: number;
  timeoutMs?: number;
  cacheMaxSize?: number;
}

// =============================================================================
// Model Resolution
// =============================================================================

/** Pick the dataset's embedding model, rejecting unconfigured or foreign providers */
export function resolveEmbeddingModel(dataset: Dataset): EmbeddingModelRef {
  if (!dataset.embeddingModel || !dataset.embeddingModelProvider) {
    throw errors.providerNotInitialized();
  }
  if (!SUPPORTED_PROVIDERS.has(dataset.embeddingModelProvider.toLowerCase())) {
    throw errors.modelNotSupported(dataset.embeddingModel);
  }
  return { provider: dataset.embeddingModelProvider, model: dataset.embeddingModel };
}

// =============================================================================
// Error Classification
// =============================================================================

/** Map a provider failure onto its caller-facing category */
export function classifyModelError(err: unknown, model?: string): ApiError {
  if (err instanceof ApiError) return err;
  const msg = err instanceof Error ? err.message : String(err);

  if (/\b429\b/.test(msg) || msg.includes('RESOURCE_EXHAUSTED') || /quota/i.test(msg)) {
    return errors.providerQuotaExceeded();
  }
  if (/\b40[13]\b/.test(msg) || msg.includes('PERMISSION_DENIED') || msg.includes('UNAUTHENTICATED') || /API key|credentials/i.test(msg)) {
    return errors.providerNotInitialized(msg);
  }
  if (/\b404\b/.test(msg) || msg.includes('NOT_FOUND') || /not supported/i.test(msg)) {
    return errors.modelNotSupported(model);
  }
  if (/\b400\b/.test(msg) || msg.includes('INVALID_ARGUMENT')) {
    return errors.providerNotInitialized(BAD_REQUEST_MESSAGE);
  }
  return errors.completionRequest(msg);
}

// =============================================================================
// Timeout
// =============================================================================

async function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`Embedding request timed out after ${ms}ms`)), ms);
  });
  try {
    return await Promise.race([promise, expired]);
  } finally {
    clearTimeout(timer);
  }
}

// =============================================================================
// Text Processing
// =============================================================================

/** Collapse whitespace and truncate; case is preserved for the model */
function normalizeText(text: string): string {
  return text.replace(/\s+/g, ' ').trim().slice(0, MAX_TEXT_LENGTH);
}

// =============================================================================
// Provider
// =============================================================================

const defaultEmbedContent: EmbedContentFn = (params) => getGenAIClient().models.embedContent(params);

export class GenAIEmbeddingProvider implements EmbeddingProvider {
  private readonly cache = new Map<string, CacheEntry>();
  private readonly inFlight = new Map<string, Promise<number[]>>();
  private readonly dimensions: number;
  private readonly timeoutMs: number;
  private readonly cacheMaxSize: number;

  constructor(
    private readonly embedContent: EmbedContentFn = defaultEmbedContent,
    options: GenAIEmbeddingOptions = {}
  ) {
    this.dimensions = options.dimensions ?? EMBEDDING_DIMENSIONS;
    this.timeoutMs = options.timeoutMs ?? EMBEDDING_TIMEOUT_MS;
    this.cacheMaxSize = options.cacheMaxSize ?? CACHE_MAX_SIZE;
  }

  async embedQuery(text: string, model: string): Promise<number[]> {
    const normalized = normalizeText(text);
    const cacheKey = `${model}:${hashText(normalized)}`;

    const cached = this.cache.get(cacheKey);
    if (cached && Date.now() - cached.timestamp < CACHE_MAX_AGE_MS) {
      // Re-insert to mark as most recently used
      this.cache.delete(cacheKey);
      this.cache.set(cacheKey, cached);
      return [...cached.embedding];
    }

    // Deduplicate concurrent requests for the same text
    const existing = this.inFlight.get(cacheKey);
    if (existing) return existing;

    const promise = this.generate(normalized, model);
    this.inFlight.set(cacheKey, promise);
    try {
      const embedding = await promise;
      this.remember(cacheKey, embedding);
      return embedding;
    } finally {
      this.inFlight.delete(cacheKey);
    }
  }

  private async generate(text: string, model: string): Promise<number[]> {
    const startTime = Date.now();
    try {
      const result = await withTimeout(
        this.embedContent({ model, contents: text, config: { outputDimensionality: this.dimensions } }),
        this.timeoutMs
      );
      const values = result.embeddings?.[0]?.values;
      if (!values || values.length === 0) throw new Error('No embedding values in response');
      logInfo('Query embedding generated', { model, dimensions: values.length, elapsedMs: Date.now() - startTime });
      return values;
    } catch (err) {
      const classified = classifyModelError(err, model);
      logWarn('Query embedding failed', { model, code: classified.code, message: classified.message });
      throw classified;
    }
  }

  private remember(cacheKey: string, embedding: number[]): void {
    if (this.cache.size >= this.cacheMaxSize) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) this.cache.delete(oldest.value);
    }
    this.cache.set(cacheKey, { embedding: [...embedding], timestamp: Date.now() });
  }
}
