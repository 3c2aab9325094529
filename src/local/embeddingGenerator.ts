/**
 * @fileOverview: Embedding generation for chunks and queries with rate-limit retry and cache reuse
 * @module: EmbeddingGenerator
 * @keyFunctions:
 *   - OpenAIEmbeddingProvider: Batched OpenAI embeddings with exponential backoff on 429/5xx
 *   - embedChunks(): Vectors for every chunk of a snapshot, reusing cached vectors by content hash
 * @dependencies:
 *   - openaiService: Embeddings endpoint
 *   - embeddingStorage: SQLite vector cache
 */

import { logger } from '../utils/logger';
import type { CodeChunk } from '../shared/types';
import type { OpenAIService } from '../core/openaiService';
import type { EmbeddingStorage } from './embeddingStorage';

export interface EmbeddingProvider {
  readonly model: string;
  embedBatch(texts: string[]): Promise<number[][]>;
}

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

const DEFAULT_RETRY: RetryOptions = { maxRetries: 5, baseDelayMs: 1000, maxDelayMs: 30000 };

function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    const status = error.status;
    return typeof status === 'number' ? status : undefined;
  }
  return undefined;
}

const delay = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly model: string;
  private readonly retry: RetryOptions;

  constructor(
    private readonly service: Pick<OpenAIService, 'createEmbeddings' | 'getEmbeddingsModel'>,
    retry: Partial<RetryOptions> = {}
  ) {
    this.model = service.getEmbeddingsModel();
    this.retry = { ...DEFAULT_RETRY, ...retry };
  }

  async embedBatch(texts: string[], attempt: number = 0): Promise<number[][]> {
    try {
      return await this.service.createEmbeddings(texts);
    } catch (error) {
      const status = statusOf(error);
      const message = error instanceof Error ? error.message : String(error);
      const isRateLimit = status === 429 || message.toLowerCase().includes('rate limit');
      const isServerError = status !== undefined && status >= 500;

      if ((isRateLimit || isServerError) && attempt < this.retry.maxRetries) {
        let retryAfter = this.retry.baseDelayMs * Math.pow(2, attempt);
        const hinted = /Please try again in (\d+)ms/.exec(message);
        if (hinted) {
          retryAfter = Number(hinted[1]) + 100;
        }
        retryAfter = Math.min(retryAfter, this.retry.maxDelayMs);

        logger.warn(`⏳ Embedding request throttled, retrying in ${retryAfter}ms`, {
          error: isRateLimit ? 'rate_limit' : 'server_error',
          attempt: attempt + 1,
          maxRetries: this.retry.maxRetries,
          textsCount: texts.length,
        });
        await delay(retryAfter);
        return this.embedBatch(texts, attempt + 1);
      }
      throw error;
    }
  }
}

export interface EmbedChunksOptions {
  batchSize?: number;
  storage?: EmbeddingStorage;
}

/**
 * Map of chunk id -> vector for every chunk, embedding only content hashes missing from the cache
 */
export async function embedChunks(
  chunks: readonly CodeChunk[],
  provider: EmbeddingProvider,
  options: EmbedChunksOptions = {}
): Promise<Map<string, number[]>> {
  const batchSize = options.batchSize ?? 64;
  const byHash = new Map<string, number[]>(
    options.storage ? options.storage.getMany(provider.model, chunks.map(c => c.contentHash)) : []
  );
  const cached = byHash.size;

  const pending = new Map<string, string>();
  for (const chunk of chunks) {
    if (!byHash.has(chunk.contentHash) && !pending.has(chunk.contentHash)) {
      pending.set(chunk.contentHash, chunk.content);
    }
  }

  const hashes = Array.from(pending.keys());
  for (let offset = 0; offset < hashes.length; offset += batchSize) {
    const batchHashes = hashes.slice(offset, offset + batchSize);
    const vectors = await provider.embedBatch(batchHashes.map(hash => pending.get(hash) ?? ''));
    if (vectors.length !== batchHashes.length) {
      throw new Error(`Embedding provider returned ${vectors.length} vectors for ${batchHashes.length} inputs`);
    }
    const fresh = batchHashes.map((contentHash, i) => ({ contentHash, vector: vectors[i] }));
    for (const entry of fresh) {
      byHash.set(entry.contentHash, entry.vector);
    }
    options.storage?.putMany(provider.model, fresh);
  }

  logger.info('🔢 Chunk embeddings ready', {
    chunks: chunks.length,
    cached,
    generated: hashes.length,
    model: provider.model,
  });

  const byChunk = new Map<string, number[]>();
  for (const chunk of chunks) {
    const vector = byHash.get(chunk.contentHash);
    if (vector) {
      byChunk.set(chunk.id, vector);
    }
  }
  return byChunk;
}
