/**
 * @fileOverview: In-memory cosine-similarity search over the chunk vectors of one snapshot
 * @module: VectorIndex
 * @keyFunctions:
 *   - cosineSimilarity(): Similarity of two equal-length vectors
 *   - InMemoryVectorIndex.nearest(): Top-k chunk ids by similarity, ties by id
 *   - InMemoryVectorIndex.build(): Embed (or load cached) vectors for a snapshot
 */

import type { NearestHit, RepositoryIndex, VectorSearch } from '../shared/retrieval/types';
import { compareChunkIds } from '../shared/retrieval/retriever';
import type { EmbeddingStorage } from './embeddingStorage';
import { EmbeddingProvider, embedChunks } from './embeddingGenerator';

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) return 0;
  return dotProduct / (Math.sqrt(normA) * Math.sqrt(normB));
}

export class InMemoryVectorIndex implements VectorSearch {
  private readonly entries: ReadonlyArray<{ chunkId: string; vector: readonly number[] }>;

  constructor(
    private readonly provider: EmbeddingProvider,
    vectors: ReadonlyMap<string, readonly number[]>
  ) {
    this.entries = Array.from(vectors, ([chunkId, vector]) => ({ chunkId, vector }));
  }

  static async build(
    index: RepositoryIndex,
    provider: EmbeddingProvider,
    storage?: EmbeddingStorage
  ): Promise<InMemoryVectorIndex> {
    const vectors = await embedChunks(index.allChunks(), provider, { storage });
    return new InMemoryVectorIndex(provider, vectors);
  }

  get size(): number {
    return this.entries.length;
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.provider.embedBatch([text]);
    if (!vector) {
      throw new Error('Embedding provider returned no vector for query');
    }
    return vector;
  }

  async nearest(vector: readonly number[], k: number): Promise<NearestHit[]> {
    if (k <= 0) return [];
    return this.entries
      .map(entry => ({ chunkId: entry.chunkId, similarity: cosineSimilarity(vector, entry.vector) }))
      .sort((a, b) => b.similarity - a.similarity || compareChunkIds(a.chunkId, b.chunkId))
      .slice(0, k);
  }
}

/**
 * Stands in when chunk embeddings could not be built; every call rejects so the
 * retriever falls back to file-specific or metadata retrieval
 */
export class UnavailableVectorSearch implements VectorSearch {
  constructor(readonly reason: string) {}

  async embed(): Promise<number[]> {
    throw new Error(`Vector search unavailable: ${this.reason}`);
  }

  async nearest(): Promise<NearestHit[]> {
    throw new Error(`Vector search unavailable: ${this.reason}`);
  }
}
