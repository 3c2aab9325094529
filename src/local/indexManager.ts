/**
 * @fileOverview: Owns the current index generation and serializes rebuilds against queries
 * @module: IndexManager
 * @keyFunctions:
 *   - initialize(): First build; failure is fatal
 *   - rebuild(): Exclusive rebuild; failure keeps the previous generation
 *   - withReadLock(): Run a query against one consistent generation
 *   - createIndexBuilder(): Indexer + embeddings + vector index as one build step
 * @dependencies:
 *   - AsyncRwLock: Readers share a generation, a rebuild is exclusive
 * @context: A generation is immutable once published; queries hold the read lock for their whole duration
 */

import { FileCatalog } from '../core/fileDetector';
import type { VectorSearch } from '../shared/retrieval/types';
import { AsyncRwLock } from '../utils/async';
import { ErrorCode, RepoQueryError } from '../utils/errorHandler';
import { logger } from '../utils/logger';
import type { EmbeddingProvider } from './embeddingGenerator';
import type { EmbeddingStorage } from './embeddingStorage';
import type { RepositoryIndexer, RepositorySnapshot } from './repositoryIndexer';
import { InMemoryVectorIndex, UnavailableVectorSearch } from './vectorIndex';

export interface BuiltIndex {
  snapshot: RepositorySnapshot;
  vectors: VectorSearch;
}

export interface IndexGeneration extends BuiltIndex {
  generation: number;
  catalog: FileCatalog;
  builtAt: Date;
}

export type IndexBuilder = (root: string) => Promise<BuiltIndex>;

export interface IndexBuilderDeps {
  indexer: RepositoryIndexer;
  /** Absent when no embedding endpoint is configured */
  embeddings?: EmbeddingProvider;
  storage?: EmbeddingStorage;
}

/**
 * Embedding failures do not fail the build: the generation is published with
 * vector search unavailable and retrieval falls back where it can
 */
export function createIndexBuilder(deps: IndexBuilderDeps): IndexBuilder {
  return async (root: string): Promise<BuiltIndex> => {
    const snapshot = await deps.indexer.build(root);
    if (!deps.embeddings) {
      logger.warn('⚠️ No embedding provider configured, semantic search disabled');
      return { snapshot, vectors: new UnavailableVectorSearch('no embedding provider configured') };
    }

    try {
      const vectors = await InMemoryVectorIndex.build(snapshot, deps.embeddings, deps.storage);
      logger.info('🧮 Vector index ready', { vectors: vectors.size, model: deps.embeddings.model });
      return { snapshot, vectors };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('❌ Embedding generation failed, semantic search disabled', { error: message });
      return { snapshot, vectors: new UnavailableVectorSearch(message) };
    }
  };
}

export class IndexManager {
  private readonly lock = new AsyncRwLock();
  private current: IndexGeneration | null = null;
  private generationCounter = 0;

  constructor(
    readonly root: string,
    private readonly builder: IndexBuilder
  ) {}

  get generation(): number {
    return this.current?.generation ?? 0;
  }

  get ready(): boolean {
    return this.current !== null;
  }

  snapshot(): IndexGeneration | null {
    return this.current;
  }

  async initialize(): Promise<IndexGeneration> {
    return this.lock.withWrite(async () => {
      try {
        return this.publish(await this.builder(this.root));
      } catch (error) {
        throw new RepoQueryError(ErrorCode.INDEX_ERROR, `Initial index build failed for ${this.root}`, {
          originalError: error instanceof Error ? error.message : String(error),
        });
      }
    });
  }

  async rebuild(): Promise<IndexGeneration> {
    return this.lock.withWrite(async () => {
      const previous = this.current;
      try {
        return this.publish(await this.builder(this.root));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error('❌ Rebuild failed, keeping previous generation', {
          generation: previous?.generation ?? 0,
          error: message,
        });
        throw new RepoQueryError(ErrorCode.INDEX_ERROR, `Index rebuild failed: ${message}`, {
          keptGeneration: previous?.generation ?? 0,
        });
      }
    });
  }

  async withReadLock<T>(fn: (index: IndexGeneration) => Promise<T>): Promise<T> {
    return this.lock.withRead(async () => {
      const index = this.current;
      if (!index) {
        throw new RepoQueryError(ErrorCode.INDEX_ERROR, 'Index not initialized');
      }
      return fn(index);
    });
  }

  private publish(built: BuiltIndex): IndexGeneration {
    const next: IndexGeneration = {
      ...built,
      generation: ++this.generationCounter,
      catalog: new FileCatalog(built.snapshot.listFiles().map(file => file.path)),
      builtAt: built.snapshot.builtAt,
    };
    this.current = next;
    logger.info('✅ Index generation published', {
      generation: next.generation,
      files: built.snapshot.listFiles().length,
    });
    return next;
  }
}
