/**
 * @fileOverview: Retrieval strategy union, context shape and index collaborator contracts
 * @module: RetrievalTypes
 * @context: Strategies form a closed union chosen by selectStrategy(); adding one means extending both the union and the selector
 */

import type { CodeChunk, FileNode, FileReference, RepositoryStats } from '../types';

export type RetrievalStrategy = 'metadata' | 'multi_intent' | 'file_specific' | 'hybrid' | 'semantic';

export type ContentPlan =
  | { kind: 'file_specific'; references: FileReference[] }
  | { kind: 'hybrid'; referencedPaths: string[] }
  | { kind: 'semantic' };

export type StrategyPlan = { kind: 'metadata' } | { kind: 'multi_intent'; content: ContentPlan } | ContentPlan;

export type RequiredPart = 'metadata' | 'content';

export interface RetrievedChunk extends CodeChunk {
  /** Ranking score after any boost; for file-specific retrieval the reference confidence */
  score: number;
  /** True when the chunk's file was referenced in the query */
  referenced: boolean;
}

export interface RetrievalContext {
  strategy: RetrievalStrategy;
  /** Set for multi_intent: the strategy that produced the chunk part */
  contentStrategy?: Exclude<RetrievalStrategy, 'metadata' | 'multi_intent'>;
  /** Relevance order */
  chunks: RetrievedChunk[];
  totalChunks: number;
  filesInvolved: number;
  fileTree?: FileNode[];
  metadataSummary?: string;
  requiredParts: RequiredPart[];
  /** Strategy that failed before this context was produced */
  fallbackFrom?: RetrievalStrategy;
}

export interface RepositoryIndex {
  listFiles(): readonly FileNode[];
  chunksOf(path: string): readonly CodeChunk[];
  allChunks(): readonly CodeChunk[];
  getChunk(id: string): CodeChunk | undefined;
  stats(): RepositoryStats;
}

export interface NearestHit {
  chunkId: string;
  similarity: number;
}

export interface VectorSearch {
  embed(text: string): Promise<number[]>;
  /** Ordered by similarity descending */
  nearest(vector: readonly number[], k: number): Promise<NearestHit[]>;
}
