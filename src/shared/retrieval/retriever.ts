/**
 * @fileOverview: Multi-strategy context retrieval with deterministic boosting and fallback
 * @module: ContextRetriever
 * @keyFunctions:
 *   - selectStrategy(): First-applicable-wins choice over the closed strategy union
 *   - ContextRetriever.retrieve(): Execute the chosen plan against the index and vector search
 *   - rankChunks(): Score-descending order, referenced files first on ties, then lower chunk id
 * @dependencies:
 *   - RepositoryIndex: File tree and chunk lookup
 *   - VectorSearch: Query embedding and nearest-neighbour search
 *   - telemetry: Per-retrieval record
 * @context: Deterministic for identical index state and inputs; vector search failures fall back to file-specific or metadata retrieval when the analysis permits
 */

import { HIGH_CONFIDENCE_REFERENCE, HYBRID_FILE_BOOST } from '../constants';
import type { CodeChunk, FileNode, FileReference, QueryAnalysis } from '../types';
import { logger } from '../../utils/logger';
import { ErrorCode, RepoQueryError, ValidationError } from '../../utils/errorHandler';
import { TelemetryCollector, telemetry as defaultTelemetry } from '../telemetry';
import { summarizeRepository } from './metadataSummary';
import type {
  ContentPlan,
  RepositoryIndex,
  RetrievalContext,
  RetrievalStrategy,
  RetrievedChunk,
  StrategyPlan,
  VectorSearch,
} from './types';

interface Timings {
  embedMs: number;
  searchMs: number;
  rankMs: number;
}

export interface RetrieveOptions {
  queryId?: string;
}

const resolvedReferences = (analysis: QueryAnalysis): FileReference[] =>
  analysis.fileReferences.filter(ref => ref.path !== undefined);

export function selectContentPlan(analysis: QueryAnalysis): ContentPlan {
  const resolved = resolvedReferences(analysis);
  const highConfidence = resolved.filter(ref => ref.confidence >= HIGH_CONFIDENCE_REFERENCE);

  if (highConfidence.length > 0 && !analysis.exploratory) {
    return { kind: 'file_specific', references: highConfidence };
  }
  if (resolved.length > 0) {
    return { kind: 'hybrid', referencedPaths: uniquePaths(resolved) };
  }
  return { kind: 'semantic' };
}

/**
 * Strategy selection, first applicable rule wins:
 * metadata -> multi_intent -> file_specific -> hybrid -> semantic
 */
export function selectStrategy(analysis: QueryAnalysis): StrategyPlan {
  const hasSubIntents = analysis.subIntents.length > 0;

  if (
    analysis.statistics !== null &&
    analysis.complexity === 'simple' &&
    !hasSubIntents &&
    resolvedReferences(analysis).length === 0
  ) {
    return { kind: 'metadata' };
  }

  const content = selectContentPlan(analysis);
  const hasMetadataPart = analysis.subIntents.some(s => s.kind === 'metadata');
  const hasContentPart = analysis.subIntents.some(s => s.kind === 'content');
  if (hasMetadataPart && hasContentPart) {
    return { kind: 'multi_intent', content };
  }
  return content;
}

function uniquePaths(references: readonly FileReference[]): string[] {
  const seen: string[] = [];
  for (const ref of references) {
    if (ref.path !== undefined && !seen.includes(ref.path)) {
      seen.push(ref.path);
    }
  }
  return seen;
}

const ID_SEQUENCE = /^(.*?)(\d+)$/;

/**
 * Orders chunk ids by their numeric sequence when the prefixes agree, so chunk_1000000 follows chunk_999999
 */
export function compareChunkIds(a: string, b: string): number {
  const left = ID_SEQUENCE.exec(a);
  const right = ID_SEQUENCE.exec(b);
  if (left && right && left[1] === right[1]) {
    const diff = Number(left[2]) - Number(right[2]);
    if (diff !== 0) return diff;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

export function compareRetrieved(a: RetrievedChunk, b: RetrievedChunk): number {
  if (b.score !== a.score) return b.score - a.score;
  if (a.referenced !== b.referenced) return a.referenced ? -1 : 1;
  return compareChunkIds(a.id, b.id);
}

/**
 * Stable sort by score; ties prefer referenced files, then the lower chunk id
 */
export function rankChunks(chunks: readonly RetrievedChunk[]): RetrievedChunk[] {
  return [...chunks].sort(compareRetrieved);
}

export function boostScore(similarity: number, referenced: boolean): number {
  return referenced ? similarity * HYBRID_FILE_BOOST : similarity;
}

function lineDistance(chunk: CodeChunk, line: number): number {
  if (line >= chunk.startLine && line <= chunk.endLine) return 0;
  return line < chunk.startLine ? chunk.startLine - line : line - chunk.endLine;
}

export class ContextRetriever {
  private readonly telemetry: TelemetryCollector;

  constructor(
    private readonly index: RepositoryIndex,
    private readonly vectors: VectorSearch,
    telemetry: TelemetryCollector = defaultTelemetry
  ) {
    this.telemetry = telemetry;
  }

  async retrieve(
    analysis: QueryAnalysis,
    topK: number,
    options: RetrieveOptions = {}
  ): Promise<RetrievalContext> {
    if (!Number.isInteger(topK) || topK < 1) {
      throw new ValidationError('top_k', 'must be a positive integer', { topK });
    }

    const started = Date.now();
    const timings: Timings = { embedMs: 0, searchMs: 0, rankMs: 0 };
    const plan = selectStrategy(analysis);
    const queryId = options.queryId ?? this.telemetry.generateQueryId();

    let context: RetrievalContext;
    try {
      context = await this.execute(plan, analysis, topK, timings);
    } catch (error) {
      context = await this.fallback(plan, analysis, topK, timings, error);
    }

    this.telemetry.logRetrieval({
      queryId,
      query: analysis.originalQuery,
      strategy: context.strategy,
      contentStrategy: context.contentStrategy,
      chunkCount: context.totalChunks,
      filesInvolved: context.filesInvolved,
      processingTimeMs: Date.now() - started,
      timings,
      fallbackFrom: context.fallbackFrom,
    });

    return context;
  }

  private async execute(
    plan: StrategyPlan,
    analysis: QueryAnalysis,
    topK: number,
    timings: Timings
  ): Promise<RetrievalContext> {
    switch (plan.kind) {
      case 'metadata':
        return this.metadataContext();
      case 'multi_intent': {
        const content = await this.execute(plan.content, analysis, topK, timings);
        return this.mergeMultiIntent(content);
      }
      case 'file_specific':
        return this.fileSpecific(plan.references, topK);
      case 'hybrid':
        return this.vectorRetrieval('hybrid', analysis, topK, new Set(plan.referencedPaths), timings);
      case 'semantic':
        return this.vectorRetrieval('semantic', analysis, topK, new Set(), timings);
    }
  }

  private async fallback(
    plan: StrategyPlan,
    analysis: QueryAnalysis,
    topK: number,
    timings: Timings,
    error: unknown
  ): Promise<RetrievalContext> {
    const message = error instanceof Error ? error.message : String(error);
    const resolved = resolvedReferences(analysis);
    const failed: RetrievalStrategy = plan.kind;

    let context: RetrievalContext | null = null;
    if (resolved.length > 0) {
      const fileContext = await this.fileSpecific(resolved, topK);
      context = plan.kind === 'multi_intent' ? this.mergeMultiIntent(fileContext) : fileContext;
    } else if (analysis.statistics !== null || plan.kind === 'multi_intent') {
      context = this.metadataContext();
    }

    if (!context) {
      logger.error('❌ Retrieval failed with no fallback', { strategy: failed, error: message });
      throw new RepoQueryError(ErrorCode.RETRIEVAL_FAILED, `Retrieval failed: ${message}`, {
        strategy: failed,
      });
    }

    logger.warn('⚠️ Vector retrieval failed, using fallback strategy', {
      failed,
      fallback: context.strategy,
      error: message,
      timings,
    });
    return { ...context, fallbackFrom: failed };
  }

  private metadataContext(): RetrievalContext {
    return {
      strategy: 'metadata',
      chunks: [],
      totalChunks: 0,
      filesInvolved: 0,
      fileTree: [...this.index.listFiles()],
      metadataSummary: summarizeRepository(this.index),
      requiredParts: ['metadata'],
    };
  }

  private mergeMultiIntent(content: RetrievalContext): RetrievalContext {
    const contentStrategy = content.strategy;
    return {
      ...content,
      strategy: 'multi_intent',
      contentStrategy:
        contentStrategy === 'metadata' || contentStrategy === 'multi_intent' ? undefined : contentStrategy,
      metadataSummary: summarizeRepository(this.index),
      requiredParts: ['metadata', 'content'],
    };
  }

  /**
   * Chunks only from the referenced files. Each file is ordered by distance to the
   * requested line (else file order); files are interleaved round-robin in reference order.
   */
  private fileSpecific(references: readonly FileReference[], topK: number): RetrievalContext {
    const perFile: RetrievedChunk[][] = [];
    const seen = new Set<string>();

    for (const ref of references) {
      if (ref.path === undefined || seen.has(ref.path)) continue;
      seen.add(ref.path);

      const line = ref.lineNumber;
      const ordered = [...this.index.chunksOf(ref.path)];
      if (line !== undefined) {
        ordered.sort((a, b) => lineDistance(a, line) - lineDistance(b, line) || a.startLine - b.startLine);
      } else {
        ordered.sort((a, b) => a.startLine - b.startLine);
      }
      perFile.push(ordered.map(chunk => ({ ...chunk, score: ref.confidence, referenced: true })));
    }

    const chunks: RetrievedChunk[] = [];
    const longest = perFile.reduce((max, list) => Math.max(max, list.length), 0);
    for (let rank = 0; rank < longest && chunks.length < topK; rank++) {
      for (const list of perFile) {
        if (rank < list.length && chunks.length < topK) {
          chunks.push(list[rank]);
        }
      }
    }

    return this.contentContext('file_specific', chunks);
  }

  private async vectorRetrieval(
    strategy: 'hybrid' | 'semantic',
    analysis: QueryAnalysis,
    topK: number,
    referencedPaths: ReadonlySet<string>,
    timings: Timings
  ): Promise<RetrievalContext> {
    const embedStart = Date.now();
    const queryVector = await this.vectors.embed(analysis.originalQuery);
    timings.embedMs += Date.now() - embedStart;

    // Hybrid ranks the whole index so boosted chunks outside the raw top-k can surface
    const searchStart = Date.now();
    const k = strategy === 'hybrid' ? Math.max(topK, this.index.allChunks().length) : topK;
    const hits = await this.vectors.nearest(queryVector, k);
    timings.searchMs += Date.now() - searchStart;

    const rankStart = Date.now();
    const candidates: RetrievedChunk[] = [];
    let stale = 0;
    for (const hit of hits) {
      const chunk = this.index.getChunk(hit.chunkId);
      if (!chunk) {
        stale++;
        continue;
      }
      const referenced = referencedPaths.has(chunk.filePath);
      candidates.push({
        ...chunk,
        score: strategy === 'hybrid' ? boostScore(hit.similarity, referenced) : hit.similarity,
        referenced,
      });
    }
    const chunks = rankChunks(candidates).slice(0, topK);
    timings.rankMs += Date.now() - rankStart;

    if (stale > 0) {
      logger.warn('⚠️ Vector search returned ids missing from the index', { stale });
    }

    return this.contentContext(strategy, chunks);
  }

  private contentContext(strategy: RetrievalStrategy, chunks: RetrievedChunk[]): RetrievalContext {
    const paths = new Set(chunks.map(chunk => chunk.filePath));
    const fileTree: FileNode[] = this.index.listFiles().filter(file => paths.has(file.path));
    return {
      strategy,
      chunks,
      totalChunks: chunks.length,
      filesInvolved: paths.size,
      fileTree,
      requiredParts: ['content'],
    };
  }
}
