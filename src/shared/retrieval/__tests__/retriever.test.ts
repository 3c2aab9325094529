/**
 * Tests for strategy selection, hybrid boosting, file-specific ordering and fallback
 */

import { ContextRetriever, boostScore, compareChunkIds, rankChunks, selectStrategy } from '../retriever';
import type { RetrievedChunk } from '../types';
import { QueryAnalyzer } from '../../../core/queryAnalyzer';
import { FileCatalog } from '../../../core/fileDetector';
import { RepositorySnapshot } from '../../../local/repositoryIndexer';
import { ErrorCode, ValidationError } from '../../../utils/errorHandler';
import { telemetry } from '../../telemetry';
import { ScriptedVectorSearch, buildSnapshot, lines } from '../../../__tests__/utils/fixtures';

jest.mock('../../../utils/logger', () => ({
  logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

function analyzerFor(snapshot: RepositorySnapshot): QueryAnalyzer {
  return new QueryAnalyzer({ catalog: new FileCatalog(snapshot.listFiles().map(file => file.path)) });
}

describe('ContextRetriever', () => {
  // One chunk per file: deploy.rb -> chunk_000001, src/app.ts -> chunk_000002, src/util.ts -> chunk_000003
  const snapshot = buildSnapshot({
    'deploy.rb': lines('d', 3),
    'src/app.ts': lines('s', 3),
    'src/util.ts': lines('u', 3),
  });
  const analyzer = analyzerFor(snapshot);
  const similarities = { chunk_000001: 0.2, chunk_000002: 0.5, chunk_000003: 0.4 };

  beforeEach(() => {
    telemetry.reset();
  });

  it('answers statistics queries from metadata without touching vector search', async () => {
    const vectors = new ScriptedVectorSearch(similarities);
    const retriever = new ContextRetriever(snapshot, vectors);

    const context = await retriever.retrieve(analyzer.analyze('How many files are in the project?'), 5);

    expect(context.strategy).toBe('metadata');
    expect(context.chunks).toEqual([]);
    expect(context.requiredParts).toEqual(['metadata']);
    expect(context.fileTree?.map(file => file.path)).toEqual(['deploy.rb', 'src/app.ts', 'src/util.ts']);
    expect(context.metadataSummary?.split('\n')[1]).toBe('- Total Files: 3');
    expect(vectors.embedCalls).toBe(0);
    expect(vectors.nearestCalls).toEqual([]);
  });

  it('restricts file-specific retrieval to the referenced file', async () => {
    const vectors = new ScriptedVectorSearch(similarities);
    const retriever = new ContextRetriever(snapshot, vectors);

    const context = await retriever.retrieve(analyzer.analyze('How does deploy.rb work?'), 5);

    expect(context.strategy).toBe('file_specific');
    expect(context.chunks.length).toBeGreaterThan(0);
    expect(context.chunks.every(chunk => chunk.filePath.endsWith('deploy.rb'))).toBe(true);
    expect(context.chunks[0]).toMatchObject({ score: 0.9, referenced: true });
    expect(vectors.embedCalls).toBe(0);
  });

  it('boosts referenced files by exactly three times their similarity under hybrid retrieval', async () => {
    const vectors = new ScriptedVectorSearch(similarities);
    const retriever = new ContextRetriever(snapshot, vectors);

    const context = await retriever.retrieve(
      analyzer.analyze('Explain deploy.rb across the whole codebase'),
      2
    );

    expect(context.strategy).toBe('hybrid');
    expect(context.chunks.map(chunk => [chunk.id, chunk.score, chunk.referenced])).toEqual([
      ['chunk_000001', 0.2 * 3, true],
      ['chunk_000002', 0.5, false],
    ]);
    // Hybrid ranks the whole index before truncating
    expect(vectors.nearestCalls).toEqual([3]);
  });

  it('returns raw similarities for semantic retrieval', async () => {
    const vectors = new ScriptedVectorSearch(similarities);
    const retriever = new ContextRetriever(snapshot, vectors);

    const context = await retriever.retrieve(analyzer.analyze('Where is the retry logic?'), 2);

    expect(context.strategy).toBe('semantic');
    expect(context.chunks.map(chunk => [chunk.id, chunk.score])).toEqual([
      ['chunk_000002', 0.5],
      ['chunk_000003', 0.4],
    ]);
    expect(context.filesInvolved).toBe(2);
    expect(context.requiredParts).toEqual(['content']);
    expect(vectors.nearestCalls).toEqual([2]);
  });

  it('combines a metadata summary with the content part for multi-intent queries', async () => {
    const retriever = new ContextRetriever(snapshot, new ScriptedVectorSearch(similarities));

    const context = await retriever.retrieve(
      analyzer.analyze('Count API endpoints and show me the authentication one'),
      3
    );

    expect(context.strategy).toBe('multi_intent');
    expect(context.contentStrategy).toBe('semantic');
    expect(context.requiredParts).toEqual(['metadata', 'content']);
    expect(context.metadataSummary?.startsWith('Repository Metadata:')).toBe(true);
    expect(context.totalChunks).toBe(3);
  });

  it('falls back to file-specific retrieval when vector search fails with resolved references', async () => {
    const vectors = new ScriptedVectorSearch(similarities, new Error('embedding endpoint down'));
    const retriever = new ContextRetriever(snapshot, vectors);

    const context = await retriever.retrieve(
      analyzer.analyze('Explain deploy.rb across the whole codebase'),
      5
    );

    expect(context.strategy).toBe('file_specific');
    expect(context.fallbackFrom).toBe('hybrid');
    expect(context.chunks.map(chunk => chunk.filePath)).toEqual(['deploy.rb']);
    expect(telemetry.getStats().retrievalFallbacks).toBe(1);
  });

  it('falls back to metadata when a multi-intent content part fails', async () => {
    const vectors = new ScriptedVectorSearch(similarities, new Error('embedding endpoint down'));
    const retriever = new ContextRetriever(snapshot, vectors);

    const context = await retriever.retrieve(
      analyzer.analyze('Count API endpoints and show me the authentication one'),
      3
    );

    expect(context.strategy).toBe('metadata');
    expect(context.fallbackFrom).toBe('multi_intent');
  });

  it('fails with RETRIEVAL_FAILED when no fallback applies', async () => {
    const vectors = new ScriptedVectorSearch(similarities, new Error('embedding endpoint down'));
    const retriever = new ContextRetriever(snapshot, vectors);

    await expect(retriever.retrieve(analyzer.analyze('Where is the retry logic?'), 2)).rejects.toMatchObject({
      code: ErrorCode.RETRIEVAL_FAILED,
      message: 'Retrieval failed: embedding endpoint down',
    });
  });

  it('rejects a non-positive top_k', async () => {
    const retriever = new ContextRetriever(snapshot, new ScriptedVectorSearch(similarities));
    await expect(retriever.retrieve(analyzer.analyze('Where is the retry logic?'), 0)).rejects.toBeInstanceOf(
      ValidationError
    );
  });

  it('skips ids that vector search knows but the index does not', async () => {
    const retriever = new ContextRetriever(
      snapshot,
      new ScriptedVectorSearch({ ...similarities, chunk_000099: 0.9 })
    );
    const context = await retriever.retrieve(analyzer.analyze('Where is the retry logic?'), 2);
    expect(context.chunks.map(chunk => chunk.id)).toEqual(['chunk_000002']);
  });

  describe('file-specific ordering', () => {
    const small = { maxChunkChars: 8, overlapChars: 0 };

    it('orders a file by distance to the requested line', async () => {
      const big = buildSnapshot({ 'big.rb': lines('b', 6) }, small);
      const retriever = new ContextRetriever(big, new ScriptedVectorSearch({}));

      const context = await retriever.retrieve(analyzerFor(big).analyze('Explain big.rb line 5'), 3);

      expect(context.strategy).toBe('file_specific');
      expect(context.chunks.map(chunk => chunk.startLine)).toEqual([5, 3, 1]);
    });

    it('interleaves several referenced files round-robin up to top_k', async () => {
      // a.rb -> chunk_000001 (1-2), chunk_000002 (3-4); b.rb -> chunk_000003
      const pair = buildSnapshot({ 'a.rb': lines('a', 4), 'b.rb': lines('b', 2) }, small);
      const retriever = new ContextRetriever(pair, new ScriptedVectorSearch({}));
      const analysis = analyzerFor(pair).analyze('Compare a.rb and b.rb');

      const all = await retriever.retrieve(analysis, 10);
      expect(all.chunks.map(chunk => chunk.id)).toEqual(['chunk_000001', 'chunk_000003', 'chunk_000002']);

      const limited = await retriever.retrieve(analysis, 2);
      expect(limited.chunks.map(chunk => chunk.id)).toEqual(['chunk_000001', 'chunk_000003']);
    });
  });
});

describe('selectStrategy', () => {
  const analyzer = new QueryAnalyzer({ catalog: new FileCatalog(['src/utils.ts', 'lib/utils.ts']) });

  it('uses hybrid for resolved references below the file-specific confidence', () => {
    expect(selectStrategy(analyzer.analyze('Explain utils.ts'))).toEqual({
      kind: 'hybrid',
      referencedPaths: ['lib/utils.ts', 'src/utils.ts'],
    });
  });

  it('does not answer a mixed statistics and code question from metadata alone', () => {
    expect(
      selectStrategy(analyzer.analyze('How many files are there and where is the login handler defined?'))
    ).toEqual({ kind: 'multi_intent', content: { kind: 'semantic' } });
  });

  it('never picks metadata when the query references a resolved file', () => {
    expect(selectStrategy(analyzer.analyze('How many lines are in src/utils.ts?')).kind).toBe('file_specific');
  });
});

describe('ranking helpers', () => {
  const chunk = (id: string, score: number, referenced: boolean): RetrievedChunk => ({
    id,
    filePath: `${id}.ts`,
    startLine: 1,
    endLine: 1,
    content: '',
    language: 'typescript',
    contentHash: id,
    score,
    referenced,
  });

  it('breaks score ties by referenced file, then by lower id', () => {
    const ranked = rankChunks([chunk('c3', 0.5, false), chunk('c2', 0.5, true), chunk('c1', 0.5, false)]);
    expect(ranked.map(c => c.id)).toEqual(['c2', 'c1', 'c3']);
  });

  it('compares chunk ids by sequence once they outgrow the padding', () => {
    expect(compareChunkIds('chunk_999999', 'chunk_1000000')).toBeLessThan(0);
    expect(compareChunkIds('chunk_000002', 'chunk_000010')).toBeLessThan(0);
    expect(compareChunkIds('chunk_000007', 'chunk_000007')).toBe(0);
    const ranked = rankChunks([chunk('chunk_1000000', 0.5, false), chunk('chunk_999999', 0.5, false)]);
    expect(ranked.map(c => c.id)).toEqual(['chunk_999999', 'chunk_1000000']);
  });

  it('boosts only referenced chunks', () => {
    expect(boostScore(0.25, true)).toBe(0.75);
    expect(boostScore(0.25, false)).toBe(0.25);
  });
});
