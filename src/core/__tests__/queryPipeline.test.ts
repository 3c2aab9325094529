/**
 * Tests for end-to-end query handling over an in-memory index generation
 */

import { QueryPipeline } from '../queryPipeline';
import { QueryAnalyzer } from '../queryAnalyzer';
import { ModelSelector } from '../modelSelector';
import { IndexManager } from '../../local/indexManager';
import type { ModelDescriptor } from '../../shared/types';
import {
  PLANNER_JSON,
  RoleScript,
  ScriptedGenerator,
  ScriptedVectorSearch,
  buildSnapshot,
  coderJson,
  judgeJson,
  lines,
} from '../../__tests__/utils/fixtures';

jest.mock('../../utils/logger', () => ({
  logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

const REGISTRY: ModelDescriptor[] = [
  {
    name: 'test-model',
    capabilities: ['general_qa', 'code_analysis', 'code_generation'],
    maxContextLength: 8000,
    defaults: { maxNewTokens: 256, temperature: 0 },
  },
];

async function setup(scripts: Partial<Record<'answer' | 'planner' | 'coder' | 'judge', RoleScript>>) {
  const snapshot = buildSnapshot({ 'src/client.ts': lines('client', 4), 'src/retry.ts': lines('retry', 4) });
  const vectors = new ScriptedVectorSearch({ chunk_000001: 0.4, chunk_000002: 0.9 });
  const indexManager = new IndexManager('/repo', async () => ({ snapshot, vectors }));
  await indexManager.initialize();

  const generator = new ScriptedGenerator(scripts);
  const pipeline = new QueryPipeline({
    indexManager,
    analyzer: new QueryAnalyzer(),
    selector: new ModelSelector(REGISTRY),
    generator,
    generationTimeoutMs: 1000,
    plannerModel: 'planner-model',
  });
  return { pipeline, generator };
}

describe('QueryPipeline.run', () => {
  it('answers statistics questions from metadata without generation', async () => {
    const { pipeline, generator } = await setup({});

    const result = await pipeline.run('how many files are there', { topK: 4 });

    expect(result.retrieval.strategy).toBe('metadata');
    expect(result.result).toEqual({
      analysis: 'The repository contains 2 indexed files.',
      plan: ['Answered from repository metadata'],
      changes: [],
      confidence: 1,
    });
    expect(result.degraded).toBe(false);
    expect(result.generation).toBe(1);
    expect(generator.calls).toHaveLength(0);
  });

  it('returns a structured answer with the selected model defaults', async () => {
    const { pipeline, generator } = await setup({
      answer: () => '{"analysis": "The client retries twice.", "plan": ["read retry.ts"]}',
    });

    const result = await pipeline.run('explain the retry loop', { topK: 4 });

    expect(result.model).toBe('test-model');
    expect(result.retrieval.strategy).toBe('semantic');
    expect(result.result).toEqual({
      analysis: 'The client retries twice.',
      plan: ['read retry.ts'],
      changes: [],
      confidence: 0.8,
    });
    expect(generator.calls[0].params).toEqual({ model: 'test-model', maxNewTokens: 256, temperature: 0 });
  });

  it('lets request options override generation defaults', async () => {
    const { pipeline, generator } = await setup({ answer: () => 'It retries.' });

    const result = await pipeline.run('explain the retry loop', { topK: 4, maxNewTokens: 64, temperature: 0.5 });

    expect(result.result.confidence).toBe(0.5);
    expect(result.result.analysis).toBe('It retries.');
    expect(generator.calls[0].params).toEqual({ model: 'test-model', maxNewTokens: 64, temperature: 0.5 });
  });

  it('degrades to a context summary when generation fails', async () => {
    const { pipeline } = await setup({ answer: () => new Error('upstream 503') });

    const result = await pipeline.run('explain the retry loop', { topK: 4 });

    expect(result.degraded).toBe(true);
    expect(result.result.confidence).toBe(0.2);
    expect(result.result.analysis.split('\n')[0]).toBe(
      `Found ${result.retrieved} relevant code chunks for query: explain the retry loop`
    );
    expect(result.result.plan).toEqual(['Strategy used: semantic']);
  });

  it('rejects queries before the index is built', async () => {
    const indexManager = new IndexManager('/repo', async () => ({
      snapshot: buildSnapshot({}),
      vectors: new ScriptedVectorSearch({}),
    }));
    const pipeline = new QueryPipeline({
      indexManager,
      analyzer: new QueryAnalyzer(),
      selector: new ModelSelector(REGISTRY),
      generator: new ScriptedGenerator({}),
      generationTimeoutMs: 1000,
    });
    await expect(pipeline.run('explain it', { topK: 4 })).rejects.toThrow('Index not initialized');
  });
});

describe('QueryPipeline.runRefined', () => {
  const OPTIONS = { topK: 4, numSamples: 1, maxLoops: 1 };

  it('reports the judge score as confidence', async () => {
    const { pipeline, generator } = await setup({
      planner: () => PLANNER_JSON,
      coder: () => coderJson('adds retry', 'src/client.ts'),
      judge: () => judgeJson(90, ['covers the retry path']),
    });

    const result = await pipeline.runRefined('add retry to the client', OPTIONS);

    expect(result.result.confidence).toBe(0.9);
    expect(result.verdict?.score).toBe(90);
    expect(result.result.changes[0].path).toBe('src/client.ts');
    expect(result.loops).toHaveLength(1);
    expect(result.spec.goal).toBe('Add retry to the client');

    const params = Object.fromEntries(generator.calls.map(call => [call.role, call.params]));
    expect(params.planner).toEqual({ model: 'planner-model', maxNewTokens: 1000, temperature: 0.1 });
    expect(params.coder).toEqual({ model: 'test-model', maxNewTokens: 256, temperature: 0 });
    expect(params.judge).toEqual({ model: 'test-model', maxNewTokens: 500, temperature: 0 });
  });

  it('uses plain-text confidence when no candidate parsed', async () => {
    const { pipeline } = await setup({ planner: () => PLANNER_JSON, coder: () => 'just prose' });
    const result = await pipeline.runRefined('add retry to the client', OPTIONS);
    expect(result.degraded).toBe(true);
    expect(result.result.confidence).toBe(0.5);
    expect(result.result.analysis).toBe('just prose');
  });

  it('uses degraded confidence when every coder call failed', async () => {
    const { pipeline } = await setup({ planner: () => PLANNER_JSON, coder: () => new Error('down') });
    const result = await pipeline.runRefined('add retry to the client', OPTIONS);
    expect(result.degraded).toBe(true);
    expect(result.result.confidence).toBe(0.2);
  });
});
