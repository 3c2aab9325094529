/**
 * In-process stand-ins for the index, vector search and generation collaborators
 */

import { ChunkingOptions, DEFAULT_CHUNKING } from '../../local/chunker';
import { RepositorySnapshot } from '../../local/repositoryIndexer';
import type { NearestHit, VectorSearch } from '../../shared/retrieval/types';
import type {
  GenerationInterface,
  GenerationRequest,
  GenerationRole,
  QueryAnalysis,
} from '../../shared/types';

export function buildSnapshot(
  files: Record<string, string>,
  chunking: ChunkingOptions = DEFAULT_CHUNKING
): RepositorySnapshot {
  return RepositorySnapshot.fromFiles(
    '/repo',
    Object.entries(files).map(([path, content]) => ({ path, content })),
    chunking
  );
}

/**
 * A plain GENERAL analysis with the given fields replaced
 */
export function analysisOf(overrides: Partial<QueryAnalysis> = {}): QueryAnalysis {
  return {
    originalQuery: 'query',
    normalizedQuery: 'query',
    intent: 'GENERAL',
    complexity: 'simple',
    complexityScore: 0.1,
    fileReferences: [],
    entities: [],
    confidence: 0,
    subIntents: [],
    statistics: null,
    exploratory: false,
    ...overrides,
  };
}

/** Numbered lines, e.g. lines('x', 3) -> "x 1\nx 2\nx 3\n" */
export function lines(prefix: string, count: number): string {
  return Array.from({ length: count }, (_, i) => `${prefix} ${i + 1}`).join('\n') + '\n';
}

/**
 * Vector search with fixed per-chunk similarities; unknown ids score 0
 */
export class ScriptedVectorSearch implements VectorSearch {
  embedCalls = 0;
  nearestCalls: number[] = [];

  constructor(
    private readonly similarities: Record<string, number>,
    private readonly failure?: Error
  ) {}

  async embed(): Promise<number[]> {
    this.embedCalls++;
    if (this.failure) throw this.failure;
    return [1, 0];
  }

  async nearest(_vector: readonly number[], k: number): Promise<NearestHit[]> {
    this.nearestCalls.push(k);
    if (this.failure) throw this.failure;
    return Object.entries(this.similarities)
      .map(([chunkId, similarity]) => ({ chunkId, similarity }))
      .sort((a, b) => b.similarity - a.similarity || (a.chunkId < b.chunkId ? -1 : 1))
      .slice(0, k);
  }
}

export type ScriptStep = string | Error;
export type RoleScript = (request: GenerationRequest, callIndex: number) => ScriptStep;

/**
 * Generator answering from per-role scripts; callIndex counts calls per role from 0
 */
export class ScriptedGenerator implements GenerationInterface {
  readonly calls: GenerationRequest[] = [];

  constructor(private readonly scripts: Partial<Record<GenerationRole, RoleScript>>) {}

  async generate(request: GenerationRequest): Promise<string> {
    const callIndex = this.count(request.role);
    this.calls.push(request);
    const script = this.scripts[request.role];
    if (!script) {
      throw new Error(`No script for role ${request.role}`);
    }
    const step = script(request, callIndex);
    if (step instanceof Error) throw step;
    return step;
  }

  count(role: GenerationRole): number {
    return this.calls.filter(call => call.role === role).length;
  }
}

export function coderJson(analysis: string, path: string = 'src/app.ts'): string {
  return JSON.stringify({
    analysis,
    plan: ['edit the file'],
    changes: [
      {
        path,
        rationale: analysis,
        diff: `--- a/${path}\n+++ b/${path}\n@@ -1 +1 @@\n-old\n+new\n`,
      },
    ],
  });
}

export function judgeJson(score: number, reasons: string[] = [], risks: string[] = []): string {
  return JSON.stringify({ score, verdict: score >= 85 ? 'pass' : 'fail', reasons, risks });
}

export const PLANNER_JSON = JSON.stringify({
  goal: 'Add retry to the client',
  target_signals: ['retry', 'fetchWithRetry'],
  constraints: ['keep the public API'],
  acceptance: ['tests pass'],
  hint_paths: ['src/**/*.ts'],
});
