/**
 * @fileOverview: Plan, iterate and select over the planner, coder and judge roles
 * @module: RefinementOrchestrator
 * @keyFunctions:
 *   - refine(): PLAN once, then up to maxLoops rounds of refined retrieval, sampling and judging
 *   - selectRoundBest(): Highest score in a round, ties to the lowest sample
 *   - buildRefinedQuery(): Original text plus accumulated signals
 *   - resolveHintPaths(): Indexed paths matching the planner's hint globs
 * @dependencies:
 *   - minimatch: Planner hint globs against indexed paths
 * @context: RefinementState is threaded through rounds as a value and discarded at the end; a run with no judged candidate returns a degraded answer instead of raising
 */

import { minimatch } from 'minimatch';
import { EARLY_STOP_SCORE, MAX_HINT_PATHS } from '../shared/constants';
import type {
  AnswerPayload,
  Candidate,
  GenerationParams,
  JudgedCandidate,
  LoopRecord,
  QueryAnalysis,
  RefinementState,
  TaskSpec,
  Verdict,
} from '../shared/types';
import type { RetrievalContext } from '../shared/retrieval/types';
import type { ContextRetriever } from '../shared/retrieval/retriever';
import { TelemetryCollector, telemetry as defaultTelemetry } from '../shared/telemetry';
import { changedPaths } from '../core/responseParser';
import { createContextSummaryAnswer } from '../prompts/queryPrompts';
import { logger } from '../utils/logger';
import type { PlannerAgent } from './planner';
import type { CoderAgent, CoderOutcome } from './coder';
import type { JudgeAgent } from './judge';

export interface RoleParams {
  planner: GenerationParams;
  coder: GenerationParams;
  judge: GenerationParams;
}

export interface RefineOptions {
  topK: number;
  numSamples: number;
  maxLoops: number;
  params: RoleParams;
  queryId?: string;
}

export interface RefinementResult {
  spec: TaskSpec;
  best: JudgedCandidate | null;
  payload: AnswerPayload;
  verdict: Verdict | null;
  loops: LoopRecord[];
  earlyStopped: boolean;
  degraded: boolean;
  /** Context of the PLAN retrieval */
  planContext: RetrievalContext;
  coderCalls: number;
  judgeCalls: number;
}

export interface OrchestratorDeps {
  analyze: (text: string) => QueryAnalysis;
  retriever: Pick<ContextRetriever, 'retrieve'>;
  listPaths: () => readonly string[];
  planner: PlannerAgent;
  coder: CoderAgent;
  judge: JudgeAgent;
  telemetry?: TelemetryCollector;
}

export function mergeSignals(current: readonly string[], additions: readonly string[]): string[] {
  const merged = [...current];
  for (const signal of additions) {
    const trimmed = signal.trim();
    if (trimmed && !merged.includes(trimmed)) merged.push(trimmed);
  }
  return merged;
}

export function buildRefinedQuery(original: string, signals: readonly string[]): string {
  return signals.length > 0 ? `${original}\nRelated: ${signals.join(' ')}` : original;
}

export function resolveHintPaths(
  globs: readonly string[],
  paths: readonly string[],
  limit: number = MAX_HINT_PATHS
): string[] {
  const matched: string[] = [];
  for (const glob of globs) {
    for (const candidate of paths) {
      if (matched.length >= limit) return matched;
      if (!matched.includes(candidate) && minimatch(candidate, glob, { matchBase: true, dot: true })) {
        matched.push(candidate);
      }
    }
  }
  return matched;
}

/**
 * Judged list is in sample order; strictly-greater keeps the lowest sample on ties
 */
export function selectRoundBest(judged: readonly JudgedCandidate[]): JudgedCandidate | null {
  let best: JudgedCandidate | null = null;
  for (const entry of judged) {
    if (!best || entry.verdict.score > best.verdict.score) {
      best = entry;
    }
  }
  return best;
}

function errorMessage(reason: unknown): string {
  return reason instanceof Error ? reason.message : String(reason);
}

export class RefinementOrchestrator {
  private readonly telemetry: TelemetryCollector;

  constructor(private readonly deps: OrchestratorDeps) {
    this.telemetry = deps.telemetry ?? defaultTelemetry;
  }

  async refine(query: string, options: RefineOptions): Promise<RefinementResult> {
    const started = Date.now();
    const queryId = options.queryId ?? this.telemetry.generateQueryId();
    const { topK, numSamples, maxLoops, params } = options;

    // PLAN
    const planAnalysis = this.deps.analyze(query);
    const planContext = await this.deps.retriever.retrieve(planAnalysis, topK, { queryId });
    const { spec } = await this.deps.planner.plan(query, planContext, params.planner);

    const hintPaths = resolveHintPaths(spec.hintPaths, this.deps.listPaths());
    let state: RefinementState = {
      loop: 0,
      best: null,
      signals: mergeSignals(spec.targetSignals, hintPaths),
      trail: [],
      firstRaw: null,
    };
    let lastContext = planContext;
    let coderCalls = 0;
    let judgeCalls = 0;
    let earlyStopped = false;

    // ITERATE
    for (let loop = 1; loop <= maxLoops; loop++) {
      const loopStarted = Date.now();
      const failures: string[] = [];

      const signals = state.best
        ? mergeSignals(state.signals, changedPaths(state.best.candidate.payload))
        : [...state.signals];

      let context: RetrievalContext;
      try {
        context = await this.deps.retriever.retrieve(
          this.deps.analyze(buildRefinedQuery(query, signals)),
          topK,
          { queryId }
        );
      } catch (error) {
        failures.push(`retrieval: ${errorMessage(error)}`);
        logger.warn('⚠️ Refined retrieval failed, reusing previous context', {
          loop,
          error: errorMessage(error),
        });
        context = lastContext;
      }
      lastContext = context;

      const feedback = state.best ? state.best.verdict : null;
      const samples = Array.from({ length: numSamples }, (_, i) => i + 1);
      coderCalls += samples.length;
      const settled = await Promise.allSettled(
        samples.map(sample =>
          this.deps.coder.propose({ spec, context, feedback, params: params.coder, loop, sample })
        )
      );

      const candidates: Candidate[] = [];
      let firstRaw = state.firstRaw;
      let generated = 0;
      settled.forEach((result: PromiseSettledResult<CoderOutcome>, i) => {
        if (result.status === 'rejected') {
          failures.push(`coder sample ${samples[i]}: ${errorMessage(result.reason)}`);
          return;
        }
        generated++;
        const outcome = result.value;
        if (outcome.status === 'unparsed') {
          failures.push(`coder sample ${samples[i]}: output did not parse`);
          firstRaw = firstRaw ?? outcome.raw;
          return;
        }
        firstRaw = firstRaw ?? outcome.candidate.raw;
        candidates.push(outcome.candidate);
      });

      judgeCalls += candidates.length;
      const verdicts = await Promise.all(
        candidates.map(candidate => this.deps.judge.evaluate(spec, candidate, params.judge))
      );
      const judged: JudgedCandidate[] = candidates.map((candidate, i) => ({ candidate, verdict: verdicts[i] }));

      const roundBest = selectRoundBest(judged);
      const best =
        roundBest && roundBest.verdict.score > (state.best?.verdict.score ?? -1) ? roundBest : state.best;

      const record: LoopRecord = {
        loop,
        strategy: context.strategy,
        retrieved: context.totalChunks,
        signals,
        samplesRequested: numSamples,
        generated,
        parsed: candidates.length,
        judged: judged.length,
        roundBest: roundBest
          ? { sample: roundBest.candidate.sample, score: roundBest.verdict.score }
          : null,
        bestScore: best ? best.verdict.score : null,
        failures,
        tookMs: Date.now() - loopStarted,
      };

      state = {
        loop,
        best,
        signals,
        trail: [...state.trail, record],
        firstRaw,
      };

      logger.info('🔁 Refinement round complete', {
        queryId,
        loop,
        strategy: record.strategy,
        parsed: record.parsed,
        roundBest: record.roundBest,
        bestScore: record.bestScore,
      });

      if (best && best.verdict.score >= EARLY_STOP_SCORE) {
        earlyStopped = loop < maxLoops;
        break;
      }
    }

    // DONE
    const degraded = state.best === null;
    const payload: AnswerPayload = state.best
      ? state.best.candidate.payload
      : state.firstRaw !== null
        ? { analysis: state.firstRaw, plan: [], changes: [] }
        : createContextSummaryAnswer(planAnalysis, lastContext);

    if (degraded) {
      logger.warn('⚠️ Refinement produced no judged candidate, returning degraded answer', {
        queryId,
        loops: state.trail.length,
        hasRawOutput: state.firstRaw !== null,
      });
    }

    this.telemetry.logRefinement({
      queryId,
      query,
      loops: state.trail.length,
      coderCalls,
      judgeCalls,
      bestScore: state.best ? state.best.verdict.score : null,
      earlyStopped,
      degraded,
      processingTimeMs: Date.now() - started,
    });

    return {
      spec,
      best: state.best,
      payload,
      verdict: state.best ? state.best.verdict : null,
      loops: [...state.trail],
      earlyStopped,
      degraded,
      planContext,
      coderCalls,
      judgeCalls,
    };
  }
}
