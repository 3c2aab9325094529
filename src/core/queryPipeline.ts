/**
 * @fileOverview: End-to-end query handling over one index generation
 * @module: QueryPipeline
 * @keyFunctions:
 *   - run(): analyze -> retrieve -> select model -> answer (single generation, or none for metadata)
 *   - runRefined(): Same front half, then the planner/coder/judge loop
 * @dependencies:
 *   - IndexManager: Read-locked access to the current generation
 *   - ContextRetriever, ModelSelector, RefinementOrchestrator
 * @context: Generation failures degrade the answer instead of failing the request; only retrieval without a fallback surfaces as an error
 */

import { ANSWER_CONFIDENCE } from '../shared/constants';
import type {
  AnswerPayload,
  GenerationInterface,
  GenerationParams,
  LoopRecord,
  ModelDescriptor,
  QueryAnalysis,
  TaskSpec,
  Verdict,
} from '../shared/types';
import type { RetrievalContext } from '../shared/retrieval/types';
import { ContextRetriever } from '../shared/retrieval/retriever';
import { answerStatistics } from '../shared/retrieval/metadataSummary';
import { TelemetryCollector, telemetry as defaultTelemetry } from '../shared/telemetry';
import { createAnswerSystemPrompt, createAnswerUserPrompt, createContextSummaryAnswer } from '../prompts/queryPrompts';
import { PlannerAgent } from '../agents/planner';
import { CoderAgent } from '../agents/coder';
import { JudgeAgent } from '../agents/judge';
import { RefinementOrchestrator, RoleParams } from '../agents/orchestrator';
import type { IndexGeneration, IndexManager } from '../local/indexManager';
import { withTimeout } from '../utils/async';
import { logger } from '../utils/logger';
import type { ModelSelector } from './modelSelector';
import type { QueryAnalyzer } from './queryAnalyzer';
import { parseAnswer } from './responseParser';

export interface QueryOptions {
  topK: number;
  maxNewTokens?: number;
  temperature?: number;
}

export interface RefinedQueryOptions extends QueryOptions {
  numSamples: number;
  maxLoops: number;
}

export interface AnswerResult extends AnswerPayload {
  confidence: number;
}

export interface QueryResult {
  queryId: string;
  model: string;
  tookMs: number;
  retrieved: number;
  result: AnswerResult;
  analysis: QueryAnalysis;
  retrieval: RetrievalContext;
  degraded: boolean;
  generation: number;
}

export interface RefinedQueryResult extends QueryResult {
  spec: TaskSpec;
  verdict: Verdict | null;
  loops: LoopRecord[];
}

export interface PipelineDeps {
  indexManager: IndexManager;
  analyzer: QueryAnalyzer;
  selector: ModelSelector;
  generator: GenerationInterface;
  generationTimeoutMs: number;
  plannerModel?: string;
  judgeModel?: string;
  telemetry?: TelemetryCollector;
}

const PLANNER_PARAMS = { maxNewTokens: 1000, temperature: 0.1 } as const;
const JUDGE_PARAMS = { maxNewTokens: 500, temperature: 0 } as const;

export class QueryPipeline {
  private readonly telemetry: TelemetryCollector;

  constructor(private readonly deps: PipelineDeps) {
    this.telemetry = deps.telemetry ?? defaultTelemetry;
  }

  async run(prompt: string, options: QueryOptions): Promise<QueryResult> {
    const started = Date.now();
    const queryId = this.telemetry.generateQueryId();

    return this.deps.indexManager.withReadLock(async index => {
      const analysis = this.deps.analyzer.withCatalog(index.catalog).analyze(prompt);
      const retriever = new ContextRetriever(index.snapshot, index.vectors, this.telemetry);
      const context = await retriever.retrieve(analysis, options.topK, { queryId });
      const model = this.deps.selector.select(analysis);

      logger.info('🔎 Query analyzed', {
        queryId,
        intent: analysis.intent,
        complexity: analysis.complexity,
        references: analysis.fileReferences.length,
        strategy: context.strategy,
        model: model.name,
      });

      let result: AnswerResult;
      let degraded = false;
      if (context.strategy === 'metadata') {
        result = this.metadataAnswer(analysis, index);
      } else {
        const answer = await this.generateAnswer(analysis, context, this.answerParams(model, options), queryId);
        result = answer.result;
        degraded = answer.degraded;
      }

      return {
        queryId,
        model: model.name,
        tookMs: Date.now() - started,
        retrieved: context.totalChunks,
        result,
        analysis,
        retrieval: context,
        degraded,
        generation: index.generation,
      };
    });
  }

  async runRefined(prompt: string, options: RefinedQueryOptions): Promise<RefinedQueryResult> {
    const started = Date.now();
    const queryId = this.telemetry.generateQueryId();
    const timeoutMs = this.deps.generationTimeoutMs;

    return this.deps.indexManager.withReadLock(async index => {
      const analyzer = this.deps.analyzer.withCatalog(index.catalog);
      const analysis = analyzer.analyze(prompt);
      const model = this.deps.selector.select(analysis);
      const retriever = new ContextRetriever(index.snapshot, index.vectors, this.telemetry);

      const orchestrator = new RefinementOrchestrator({
        analyze: text => analyzer.analyze(text),
        retriever,
        listPaths: () => index.catalog.paths,
        planner: new PlannerAgent(this.deps.generator, timeoutMs),
        coder: new CoderAgent(this.deps.generator, timeoutMs),
        judge: new JudgeAgent(this.deps.generator, timeoutMs),
        telemetry: this.telemetry,
      });

      const outcome = await orchestrator.refine(prompt, {
        topK: options.topK,
        numSamples: options.numSamples,
        maxLoops: options.maxLoops,
        params: this.roleParams(model, options),
        queryId,
      });

      let confidence: number;
      if (outcome.verdict) {
        confidence = Math.round(outcome.verdict.score) / 100;
      } else if (outcome.loops.some(loop => loop.generated > 0)) {
        confidence = ANSWER_CONFIDENCE.plainText;
      } else {
        confidence = ANSWER_CONFIDENCE.degraded;
      }

      const lastLoop = outcome.loops[outcome.loops.length - 1];
      return {
        queryId,
        model: model.name,
        tookMs: Date.now() - started,
        retrieved: lastLoop ? lastLoop.retrieved : outcome.planContext.totalChunks,
        result: { ...outcome.payload, confidence },
        analysis,
        retrieval: outcome.planContext,
        degraded: outcome.degraded,
        generation: index.generation,
        spec: outcome.spec,
        verdict: outcome.verdict,
        loops: outcome.loops,
      };
    });
  }

  private answerParams(model: ModelDescriptor, options: QueryOptions): GenerationParams {
    return {
      model: model.name,
      maxNewTokens: options.maxNewTokens ?? model.defaults.maxNewTokens,
      temperature: options.temperature ?? model.defaults.temperature,
    };
  }

  private roleParams(model: ModelDescriptor, options: QueryOptions): RoleParams {
    return {
      planner: { model: this.deps.plannerModel ?? model.name, ...PLANNER_PARAMS },
      coder: this.answerParams(model, options),
      judge: { model: this.deps.judgeModel ?? model.name, ...JUDGE_PARAMS },
    };
  }

  private metadataAnswer(analysis: QueryAnalysis, index: IndexGeneration): AnswerResult {
    const text = analysis.statistics
      ? answerStatistics(analysis.statistics, index.snapshot)
      : index.snapshot.summary();
    return {
      analysis: text,
      plan: ['Answered from repository metadata'],
      changes: [],
      confidence: ANSWER_CONFIDENCE.metadata,
    };
  }

  private async generateAnswer(
    analysis: QueryAnalysis,
    context: RetrievalContext,
    params: GenerationParams,
    queryId: string
  ): Promise<{ result: AnswerResult; degraded: boolean }> {
    let raw: string;
    try {
      raw = await withTimeout(
        this.deps.generator.generate({
          role: 'answer',
          system: createAnswerSystemPrompt(analysis.intent),
          user: createAnswerUserPrompt(analysis, context),
          params,
        }),
        this.deps.generationTimeoutMs,
        'answer generation'
      );
    } catch (error) {
      logger.warn('⚠️ Answer generation failed, returning context summary', {
        queryId,
        error: error instanceof Error ? error.message : String(error),
      });
      return {
        result: { ...createContextSummaryAnswer(analysis, context), confidence: ANSWER_CONFIDENCE.degraded },
        degraded: true,
      };
    }

    const parsed = parseAnswer(raw);
    if (!parsed.structured) {
      logger.debug('Answer was not structured JSON, wrapped as plain text', { queryId });
    }
    return { result: { ...parsed.payload, confidence: parsed.confidence }, degraded: false };
  }
}
