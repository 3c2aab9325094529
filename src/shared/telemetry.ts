/**
 * @fileOverview: Telemetry for retrieval and refinement runs
 * @module: Telemetry
 * @context: Logs one record per retrieval and per refinement run, flags time-budget overruns, and keeps running counters for /stats
 */

import { logger } from '../utils/logger';
import type { RetrievalStrategy } from './retrieval/types';

export interface RetrievalTelemetry {
  queryId: string;
  query: string;
  strategy: RetrievalStrategy;
  contentStrategy?: RetrievalStrategy;
  chunkCount: number;
  filesInvolved: number;
  processingTimeMs: number;
  timings: {
    embedMs: number;
    searchMs: number;
    rankMs: number;
  };
  fallbackFrom?: RetrievalStrategy;
  error?: string;
}

export interface RefinementTelemetry {
  queryId: string;
  query: string;
  loops: number;
  coderCalls: number;
  judgeCalls: number;
  bestScore: number | null;
  earlyStopped: boolean;
  degraded: boolean;
  processingTimeMs: number;
}

export interface PerformanceBudget {
  maxRetrievalTimeMs: number;
  maxRefinementTimeMs: number;
}

export interface TelemetryStats {
  totalRetrievals: number;
  retrievalFallbacks: number;
  strategyCounts: Partial<Record<RetrievalStrategy, number>>;
  averageRetrievalTimeMs: number;
  totalRefinements: number;
  earlyStops: number;
  degradedRefinements: number;
  averageBestScore: number | null;
}

const DEFAULT_BUDGET: PerformanceBudget = {
  maxRetrievalTimeMs: 2000,
  maxRefinementTimeMs: 300000,
};

export class TelemetryCollector {
  private static instance: TelemetryCollector;
  private queryCounter = 0;
  private readonly budget: PerformanceBudget = DEFAULT_BUDGET;

  private retrievals = 0;
  private fallbacks = 0;
  private retrievalTimeTotal = 0;
  private strategyCounts: Partial<Record<RetrievalStrategy, number>> = {};
  private refinements = 0;
  private earlyStops = 0;
  private degraded = 0;
  private scoreTotal = 0;
  private scoredRuns = 0;

  private constructor() {}

  static getInstance(): TelemetryCollector {
    if (!TelemetryCollector.instance) {
      TelemetryCollector.instance = new TelemetryCollector();
    }
    return TelemetryCollector.instance;
  }

  generateQueryId(): string {
    return `q_${Date.now()}_${++this.queryCounter}`;
  }

  logRetrieval(record: RetrievalTelemetry): void {
    logger.info('📊 Retrieval Telemetry', {
      queryId: record.queryId,
      query: record.query.substring(0, 50) + (record.query.length > 50 ? '...' : ''),
      strategy: record.strategy,
      contentStrategy: record.contentStrategy,
      chunkCount: record.chunkCount,
      filesInvolved: record.filesInvolved,
      processingTimeMs: record.processingTimeMs,
      timings: record.timings,
      fallbackFrom: record.fallbackFrom,
      error: record.error,
    });

    this.retrievals++;
    this.retrievalTimeTotal += record.processingTimeMs;
    this.strategyCounts[record.strategy] = (this.strategyCounts[record.strategy] ?? 0) + 1;
    if (record.fallbackFrom) this.fallbacks++;

    if (record.processingTimeMs > this.budget.maxRetrievalTimeMs) {
      logger.warn('⚠️ Retrieval time budget exceeded', {
        queryId: record.queryId,
        time: record.processingTimeMs,
        budget: this.budget.maxRetrievalTimeMs,
      });
    }
  }

  logRefinement(record: RefinementTelemetry): void {
    logger.info('🔁 Refinement Telemetry', {
      queryId: record.queryId,
      query: record.query.substring(0, 50) + (record.query.length > 50 ? '...' : ''),
      loops: record.loops,
      coderCalls: record.coderCalls,
      judgeCalls: record.judgeCalls,
      bestScore: record.bestScore,
      earlyStopped: record.earlyStopped,
      degraded: record.degraded,
      processingTimeMs: record.processingTimeMs,
    });

    this.refinements++;
    if (record.earlyStopped) this.earlyStops++;
    if (record.degraded) this.degraded++;
    if (record.bestScore !== null) {
      this.scoreTotal += record.bestScore;
      this.scoredRuns++;
    }

    if (record.processingTimeMs > this.budget.maxRefinementTimeMs) {
      logger.warn('⚠️ Refinement time budget exceeded', {
        queryId: record.queryId,
        time: record.processingTimeMs,
        budget: this.budget.maxRefinementTimeMs,
      });
    }
  }

  getStats(): TelemetryStats {
    return {
      totalRetrievals: this.retrievals,
      retrievalFallbacks: this.fallbacks,
      strategyCounts: { ...this.strategyCounts },
      averageRetrievalTimeMs: this.retrievals ? Math.round(this.retrievalTimeTotal / this.retrievals) : 0,
      totalRefinements: this.refinements,
      earlyStops: this.earlyStops,
      degradedRefinements: this.degraded,
      averageBestScore: this.scoredRuns ? Math.round((this.scoreTotal / this.scoredRuns) * 10) / 10 : null,
    };
  }

  reset(): void {
    this.retrievals = 0;
    this.fallbacks = 0;
    this.retrievalTimeTotal = 0;
    this.strategyCounts = {};
    this.refinements = 0;
    this.earlyStops = 0;
    this.degraded = 0;
    this.scoreTotal = 0;
    this.scoredRuns = 0;
  }
}

// Export singleton instance
export const telemetry = TelemetryCollector.getInstance();
