/**
 * Tests for retrieval and refinement counters
 */

import { TelemetryCollector, telemetry } from '../telemetry';
import { logger } from '../../utils/logger';

jest.mock('../../utils/logger', () => ({
  logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

const timings = { embedMs: 1, searchMs: 1, rankMs: 1 };

describe('TelemetryCollector', () => {
  beforeEach(() => {
    telemetry.reset();
    jest.clearAllMocks();
  });

  it('is a process-wide singleton', () => {
    expect(TelemetryCollector.getInstance()).toBe(telemetry);
  });

  it('issues distinct query ids', () => {
    expect(telemetry.generateQueryId()).not.toBe(telemetry.generateQueryId());
    expect(telemetry.generateQueryId()).toMatch(/^q_\d+_\d+$/);
  });

  it('counts retrievals per strategy and fallbacks', () => {
    const base = { queryId: 'q', query: 'x', chunkCount: 1, filesInvolved: 1, timings };
    telemetry.logRetrieval({ ...base, strategy: 'semantic', processingTimeMs: 10 });
    telemetry.logRetrieval({ ...base, strategy: 'semantic', processingTimeMs: 20 });
    telemetry.logRetrieval({ ...base, strategy: 'metadata', processingTimeMs: 5, fallbackFrom: 'semantic' });

    expect(telemetry.getStats()).toMatchObject({
      totalRetrievals: 3,
      retrievalFallbacks: 1,
      strategyCounts: { semantic: 2, metadata: 1 },
      averageRetrievalTimeMs: 12,
    });
  });

  it('warns when a retrieval exceeds its time budget', () => {
    telemetry.logRetrieval({
      queryId: 'q1',
      query: 'slow',
      strategy: 'semantic',
      chunkCount: 0,
      filesInvolved: 0,
      processingTimeMs: 2500,
      timings,
    });
    expect(logger.warn).toHaveBeenCalledWith('⚠️ Retrieval time budget exceeded', {
      queryId: 'q1',
      time: 2500,
      budget: 2000,
    });
  });

  it('averages best scores over scored refinement runs', () => {
    const base = { queryId: 'q', query: 'x', loops: 1, coderCalls: 2, judgeCalls: 2, processingTimeMs: 100 };
    telemetry.logRefinement({ ...base, bestScore: 90, earlyStopped: true, degraded: false });
    telemetry.logRefinement({ ...base, bestScore: 75, earlyStopped: false, degraded: false });
    telemetry.logRefinement({ ...base, bestScore: null, earlyStopped: false, degraded: true });

    expect(telemetry.getStats()).toMatchObject({
      totalRefinements: 3,
      earlyStops: 1,
      degradedRefinements: 1,
      averageBestScore: 82.5,
    });
  });
});
