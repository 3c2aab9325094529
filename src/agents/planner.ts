/**
 * @fileOverview: Planner role, turning a request and its context into a TaskSpec
 * @module: PlannerAgent
 * @context: Never blocks refinement; a generation or parse failure degrades the spec to the raw request
 */

import type { GenerationInterface, GenerationParams, TaskSpec } from '../shared/types';
import type { RetrievalContext } from '../shared/retrieval/types';
import { PLANNER_SYSTEM_PROMPT, createPlannerUserPrompt } from '../prompts/agentPrompts';
import { parseStructured } from '../core/responseParser';
import { TaskSpecOutputSchema, normalizeTaskSpec } from '../core/validation';
import { withTimeout } from '../utils/async';
import { logger } from '../utils/logger';

export interface PlanOutcome {
  spec: TaskSpec;
  /** Set when the spec was degraded */
  failure?: string;
}

export function fallbackTaskSpec(request: string): TaskSpec {
  return {
    goal: request,
    targetSignals: [],
    constraints: [],
    acceptance: [],
    hintPaths: [],
    degraded: true,
  };
}

export class PlannerAgent {
  constructor(
    private readonly generator: GenerationInterface,
    private readonly timeoutMs: number
  ) {}

  async plan(request: string, context: RetrievalContext, params: GenerationParams): Promise<PlanOutcome> {
    let raw: string;
    try {
      raw = await withTimeout(
        this.generator.generate({
          role: 'planner',
          system: PLANNER_SYSTEM_PROMPT,
          user: createPlannerUserPrompt(request, context),
          params,
        }),
        this.timeoutMs,
        'planner generation'
      );
    } catch (error) {
      const failure = error instanceof Error ? error.message : String(error);
      logger.warn('⚠️ Planner generation failed, using raw request as goal', { error: failure });
      return { spec: fallbackTaskSpec(request), failure };
    }

    const parsed = parseStructured(raw, TaskSpecOutputSchema, 'planner');
    if (!parsed) {
      logger.warn('⚠️ Planner output did not parse, using raw request as goal', {
        preview: raw.substring(0, 120),
      });
      return { spec: fallbackTaskSpec(request), failure: 'planner output did not parse' };
    }

    const spec = normalizeTaskSpec(parsed);
    logger.info('📋 Task spec created', {
      goal: spec.goal.substring(0, 80),
      targetSignals: spec.targetSignals.length,
      hintPaths: spec.hintPaths.length,
    });
    return { spec };
  }
}
