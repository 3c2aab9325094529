/**
 * @fileOverview: Judge role, scoring one candidate against the task spec
 * @module: JudgeAgent
 * @context: Never rejects; any failure becomes a score-0 failing verdict whose reason records it
 */

import type { Candidate, GenerationInterface, GenerationParams, TaskSpec, Verdict } from '../shared/types';
import { JUDGE_SYSTEM_PROMPT, createJudgeUserPrompt } from '../prompts/agentPrompts';
import { parseStructured } from '../core/responseParser';
import { VerdictOutputSchema, normalizeVerdict } from '../core/validation';
import { withTimeout } from '../utils/async';
import { logger } from '../utils/logger';

export function failedVerdict(reason: string): Verdict {
  return { score: 0, pass: false, reasons: [reason], risks: [] };
}

export class JudgeAgent {
  constructor(
    private readonly generator: GenerationInterface,
    private readonly timeoutMs: number
  ) {}

  async evaluate(spec: TaskSpec, candidate: Candidate, params: GenerationParams): Promise<Verdict> {
    let raw: string;
    try {
      raw = await withTimeout(
        this.generator.generate({
          role: 'judge',
          system: JUDGE_SYSTEM_PROMPT,
          user: createJudgeUserPrompt(spec, candidate.payload),
          params,
        }),
        this.timeoutMs,
        `judge generation (loop ${candidate.loop}, sample ${candidate.sample})`
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn('⚠️ Judge call failed', { loop: candidate.loop, sample: candidate.sample, error: message });
      return failedVerdict(`judge failed: ${message}`);
    }

    const parsed = parseStructured(raw, VerdictOutputSchema, 'judge');
    if (!parsed) {
      logger.warn('⚠️ Judge output did not parse', { loop: candidate.loop, sample: candidate.sample });
      return failedVerdict('judge failed: output did not parse');
    }
    return normalizeVerdict(parsed);
  }
}
