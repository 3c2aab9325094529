/**
 * @fileOverview: Coder role, producing one candidate change-set per call
 * @module: CoderAgent
 * @context: Rejects on generation failure so the orchestrator can settle samples independently; output that holds no JSON payload is returned unparsed and never judged
 */

import type { Candidate, GenerationInterface, GenerationParams, TaskSpec, Verdict } from '../shared/types';
import type { RetrievalContext } from '../shared/retrieval/types';
import { CODER_SYSTEM_PROMPT, createCoderUserPrompt } from '../prompts/agentPrompts';
import { combinedDiff, parseStructured } from '../core/responseParser';
import { AnswerPayloadSchema, normalizeAnswer } from '../core/validation';
import { withTimeout } from '../utils/async';

export type CoderOutcome =
  | { status: 'parsed'; candidate: Candidate }
  | { status: 'unparsed'; raw: string };

export interface CoderRequest {
  spec: TaskSpec;
  context: RetrievalContext;
  feedback: Verdict | null;
  params: GenerationParams;
  loop: number;
  sample: number;
}

export class CoderAgent {
  constructor(
    private readonly generator: GenerationInterface,
    private readonly timeoutMs: number
  ) {}

  async propose(request: CoderRequest): Promise<CoderOutcome> {
    const raw = await withTimeout(
      this.generator.generate({
        role: 'coder',
        system: CODER_SYSTEM_PROMPT,
        user: createCoderUserPrompt(request.spec, request.context, request.feedback),
        params: request.params,
      }),
      this.timeoutMs,
      `coder generation (loop ${request.loop}, sample ${request.sample})`
    );

    const parsed = parseStructured(raw, AnswerPayloadSchema, 'coder');
    if (!parsed) {
      return { status: 'unparsed', raw };
    }

    const payload = normalizeAnswer(parsed);
    return {
      status: 'parsed',
      candidate: {
        loop: request.loop,
        sample: request.sample,
        payload,
        raw,
        diff: combinedDiff(payload),
      },
    };
  }
}
