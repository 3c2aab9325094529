/**
 * @fileOverview: Planner, coder and judge prompt generators for the refinement loop
 * @module: AgentPrompts
 * @keyFunctions:
 *   - createPlannerUserPrompt: Request plus a trimmed context summary
 *   - createCoderUserPrompt: Task spec, refined context and revision feedback
 *   - createJudgeUserPrompt: Task spec plus one candidate's changes
 */

import type { AnswerPayload, TaskSpec, Verdict } from '../shared/types';
import type { RetrievalContext } from '../shared/retrieval/types';
import { ANSWER_SCHEMA_HINT, formatChunks, formatRetrievalContext } from './queryPrompts';

const PLANNER_CONTEXT_CHUNKS = 10;
const PLANNER_CHUNK_CHARS = 300;
const JUDGE_DIFF_CHARS = 4000;

export const PLANNER_SYSTEM_PROMPT =
  "You are a senior tech lead and requirements engineer. Convert the user's high-level request into a precise task spec for code changes in this repository. " +
  'Output STRICT JSON with keys: goal (string), target_signals (array of keywords, symbols or files to search), ' +
  'constraints (array of strings), acceptance (array of tests or checks), hint_paths (array of probable file globs).';

export const CODER_SYSTEM_PROMPT =
  'You are a senior software engineer working on a private codebase. ' +
  'Propose a minimal change-set with focused diffs and a short plan. ' +
  "Follow the repository's existing style; prefer small surgical patches and include test changes when appropriate.\n" +
  ANSWER_SCHEMA_HINT;

export const JUDGE_SYSTEM_PROMPT =
  'You are a code reviewer. Score candidate patches against the task spec. ' +
  'Return STRICT JSON: {"score": 0-100, "verdict": "pass"|"fail", "reasons": [strings], "risks": [strings]}.';

function bulletList(items: readonly string[], empty: string = '(none)'): string {
  return items.length > 0 ? items.map(item => `- ${item}`).join('\n') : empty;
}

export function formatTaskSpec(spec: TaskSpec): string {
  return [
    `Goal: ${spec.goal}`,
    `Target signals: ${spec.targetSignals.length > 0 ? spec.targetSignals.join(', ') : '(none)'}`,
    'Constraints:',
    bulletList(spec.constraints),
    'Acceptance:',
    bulletList(spec.acceptance),
  ].join('\n');
}

export function createPlannerUserPrompt(request: string, context: RetrievalContext): string {
  const summary = context.metadataSummary ? `${context.metadataSummary}\n\n` : '';
  const shown = Math.min(context.chunks.length, PLANNER_CONTEXT_CHUNKS);
  return (
    `Request: ${request}\n\n` +
    `Context summary (top-${shown} snippets shown below). Extract concrete targets (methods, files, symbols) and acceptance checks.\n\n` +
    summary +
    formatChunks(context, PLANNER_CONTEXT_CHUNKS, PLANNER_CHUNK_CHARS)
  );
}

export function createCoderUserPrompt(
  spec: TaskSpec,
  context: RetrievalContext,
  feedback: Verdict | null
): string {
  const parts = ['Task spec:', formatTaskSpec(spec), '', 'Context:', formatRetrievalContext(context)];

  if (feedback) {
    parts.push(
      '',
      `A previous candidate scored ${feedback.score}/100. Address the review before anything else.`,
      'Reviewer reasons:',
      bulletList(feedback.reasons),
      'Reviewer risks:',
      bulletList(feedback.risks)
    );
  }

  parts.push(
    '',
    'Constraints:',
    '- Keep external behavior compatible unless asked.',
    '- Explain risky changes.',
    '',
    'Now produce the JSON response.'
  );
  return parts.join('\n');
}

export function formatCandidateChanges(payload: AnswerPayload): string {
  if (payload.changes.length === 0) {
    return `(no changes proposed)\nAnalysis: ${payload.analysis}`;
  }
  return payload.changes
    .map((change, i) => {
      const diff =
        change.diff.length > JUDGE_DIFF_CHARS ? change.diff.substring(0, JUDGE_DIFF_CHARS) + '\n...' : change.diff;
      return `Change ${i + 1}: ${change.path}\nRationale: ${change.rationale}\n${diff}`;
    })
    .join('\n\n');
}

export function createJudgeUserPrompt(spec: TaskSpec, payload: AnswerPayload): string {
  return (
    'Task spec (from planner):\n' +
    `${formatTaskSpec(spec)}\n\n` +
    'Candidate plan:\n' +
    `${bulletList(payload.plan)}\n\n` +
    'Candidate changes:\n' +
    `${formatCandidateChanges(payload)}\n\n` +
    'Assess correctness, minimality, and style compliance.'
  );
}
