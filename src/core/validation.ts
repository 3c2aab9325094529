/**
 * @fileOverview: Zod schemas for HTTP request bodies and structured model output
 * @module: ValidationSchemas
 * @keyFunctions:
 *   - ValidationHelper.validateInput(): Parse a request body or throw a field-named ValidationError
 *   - ValidationHelper.validateModelOutput(): Parse model JSON, returning null instead of throwing
 *   - normalizeTaskSpec() / normalizeVerdict(): Map loose model JSON onto the internal shapes
 * @dependencies:
 *   - zod: Type-safe schema validation library
 *   - logger: Logging utilities for validation errors
 * @context: Request validation failures surface as 400 VALIDATION_ERROR; model output that fails its schema is treated as a parse failure by the caller
 */

import { z } from 'zod';
import { logger } from '../utils/logger';
import { ValidationError } from '../utils/errorHandler';
import { DEFAULT_MAX_LOOPS, DEFAULT_NUM_SAMPLES, DEFAULT_TOP_K, EARLY_STOP_SCORE } from '../shared/constants';
import type { AnswerPayload, TaskSpec, Verdict } from '../shared/types';

// Request schemas
export const QueryRequestSchema = z
  .object({
    prompt: z.string().trim().min(1, 'prompt must not be empty'),
    top_k: z.number().int().min(1).max(100).default(DEFAULT_TOP_K),
    max_new_tokens: z.number().int().positive().max(32768).optional(),
    temperature: z.number().min(0).max(2).optional(),
  })
  .describe('Body of POST /query');

export const QueryPlusRequestSchema = QueryRequestSchema.extend({
  num_samples: z.number().int().min(1).max(8).default(DEFAULT_NUM_SAMPLES),
  max_loops: z.number().int().min(1).max(5).default(DEFAULT_MAX_LOOPS),
}).describe('Body of POST /query_plus');

export const ApplyRequestSchema = z
  .object({
    diff: z.string().min(1, 'diff must not be empty'),
  })
  .describe('Body of POST /apply');

export type QueryRequest = z.infer<typeof QueryRequestSchema>;
export type QueryPlusRequest = z.infer<typeof QueryPlusRequestSchema>;
export type ApplyRequest = z.infer<typeof ApplyRequestSchema>;

// Model output schemas
const stringList = z
  .union([z.array(z.string()), z.string()])
  .transform(value => (typeof value === 'string' ? (value.trim() ? [value.trim()] : []) : value))
  .default([]);

export const ProposedChangeSchema = z.object({
  path: z.string().min(1),
  rationale: z.string().default(''),
  diff: z.string().default(''),
});

export const AnswerPayloadSchema = z
  .object({
    analysis: z.string().default(''),
    plan: stringList,
    changes: z.array(ProposedChangeSchema).default([]),
  })
  .refine(output => output.analysis.trim().length > 0 || output.plan.length > 0 || output.changes.length > 0, {
    message: 'Expected a non-empty analysis, plan or changes',
  })
  .describe('Answer and coder output');

export const TaskSpecOutputSchema = z
  .object({
    goal: z.string().trim().min(1),
    target_signals: stringList,
    constraints: stringList,
    acceptance: stringList,
    hint_paths: stringList,
  })
  .describe('Planner output');

export const VerdictOutputSchema = z
  .object({
    score: z.coerce.number().min(0).max(100),
    verdict: z.enum(['pass', 'fail']).optional(),
    reasons: stringList,
    risks: stringList,
  })
  .describe('Judge output');

export function normalizeTaskSpec(output: z.infer<typeof TaskSpecOutputSchema>): TaskSpec {
  return {
    goal: output.goal,
    targetSignals: output.target_signals,
    constraints: output.constraints,
    acceptance: output.acceptance,
    hintPaths: output.hint_paths,
    degraded: false,
  };
}

export function normalizeVerdict(output: z.infer<typeof VerdictOutputSchema>): Verdict {
  return {
    score: output.score,
    // Judges that omit the label pass at the early-stop threshold
    pass: output.verdict ? output.verdict === 'pass' : output.score >= EARLY_STOP_SCORE,
    reasons: output.reasons,
    risks: output.risks,
  };
}

export function normalizeAnswer(output: z.infer<typeof AnswerPayloadSchema>): AnswerPayload {
  return {
    analysis: output.analysis,
    plan: output.plan,
    changes: output.changes,
  };
}

/**
 * Validation helper that turns zod failures into service errors.
 */
export class ValidationHelper {
  static validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, source: string): T {
    const result = schema.safeParse(data);
    if (result.success) {
      return result.data;
    }

    const firstIssue = result.error.issues[0];
    const field = firstIssue && firstIssue.path.length > 0 ? firstIssue.path.join('.') : 'body';
    const errors = result.error.issues.map(issue => ({
      field: issue.path.join('.'),
      message: issue.message,
      code: issue.code,
    }));

    logger.warn(`Schema validation failed for ${source}`, { errors });
    throw new ValidationError(field, firstIssue?.message ?? 'Invalid input', { source, errors });
  }

  /**
   * Model output is untrusted; a mismatch yields null and the caller falls back
   */
  static validateModelOutput<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    data: unknown,
    role: string
  ): T | null {
    const result = schema.safeParse(data);
    if (result.success) {
      return result.data;
    }
    logger.debug(`Model output failed schema for ${role}`, {
      issues: result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    });
    return null;
  }
}
