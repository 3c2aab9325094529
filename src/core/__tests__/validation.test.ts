/**
 * Tests for request and model-output schemas
 */

import {
  ApplyRequestSchema,
  QueryPlusRequestSchema,
  QueryRequestSchema,
  TaskSpecOutputSchema,
  ValidationHelper,
  VerdictOutputSchema,
  normalizeTaskSpec,
  normalizeVerdict,
} from '../validation';
import { ErrorCode, ValidationError } from '../../utils/errorHandler';
import { PLANNER_JSON } from '../../__tests__/utils/fixtures';

jest.mock('../../utils/logger', () => ({
  logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

function validationFailure(run: () => unknown): ValidationError {
  try {
    run();
  } catch (error) {
    if (error instanceof ValidationError) return error;
    throw error;
  }
  throw new Error('expected a ValidationError');
}

describe('request schemas', () => {
  it('trims the prompt and applies the top_k default', () => {
    expect(ValidationHelper.validateInput(QueryRequestSchema, { prompt: '  hi  ' }, '/query')).toEqual({
      prompt: 'hi',
      top_k: 16,
    });
  });

  it('names the failing field', () => {
    const error = validationFailure(() =>
      ValidationHelper.validateInput(QueryRequestSchema, { prompt: '   ' }, '/query')
    );
    expect(error.field).toBe('prompt');
    expect(error.code).toBe(ErrorCode.VALIDATION_ERROR);
    expect(error.message).toBe('Validation error for prompt: prompt must not be empty');

    expect(
      validationFailure(() => ValidationHelper.validateInput(QueryRequestSchema, { prompt: 'x', top_k: 0 }, '/query'))
        .field
    ).toBe('top_k');
  });

  it('reports a non-object body against the body itself', () => {
    const error = validationFailure(() => ValidationHelper.validateInput(QueryRequestSchema, 'text', '/query'));
    expect(error.field).toBe('body');
  });

  it('applies refinement defaults and bounds', () => {
    expect(ValidationHelper.validateInput(QueryPlusRequestSchema, { prompt: 'add retry' }, '/query_plus')).toEqual({
      prompt: 'add retry',
      top_k: 16,
      num_samples: 2,
      max_loops: 2,
    });
    expect(
      validationFailure(() =>
        ValidationHelper.validateInput(QueryPlusRequestSchema, { prompt: 'x', num_samples: 9 }, '/query_plus')
      ).field
    ).toBe('num_samples');
    expect(
      validationFailure(() =>
        ValidationHelper.validateInput(QueryPlusRequestSchema, { prompt: 'x', max_loops: 1.5 }, '/query_plus')
      ).field
    ).toBe('max_loops');
  });

  it('requires a non-empty diff', () => {
    expect(validationFailure(() => ValidationHelper.validateInput(ApplyRequestSchema, { diff: '' }, '/apply')).field).toBe(
      'diff'
    );
  });
});

describe('model output schemas', () => {
  it('maps planner output onto a task spec', () => {
    const output = ValidationHelper.validateModelOutput(TaskSpecOutputSchema, JSON.parse(PLANNER_JSON), 'planner');
    expect(output).not.toBeNull();
    if (!output) return;
    expect(normalizeTaskSpec(output)).toEqual({
      goal: 'Add retry to the client',
      targetSignals: ['retry', 'fetchWithRetry'],
      constraints: ['keep the public API'],
      acceptance: ['tests pass'],
      hintPaths: ['src/**/*.ts'],
      degraded: false,
    });
  });

  it('derives pass from the label, else from the early-stop threshold', () => {
    expect(normalizeVerdict({ score: 90, verdict: 'fail', reasons: [], risks: [] }).pass).toBe(false);
    expect(normalizeVerdict({ score: 40, verdict: 'pass', reasons: [], risks: [] }).pass).toBe(true);
    expect(normalizeVerdict({ score: 85, reasons: [], risks: [] }).pass).toBe(true);
    expect(normalizeVerdict({ score: 84.9, reasons: [], risks: [] }).pass).toBe(false);
  });

  it('returns null instead of throwing for malformed output', () => {
    expect(ValidationHelper.validateModelOutput(VerdictOutputSchema, { score: 'high' }, 'judge')).toBeNull();
  });
});
