/**
 * @fileOverview: Tolerant JSON extraction from model output
 * @module: ResponseParser
 * @keyFunctions:
 *   - extractJson(): Strict parse, then a fenced json block, then the outermost braces
 *   - parseAnswer(): Answer payload, or the raw text wrapped as plain analysis
 *   - parseStructured(): Schema-checked object for planner and judge output, or null
 * @context: Parse failures are always recovered here; callers decide what a null means for their role
 */

import type { z } from 'zod';
import { ANSWER_CONFIDENCE } from '../shared/constants';
import type { AnswerPayload } from '../shared/types';
import { AnswerPayloadSchema, ValidationHelper, normalizeAnswer } from './validation';

export interface ParsedAnswer {
  payload: AnswerPayload;
  structured: boolean;
  confidence: number;
}

const FENCED_JSON = /```json\s*([\s\S]*?)```/i;

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Returns the first JSON object found, or null when the text holds none
 */
export function extractJson(raw: string): Record<string, unknown> | null {
  const text = raw.trim();

  const direct = tryParse(text);
  if (isPlainObject(direct)) return direct;

  const fenced = FENCED_JSON.exec(text);
  if (fenced) {
    const inner = tryParse(fenced[1].trim());
    if (isPlainObject(inner)) return inner;
  }

  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start !== -1 && end > start) {
    const braced = tryParse(text.slice(start, end + 1));
    if (isPlainObject(braced)) return braced;
  }

  return null;
}

export function plainTextAnswer(raw: string): AnswerPayload {
  return { analysis: raw.trim(), plan: [], changes: [] };
}

export function parseAnswer(raw: string, role: string = 'answer'): ParsedAnswer {
  const json = extractJson(raw);
  if (json) {
    const payload = ValidationHelper.validateModelOutput(AnswerPayloadSchema, json, role);
    if (payload) {
      return { payload: normalizeAnswer(payload), structured: true, confidence: ANSWER_CONFIDENCE.structured };
    }
  }
  return { payload: plainTextAnswer(raw), structured: false, confidence: ANSWER_CONFIDENCE.plainText };
}

export function parseStructured<T>(
  raw: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  role: string
): T | null {
  const json = extractJson(raw);
  if (!json) return null;
  return ValidationHelper.validateModelOutput(schema, json, role);
}

/**
 * Paths touched by a candidate's changes, from the change list and its diff headers
 */
export function changedPaths(payload: AnswerPayload): string[] {
  const paths = new Set<string>();
  for (const change of payload.changes) {
    if (change.path) paths.add(change.path);
    for (const line of change.diff.split('\n')) {
      const match = /^\+\+\+ (?:b\/)?(\S+)/.exec(line);
      if (match && match[1] !== '/dev/null') {
        paths.add(match[1]);
      }
    }
  }
  return [...paths].sort();
}

export function combinedDiff(payload: AnswerPayload): string | undefined {
  const diffs = payload.changes.map(change => change.diff.trimEnd()).filter(diff => diff.length > 0);
  return diffs.length > 0 ? diffs.join('\n') + '\n' : undefined;
}
