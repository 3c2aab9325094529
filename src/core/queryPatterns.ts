/**
 * @fileOverview: Compiles the lexical pattern table used by the query analyzer
 * @module: QueryPatterns
 * @context: Intent rules are an ordered (pattern, intent) list evaluated top to bottom; the JSON file keeps them in priority order
 */

import { z } from 'zod';
import rawPatterns from './queryPatterns.json';
import type { Intent, StatisticsKind } from '../shared/types';

const intentEnum = z.enum(['ANALYSIS', 'DEBUG', 'CHANGES', 'REVIEW', 'SEARCH', 'GENERAL']);
const statisticsEnum = z.enum(['file_count', 'line_count', 'languages', 'size', 'file_list', 'overview']);

const PatternTableSchema = z.object({
  intents: z.array(z.object({ intent: intentEnum, patterns: z.array(z.string()).min(1) })),
  statistics: z.array(z.object({ kind: statisticsEnum, patterns: z.array(z.string()).min(1) })),
  metadataIndicators: z.array(z.string()),
  contentIndicators: z.array(z.string()),
  complexKeywords: z.array(z.string()),
  exploratory: z.array(z.string()),
  conjunctions: z.string(),
  ignoredFileTokens: z.array(z.string()),
});

export interface IntentRule {
  readonly intent: Intent;
  readonly patterns: readonly RegExp[];
}

export interface StatisticsRule {
  readonly kind: StatisticsKind;
  readonly patterns: readonly RegExp[];
}

export interface PatternTable {
  readonly intentRules: readonly IntentRule[];
  readonly statisticsRules: readonly StatisticsRule[];
  readonly metadataIndicators: readonly RegExp[];
  readonly contentIndicators: readonly RegExp[];
  readonly complexKeywords: readonly RegExp[];
  readonly exploratory: readonly RegExp[];
  readonly conjunctions: RegExp;
  readonly ignoredFileTokens: ReadonlySet<string>;
}

const compile = (sources: string[]): RegExp[] => sources.map(source => new RegExp(source, 'i'));

export function compilePatternTable(input: unknown): PatternTable {
  const table = PatternTableSchema.parse(input);
  return {
    intentRules: table.intents.map(rule => ({ intent: rule.intent, patterns: compile(rule.patterns) })),
    statisticsRules: table.statistics.map(rule => ({
      kind: rule.kind,
      patterns: compile(rule.patterns),
    })),
    metadataIndicators: compile(table.metadataIndicators),
    contentIndicators: compile(table.contentIndicators),
    complexKeywords: compile(table.complexKeywords),
    exploratory: compile(table.exploratory),
    conjunctions: new RegExp(table.conjunctions, 'i'),
    ignoredFileTokens: new Set(table.ignoredFileTokens.map(token => token.toLowerCase())),
  };
}

let defaultTable: PatternTable | null = null;

export function getDefaultPatternTable(): PatternTable {
  if (!defaultTable) {
    defaultTable = compilePatternTable(rawPatterns);
  }
  return defaultTable;
}

export const matchesAny = (patterns: readonly RegExp[], text: string): boolean =>
  patterns.some(pattern => pattern.test(text));

export const countMatches = (patterns: readonly RegExp[], text: string): number =>
  patterns.filter(pattern => pattern.test(text)).length;
