/**
 * @fileOverview: Turns raw query text into an immutable QueryAnalysis
 * @module: QueryAnalyzer
 * @keyFunctions:
 *   - analyze(): Intent, complexity, file references, entities, sub-intents and confidence for one query
 *   - classifyIntent(): First-match-wins over the priority-ordered intent rules
 *   - detectSubIntents(): Metadata/content clause split on coordinating conjunctions
 * @dependencies:
 *   - fileDetector: File reference scan against the frozen file catalog
 *   - queryPatterns: Compiled lexical pattern table
 * @context: Pure with respect to its inputs; the catalog is frozen per index generation, so repeated analysis of the same text yields the same result
 */

import {
  COMPLEXITY_WEIGHTS,
  CONFIDENCE_WEIGHTS,
  DEFAULT_COMPLEXITY_THRESHOLDS,
  MAX_ENTITIES,
} from '../shared/constants';
import type {
  ComplexityTier,
  FileReference,
  Intent,
  QueryAnalysis,
  StatisticsKind,
  SubIntent,
} from '../shared/types';
import { FileCatalog, detectFileReferences } from './fileDetector';
import {
  PatternTable,
  countMatches,
  getDefaultPatternTable,
  matchesAny,
} from './queryPatterns';

export interface ComplexityThresholds {
  medium: number;
  complex: number;
}

export interface QueryAnalyzerOptions {
  catalog?: FileCatalog;
  thresholds?: ComplexityThresholds;
  patterns?: PatternTable;
}

export interface IntentMatch {
  intent: Intent;
  hits: number;
}

const ENTITY_PATTERNS: readonly RegExp[] = [
  /`([^`]{2,60})`/g,
  /"([^"]{2,60})"/g,
  /\b([A-Z][a-z0-9]+(?:[A-Z][a-z0-9]*)+)\b/g,
  /\b([a-z][a-z0-9]*(?:[A-Z][a-z0-9]*)+)\b/g,
  /\b([A-Za-z][A-Za-z0-9]*(?:_[A-Za-z0-9]+)+)\b/g,
  /\b([A-Za-z_]\w*)\(/g,
  /\b([A-Za-z_]\w*(?:\.[A-Za-z_]\w*)+)\b/g,
];

export class QueryAnalyzer {
  private readonly catalog: FileCatalog;
  private readonly thresholds: ComplexityThresholds;
  private readonly patterns: PatternTable;

  constructor(options: QueryAnalyzerOptions = {}) {
    this.catalog = options.catalog ?? FileCatalog.empty();
    this.thresholds = options.thresholds ?? { ...DEFAULT_COMPLEXITY_THRESHOLDS };
    this.patterns = options.patterns ?? getDefaultPatternTable();
    if (this.thresholds.medium > this.thresholds.complex) {
      throw new RangeError('Complexity thresholds must satisfy medium <= complex');
    }
  }

  /**
   * Analyzer bound to another index generation's catalog, same thresholds and patterns
   */
  withCatalog(catalog: FileCatalog): QueryAnalyzer {
    return new QueryAnalyzer({ catalog, thresholds: this.thresholds, patterns: this.patterns });
  }

  analyze(queryText: string): QueryAnalysis {
    const normalizedQuery = normalize(queryText);
    if (!normalizedQuery) {
      const empty: QueryAnalysis = {
        originalQuery: queryText,
        normalizedQuery: '',
        intent: 'GENERAL',
        complexity: 'simple',
        complexityScore: 0,
        fileReferences: [],
        entities: [],
        confidence: 0,
        subIntents: [],
        statistics: null,
        exploratory: false,
      };
      return Object.freeze(empty);
    }

    const fileReferences = detectFileReferences(
      queryText,
      this.catalog,
      this.patterns.ignoredFileTokens
    );
    const intentMatch = this.classifyIntent(normalizedQuery);
    const entities = this.extractEntities(queryText, fileReferences);
    const complexityScore = this.scoreComplexity(normalizedQuery, entities.length, fileReferences.length);
    const subIntents = this.detectSubIntents(normalizedQuery);
    const statistics = matchesAny(this.patterns.contentIndicators, normalizedQuery)
      ? null
      : this.detectStatistics(normalizedQuery);
    const exploratory =
      intentMatch.intent === 'SEARCH' || matchesAny(this.patterns.exploratory, normalizedQuery);

    const analysis: QueryAnalysis = {
      originalQuery: queryText,
      normalizedQuery,
      intent: intentMatch.intent,
      complexity: this.tierFor(complexityScore),
      complexityScore,
      fileReferences: Object.freeze(fileReferences),
      entities: Object.freeze(entities),
      confidence: computeConfidence(intentMatch, fileReferences, entities.length),
      subIntents: Object.freeze(subIntents),
      statistics,
      exploratory,
    };
    return Object.freeze(analysis);
  }

  classifyIntent(normalizedQuery: string): IntentMatch {
    for (const rule of this.patterns.intentRules) {
      const hits = countMatches(rule.patterns, normalizedQuery);
      if (hits > 0) {
        return { intent: rule.intent, hits };
      }
    }
    return { intent: 'GENERAL', hits: 0 };
  }

  /**
   * Split on and/also; the query is multi-intent only when one clause asks for
   * repository metadata and another asks about code content
   */
  detectSubIntents(normalizedQuery: string): SubIntent[] {
    const clauses = normalizedQuery
      .split(this.patterns.conjunctions)
      .map(clause => clause.trim())
      .filter(clause => clause.length > 0);
    if (clauses.length < 2) {
      return [];
    }

    const classified: SubIntent[] = [];
    for (const clause of clauses) {
      const intent = this.classifyIntent(clause).intent;
      const metadataHit = matchesAny(this.patterns.metadataIndicators, clause);
      // A clause that classifies as a code intent counts as content unless it reads as metadata
      const content =
        matchesAny(this.patterns.contentIndicators, clause) || (!metadataHit && intent !== 'GENERAL');
      const metadata = !content && metadataHit;
      if (!content && !metadata) {
        continue;
      }
      classified.push({
        kind: metadata ? 'metadata' : 'content',
        text: clause,
        intent,
        statistics: metadata ? this.detectStatistics(clause) : null,
      });
    }

    const hasMetadata = classified.some(s => s.kind === 'metadata');
    const hasContent = classified.some(s => s.kind === 'content');
    return hasMetadata && hasContent ? classified : [];
  }

  detectStatistics(text: string): StatisticsKind | null {
    for (const rule of this.patterns.statisticsRules) {
      if (matchesAny(rule.patterns, text)) {
        return rule.kind;
      }
    }
    return null;
  }

  scoreComplexity(normalizedQuery: string, entityCount: number, referenceCount: number): number {
    const words = normalizedQuery.split(' ').filter(Boolean).length;
    const complexKeyword = matchesAny(this.patterns.complexKeywords, normalizedQuery) ? 1 : 0;
    const score =
      words * COMPLEXITY_WEIGHTS.perWord +
      entityCount * COMPLEXITY_WEIGHTS.perEntity +
      referenceCount * COMPLEXITY_WEIGHTS.perFileReference +
      complexKeyword * COMPLEXITY_WEIGHTS.complexKeyword;
    return Math.round(score * 100) / 100;
  }

  tierFor(score: number): ComplexityTier {
    if (score >= this.thresholds.complex) return 'complex';
    if (score >= this.thresholds.medium) return 'medium';
    return 'simple';
  }

  extractEntities(queryText: string, fileReferences: readonly FileReference[]): string[] {
    const fileTokens = fileReferences.map(ref => ref.filename.toLowerCase());
    const isFileToken = (value: string): boolean => {
      const lower = value.toLowerCase();
      return fileTokens.some(token => token === lower || token.endsWith('/' + lower));
    };
    const hits: Array<{ index: number; value: string }> = [];

    for (const pattern of ENTITY_PATTERNS) {
      for (const match of queryText.matchAll(pattern)) {
        const value = match[1].trim();
        if (!value || isFileToken(value)) continue;
        if (this.patterns.ignoredFileTokens.has(value.toLowerCase())) continue;
        hits.push({ index: match.index ?? 0, value });
      }
    }

    hits.sort((a, b) => a.index - b.index || b.value.length - a.value.length);

    const entities: string[] = [];
    for (const hit of hits) {
      if (!entities.includes(hit.value)) {
        entities.push(hit.value);
      }
      if (entities.length >= MAX_ENTITIES) break;
    }
    return entities;
  }
}

export function normalize(text: string): string {
  return text.toLowerCase().replace(/\s+/g, ' ').trim();
}

export function intentStrength(match: IntentMatch): number {
  if (match.intent === 'GENERAL' || match.hits === 0) return 0;
  return Math.min(1, 0.6 + 0.2 * (match.hits - 1));
}

function computeConfidence(
  intentMatch: IntentMatch,
  references: readonly FileReference[],
  entityCount: number
): number {
  const maxReference = references.reduce((max, ref) => Math.max(max, ref.confidence), 0);
  const value =
    CONFIDENCE_WEIGHTS.intent * intentStrength(intentMatch) +
    CONFIDENCE_WEIGHTS.reference * maxReference +
    CONFIDENCE_WEIGHTS.entities * (Math.min(entityCount, 5) / 5);
  return Math.round(Math.min(1, Math.max(0, value)) * 1000) / 1000;
}
