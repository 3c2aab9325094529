/**
 * Tests for query analysis: intent rules, complexity scoring, entities,
 * statistics detection and metadata/content sub-intents
 */

import { describe, it, expect } from '@jest/globals';
import { QueryAnalyzer, intentStrength, normalize } from '../queryAnalyzer';
import { FileCatalog } from '../fileDetector';

describe('QueryAnalyzer', () => {
  const analyzer = new QueryAnalyzer({ catalog: new FileCatalog(['deploy.rb', 'src/app.ts']) });

  describe('analyze', () => {
    it('resolves a unique filename and scores a short question as simple', () => {
      const analysis = analyzer.analyze('How does deploy.rb work?');

      expect(analysis.intent).toBe('ANALYSIS');
      expect(analysis.fileReferences).toEqual([
        { filename: 'deploy.rb', path: 'deploy.rb', confidence: 0.9, match: 'unique_filename' },
      ]);
      expect(analysis.entities).toEqual([]);
      expect(analysis.complexityScore).toBe(1.4);
      expect(analysis.complexity).toBe('simple');
      expect(analysis.confidence).toBe(0.615);
      expect(analysis.statistics).toBeNull();
      expect(analysis.subIntents).toEqual([]);
    });

    it('detects a pure statistics question', () => {
      const analysis = analyzer.analyze('How many files are in the project?');

      expect(analysis.intent).toBe('GENERAL');
      expect(analysis.statistics).toBe('file_count');
      expect(analysis.complexity).toBe('simple');
      expect(analysis.subIntents).toEqual([]);
      expect(analysis.fileReferences).toEqual([]);
    });

    it('splits a metadata clause from a content clause', () => {
      const analysis = analyzer.analyze('Count API endpoints and show me the authentication one');

      expect(analysis.subIntents.map(sub => sub.kind)).toEqual(['metadata', 'content']);
      expect(analysis.subIntents[0].text).toBe('count api endpoints');
      expect(analysis.subIntents[1].intent).toBe('ANALYSIS');
      expect(analysis.statistics).toBeNull();
    });

    it('keeps a code question that follows a statistics clause', () => {
      const analysis = analyzer.analyze('How many files are there and where is the login handler defined?');

      expect(analysis.subIntents.map(sub => [sub.kind, sub.intent, sub.statistics])).toEqual([
        ['metadata', 'GENERAL', 'file_count'],
        ['content', 'SEARCH', null],
      ]);
      expect(analysis.subIntents[1].text).toBe('where is the login handler defined?');
    });

    it('scores architecture-wide change requests as complex and exploratory', () => {
      const analysis = analyzer.analyze(
        'Refactor the AuthService architecture across multiple files in the payment system'
      );

      expect(analysis.intent).toBe('CHANGES');
      expect(analysis.entities).toEqual(['AuthService']);
      expect(analysis.complexityScore).toBe(3.6);
      expect(analysis.complexity).toBe('complex');
      expect(analysis.exploratory).toBe(true);
    });

    it('extracts backticked and camel-cased identifiers once each, in order', () => {
      const analysis = analyzer.analyze('What does `parseConfig` do in ConfigLoader?');
      expect(analysis.entities).toEqual(['parseConfig', 'ConfigLoader']);
    });

    it('returns a zero-confidence GENERAL analysis for blank text', () => {
      const analysis = analyzer.analyze('   ');
      expect(analysis.intent).toBe('GENERAL');
      expect(analysis.confidence).toBe(0);
      expect(analysis.normalizedQuery).toBe('');
    });

    it('yields an identical, frozen result for repeated analysis', () => {
      const first = analyzer.analyze('Fix the bug in src/app.ts');
      const second = analyzer.analyze('Fix the bug in src/app.ts');

      expect(second).toEqual(first);
      expect(Object.isFrozen(first)).toBe(true);
      expect(Object.isFrozen(first.fileReferences)).toBe(true);
    });
  });

  describe('classifyIntent', () => {
    it('lets the first matching rule win over later ones', () => {
      // "fix" (DEBUG) is listed before "add" (CHANGES)
      expect(analyzer.classifyIntent('add a fix for login').intent).toBe('DEBUG');
    });

    it('counts every matching pattern of the winning rule', () => {
      expect(analyzer.classifyIntent('debug this error')).toEqual({ intent: 'DEBUG', hits: 2 });
    });

    it('falls back to GENERAL', () => {
      expect(analyzer.classifyIntent('hello there')).toEqual({ intent: 'GENERAL', hits: 0 });
    });
  });

  describe('thresholds', () => {
    it('rejects a medium threshold above the complex one', () => {
      expect(() => new QueryAnalyzer({ thresholds: { medium: 4, complex: 2 } })).toThrow(RangeError);
    });

    it('applies custom thresholds to the tier', () => {
      const strict = new QueryAnalyzer({ thresholds: { medium: 0.2, complex: 0.3 } });
      expect(strict.tierFor(0.25)).toBe('medium');
      expect(strict.tierFor(0.3)).toBe('complex');
    });

    it('keeps thresholds when rebinding to a new catalog', () => {
      const strict = new QueryAnalyzer({ thresholds: { medium: 0.2, complex: 0.3 } });
      const rebound = strict.withCatalog(new FileCatalog(['a.ts']));
      expect(rebound.tierFor(0.25)).toBe('medium');
      expect(rebound.analyze('explain a.ts').fileReferences[0].path).toBe('a.ts');
    });
  });

  describe('helpers', () => {
    it('normalizes case and whitespace', () => {
      expect(normalize('  Where   IS\tthis ')).toBe('where is this');
    });

    it('scales intent strength with hits and caps it at 1', () => {
      expect(intentStrength({ intent: 'GENERAL', hits: 0 })).toBe(0);
      expect(intentStrength({ intent: 'DEBUG', hits: 1 })).toBe(0.6);
      expect(intentStrength({ intent: 'DEBUG', hits: 5 })).toBe(1);
    });
  });
});
