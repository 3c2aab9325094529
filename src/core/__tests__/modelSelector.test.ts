/**
 * Tests for model scoring, selection ties and registry loading
 */

import { ModelSelector, loadModelRegistry, parseModelRegistry, scoreModel, selectModel } from '../modelSelector';
import type { ModelDescriptor } from '../../shared/types';
import { ErrorCode, RepoQueryError } from '../../utils/errorHandler';
import { analysisOf } from '../../__tests__/utils/fixtures';

jest.mock('../../utils/logger', () => ({
  logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

const model = (name: string, capabilities: string[], maxContextLength: number): ModelDescriptor => ({
  name,
  capabilities,
  maxContextLength,
  defaults: { maxNewTokens: 512, temperature: 0.2 },
});

describe('scoreModel', () => {
  it('adds capability, context and code-reference components', () => {
    const score = scoreModel(
      model('m', ['code_analysis', 'code'], 4096),
      analysisOf({
        intent: 'ANALYSIS',
        complexity: 'complex',
        fileReferences: [{ filename: 'a.ts', path: 'a.ts', confidence: 0.9, match: 'unique_filename' }],
      })
    );
    expect(score).toEqual({ total: 14, capability: 10, complexity: 2, codeReference: 2 });
  });

  it('weights the context bonus by complexity tier', () => {
    const wide = model('wide', [], 65536);
    expect(scoreModel(wide, analysisOf({ complexity: 'simple' })).complexity).toBe(0);
    expect(scoreModel(wide, analysisOf({ complexity: 'medium' })).complexity).toBe(3);
    expect(scoreModel(wide, analysisOf({ complexity: 'complex' })).complexity).toBe(6);
  });
});

describe('selectModel', () => {
  const small = model('small', ['code_analysis'], 4096);
  const large = model('large', ['code_analysis'], 65536);

  it('prefers the larger context for complex queries', () => {
    expect(selectModel(analysisOf({ intent: 'ANALYSIS', complexity: 'complex' }), [small, large]).name).toBe(
      'large'
    );
  });

  it('breaks ties by registry order', () => {
    expect(selectModel(analysisOf({ intent: 'ANALYSIS', complexity: 'simple' }), [small, large]).name).toBe(
      'small'
    );
    expect(selectModel(analysisOf({ intent: 'ANALYSIS', complexity: 'simple' }), [large, small]).name).toBe(
      'large'
    );
  });

  it('lets a capability match outweigh a larger context', () => {
    const debugModel = model('debugger', ['debugging'], 4096);
    expect(selectModel(analysisOf({ intent: 'DEBUG', complexity: 'complex' }), [large, debugModel]).name).toBe(
      'debugger'
    );
  });

  it('rejects an empty registry', () => {
    expect(() => selectModel(analysisOf(), [])).toThrow('Model registry is empty');
    expect(() => new ModelSelector([])).toThrow('Model registry is empty');
  });

  it('chooses from the bundled registry', () => {
    const selector = new ModelSelector(loadModelRegistry());
    expect(selector.listModels()).toEqual(['gpt-4o-mini', 'gpt-4o', 'gpt-4.1']);
    expect(selector.select(analysisOf({ intent: 'ANALYSIS', complexity: 'simple' })).name).toBe('gpt-4o-mini');
    expect(selector.select(analysisOf({ intent: 'CHANGES', complexity: 'complex' })).name).toBe('gpt-4.1');
  });
});

describe('parseModelRegistry', () => {
  it('rejects duplicate names', () => {
    const entry = { name: 'dup', capabilities: [], maxContextLength: 1024, defaults: { maxNewTokens: 1, temperature: 0 } };
    expect(() => parseModelRegistry({ models: [entry, entry] }, 'test.json')).toThrow(
      'Duplicate model name in test.json: dup'
    );
  });

  it('rejects malformed descriptors with INVALID_CONFIG', () => {
    let caught: unknown;
    try {
      parseModelRegistry({ models: [{ name: 'x' }] });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(RepoQueryError);
    expect(caught).toMatchObject({ code: ErrorCode.INVALID_CONFIG });
    expect(() => parseModelRegistry({ models: [] })).toThrow('Invalid model registry in registry');
  });

  it('reports an unreadable registry file', () => {
    expect(() => loadModelRegistry('/nonexistent/models.json')).toThrow(
      'Cannot read model registry: /nonexistent/models.json'
    );
  });
});
