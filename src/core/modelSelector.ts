/**
 * @fileOverview: Additive scoring of model descriptors against a query analysis
 * @module: ModelSelector
 * @keyFunctions:
 *   - selectModel(): Highest-scoring descriptor, ties to registry order
 *   - scoreModel(): Capability match + complexity/context bonus + code-reference bonus
 *   - loadModelRegistry(): Validated registry from the bundled or configured JSON file
 * @dependencies:
 *   - zod: Registry validation
 * @context: The registry order doubles as the default preference list
 */

import * as fs from 'fs';
import { z } from 'zod';
import bundledModels from './models.json';
import { MODEL_SCORES } from '../shared/constants';
import type { Intent, ModelDescriptor, QueryAnalysis } from '../shared/types';
import { logger } from '../utils/logger';
import { ErrorCode, RepoQueryError } from '../utils/errorHandler';

export const INTENT_CAPABILITY: Readonly<Record<Intent, string>> = {
  ANALYSIS: 'code_analysis',
  DEBUG: 'debugging',
  CHANGES: 'code_generation',
  REVIEW: 'code_review',
  SEARCH: 'code_search',
  GENERAL: 'general_qa',
};

const ModelDescriptorSchema = z.object({
  name: z.string().min(1),
  capabilities: z.array(z.string()),
  maxContextLength: z.number().int().positive(),
  defaults: z.object({
    maxNewTokens: z.number().int().positive(),
    temperature: z.number().min(0).max(2),
  }),
});

const RegistrySchema = z.object({
  models: z.array(ModelDescriptorSchema).min(1),
});

export interface ModelScore {
  total: number;
  capability: number;
  complexity: number;
  codeReference: number;
}

export function parseModelRegistry(input: unknown, source: string = 'registry'): ModelDescriptor[] {
  const parsed = RegistrySchema.safeParse(input);
  if (!parsed.success) {
    throw new RepoQueryError(ErrorCode.INVALID_CONFIG, `Invalid model registry in ${source}`, {
      issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  const names = new Set<string>();
  for (const model of parsed.data.models) {
    if (names.has(model.name)) {
      throw new RepoQueryError(ErrorCode.INVALID_CONFIG, `Duplicate model name in ${source}: ${model.name}`);
    }
    names.add(model.name);
  }
  return parsed.data.models;
}

/**
 * Load the registry from a JSON file, or the bundled registry when no path is given
 */
export function loadModelRegistry(registryPath?: string): ModelDescriptor[] {
  if (!registryPath) {
    return parseModelRegistry(bundledModels, 'bundled models.json');
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(registryPath, 'utf8'));
  } catch (error) {
    throw new RepoQueryError(ErrorCode.INVALID_CONFIG, `Cannot read model registry: ${registryPath}`, {
      originalError: error instanceof Error ? error.message : String(error),
    });
  }
  const models = parseModelRegistry(raw, registryPath);
  logger.info('🧠 Model registry loaded', { path: registryPath, models: models.map(m => m.name) });
  return models;
}

export function scoreModel(model: ModelDescriptor, analysis: QueryAnalysis): ModelScore {
  const capability = model.capabilities.includes(INTENT_CAPABILITY[analysis.intent])
    ? MODEL_SCORES.capabilityMatch
    : 0;
  const tierWeight = MODEL_SCORES.tierWeight[analysis.complexity];
  const complexity = tierWeight * Math.log2(Math.max(1, model.maxContextLength / 1024));
  const codeReference =
    analysis.fileReferences.length > 0 && model.capabilities.includes('code')
      ? MODEL_SCORES.codeReferenceBonus
      : 0;

  return {
    total: capability + complexity + codeReference,
    capability,
    complexity,
    codeReference,
  };
}

export function selectModel(analysis: QueryAnalysis, registry: readonly ModelDescriptor[]): ModelDescriptor {
  if (registry.length === 0) {
    throw new RepoQueryError(ErrorCode.INVALID_CONFIG, 'Model registry is empty');
  }

  let best = registry[0];
  let bestScore = scoreModel(best, analysis).total;
  for (const model of registry.slice(1)) {
    const score = scoreModel(model, analysis).total;
    // Strictly greater: earlier registry entries win ties
    if (score > bestScore) {
      best = model;
      bestScore = score;
    }
  }
  return best;
}

export class ModelSelector {
  private readonly registry: readonly ModelDescriptor[];

  constructor(registry: readonly ModelDescriptor[]) {
    if (registry.length === 0) {
      throw new RepoQueryError(ErrorCode.INVALID_CONFIG, 'Model registry is empty');
    }
    this.registry = Object.freeze([...registry]);
  }

  select(analysis: QueryAnalysis): ModelDescriptor {
    const selected = selectModel(analysis, this.registry);
    logger.debug('Model selected', {
      model: selected.name,
      intent: analysis.intent,
      complexity: analysis.complexity,
    });
    return selected;
  }

  listModels(): string[] {
    return this.registry.map(model => model.name);
  }
}
