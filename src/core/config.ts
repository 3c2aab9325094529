/**
 * @fileOverview: Environment configuration validated with zod, with CLI flag overrides
 * @module: Config
 * @keyFunctions:
 *   - loadConfig(): Read env vars, apply overrides, validate and return a frozen AppConfig
 * @dependencies:
 *   - zod: Env parsing and coercion
 * @context: An invalid value throws INVALID_CONFIG naming the offending variable; nothing reads process.env after startup
 */

import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { DEFAULT_COMPLEXITY_THRESHOLDS, DEFAULT_MAX_LOOPS, DEFAULT_NUM_SAMPLES, DEFAULT_TOP_K } from '../shared/constants';
import { ErrorCode, RepoQueryError } from '../utils/errorHandler';
import { isProviderType, type ProviderType } from './openaiService';

export interface AppConfig {
  repoRoot: string;
  host: string;
  port: number;
  openai: {
    apiKey?: string;
    baseUrl?: string;
    provider: ProviderType;
    /** Unset means the provider preset */
    embeddingsModel?: string;
  };
  modelRegistryPath?: string;
  plannerModel?: string;
  judgeModel?: string;
  disableApply: boolean;
  defaultTopK: number;
  numSamples: number;
  maxLoops: number;
  chunking: {
    maxChunkChars: number;
    overlapChars: number;
  };
  maxFileBytes: number;
  generationTimeoutMs: number;
  embeddingCachePath: string;
  complexityThresholds: {
    medium: number;
    complex: number;
  };
  logLevel: 'debug' | 'info' | 'warn' | 'error';
}

export interface ConfigOverrides {
  repoRoot?: string;
  host?: string;
  port?: number;
  disableApply?: boolean;
}

const optionalString = z
  .string()
  .optional()
  .transform(value => (value && value.trim() ? value.trim() : undefined));

const booleanFlag = z
  .string()
  .optional()
  .transform((value, ctx) => {
    if (value === undefined || value === '') return false;
    const normalized = value.toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
    if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean, got "${value}"` });
    return z.NEVER;
  });

const intWithDefault = (fallback: number, min: number, max: number = Number.MAX_SAFE_INTEGER) =>
  z
    .string()
    .optional()
    .transform(value => (value === undefined || value === '' ? String(fallback) : value))
    .pipe(z.coerce.number().int().min(min).max(max));

const numberWithDefault = (fallback: number, min: number) =>
  z
    .string()
    .optional()
    .transform(value => (value === undefined || value === '' ? String(fallback) : value))
    .pipe(z.coerce.number().min(min));

export const EnvSchema = z.object({
  REPO_ROOT: optionalString,
  HOST: optionalString,
  PORT: intWithDefault(8000, 0, 65535),
  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: optionalString.pipe(z.string().url().optional()),
  OPENAI_PROVIDER: optionalString,
  OPENAI_EMBEDDINGS_MODEL: optionalString,
  MODEL_REGISTRY_PATH: optionalString,
  PLANNER_MODEL: optionalString,
  JUDGE_MODEL: optionalString,
  DISABLE_APPLY: booleanFlag,
  DEFAULT_TOP_K: intWithDefault(DEFAULT_TOP_K, 1, 100),
  NUM_SAMPLES: intWithDefault(DEFAULT_NUM_SAMPLES, 1, 8),
  MAX_LOOPS: intWithDefault(DEFAULT_MAX_LOOPS, 1, 5),
  MAX_CHUNK_CHARS: intWithDefault(1600, 1),
  CHUNK_OVERLAP: intWithDefault(200, 0),
  MAX_FILE_BYTES: intWithDefault(1024 * 1024, 1),
  GENERATION_TIMEOUT_MS: intWithDefault(120000, 1),
  EMBEDDING_CACHE_PATH: optionalString,
  COMPLEXITY_MEDIUM_THRESHOLD: numberWithDefault(DEFAULT_COMPLEXITY_THRESHOLDS.medium, 0),
  COMPLEXITY_COMPLEX_THRESHOLD: numberWithDefault(DEFAULT_COMPLEXITY_THRESHOLDS.complex, 0),
  LOG_LEVEL: z
    .string()
    .optional()
    .transform(value => (value ? value.toLowerCase() : 'info'))
    .pipe(z.enum(['debug', 'info', 'warn', 'error'])),
});

export const DEFAULT_CACHE_DIR = path.join(os.homedir(), '.repo-query');

function invalid(variable: string, message: string): RepoQueryError {
  return new RepoQueryError(ErrorCode.INVALID_CONFIG, `Invalid configuration for ${variable}: ${message}`, {
    variable,
  });
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): Readonly<AppConfig> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue ? String(issue.path[0] ?? 'environment') : 'environment';
    throw invalid(variable, issue?.message ?? 'invalid value');
  }
  const vars = parsed.data;

  const provider = vars.OPENAI_PROVIDER ?? (vars.OPENAI_BASE_URL ? 'custom' : 'openai');
  if (!isProviderType(provider)) {
    throw invalid('OPENAI_PROVIDER', `unknown provider "${provider}"`);
  }

  if (vars.CHUNK_OVERLAP >= vars.MAX_CHUNK_CHARS) {
    throw invalid('CHUNK_OVERLAP', 'must be smaller than MAX_CHUNK_CHARS');
  }
  if (vars.COMPLEXITY_MEDIUM_THRESHOLD > vars.COMPLEXITY_COMPLEX_THRESHOLD) {
    throw invalid('COMPLEXITY_MEDIUM_THRESHOLD', 'must not exceed COMPLEXITY_COMPLEX_THRESHOLD');
  }
  if (overrides.port !== undefined && (!Number.isInteger(overrides.port) || overrides.port < 0 || overrides.port > 65535)) {
    throw invalid('--port', `expected an integer between 0 and 65535, got ${overrides.port}`);
  }

  const config: AppConfig = {
    repoRoot: path.resolve(overrides.repoRoot ?? vars.REPO_ROOT ?? process.cwd()),
    host: overrides.host ?? vars.HOST ?? '127.0.0.1',
    port: overrides.port ?? vars.PORT,
    openai: {
      apiKey: vars.OPENAI_API_KEY,
      baseUrl: vars.OPENAI_BASE_URL,
      provider,
      embeddingsModel: vars.OPENAI_EMBEDDINGS_MODEL,
    },
    modelRegistryPath: vars.MODEL_REGISTRY_PATH,
    plannerModel: vars.PLANNER_MODEL,
    judgeModel: vars.JUDGE_MODEL,
    disableApply: overrides.disableApply ?? vars.DISABLE_APPLY,
    defaultTopK: vars.DEFAULT_TOP_K,
    numSamples: vars.NUM_SAMPLES,
    maxLoops: vars.MAX_LOOPS,
    chunking: {
      maxChunkChars: vars.MAX_CHUNK_CHARS,
      overlapChars: vars.CHUNK_OVERLAP,
    },
    maxFileBytes: vars.MAX_FILE_BYTES,
    generationTimeoutMs: vars.GENERATION_TIMEOUT_MS,
    embeddingCachePath: vars.EMBEDDING_CACHE_PATH ?? path.join(DEFAULT_CACHE_DIR, 'embeddings.db'),
    complexityThresholds: {
      medium: vars.COMPLEXITY_MEDIUM_THRESHOLD,
      complex: vars.COMPLEXITY_COMPLEX_THRESHOLD,
    },
    logLevel: vars.LOG_LEVEL,
  };

  return Object.freeze(config);
}
