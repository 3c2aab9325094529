/**
 * @fileOverview: OpenAI-compatible generation and embedding client
 * @module: OpenAIService
 * @keyFunctions:
 *   - generate(): Role-tagged chat completion returning raw text (GenerationInterface)
 *   - createEmbeddings(): Batch embeddings for chunk and query text
 *   - getOpenAIService(): Lazily constructed process-wide instance
 * @dependencies:
 *   - openai: Official OpenAI SDK
 *   - logger: Logging utilities
 * @context: Any endpoint that speaks the OpenAI chat/embeddings protocol works; provider presets only pick default base URLs and models
 */

import OpenAI from 'openai';
import { logger } from '../utils/logger';
import { ErrorCode, ErrorHandler, GenerationError } from '../utils/errorHandler';
import type { GenerationInterface, GenerationRequest } from '../shared/types';

export type ProviderType = 'openai' | 'azure' | 'together' | 'openrouter' | 'groq' | 'custom';

interface ProviderConfig {
  name: string;
  defaultModel: string;
  defaultEmbeddingsModel: string;
  baseUrl?: string;
}

export interface OpenAIServiceConfig {
  apiKey: string;
  provider: ProviderType;
  model?: string;
  embeddingsModel?: string;
  baseUrl?: string;
  organization?: string;
  timeoutMs?: number;
  maxRetries?: number;
}

const PROVIDERS: Record<ProviderType, ProviderConfig> = {
  openai: {
    name: 'OpenAI',
    defaultModel: 'gpt-4o-mini',
    defaultEmbeddingsModel: 'text-embedding-3-small',
    baseUrl: 'https://api.openai.com/v1',
  },
  azure: {
    name: 'Azure OpenAI',
    defaultModel: 'gpt-4o-mini',
    defaultEmbeddingsModel: 'text-embedding-3-small',
  },
  together: {
    name: 'Together AI',
    defaultModel: 'Qwen/Qwen2.5-Coder-32B-Instruct',
    defaultEmbeddingsModel: 'BAAI/bge-base-en-v1.5',
    baseUrl: 'https://api.together.xyz/v1',
  },
  openrouter: {
    name: 'OpenRouter',
    defaultModel: 'openrouter/auto',
    defaultEmbeddingsModel: 'text-embedding-3-small',
    baseUrl: 'https://openrouter.ai/api/v1',
  },
  groq: {
    name: 'Groq',
    defaultModel: 'llama-3.1-8b-instant',
    defaultEmbeddingsModel: 'text-embedding-3-small',
    baseUrl: 'https://api.groq.com/openai/v1',
  },
  custom: {
    name: 'Custom Provider',
    defaultModel: 'gpt-4o-mini',
    defaultEmbeddingsModel: 'text-embedding-3-small',
  },
};

const PROVIDER_TYPES: readonly ProviderType[] = ['openai', 'azure', 'together', 'openrouter', 'groq', 'custom'];

export function isProviderType(value: string): value is ProviderType {
  return PROVIDER_TYPES.some(provider => provider === value);
}

/**
 * Resolve provider by base URL for common OpenAI-compatible services
 */
export function resolveProvider(provider: ProviderType, baseUrl?: string): ProviderType {
  if (!baseUrl || (provider !== 'openai' && provider !== 'custom')) return provider;
  let host: string;
  try {
    host = new URL(baseUrl).host.toLowerCase();
  } catch {
    return provider;
  }
  if (host.includes('openrouter.ai')) return 'openrouter';
  if (host.includes('groq.com')) return 'groq';
  if (host.includes('together.xyz')) return 'together';
  if (host.includes('azure')) return 'azure';
  if (host.includes('openai.com')) return 'openai';
  return 'custom';
}

export class OpenAIService implements GenerationInterface {
  private readonly client: OpenAI;
  private readonly providerConfig: ProviderConfig;
  private readonly model: string;
  private readonly embeddingsModel: string;

  constructor(config: OpenAIServiceConfig) {
    const requestedBase = config.baseUrl || PROVIDERS[config.provider].baseUrl;
    this.providerConfig = PROVIDERS[resolveProvider(config.provider, requestedBase)];
    const baseUrl = requestedBase || 'https://api.openai.com/v1';

    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: baseUrl,
      organization: config.organization,
      timeout: config.timeoutMs,
      maxRetries: config.maxRetries ?? 2,
    });

    this.model = config.model || this.providerConfig.defaultModel;
    this.embeddingsModel = config.embeddingsModel || this.providerConfig.defaultEmbeddingsModel;

    logger.info('OpenAI Service initialized', {
      provider: this.providerConfig.name,
      model: this.model,
      embeddingsModel: this.embeddingsModel,
      baseUrl,
    });
  }

  /**
   * One chat completion for a pipeline role; rejects with GenerationError on failure or empty output
   */
  async generate(request: GenerationRequest): Promise<string> {
    const model = request.params.model || this.model;
    const started = Date.now();

    logger.debug('Creating chat completion', {
      role: request.role,
      provider: this.providerConfig.name,
      model,
      maxTokens: request.params.maxNewTokens,
      temperature: request.params.temperature,
    });

    let response: OpenAI.Chat.Completions.ChatCompletion;
    try {
      response = await this.client.chat.completions.create({
        model,
        messages: [
          { role: 'system', content: request.system },
          { role: 'user', content: request.user },
        ],
        max_tokens: request.params.maxNewTokens,
        temperature: request.params.temperature,
      });
    } catch (error) {
      const normalized = ErrorHandler.createError(error, { role: request.role, model });
      logger.error('Chat completion failed', {
        role: request.role,
        provider: this.providerConfig.name,
        model,
        code: normalized.code,
        error: error instanceof Error ? error.message : String(error),
      });
      const code =
        normalized.code === ErrorCode.GENERATION_TIMEOUT
          ? ErrorCode.GENERATION_TIMEOUT
          : ErrorCode.GENERATION_FAILED;
      throw new GenerationError(code, request.role, `Generation failed for ${request.role}`, {
        model,
        originalError: error instanceof Error ? error.message : String(error),
      });
    }

    const choice = response.choices[0];
    const content = choice?.message?.content ?? '';

    if (choice?.finish_reason === 'length') {
      logger.warn('Chat completion truncated by max_tokens', {
        role: request.role,
        model,
        usedMaxTokens: request.params.maxNewTokens ?? null,
      });
    }

    if (content.trim().length === 0) {
      throw new GenerationError(ErrorCode.GENERATION_FAILED, request.role, 'Model returned empty output', {
        model,
        finishReason: choice?.finish_reason ?? null,
      });
    }

    logger.info('Chat completion successful', {
      role: request.role,
      model,
      usage: response.usage,
      timeMs: Date.now() - started,
    });
    return content;
  }

  async createEmbeddings(texts: string[]): Promise<number[][]> {
    const response = await this.client.embeddings.create({
      model: this.embeddingsModel,
      input: texts,
    });

    if (!Array.isArray(response.data) || response.data.length !== texts.length) {
      throw new Error(
        `Invalid embeddings response: expected ${texts.length} vectors, got ${response.data?.length ?? 0}`
      );
    }

    return [...response.data]
      .sort((a, b) => a.index - b.index)
      .map(item => item.embedding);
  }

  getEmbeddingsModel(): string {
    return this.embeddingsModel;
  }
}

let _openaiServiceInstance: OpenAIService | null = null;

export function getOpenAIService(config: OpenAIServiceConfig): OpenAIService {
  if (!_openaiServiceInstance) {
    _openaiServiceInstance = new OpenAIService(config);
  }
  return _openaiServiceInstance;
}

/**
 * Generator used when no API key is configured; every call fails, so answers degrade to context summaries
 */
export class UnconfiguredGenerator implements GenerationInterface {
  async generate(request: GenerationRequest): Promise<string> {
    throw new GenerationError(ErrorCode.MISSING_CONFIG, request.role, 'OPENAI_API_KEY is not configured');
  }
}
