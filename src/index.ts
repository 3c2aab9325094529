/**
 * @fileOverview: Service wiring from configuration to a listening HTTP server
 * @module: RepoQueryService
 * @keyFunctions:
 *   - RepoQueryService.create(): Build the indexer, embedding cache, generator, pipeline and server
 *   - start(): First index build (fatal on failure), then listen
 *   - stop(): Close the server and the embedding cache
 * @dependencies:
 *   - openai: Generation and embeddings through OpenAIService
 *   - better-sqlite3: Embedding cache through EmbeddingStorage
 * @context: A missing API key is not fatal; generation degrades and retrieval falls back from semantic search
 */

import { AddressInfo } from 'net';
import { AppConfig } from './core/config';
import { ModelSelector, loadModelRegistry } from './core/modelSelector';
import { OpenAIService, UnconfiguredGenerator, getOpenAIService } from './core/openaiService';
import { QueryAnalyzer } from './core/queryAnalyzer';
import { QueryPipeline } from './core/queryPipeline';
import { OpenAIEmbeddingProvider } from './local/embeddingGenerator';
import { EmbeddingStorage } from './local/embeddingStorage';
import { IndexManager, createIndexBuilder } from './local/indexManager';
import { SystemPatchApplier } from './local/patchApplier';
import { RepositoryIndexer } from './local/repositoryIndexer';
import { QueryServer } from './server/app';
import type { GenerationInterface } from './shared/types';
import { logger } from './utils/logger';

export class RepoQueryService {
  private constructor(
    readonly config: Readonly<AppConfig>,
    readonly indexManager: IndexManager,
    readonly server: QueryServer,
    private readonly storage: EmbeddingStorage | null
  ) {}

  static create(config: Readonly<AppConfig>): RepoQueryService {
    const registry = loadModelRegistry(config.modelRegistryPath);
    const selector = new ModelSelector(registry);

    let openai: OpenAIService | null = null;
    if (config.openai.apiKey) {
      openai = getOpenAIService({
        apiKey: config.openai.apiKey,
        provider: config.openai.provider,
        model: registry[0].name,
        embeddingsModel: config.openai.embeddingsModel,
        baseUrl: config.openai.baseUrl,
      });
    } else {
      logger.warn('⚠️ OPENAI_API_KEY not set: answers will be context summaries and semantic search is disabled');
    }
    const generator: GenerationInterface = openai ?? new UnconfiguredGenerator();

    const storage = openai ? new EmbeddingStorage(config.embeddingCachePath) : null;
    const indexer = new RepositoryIndexer({
      chunking: config.chunking,
      maxFileBytes: config.maxFileBytes,
    });
    const indexManager = new IndexManager(
      config.repoRoot,
      createIndexBuilder({
        indexer,
        embeddings: openai ? new OpenAIEmbeddingProvider(openai) : undefined,
        storage: storage ?? undefined,
      })
    );

    const pipeline = new QueryPipeline({
      indexManager,
      analyzer: new QueryAnalyzer({ thresholds: config.complexityThresholds }),
      selector,
      generator,
      generationTimeoutMs: config.generationTimeoutMs,
      plannerModel: config.plannerModel,
      judgeModel: config.judgeModel,
    });

    const server = new QueryServer({
      pipeline,
      indexManager,
      selector,
      patchApplier: new SystemPatchApplier(config.repoRoot),
      disableApply: config.disableApply,
      defaultTopK: config.defaultTopK,
      defaultNumSamples: config.numSamples,
      defaultMaxLoops: config.maxLoops,
    });

    logger.info('⚙️ Service configured', {
      repoRoot: config.repoRoot,
      models: selector.listModels(),
      applyEnabled: !config.disableApply,
      logLevel: config.logLevel,
    });

    return new RepoQueryService(config, indexManager, server, storage);
  }

  async start(): Promise<AddressInfo> {
    await this.indexManager.initialize();
    return this.server.start({ host: this.config.host, port: this.config.port });
  }

  async stop(): Promise<void> {
    await this.server.stop();
    this.storage?.close();
  }
}

export { loadConfig } from './core/config';
export type { AppConfig, ConfigOverrides } from './core/config';
export { QueryAnalyzer } from './core/queryAnalyzer';
export { ContextRetriever, selectStrategy } from './shared/retrieval/retriever';
export { ModelSelector, selectModel } from './core/modelSelector';
export { RefinementOrchestrator } from './agents/orchestrator';
export { QueryPipeline } from './core/queryPipeline';
export * from './shared/types';
export * from './shared/constants';
