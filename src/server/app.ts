/**
 * @fileOverview: Express HTTP surface for query, refinement, patch application and index status
 * @module: QueryServer
 * @keyFunctions:
 *   - createApp(): Routes, request ids and the error-to-status mapping
 *   - QueryServer.start()/stop(): Listen on the configured address and close cleanly
 *   - formatQueryResponse(): Wire shape of /query and /query_plus responses
 * @dependencies:
 *   - express: HTTP routing and JSON bodies
 *   - uuid: Per-request ids echoed in X-Request-Id
 *   - zod (via validation): Request body schemas
 * @context: Handlers never hold index state themselves; every query runs under the index manager's read lock
 */

import * as fs from 'fs';
import * as path from 'path';
import { Server } from 'http';
import { AddressInfo } from 'net';
import express, { NextFunction, Request, RequestHandler, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { PatchApplier } from '../shared/types';
import type { QueryPipeline, QueryResult, RefinedQueryResult } from '../core/queryPipeline';
import type { ModelSelector } from '../core/modelSelector';
import { ApplyRequestSchema, QueryPlusRequestSchema, QueryRequestSchema, ValidationHelper } from '../core/validation';
import type { IndexManager } from '../local/indexManager';
import { telemetry } from '../shared/telemetry';
import { ErrorCode, ErrorHandler, PatchError, RepoQueryError } from '../utils/errorHandler';
import { logger } from '../utils/logger';

export interface ServerDeps {
  pipeline: QueryPipeline;
  indexManager: IndexManager;
  selector: ModelSelector;
  patchApplier: PatchApplier;
  disableApply: boolean;
  defaultTopK?: number;
  defaultNumSamples?: number;
  defaultMaxLoops?: number;
}

export interface ListenOptions {
  host: string;
  port: number;
}

const PackageSchema = z.object({ version: z.string() });

export function readPackageVersion(): string {
  try {
    const raw: unknown = JSON.parse(fs.readFileSync(path.join(__dirname, '..', '..', 'package.json'), 'utf8'));
    const parsed = PackageSchema.safeParse(raw);
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

function asyncHandler(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

export function formatQueryResponse(result: QueryResult): Record<string, unknown> {
  const { analysis, retrieval } = result;
  return {
    model: result.model,
    took_ms: result.tookMs,
    retrieved: result.retrieved,
    result: result.result,
    query_analysis: {
      intent: analysis.intent,
      complexity: analysis.complexity,
      complexity_score: analysis.complexityScore,
      confidence: analysis.confidence,
      file_references: analysis.fileReferences.map(ref => ({
        filename: ref.filename,
        path: ref.path ?? null,
        line_number: ref.lineNumber ?? null,
        confidence: ref.confidence,
        match: ref.match,
      })),
      entities: analysis.entities,
      sub_intents: analysis.subIntents.map(sub => ({ kind: sub.kind, text: sub.text, intent: sub.intent })),
      statistics: analysis.statistics,
      exploratory: analysis.exploratory,
    },
    retrieval: {
      strategy: retrieval.strategy,
      content_strategy: retrieval.contentStrategy ?? null,
      fallback_from: retrieval.fallbackFrom ?? null,
      files_involved: retrieval.filesInvolved,
      chunks: retrieval.chunks.map(chunk => ({
        id: chunk.id,
        path: chunk.filePath,
        start_line: chunk.startLine,
        end_line: chunk.endLine,
        score: chunk.score,
      })),
    },
    degraded: result.degraded,
    generation: result.generation,
  };
}

export function formatRefinedResponse(result: RefinedQueryResult): Record<string, unknown> {
  return {
    ...formatQueryResponse(result),
    spec: result.spec,
    verdict: result.verdict,
    loops: result.loops,
  };
}

export function createApp(deps: ServerDeps): express.Application {
  const app = express();
  const version = readPackageVersion();

  app.use(express.json({ limit: '5mb' }));

  app.use((req, res, next) => {
    const requestId = uuidv4();
    res.locals.requestId = requestId;
    res.setHeader('X-Request-Id', requestId);
    const started = Date.now();
    res.on('finish', () => {
      logger.debug('HTTP request', {
        requestId,
        method: req.method,
        path: req.path,
        status: res.statusCode,
        timeMs: Date.now() - started,
      });
    });
    next();
  });

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version,
      repo: deps.indexManager.root,
      generation: deps.indexManager.generation,
    });
  });

  app.get('/stats', (_req, res) => {
    const current = deps.indexManager.snapshot();
    res.json({
      repo_root: deps.indexManager.root,
      generation: deps.indexManager.generation,
      indexer: current ? current.snapshot.stats() : null,
      models: deps.selector.listModels(),
      telemetry: telemetry.getStats(),
    });
  });

  app.post(
    '/query',
    asyncHandler(async (req, res) => {
      const body = ValidationHelper.validateInput(QueryRequestSchema, withDefaults(req.body, deps), '/query');
      const result = await deps.pipeline.run(body.prompt, {
        topK: body.top_k,
        maxNewTokens: body.max_new_tokens,
        temperature: body.temperature,
      });
      res.json(formatQueryResponse(result));
    })
  );

  app.post(
    '/query_plus',
    asyncHandler(async (req, res) => {
      const body = ValidationHelper.validateInput(
        QueryPlusRequestSchema,
        withDefaults(req.body, deps),
        '/query_plus'
      );
      const result = await deps.pipeline.runRefined(body.prompt, {
        topK: body.top_k,
        maxNewTokens: body.max_new_tokens,
        temperature: body.temperature,
        numSamples: body.num_samples,
        maxLoops: body.max_loops,
      });
      res.json(formatRefinedResponse(result));
    })
  );

  app.post(
    '/apply',
    asyncHandler(async (req, res) => {
      if (deps.disableApply) {
        throw new RepoQueryError(ErrorCode.APPLY_DISABLED, 'Patch application is disabled on this server');
      }
      const body = ValidationHelper.validateInput(ApplyRequestSchema, req.body, '/apply');
      const result = await deps.patchApplier.apply(body.diff);
      res.json({ ok: true, files_changed: result.changedFiles });
    })
  );

  app.post(
    '/reindex',
    asyncHandler(async (_req, res) => {
      const next = await deps.indexManager.rebuild();
      res.json({ ok: true, generation: next.generation, stats: next.snapshot.stats() });
    })
  );

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const requestId = typeof res.locals.requestId === 'string' ? res.locals.requestId : undefined;

    // express.json() rejects malformed bodies with a SyntaxError carrying status 400
    if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
      res.status(400).json({ error: ErrorCode.VALIDATION_ERROR, message: 'Request body is not valid JSON' });
      return;
    }

    const serviceError = ErrorHandler.handleError(
      err,
      { requestId, method: req.method, path: req.path },
      { rethrow: false, logLevel: err instanceof RepoQueryError ? 'warn' : 'error', includeStack: false }
    );
    const status = ErrorHandler.toHttpStatus(serviceError.code);
    const body: Record<string, unknown> = {
      error: serviceError.code,
      message: serviceError.message,
    };
    if (err instanceof PatchError) {
      body.exit_code = err.exitCode;
      body.output = err.output;
    }
    res.status(status).json(body);
  });

  return app;
}

function withDefaults(body: unknown, deps: ServerDeps): unknown {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) return body;
  return {
    top_k: deps.defaultTopK,
    num_samples: deps.defaultNumSamples,
    max_loops: deps.defaultMaxLoops,
    ...body,
  };
}

export class QueryServer {
  private server: Server | null = null;
  readonly app: express.Application;

  constructor(deps: ServerDeps) {
    this.app = createApp(deps);
  }

  async start(options: ListenOptions): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(options.port, options.host);
      server.once('listening', () => {
        this.server = server;
        const address = server.address();
        if (address === null || typeof address === 'string') {
          reject(new RepoQueryError(ErrorCode.INTERNAL_ERROR, 'Server is not listening on a TCP address'));
          return;
        }
        logger.info('🚀 Server listening', { host: address.address, port: address.port });
        resolve(address);
      });
      server.once('error', reject);
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;
    await new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
    });
    logger.info('🛑 Server stopped');
  }
}
