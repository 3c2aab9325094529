#!/usr/bin/env node

/**
 * repo-query CLI
 *
 * Starts the HTTP query service for one repository. Flags override the
 * matching environment variables.
 */

import type { ConfigOverrides } from './core/config';
import { ErrorCode, RepoQueryError } from './utils/errorHandler';

export interface CliArgs {
  overrides: ConfigOverrides;
  help: boolean;
  version: boolean;
}

interface EnvVarSpec {
  name: string;
  defaultValue: string;
  description: string;
}

const ENVIRONMENT_VARIABLES: EnvVarSpec[] = [
  { name: 'REPO_ROOT', defaultValue: 'current directory', description: 'Repository to index' },
  { name: 'HOST / PORT', defaultValue: '127.0.0.1 / 8000', description: 'Listen address' },
  { name: 'OPENAI_API_KEY', defaultValue: 'unset', description: 'Key for generation and embeddings' },
  { name: 'OPENAI_BASE_URL', defaultValue: 'OpenAI', description: 'Any OpenAI-compatible endpoint' },
  { name: 'OPENAI_EMBEDDINGS_MODEL', defaultValue: 'provider preset', description: 'Embedding model' },
  { name: 'MODEL_REGISTRY_PATH', defaultValue: 'bundled models.json', description: 'Model descriptor registry' },
  { name: 'PLANNER_MODEL / JUDGE_MODEL', defaultValue: 'selected model', description: 'Role overrides' },
  { name: 'DISABLE_APPLY', defaultValue: 'false', description: 'Reject POST /apply' },
  { name: 'DEFAULT_TOP_K', defaultValue: '16', description: 'Chunks retrieved per query' },
  { name: 'NUM_SAMPLES / MAX_LOOPS', defaultValue: '2 / 2', description: 'Refinement defaults' },
  { name: 'MAX_CHUNK_CHARS / CHUNK_OVERLAP', defaultValue: '1600 / 200', description: 'Chunking' },
  { name: 'MAX_FILE_BYTES', defaultValue: '1048576', description: 'Larger files are not indexed' },
  { name: 'GENERATION_TIMEOUT_MS', defaultValue: '120000', description: 'Per generation call' },
  { name: 'EMBEDDING_CACHE_PATH', defaultValue: '~/.repo-query/embeddings.db', description: 'SQLite cache' },
  { name: 'LOG_LEVEL', defaultValue: 'info', description: 'debug, info, warn or error' },
];

export function parseArgs(argv: string[]): CliArgs {
  const overrides: ConfigOverrides = {};
  let help = false;
  let version = false;

  const valueOf = (flag: string, i: number): string => {
    const value = argv[i + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new RepoQueryError(ErrorCode.INVALID_CONFIG, `Missing value for ${flag}`);
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--repo':
        overrides.repoRoot = valueOf(arg, i);
        i++;
        break;
      case '--host':
        overrides.host = valueOf(arg, i);
        i++;
        break;
      case '--port': {
        const raw = valueOf(arg, i);
        const port = Number(raw);
        if (!/^\d+$/.test(raw) || port > 65535) {
          throw new RepoQueryError(ErrorCode.INVALID_CONFIG, `Invalid value for --port: ${raw}`);
        }
        overrides.port = port;
        i++;
        break;
      }
      case '--disable-apply':
        overrides.disableApply = true;
        break;
      case '--help':
      case '-h':
        help = true;
        break;
      case '--version':
      case '-v':
        version = true;
        break;
      default:
        throw new RepoQueryError(ErrorCode.INVALID_CONFIG, `Unknown argument: ${arg}`);
    }
  }

  return { overrides, help, version };
}

function showHelp(): void {
  console.log('repo-query: questions and patch proposals over a source repository');
  console.log('');
  console.log('Usage: repo-query [--repo <path>] [--host <host>] [--port <port>] [--disable-apply]');
  console.log('');
  console.log('Endpoints: POST /query, POST /query_plus, POST /apply, POST /reindex, GET /health, GET /stats');
  console.log('');
  console.log('Environment:');
  const width = Math.max(...ENVIRONMENT_VARIABLES.map(v => v.name.length));
  for (const spec of ENVIRONMENT_VARIABLES) {
    console.log(`  ${spec.name.padEnd(width)}  ${spec.description} (default: ${spec.defaultValue})`);
  }
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    showHelp();
    return;
  }

  // The service stack loads only after --help is handled
  const { RepoQueryService, loadConfig } = await import('./index');
  const { readPackageVersion } = await import('./server/app');
  const { logger } = await import('./utils/logger');

  if (args.version) {
    console.log(`repo-query v${readPackageVersion()}`);
    return;
  }

  const service = RepoQueryService.create(loadConfig(process.env, args.overrides));

  const shutdown = (signal: string) => {
    logger.info(`🔄 Received ${signal}, shutting down gracefully...`);
    service
      .stop()
      .then(() => process.exit(0))
      .catch(error => {
        logger.error('❌ Error during shutdown', { error: error instanceof Error ? error.message : String(error) });
        process.exit(1);
      });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await service.start();
}

if (require.main === module) {
  main().catch(error => {
    console.error('❌ Failed to start repo-query:', error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
}
