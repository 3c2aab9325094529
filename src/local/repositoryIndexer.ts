/**
 * @fileOverview: Builds immutable repository snapshots (file tree + overlapping chunks)
 * @module: RepositoryIndexer
 * @keyFunctions:
 *   - RepositoryIndexer.build(): Discover, read, hash and chunk the files under a root
 *   - RepositorySnapshot.fromFiles(): Build a snapshot from in-memory file contents
 *   - RepositorySnapshot: RepositoryIndex implementation queried by the retriever
 * @dependencies:
 *   - globby: File discovery honoring .gitignore
 *   - crypto: Content hashes for files and chunks
 *   - chunker: Line-based chunking with overlap
 * @context: A snapshot is never mutated; re-indexing produces a new one that replaces the old generation atomically
 */

import globby from 'globby';
import { createHash } from 'crypto';
import { readFile, stat } from 'fs/promises';
import * as path from 'path';
import { logger } from '../utils/logger';
import { ErrorCode, RepoQueryError } from '../utils/errorHandler';
import type { CodeChunk, FileNode, RepositoryStats } from '../shared/types';
import type { RepositoryIndex } from '../shared/retrieval/types';
import { summarizeRepository } from '../shared/retrieval/metadataSummary';
import { ChunkingOptions, DEFAULT_CHUNKING, chunkText, splitLines } from './chunker';
import { CODE_EXTENSIONS, DEFAULT_IGNORE_DIRS, languageForPath } from './languages';

export interface IndexerOptions {
  chunking?: ChunkingOptions;
  maxFileBytes?: number;
  extensions?: readonly string[];
  ignoreDirs?: readonly string[];
}

export interface SourceFile {
  /** Repository-relative, '/'-separated */
  path: string;
  content: string;
}

const DEFAULT_MAX_FILE_BYTES = 1024 * 1024;

export function sha256(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}

export function formatChunkId(sequence: number): string {
  return `chunk_${String(sequence).padStart(6, '0')}`;
}

export class RepositorySnapshot implements RepositoryIndex {
  private readonly files: readonly FileNode[];
  private readonly chunks: readonly CodeChunk[];
  private readonly chunksByPath = new Map<string, CodeChunk[]>();
  private readonly chunksById = new Map<string, CodeChunk>();
  private readonly filesByPath = new Map<string, FileNode>();

  constructor(
    readonly root: string,
    files: readonly FileNode[],
    chunks: readonly CodeChunk[],
    readonly builtAt: Date = new Date()
  ) {
    this.files = Object.freeze([...files].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0)));
    this.chunks = Object.freeze([...chunks]);
    for (const file of this.files) {
      this.filesByPath.set(file.path, file);
    }
    for (const chunk of this.chunks) {
      this.chunksById.set(chunk.id, chunk);
      const bucket = this.chunksByPath.get(chunk.filePath);
      if (bucket) {
        bucket.push(chunk);
      } else {
        this.chunksByPath.set(chunk.filePath, [chunk]);
      }
    }
  }

  /**
   * Build a snapshot from file contents already in memory
   */
  static fromFiles(
    root: string,
    sources: readonly SourceFile[],
    chunking: ChunkingOptions = DEFAULT_CHUNKING
  ): RepositorySnapshot {
    const ordered = [...sources].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
    const files: FileNode[] = [];
    const chunks: CodeChunk[] = [];
    let sequence = 0;

    for (const source of ordered) {
      const language = languageForPath(source.path);
      files.push({
        path: source.path,
        name: path.posix.basename(source.path),
        extension: path.posix.extname(source.path).toLowerCase(),
        language,
        size: Buffer.byteLength(source.content, 'utf8'),
        contentHash: sha256(source.content),
        lineCount: source.content.length === 0 ? 0 : splitLines(source.content).length,
      });

      for (const span of chunkText(source.content, chunking)) {
        sequence++;
        chunks.push({
          id: formatChunkId(sequence),
          filePath: source.path,
          startLine: span.startLine,
          endLine: span.endLine,
          content: span.content,
          language,
          contentHash: sha256(span.content),
        });
      }
    }

    return new RepositorySnapshot(root, files, chunks);
  }

  listFiles(): readonly FileNode[] {
    return this.files;
  }

  getFile(filePath: string): FileNode | undefined {
    return this.filesByPath.get(filePath);
  }

  chunksOf(filePath: string): readonly CodeChunk[] {
    return this.chunksByPath.get(filePath) ?? [];
  }

  allChunks(): readonly CodeChunk[] {
    return this.chunks;
  }

  getChunk(id: string): CodeChunk | undefined {
    return this.chunksById.get(id);
  }

  stats(): RepositoryStats {
    const languages: Record<string, number> = {};
    let totalLines = 0;
    let totalBytes = 0;
    for (const file of this.files) {
      totalLines += file.lineCount;
      totalBytes += file.size;
      const language = file.language ?? 'other';
      languages[language] = (languages[language] ?? 0) + 1;
    }
    return {
      totalFiles: this.files.length,
      totalLines,
      totalBytes,
      totalChunks: this.chunks.length,
      languages,
    };
  }

  summary(): string {
    return summarizeRepository(this);
  }
}

export class RepositoryIndexer {
  private readonly chunking: ChunkingOptions;
  private readonly maxFileBytes: number;
  private readonly extensions: readonly string[];
  private readonly ignoreDirs: readonly string[];

  constructor(options: IndexerOptions = {}) {
    this.chunking = options.chunking ?? DEFAULT_CHUNKING;
    this.maxFileBytes = options.maxFileBytes ?? DEFAULT_MAX_FILE_BYTES;
    this.extensions = options.extensions ?? CODE_EXTENSIONS;
    this.ignoreDirs = options.ignoreDirs ?? DEFAULT_IGNORE_DIRS;
  }

  async discover(root: string): Promise<string[]> {
    const patterns = this.extensions.map(ext => `**/*${ext}`);
    const ignore = this.ignoreDirs.map(dir => `**/${dir}/**`);
    const found = await globby(patterns, {
      cwd: root,
      ignore,
      gitignore: true,
      dot: false,
      onlyFiles: true,
      followSymbolicLinks: false,
      caseSensitiveMatch: false,
    });
    return found.map(p => p.split(path.sep).join('/')).sort();
  }

  async build(root: string): Promise<RepositorySnapshot> {
    const absoluteRoot = path.resolve(root);
    const started = Date.now();

    const rootStats = await stat(absoluteRoot).catch((error: unknown) => {
      throw new RepoQueryError(ErrorCode.INDEX_ERROR, `Repository root not readable: ${absoluteRoot}`, {
        originalError: error instanceof Error ? error.message : String(error),
      });
    });
    if (!rootStats.isDirectory()) {
      throw new RepoQueryError(ErrorCode.INDEX_ERROR, `Repository root is not a directory: ${absoluteRoot}`);
    }

    const relativePaths = await this.discover(absoluteRoot);
    const sources: SourceFile[] = [];
    let skippedLarge = 0;
    let unreadable = 0;

    for (const relativePath of relativePaths) {
      const absolutePath = path.join(absoluteRoot, relativePath);
      try {
        const info = await stat(absolutePath);
        if (info.size > this.maxFileBytes) {
          skippedLarge++;
          continue;
        }
        const content = await readFile(absolutePath, 'utf8');
        sources.push({ path: relativePath, content });
      } catch (error) {
        unreadable++;
        logger.warn('⚠️ Skipping unreadable file', {
          path: relativePath,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    const snapshot = RepositorySnapshot.fromFiles(absoluteRoot, sources, this.chunking);
    const stats = snapshot.stats();
    logger.info('📚 Repository indexed', {
      root: absoluteRoot,
      files: stats.totalFiles,
      chunks: stats.totalChunks,
      skippedLarge,
      unreadable,
      timeMs: Date.now() - started,
    });
    return snapshot;
  }
}
