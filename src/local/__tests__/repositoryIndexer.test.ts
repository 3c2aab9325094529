/**
 * Tests for repository snapshots and file discovery
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { RepositoryIndexer, RepositorySnapshot, formatChunkId, sha256 } from '../repositoryIndexer';
import { ErrorCode } from '../../utils/errorHandler';
import { buildSnapshot, lines } from '../../__tests__/utils/fixtures';

jest.mock('../../utils/logger', () => ({
  logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

describe('RepositorySnapshot', () => {
  const snapshot = buildSnapshot({
    'src/a.ts': lines('a', 3),
    'README.md': '# Title\n',
  });

  it('orders files by path and numbers chunks in that order', () => {
    expect(snapshot.listFiles().map(file => file.path)).toEqual(['README.md', 'src/a.ts']);
    expect(snapshot.allChunks().map(chunk => [chunk.id, chunk.filePath])).toEqual([
      ['chunk_000001', 'README.md'],
      ['chunk_000002', 'src/a.ts'],
    ]);
  });

  it('records per-file metadata', () => {
    expect(snapshot.getFile('src/a.ts')).toEqual({
      path: 'src/a.ts',
      name: 'a.ts',
      extension: '.ts',
      language: 'typescript',
      size: 12,
      contentHash: sha256(lines('a', 3)),
      lineCount: 3,
    });
  });

  it('looks chunks up by id and by file', () => {
    expect(snapshot.getChunk('chunk_000002')?.content).toBe('a 1\na 2\na 3');
    expect(snapshot.chunksOf('src/a.ts')).toHaveLength(1);
    expect(snapshot.chunksOf('missing.ts')).toEqual([]);
    expect(snapshot.getChunk('chunk_999999')).toBeUndefined();
  });

  it('aggregates statistics by language', () => {
    expect(snapshot.stats()).toEqual({
      totalFiles: 2,
      totalLines: 4,
      totalBytes: 20,
      totalChunks: 2,
      languages: { markdown: 1, typescript: 1 },
    });
  });

  it('counts unknown extensions as other and empty files as zero lines', () => {
    const mixed = RepositorySnapshot.fromFiles('/repo', [
      { path: 'Makefile.custom', content: 'all:\n' },
      { path: 'empty.ts', content: '' },
    ]);
    expect(mixed.stats().languages).toEqual({ other: 1, typescript: 1 });
    expect(mixed.getFile('empty.ts')?.lineCount).toBe(0);
    expect(mixed.chunksOf('empty.ts')).toEqual([]);
  });

  it('formats chunk ids with a fixed width', () => {
    expect(formatChunkId(42)).toBe('chunk_000042');
  });
});

describe('RepositoryIndexer', () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'repo-indexer-'));
    fs.mkdirSync(path.join(root, 'src'));
    fs.mkdirSync(path.join(root, 'node_modules', 'dep'), { recursive: true });
    fs.writeFileSync(path.join(root, 'src', 'a.ts'), 'const a=1\n');
    fs.writeFileSync(path.join(root, 'big.ts'), 'x'.repeat(50));
    fs.writeFileSync(path.join(root, 'notes.bin'), 'binary');
    fs.writeFileSync(path.join(root, 'node_modules', 'dep', 'index.js'), 'module.exports = 1;\n');
    fs.writeFileSync(path.join(root, 'generated.ts'), 'export {};\n');
    fs.writeFileSync(path.join(root, '.gitignore'), 'generated.ts\n');
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('discovers source files, honoring ignore dirs and .gitignore', async () => {
    const indexer = new RepositoryIndexer();
    expect(await indexer.discover(root)).toEqual(['big.ts', 'src/a.ts']);
  });

  it('skips files above the size limit when building', async () => {
    const indexer = new RepositoryIndexer({ maxFileBytes: 10 });
    const snapshot = await indexer.build(root);

    expect(snapshot.root).toBe(path.resolve(root));
    expect(snapshot.listFiles().map(file => file.path)).toEqual(['src/a.ts']);
    expect(snapshot.stats().totalChunks).toBe(1);
  });

  it('fails with INDEX_ERROR when the root is not a directory', async () => {
    const indexer = new RepositoryIndexer();
    await expect(indexer.build(path.join(root, 'big.ts'))).rejects.toMatchObject({
      code: ErrorCode.INDEX_ERROR,
    });
    await expect(indexer.build(path.join(root, 'nope'))).rejects.toMatchObject({
      code: ErrorCode.INDEX_ERROR,
    });
  });
});
