/**
 * @fileOverview: SQLite cache of chunk embeddings keyed by model and content hash
 * @module: EmbeddingStorage
 * @keyFunctions:
 *   - getMany(): Look up cached vectors for a batch of content hashes
 *   - putMany(): Store freshly generated vectors in one transaction
 * @dependencies:
 *   - better-sqlite3: Local persistence
 * @context: Re-indexing only embeds chunks whose content changed; vectors are stored as little-endian float32 blobs
 */

import * as fs from 'fs';
import * as path from 'path';
import Database from 'better-sqlite3';
import { logger } from '../utils/logger';

export interface StoredEmbedding {
  contentHash: string;
  vector: number[];
}

interface EmbeddingRow {
  content_hash: string;
  dimensions: number;
  vector: Buffer;
}

export function encodeVector(vector: readonly number[]): Buffer {
  const buffer = Buffer.alloc(vector.length * 4);
  vector.forEach((value, i) => buffer.writeFloatLE(value, i * 4));
  return buffer;
}

export function decodeVector(buffer: Buffer, dimensions: number): number[] {
  const vector = new Array<number>(dimensions);
  for (let i = 0; i < dimensions; i++) {
    vector[i] = buffer.readFloatLE(i * 4);
  }
  return vector;
}

export class EmbeddingStorage {
  private readonly db: Database.Database;
  private readonly selectStmt: Database.Statement<[string, string], EmbeddingRow>;
  private readonly insertStmt: Database.Statement<[string, string, number, Buffer]>;
  private readonly countStmt: Database.Statement<[], { total: number }>;

  constructor(readonly dbPath: string) {
    if (dbPath !== ':memory:') {
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS embeddings (
        model TEXT NOT NULL,
        content_hash TEXT NOT NULL,
        dimensions INTEGER NOT NULL,
        vector BLOB NOT NULL,
        created_at TEXT NOT NULL DEFAULT (datetime('now')),
        PRIMARY KEY (model, content_hash)
      )
    `);

    this.selectStmt = this.db.prepare<[string, string], EmbeddingRow>(
      'SELECT content_hash, dimensions, vector FROM embeddings WHERE model = ? AND content_hash = ?'
    );
    this.insertStmt = this.db.prepare<[string, string, number, Buffer]>(
      'INSERT OR REPLACE INTO embeddings (model, content_hash, dimensions, vector) VALUES (?, ?, ?, ?)'
    );
    this.countStmt = this.db.prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM embeddings');

    logger.info('💾 Embedding cache opened', { dbPath });
  }

  get(model: string, contentHash: string): number[] | undefined {
    const row = this.selectStmt.get(model, contentHash);
    return row ? decodeVector(row.vector, row.dimensions) : undefined;
  }

  getMany(model: string, contentHashes: Iterable<string>): Map<string, number[]> {
    const found = new Map<string, number[]>();
    for (const hash of contentHashes) {
      if (found.has(hash)) continue;
      const vector = this.get(model, hash);
      if (vector) {
        found.set(hash, vector);
      }
    }
    return found;
  }

  putMany(model: string, entries: readonly StoredEmbedding[]): void {
    const insertAll = this.db.transaction((batch: readonly StoredEmbedding[]) => {
      for (const entry of batch) {
        this.insertStmt.run(model, entry.contentHash, entry.vector.length, encodeVector(entry.vector));
      }
    });
    insertAll(entries);
  }

  count(): number {
    return this.countStmt.get()?.total ?? 0;
  }

  close(): void {
    this.db.close();
  }
}
