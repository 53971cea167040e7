/**
 * SQLite storage for precomputed similarities
 *
 * One row per (source document, language, rank). Persisting replaces every
 * row of the source document and language in one transaction.
 */

import Database, { type Database as DatabaseType } from 'better-sqlite3';
import { resolve, dirname } from 'node:path';
import { mkdirSync, existsSync } from 'node:fs';
import type { DocumentRef, RankedResultSet } from '../similarity/types.js';
import {
  SIMILARITY_SOURCE,
  StorageError,
  StorageErrorCode,
  type SimilarityRecord,
} from './types.js';

/**
 * Schema version for migrations
 */
const SCHEMA_VERSION = 1;

const CREATE_TABLES = `
CREATE TABLE IF NOT EXISTS schema_version (
  version INTEGER PRIMARY KEY
);

CREATE TABLE IF NOT EXISTS similarities (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  source_type TEXT NOT NULL,
  source_id INTEGER NOT NULL,
  root_container_id INTEGER NOT NULL,
  language_id INTEGER NOT NULL,
  source TEXT NOT NULL DEFAULT 'solr',
  rank INTEGER NOT NULL,
  target_type TEXT NOT NULL,
  target_id INTEGER NOT NULL,
  title TEXT NOT NULL,
  url TEXT NOT NULL,
  type_label TEXT NOT NULL,
  score REAL NOT NULL,
  lexical_score REAL,
  vector_score REAL,
  snippet TEXT NOT NULL,
  algorithm TEXT NOT NULL CHECK (algorithm IN ('lexical', 'vector', 'hybrid')),
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  UNIQUE(source_type, source_id, language_id, source, rank)
);

CREATE INDEX IF NOT EXISTS idx_similarities_source
  ON similarities(source_type, source_id, language_id);
CREATE INDEX IF NOT EXISTS idx_similarities_root
  ON similarities(root_container_id, language_id);
`;

interface SourceKey {
  sourceType: string;
  sourceId: number;
  languageId: number;
  source: string;
}

export class SimilarityStore {
  private db: DatabaseType;
  private closed = false;

  private constructor(db: DatabaseType) {
    this.db = db;
  }

  /**
   * Open (and create when missing) a similarity database
   *
   * `:memory:` opens a private in-memory database.
   */
  static create(databasePath: string): SimilarityStore {
    const inMemory = databasePath === ':memory:';
    const target = inMemory ? databasePath : resolve(databasePath);

    if (!inMemory) {
      const parentDir = dirname(target);
      if (!existsSync(parentDir)) {
        mkdirSync(parentDir, { recursive: true });
      }
    }

    try {
      const db = new Database(target);
      if (!inMemory) {
        db.pragma('journal_mode = WAL');
      }
      db.exec(CREATE_TABLES);

      const versionResult = db
        .prepare<[], { version: number }>('SELECT version FROM schema_version LIMIT 1')
        .get();
      if (versionResult === undefined) {
        db.prepare('INSERT INTO schema_version (version) VALUES (?)').run(SCHEMA_VERSION);
      }

      return new SimilarityStore(db);
    } catch (error) {
      throw new StorageError(
        `Failed to initialize database at ${target}`,
        StorageErrorCode.INIT_FAILED,
        error instanceof Error ? error : undefined
      );
    }
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new StorageError('Similarity store is closed', StorageErrorCode.CLOSED);
    }
  }

  /**
   * Replace the stored suggestions of a document and language
   *
   * @returns number of rows written
   */
  persist(
    ref: DocumentRef,
    rootContainerId: number,
    languageId: number,
    results: RankedResultSet
  ): number {
    this.ensureOpen();
    const key: SourceKey = {
      sourceType: ref.type,
      sourceId: ref.id,
      languageId,
      source: SIMILARITY_SOURCE,
    };

    const remove = this.db.prepare<SourceKey>(`
      DELETE FROM similarities
      WHERE source_type = @sourceType AND source_id = @sourceId
        AND language_id = @languageId AND source = @source
    `);
    const insert = this.db.prepare(`
      INSERT INTO similarities (
        source_type, source_id, root_container_id, language_id, source, rank,
        target_type, target_id, title, url, type_label, score,
        lexical_score, vector_score, snippet, algorithm
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    const replace = this.db.transaction((candidates: RankedResultSet) => {
      remove.run(key);
      candidates.forEach((candidate, rank) => {
        insert.run(
          key.sourceType,
          key.sourceId,
          rootContainerId,
          languageId,
          key.source,
          rank,
          candidate.documentRef.type,
          candidate.documentRef.id,
          candidate.title,
          candidate.url,
          candidate.typeLabel,
          candidate.score,
          candidate.subscores.lexicalScore ?? null,
          candidate.subscores.vectorScore ?? null,
          candidate.snippet,
          candidate.algorithmOrigin
        );
      });
      return candidates.length;
    });

    try {
      return replace(results);
    } catch (error) {
      throw new StorageError(
        `Failed to store similarities for ${ref.type}:${ref.id}`,
        StorageErrorCode.TRANSACTION_FAILED,
        error instanceof Error ? error : undefined
      );
    }
  }

  /**
   * Stored suggestions of a document, by rank
   */
  listForDocument(ref: DocumentRef, languageId: number): SimilarityRecord[] {
    this.ensureOpen();
    return this.db
      .prepare<[string, number, number, string], SimilarityRecord>(`
        SELECT source_type, source_id, root_container_id, language_id, source, rank,
               target_type, target_id, title, url, type_label, score,
               lexical_score, vector_score, snippet, algorithm, created_at
        FROM similarities
        WHERE source_type = ? AND source_id = ? AND language_id = ? AND source = ?
        ORDER BY rank
      `)
      .all(ref.type, ref.id, languageId, SIMILARITY_SOURCE);
  }

  /**
   * Number of stored rows, optionally for one site root
   */
  countRows(rootContainerId?: number): number {
    this.ensureOpen();
    const row =
      rootContainerId === undefined
        ? this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM similarities').get()
        : this.db
            .prepare<[number], { count: number }>(
              'SELECT COUNT(*) AS count FROM similarities WHERE root_container_id = ?'
            )
            .get(rootContainerId);
    return row?.count ?? 0;
  }

  /**
   * Close the database connection
   */
  close(): void {
    if (!this.closed) {
      this.db.close();
      this.closed = true;
    }
  }
}
