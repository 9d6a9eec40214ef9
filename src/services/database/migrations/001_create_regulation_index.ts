/**
 * Migration 001: Create the regulation vector index
 *
 * This migration creates:
 * - meta table (schema version, embedding space, last ingestion report)
 * - chunks table holding chunk text, location and embedding BLOB
 *
 * `seq` preserves insertion order and breaks similarity ties.
 */

import type { Database } from 'better-sqlite3';

export const version = '001';

export function up(db: Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS meta (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL
    );
  `);

  db.exec(`
    CREATE TABLE chunks (
      seq INTEGER PRIMARY KEY AUTOINCREMENT,
      id TEXT NOT NULL,
      corpus_id TEXT NOT NULL,
      source_id TEXT NOT NULL,
      text TEXT NOT NULL,
      char_offset INTEGER NOT NULL,
      length INTEGER NOT NULL,
      embedding BLOB NOT NULL,
      created_at TEXT NOT NULL DEFAULT (datetime('now')),

      UNIQUE (corpus_id, id),
      CHECK (char_offset >= 0),
      CHECK (length > 0)
    );
  `);

  db.exec(`
    CREATE INDEX idx_chunks_corpus ON chunks(corpus_id);
  `);
}
