import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';

export type Db = Database.Database;

/**
 * Open the catalog database and make sure the schema exists.
 * Pass ':memory:' for a throwaway database.
 */
export function openDb(dbPath: string): Db {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
  }

  const db = new Database(dbPath);

  // WAL first so the indexer's writes never block chat reads
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  db.pragma('foreign_keys = ON');
  db.pragma('cache_size = -32000'); // 32MB page cache

  // SQLite's lower() folds ASCII only
  db.function('casefold', { deterministic: true }, (value: unknown) =>
    typeof value === 'string' ? value.toLowerCase() : null
  );

  initSchema(db);

  return db;
}

function initSchema(db: Db): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS files (
      id              INTEGER PRIMARY KEY,
      file_name       TEXT NOT NULL,
      file_path       TEXT NOT NULL,
      extension       TEXT NOT NULL DEFAULT '',
      file_type       TEXT NOT NULL,
      file_size       INTEGER NOT NULL DEFAULT 0,
      created_at      TEXT NOT NULL,
      modified_at     TEXT NOT NULL,
      scanned_at      TEXT,
      show            TEXT,
      has_embedding   INTEGER NOT NULL DEFAULT 0,
      error           TEXT,
      CHECK (error IS NULL OR has_embedding = 0)
    );

    CREATE TABLE IF NOT EXISTS images (
      file_id               INTEGER PRIMARY KEY REFERENCES files(id) ON DELETE CASCADE,
      width                 INTEGER NOT NULL,
      height                INTEGER NOT NULL,
      color_space           TEXT,
      thumbnail_path        TEXT,
      has_visual_embedding  INTEGER NOT NULL DEFAULT 0
    );

    CREATE TABLE IF NOT EXISTS videos (
      file_id               INTEGER PRIMARY KEY REFERENCES files(id) ON DELETE CASCADE,
      width                 INTEGER NOT NULL,
      height                INTEGER NOT NULL,
      duration_seconds      REAL,
      frame_rate            REAL,
      codec                 TEXT,
      thumbnail_path        TEXT,
      has_visual_embedding  INTEGER NOT NULL DEFAULT 0
    );

    CREATE TABLE IF NOT EXISTS blend_files (
      file_id               INTEGER PRIMARY KEY REFERENCES files(id) ON DELETE CASCADE,
      resolution_x          INTEGER NOT NULL,
      resolution_y          INTEGER NOT NULL,
      render_engine         TEXT,
      frame_start           INTEGER,
      frame_end             INTEGER,
      thumbnail_path        TEXT,
      has_visual_embedding  INTEGER NOT NULL DEFAULT 0
    );

    CREATE TABLE IF NOT EXISTS audio_files (
      file_id           INTEGER PRIMARY KEY REFERENCES files(id) ON DELETE CASCADE,
      duration_seconds  REAL NOT NULL,
      bitrate           INTEGER,
      sample_rate       INTEGER,
      channels          INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS code_files (
      file_id     INTEGER PRIMARY KEY REFERENCES files(id) ON DELETE CASCADE,
      language    TEXT NOT NULL,
      line_count  INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS spreadsheets (
      file_id      INTEGER PRIMARY KEY REFERENCES files(id) ON DELETE CASCADE,
      sheet_count  INTEGER NOT NULL,
      row_count    INTEGER
    );

    CREATE TABLE IF NOT EXISTS documents (
      file_id     INTEGER PRIMARY KEY REFERENCES files(id) ON DELETE CASCADE,
      page_count  INTEGER,
      word_count  INTEGER
    );

    CREATE TABLE IF NOT EXISTS conversations (
      conversation_id  TEXT PRIMARY KEY,
      user_id          TEXT NOT NULL,
      title            TEXT,
      created_at       TEXT NOT NULL,
      updated_at       TEXT NOT NULL,
      message_count    INTEGER NOT NULL DEFAULT 0
    );

    CREATE TABLE IF NOT EXISTS conversation_turns (
      conversation_id  TEXT NOT NULL REFERENCES conversations(conversation_id) ON DELETE CASCADE,
      seq              INTEGER NOT NULL,
      role             TEXT NOT NULL,
      payload          TEXT NOT NULL,
      created_at       TEXT NOT NULL,
      PRIMARY KEY (conversation_id, seq)
    );

    CREATE INDEX IF NOT EXISTS idx_files_modified ON files(modified_at);
    CREATE INDEX IF NOT EXISTS idx_files_type ON files(file_type);
    CREATE INDEX IF NOT EXISTS idx_files_show ON files(show);
    CREATE INDEX IF NOT EXISTS idx_conversations_user ON conversations(user_id, updated_at);
  `);
}
