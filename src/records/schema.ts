import { Database } from '../storage/Database'

export const SCHEMA_VERSION = 1

const CREATE_TABLES = `
  CREATE TABLE IF NOT EXISTS commits (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    commit_message TEXT NOT NULL,
    time TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS files (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    file_path TEXT NOT NULL UNIQUE,
    file_hash TEXT NOT NULL,
    tracked INTEGER NOT NULL DEFAULT 1 CHECK (tracked IN (0, 1))
  );

  CREATE TABLE IF NOT EXISTS chrono (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    commit_id INTEGER NOT NULL REFERENCES commits (id),
    file_id INTEGER NOT NULL REFERENCES files (id),
    status TEXT NOT NULL CHECK (status IN ('added', 'modified', 'deleted')),
    file_hash TEXT NOT NULL,
    time TEXT NOT NULL,
    UNIQUE (commit_id, file_id)
  );

  CREATE INDEX IF NOT EXISTS chrono_commit_idx ON chrono (commit_id);
  CREATE INDEX IF NOT EXISTS chrono_file_idx ON chrono (file_id, commit_id);
`

export function initializeSchema(db: Database): void {
  db.exec(CREATE_TABLES)
  db.exec(`PRAGMA user_version = ${SCHEMA_VERSION}`)
}

/**
 * Drop every table and recreate the empty schema.
 */
export function resetSchema(db: Database): void {
  db.exec(`
    DROP TABLE IF EXISTS chrono;
    DROP TABLE IF EXISTS files;
    DROP TABLE IF EXISTS commits;
  `)
  initializeSchema(db)
}
