import BetterSqlite3 from 'better-sqlite3'
import { Database, RunResult, SqlValue } from './Database'
import { debugLog } from '../logging/debugLog'

export interface SqliteDatabaseOptions {
  // Path of the database file, or ':memory:'
  dbPath: string
}

export class SqliteDatabase implements Database {
  private db: BetterSqlite3.Database

  constructor(options: SqliteDatabaseOptions) {
    this.db = new BetterSqlite3(options.dbPath)
    if (options.dbPath !== ':memory:') {
      this.db.pragma('journal_mode = WAL')
      this.db.pragma('synchronous = NORMAL')
    }
    this.db.pragma('foreign_keys = ON')
  }

  execute(sql: string, params: readonly SqlValue[] = []): RunResult {
    const result = this.db.prepare(sql).run(...params)
    return {
      changes: result.changes,
      lastInsertRowid: Number(result.lastInsertRowid),
    }
  }

  queryOne(sql: string, params: readonly SqlValue[] = []): unknown {
    return this.db.prepare(sql).get(...params)
  }

  queryAll(sql: string, params: readonly SqlValue[] = []): unknown[] {
    return this.db.prepare(sql).all(...params)
  }

  exec(script: string): void {
    this.db.exec(script)
  }

  beginTransaction(): void {
    debugLog({ event: 'db_begin' })
    this.db.exec('BEGIN IMMEDIATE')
  }

  commit(): void {
    this.db.exec('COMMIT')
    debugLog({ event: 'db_commit' })
  }

  rollback(): void {
    // SQLite may already have rolled back on some errors (e.g. SQLITE_FULL)
    if (this.db.inTransaction) {
      this.db.exec('ROLLBACK')
    }
    debugLog({ event: 'db_rollback' })
  }

  get inTransaction(): boolean {
    return this.db.inTransaction
  }

  close(): void {
    if (this.db.open) {
      this.db.close()
    }
  }
}
