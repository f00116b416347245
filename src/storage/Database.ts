export type SqlValue = string | number | bigint | null

export interface RunResult {
  changes: number
  lastInsertRowid: number
}

export interface Database {
  // Parameterized statements
  execute(sql: string, params?: readonly SqlValue[]): RunResult
  queryOne(sql: string, params?: readonly SqlValue[]): unknown
  queryAll(sql: string, params?: readonly SqlValue[]): unknown[]

  // Multi-statement scripts (schema DDL)
  exec(script: string): void

  // Transactions
  beginTransaction(): void
  commit(): void
  rollback(): void
  readonly inTransaction: boolean

  close(): void
}
