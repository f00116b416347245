import { Database } from '../storage/Database'
import {
  ChangeEvent,
  ChangeEventWithPath,
  ChangeStatus,
  ChronoRow,
  ChronoRowSchema,
  ChronoWithPathRowSchema,
  StatusCountRowSchema,
} from '../contracts'

const toChangeEvent = (row: ChronoRow): ChangeEvent => ({
  id: row.id,
  commitId: row.commit_id,
  fileId: row.file_id,
  status: row.status,
  hash: row.file_hash,
  createdAt: row.time,
})

export type StatusCounts = Record<ChangeStatus, number>

export class ChronoRepository {
  constructor(private db: Database) {}

  insert(event: Omit<ChangeEvent, 'id'>): ChangeEvent {
    const { lastInsertRowid } = this.db.execute(
      'INSERT INTO chrono (commit_id, file_id, status, file_hash, time) VALUES (?, ?, ?, ?, ?)',
      [event.commitId, event.fileId, event.status, event.hash, event.createdAt]
    )
    return { id: lastInsertRowid, ...event }
  }

  listByCommit(commitId: number): ChangeEventWithPath[] {
    const rows = this.db.queryAll(
      `SELECT c.id, c.commit_id, c.file_id, c.status, c.file_hash, c.time, f.file_path
       FROM chrono c
       JOIN files f ON f.id = c.file_id
       WHERE c.commit_id = ?
       ORDER BY f.file_path`,
      [commitId]
    )
    return rows.map((raw) => {
      const row = ChronoWithPathRowSchema.parse(raw)
      return { ...toChangeEvent(row), path: row.file_path }
    })
  }

  listByFile(fileId: number): ChangeEvent[] {
    return this.db
      .queryAll(
        `SELECT id, commit_id, file_id, status, file_hash, time
         FROM chrono WHERE file_id = ? ORDER BY commit_id`,
        [fileId]
      )
      .map((row) => toChangeEvent(ChronoRowSchema.parse(row)))
  }

  latestForFile(fileId: number): ChangeEvent | null {
    const row = this.db.queryOne(
      `SELECT id, commit_id, file_id, status, file_hash, time
       FROM chrono WHERE file_id = ? ORDER BY commit_id DESC LIMIT 1`,
      [fileId]
    )
    return row === undefined ? null : toChangeEvent(ChronoRowSchema.parse(row))
  }

  /**
   * For every file with history up to `commitId`, its last event at or
   * before that commit, keyed by file id.
   */
  stateAsOf(commitId: number): Map<number, ChangeEvent> {
    const rows = this.db.queryAll(
      `SELECT c.id, c.commit_id, c.file_id, c.status, c.file_hash, c.time
       FROM chrono c
       WHERE c.commit_id = (
         SELECT MAX(inner_c.commit_id) FROM chrono inner_c
         WHERE inner_c.file_id = c.file_id AND inner_c.commit_id <= ?
       )`,
      [commitId]
    )
    const state = new Map<number, ChangeEvent>()
    for (const row of rows) {
      const event = toChangeEvent(ChronoRowSchema.parse(row))
      state.set(event.fileId, event)
    }
    return state
  }

  /**
   * Per-commit counts of each status, for the given commits.
   */
  countsByCommit(commitIds: readonly number[]): Map<number, StatusCounts> {
    const counts = new Map<number, StatusCounts>()
    if (commitIds.length === 0) {
      return counts
    }
    for (const id of commitIds) {
      counts.set(id, { added: 0, modified: 0, deleted: 0 })
    }

    const placeholders = commitIds.map(() => '?').join(', ')
    const rows = this.db.queryAll(
      `SELECT commit_id, status, COUNT(*) AS count FROM chrono
       WHERE commit_id IN (${placeholders})
       GROUP BY commit_id, status`,
      commitIds
    )
    for (const raw of rows) {
      const row = StatusCountRowSchema.parse(raw)
      const entry = counts.get(row.commit_id)
      if (entry) {
        entry[row.status] = row.count
      }
    }
    return counts
  }
}
