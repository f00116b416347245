import { Database } from '../storage/Database'
import { Commit, CommitRowSchema, CommitRow, CountRowSchema } from '../contracts'

const toCommit = (row: CommitRow): Commit => ({
  id: row.id,
  message: row.commit_message,
  createdAt: row.time,
})

export class CommitRepository {
  constructor(private db: Database) {}

  insert(message: string, createdAt: string): Commit {
    const { lastInsertRowid } = this.db.execute(
      'INSERT INTO commits (commit_message, time) VALUES (?, ?)',
      [message, createdAt]
    )
    return { id: lastInsertRowid, message, createdAt }
  }

  findById(id: number): Commit | null {
    const row = this.db.queryOne('SELECT id, commit_message, time FROM commits WHERE id = ?', [id])
    return row === undefined ? null : toCommit(CommitRowSchema.parse(row))
  }

  /**
   * Commits newest first. Ids are assigned in creation order, so they order
   * commits even when two share a timestamp.
   */
  list(limit?: number): Commit[] {
    const rows = limit === undefined
      ? this.db.queryAll('SELECT id, commit_message, time FROM commits ORDER BY id DESC')
      : this.db.queryAll('SELECT id, commit_message, time FROM commits ORDER BY id DESC LIMIT ?', [limit])
    return rows.map((row) => toCommit(CommitRowSchema.parse(row)))
  }

  count(): number {
    return CountRowSchema.parse(this.db.queryOne('SELECT COUNT(*) AS count FROM commits')).count
  }
}
