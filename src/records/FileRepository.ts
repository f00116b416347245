import { Database } from '../storage/Database'
import { TrackedFile, FileRowSchema, FileRow, CountRowSchema } from '../contracts'

const toTrackedFile = (row: FileRow): TrackedFile => ({
  id: row.id,
  path: row.file_path,
  hash: row.file_hash,
  tracked: row.tracked === 1,
})

const COLUMNS = 'id, file_path, file_hash, tracked'

export class FileRepository {
  constructor(private db: Database) {}

  insert(path: string, hash: string): TrackedFile {
    const { lastInsertRowid } = this.db.execute(
      'INSERT INTO files (file_path, file_hash, tracked) VALUES (?, ?, 1)',
      [path, hash]
    )
    return { id: lastInsertRowid, path, hash, tracked: true }
  }

  findById(id: number): TrackedFile | null {
    const row = this.db.queryOne(`SELECT ${COLUMNS} FROM files WHERE id = ?`, [id])
    return row === undefined ? null : toTrackedFile(FileRowSchema.parse(row))
  }

  findByPath(path: string): TrackedFile | null {
    const row = this.db.queryOne(`SELECT ${COLUMNS} FROM files WHERE file_path = ?`, [path])
    return row === undefined ? null : toTrackedFile(FileRowSchema.parse(row))
  }

  listAll(): TrackedFile[] {
    return this.db
      .queryAll(`SELECT ${COLUMNS} FROM files ORDER BY file_path`)
      .map((row) => toTrackedFile(FileRowSchema.parse(row)))
  }

  /**
   * The baseline: path -> digest of every file currently tracked.
   */
  trackedMap(): Map<string, string> {
    const tracked = new Map<string, string>()
    const rows = this.db.queryAll(`SELECT ${COLUMNS} FROM files WHERE tracked = 1`)
    for (const row of rows) {
      const file = FileRowSchema.parse(row)
      tracked.set(file.file_path, file.file_hash)
    }
    return tracked
  }

  updateBaseline(id: number, hash: string, tracked: boolean): void {
    const { changes } = this.db.execute(
      'UPDATE files SET file_hash = ?, tracked = ? WHERE id = ?',
      [hash, tracked ? 1 : 0, id]
    )
    if (changes !== 1) {
      throw new Error(`files row ${id} was not updated`)
    }
  }

  count(): number {
    return CountRowSchema.parse(this.db.queryOne('SELECT COUNT(*) AS count FROM files')).count
  }

  countTracked(): number {
    return CountRowSchema.parse(
      this.db.queryOne('SELECT COUNT(*) AS count FROM files WHERE tracked = 1')
    ).count
  }
}
