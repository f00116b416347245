import path from 'path'
import { v4 as uuidv4 } from 'uuid'
import { FileSystem } from '../storage/FileSystem'
import { debugLog } from '../logging/debugLog'

export interface BackupStoreOptions {
  // Directory holding the backups, normally <root>/.chrono/backups
  backupDir: string
  fileSystem: FileSystem
  now?: () => Date
}

export interface EmergencyBackup {
  id: string
  dir: string
  files: string[]
}

const EMERGENCY_DIR = 'emergency'

/**
 * Historical file contents: one blob per (commit, file) pair that introduced
 * or changed content, plus emergency copies of the working tree taken before
 * a revert.
 */
export class BackupStore {
  private backupDir: string
  private fileSystem: FileSystem
  private now: () => Date

  constructor(options: BackupStoreOptions) {
    this.backupDir = options.backupDir
    this.fileSystem = options.fileSystem
    this.now = options.now ?? (() => new Date())
  }

  getBackupDir(): string {
    return this.backupDir
  }

  blobPath(commitId: number, fileId: number): string {
    return path.join(this.backupDir, String(commitId), String(fileId))
  }

  async writeBlob(commitId: number, fileId: number, bytes: Uint8Array): Promise<void> {
    await this.fileSystem.writeFile(this.blobPath(commitId, fileId), bytes)
  }

  async readBlob(commitId: number, fileId: number): Promise<Buffer> {
    return this.fileSystem.readFile(this.blobPath(commitId, fileId))
  }

  async hasBlob(commitId: number, fileId: number): Promise<boolean> {
    return this.fileSystem.exists(this.blobPath(commitId, fileId))
  }

  /**
   * Drop every blob of a commit (used when the commit is rolled back)
   */
  async removeCommit(commitId: number): Promise<void> {
    await this.fileSystem.removeDir(path.join(this.backupDir, String(commitId)))
  }

  /**
   * Copy the given working-tree files into a fresh emergency directory.
   * `resolve` maps a relative path to its location in the working tree.
   */
  async createEmergencyBackup(
    files: readonly string[],
    resolve: (relativePath: string) => string
  ): Promise<EmergencyBackup> {
    const stamp = this.now().toISOString().replace(/[:.]/g, '-')
    const id = `${stamp}-${uuidv4().slice(0, 8)}`
    const dir = path.join(this.backupDir, EMERGENCY_DIR, id)

    await this.fileSystem.ensureDir(dir)
    for (const relativePath of files) {
      const bytes = await this.fileSystem.readFile(resolve(relativePath))
      await this.fileSystem.writeFile(path.join(dir, ...relativePath.split('/')), bytes)
    }

    debugLog({ event: 'emergency_backup_created', dir, fileCount: files.length })
    return { id, dir, files: [...files] }
  }

  /**
   * Put every file of an emergency backup back into the working tree.
   * Returns the paths that could not be restored.
   */
  async restoreEmergencyBackup(
    backup: EmergencyBackup,
    resolve: (relativePath: string) => string
  ): Promise<string[]> {
    const failed: string[] = []
    for (const relativePath of backup.files) {
      try {
        const bytes = await this.fileSystem.readFile(path.join(backup.dir, ...relativePath.split('/')))
        await this.fileSystem.writeFile(resolve(relativePath), bytes)
      } catch (error) {
        failed.push(relativePath)
        debugLog({
          event: 'emergency_restore_failed',
          path: relativePath,
          error: error instanceof Error ? error.message : String(error),
        })
      }
    }
    return failed
  }

  async listEmergencyBackups(): Promise<string[]> {
    return this.fileSystem.listDirs(path.join(this.backupDir, EMERGENCY_DIR))
  }

  /**
   * Keep only the newest `keep` emergency backups; returns the removed ids.
   */
  async pruneEmergencyBackups(keep: number): Promise<string[]> {
    const backups = await this.listEmergencyBackups()
    const stale = backups.slice(0, Math.max(0, backups.length - keep))
    for (const id of stale) {
      await this.fileSystem.removeDir(path.join(this.backupDir, EMERGENCY_DIR, id))
    }
    return stale
  }

  async clear(): Promise<void> {
    await this.fileSystem.removeDir(this.backupDir)
    await this.fileSystem.ensureDir(this.backupDir)
  }

  async size(): Promise<number> {
    return this.fileSystem.size(this.backupDir)
  }
}
