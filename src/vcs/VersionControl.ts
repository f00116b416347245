import path from 'path'
import { Database } from '../storage/Database'
import { SqliteDatabase } from '../storage/SqliteDatabase'
import { FileSystem } from '../storage/FileSystem'
import { NodeFileSystem } from '../storage/NodeFileSystem'
import { initializeSchema, resetSchema } from '../records/schema'
import { CommitRepository } from '../records/CommitRepository'
import { FileRepository } from '../records/FileRepository'
import { ChronoRepository } from '../records/ChronoRepository'
import { ConfigLoader } from '../config/ConfigLoader'
import { IgnoreMatcher, REPOSITORY_DIR } from '../snapshot/IgnoreMatcher'
import { FileTracker } from '../snapshot/FileTracker'
import { ChangeSet, ScanError } from '../snapshot/types'
import { BackupStore } from '../backup/BackupStore'
import { CommitManager, CommitResult } from '../commit/CommitManager'
import { RevertManager, RevertResult } from '../revert/RevertManager'
import {
  ChronoConfig,
  CleanupResult,
  CommitDetails,
  CommitSummary,
  RepositoryStats,
  TrackedFile,
} from '../contracts/types'
import { NotFoundError, NotInitializedError, ValidationError } from '../contracts/errors'
import { debugLog } from '../logging/debugLog'

export const DATABASE_FILE_NAME = 'chrono.db'
export const BACKUP_DIR_NAME = 'backups'

export interface VersionControlOptions {
  rootDir?: string
  fileSystem?: FileSystem
  // Explicit config file; defaults to <root>/.chrono/config.json
  configPath?: string
  // Overrides the configured ignore patterns
  ignorePatterns?: readonly string[]
  now?: () => Date
}

export interface StatusResult extends ChangeSet {
  errors: ScanError[]
}

export interface InitResult {
  created: boolean
  chronoPath: string
}

interface Session {
  db: Database
  commits: CommitRepository
  files: FileRepository
  chrono: ChronoRepository
  fileTracker: FileTracker
  backupStore: BackupStore
  commitManager: CommitManager
  revertManager: RevertManager
}

/**
 * Entry point for every repository operation. Composes the file tracker, the
 * record store and the backup area for one working tree.
 */
export class VersionControl {
  private rootDir: string
  private chronoDir: string
  private dbPath: string
  private backupDir: string
  private fileSystem: FileSystem
  private configLoader: ConfigLoader
  private ignorePatterns?: readonly string[]
  private now: () => Date
  private session: Session | null = null

  constructor(options: VersionControlOptions = {}) {
    this.rootDir = path.resolve(options.rootDir ?? process.cwd())
    this.chronoDir = path.join(this.rootDir, REPOSITORY_DIR)
    this.dbPath = path.join(this.chronoDir, DATABASE_FILE_NAME)
    this.backupDir = path.join(this.chronoDir, BACKUP_DIR_NAME)
    this.fileSystem = options.fileSystem ?? new NodeFileSystem()
    this.configLoader = new ConfigLoader(this.rootDir, options.configPath)
    this.ignorePatterns = options.ignorePatterns
    this.now = options.now ?? (() => new Date())
  }

  getRootDir(): string {
    return this.rootDir
  }

  getConfig(): ChronoConfig {
    return this.configLoader.getConfig()
  }

  async isInitialized(): Promise<boolean> {
    return this.fileSystem.exists(this.dbPath)
  }

  /**
   * Create .chrono/ with the database schema, the backup area and a default
   * config file. Existing history is kept; `force` re-runs the setup.
   */
  async init(force: boolean = false): Promise<InitResult> {
    if ((await this.isInitialized()) && !force) {
      return { created: false, chronoPath: this.chronoDir }
    }

    await this.fileSystem.ensureDir(this.chronoDir)
    await this.fileSystem.ensureDir(this.backupDir)

    const configPath = ConfigLoader.defaultPath(this.rootDir)
    if (!(await this.fileSystem.exists(configPath))) {
      await this.fileSystem.writeFile(
        configPath,
        Buffer.from(`${JSON.stringify(ConfigLoader.DEFAULT_CONFIG, null, 2)}\n`, 'utf8')
      )
    }
    this.configLoader.reloadConfig()

    initializeSchema(this.connect().db)

    debugLog({ event: 'repository_initialized', rootDir: this.rootDir, force })
    return { created: true, chronoPath: this.chronoDir }
  }

  async status(): Promise<StatusResult> {
    const { fileTracker, files } = await this.open('status')
    return fileTracker.detectChanges(files.trackedMap())
  }

  async commit(message: string): Promise<CommitResult> {
    const { commitManager } = await this.open('commit')
    const trimmed = message.trim()
    if (!trimmed) {
      throw new ValidationError('commit', 'Commit message cannot be empty.')
    }
    return commitManager.commit(trimmed)
  }

  async log(limit?: number): Promise<CommitSummary[]> {
    const { commits, chrono } = await this.open('log')
    const effectiveLimit = limit ?? this.configLoader.getConfig().log.defaultLimit
    if (!Number.isInteger(effectiveLimit) || effectiveLimit < 1) {
      throw new ValidationError('log', `Invalid limit: ${effectiveLimit}`)
    }

    const list = commits.list(effectiveLimit)
    const counts = chrono.countsByCommit(list.map((commit) => commit.id))
    return list.map((commit) => ({
      ...commit,
      ...(counts.get(commit.id) ?? { added: 0, modified: 0, deleted: 0 }),
    }))
  }

  async show(commitId: number): Promise<CommitDetails> {
    const { commits, chrono } = await this.open('show')
    const commit = commits.findById(commitId)
    if (!commit) {
      throw new NotFoundError('show', 'commit', commitId)
    }

    const events = chrono.listByCommit(commitId)
    const details: CommitDetails = {
      commit,
      files: { added: [], modified: [], deleted: [] },
      totalChanges: events.length,
    }
    for (const event of events) {
      details.files[event.status].push({ path: event.path, hash: event.hash })
    }
    return details
  }

  async revert(commitId: number): Promise<RevertResult> {
    const { revertManager } = await this.open('revert')
    return revertManager.revert(commitId)
  }

  async listFiles(): Promise<TrackedFile[]> {
    const { files } = await this.open('files')
    return files.listAll()
  }

  async stats(): Promise<RepositoryStats> {
    const { commits, files, backupStore } = await this.open('stats')
    return {
      totalCommits: commits.count(),
      totalFiles: files.count(),
      trackedFiles: files.countTracked(),
      // WAL mode keeps recent pages in the -wal file until a checkpoint
      databaseSize:
        (await this.fileSystem.size(this.dbPath)) + (await this.fileSystem.size(`${this.dbPath}-wal`)),
      backupSize: await backupStore.size(),
      repositoryPath: this.rootDir,
      chronoPath: this.chronoDir,
    }
  }

  /**
   * Compact the database and keep only the newest emergency backups
   */
  async cleanup(): Promise<CleanupResult> {
    const { db, backupStore } = await this.open('cleanup')
    db.exec('VACUUM')
    const removed = await backupStore.pruneEmergencyBackups(
      this.configLoader.getConfig().backups.keepEmergency
    )
    debugLog({ event: 'cleanup_complete', removedEmergencyBackups: removed })
    return { removedEmergencyBackups: removed }
  }

  /**
   * Delete every commit, tracked file and backup. The working tree is kept.
   */
  async reset(confirm: boolean): Promise<void> {
    if (!confirm) {
      throw new ValidationError(
        'reset',
        'Reset deletes all commit history and backups; it requires confirmation.'
      )
    }
    const { db, backupStore } = await this.open('reset')
    resetSchema(db)
    await backupStore.clear()
    debugLog({ event: 'repository_reset', rootDir: this.rootDir })
  }

  close(): void {
    this.session?.db.close()
    this.session = null
  }

  private async open(operation: string): Promise<Session> {
    if (!(await this.isInitialized())) {
      throw new NotInitializedError(operation, this.rootDir)
    }
    return this.connect()
  }

  private connect(): Session {
    if (!this.session) {
      this.session = this.createSession()
    }
    return this.session
  }

  private createSession(): Session {
    const db = new SqliteDatabase({ dbPath: this.dbPath })
    const ignoreMatcher = new IgnoreMatcher(this.ignorePatterns ?? this.configLoader.getIgnorePatterns())
    const fileTracker = new FileTracker({
      rootDir: this.rootDir,
      fileSystem: this.fileSystem,
      ignoreMatcher,
    })
    const backupStore = new BackupStore({
      backupDir: this.backupDir,
      fileSystem: this.fileSystem,
      now: this.now,
    })
    const shared = { db, fileSystem: this.fileSystem, fileTracker, backupStore }

    return {
      db,
      commits: new CommitRepository(db),
      files: new FileRepository(db),
      chrono: new ChronoRepository(db),
      fileTracker,
      backupStore,
      commitManager: new CommitManager({ ...shared, now: this.now }),
      revertManager: new RevertManager(shared),
    }
  }
}
