import { Database } from '../storage/Database'
import { FileSystem } from '../storage/FileSystem'
import { withTransaction } from '../storage/transaction'
import { CommitRepository } from '../records/CommitRepository'
import { FileRepository } from '../records/FileRepository'
import { ChronoRepository } from '../records/ChronoRepository'
import { FileTracker } from '../snapshot/FileTracker'
import { detectChanges, hasChanges } from '../snapshot/changeSet'
import { fingerprint } from '../snapshot/ContentHasher'
import { ChangeSet, FingerprintMap, ScanError } from '../snapshot/types'
import { BackupStore } from '../backup/BackupStore'
import { Commit, TrackedFile } from '../contracts/types'
import { IOError, IntegrityError } from '../contracts/errors'
import { debugLog, errorDetails } from '../logging/debugLog'

export type CommitResult =
  | ({ kind: 'committed'; commit: Commit } & ChangeSet)
  | { kind: 'no-op' }

export interface CommitManagerOptions {
  db: Database
  fileSystem: FileSystem
  fileTracker: FileTracker
  backupStore: BackupStore
  now?: () => Date
}

const OPERATION = 'commit'

export class CommitManager {
  private db: Database
  private fileSystem: FileSystem
  private fileTracker: FileTracker
  private backupStore: BackupStore
  private now: () => Date
  private commits: CommitRepository
  private files: FileRepository
  private chrono: ChronoRepository

  constructor(options: CommitManagerOptions) {
    this.db = options.db
    this.fileSystem = options.fileSystem
    this.fileTracker = options.fileTracker
    this.backupStore = options.backupStore
    this.now = options.now ?? (() => new Date())
    this.commits = new CommitRepository(options.db)
    this.files = new FileRepository(options.db)
    this.chrono = new ChronoRepository(options.db)
  }

  /**
   * Record the working tree's changes since the baseline as a new commit.
   * Returns `{ kind: 'no-op' }` when nothing changed; commits are never empty.
   */
  async commit(message: string): Promise<CommitResult> {
    const { files: current, errors } = await this.fileTracker.scan()
    if (errors.length > 0) {
      throw this.scanFailure(errors)
    }

    const changes = detectChanges(current, this.files.trackedMap())
    if (!hasChanges(changes)) {
      debugLog({ event: 'commit_noop', fileCount: current.size })
      return { kind: 'no-op' }
    }

    const createdAt = this.now().toISOString()
    // Set once the commit row exists, so a failure can drop its blobs
    const pending: { commitId: number | null } = { commitId: null }

    try {
      const commit = await withTransaction(this.db, OPERATION, async () => {
        const created = this.commits.insert(message, createdAt)
        pending.commitId = created.id

        for (const path of changes.added) {
          await this.recordAdded(created, path, digestOf(current, path))
        }
        for (const path of changes.modified) {
          await this.recordModified(created, path, digestOf(current, path))
        }
        for (const path of changes.deleted) {
          this.recordDeleted(created, path)
        }

        return created
      })

      debugLog({
        event: 'commit_created',
        commitId: commit.id,
        added: changes.added.length,
        modified: changes.modified.length,
        deleted: changes.deleted.length,
      })

      return { kind: 'committed', commit, ...changes }
    } catch (error) {
      debugLog({ event: 'commit_failed', commitId: pending.commitId, ...errorDetails(error) })
      if (pending.commitId !== null) {
        // The rows are gone with the rollback; drop the blobs written so far
        await this.backupStore.removeCommit(pending.commitId).catch((cleanupError: unknown) => {
          debugLog({ event: 'commit_cleanup_failed', commitId: pending.commitId, ...errorDetails(cleanupError) })
        })
      }
      throw error
    }
  }

  private async recordAdded(commit: Commit, path: string, digest: string): Promise<void> {
    const existing = this.files.findByPath(path)
    let file: TrackedFile

    if (existing) {
      if (existing.tracked) {
        throw new IntegrityError(OPERATION, `${path} is already tracked and cannot be added again`)
      }
      // A path that was deleted earlier keeps its row and history
      this.files.updateBaseline(existing.id, digest, true)
      file = { ...existing, hash: digest, tracked: true }
    } else {
      file = this.files.insert(path, digest)
    }

    this.chrono.insert({
      commitId: commit.id,
      fileId: file.id,
      status: 'added',
      hash: digest,
      createdAt: commit.createdAt,
    })
    await this.backup(commit.id, file.id, path, digest)
  }

  private async recordModified(commit: Commit, path: string, digest: string): Promise<void> {
    const file = this.requireTracked(path, 'modified')

    this.files.updateBaseline(file.id, digest, true)
    this.chrono.insert({
      commitId: commit.id,
      fileId: file.id,
      status: 'modified',
      hash: digest,
      createdAt: commit.createdAt,
    })
    await this.backup(commit.id, file.id, path, digest)
  }

  private recordDeleted(commit: Commit, path: string): void {
    const file = this.requireTracked(path, 'deleted')

    // The previous commit holding this file already has its last bytes
    this.files.updateBaseline(file.id, file.hash, false)
    this.chrono.insert({
      commitId: commit.id,
      fileId: file.id,
      status: 'deleted',
      hash: file.hash,
      createdAt: commit.createdAt,
    })
  }

  private requireTracked(path: string, status: 'modified' | 'deleted'): TrackedFile {
    const file = this.files.findByPath(path)
    if (!file || !file.tracked) {
      throw new IntegrityError(OPERATION, `Cannot record "${status}" for ${path}: it is not tracked`)
    }
    const latest = this.chrono.latestForFile(file.id)
    if (!latest) {
      throw new IntegrityError(OPERATION, `Cannot record "${status}" for ${path}: it was never added`)
    }
    return file
  }

  private async backup(commitId: number, fileId: number, path: string, digest: string): Promise<void> {
    let bytes: Buffer
    try {
      bytes = await this.fileSystem.readFile(this.fileTracker.resolve(path))
    } catch (error) {
      throw new IOError(OPERATION, path, error)
    }

    if (fingerprint(bytes) !== digest) {
      throw new IOError(OPERATION, path, 'file changed while the commit was being recorded')
    }

    try {
      await this.backupStore.writeBlob(commitId, fileId, bytes)
    } catch (error) {
      throw new IOError(OPERATION, this.backupStore.blobPath(commitId, fileId), error)
    }
  }

  private scanFailure(errors: ScanError[]): IOError {
    const [first, ...rest] = errors
    const more = rest.length > 0 ? ` (and ${rest.length} more unreadable entries)` : ''
    return new IOError(OPERATION, first.path, `${first.message}${more}`)
  }
}

function digestOf(files: FingerprintMap, path: string): string {
  const digest = files.get(path)
  if (digest === undefined) {
    throw new IntegrityError(OPERATION, `No fingerprint recorded for ${path}`)
  }
  return digest
}
