import { Database } from '../storage/Database'
import { FileSystem } from '../storage/FileSystem'
import { withTransaction } from '../storage/transaction'
import { CommitRepository } from '../records/CommitRepository'
import { FileRepository } from '../records/FileRepository'
import { ChronoRepository } from '../records/ChronoRepository'
import { FileTracker } from '../snapshot/FileTracker'
import { fingerprint } from '../snapshot/ContentHasher'
import { BackupStore, EmergencyBackup } from '../backup/BackupStore'
import { ChangeEvent, TrackedFile } from '../contracts/types'
import { IOError, IntegrityError, NotFoundError } from '../contracts/errors'
import { debugLog, errorDetails } from '../logging/debugLog'

export interface RevertResult {
  commitId: number
  restored: string[]
  removed: string[]
  // Directory holding the copy of the working tree taken before the revert
  emergencyBackup: string
}

export interface RevertManagerOptions {
  db: Database
  fileSystem: FileSystem
  fileTracker: FileTracker
  backupStore: BackupStore
}

type RevertStep =
  | { action: 'restore'; file: TrackedFile; event: ChangeEvent; bytes: Buffer }
  | { action: 'remove'; file: TrackedFile; event: ChangeEvent | null }

const OPERATION = 'revert'

export class RevertManager {
  private db: Database
  private fileSystem: FileSystem
  private fileTracker: FileTracker
  private backupStore: BackupStore
  private commits: CommitRepository
  private files: FileRepository
  private chrono: ChronoRepository

  constructor(options: RevertManagerOptions) {
    this.db = options.db
    this.fileSystem = options.fileSystem
    this.fileTracker = options.fileTracker
    this.backupStore = options.backupStore
    this.commits = new CommitRepository(options.db)
    this.files = new FileRepository(options.db)
    this.chrono = new ChronoRepository(options.db)
  }

  /**
   * Bring the working tree and the baseline back to their state right after
   * `targetCommitId`. Later commits stay in the history.
   */
  async revert(targetCommitId: number): Promise<RevertResult> {
    if (!this.commits.findById(targetCommitId)) {
      throw new NotFoundError(OPERATION, 'commit', targetCommitId)
    }

    // Everything that can fail without touching the tree happens first
    const steps = await this.planRevert(targetCommitId)
    const { files: current, errors } = await this.fileTracker.scan()
    if (errors.length > 0) {
      throw new IOError(OPERATION, errors[0].path, errors[0].message)
    }

    const emergency = await this.createEmergencyBackup([...current.keys()])
    const restored: string[] = []
    const removed: string[] = []

    try {
      await withTransaction(this.db, OPERATION, async () => {
        for (const step of steps) {
          if (step.action === 'restore') {
            this.files.updateBaseline(step.file.id, step.event.hash, true)
          } else {
            this.files.updateBaseline(step.file.id, step.event?.hash ?? step.file.hash, false)
          }
        }

        // Removals go first so a path can switch between file and directory
        for (const step of steps) {
          if (step.action !== 'remove') continue
          const target = this.fileTracker.resolve(step.file.path)
          if (await this.fileSystem.isFile(target)) {
            await this.applyFileChange(step.file.path, () => this.fileSystem.removeFile(target))
            await this.applyFileChange(step.file.path, () => this.pruneEmptyParents(step.file.path))
            removed.push(step.file.path)
          }
        }

        for (const step of steps) {
          if (step.action !== 'restore') continue
          if (current.get(step.file.path) === step.event.hash) continue
          const target = this.fileTracker.resolve(step.file.path)
          await this.applyFileChange(step.file.path, () => this.fileSystem.writeFile(target, step.bytes))
          restored.push(step.file.path)
        }
      })
    } catch (error) {
      debugLog({ event: 'revert_failed', commitId: targetCommitId, ...errorDetails(error) })
      await this.recover(emergency, restored)
      throw error
    }

    debugLog({
      event: 'revert_complete',
      commitId: targetCommitId,
      restored: restored.length,
      removed: removed.length,
      emergencyBackup: emergency.dir,
    })

    return { commitId: targetCommitId, restored, removed, emergencyBackup: emergency.dir }
  }

  /**
   * For every tracked file, the last event at or before the target decides
   * whether its blob comes back or the path goes away.
   */
  private async planRevert(targetCommitId: number): Promise<RevertStep[]> {
    const state = this.chrono.stateAsOf(targetCommitId)
    const steps: RevertStep[] = []

    for (const file of this.files.listAll()) {
      const event = state.get(file.id) ?? null

      if (!event || event.status === 'deleted') {
        steps.push({ action: 'remove', file, event })
        continue
      }

      let bytes: Buffer
      try {
        bytes = await this.backupStore.readBlob(event.commitId, file.id)
      } catch (error) {
        throw new IntegrityError(
          OPERATION,
          `Backup of ${file.path} from commit ${event.commitId} is missing: ${error instanceof Error ? error.message : String(error)}`
        )
      }
      if (fingerprint(bytes) !== event.hash) {
        throw new IntegrityError(
          OPERATION,
          `Backup of ${file.path} from commit ${event.commitId} does not match its recorded digest`
        )
      }
      steps.push({ action: 'restore', file, event, bytes })
    }

    return steps
  }

  private async createEmergencyBackup(files: string[]): Promise<EmergencyBackup> {
    try {
      return await this.backupStore.createEmergencyBackup(files, (relativePath) =>
        this.fileTracker.resolve(relativePath)
      )
    } catch (error) {
      throw new IOError(OPERATION, this.backupStore.getBackupDir(), error)
    }
  }

  private async applyFileChange(relativePath: string, change: () => Promise<void>): Promise<void> {
    try {
      await change()
    } catch (error) {
      throw new IOError(OPERATION, relativePath, error)
    }
  }

  /**
   * Remove the directories above a removed file that it left empty, up to
   * the root
   */
  private async pruneEmptyParents(relativePath: string): Promise<void> {
    const segments = relativePath.split('/')
    for (let depth = segments.length - 1; depth > 0; depth--) {
      const dir = this.fileTracker.resolve(segments.slice(0, depth).join('/'))
      if (!(await this.fileSystem.removeEmptyDir(dir))) {
        return
      }
    }
  }

  /**
   * Put the working tree back the way the emergency backup found it
   */
  private async recover(emergency: EmergencyBackup, restored: string[]): Promise<void> {
    const resolve = (relativePath: string) => this.fileTracker.resolve(relativePath)
    const failed: string[] = []

    // Files the revert created go first; one may sit where a directory was
    const before = new Set(emergency.files)
    for (const relativePath of restored) {
      if (before.has(relativePath)) continue
      try {
        await this.fileSystem.removeFile(resolve(relativePath))
        await this.pruneEmptyParents(relativePath)
      } catch (error) {
        failed.push(relativePath)
        debugLog({ event: 'revert_recovery_remove_failed', path: relativePath, ...errorDetails(error) })
      }
    }

    failed.push(...(await this.backupStore.restoreEmergencyBackup(emergency, resolve)))

    debugLog({ event: 'revert_recovered', emergencyBackup: emergency.dir, failed })
  }
}
