import path from 'path'
import { FileSystem } from '../storage/FileSystem'
import { IgnoreMatcher } from './IgnoreMatcher'
import { fingerprint } from './ContentHasher'
import { ChangeSet, FingerprintMap, ScanError, ScanResult } from './types'
import { detectChanges } from './changeSet'
import { describeCause } from '../contracts/errors'
import { debugLog } from '../logging/debugLog'

export interface FileTrackerOptions {
  rootDir: string
  fileSystem: FileSystem
  ignoreMatcher: IgnoreMatcher
}

export class FileTracker {
  private rootDir: string
  private fileSystem: FileSystem
  private ignoreMatcher: IgnoreMatcher

  constructor(options: FileTrackerOptions) {
    this.rootDir = path.resolve(options.rootDir)
    this.fileSystem = options.fileSystem
    this.ignoreMatcher = options.ignoreMatcher
  }

  /**
   * Fingerprint every file of the working tree that is not ignored.
   * Unreadable entries are reported in `errors` and left out of `files`.
   */
  async scan(): Promise<ScanResult> {
    const files: FingerprintMap = new Map()
    const walk = await this.fileSystem.walkTree(this.rootDir, (relativePath, isDirectory) =>
      this.ignoreMatcher.shouldIgnore(relativePath, isDirectory)
    )
    const errors: ScanError[] = [...walk.errors]

    for (const relativePath of walk.files) {
      try {
        const bytes = await this.fileSystem.readFile(this.resolve(relativePath))
        files.set(relativePath, fingerprint(bytes))
      } catch (error) {
        errors.push({ path: relativePath, message: describeCause(error) })
      }
    }

    debugLog({
      event: 'scan_complete',
      rootDir: this.rootDir,
      fileCount: files.size,
      errorCount: errors.length,
    })

    return { files, errors }
  }

  /**
   * Scan the working tree and diff it against `tracked`.
   */
  async detectChanges(tracked: ReadonlyMap<string, string>): Promise<ChangeSet & { errors: ScanError[] }> {
    const { files, errors } = await this.scan()
    return { ...detectChanges(files, tracked), errors }
  }

  /**
   * Absolute path of a path relative to the working tree
   */
  resolve(relativePath: string): string {
    return path.join(this.rootDir, ...relativePath.split('/'))
  }

  getRootDir(): string {
    return this.rootDir
  }
}
