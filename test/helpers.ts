import fs from 'fs'
import os from 'os'
import path from 'path'
import { SqliteDatabase } from '../src/storage/SqliteDatabase'
import { FileSystem } from '../src/storage/FileSystem'
import { NodeFileSystem } from '../src/storage/NodeFileSystem'
import { initializeSchema } from '../src/records/schema'
import { CommitRepository } from '../src/records/CommitRepository'
import { FileRepository } from '../src/records/FileRepository'
import { ChronoRepository } from '../src/records/ChronoRepository'
import { IgnoreMatcher, REPOSITORY_DIR } from '../src/snapshot/IgnoreMatcher'
import { FileTracker } from '../src/snapshot/FileTracker'
import { BackupStore } from '../src/backup/BackupStore'
import { CommitManager } from '../src/commit/CommitManager'
import { RevertManager } from '../src/revert/RevertManager'

export const makeTempDir = (prefix: string): string =>
  fs.mkdtempSync(path.join(os.tmpdir(), `${prefix}-`))

export function writeFile(rootDir: string, relativePath: string, content: string): void {
  const target = path.join(rootDir, ...relativePath.split('/'))
  fs.mkdirSync(path.dirname(target), { recursive: true })
  fs.writeFileSync(target, content)
}

export function removeFile(rootDir: string, relativePath: string): void {
  fs.rmSync(path.join(rootDir, ...relativePath.split('/')))
}

export function readFile(rootDir: string, relativePath: string): string {
  return fs.readFileSync(path.join(rootDir, ...relativePath.split('/')), 'utf-8')
}

/**
 * Every file below `rootDir` outside .chrono/, as relative path -> content
 */
export function readTree(rootDir: string, relativeDir: string = ''): Record<string, string> {
  const tree: Record<string, string> = {}
  const dir = path.join(rootDir, relativeDir)
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    const relativePath = relativeDir ? `${relativeDir}/${entry.name}` : entry.name
    if (relativePath === REPOSITORY_DIR) continue
    if (entry.isDirectory()) {
      Object.assign(tree, readTree(rootDir, relativePath))
    } else {
      tree[relativePath] = fs.readFileSync(path.join(rootDir, relativePath), 'utf-8')
    }
  }
  return tree
}

export interface EngineOptions {
  fileSystem?: FileSystem
  ignorePatterns?: readonly string[]
  now?: () => Date
}

/**
 * The commit and revert engines over an in-memory database and a real tree
 */
export function createEngine(rootDir: string, options: EngineOptions = {}) {
  const db = new SqliteDatabase({ dbPath: ':memory:' })
  initializeSchema(db)

  const fileSystem = options.fileSystem ?? new NodeFileSystem()
  const fileTracker = new FileTracker({
    rootDir,
    fileSystem,
    ignoreMatcher: new IgnoreMatcher(options.ignorePatterns),
  })
  const backupStore = new BackupStore({
    backupDir: path.join(rootDir, REPOSITORY_DIR, 'backups'),
    fileSystem,
    now: options.now,
  })

  return {
    db,
    fileTracker,
    backupStore,
    commits: new CommitRepository(db),
    files: new FileRepository(db),
    chrono: new ChronoRepository(db),
    commitManager: new CommitManager({ db, fileSystem, fileTracker, backupStore, now: options.now }),
    revertManager: new RevertManager({ db, fileSystem, fileTracker, backupStore }),
  }
}

export type Engine = ReturnType<typeof createEngine>

// SHA-256 digests of the contents used across the tests
export const HELLO_DIGEST = '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824'
export const WORLD_DIGEST = '486ea46224d1bb4fb680f34f7c9ad96a8f24ec88be73ea8e5a6c65260e9cb8a7'
export const EMPTY_DIGEST = 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855'
