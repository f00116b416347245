import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'fs'
import path from 'path'
import { BackupStore } from './BackupStore'
import { NodeFileSystem } from '../storage/NodeFileSystem'
import { makeTempDir, readFile, writeFile } from '../../test/helpers'

describe('BackupStore', () => {
  let tempDir: string
  let backupDir: string
  let clock: number
  let store: BackupStore

  const resolve = (relativePath: string) => path.join(tempDir, 'work', ...relativePath.split('/'))

  beforeEach(() => {
    tempDir = makeTempDir('backup-test')
    backupDir = path.join(tempDir, 'backups')
    clock = Date.UTC(2024, 0, 1)
    store = new BackupStore({
      backupDir,
      fileSystem: new NodeFileSystem(),
      now: () => new Date(clock),
    })
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  it('should keep one blob per commit and file', async () => {
    await store.writeBlob(1, 7, Buffer.from('hello'))

    expect(store.blobPath(1, 7)).toBe(path.join(backupDir, '1', '7'))
    expect((await store.readBlob(1, 7)).toString('utf-8')).toBe('hello')
    expect(await store.hasBlob(1, 7)).toBe(true)
    expect(await store.hasBlob(2, 7)).toBe(false)
    expect(await store.size()).toBe(5)
  })

  it('should drop every blob of a commit', async () => {
    await store.writeBlob(1, 1, Buffer.from('a'))
    await store.writeBlob(1, 2, Buffer.from('b'))
    await store.writeBlob(2, 1, Buffer.from('c'))

    await store.removeCommit(1)

    expect(await store.hasBlob(1, 1)).toBe(false)
    expect(await store.hasBlob(1, 2)).toBe(false)
    expect(await store.hasBlob(2, 1)).toBe(true)
  })

  it('should copy the working tree into an emergency backup and restore it', async () => {
    writeFile(tempDir, 'work/a.txt', 'hello')
    writeFile(tempDir, 'work/src/b.txt', 'world')

    const backup = await store.createEmergencyBackup(['a.txt', 'src/b.txt'], resolve)

    expect(backup.id).toMatch(/^2024-01-01T00-00-00-000Z-[0-9a-f]{8}$/)
    expect(backup.dir).toBe(path.join(backupDir, 'emergency', backup.id))
    expect(fs.readFileSync(path.join(backup.dir, 'src', 'b.txt'), 'utf-8')).toBe('world')

    writeFile(tempDir, 'work/a.txt', 'changed')
    fs.rmSync(resolve('src/b.txt'))

    expect(await store.restoreEmergencyBackup(backup, resolve)).toEqual([])
    expect(readFile(tempDir, 'work/a.txt')).toBe('hello')
    expect(readFile(tempDir, 'work/src/b.txt')).toBe('world')
  })

  it('should report files it could not restore', async () => {
    writeFile(tempDir, 'work/a.txt', 'hello')
    const backup = await store.createEmergencyBackup(['a.txt'], resolve)
    fs.rmSync(path.join(backup.dir, 'a.txt'))

    expect(await store.restoreEmergencyBackup(backup, resolve)).toEqual(['a.txt'])
  })

  it('should keep only the newest emergency backups', async () => {
    const ids: string[] = []
    for (let i = 0; i < 4; i++) {
      clock += 60_000
      ids.push((await store.createEmergencyBackup([], resolve)).id)
    }

    expect(await store.pruneEmergencyBackups(2)).toEqual(ids.slice(0, 2))
    expect(await store.listEmergencyBackups()).toEqual(ids.slice(2))
    expect(await store.pruneEmergencyBackups(5)).toEqual([])
  })

  it('should empty the backup area on clear', async () => {
    await store.writeBlob(1, 1, Buffer.from('a'))
    await store.createEmergencyBackup([], resolve)

    await store.clear()

    expect(fs.readdirSync(backupDir)).toEqual([])
  })
})
