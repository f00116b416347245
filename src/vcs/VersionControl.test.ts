import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'fs'
import path from 'path'
import { VersionControl } from './VersionControl'
import { ConfigLoader } from '../config/ConfigLoader'
import { NotFoundError, NotInitializedError, ValidationError } from '../contracts/errors'
import { HELLO_DIGEST, WORLD_DIGEST, makeTempDir, removeFile, writeFile } from '../../test/helpers'

const NOW = new Date('2024-05-06T07:08:09.000Z')

describe('VersionControl', () => {
  let tempDir: string
  let vcs: VersionControl

  beforeEach(() => {
    tempDir = makeTempDir('vcs-test')
    vcs = new VersionControl({ rootDir: tempDir, now: () => NOW })
  })

  afterEach(() => {
    vcs.close()
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  describe('initialization', () => {
    it('should refuse every operation before init', async () => {
      expect(await vcs.isInitialized()).toBe(false)
      await expect(vcs.status()).rejects.toBeInstanceOf(NotInitializedError)
      await expect(vcs.commit('first')).rejects.toBeInstanceOf(NotInitializedError)
      await expect(vcs.log()).rejects.toBeInstanceOf(NotInitializedError)
      await expect(vcs.reset(true)).rejects.toBeInstanceOf(NotInitializedError)
    })

    it('should create the repository layout and a default config', async () => {
      const result = await vcs.init()

      expect(result).toEqual({ created: true, chronoPath: path.join(tempDir, '.chrono') })
      expect(await vcs.isInitialized()).toBe(true)
      expect(fs.existsSync(path.join(tempDir, '.chrono', 'chrono.db'))).toBe(true)
      expect(fs.statSync(path.join(tempDir, '.chrono', 'backups')).isDirectory()).toBe(true)
      expect(JSON.parse(fs.readFileSync(path.join(tempDir, '.chrono', 'config.json'), 'utf-8'))).toEqual(
        ConfigLoader.DEFAULT_CONFIG
      )
    })

    it('should keep an existing repository unless forced', async () => {
      await vcs.init()
      writeFile(tempDir, 'a.txt', 'hello')
      await vcs.commit('first')

      expect(await vcs.init()).toMatchObject({ created: false })
      expect(await vcs.init(true)).toMatchObject({ created: true })
      expect(await vcs.log()).toHaveLength(1)
    })
  })

  describe('with a repository', () => {
    beforeEach(async () => {
      await vcs.init()
    })

    it('should report the working tree status', async () => {
      writeFile(tempDir, 'a.txt', 'hello')
      expect(await vcs.status()).toEqual({ added: ['a.txt'], modified: [], deleted: [], errors: [] })

      await vcs.commit('first')
      expect(await vcs.status()).toEqual({ added: [], modified: [], deleted: [], errors: [] })
    })

    it('should trim the message and reject an empty one', async () => {
      writeFile(tempDir, 'a.txt', 'hello')

      await expect(vcs.commit('   ')).rejects.toBeInstanceOf(ValidationError)
      expect(await vcs.commit('  first  ')).toMatchObject({ kind: 'committed', commit: { message: 'first' } })
    })

    it('should list commits newest first with their change counts', async () => {
      writeFile(tempDir, 'a.txt', 'hello')
      writeFile(tempDir, 'b.txt', 'hello')
      await vcs.commit('first')
      writeFile(tempDir, 'a.txt', 'world')
      removeFile(tempDir, 'b.txt')
      await vcs.commit('second')

      expect(await vcs.log()).toEqual([
        { id: 2, message: 'second', createdAt: NOW.toISOString(), added: 0, modified: 1, deleted: 1 },
        { id: 1, message: 'first', createdAt: NOW.toISOString(), added: 2, modified: 0, deleted: 0 },
      ])
      expect((await vcs.log(1)).map((commit) => commit.id)).toEqual([2])
      await expect(vcs.log(0)).rejects.toBeInstanceOf(ValidationError)
    })

    it('should apply the configured default log limit', async () => {
      fs.writeFileSync(
        path.join(tempDir, '.chrono', 'config.json'),
        JSON.stringify({ log: { defaultLimit: 1 } })
      )
      const limited = new VersionControl({ rootDir: tempDir })
      try {
        writeFile(tempDir, 'a.txt', 'one')
        await limited.commit('first')
        writeFile(tempDir, 'a.txt', 'two')
        await limited.commit('second')

        expect((await limited.log()).map((commit) => commit.message)).toEqual(['second'])
      } finally {
        limited.close()
      }
    })

    it('should group the files of a commit by status', async () => {
      writeFile(tempDir, 'a.txt', 'hello')
      writeFile(tempDir, 'b.txt', 'hello')
      await vcs.commit('first')
      writeFile(tempDir, 'a.txt', 'world')
      removeFile(tempDir, 'b.txt')
      writeFile(tempDir, 'c.txt', 'world')
      await vcs.commit('second')

      expect(await vcs.show(2)).toEqual({
        commit: { id: 2, message: 'second', createdAt: NOW.toISOString() },
        files: {
          added: [{ path: 'c.txt', hash: WORLD_DIGEST }],
          modified: [{ path: 'a.txt', hash: WORLD_DIGEST }],
          deleted: [{ path: 'b.txt', hash: HELLO_DIGEST }],
        },
        totalChanges: 3,
      })
      await expect(vcs.show(9)).rejects.toBeInstanceOf(NotFoundError)
    })

    it('should revert and list files', async () => {
      writeFile(tempDir, 'a.txt', 'hello')
      await vcs.commit('first')
      removeFile(tempDir, 'a.txt')
      await vcs.commit('second')

      const result = await vcs.revert(1)

      expect(result).toMatchObject({ commitId: 1, restored: ['a.txt'], removed: [] })
      expect(await vcs.listFiles()).toEqual([{ id: 1, path: 'a.txt', hash: HELLO_DIGEST, tracked: true }])
    })

    it('should report repository statistics', async () => {
      writeFile(tempDir, 'a.txt', 'hello')
      writeFile(tempDir, 'b.txt', 'bb')
      await vcs.commit('first')
      removeFile(tempDir, 'b.txt')
      await vcs.commit('second')

      const stats = await vcs.stats()

      expect(stats).toMatchObject({
        totalCommits: 2,
        totalFiles: 2,
        trackedFiles: 1,
        backupSize: 7,
        repositoryPath: tempDir,
        chronoPath: path.join(tempDir, '.chrono'),
      })
      const dbPath = path.join(tempDir, '.chrono', 'chrono.db')
      const walPath = `${dbPath}-wal`
      expect(fs.existsSync(walPath)).toBe(true)
      expect(stats.databaseSize).toBe(fs.statSync(dbPath).size + fs.statSync(walPath).size)
      expect(stats.databaseSize).toBeGreaterThan(fs.statSync(dbPath).size)
    })

    it('should honour ignore patterns from the config file', async () => {
      fs.writeFileSync(
        path.join(tempDir, '.chrono', 'config.json'),
        JSON.stringify({ ignore: { patterns: ['*.tmp'] } })
      )
      const configured = new VersionControl({ rootDir: tempDir })
      try {
        writeFile(tempDir, 'keep.txt', 'x')
        writeFile(tempDir, 'scratch.tmp', 'x')

        expect((await configured.status()).added).toEqual(['keep.txt'])
      } finally {
        configured.close()
      }
    })

    it('should prefer explicit ignore patterns', async () => {
      const explicit = new VersionControl({ rootDir: tempDir, ignorePatterns: ['*.txt'] })
      try {
        writeFile(tempDir, 'a.txt', 'x')
        writeFile(tempDir, 'b.md', 'x')

        expect((await explicit.status()).added).toEqual(['b.md'])
      } finally {
        explicit.close()
      }
    })

    it('should prune old emergency backups on cleanup', async () => {
      const emergencyDir = path.join(tempDir, '.chrono', 'backups', 'emergency')
      for (let i = 1; i <= 7; i++) {
        fs.mkdirSync(path.join(emergencyDir, `e${i}`), { recursive: true })
      }

      expect(await vcs.cleanup()).toEqual({ removedEmergencyBackups: ['e1', 'e2'] })
      expect(fs.readdirSync(emergencyDir).sort()).toEqual(['e3', 'e4', 'e5', 'e6', 'e7'])
    })

    it('should require confirmation to reset', async () => {
      writeFile(tempDir, 'a.txt', 'hello')
      await vcs.commit('first')

      await expect(vcs.reset(false)).rejects.toBeInstanceOf(ValidationError)
      await vcs.reset(true)

      expect(await vcs.log()).toEqual([])
      expect(await vcs.listFiles()).toEqual([])
      expect(fs.readdirSync(path.join(tempDir, '.chrono', 'backups'))).toEqual([])
      // The working tree is kept and shows up as new again
      expect((await vcs.status()).added).toEqual(['a.txt'])
    })
  })
})
