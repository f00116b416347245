import { promises as fs, Dirent, Stats } from 'fs'
import path from 'path'
import { FileSystem, WalkError, WalkFilter, WalkResult } from './FileSystem'
import { describeCause } from '../contracts/errors'

// A path that does not exist, or runs through a regular file
const isMissingEntry = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR')

export class NodeFileSystem implements FileSystem {
  async readFile(filePath: string): Promise<Buffer> {
    return fs.readFile(filePath)
  }

  async writeFile(filePath: string, data: Uint8Array): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true })
    await fs.writeFile(filePath, data)
  }

  async removeFile(filePath: string): Promise<void> {
    await fs.rm(filePath, { force: true })
  }

  async walkTree(rootDir: string, skip: WalkFilter): Promise<WalkResult> {
    const files: string[] = []
    const errors: WalkError[] = []

    const walkDir = async (relativeDir: string): Promise<void> => {
      const currentDir = relativeDir ? path.join(rootDir, relativeDir) : rootDir
      let entries: Dirent[]
      try {
        entries = await fs.readdir(currentDir, { withFileTypes: true })
      } catch (error) {
        errors.push({ path: relativeDir || '.', message: describeCause(error) })
        return
      }

      for (const entry of entries) {
        const relativePath = relativeDir ? `${relativeDir}/${entry.name}` : entry.name
        const isDirectory = entry.isDirectory()

        if (skip(relativePath, isDirectory)) {
          continue
        }

        if (isDirectory) {
          await walkDir(relativePath)
        } else if (entry.isFile()) {
          files.push(relativePath)
        }
      }
    }

    await walkDir('')
    return { files, errors }
  }

  async ensureDir(dirPath: string): Promise<void> {
    await fs.mkdir(dirPath, { recursive: true })
  }

  async exists(entryPath: string): Promise<boolean> {
    try {
      await fs.access(entryPath)
      return true
    } catch {
      return false
    }
  }

  async isFile(entryPath: string): Promise<boolean> {
    const stats = await this.statIfExists(entryPath)
    return stats !== null && stats.isFile()
  }

  async removeEmptyDir(dirPath: string): Promise<boolean> {
    const stats = await this.statIfExists(dirPath)
    if (stats === null || !stats.isDirectory()) {
      return false
    }
    if ((await fs.readdir(dirPath)).length > 0) {
      return false
    }
    await fs.rmdir(dirPath)
    return true
  }

  async removeDir(dirPath: string): Promise<void> {
    await fs.rm(dirPath, { recursive: true, force: true })
  }

  async listDirs(dirPath: string): Promise<string[]> {
    if (!(await this.exists(dirPath))) {
      return []
    }
    const entries = await fs.readdir(dirPath, { withFileTypes: true })
    return entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort()
  }

  async size(entryPath: string): Promise<number> {
    if (!(await this.exists(entryPath))) {
      return 0
    }
    const stats = await fs.stat(entryPath)
    if (!stats.isDirectory()) {
      return stats.size
    }

    let total = 0
    const { files } = await this.walkTree(entryPath, () => false)
    for (const file of files) {
      total += (await fs.stat(path.join(entryPath, file))).size
    }
    return total
  }

  private async statIfExists(entryPath: string): Promise<Stats | null> {
    try {
      return await fs.stat(entryPath)
    } catch (error) {
      if (isMissingEntry(error)) {
        return null
      }
      throw error
    }
  }
}
