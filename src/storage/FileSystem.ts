export interface WalkError {
  path: string
  message: string
}

export interface WalkResult {
  // Relative paths with '/' separators
  files: string[]
  errors: WalkError[]
}

/**
 * Decides whether a relative entry is skipped during a walk. A skipped
 * directory is never entered.
 */
export type WalkFilter = (relativePath: string, isDirectory: boolean) => boolean

export interface FileSystem {
  readFile(filePath: string): Promise<Buffer>
  // Creates missing parent directories
  writeFile(filePath: string, data: Uint8Array): Promise<void>
  // A missing file is not an error
  removeFile(filePath: string): Promise<void>
  walkTree(rootDir: string, skip: WalkFilter): Promise<WalkResult>
  ensureDir(dirPath: string): Promise<void>
  exists(entryPath: string): Promise<boolean>
  // True only for a regular file
  isFile(entryPath: string): Promise<boolean>
  removeDir(dirPath: string): Promise<void>
  // Removes the directory only when it is empty; true when it was removed
  removeEmptyDir(dirPath: string): Promise<boolean>
  // Names of the direct subdirectories, sorted
  listDirs(dirPath: string): Promise<string[]>
  // Size in bytes of a file, or the total of every file below a directory
  size(entryPath: string): Promise<number>
}
