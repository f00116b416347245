export type ChangeStatus = 'added' | 'modified' | 'deleted'

export interface Commit {
  id: number
  message: string
  createdAt: string
}

export interface TrackedFile {
  id: number
  path: string
  hash: string
  // Whether the path is part of the current baseline
  tracked: boolean
}

export interface ChangeEvent {
  id: number
  commitId: number
  fileId: number
  status: ChangeStatus
  hash: string
  createdAt: string
}

export interface ChangeEventWithPath extends ChangeEvent {
  path: string
}

export interface CommitSummary extends Commit {
  added: number
  modified: number
  deleted: number
}

export interface CommitFileEntry {
  path: string
  hash: string
}

export interface CommitDetails {
  commit: Commit
  files: Record<ChangeStatus, CommitFileEntry[]>
  totalChanges: number
}

export interface RepositoryStats {
  totalCommits: number
  totalFiles: number
  trackedFiles: number
  databaseSize: number
  backupSize: number
  repositoryPath: string
  chronoPath: string
}

export interface CleanupResult {
  removedEmergencyBackups: string[]
}

export interface ChronoConfig {
  ignore: {
    useDefaults: boolean
    patterns: string[]
  }
  log: {
    defaultLimit: number
  }
  backups: {
    keepEmergency: number
  }
}
