export type FingerprintMap = Map<string, string>

export interface ScanError {
  path: string
  message: string
}

export interface ScanResult {
  // Relative path -> SHA-256 digest
  files: FingerprintMap
  errors: ScanError[]
}

export interface ChangeSet {
  added: string[]
  modified: string[]
  deleted: string[]
}
