export { VersionControl } from './VersionControl'
export type { VersionControlOptions, StatusResult, InitResult } from './VersionControl'
export type { CommitResult } from '../commit/CommitManager'
export type { RevertResult } from '../revert/RevertManager'
export type { ChangeSet, ScanResult, ScanError } from '../snapshot/types'
export { detectChanges, hasChanges, countChanges } from '../snapshot/changeSet'
export { IgnoreMatcher, DEFAULT_IGNORE_PATTERNS } from '../snapshot/IgnoreMatcher'
export { fingerprint } from '../snapshot/ContentHasher'
export * from '../contracts'
