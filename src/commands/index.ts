export * from './types'
export { CommandRegistry } from './CommandRegistry'
export { InitCommand } from './InitCommand'
export { StatusCommand } from './StatusCommand'
export { CommitCommand } from './CommitCommand'
export { LogCommand } from './LogCommand'
export { ShowCommand } from './ShowCommand'
export { RevertCommand } from './RevertCommand'
export { FilesCommand } from './FilesCommand'
export { StatsCommand } from './StatsCommand'
export { CleanupCommand } from './CleanupCommand'
export { ResetCommand } from './ResetCommand'
export { VersionCommand } from './VersionCommand'

import { InitCommand } from './InitCommand'
import { StatusCommand } from './StatusCommand'
import { CommitCommand } from './CommitCommand'
import { LogCommand } from './LogCommand'
import { ShowCommand } from './ShowCommand'
import { RevertCommand } from './RevertCommand'
import { FilesCommand } from './FilesCommand'
import { StatsCommand } from './StatsCommand'
import { CleanupCommand } from './CleanupCommand'
import { ResetCommand } from './ResetCommand'
import { VersionCommand } from './VersionCommand'

export const defaultCommands = [
  InitCommand,
  StatusCommand,
  CommitCommand,
  LogCommand,
  ShowCommand,
  RevertCommand,
  FilesCommand,
  StatsCommand,
  CleanupCommand,
  ResetCommand,
  VersionCommand,
]
