import { VersionControl } from '../vcs/VersionControl'

export interface CommandResult {
  exitCode: 0 | 1
  output: string
}

export interface Command {
  name: string
  aliases?: string[]
  description: string
  usage: string
  execute: (vcs: VersionControl, args: string[]) => Promise<CommandResult>
}

export interface CommandRegistry {
  register(command: Command): void
  get(name: string): Command | undefined
  getAll(): Command[]
  isHelpRequest(name: string): boolean
  renderHelp(): string
}
