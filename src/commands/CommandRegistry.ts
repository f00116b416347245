import { Command, CommandRegistry as ICommandRegistry } from './types'

const HELP_NAMES: readonly string[] = ['help', '--help', '-h']
const HELP_USAGE = 'chrono help'

/**
 * Lookup table from command names and aliases (case-insensitive) to
 * commands. Help is answered by the registry itself from each command's
 * usage line.
 */
export class CommandRegistry implements ICommandRegistry {
  private byName: Map<string, Command> = new Map()
  private ordered: Command[] = []

  register(command: Command): void {
    const names = [command.name, ...(command.aliases ?? [])].map((name) => name.toLowerCase())

    for (const name of names) {
      if (HELP_NAMES.includes(name)) {
        throw new Error(`"${name}" is reserved for help`)
      }
      const owner = this.byName.get(name)
      if (owner && owner !== command) {
        throw new Error(`"${name}" is already registered by ${owner.name}`)
      }
    }

    for (const name of names) {
      this.byName.set(name, command)
    }
    if (!this.ordered.includes(command)) {
      this.ordered.push(command)
    }
  }

  get(name: string): Command | undefined {
    return this.byName.get(name.toLowerCase())
  }

  // In registration order
  getAll(): Command[] {
    return [...this.ordered]
  }

  isHelpRequest(name: string): boolean {
    return HELP_NAMES.includes(name.toLowerCase())
  }

  renderHelp(): string {
    const width = Math.max(HELP_USAGE.length, ...this.ordered.map((command) => command.usage.length))
    const lines = this.ordered.map((command) => `  ${command.usage.padEnd(width)}  ${command.description}`)
    lines.push(`  ${HELP_USAGE.padEnd(width)}  Show this help`)

    return `chronotrack - local file change tracking\n\nUsage:\n${lines.join('\n')}`
  }

  static createWithDefaults(commands: readonly Command[]): CommandRegistry {
    const registry = new CommandRegistry()
    for (const command of commands) {
      registry.register(command)
    }
    return registry
  }
}
