#!/usr/bin/env node

import { VersionControl } from '../vcs/VersionControl'
import { CommandRegistry, CommandResult, defaultCommands } from '../commands'
import { ChronoError } from '../contracts/errors'
import { debugLog, errorDetails } from '../logging/debugLog'

export function formatError(error: unknown): string {
  if (error instanceof ChronoError) {
    return `Error: ${error.message}`
  }
  return `Unexpected error: ${error instanceof Error ? error.message : String(error)}`
}

/**
 * Dispatch one command line. Never throws: failures become exit code 1.
 */
export async function run(
  argv: string[],
  vcs: VersionControl = new VersionControl()
): Promise<CommandResult> {
  const registry = CommandRegistry.createWithDefaults(defaultCommands)
  const [name, ...args] = argv

  if (name === undefined) {
    return { exitCode: 1, output: registry.renderHelp() }
  }
  if (registry.isHelpRequest(name)) {
    return { exitCode: 0, output: registry.renderHelp() }
  }

  const command = registry.get(name)
  if (!command) {
    return { exitCode: 1, output: `Unknown command: ${name}\n\n${registry.renderHelp()}` }
  }

  debugLog({ event: 'command_start', command: command.name, args })
  try {
    return await command.execute(vcs, args)
  } catch (error) {
    debugLog({ event: 'command_failed', command: command.name, ...errorDetails(error) })
    return { exitCode: 1, output: formatError(error) }
  } finally {
    vcs.close()
  }
}

// Only run if this is the main module
if (require.main === module) {
  run(process.argv.slice(2))
    .then((result) => {
      if (result.exitCode === 0) {
        console.log(result.output)
      } else {
        console.error(result.output)
      }
      process.exitCode = result.exitCode
    })
    .catch((error: unknown) => {
      console.error(formatError(error))
      process.exitCode = 1
    })
}
