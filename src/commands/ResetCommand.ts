import { Command } from './types'
import { usageError } from './format'

export const ResetCommand: Command = {
  name: 'reset',
  description: 'Delete all commit history and backups (dangerous!)',
  usage: 'chrono reset --confirm',
  execute: async (vcs, args) => {
    if (!args.includes('--confirm')) {
      return usageError(
        ResetCommand.usage,
        'This will delete all commit history and backups. Pass --confirm if you are sure.'
      )
    }

    await vcs.reset(true)
    return {
      exitCode: 0,
      output: 'Repository reset successfully.\nAll commit history and backups have been deleted.',
    }
  }
}
