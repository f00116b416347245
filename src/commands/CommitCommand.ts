import { Command } from './types'
import { NoChangesError } from '../contracts/errors'
import { plural, usageError } from './format'

export const CommitCommand: Command = {
  name: 'commit',
  aliases: ['ci'],
  description: 'Record the current changes as a new commit',
  usage: 'chrono commit <message>',
  execute: async (vcs, args) => {
    const message = args.join(' ').trim()
    if (!message) {
      return usageError(CommitCommand.usage, 'Commit message cannot be empty.')
    }

    const result = await vcs.commit(message)
    if (result.kind === 'no-op') {
      return { exitCode: 1, output: new NoChangesError().message }
    }

    const { commit, added, modified, deleted } = result
    return {
      exitCode: 0,
      output: `Commit ${commit.id} created: ${commit.message}\n` +
        `  Added: ${plural(added.length, 'file')}\n` +
        `  Modified: ${plural(modified.length, 'file')}\n` +
        `  Deleted: ${plural(deleted.length, 'file')}`,
    }
  }
}
