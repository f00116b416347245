import { Command } from './types'
import { parseCommitId, plural, usageError } from './format'

export const RevertCommand: Command = {
  name: 'revert',
  description: 'Restore the working tree to the state of a commit',
  usage: 'chrono revert <commit-id>',
  execute: async (vcs, args) => {
    const commitId = parseCommitId(args[0])
    if (commitId === null) {
      return usageError(RevertCommand.usage)
    }

    const result = await vcs.revert(commitId)
    const lines = [`Reverted to commit ${result.commitId}`]
    for (const path of result.restored) lines.push(`  Restored: ${path}`)
    for (const path of result.removed) lines.push(`  Removed: ${path}`)
    lines.push(`${plural(result.restored.length, 'file')} restored, ${plural(result.removed.length, 'file')} removed`)
    lines.push(`Emergency backup created at: ${result.emergencyBackup}`)

    return { exitCode: 0, output: lines.join('\n') }
  }
}
