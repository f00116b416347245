import { Command } from './types'
import { CommitFileEntry } from '../contracts/types'
import { formatTimestamp, parseCommitId, shortHash, usageError } from './format'

const section = (title: string, marker: string, entries: CommitFileEntry[]): string =>
  `\n\n${title} (${entries.length}):\n` +
  entries.map((entry) => `  ${marker} ${entry.path} (${shortHash(entry.hash)})`).join('\n')

export const ShowCommand: Command = {
  name: 'show',
  description: 'Show the files changed by a commit',
  usage: 'chrono show <commit-id>',
  execute: async (vcs, args) => {
    const commitId = parseCommitId(args[0])
    if (commitId === null) {
      return usageError(ShowCommand.usage)
    }

    const { commit, files, totalChanges } = await vcs.show(commitId)
    let message = `Commit ${commit.id}: ${commit.message}\n` +
      `Date: ${formatTimestamp(commit.createdAt)}\n` +
      `Total changes: ${totalChanges}`

    if (files.added.length > 0) message += section('Added files', '+', files.added)
    if (files.modified.length > 0) message += section('Modified files', 'M', files.modified)
    if (files.deleted.length > 0) message += section('Deleted files', 'D', files.deleted)

    return { exitCode: 0, output: message }
  }
}
