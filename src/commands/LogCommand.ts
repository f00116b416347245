import { Command } from './types'
import { formatTimestamp, usageError } from './format'

const SEPARATOR = '-'.repeat(50)

/**
 * `[]`, `--limit N`, `-n N` or `--limit=N`. Undefined means the configured
 * default; null means the arguments are invalid.
 */
function parseLimit(args: string[]): number | undefined | null {
  if (args.length === 0) {
    return undefined
  }

  const [flag, next] = args
  let value: string | undefined
  let consumed: number
  if (flag === '--limit' || flag === '-n') {
    value = next
    consumed = 2
  } else if (flag.startsWith('--limit=')) {
    value = flag.slice('--limit='.length)
    consumed = 1
  } else {
    return null
  }

  if (args.length > consumed || value === undefined || !/^\d+$/.test(value)) {
    return null
  }
  const limit = Number(value)
  return Number.isSafeInteger(limit) && limit > 0 ? limit : null
}

export const LogCommand: Command = {
  name: 'log',
  description: 'Show commit history, newest first',
  usage: 'chrono log [--limit <n>]',
  execute: async (vcs, args) => {
    const limit = parseLimit(args)
    if (limit === null) {
      return usageError(LogCommand.usage, 'The limit must be a positive integer.')
    }

    const commits = await vcs.log(limit)
    if (commits.length === 0) {
      return { exitCode: 0, output: 'No commits found.' }
    }

    const lines = [`Showing ${commits.length} commit${commits.length === 1 ? '' : 's'}:`, SEPARATOR]
    for (const commit of commits) {
      lines.push(`Commit ${commit.id}: ${commit.message}`)
      lines.push(`Date: ${formatTimestamp(commit.createdAt)}`)

      const summary: string[] = []
      if (commit.added > 0) summary.push(`${commit.added} added`)
      if (commit.modified > 0) summary.push(`${commit.modified} modified`)
      if (commit.deleted > 0) summary.push(`${commit.deleted} deleted`)
      if (summary.length > 0) {
        lines.push(`Changes: ${summary.join(', ')}`)
      }
      lines.push(SEPARATOR)
    }

    return { exitCode: 0, output: lines.join('\n') }
  }
}
