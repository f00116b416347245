import { Command } from './types'
import { countChanges } from '../snapshot/changeSet'
import { plural } from './format'

export const StatusCommand: Command = {
  name: 'status',
  aliases: ['st'],
  description: 'Show files added, modified or deleted since the last commit',
  usage: 'chrono status',
  execute: async (vcs) => {
    const status = await vcs.status()
    const total = countChanges(status)

    let message = total === 0
      ? 'Working directory is clean.'
      : `Changes detected: ${plural(total, 'file')}`

    if (status.added.length > 0) {
      message += '\n\nAdded files:\n' + status.added.map((path) => `  + ${path}`).join('\n')
    }
    if (status.modified.length > 0) {
      message += '\n\nModified files:\n' + status.modified.map((path) => `  M ${path}`).join('\n')
    }
    if (status.deleted.length > 0) {
      message += '\n\nDeleted files:\n' + status.deleted.map((path) => `  D ${path}`).join('\n')
    }
    if (status.errors.length > 0) {
      message += '\n\nUnreadable entries:\n' +
        status.errors.map((error) => `  ! ${error.path}: ${error.message}`).join('\n')
    }

    return { exitCode: 0, output: message }
  }
}
