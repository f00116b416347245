import { Command } from './types'
import { plural } from './format'

export const CleanupCommand: Command = {
  name: 'cleanup',
  description: 'Optimize the database and prune old emergency backups',
  usage: 'chrono cleanup',
  execute: async (vcs) => {
    const { removedEmergencyBackups } = await vcs.cleanup()
    let message = 'Database optimized.'
    if (removedEmergencyBackups.length > 0) {
      message += `\nRemoved ${plural(removedEmergencyBackups.length, 'old emergency backup')}.`
    }
    return { exitCode: 0, output: message }
  }
}
