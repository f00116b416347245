import { Command } from './types'

export const StatsCommand: Command = {
  name: 'stats',
  description: 'Show repository statistics',
  usage: 'chrono stats',
  execute: async (vcs) => {
    const stats = await vcs.stats()
    return {
      exitCode: 0,
      output: 'Repository Statistics:\n' +
        `  Total commits: ${stats.totalCommits}\n` +
        `  Total tracked files: ${stats.totalFiles} (${stats.trackedFiles} present)\n` +
        `  Database size: ${stats.databaseSize} bytes\n` +
        `  Backup size: ${stats.backupSize} bytes\n` +
        `  Repository path: ${stats.repositoryPath}`,
    }
  }
}
