import { Command } from './types'
import { shortHash } from './format'

export const FilesCommand: Command = {
  name: 'files',
  aliases: ['ls'],
  description: 'List every file chronotrack has recorded',
  usage: 'chrono files',
  execute: async (vcs) => {
    const files = await vcs.listFiles()
    if (files.length === 0) {
      return { exitCode: 0, output: 'No files are currently tracked.' }
    }

    let message = `Tracked files (${files.length}):`
    for (const file of files) {
      const state = file.tracked ? '' : 'deleted, '
      message += `\n  ${file.path} (${state}hash: ${shortHash(file.hash)}...)`
    }
    return { exitCode: 0, output: message }
  }
}
