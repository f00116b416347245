import { Command } from './types'

export const InitCommand: Command = {
  name: 'init',
  description: 'Initialize a chronotrack repository in the current directory',
  usage: 'chrono init [--force]',
  execute: async (vcs, args) => {
    const force = args.includes('--force')
    const result = await vcs.init(force)

    if (!result.created) {
      return {
        exitCode: 0,
        output: `chronotrack repository already initialized in ${vcs.getRootDir()}`,
      }
    }

    return {
      exitCode: 0,
      output: `Initialized chronotrack repository in ${vcs.getRootDir()}\n` +
        `Repository data: ${result.chronoPath}`,
    }
  }
}
