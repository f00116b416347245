import { Command } from './types'
import packageJson from '../../package.json'

export const VersionCommand: Command = {
  name: 'version',
  aliases: ['v', '--version', '-v'],
  description: 'Show chronotrack version',
  usage: 'chrono version',
  execute: async () => {
    return {
      exitCode: 0,
      output: `chronotrack v${packageJson.version}`,
    }
  }
}
