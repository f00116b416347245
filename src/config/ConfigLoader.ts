import fs from 'fs'
import path from 'path'
import { z } from 'zod'
import { ChronoConfig } from '../contracts/types'
import { ChronoConfigSchema } from '../contracts/schemas'
import { DEFAULT_IGNORE_PATTERNS, REPOSITORY_DIR } from '../snapshot/IgnoreMatcher'

export const CONFIG_FILE_NAME = 'config.json'

export class ConfigLoader {
  static readonly DEFAULT_CONFIG: ChronoConfig = {
    ignore: {
      useDefaults: true,
      patterns: [],
    },
    log: {
      defaultLimit: 10,
    },
    backups: {
      keepEmergency: 5,
    },
  }

  private config: ChronoConfig
  private configPath: string

  constructor(rootDir: string, configPath?: string) {
    this.configPath = configPath ?? ConfigLoader.defaultPath(rootDir)
    this.config = this.loadConfig()
  }

  static defaultPath(rootDir: string): string {
    return path.join(rootDir, REPOSITORY_DIR, CONFIG_FILE_NAME)
  }

  private loadConfig(): ChronoConfig {
    if (!fs.existsSync(this.configPath)) {
      return ConfigLoader.DEFAULT_CONFIG
    }

    try {
      const rawConfig = fs.readFileSync(this.configPath, 'utf-8')
      const parsedConfig = JSON.parse(rawConfig)

      // Validate and apply defaults
      return ChronoConfigSchema.parse(parsedConfig)
    } catch (error) {
      if (error instanceof z.ZodError) {
        console.error(`Invalid config at ${this.configPath}:`, error.errors)
      } else if (error instanceof SyntaxError) {
        console.error(`Invalid JSON in config file ${this.configPath}`)
      } else {
        console.error(`Error loading config from ${this.configPath}:`, error)
      }

      return ConfigLoader.DEFAULT_CONFIG
    }
  }

  getConfig(): ChronoConfig {
    return this.config
  }

  getConfigPath(): string {
    return this.configPath
  }

  /**
   * The ignore patterns in effect: the defaults (unless disabled) followed
   * by the configured ones, so configured patterns can override defaults.
   */
  getIgnorePatterns(): string[] {
    const { useDefaults, patterns } = this.config.ignore
    return useDefaults ? [...DEFAULT_IGNORE_PATTERNS, ...patterns] : [...patterns]
  }

  reloadConfig(): void {
    this.config = this.loadConfig()
  }
}
