import { appendFileSync, mkdirSync } from 'fs'
import { dirname, join } from 'path'
import { homedir } from 'os'

// Debug logging - only enabled when CHRONO_DEBUG environment variable is set
export const isDebugEnabled = (): boolean =>
  process.env.CHRONO_DEBUG === 'true' || process.env.CHRONO_DEBUG === '1'

export const debugLogPath = (): string =>
  process.env.CHRONO_DEBUG_FILE ?? join(homedir(), '.chronotrack', 'debug.log')

export const debugLog = (message: Record<string, unknown>): void => {
  if (!isDebugEnabled()) return

  const logPath = debugLogPath()

  // Ensure directory exists
  mkdirSync(dirname(logPath), { recursive: true })

  appendFileSync(logPath, `${new Date().toISOString()} - ${JSON.stringify(message)}\n`)
}

export const errorDetails = (error: unknown): Record<string, unknown> =>
  error instanceof Error
    ? { error: error.message, name: error.name, stack: error.stack }
    : { error: String(error) }
