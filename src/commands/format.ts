const pad = (value: number): string => String(value).padStart(2, '0')

/**
 * `YYYY-MM-DD HH:MM:SS` in local time
 */
export function formatTimestamp(iso: string): string {
  const date = new Date(iso)
  if (Number.isNaN(date.getTime())) {
    return iso
  }
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
}

export const shortHash = (hash: string): string => hash.slice(0, 8)

export const plural = (count: number, noun: string): string =>
  `${count} ${noun}${count === 1 ? '' : 's'}`

/**
 * A positive integer commit id, or null when the argument is not one
 */
export function parseCommitId(arg: string | undefined): number | null {
  if (arg === undefined || !/^\d+$/.test(arg)) {
    return null
  }
  const id = Number(arg)
  return Number.isSafeInteger(id) && id > 0 ? id : null
}

export const usageError = (usage: string, message?: string) => ({
  exitCode: 1 as const,
  output: message ? `${message}\n\nUsage: ${usage}` : `Usage: ${usage}`,
})
