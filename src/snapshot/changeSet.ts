import { ChangeSet } from './types'

const byCodeUnit = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0)

/**
 * Partition paths into added, modified and deleted relative to `tracked`.
 * Pure: depends only on the two maps, and each list is sorted.
 */
export function detectChanges(
  current: ReadonlyMap<string, string>,
  tracked: ReadonlyMap<string, string>
): ChangeSet {
  const added: string[] = []
  const modified: string[] = []
  const deleted: string[] = []

  for (const [path, digest] of current) {
    const trackedDigest = tracked.get(path)
    if (trackedDigest === undefined) {
      added.push(path)
    } else if (trackedDigest !== digest) {
      modified.push(path)
    }
  }

  for (const path of tracked.keys()) {
    if (!current.has(path)) {
      deleted.push(path)
    }
  }

  return {
    added: added.sort(byCodeUnit),
    modified: modified.sort(byCodeUnit),
    deleted: deleted.sort(byCodeUnit),
  }
}

export function countChanges(changes: ChangeSet): number {
  return changes.added.length + changes.modified.length + changes.deleted.length
}

export function hasChanges(changes: ChangeSet): boolean {
  return countChanges(changes) > 0
}

