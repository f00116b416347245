import { describe, it, expect } from 'vitest'
import { detectChanges, countChanges, hasChanges } from './changeSet'

// Build the tree that results from applying added, modified and deleted paths to a base
function applyChanges(
  base: ReadonlyMap<string, string>,
  added: ReadonlyMap<string, string>,
  modified: ReadonlyMap<string, string>,
  deleted: readonly string[]
): Map<string, string> {
  const result = new Map(base)
  for (const path of deleted) result.delete(path)
  for (const [path, digest] of modified) result.set(path, digest)
  for (const [path, digest] of added) result.set(path, digest)
  return result
}

// Deterministic pseudo-random sequence so failures can be reproduced
function createRandom(seed: number): () => number {
  let state = seed
  return () => {
    state = (state * 48271) % 2147483647
    return state / 2147483647
  }
}

const sorted = (paths: Iterable<string>): string[] => [...paths].sort()

describe('detectChanges', () => {
  it('should classify each path against the tracked baseline', () => {
    const tracked = new Map([
      ['a.txt', 'h1'],
      ['b.txt', 'h2'],
      ['c.txt', 'h3'],
    ])
    const current = new Map([
      ['a.txt', 'h1'],
      ['b.txt', 'h2-changed'],
      ['d.txt', 'h4'],
    ])

    expect(detectChanges(current, tracked)).toEqual({
      added: ['d.txt'],
      modified: ['b.txt'],
      deleted: ['c.txt'],
    })
  })

  it('should return sorted lists regardless of insertion order', () => {
    const current = new Map([
      ['z.txt', '1'],
      ['src/b.ts', '2'],
      ['A.txt', '3'],
      ['src/a.ts', '4'],
    ])

    expect(detectChanges(current, new Map()).added).toEqual(['A.txt', 'src/a.ts', 'src/b.ts', 'z.txt'])
  })

  it('should report nothing when both maps are equal', () => {
    const random = createRandom(7)
    for (let round = 0; round < 20; round++) {
      const tree = new Map<string, string>()
      const size = Math.floor(random() * 30)
      for (let i = 0; i < size; i++) {
        tree.set(`dir${i % 4}/file${i}.txt`, `digest-${Math.floor(random() * 1000)}`)
      }

      const changes = detectChanges(tree, new Map(tree))
      expect(hasChanges(changes)).toBe(false)
      expect(changes).toEqual({ added: [], modified: [], deleted: [] })
    }
  })

  it('should recover exactly the applied changes', () => {
    const random = createRandom(42)
    for (let round = 0; round < 25; round++) {
      const base = new Map<string, string>()
      const baseSize = 5 + Math.floor(random() * 20)
      for (let i = 0; i < baseSize; i++) {
        base.set(`base/${i}.txt`, `b${i}`)
      }

      const added = new Map<string, string>()
      const modified = new Map<string, string>()
      const deleted: string[] = []
      for (const path of base.keys()) {
        const pick = random()
        if (pick < 0.25) modified.set(path, `${base.get(path)}-next`)
        else if (pick < 0.5) deleted.push(path)
      }
      const addCount = Math.floor(random() * 6)
      for (let i = 0; i < addCount; i++) {
        added.set(`new/${round}-${i}.txt`, `n${i}`)
      }

      const current = applyChanges(base, added, modified, deleted)
      expect(detectChanges(current, base)).toEqual({
        added: sorted(added.keys()),
        modified: sorted(modified.keys()),
        deleted: sorted(deleted),
      })
    }
  })

  it('should treat an empty tree against an empty baseline as unchanged', () => {
    expect(detectChanges(new Map(), new Map())).toEqual({ added: [], modified: [], deleted: [] })
  })
})

describe('countChanges', () => {
  it('should sum the three lists', () => {
    const changes = { added: ['a'], modified: ['b', 'c'], deleted: ['d'] }
    expect(countChanges(changes)).toBe(4)
    expect(hasChanges(changes)).toBe(true)
  })
})
