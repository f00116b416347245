export const REPOSITORY_DIR = '.chrono'

export const DEFAULT_IGNORE_PATTERNS: readonly string[] = [
  // Repository metadata
  REPOSITORY_DIR,
  // Version control
  '.git',
  '.svn',
  '.hg',
  // Caches and build output
  '__pycache__',
  '.cache',
  '.pytest_cache',
  '.nyc_output',
  'coverage',
  'dist',
  'build',
  // Compiled artifacts
  '*.pyc',
  '*.pyo',
  '*.pyd',
  '*.class',
  '*.o',
  // OS and editor metadata
  '.DS_Store',
  'Thumbs.db',
  '.vscode',
  '.idea',
  '*.swp',
  // Dependencies
  'node_modules',
  // Environment files
  '.env',
  '.env.*',
  // Hidden entries, except .gitignore
  '.*',
  '!.gitignore',
]

interface IgnoreRule {
  pattern: RegExp
  negated: boolean
  directory: boolean
}

export class IgnoreMatcher {
  private rules: IgnoreRule[] = []

  constructor(patterns: readonly string[] = DEFAULT_IGNORE_PATTERNS) {
    for (const pattern of patterns) {
      this.addPattern(pattern)
    }
    // The repository's own directory is never tracked, whatever the config says
    this.addPattern(REPOSITORY_DIR)
  }

  private addPattern(rawPattern: string): void {
    let negated = false
    let directory = false
    let workingPattern = rawPattern.trim()

    if (!workingPattern || workingPattern.startsWith('#')) {
      return
    }

    // Handle negation
    if (workingPattern.startsWith('!')) {
      negated = true
      workingPattern = workingPattern.slice(1)
    }

    // Handle directory-only patterns
    if (workingPattern.endsWith('/')) {
      directory = true
      workingPattern = workingPattern.slice(0, -1)
    }

    if (!workingPattern) {
      return
    }

    this.rules.push({ pattern: this.globToRegex(workingPattern), negated, directory })
  }

  private globToRegex(pattern: string): RegExp {
    // Escape regex special characters except * and ?
    let regex = pattern.replace(/[.+^${}()|[\]\\]/g, '\\$&')

    // Handle ** (matches any number of directories)
    regex = regex.replace(/\*\*/g, '___DOUBLE_STAR___')

    // Handle * (matches anything except /)
    regex = regex.replace(/\*/g, '[^/]*')

    // Handle ? (matches any single character except /)
    regex = regex.replace(/\?/g, '[^/]')

    // Replace back ** placeholder; a leading **/ also matches zero directories
    regex = regex.replace(/___DOUBLE_STAR___\//g, '(.*/)?')
    regex = regex.replace(/___DOUBLE_STAR___/g, '.*')

    // A slash anywhere but the end anchors the pattern to the root;
    // otherwise it matches at any depth
    if (pattern.startsWith('/')) {
      regex = `^${regex.slice(1)}`
    } else if (pattern.includes('/')) {
      regex = `^${regex}`
    } else {
      regex = `(^|/)${regex}`
    }

    return new RegExp(`${regex}$`)
  }

  /**
   * Check the relative path and every directory above it. The last matching
   * rule decides for each entry; an ignored directory hides its subtree.
   */
  shouldIgnore(relativePath: string, isDirectory: boolean = false): boolean {
    const segments = relativePath.split(/[\\/]+/).filter((segment) => segment && segment !== '.')

    if (segments.length === 0) {
      return false
    }

    // Never include entries outside the root directory
    if (segments.includes('..')) {
      return true
    }

    for (let i = 1; i <= segments.length; i++) {
      const entryPath = segments.slice(0, i).join('/')
      const entryIsDirectory = i < segments.length || isDirectory
      if (this.matchesEntry(entryPath, entryIsDirectory)) {
        return true
      }
    }

    return false
  }

  private matchesEntry(entryPath: string, isDirectory: boolean): boolean {
    let ignored = false

    // Later rules override earlier ones
    for (const { pattern, negated, directory } of this.rules) {
      if (directory && !isDirectory) {
        continue
      }
      if (pattern.test(entryPath)) {
        ignored = !negated
      }
    }

    return ignored
  }
}
