/**
 * Error kinds raised by the engine. Each carries the operation that failed so
 * the CLI can print `<operation>: <message>` without knowing the details.
 */
export class ChronoError extends Error {
  readonly operation: string

  constructor(operation: string, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ChronoError'
    this.operation = operation
  }
}

/** Commit attempted with an empty change set. Not fatal. */
export class NoChangesError extends ChronoError {
  constructor() {
    super('commit', 'No changes to commit.')
    this.name = 'NoChangesError'
  }
}

export class NotFoundError extends ChronoError {
  readonly entity: 'commit' | 'file'
  readonly id: number | string

  constructor(operation: string, entity: 'commit' | 'file', id: number | string) {
    super(operation, `${entity === 'commit' ? 'Commit' : 'File'} ${id} not found.`)
    this.name = 'NotFoundError'
    this.entity = entity
    this.id = id
  }
}

export class IOError extends ChronoError {
  readonly path: string

  constructor(operation: string, path: string, cause: unknown) {
    super(operation, `${path}: ${describeCause(cause)}`, { cause })
    this.name = 'IOError'
    this.path = path
  }
}

export class TransactionError extends ChronoError {
  constructor(operation: string, cause: unknown) {
    super(operation, `Database transaction failed and was rolled back: ${describeCause(cause)}`, { cause })
    this.name = 'TransactionError'
  }
}

export class IntegrityError extends ChronoError {
  constructor(operation: string, message: string) {
    super(operation, message)
    this.name = 'IntegrityError'
  }
}

export class NotInitializedError extends ChronoError {
  constructor(operation: string, rootDir: string) {
    super(operation, `Not a chronotrack repository: ${rootDir}. Run 'chrono init' first.`)
    this.name = 'NotInitializedError'
  }
}

export class ValidationError extends ChronoError {
  constructor(operation: string, message: string) {
    super(operation, message)
    this.name = 'ValidationError'
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause)
}
