import { Database } from './Database'
import { ChronoError, TransactionError, describeCause } from '../contracts/errors'
import { debugLog } from '../logging/debugLog'

/**
 * Run `work` inside one database transaction. Any failure rolls the whole
 * transaction back; store errors are wrapped in TransactionError, engine
 * errors keep their own kind.
 */
export async function withTransaction<T>(
  db: Database,
  operation: string,
  work: () => Promise<T>
): Promise<T> {
  db.beginTransaction()
  try {
    const result = await work()
    db.commit()
    return result
  } catch (error) {
    try {
      db.rollback()
    } catch (rollbackError) {
      debugLog({
        event: 'rollback_failed',
        operation,
        error: describeCause(rollbackError),
      })
      throw new TransactionError(operation, rollbackError)
    }
    if (error instanceof ChronoError) {
      throw error
    }
    throw new TransactionError(operation, error)
  }
}
