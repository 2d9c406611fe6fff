/**
 * Transaction Manager
 *
 * Rollback support for the fetch/install/configure sequence. Every step that
 * changes the installation registers how to undo itself; if a later step
 * fails, the completed steps are undone in reverse order so a failed run
 * never leaves a half-installed tree behind.
 */

import { logError, logDebug, ErrorCodes } from './error-handler'

export type RollbackAction = {
  description: string
  execute: () => Promise<void>
}

export type CommitAction = RollbackAction

/**
 * Usage:
 * ```ts
 * const tx = new TransactionManager()
 *
 * try {
 *   await promoteDirectory(staged, target)
 *   tx.addRollback({
 *     description: 'Restore previous engine directory',
 *     execute: () => restorePrevious(target),
 *   })
 *   tx.onCommit({
 *     description: 'Remove previous engine directory',
 *     execute: () => removePrevious(target),
 *   })
 *
 *   await tx.commit()
 * } catch (error) {
 *   await tx.rollback()
 *   throw error
 * }
 * ```
 */
export class TransactionManager {
  private rollbackStack: RollbackAction[] = []
  private commitActions: CommitAction[] = []
  private committed = false

  /**
   * Add a rollback action. Actions run in reverse order during rollback.
   */
  addRollback(action: RollbackAction): void {
    if (this.committed) {
      throw new Error('Cannot add rollback action after commit')
    }
    this.rollbackStack.push(action)
    logDebug(`Added rollback action: ${action.description}`, {
      totalActions: this.rollbackStack.length,
    })
  }

  /**
   * Register cleanup that only makes sense once every step succeeded,
   * such as deleting the install a promoted directory replaced.
   */
  onCommit(action: CommitAction): void {
    if (this.committed) {
      throw new Error('Cannot add commit action after commit')
    }
    this.commitActions.push(action)
  }

  /**
   * Execute all rollbacks in reverse order.
   * Continues even if individual rollback actions fail.
   */
  async rollback(): Promise<void> {
    if (this.committed) {
      logDebug('Skipping rollback - transaction was committed')
      return
    }

    logDebug(`Starting rollback of ${this.rollbackStack.length} actions`)

    let action = this.rollbackStack.pop()
    while (action) {
      try {
        logDebug(`Executing rollback: ${action.description}`)
        await action.execute()
      } catch (error) {
        logError({
          code: ErrorCodes.ROLLBACK_FAILED,
          message: `Failed to rollback: ${action.description}`,
          severity: 'warning',
          context: {
            error: error instanceof Error ? error.message : String(error),
          },
        })
      }
      action = this.rollbackStack.pop()
    }

    this.commitActions = []
    logDebug('Rollback complete')
  }

  /**
   * Mark the transaction as committed and run the deferred cleanup.
   * Cleanup failures are logged; the committed state is already in place.
   */
  async commit(): Promise<void> {
    if (this.committed) {
      return
    }

    logDebug(`Committing transaction with ${this.rollbackStack.length} actions`)
    this.rollbackStack = []
    this.committed = true

    for (const action of this.commitActions) {
      try {
        await action.execute()
      } catch (error) {
        logDebug(`Commit cleanup failed: ${action.description}`, {
          error: error instanceof Error ? error.message : String(error),
        })
      }
    }
    this.commitActions = []
  }

  isCommitted(): boolean {
    return this.committed
  }

  getPendingCount(): number {
    return this.rollbackStack.length
  }
}

/**
 * Run an operation with automatic rollback on failure and commit on success.
 */
export async function withTransaction<T>(
  operation: (tx: TransactionManager) => Promise<T>,
): Promise<T> {
  const tx = new TransactionManager()

  try {
    const result = await operation(tx)
    await tx.commit()
    return result
  } catch (error) {
    await tx.rollback()
    throw error
  }
}
