import { LedgerClosedError } from './errors.js'
import { errorMessage, Logger, RollbackFailure, silentLogger } from '../types.js'

export interface RollbackAction {
  label: string
  run: () => Promise<void> | void
}

export interface UnwindReport {
  /**
   * Labels of actions that ran to completion, in execution order.
   */
  executed: string[]
  failures: RollbackFailure[]
  complete: boolean
}

/**
 * Ordered stack of compensating actions for one setup run.
 *
 * Actions unwind strictly last-in first-out. A failing action is logged and
 * recorded; the remaining (earlier) actions still run. Once unwound or
 * discarded the ledger is closed.
 */
export class RollbackLedger {
  private actions: RollbackAction[] = []
  private closed = false
  private readonly logger: Logger

  constructor(logger: Logger = silentLogger()) {
    this.logger = logger
  }

  get size(): number {
    return this.actions.length
  }

  get isClosed(): boolean {
    return this.closed
  }

  labels(): string[] {
    return this.actions.map(a => a.label)
  }

  register(action: RollbackAction): void {
    if (this.closed) throw new LedgerClosedError()
    this.actions.push(action)
    this.logger.debug?.(`[devstrap] registered rollback: ${action.label}`)
  }

  async unwind(): Promise<UnwindReport> {
    const report: UnwindReport = { executed: [], failures: [], complete: true }
    const pending = this.actions
    this.actions = []
    this.closed = true

    for (let i = pending.length - 1; i >= 0; i--) {
      const action = pending[i]
      try {
        this.logger.info(`[devstrap] undoing: ${action.label}`)
        await action.run()
        report.executed.push(action.label)
      } catch (e) {
        const error = errorMessage(e)
        report.failures.push({ label: action.label, error })
        report.complete = false
        this.logger.error(`[devstrap] rollback action failed: ${action.label} - ${error}`)
      }
    }
    return report
  }

  /**
   * Drop every action without running it (the run committed).
   */
  discard(): void {
    this.actions = []
    this.closed = true
  }
}
