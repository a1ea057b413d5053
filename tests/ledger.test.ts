import { describe, expect, it, vi } from 'vitest'

import { LedgerClosedError } from '../src/core/errors.js'
import { RollbackLedger } from '../src/core/ledger.js'

describe('RollbackLedger', () => {
  it('unwinds in reverse registration order', async () => {
    const ledger = new RollbackLedger()
    const order: string[] = []
    for (const label of ['sandbox', 'install', 'editor']) {
      ledger.register({ label, run: () => { order.push(label) } })
    }

    const report = await ledger.unwind()
    expect(order).toEqual(['editor', 'install', 'sandbox'])
    expect(report).toEqual({ executed: ['editor', 'install', 'sandbox'], failures: [], complete: true })
  })

  it('keeps unwinding past a failing action', async () => {
    const error = vi.fn()
    const ledger = new RollbackLedger({ info: vi.fn(), warn: vi.fn(), error })
    const order: string[] = []
    ledger.register({ label: 'a', run: async () => { order.push('a') } })
    ledger.register({ label: 'b', run: async () => { throw new Error('disk gone') } })
    ledger.register({ label: 'c', run: async () => { order.push('c') } })

    const report = await ledger.unwind()
    expect(order).toEqual(['c', 'a'])
    expect(report.complete).toBe(false)
    expect(report.executed).toEqual(['c', 'a'])
    expect(report.failures).toEqual([{ label: 'b', error: 'disk gone' }])
    expect(error).toHaveBeenCalledWith('[devstrap] rollback action failed: b - disk gone')
  })

  it('second unwind is a no-op', async () => {
    const ledger = new RollbackLedger()
    const run = vi.fn()
    ledger.register({ label: 'x', run })

    await ledger.unwind()
    const again = await ledger.unwind()
    expect(run).toHaveBeenCalledTimes(1)
    expect(again).toEqual({ executed: [], failures: [], complete: true })
  })

  it('discard drops actions without running them and closes the ledger', async () => {
    const ledger = new RollbackLedger()
    const run = vi.fn()
    ledger.register({ label: 'x', run })
    expect(ledger.size).toBe(1)
    expect(ledger.labels()).toEqual(['x'])

    ledger.discard()
    expect(ledger.size).toBe(0)
    expect(ledger.isClosed).toBe(true)
    expect(run).not.toHaveBeenCalled()
    expect(() => ledger.register({ label: 'y', run })).toThrow(LedgerClosedError)
  })

  it('refuses registration after unwind', async () => {
    const ledger = new RollbackLedger()
    await ledger.unwind()
    expect(() => ledger.register({ label: 'late', run: () => {} })).toThrow(LedgerClosedError)
  })
})
