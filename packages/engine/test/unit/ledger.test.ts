import { Ledger } from '../../src/ledger/Ledger'
import { codeOf } from '../helpers/host'

const codeOfSync = (fn: () => unknown) => codeOf(Promise.resolve().then(fn))

describe('Ledger', () => {
  it('reads zero for unknown participants', () => {
    const l = new Ledger()
    expect(l.read('nobody')).toBe(0n)
    expect(l.total()).toBe(0n)
  })

  it('credit accumulates per participant and in the aggregate', () => {
    const l = new Ledger()
    expect(l.credit('alice', 10n)).toBe(10n)
    expect(l.credit('bob', 20n)).toBe(20n)
    expect(l.credit('alice', 5n)).toBe(15n)
    expect(l.total()).toBe(35n)
    expect(l.isBalanced(35n)).toBe(true)
    expect(l.isBalanced(34n)).toBe(false)
  })

  it('credit rejects non-positive amounts without changing anything', async () => {
    const l = new Ledger({ alice: 3n })
    expect(await codeOfSync(() => l.credit('alice', 0n))).toBe('INPUT_INVALID_AMOUNT')
    expect(await codeOfSync(() => l.credit('alice', -1n))).toBe('INPUT_INVALID_AMOUNT')
    expect(l.read('alice')).toBe(3n)
    expect(l.total()).toBe(3n)
  })

  it('debitToZero pays out once and keeps a zero entry', async () => {
    const l = new Ledger({ alice: 30n, bob: 5n })
    expect(l.debitToZero('alice')).toBe(30n)
    expect(l.read('alice')).toBe(0n)
    expect(l.total()).toBe(5n)
    expect(l.toRecord()).toEqual({ alice: 0n, bob: 5n })
    expect(await codeOfSync(() => l.debitToZero('alice'))).toBe('SETTLE_NOTHING_TO_SETTLE')
    expect(await codeOfSync(() => l.debitToZero('carol'))).toBe('SETTLE_NOTHING_TO_SETTLE')
    expect(l.total()).toBe(5n)
  })

  it('refuses to load negative balances', async () => {
    expect(await codeOfSync(() => new Ledger({ alice: -1n }))).toBe('INTERNAL_LEDGER_IMBALANCE')
  })

  it('entries preserve insertion order', () => {
    const l = new Ledger({ b: 1n })
    l.credit('a', 2n)
    expect(l.entries()).toEqual([['b', 1n], ['a', 2n]])
  })
})
