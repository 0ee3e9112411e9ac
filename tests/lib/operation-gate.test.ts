import { describe, it, expect } from 'vitest'
import { OperationGate } from '../../src/lib/operation-gate.js'

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {}
  const promise = new Promise<void>(r => { resolve = r })
  return { promise, resolve }
}

describe('OperationGate', () => {
  it('runs mutations one at a time in submission order', async () => {
    const gate = new OperationGate()
    const events: string[] = []
    const first = deferred()

    const a = gate.exclusive(async () => {
      events.push('a:start')
      await first.promise
      events.push('a:end')
    })
    const b = gate.exclusive(async () => {
      events.push('b:start')
      events.push('b:end')
    })

    await Promise.resolve()
    expect(gate.pendingWrites).toBe(2)
    first.resolve()
    await Promise.all([a, b])
    await new Promise(r => setTimeout(r, 0))

    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end'])
    expect(gate.pendingWrites).toBe(0)
  })

  it('lets reads overlap each other', async () => {
    const gate = new OperationGate()
    const hold = deferred()
    let concurrent = 0
    let peak = 0

    const read = () => gate.shared(async () => {
      concurrent++
      peak = Math.max(peak, concurrent)
      await hold.promise
      concurrent--
    })

    const reads = [read(), read()]
    await new Promise(r => setTimeout(r, 0))
    hold.resolve()
    await Promise.all(reads)
    expect(peak).toBe(2)
    expect(gate.activeReads).toBe(0)
  })

  it('makes a mutation wait for in-flight reads', async () => {
    const gate = new OperationGate()
    const events: string[] = []
    const hold = deferred()

    const read = gate.shared(async () => {
      events.push('read:start')
      await hold.promise
      events.push('read:end')
    })
    await new Promise(r => setTimeout(r, 0))

    const write = gate.exclusive(() => { events.push('write') })
    await new Promise(r => setTimeout(r, 0))
    expect(events).toEqual(['read:start'])

    hold.resolve()
    await Promise.all([read, write])
    expect(events).toEqual(['read:start', 'read:end', 'write'])
  })

  it('makes reads wait while a mutation runs', async () => {
    const gate = new OperationGate()
    const events: string[] = []
    const hold = deferred()

    const write = gate.exclusive(async () => {
      events.push('write:start')
      await hold.promise
      events.push('write:end')
    })
    await new Promise(r => setTimeout(r, 0))

    const read = gate.shared(() => { events.push('read') })
    await new Promise(r => setTimeout(r, 0))
    expect(events).toEqual(['write:start'])

    hold.resolve()
    await Promise.all([write, read])
    expect(events).toEqual(['write:start', 'write:end', 'read'])
  })

  it('releases the gate after a failed mutation', async () => {
    const gate = new OperationGate()
    await expect(gate.exclusive(() => { throw new Error('boom') })).rejects.toThrow('boom')
    await expect(gate.shared(() => 'ok')).resolves.toBe('ok')
    await expect(gate.exclusive(() => 42)).resolves.toBe(42)
  })
})
