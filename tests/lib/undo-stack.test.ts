import { describe, it, expect } from 'vitest'
import {
  UndoStack,
  createCommand,
  forwardChanges,
  inverseChanges
} from '../../src/lib/undo-stack.js'
import { NothingToRedoError, NothingToUndoError } from '../../src/lib/errors.js'
import type { Command, VariableChange } from '../../src/types.js'

function change(name: string, before: string | null, after: string | null): VariableChange {
  return {
    scope: 'user',
    name,
    before: before === null ? null : { name, value: before, type: 'REG_SZ' },
    after: after === null ? null : { name, value: after, type: 'REG_SZ' }
  }
}

function command(label: string): Command {
  return createCommand('update', label, [change(label, 'old', 'new')])
}

describe('createCommand', () => {
  it('stamps an id and creation time', () => {
    const cmd = createCommand('add', 'add FOO', [change('FOO', null, '1')], new Date('2026-05-01T00:00:00.000Z'))
    expect(cmd.id).toMatch(/^[0-9a-f-]{36}$/)
    expect(cmd.createdAt).toBe('2026-05-01T00:00:00.000Z')
    expect(cmd.kind).toBe('add')
  })
})

describe('forwardChanges / inverseChanges', () => {
  const cmd = createCommand('import', 'import', [change('A', null, '1'), change('B', '2', '3')])

  it('replays changes in order', () => {
    expect(forwardChanges(cmd).map(c => c.name)).toEqual(['A', 'B'])
  })

  it('reverses order and swaps before/after', () => {
    const inverse = inverseChanges(cmd)
    expect(inverse.map(c => c.name)).toEqual(['B', 'A'])
    expect(inverse[0].after?.value).toBe('2')
    expect(inverse[1].after).toBeNull()
    expect(inverse[1].before?.value).toBe('1')
  })
})

describe('UndoStack', () => {
  it('rejects a capacity below 1', () => {
    expect(() => new UndoStack(0)).toThrow(RangeError)
    expect(() => new UndoStack(1.5)).toThrow(RangeError)
  })

  it('undoes and redoes with the right change lists', async () => {
    const stack = new UndoStack()
    const cmd = command('FOO')
    stack.push(cmd)

    const applied: VariableChange[][] = []
    const apply = (changes: VariableChange[]) => { applied.push(changes) }

    expect(await stack.undo(apply)).toBe(cmd)
    expect(applied[0][0].after?.value).toBe('old')
    expect(stack.canUndo).toBe(false)
    expect(stack.canRedo).toBe(true)

    expect(await stack.redo(apply)).toBe(cmd)
    expect(applied[1][0].after?.value).toBe('new')
    expect(stack.canUndo).toBe(true)
    expect(stack.canRedo).toBe(false)
  })

  it('throws when there is nothing to undo or redo', async () => {
    const stack = new UndoStack()
    await expect(stack.undo(() => {})).rejects.toThrow(NothingToUndoError)
    await expect(stack.redo(() => {})).rejects.toThrow(NothingToRedoError)
  })

  it('clears the redo future on push', async () => {
    const stack = new UndoStack()
    stack.push(command('A'))
    await stack.undo(() => {})
    stack.push(command('B'))
    expect(stack.canRedo).toBe(false)
  })

  it('evicts the oldest command past capacity', () => {
    const stack = new UndoStack(2)
    stack.push(command('A'))
    stack.push(command('B'))
    stack.push(command('C'))
    expect(stack.size).toBe(2)
    expect(stack.entries().history.map(c => c.description)).toEqual(['B', 'C'])
  })

  it('keeps the command when apply fails', async () => {
    const stack = new UndoStack()
    stack.push(command('A'))
    await expect(stack.undo(() => { throw new Error('denied') })).rejects.toThrow('denied')
    expect(stack.canUndo).toBe(true)
    expect(stack.canRedo).toBe(false)
  })

  it('lists the next redo first', async () => {
    const stack = new UndoStack()
    stack.push(command('A'))
    stack.push(command('B'))
    await stack.undo(() => {})
    await stack.undo(() => {})
    expect(stack.entries().future.map(c => c.description)).toEqual(['A', 'B'])
  })

  it('clear empties both stacks', async () => {
    const stack = new UndoStack()
    stack.push(command('A'))
    stack.push(command('B'))
    await stack.undo(() => {})
    stack.clear()
    expect(stack.canUndo).toBe(false)
    expect(stack.canRedo).toBe(false)
  })
})
