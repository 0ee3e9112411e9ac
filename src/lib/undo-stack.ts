/**
 * Command history
 *
 * Every committed mutation is recorded as a Command holding the before/after
 * state of each entry it touched. Undo replays the `before` states in
 * reverse order; redo replays the `after` states in order. History lives in
 * memory only.
 */

import { randomUUID } from 'node:crypto'
import type { Command, CommandKind, VariableChange } from '../types.js'
import { NothingToRedoError, NothingToUndoError } from './errors.js'

export const DEFAULT_HISTORY_CAPACITY = 100

/** Applies a list of changes to the registry, in the given order */
export type ChangeApplier = (changes: VariableChange[]) => Promise<void> | void

export function createCommand(
  kind: CommandKind,
  description: string,
  changes: VariableChange[],
  now: Date = new Date()
): Command {
  return {
    id: randomUUID(),
    kind,
    description,
    createdAt: now.toISOString(),
    changes
  }
}

export function forwardChanges(command: Command): VariableChange[] {
  return command.changes.map(change => ({ ...change }))
}

/**
 * Changes that take the registry back to the state before `command`
 */
export function inverseChanges(command: Command): VariableChange[] {
  return [...command.changes]
    .reverse()
    .map(change => ({ scope: change.scope, name: change.name, before: change.after, after: change.before }))
}

export class UndoStack {
  private history: Command[] = []
  private future: Command[] = []

  constructor(private capacity: number = DEFAULT_HISTORY_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`History capacity must be a positive integer, got ${capacity}`)
    }
  }

  get canUndo(): boolean {
    return this.history.length > 0
  }

  get canRedo(): boolean {
    return this.future.length > 0
  }

  get size(): number {
    return this.history.length
  }

  /**
   * Record a new command; the redo future is discarded
   */
  push(command: Command): void {
    this.history.push(command)
    this.future = []
    while (this.history.length > this.capacity) {
      this.history.shift()
    }
  }

  /**
   * Revert the most recent command. When `apply` throws, the command stays
   * on the history and the error propagates.
   */
  async undo(apply: ChangeApplier): Promise<Command> {
    const command = this.history.pop()
    if (!command) {
      throw new NothingToUndoError()
    }

    try {
      await apply(inverseChanges(command))
    } catch (err) {
      this.history.push(command)
      throw err
    }

    this.future.push(command)
    return command
  }

  async redo(apply: ChangeApplier): Promise<Command> {
    const command = this.future.pop()
    if (!command) {
      throw new NothingToRedoError()
    }

    try {
      await apply(forwardChanges(command))
    } catch (err) {
      this.future.push(command)
      throw err
    }

    this.history.push(command)
    return command
  }

  /** History oldest first; future with the next redo first */
  entries(): { history: Command[]; future: Command[] } {
    return { history: [...this.history], future: [...this.future].reverse() }
  }

  clear(): void {
    this.history = []
    this.future = []
  }
}
