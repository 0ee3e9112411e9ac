/**
 * In-process registry stand-in
 *
 * Behaves like the two environment keys: names are case-insensitive and
 * case-preserving, System writes are refused unless `elevated` is set.
 * The test suite runs every controller operation against it.
 */

import type { RegistryValue, Scope } from '../types.js'
import type { RegistryBackend } from './registry.js'
import { AccessDeniedError } from './errors.js'
import { inferValueType, nameKey } from './variables.js'

export type SeedValues = Record<string, string> | RegistryValue[]

export interface MemoryRegistryOptions {
  elevated?: boolean
  system?: SeedValues
  user?: SeedValues
}

/** Return an Error to make the matching call fail */
export type FailureHook = (operation: 'set' | 'remove', scope: Scope, name: string) => Error | null

function seed(values: SeedValues | undefined): Map<string, RegistryValue> {
  const entries: RegistryValue[] = Array.isArray(values)
    ? values
    : Object.entries(values ?? {}).map(([name, value]) => ({ name, value, type: inferValueType(value) }))

  return new Map(entries.map(entry => [nameKey(entry.name), { ...entry }]))
}

export class MemoryRegistryBackend implements RegistryBackend {
  readonly name = 'memory'

  elevated: boolean
  broadcastCount = 0
  /** When set, broadcast() throws it */
  broadcastError: Error | null = null
  failureHook: FailureHook | null = null

  private stores: Record<Scope, Map<string, RegistryValue>>

  constructor(options: MemoryRegistryOptions = {}) {
    this.elevated = options.elevated ?? true
    this.stores = {
      system: seed(options.system),
      user: seed(options.user)
    }
  }

  list(scope: Scope): RegistryValue[] {
    return [...this.stores[scope].values()].map(entry => ({ ...entry }))
  }

  set(scope: Scope, entry: RegistryValue): void {
    this.guard('set', scope, entry.name)
    const store = this.stores[scope]
    const existing = store.get(nameKey(entry.name))
    store.set(nameKey(entry.name), { ...entry, name: existing?.name ?? entry.name })
  }

  remove(scope: Scope, name: string): boolean {
    this.guard('remove', scope, name)
    return this.stores[scope].delete(nameKey(name))
  }

  isElevated(): boolean {
    return this.elevated
  }

  broadcast(): void {
    if (this.broadcastError) {
      throw this.broadcastError
    }
    this.broadcastCount++
  }

  private guard(operation: 'set' | 'remove', scope: Scope, name: string): void {
    if (scope === 'system' && !this.elevated) {
      throw new AccessDeniedError(scope, name)
    }
    const failure = this.failureHook?.(operation, scope, name)
    if (failure) {
      throw failure
    }
  }
}
