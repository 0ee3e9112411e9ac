/**
 * Registry access
 *
 * RegistryAccessor is the only component that touches a RegistryBackend.
 * It holds no business rules beyond the ones the registry itself enforces:
 * names must be usable, System writes need elevation, and every successful
 * write or delete is followed by exactly one change broadcast.
 */

import type { RegistryValue, RegistryValueType, Scope, Variable, VariableSet } from '../types.js'
import { AccessDeniedError, ValidationError, VariableNotFoundError } from './errors.js'
import { scopedLogger } from './logger.js'
import { validateName } from './validation.js'
import {
  DEFAULT_PATH_LIKE_NAMES,
  createVariableSet,
  findVariable,
  inferValueType,
  toVariable
} from './variables.js'

/**
 * Storage driver for the two environment keys.
 * Calls are synchronous: registry I/O is short and bounded.
 */
export interface RegistryBackend {
  readonly name: string
  list(scope: Scope): RegistryValue[]
  set(scope: Scope, entry: RegistryValue): void
  /** Returns false when the value did not exist */
  remove(scope: Scope, name: string): boolean
  /** Checked on every System write; privilege can change between calls */
  isElevated(): boolean
  /** Tell other processes the environment changed */
  broadcast(): void
}

export class RegistryAccessor {
  private log = scopedLogger('registry')

  constructor(
    private backend: RegistryBackend,
    private pathLikeNames: readonly string[] = DEFAULT_PATH_LIKE_NAMES
  ) {}

  get backendName(): string {
    return this.backend.name
  }

  read(scope: Scope): VariableSet {
    return createVariableSet(scope, this.backend.list(scope), this.pathLikeNames)
  }

  /**
   * Case-insensitive lookup
   */
  get(scope: Scope, name: string): Variable | null {
    return findVariable(this.read(scope), name) ?? null
  }

  /**
   * Throws AccessDeniedError when the scope cannot be written right now
   */
  assertWritable(scope: Scope, name?: string): void {
    if (scope === 'system' && !this.backend.isElevated()) {
      throw new AccessDeniedError(scope, name)
    }
  }

  /**
   * Create or replace a value. An existing entry keeps its stored casing
   * and, when no type is given, its type.
   */
  write(scope: Scope, name: string, value: string, type?: RegistryValueType): Variable {
    const nameCheck = validateName(name)
    if (!nameCheck.valid) {
      throw new ValidationError(nameCheck.errors, 'name')
    }

    this.assertWritable(scope, name)

    const existing = this.get(scope, name)
    const entry: RegistryValue = {
      name: existing?.name ?? name,
      value,
      type: type ?? existing?.type ?? inferValueType(value)
    }

    this.backend.set(scope, entry)
    this.log.debug({ scope, name: entry.name, type: entry.type }, 'value written')
    this.broadcastChange()

    return toVariable(scope, entry, this.pathLikeNames)
  }

  /**
   * Remove a value; returns what was removed
   */
  delete(scope: Scope, name: string): Variable {
    const existing = this.get(scope, name)
    if (!existing) {
      throw new VariableNotFoundError(name, scope)
    }

    this.assertWritable(scope, name)

    if (!this.backend.remove(scope, existing.name)) {
      throw new VariableNotFoundError(name, scope)
    }

    this.log.debug({ scope, name: existing.name }, 'value deleted')
    this.broadcastChange()

    return existing
  }

  /**
   * Best-effort: a failed broadcast is logged, never thrown
   */
  broadcastChange(): void {
    try {
      this.backend.broadcast()
    } catch (err) {
      this.log.warn({ err }, 'environment change broadcast failed')
    }
  }
}
