/**
 * Backup Manager
 *
 * Point-in-time captures of one or both scopes, on top of a SnapshotStore.
 * Restoring is the controller's job: it has to go through validation and
 * the undo history like any other mutation.
 */

import type { RetentionPolicy, Scope, VariableSet } from '../types.js'
import { SCOPES } from '../types.js'
import { SnapshotIntegrityError, SnapshotNotFoundError } from './errors.js'
import { scopedLogger } from './logger.js'
import type { RegistryAccessor } from './registry.js'
import type { SnapshotData, SnapshotInfo, SnapshotStore, SnapshotVerification } from './snapshot.js'
import { createVariableSet, toRegistryValue } from './variables.js'

const DAY_MS = 24 * 60 * 60 * 1000

export interface Snapshot {
  info: SnapshotInfo
  sets: VariableSet[]
}

export interface SnapshotOptions {
  name?: string
  automatic?: boolean
  reason?: string
  now?: Date
}

export interface PruneOptions {
  now?: Date
  automaticOnly?: boolean
}

export interface SnapshotFilter {
  scope?: Scope
  automatic?: boolean
}

export class BackupManager {
  private log = scopedLogger('backup')

  constructor(
    private store: SnapshotStore,
    private registry: RegistryAccessor,
    private pathLikeNames: readonly string[]
  ) {}

  /**
   * Capture the current contents of the given scopes
   */
  snapshot(scopes: readonly Scope[], options: SnapshotOptions = {}): Snapshot {
    const data: SnapshotData = {}
    const sets: VariableSet[] = []

    for (const scope of SCOPES.filter(s => scopes.includes(s))) {
      const set = this.registry.read(scope)
      sets.push(set)
      data[scope] = set.variables.map(toRegistryValue)
    }

    const info = this.store.create(data, options)
    this.log.debug({ id: info.id, scopes: info.scopes, automatic: info.automatic }, 'snapshot created')

    return { info, sets }
  }

  /** Newest first */
  list(filter: SnapshotFilter = {}): SnapshotInfo[] {
    return this.store.list().filter(info => {
      if (filter.scope && !info.scopes.includes(filter.scope)) return false
      if (filter.automatic !== undefined && info.automatic !== filter.automatic) return false
      return true
    })
  }

  find(idOrPartial: string): SnapshotInfo | null {
    return this.store.find(idOrPartial)
  }

  /**
   * Load a snapshot after checking it against its manifest checksum
   */
  load(idOrPartial: string): Snapshot {
    const info = this.store.find(idOrPartial)
    if (!info) {
      throw new SnapshotNotFoundError(idOrPartial)
    }

    const verification = this.store.verify(info.id)
    if (verification && !verification.valid) {
      throw new SnapshotIntegrityError(info.id, verification.expected, verification.actual)
    }

    const data = this.store.load(info.id)
    if (!data) {
      throw new SnapshotNotFoundError(idOrPartial)
    }

    const sets = info.scopes.map(scope => createVariableSet(scope, data[scope] ?? [], this.pathLikeNames))
    return { info, sets }
  }

  delete(idOrPartial: string): SnapshotInfo {
    const info = this.store.find(idOrPartial)
    if (!info || !this.store.delete(info.id)) {
      throw new SnapshotNotFoundError(idOrPartial)
    }
    return info
  }

  verify(idOrPartial: string): SnapshotVerification & { id: string } {
    const info = this.store.find(idOrPartial)
    const result = info ? this.store.verify(info.id) : null
    if (!info || !result) {
      throw new SnapshotNotFoundError(idOrPartial)
    }
    return { id: info.id, ...result }
  }

  /**
   * Apply a retention policy. The newest `keep_latest` snapshots always
   * survive; beyond them a snapshot goes when it is past `max_count` or
   * older than `max_age_days`. With `automaticOnly`, manual snapshots are
   * neither counted nor removed.
   */
  prune(policy: RetentionPolicy, options: PruneOptions = {}): string[] {
    const now = options.now ?? new Date()
    const candidates = this.list(options.automaticOnly ? { automatic: true } : {})
    const removed: string[] = []

    candidates.forEach((info, index) => {
      if (index < policy.keep_latest) return

      const overCount = policy.max_count !== null && index >= policy.max_count
      const ageMs = now.getTime() - Date.parse(info.timestamp)
      const tooOld = policy.max_age_days !== null && ageMs > policy.max_age_days * DAY_MS

      if ((overCount || tooOld) && this.store.delete(info.id)) {
        removed.push(info.id)
      }
    })

    if (removed.length > 0) {
      this.log.debug({ removed }, 'snapshots pruned')
    }

    return removed
  }
}
