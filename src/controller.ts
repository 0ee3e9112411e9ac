/**
 * winenv Environment Controller
 *
 * Public entry point of the engine. Every mutation runs the same pipeline
 * inside the operation gate:
 *
 *   validating -> backing-up -> applying -> notifying -> idle
 *
 * A failure before `applying` leaves the registry untouched. A failure
 * while applying several changes is reported as a PartialApplyError that
 * names what was applied and the snapshot taken just before.
 *
 * Results are returned as `{ success, value }` / `{ success, error }` and
 * never thrown; use `unwrap()` to get throwing behaviour.
 */

import type { Logger } from 'pino'
import type {
  ChangeEvent,
  ChangeListener,
  ChangeOperation,
  Command,
  CommandKind,
  ConflictPolicy,
  ExportFormat,
  ImportBatch,
  ImportReport,
  OperationPhase,
  RegistryValue,
  RegistryValueType,
  RetentionPolicy,
  Scope,
  SearchOptions,
  Variable,
  VariableChange,
  VariableSet,
  WinEnvConfig
} from './types.js'
import { SCOPES } from './types.js'
import { BackupManager, type SnapshotFilter } from './lib/backup-manager.js'
import { getCodec } from './lib/codecs/index.js'
import {
  ConflictDetectedError,
  OperationCancelledError,
  PartialApplyError,
  ValidationError,
  VariableExistsError,
  VariableNotFoundError,
  WinEnvError,
  wrapError
} from './lib/errors.js'
import { initLogger, scopedLogger } from './lib/logger.js'
import { OperationGate } from './lib/operation-gate.js'
import {
  cleanSegments,
  findDuplicateSegments,
  hasTrailingSeparator,
  insertSegment,
  joinSegments,
  moveSegment,
  removeDuplicateSegments,
  removeSegment,
  splitSegments,
  withoutTrailingSeparator,
  type CleanSegmentsResult
} from './lib/path-segments.js'
import { RegExeBackend } from './lib/reg-exe.js'
import { RegistryAccessor, type RegistryBackend } from './lib/registry.js'
import { FilesystemSnapshotStore, type SnapshotInfo, type SnapshotStore, type SnapshotVerification } from './lib/snapshot.js'
import { UndoStack, createCommand } from './lib/undo-stack.js'
import {
  defaultDirectoryCheck,
  validateName,
  validateSegments,
  validateValue,
  validateVariable,
  type DirectoryCheck,
  type SegmentValidationOptions,
  type ValidationIssue
} from './lib/validation.js'
import { classifyKind, findVariable, inferValueType, nameKey, sortVariables, toRegistryValue } from './lib/variables.js'

// ============================================================================
// Types
// ============================================================================

export type OperationResult<T> =
  | { success: true; value: T }
  | { success: false; error: WinEnvError }

/**
 * Value of a successful result; throws the error of a failed one
 */
export function unwrap<T>(result: OperationResult<T>): T {
  if (!result.success) {
    throw result.error
  }
  return result.value
}

export interface ControllerOptions {
  config: WinEnvConfig
  /** Defaults to the native reg.exe backend */
  backend?: RegistryBackend
  /** Defaults to a filesystem store under config.backup.dir */
  snapshotStore?: SnapshotStore
  directoryCheck?: DirectoryCheck
}

export interface MutationResult {
  /** State after the mutation; null after a delete */
  variable: Variable | null
  /** False when the request matched the current state and nothing was written */
  changed: boolean
  commandId: string | null
  snapshotId: string | null
  warnings: ValidationIssue[]
}

export interface SegmentEditResult extends MutationResult {
  segments: string[]
  removed: CleanSegmentsResult['removed']
}

export interface ImportPlan {
  policy: ConflictPolicy
  changes: VariableChange[]
  applied: string[]
  deleted: string[]
  skipped: string[]
  unchanged: string[]
  conflicts: string[]
  errors: ValidationIssue[]
  warnings: ValidationIssue[]
  /** True when bulkImport would go ahead with this batch */
  valid: boolean
}

export interface ImportOptions {
  signal?: AbortSignal
}

export interface HistoryEntry {
  id: string
  kind: CommandKind
  description: string
  createdAt: string
  names: string[]
}

export interface HistoryState {
  undo: HistoryEntry[]
  redo: HistoryEntry[]
  canUndo: boolean
  canRedo: boolean
}

export interface UndoResult {
  command: HistoryEntry
  snapshotId: string | null
}

export interface RestoreResult {
  restored: string
  changes: number
  commandId: string | null
  snapshotId: string | null
}

interface CommitOptions {
  signal?: AbortSignal
  /** Push a Command of this kind onto the history */
  record?: CommandKind
}

interface CommitOutcome {
  command: Command | null
  snapshotId: string | null
  changes: VariableChange[]
}

// ============================================================================
// Helpers
// ============================================================================

function sameState(a: RegistryValue | null, b: RegistryValue | null): boolean {
  if (a === null || b === null) return a === b
  return a.value === b.value && a.type === b.type
}

function uniqueScopes(changes: VariableChange[]): Scope[] {
  return SCOPES.filter(scope => changes.some(change => change.scope === scope))
}

function throwIfAborted(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) {
    throw new OperationCancelledError(operation)
  }
}

function toHistoryEntry(command: Command): HistoryEntry {
  return {
    id: command.id,
    kind: command.kind,
    description: command.description,
    createdAt: command.createdAt,
    names: [...new Set(command.changes.map(change => change.name))]
  }
}

function issue(code: ValidationIssue['code'], subject: ValidationIssue['subject'], message: string, index?: number): ValidationIssue {
  return index === undefined
    ? { code, level: 'error', subject, message }
    : { code, level: 'error', subject, message, index }
}

// ============================================================================
// Controller
// ============================================================================

export class EnvironmentController {
  readonly config: WinEnvConfig

  private registry: RegistryAccessor
  private backups: BackupManager
  private undoStack: UndoStack
  private gate = new OperationGate()
  private listeners = new Set<ChangeListener>()
  private currentPhase: OperationPhase = 'idle'
  private directoryExists: DirectoryCheck
  private log: Logger

  constructor(options: ControllerOptions) {
    this.config = options.config
    initLogger(this.config.logging.level)
    this.log = scopedLogger('controller')

    const pathLikeNames = this.config.validation.path_like_names
    this.registry = new RegistryAccessor(options.backend ?? new RegExeBackend(), pathLikeNames)
    this.backups = new BackupManager(
      options.snapshotStore ?? new FilesystemSnapshotStore(this.config.backup.dir),
      this.registry,
      pathLikeNames
    )
    this.undoStack = new UndoStack(this.config.history.capacity)
    this.directoryExists = options.directoryCheck ?? defaultDirectoryCheck
  }

  get phase(): OperationPhase {
    return this.currentPhase
  }

  get backendName(): string {
    return this.registry.backendName
  }

  /**
   * Subscribe to change notifications; returns the unsubscribe function
   */
  onChange(listener: ChangeListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  read(scope: Scope): Promise<OperationResult<VariableSet>> {
    return this.shared(() => this.readSorted(scope))
  }

  get(scope: Scope, name: string): Promise<OperationResult<Variable | null>> {
    return this.shared(() => this.registry.get(scope, name))
  }

  /**
   * Variables whose name and/or value match `query` (substring or regex)
   */
  search(query: string, options: SearchOptions = {}): Promise<OperationResult<Variable[]>> {
    return this.shared(() => {
      const { field = 'both', caseSensitive = false, regex = false } = options
      const matches = this.buildMatcher(query, regex, caseSensitive)
      const scopes = options.scope ? [options.scope] : [...SCOPES]

      return scopes.flatMap(scope =>
        this.readSorted(scope).variables.filter(variable =>
          (field !== 'value' && matches(variable.name)) || (field !== 'name' && matches(variable.value))
        )
      )
    })
  }

  exportAll(format: ExportFormat = this.config.export.default_format, scope?: Scope): Promise<OperationResult<Buffer>> {
    return this.shared(() => {
      const codec = getCodec(format)
      const scopes = scope ? [scope] : [...SCOPES]
      return codec.encode(scopes.map(s => this.readSorted(s)))
    })
  }

  /**
   * Parse bytes into a batch; nothing is applied
   */
  decode(format: string, bytes: Buffer | string): Promise<OperationResult<ImportBatch>> {
    return this.settle(Promise.resolve().then(() => getCodec(format).decode(bytes)))
  }

  /**
   * What bulkImport would do with this batch, without doing it
   */
  previewImport(batch: ImportBatch, policy: ConflictPolicy): Promise<OperationResult<ImportPlan>> {
    return this.shared(() => this.planImport(batch, policy))
  }

  listSnapshots(filter: SnapshotFilter = {}): Promise<OperationResult<SnapshotInfo[]>> {
    return this.shared(() => this.backups.list(filter))
  }

  verifySnapshot(id: string): Promise<OperationResult<SnapshotVerification & { id: string }>> {
    return this.shared(() => this.backups.verify(id))
  }

  history(): Promise<OperationResult<HistoryState>> {
    return this.shared(() => {
      const { history, future } = this.undoStack.entries()
      return {
        undo: history.map(toHistoryEntry).reverse(),
        redo: future.map(toHistoryEntry),
        canUndo: this.undoStack.canUndo,
        canRedo: this.undoStack.canRedo
      }
    })
  }

  // ==========================================================================
  // Variable mutations
  // ==========================================================================

  add(scope: Scope, name: string, value: string, type?: RegistryValueType): Promise<OperationResult<MutationResult>> {
    return this.exclusive(async () => {
      this.setPhase('validating')
      const kind = classifyKind(name, this.config.validation.path_like_names)
      const warnings = this.assertValid(validateVariable(kind, name, value, this.segmentOptions()), 'variable')

      if (this.registry.get(scope, name)) {
        throw new VariableExistsError(name, scope)
      }

      const after: RegistryValue = { name, value, type: type ?? inferValueType(value) }
      const outcome = await this.commit('add', `add ${scope}:${name}`, [{ scope, name, before: null, after }], { record: 'add' })
      return this.mutationResult(scope, name, outcome, warnings)
    })
  }

  update(scope: Scope, name: string, value: string, type?: RegistryValueType): Promise<OperationResult<MutationResult>> {
    return this.exclusive(async () => {
      this.setPhase('validating')
      const existing = this.requireVariable(scope, name)
      const warnings = this.assertValid(validateVariable(existing.kind, existing.name, value, this.segmentOptions()), 'variable')

      const after: RegistryValue = { name: existing.name, value, type: type ?? existing.type }
      const change = { scope, name: existing.name, before: toRegistryValue(existing), after }
      const outcome = await this.commit('update', `update ${scope}:${existing.name}`, [change], { record: 'update' })
      return this.mutationResult(scope, existing.name, outcome, warnings)
    })
  }

  delete(scope: Scope, name: string): Promise<OperationResult<MutationResult>> {
    return this.exclusive(async () => {
      this.setPhase('validating')
      const existing = this.requireVariable(scope, name)
      const change = { scope, name: existing.name, before: toRegistryValue(existing), after: null }
      const outcome = await this.commit('delete', `delete ${scope}:${existing.name}`, [change], { record: 'delete' })
      return this.mutationResult(scope, existing.name, outcome, [])
    })
  }

  // ==========================================================================
  // Path-like segment editing
  // ==========================================================================

  /**
   * Replace the whole segment list. Creates the variable when absent.
   */
  setSegments(scope: Scope, name: string, segments: string[]): Promise<OperationResult<SegmentEditResult>> {
    return this.exclusive(() => this.editSegments(scope, name, `set segments of ${scope}:${name}`, true, () => ({
      segments: [...segments],
      issues: validateSegments(segments, this.segmentOptions())
    })))
  }

  /**
   * Insert one segment (at the end by default). Only the new segment is
   * validated, so pre-existing problems do not block the edit.
   */
  insertSegment(scope: Scope, name: string, segment: string, index?: number): Promise<OperationResult<SegmentEditResult>> {
    return this.exclusive(() => this.editSegments(scope, name, `insert segment into ${scope}:${name}`, true, current => {
      const at = index ?? current.length
      if (!Number.isInteger(at) || at < 0 || at > current.length) {
        throw new ValidationError(
          [issue('INDEX_OUT_OF_RANGE', 'segment', `Index ${at} is outside 0..${current.length}`, at)],
          'segment index'
        )
      }

      const segments = insertSegment(current, segment, at)
      const report = validateSegments(segments, this.segmentOptions())
      const concerns = (i: ValidationIssue): boolean => i.index === at || i.duplicateOf === at
      return {
        segments,
        issues: {
          valid: !report.errors.some(concerns),
          errors: report.errors.filter(concerns),
          warnings: report.warnings.filter(concerns)
        }
      }
    }))
  }

  removeSegment(scope: Scope, name: string, index: number): Promise<OperationResult<SegmentEditResult>> {
    return this.exclusive(() => this.editSegments(scope, name, `remove segment ${index} from ${scope}:${name}`, false, current => {
      this.assertIndex(index, current.length)
      return { segments: removeSegment(current, index) }
    }))
  }

  moveSegment(scope: Scope, name: string, from: number, to: number): Promise<OperationResult<SegmentEditResult>> {
    return this.exclusive(() => this.editSegments(scope, name, `move segment ${from} to ${to} in ${scope}:${name}`, false, current => {
      this.assertIndex(from, current.length)
      this.assertIndex(to, current.length)
      return { segments: moveSegment(current, from, to) }
    }))
  }

  dedupeSegments(scope: Scope, name: string): Promise<OperationResult<SegmentEditResult>> {
    return this.exclusive(() => this.editSegments(scope, name, `dedupe ${scope}:${name}`, false, current => ({
      segments: removeDuplicateSegments(current),
      removed: findDuplicateSegments(current).map(({ index }) => ({
        index,
        segment: current[index],
        reason: 'duplicate' as const
      }))
    })))
  }

  /**
   * Drop empty, duplicate and non-existent segments
   */
  cleanSegments(scope: Scope, name: string): Promise<OperationResult<SegmentEditResult>> {
    return this.exclusive(() => this.editSegments(scope, name, `clean ${scope}:${name}`, false, current =>
      cleanSegments(current, this.directoryExists)
    ))
  }

  // ==========================================================================
  // Import
  // ==========================================================================

  /**
   * Apply a decoded batch as one command. The whole batch is validated
   * first; under "fail" any set record for an existing name rejects it.
   */
  bulkImport(batch: ImportBatch, policy: ConflictPolicy, options: ImportOptions = {}): Promise<OperationResult<ImportReport>> {
    return this.exclusive(async () => {
      throwIfAborted(options.signal, 'import')
      this.setPhase('validating')

      const plan = this.planImport(batch, policy)
      if (plan.errors.length > 0) {
        throw new ValidationError(plan.errors, 'import')
      }
      if (policy === 'fail' && plan.conflicts.length > 0) {
        throw new ConflictDetectedError(plan.conflicts)
      }

      const outcome = await this.commit(
        'import',
        `import ${batch.records.length} record(s) from ${batch.format}`,
        plan.changes,
        { signal: options.signal, record: 'import' }
      )

      return {
        applied: plan.applied,
        deleted: plan.deleted,
        skipped: plan.skipped,
        unchanged: plan.unchanged,
        snapshotId: outcome.snapshotId,
        commandId: outcome.command?.id ?? null
      }
    })
  }

  // ==========================================================================
  // History
  // ==========================================================================

  undo(): Promise<OperationResult<UndoResult>> {
    return this.exclusive(async () => {
      let snapshotId: string | null = null
      const command = await this.undoStack.undo(async changes => {
        const outcome = await this.commit('undo', 'undo', changes)
        snapshotId = outcome.snapshotId
      })
      this.emitFor('undo', command)
      return { command: toHistoryEntry(command), snapshotId }
    })
  }

  redo(): Promise<OperationResult<UndoResult>> {
    return this.exclusive(async () => {
      let snapshotId: string | null = null
      const command = await this.undoStack.redo(async changes => {
        const outcome = await this.commit('redo', 'redo', changes)
        snapshotId = outcome.snapshotId
      })
      this.emitFor('redo', command)
      return { command: toHistoryEntry(command), snapshotId }
    })
  }

  // ==========================================================================
  // Backups
  // ==========================================================================

  snapshot(scopes: readonly Scope[] = SCOPES, name?: string): Promise<OperationResult<SnapshotInfo>> {
    return this.shared(() => this.backups.snapshot(scopes, { name }).info)
  }

  deleteSnapshot(id: string): Promise<OperationResult<SnapshotInfo>> {
    return this.exclusive(() => this.backups.delete(id))
  }

  pruneSnapshots(policy: RetentionPolicy = this.config.backup.retention): Promise<OperationResult<string[]>> {
    return this.exclusive(() => this.backups.prune(policy))
  }

  /**
   * Bring the scopes a snapshot covers back to its contents. Applied as a
   * single "restore" command, so it can be undone.
   */
  restore(snapshotId: string): Promise<OperationResult<RestoreResult>> {
    return this.exclusive(async () => {
      this.setPhase('validating')
      const snapshot = this.backups.load(snapshotId)
      const changes: VariableChange[] = []

      for (const target of snapshot.sets) {
        const live = this.registry.read(target.scope)

        for (const variable of live.variables) {
          if (!findVariable(target, variable.name)) {
            changes.push({ scope: target.scope, name: variable.name, before: toRegistryValue(variable), after: null })
          }
        }

        for (const variable of sortVariables(target.variables)) {
          const current = findVariable(live, variable.name)
          changes.push({
            scope: target.scope,
            name: current?.name ?? variable.name,
            before: current ? toRegistryValue(current) : null,
            after: toRegistryValue(variable)
          })
        }
      }

      const outcome = await this.commit('restore', `restore ${snapshot.info.id}`, changes, { record: 'restore' })
      return {
        restored: snapshot.info.id,
        changes: outcome.changes.length,
        commandId: outcome.command?.id ?? null,
        snapshotId: outcome.snapshotId
      }
    })
  }

  // ==========================================================================
  // Pipeline
  // ==========================================================================

  /**
   * Privilege check, automatic snapshot, apply, record, notify.
   * Changes that would not alter the registry are dropped first; when none
   * remain nothing happens at all.
   */
  private async commit(operation: ChangeOperation, description: string, changes: VariableChange[], options: CommitOptions = {}): Promise<CommitOutcome> {
    const effective = changes.filter(change => !sameState(change.before, change.after))
    if (effective.length === 0) {
      return { command: null, snapshotId: null, changes: [] }
    }

    const scopes = uniqueScopes(effective)

    this.setPhase('validating')
    for (const scope of scopes) {
      this.registry.assertWritable(scope)
    }
    throwIfAborted(options.signal, operation)

    this.setPhase('backing-up')
    const snapshotId = this.config.backup.auto
      ? this.backups.snapshot(scopes, { automatic: true, reason: description }).info.id
      : null
    throwIfAborted(options.signal, operation)

    this.setPhase('applying')
    this.applyChanges(effective, snapshotId)

    let command: Command | null = null
    if (options.record) {
      command = createCommand(options.record, description, effective)
      this.undoStack.push(command)
    }

    this.setPhase('notifying')
    if (options.record) {
      this.emit({ operation, scopes, names: effective.map(c => c.name), commandId: command?.id })
    }
    this.pruneAutomatic()

    this.log.info({ operation, scopes, changes: effective.length, snapshotId, commandId: command?.id }, description)
    return { command, snapshotId, changes: effective }
  }

  private applyChanges(changes: VariableChange[], snapshotId: string | null): void {
    const applied: Array<{ scope: Scope; name: string }> = []

    for (const change of changes) {
      try {
        if (change.after === null) {
          if (this.registry.get(change.scope, change.name)) {
            this.registry.delete(change.scope, change.name)
          }
        } else {
          this.registry.write(change.scope, change.after.name, change.after.value, change.after.type)
        }
      } catch (err) {
        if (changes.length === 1) throw err
        const cause = err instanceof Error ? err : new Error(String(err))
        throw new PartialApplyError(applied, { scope: change.scope, name: change.name }, snapshotId, cause)
      }
      applied.push({ scope: change.scope, name: change.name })
    }
  }

  private pruneAutomatic(): void {
    if (!this.config.backup.auto) return
    try {
      this.backups.prune(this.config.backup.retention, { automaticOnly: true })
    } catch (err) {
      this.log.warn({ err }, 'automatic snapshot pruning failed')
    }
  }

  private emitFor(operation: 'undo' | 'redo', command: Command): void {
    this.setPhase('notifying')
    this.emit({
      operation,
      scopes: uniqueScopes(command.changes),
      names: [...new Set(command.changes.map(c => c.name))],
      commandId: command.id
    })
  }

  private emit(event: ChangeEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event)
      } catch (err) {
        this.log.warn({ err, operation: event.operation }, 'change listener threw')
      }
    }
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private setPhase(phase: OperationPhase): void {
    this.currentPhase = phase
  }

  private async settle<T>(promise: Promise<T>): Promise<OperationResult<T>> {
    try {
      return { success: true, value: await promise }
    } catch (err) {
      const error = wrapError(err)
      this.log.debug({ code: error.code }, error.message)
      return { success: false, error }
    }
  }

  private exclusive<T>(fn: () => Promise<T> | T): Promise<OperationResult<T>> {
    return this.settle(this.gate.exclusive(async () => {
      try {
        return await fn()
      } finally {
        this.setPhase('idle')
      }
    }))
  }

  private shared<T>(fn: () => Promise<T> | T): Promise<OperationResult<T>> {
    return this.settle(this.gate.shared(fn))
  }

  private readSorted(scope: Scope): VariableSet {
    const set = this.registry.read(scope)
    return { scope, variables: sortVariables(set.variables) }
  }

  private segmentOptions(): SegmentValidationOptions {
    return { checkDirectories: this.config.validation.check_directories, directoryExists: this.directoryExists }
  }

  private requireVariable(scope: Scope, name: string): Variable {
    const existing = this.registry.get(scope, name)
    if (!existing) {
      throw new VariableNotFoundError(name, scope)
    }
    return existing
  }

  /** Throws on errors, hands back warnings */
  private assertValid(report: { errors: ValidationIssue[]; warnings: ValidationIssue[] }, subject: string): ValidationIssue[] {
    if (report.errors.length > 0) {
      throw new ValidationError(report.errors, subject)
    }
    return report.warnings
  }

  private assertIndex(index: number, length: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= length) {
      throw new ValidationError(
        [issue('INDEX_OUT_OF_RANGE', 'segment', `Index ${index} is outside 0..${Math.max(length - 1, 0)}`, index)],
        'segment index'
      )
    }
  }

  private buildMatcher(query: string, regex: boolean, caseSensitive: boolean): (text: string) => boolean {
    if (regex) {
      let pattern: RegExp
      try {
        pattern = new RegExp(query, caseSensitive ? '' : 'i')
      } catch (err) {
        throw new WinEnvError(`Invalid search pattern: ${query}`, 'INVALID_PATTERN', {
          suggestion: 'Escape special characters or search without --regex',
          cause: err instanceof Error ? err : undefined
        })
      }
      return text => pattern.test(text)
    }
    const needle = caseSensitive ? query : query.toLowerCase()
    return text => (caseSensitive ? text : text.toLowerCase()).includes(needle)
  }

  private mutationResult(scope: Scope, name: string, outcome: CommitOutcome, warnings: ValidationIssue[]): MutationResult {
    return {
      variable: this.registry.get(scope, name),
      changed: outcome.changes.length > 0,
      commandId: outcome.command?.id ?? null,
      snapshotId: outcome.snapshotId,
      warnings
    }
  }

  /**
   * Shared path of every segment edit. `edit` receives the current
   * segments and returns the new ones plus, for edits that add content,
   * the validation report to enforce.
   */
  private async editSegments(
    scope: Scope,
    name: string,
    description: string,
    createIfAbsent: boolean,
    edit: (current: string[]) => {
      segments: string[]
      issues?: { errors: ValidationIssue[]; warnings: ValidationIssue[] }
      removed?: CleanSegmentsResult['removed']
    }
  ): Promise<SegmentEditResult> {
    this.setPhase('validating')

    const nameReport = validateName(name)
    if (!nameReport.valid) {
      throw new ValidationError(nameReport.errors, 'name')
    }
    if (classifyKind(name, this.config.validation.path_like_names) !== 'path-like') {
      throw new ValidationError(
        [issue('NOT_PATH_LIKE', 'name', `"${name}" is not a path-like variable`)],
        'variable'
      )
    }

    const existing = this.registry.get(scope, name)
    if (!existing && !createIfAbsent) {
      throw new VariableNotFoundError(name, scope)
    }

    // Indexes address real segments; a trailing ';' is kept as authored
    const authored = existing ? splitSegments(existing.value) : []
    const trailing = hasTrailingSeparator(authored)
    const result = edit(withoutTrailingSeparator(authored))
    const warnings = result.issues ? this.assertValid(result.issues, 'segment') : []

    const value = joinSegments(trailing && result.segments.length > 0 ? [...result.segments, ''] : result.segments)
    const valueReport = validateValue('path-like', value)
    if (!valueReport.valid) {
      throw new ValidationError(valueReport.errors, 'value')
    }

    const after: RegistryValue = {
      name: existing?.name ?? name,
      value,
      type: existing?.type ?? inferValueType(value)
    }
    const change: VariableChange = {
      scope,
      name: after.name,
      before: existing ? toRegistryValue(existing) : null,
      after
    }

    const outcome = await this.commit('segments', description, [change], { record: 'segments' })
    return {
      ...this.mutationResult(scope, after.name, outcome, warnings),
      segments: result.segments,
      removed: result.removed ?? []
    }
  }

  /**
   * Validate a batch against the live registry and work out its changes
   */
  private planImport(batch: ImportBatch, policy: ConflictPolicy): ImportPlan {
    const plan: ImportPlan = {
      policy,
      changes: [],
      applied: [],
      deleted: [],
      skipped: [],
      unchanged: [],
      conflicts: [],
      errors: [],
      warnings: [],
      valid: false
    }

    const live = new Map<Scope, VariableSet>()
    const liveSet = (scope: Scope): VariableSet => {
      let set = live.get(scope)
      if (!set) {
        set = this.registry.read(scope)
        live.set(scope, set)
      }
      return set
    }

    const seen = new Map<string, number>()
    const label = (index: number, line?: number): string => line !== undefined ? `line ${line}` : `record ${index + 1}`

    batch.records.forEach((record, index) => {
      const key = `${record.scope}:${nameKey(record.name)}`
      const first = seen.get(key)
      if (first !== undefined) {
        plan.errors.push({
          code: 'DUPLICATE_RECORD',
          level: 'error',
          subject: 'record',
          index,
          name: record.name,
          message: `${label(index, record.line)}: "${record.name}" repeats ${label(first, batch.records[first].line)} in ${record.scope} scope`
        })
        return
      }
      seen.set(key, index)

      const tag = (found: ValidationIssue): ValidationIssue => ({
        ...found,
        name: record.name,
        message: `${record.scope}:${record.name}: ${found.message}`
      })

      const existing = findVariable(liveSet(record.scope), record.name)

      if (record.action === 'delete') {
        if (!existing) {
          plan.skipped.push(record.name)
          return
        }
        plan.changes.push({ scope: record.scope, name: existing.name, before: toRegistryValue(existing), after: null })
        plan.deleted.push(existing.name)
        return
      }

      const kind = classifyKind(record.name, this.config.validation.path_like_names)
      const report = validateVariable(kind, record.name, record.value, this.segmentOptions())
      plan.warnings.push(...report.warnings.map(tag))
      if (!report.valid) {
        plan.errors.push(...report.errors.map(tag))
        return
      }

      const type = record.type ?? existing?.type ?? inferValueType(record.value)
      const after: RegistryValue = { name: existing?.name ?? record.name, value: record.value, type }

      if (!existing) {
        plan.changes.push({ scope: record.scope, name: record.name, before: null, after })
        plan.applied.push(record.name)
        return
      }

      if (policy === 'fail') {
        plan.conflicts.push(existing.name)
        return
      }

      if (existing.value === record.value && existing.type === type) {
        plan.unchanged.push(existing.name)
        return
      }

      if (policy === 'overwrite') {
        plan.changes.push({ scope: record.scope, name: existing.name, before: toRegistryValue(existing), after })
        plan.applied.push(existing.name)
      } else {
        plan.skipped.push(existing.name)
      }
    })

    plan.valid = plan.errors.length === 0 && !(policy === 'fail' && plan.conflicts.length > 0)
    return plan
  }
}
