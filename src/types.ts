/**
 * winenv - Type Definitions
 */

// ============================================================================
// Scope Types
// ============================================================================

/**
 * Variable namespace.
 *
 * - system: machine-wide, stored under HKEY_LOCAL_MACHINE, writes need elevation
 * - user: per-account, stored under HKEY_CURRENT_USER
 */
export type Scope = 'system' | 'user'

export const SCOPES: readonly Scope[] = ['system', 'user']

/** Registry key holding each scope's variables (same keys the Control Panel editor uses) */
export const REGISTRY_KEYS: Record<Scope, string> = {
  system: 'HKEY_LOCAL_MACHINE\\SYSTEM\\CurrentControlSet\\Control\\Session Manager\\Environment',
  user: 'HKEY_CURRENT_USER\\Environment'
}

export function isScope(value: unknown): value is Scope {
  return value === 'system' || value === 'user'
}

// ============================================================================
// Variable Types
// ============================================================================

/** Registry storage type of an environment value */
export type RegistryValueType = 'REG_SZ' | 'REG_EXPAND_SZ'

export function isRegistryValueType(value: unknown): value is RegistryValueType {
  return value === 'REG_SZ' || value === 'REG_EXPAND_SZ'
}

/**
 * plain: opaque string
 * path-like: ordered list of segments joined by ';' (PATH and friends)
 */
export type VariableKind = 'plain' | 'path-like'

export function isVariableKind(value: unknown): value is VariableKind {
  return value === 'plain' || value === 'path-like'
}

/** Raw value as the registry stores it */
export interface RegistryValue {
  name: string
  value: string
  type: RegistryValueType
}

export interface Variable extends RegistryValue {
  scope: Scope
  kind: VariableKind
}

/**
 * All variables of one scope at one point in time.
 * Entry order carries no meaning; names are unique case-insensitively.
 */
export interface VariableSet {
  scope: Scope
  variables: Variable[]
}

// ============================================================================
// Import / Export Types
// ============================================================================

export type ExportFormat = 'yaml' | 'json' | 'csv' | 'reg'

export const EXPORT_FORMATS: readonly ExportFormat[] = ['yaml', 'json', 'csv', 'reg']

export function isExportFormat(value: unknown): value is ExportFormat {
  return typeof value === 'string' && (EXPORT_FORMATS as readonly string[]).includes(value)
}

export type ImportAction = 'set' | 'delete'

export interface ImportRecord {
  scope: Scope
  name: string
  /** Empty for delete records */
  value: string
  action: ImportAction
  /** Only formats that carry a storage type fill this in */
  type?: RegistryValueType
  kind?: VariableKind
  /** 1-based source line, when the decoder knows it */
  line?: number
}

/** Parsed, not yet applied, set of records produced by a codec */
export interface ImportBatch {
  format: ExportFormat
  records: ImportRecord[]
}

export type ConflictPolicy = 'skip' | 'overwrite' | 'fail'

export function isConflictPolicy(value: unknown): value is ConflictPolicy {
  return value === 'skip' || value === 'overwrite' || value === 'fail'
}

export interface ImportReport {
  applied: string[]
  deleted: string[]
  skipped: string[]
  unchanged: string[]
  snapshotId: string | null
  commandId: string | null
}

// ============================================================================
// Command Types
// ============================================================================

export type CommandKind = 'add' | 'update' | 'delete' | 'segments' | 'import' | 'restore'

/** One registry entry transition; null means "absent" */
export interface VariableChange {
  scope: Scope
  name: string
  before: RegistryValue | null
  after: RegistryValue | null
}

/** Reversible record of one committed mutation */
export interface Command {
  id: string
  kind: CommandKind
  description: string
  createdAt: string
  changes: VariableChange[]
}

// ============================================================================
// Controller Types
// ============================================================================

export type OperationPhase = 'idle' | 'validating' | 'backing-up' | 'applying' | 'notifying'

export type ChangeOperation = CommandKind | 'undo' | 'redo'

export interface ChangeEvent {
  operation: ChangeOperation
  scopes: Scope[]
  names: string[]
  commandId?: string
}

export type ChangeListener = (event: ChangeEvent) => void

export type SearchField = 'name' | 'value' | 'both'

export interface SearchOptions {
  scope?: Scope
  field?: SearchField
  caseSensitive?: boolean
  regex?: boolean
}

// ============================================================================
// Configuration Types
// ============================================================================

export interface RetentionPolicy {
  /** Keep at most this many snapshots (null: unlimited) */
  max_count: number | null
  /** Drop snapshots older than this (null: never by age) */
  max_age_days: number | null
  /** Newest snapshots that survive any policy */
  keep_latest: number
}

export interface BackupConfig {
  dir: string
  /** Snapshot affected scopes before every mutation */
  auto: boolean
  retention: RetentionPolicy
}

export interface HistoryConfig {
  capacity: number
}

export interface ValidationConfig {
  path_like_names: string[]
  check_directories: boolean
}

export interface ExportConfig {
  default_format: ExportFormat
}

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent'

export interface LoggingConfig {
  level: LogLevel
}

export interface WinEnvConfig {
  version: string
  backup: BackupConfig
  history: HistoryConfig
  validation: ValidationConfig
  export: ExportConfig
  logging: LoggingConfig
}
