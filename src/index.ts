/**
 * winenv - Windows environment variable manager
 *
 * Main library exports for programmatic usage
 */

// Controller
export { EnvironmentController, unwrap } from './controller.js'
export type {
  OperationResult,
  ControllerOptions,
  MutationResult,
  SegmentEditResult,
  ImportPlan,
  ImportOptions,
  HistoryEntry,
  HistoryState,
  UndoResult,
  RestoreResult
} from './controller.js'

// Types
export type {
  Scope,
  RegistryValueType,
  VariableKind,
  RegistryValue,
  Variable,
  VariableSet,
  ExportFormat,
  ImportAction,
  ImportRecord,
  ImportBatch,
  ConflictPolicy,
  ImportReport,
  CommandKind,
  VariableChange,
  Command,
  OperationPhase,
  ChangeOperation,
  ChangeEvent,
  ChangeListener,
  SearchField,
  SearchOptions,
  RetentionPolicy,
  WinEnvConfig
} from './types.js'

export {
  SCOPES,
  REGISTRY_KEYS,
  EXPORT_FORMATS,
  isScope,
  isRegistryValueType,
  isVariableKind,
  isExportFormat,
  isConflictPolicy
} from './types.js'

// Config utilities
export {
  loadConfig,
  getDefaultConfig,
  createDefaultConfig,
  getWinEnvHome,
  getConfigPath
} from './lib/config-loader.js'

// Registry backends
export { RegistryAccessor } from './lib/registry.js'
export type { RegistryBackend } from './lib/registry.js'
export { RegExeBackend } from './lib/reg-exe.js'
export { MemoryRegistryBackend } from './lib/memory-registry.js'
export type { MemoryRegistryOptions, FailureHook } from './lib/memory-registry.js'

// Backups
export { BackupManager } from './lib/backup-manager.js'
export { FilesystemSnapshotStore } from './lib/snapshot.js'
export type { SnapshotInfo, SnapshotStore, SnapshotData } from './lib/snapshot.js'

// Codecs
export { CODECS, getCodec, detectFormat } from './lib/codecs/index.js'
export type { Codec } from './lib/codecs/index.js'

// Validation and segments
export {
  validateName,
  validateValue,
  validateSegments,
  validateVariable,
  defaultDirectoryCheck
} from './lib/validation.js'
export type { ValidationIssue, ValidationReport, DirectoryCheck } from './lib/validation.js'
export {
  splitSegments,
  joinSegments,
  normalizeSegment,
  hasTrailingSeparator,
  withoutTrailingSeparator,
  findDuplicateSegments,
  cleanSegments
} from './lib/path-segments.js'

// Errors
export * from './lib/errors.js'
