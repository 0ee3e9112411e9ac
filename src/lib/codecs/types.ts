import type { ExportFormat, ImportBatch, VariableSet } from '../../types.js'

/**
 * Converts between VariableSets and external bytes.
 * Decoding only parses; nothing is applied.
 */
export interface Codec {
  readonly format: ExportFormat
  /** File extensions recognised for this format, with the leading dot */
  readonly extensions: readonly string[]
  encode(sets: VariableSet[]): Buffer
  /** Throws MalformedInputError */
  decode(bytes: Buffer | string): ImportBatch
}
