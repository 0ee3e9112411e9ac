/**
 * Codec registry
 */

import path from 'node:path'
import type { ExportFormat } from '../../types.js'
import { EXPORT_FORMATS, isExportFormat } from '../../types.js'
import { UnsupportedFormatError } from '../errors.js'
import { csvCodec } from './csv.js'
import { jsonCodec } from './json.js'
import { regCodec } from './reg.js'
import type { Codec } from './types.js'
import { yamlCodec } from './yaml.js'

export type { Codec } from './types.js'
export { csvCodec, jsonCodec, regCodec, yamlCodec }

export const CODECS: Record<ExportFormat, Codec> = {
  yaml: yamlCodec,
  json: jsonCodec,
  csv: csvCodec,
  reg: regCodec
}

export function getCodec(format: string): Codec {
  const normalized = format.toLowerCase()
  if (!isExportFormat(normalized)) {
    throw new UnsupportedFormatError(format, EXPORT_FORMATS)
  }
  return CODECS[normalized]
}

/**
 * Format implied by a file name, or null when the extension is unknown
 */
export function detectFormat(filePath: string): ExportFormat | null {
  const ext = path.extname(filePath).toLowerCase()
  const codec = EXPORT_FORMATS.map(format => CODECS[format]).find(c => c.extensions.includes(ext))
  return codec?.format ?? null
}
