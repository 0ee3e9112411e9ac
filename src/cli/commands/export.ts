/**
 * winenv export [--format yaml|json|csv|reg] [--file PATH] [--scope user|system]
 *
 * Without --file the encoded bytes go to stdout. With --file and no
 * --format, the format follows the file extension.
 */

import fs from 'node:fs'
import { unwrap } from '../../controller.js'
import { detectFormat } from '../../lib/codecs/index.js'
import { UnsupportedFormatError } from '../../lib/errors.js'
import { EXPORT_FORMATS, isExportFormat } from '../../types.js'
import type { CommandContext } from '../context.js'
import { print } from '../lib/colors.js'
import * as ui from '../ui.js'

export async function runExport(context: CommandContext): Promise<void> {
  const { controller, options, config } = context
  const requested = options.format?.toLowerCase()
    ?? (options.file ? detectFormat(options.file) : null)
    ?? config.export.default_format
  if (!isExportFormat(requested)) {
    throw new UnsupportedFormatError(requested, EXPORT_FORMATS)
  }
  const format = requested

  const bytes = unwrap(await controller.exportAll(format, options.scope))

  if (!options.file) {
    ui.outputRaw(bytes)
    return
  }

  if (options.dryRun) {
    ui.log(`Would write ${bytes.length} bytes of ${format} to ${options.file}`)
    return
  }

  fs.writeFileSync(options.file, bytes)
  print.success(`Exported ${options.scope ?? 'all'} scope(s) to ${options.file} (${format})`)
}
