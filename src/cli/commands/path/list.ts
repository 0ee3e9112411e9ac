/**
 * winenv path list
 */

import { unwrap } from '../../../controller.js'
import { VariableNotFoundError } from '../../../lib/errors.js'
import { splitSegments, withoutTrailingSeparator } from '../../../lib/path-segments.js'
import { validateSegments } from '../../../lib/validation.js'
import type { CommandContext } from '../../context.js'
import { printWarnings, segmentsTable, toJson } from '../../lib/report.js'
import * as ui from '../../ui.js'

export async function runPathList(context: CommandContext): Promise<void> {
  const { controller, options, config } = context
  const scope = options.scope ?? 'user'
  const variable = unwrap(await controller.get(scope, options.variable))
  if (!variable) {
    throw new VariableNotFoundError(options.variable, scope)
  }

  const segments = withoutTrailingSeparator(splitSegments(variable.value))
  const report = validateSegments(segments, { checkDirectories: config.validation.check_directories })

  if (options.json) {
    ui.output(toJson({ scope, name: variable.name, segments, issues: [...report.errors, ...report.warnings] }))
    return
  }

  ui.output(segmentsTable(segments))
  printWarnings([...report.errors, ...report.warnings])
}
