/**
 * winenv path clean
 *
 * Drops empty, repeated and missing-directory segments in one step.
 */

import { unwrap } from '../../../controller.js'
import type { CommandContext } from '../../context.js'
import { describeSegmentEdit, toJson } from '../../lib/report.js'
import * as ui from '../../ui.js'

export async function runPathClean(context: CommandContext): Promise<void> {
  const { controller, options } = context
  const scope = options.scope ?? 'user'

  const result = unwrap(await controller.cleanSegments(scope, options.variable))

  if (options.json) {
    ui.output(toJson(result))
    return
  }
  describeSegmentEdit(result, 'Cleaned', scope, options.variable)
}
