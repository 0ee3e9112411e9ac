/**
 * winenv path dedupe
 */

import { unwrap } from '../../../controller.js'
import type { CommandContext } from '../../context.js'
import { describeSegmentEdit, toJson } from '../../lib/report.js'
import * as ui from '../../ui.js'

export async function runPathDedupe(context: CommandContext): Promise<void> {
  const { controller, options } = context
  const scope = options.scope ?? 'user'

  const result = unwrap(await controller.dedupeSegments(scope, options.variable))

  if (options.json) {
    ui.output(toJson(result))
    return
  }
  describeSegmentEdit(result, 'Deduplicated', scope, options.variable)
}
