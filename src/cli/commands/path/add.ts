/**
 * winenv path add <segment> [--index N]
 */

import { unwrap } from '../../../controller.js'
import { requireArg, type CommandContext } from '../../context.js'
import { describeSegmentEdit, toJson } from '../../lib/report.js'
import * as ui from '../../ui.js'

export async function runPathAdd(context: CommandContext): Promise<void> {
  const { controller, options } = context
  const segment = requireArg(context, 0, 'segment')
  const scope = options.scope ?? 'user'

  const result = unwrap(await controller.insertSegment(scope, options.variable, segment, options.index))

  if (options.json) {
    ui.output(toJson(result))
    return
  }
  describeSegmentEdit(result, `Added ${segment} to`, scope, options.variable)
}
