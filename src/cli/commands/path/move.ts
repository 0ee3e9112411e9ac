/**
 * winenv path move <from> <to>
 */

import { unwrap } from '../../../controller.js'
import { parseIndex, requireArg, type CommandContext } from '../../context.js'
import { describeSegmentEdit, toJson } from '../../lib/report.js'
import * as ui from '../../ui.js'

export async function runPathMove(context: CommandContext): Promise<void> {
  const { controller, options } = context
  const from = parseIndex(requireArg(context, 0, 'from'), '<from>') ?? 0
  const to = parseIndex(requireArg(context, 1, 'to'), '<to>') ?? 0
  const scope = options.scope ?? 'user'

  const result = unwrap(await controller.moveSegment(scope, options.variable, from, to))

  if (options.json) {
    ui.output(toJson(result))
    return
  }
  describeSegmentEdit(result, `Moved segment ${from} to ${to} in`, scope, options.variable)
}
