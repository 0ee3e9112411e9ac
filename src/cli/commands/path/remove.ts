/**
 * winenv path remove <index>
 */

import { unwrap } from '../../../controller.js'
import { parseIndex, requireArg, type CommandContext } from '../../context.js'
import { describeSegmentEdit, toJson } from '../../lib/report.js'
import * as ui from '../../ui.js'

export async function runPathRemove(context: CommandContext): Promise<void> {
  const { controller, options } = context
  const index = parseIndex(requireArg(context, 0, 'index'), '<index>') ?? 0
  const scope = options.scope ?? 'user'

  const result = unwrap(await controller.removeSegment(scope, options.variable, index))

  if (options.json) {
    ui.output(toJson(result))
    return
  }
  describeSegmentEdit(result, `Removed segment ${index} from`, scope, options.variable)
}
