/**
 * winenv delete <name>
 */

import { unwrap } from '../../controller.js'
import { requireArg, type CommandContext } from '../context.js'
import { describeMutation, toJson } from '../lib/report.js'
import * as ui from '../ui.js'

export async function runDelete(context: CommandContext): Promise<void> {
  const { controller, options } = context
  const name = requireArg(context, 0, 'name')
  const scope = options.scope ?? 'user'

  const result = unwrap(await controller.delete(scope, name))

  if (options.json) {
    ui.output(toJson(result))
    return
  }
  describeMutation(result, 'Deleted', scope, name)
}
