/**
 * winenv snapshot delete <id>
 */

import { unwrap } from '../../../controller.js'
import { requireArg, type CommandContext } from '../../context.js'
import { print } from '../../lib/colors.js'
import { toJson } from '../../lib/report.js'
import * as ui from '../../ui.js'

export async function runSnapshotDelete(context: CommandContext): Promise<void> {
  const { controller, options } = context
  const id = requireArg(context, 0, 'id')

  const info = unwrap(await controller.deleteSnapshot(id))

  if (options.json) {
    ui.output(toJson(info))
    return
  }
  print.success(`Deleted snapshot ${info.id}`)
}
