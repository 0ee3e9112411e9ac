/**
 * winenv snapshot restore <id>
 */

import { unwrap } from '../../../controller.js'
import { requireArg, type CommandContext } from '../../context.js'
import { c, print } from '../../lib/colors.js'
import { toJson } from '../../lib/report.js'
import * as ui from '../../ui.js'

export async function runSnapshotRestore(context: CommandContext): Promise<void> {
  const { controller, options } = context
  const id = requireArg(context, 0, 'id')

  const result = unwrap(await controller.restore(id))

  if (options.json) {
    ui.output(toJson(result))
    return
  }

  if (result.changes === 0) {
    ui.log(`Registry already matches ${c.highlight(result.restored)}; nothing to restore.`)
    return
  }

  print.success(`Restored ${result.restored} (${result.changes} change${result.changes === 1 ? '' : 's'})`)
  if (result.snapshotId) {
    ui.log(`  ${c.label('Previous state saved as:')} ${c.muted(result.snapshotId)}`)
  }
}
