/**
 * winenv snapshot prune
 *
 * Applies backup.retention from the config to every snapshot, manual ones
 * included.
 */

import { unwrap } from '../../../controller.js'
import type { CommandContext } from '../../context.js'
import { print } from '../../lib/colors.js'
import { toJson } from '../../lib/report.js'
import * as ui from '../../ui.js'

export async function runSnapshotPrune(context: CommandContext): Promise<void> {
  const { controller, options } = context
  const removed = unwrap(await controller.pruneSnapshots())

  if (options.json) {
    ui.output(toJson({ removed }))
    return
  }

  if (removed.length === 0) {
    ui.log('Nothing to prune.')
    return
  }
  for (const id of removed) {
    print.item(id)
  }
  print.success(`Pruned ${removed.length} snapshot${removed.length === 1 ? '' : 's'}`)
}
