/**
 * winenv snapshot list
 *
 * Newest first; --scope keeps the ones that cover that scope.
 */

import { unwrap } from '../../../controller.js'
import type { CommandContext } from '../../context.js'
import { c } from '../../lib/colors.js'
import { toJson } from '../../lib/report.js'
import * as ui from '../../ui.js'

export async function runSnapshotList(context: CommandContext): Promise<void> {
  const { controller, options } = context
  const snapshots = unwrap(await controller.listSnapshots({ scope: options.scope }))

  if (options.json) {
    ui.output(toJson(snapshots))
    return
  }

  if (snapshots.length === 0) {
    ui.log('No snapshots found.')
    ui.log(`Create one: ${c.command('winenv snapshot create')}`)
    return
  }

  ui.output(ui.formatTable(
    [
      { key: 'id', header: 'ID' },
      { key: 'scopes', header: 'SCOPES' },
      { key: 'vars', header: 'VARS', align: 'right' },
      { key: 'kind', header: 'KIND' },
      { key: 'timestamp', header: 'CREATED' }
    ],
    snapshots.map(snap => ({
      id: snap.id,
      scopes: snap.scopes.join(','),
      vars: String(snap.varsCount),
      kind: snap.automatic ? `auto${snap.reason ? ` (${snap.reason})` : ''}` : 'manual',
      timestamp: snap.timestamp
    }))
  ))
  ui.log('')
  ui.log(`Restore: ${c.command('winenv snapshot restore <id>')}`)
}
