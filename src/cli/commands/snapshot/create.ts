/**
 * winenv snapshot create [--scope user|system] [--name LABEL]
 */

import { unwrap } from '../../../controller.js'
import { SCOPES } from '../../../types.js'
import type { CommandContext } from '../../context.js'
import { c, print } from '../../lib/colors.js'
import { toJson } from '../../lib/report.js'
import * as ui from '../../ui.js'

export async function runSnapshotCreate(context: CommandContext): Promise<void> {
  const { controller, options } = context
  const scopes = options.scope ? [options.scope] : SCOPES

  const info = unwrap(await controller.snapshot(scopes, options.name ?? context.args[0]))

  if (options.json) {
    ui.output(toJson(info))
    return
  }

  print.success(`Snapshot created: ${info.id}`)
  ui.log(`  ${c.label('Scopes:')} ${info.scopes.join(', ')}  ${c.label('Variables:')} ${info.varsCount}`)
  ui.log(`  ${c.label('Location:')} ${c.muted(info.dirPath)}`)
}
