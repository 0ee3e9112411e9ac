/**
 * winenv snapshot verify <id>
 */

import { unwrap } from '../../../controller.js'
import { requireArg, type CommandContext } from '../../context.js'
import { c, print } from '../../lib/colors.js'
import { toJson } from '../../lib/report.js'
import * as ui from '../../ui.js'

export async function runSnapshotVerify(context: CommandContext): Promise<void> {
  const { controller, options } = context
  const id = requireArg(context, 0, 'id')

  const result = unwrap(await controller.verifySnapshot(id))

  if (options.json) {
    ui.output(toJson(result))
  } else if (result.valid) {
    print.success(`${result.id}: checksum OK`)
  } else {
    print.error(`${result.id}: checksum mismatch`)
    ui.log(`  ${c.label('Expected:')} ${result.expected}`)
    ui.log(`  ${c.label('Actual:')}   ${result.actual}`)
  }

  if (!result.valid) {
    process.exitCode = 1
  }
}
