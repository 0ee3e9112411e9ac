/**
 * winenv get <name>
 *
 * Without --scope the user scope is searched first, then system.
 */

import { unwrap } from '../../controller.js'
import { VariableNotFoundError } from '../../lib/errors.js'
import type { Variable } from '../../types.js'
import { requireArg, type CommandContext } from '../context.js'
import { toJson } from '../lib/report.js'
import * as ui from '../ui.js'

export async function runGet(context: CommandContext): Promise<void> {
  const { controller, options } = context
  const name = requireArg(context, 0, 'name')
  const scopes = options.scope ? [options.scope] : (['user', 'system'] as const)

  let found: Variable | null = null
  for (const scope of scopes) {
    found = unwrap(await controller.get(scope, name))
    if (found) break
  }

  if (!found) {
    throw new VariableNotFoundError(name, options.scope ?? 'user')
  }

  if (options.json) {
    ui.output(toJson(found))
  } else {
    ui.output(found.value)
  }
}
