/**
 * winenv set <name> <value>
 *
 * Creates the variable, or updates it when it already exists.
 */

import { unwrap } from '../../controller.js'
import { isRegistryValueType } from '../../types.js'
import { InvalidOptionError, requireArg, type CommandContext } from '../context.js'
import { describeMutation, toJson } from '../lib/report.js'
import * as ui from '../ui.js'

export async function runSet(context: CommandContext): Promise<void> {
  const { controller, options } = context
  const name = requireArg(context, 0, 'name')
  const value = requireArg(context, 1, 'value')
  const scope = options.scope ?? 'user'

  const type = options.type?.toUpperCase()
  if (type !== undefined && !isRegistryValueType(type)) {
    throw new InvalidOptionError(`Invalid type: ${options.type}`, 'Use --type REG_SZ or --type REG_EXPAND_SZ')
  }

  const existing = unwrap(await controller.get(scope, name))
  const result = unwrap(existing
    ? await controller.update(scope, name, value, type)
    : await controller.add(scope, name, value, type))

  if (options.json) {
    ui.output(toJson(result))
    return
  }
  describeMutation(result, existing ? 'Updated' : 'Added', scope, result.variable?.name ?? name)
}
