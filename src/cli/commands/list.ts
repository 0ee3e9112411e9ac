/**
 * winenv list
 *
 * All variables of one scope, or of both.
 */

import { unwrap } from '../../controller.js'
import { SCOPES } from '../../types.js'
import type { CommandContext } from '../context.js'
import { colorScope } from '../lib/colors.js'
import { toJson, variablesTable } from '../lib/report.js'
import * as ui from '../ui.js'

export async function runList(context: CommandContext): Promise<void> {
  const { controller, options } = context
  const scopes = options.scope ? [options.scope] : [...SCOPES]

  const variables = []
  for (const scope of scopes) {
    const set = unwrap(await controller.read(scope))
    variables.push(...set.variables)
  }

  if (options.json) {
    ui.output(toJson(variables))
    return
  }

  if (variables.length === 0) {
    ui.log(`No variables in ${scopes.map(colorScope).join(' or ')} scope.`)
    return
  }

  ui.output(variablesTable(variables))
}
