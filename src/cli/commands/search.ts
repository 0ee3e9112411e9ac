/**
 * winenv search <query>
 */

import { unwrap } from '../../controller.js'
import type { SearchField } from '../../types.js'
import { InvalidOptionError, requireArg, type CommandContext } from '../context.js'
import { toJson, variablesTable } from '../lib/report.js'
import * as ui from '../ui.js'

const FIELDS: SearchField[] = ['name', 'value', 'both']

function toField(value: string | undefined): SearchField {
  const field = FIELDS.find(f => f === (value ?? 'both'))
  if (!field) {
    throw new InvalidOptionError(`Invalid field: ${value}`, `Use one of: ${FIELDS.join(', ')}`)
  }
  return field
}

export async function runSearch(context: CommandContext): Promise<void> {
  const { controller, options } = context
  const query = requireArg(context, 0, 'query')

  const matches = unwrap(await controller.search(query, {
    scope: options.scope,
    field: toField(options.field),
    regex: options.regex,
    caseSensitive: options.caseSensitive
  }))

  if (options.json) {
    ui.output(toJson(matches))
    return
  }

  if (matches.length === 0) {
    ui.log(`No variables match "${query}".`)
    return
  }
  ui.output(variablesTable(matches))
}
