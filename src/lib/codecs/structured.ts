/**
 * Shared record shape of the structured formats (yaml, json)
 *
 *   scope: user
 *   variables:
 *     - name: JAVA_HOME
 *       value: C:\Java
 *       kind: plain
 *       type: REG_SZ
 *     - name: Path
 *       value: [C:\A, C:\B]      # path-like values are segment lists
 *       kind: path-like
 *       type: REG_EXPAND_SZ
 *     - name: OLD_VAR
 *       action: delete
 */

import type { ExportFormat, ImportRecord, VariableSet } from '../../types.js'
import { isRegistryValueType, isScope, isVariableKind } from '../../types.js'
import { MalformedInputError } from '../errors.js'
import { joinSegments, splitSegments } from '../path-segments.js'
import { sortVariables } from '../variables.js'

export interface StructuredVariable {
  name: string
  value: string | string[]
  kind: string
  type: string
}

export interface StructuredScope {
  scope: string
  variables: StructuredVariable[]
}

export function toStructuredScope(set: VariableSet): StructuredScope {
  return {
    scope: set.scope,
    variables: sortVariables(set.variables).map(variable => ({
      name: variable.name,
      value: variable.kind === 'path-like' ? splitSegments(variable.value) : variable.value,
      kind: variable.kind,
      type: variable.type
    }))
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/**
 * Turn one decoded scope document into import records.
 * `lineOf` maps a variable's index to its source line where the format knows it.
 */
export function recordsFromScope(
  doc: unknown,
  format: ExportFormat,
  lineOf: (index: number) => number | undefined = () => undefined,
  docLine?: number
): ImportRecord[] {
  if (!isRecord(doc)) {
    throw new MalformedInputError(format, 'expected a mapping with "scope" and "variables"', docLine)
  }

  const scope = doc.scope
  if (!isScope(scope)) {
    throw new MalformedInputError(format, `"scope" must be "system" or "user", got ${JSON.stringify(scope)}`, docLine)
  }

  const variables = doc.variables ?? []
  if (!Array.isArray(variables)) {
    throw new MalformedInputError(format, '"variables" must be a list', docLine)
  }

  return variables.map((entry: unknown, index): ImportRecord => {
    const line = lineOf(index)

    if (!isRecord(entry)) {
      throw new MalformedInputError(format, `variable #${index + 1} is not a mapping`, line)
    }
    if (typeof entry.name !== 'string') {
      throw new MalformedInputError(format, `variable #${index + 1} has no name`, line)
    }

    const action = entry.action ?? 'set'
    if (action !== 'set' && action !== 'delete') {
      throw new MalformedInputError(format, `"${entry.name}": action must be "set" or "delete"`, line)
    }

    const record: ImportRecord = { scope, name: entry.name, value: '', action }
    if (line !== undefined) record.line = line

    if (action === 'delete') {
      return record
    }

    const value = entry.value ?? ''
    if (typeof value === 'string') {
      record.value = value
    } else if (Array.isArray(value) && value.every((s): s is string => typeof s === 'string')) {
      record.value = joinSegments(value)
    } else if (typeof value === 'number' || typeof value === 'boolean') {
      record.value = String(value)
    } else {
      throw new MalformedInputError(format, `"${entry.name}": value must be a string or a list of strings`, line)
    }

    if (entry.type !== undefined) {
      if (!isRegistryValueType(entry.type)) {
        throw new MalformedInputError(format, `"${entry.name}": unknown type ${JSON.stringify(entry.type)}`, line)
      }
      record.type = entry.type
    }

    if (entry.kind !== undefined) {
      if (!isVariableKind(entry.kind)) {
        throw new MalformedInputError(format, `"${entry.name}": unknown kind ${JSON.stringify(entry.kind)}`, line)
      }
      record.kind = entry.kind
    }

    return record
  })
}
