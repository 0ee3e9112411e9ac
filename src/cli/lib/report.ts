/**
 * winenv CLI - shared result printers
 */

import type { MutationResult, SegmentEditResult } from '../../controller.js'
import type { ValidationIssue } from '../../lib/validation.js'
import type { Variable } from '../../types.js'
import { c, colorScope, print, symbols } from './colors.js'
import * as ui from '../ui.js'

export function printWarnings(warnings: ValidationIssue[]): void {
  for (const warning of warnings) {
    print.warning(warning.message)
  }
}

export function describeMutation(result: MutationResult, verb: string, scope: string, name: string): void {
  printWarnings(result.warnings)

  if (!result.changed) {
    ui.log(`${c.unchanged('No change:')} ${c.name(name)} (${colorScope(scope)}) already has that value`)
    return
  }

  print.success(`${verb} ${name} (${scope})`)
  if (result.snapshotId) {
    ui.log(`  ${c.label('Backup:')} ${c.muted(result.snapshotId)}`)
  }
}

export function variablesTable(variables: Variable[]): string {
  return ui.formatTable(
    [
      { key: 'scope', header: 'SCOPE' },
      { key: 'name', header: 'NAME' },
      { key: 'type', header: 'TYPE' },
      { key: 'value', header: 'VALUE' }
    ],
    variables.map(v => ({ scope: v.scope, name: v.name, type: v.type, value: v.value }))
  )
}

export function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2)
}

export function describeSegmentEdit(result: SegmentEditResult, verb: string, scope: string, name: string): void {
  for (const entry of result.removed) {
    ui.log(`  ${symbols.minus} ${c.segment(entry.segment)} ${c.muted(`(${entry.reason}, was #${entry.index})`)}`)
  }
  describeMutation(result, verb, scope, name)
}

export function segmentsTable(segments: string[]): string {
  return ui.formatTable(
    [
      { key: 'index', header: '#', align: 'right' },
      { key: 'segment', header: 'SEGMENT' }
    ],
    segments.map((segment, index) => ({ index: String(index), segment }))
  )
}
