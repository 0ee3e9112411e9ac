import { createVariableSet } from '../../../src/lib/variables.js'
import type { VariableSet } from '../../../src/types.js'

export function sampleSets(): VariableSet[] {
  return [
    createVariableSet('system', [
      { name: 'ComSpec', value: '%SystemRoot%\\system32\\cmd.exe', type: 'REG_EXPAND_SZ' }
    ]),
    createVariableSet('user', [
      { name: 'Path', value: 'C:\\A;%USERPROFILE%\\bin', type: 'REG_EXPAND_SZ' },
      { name: 'FOO', value: 'bar', type: 'REG_SZ' },
      { name: 'QUOTED', value: 'say "hi", then leave', type: 'REG_SZ' }
    ])
  ]
}

/** name -> value/type of every set record, for round-trip comparisons */
export function flatten(sets: VariableSet[]): Array<{ scope: string; name: string; value: string; type: string }> {
  return sets.flatMap(set =>
    [...set.variables]
      .sort((a, b) => a.name.toUpperCase().localeCompare(b.name.toUpperCase()))
      .map(v => ({ scope: set.scope, name: v.name, value: v.value, type: v.type }))
  )
}
