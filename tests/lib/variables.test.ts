import { describe, it, expect } from 'vitest'
import {
  classifyKind,
  createVariableSet,
  findVariable,
  inferValueType,
  sortVariables,
  toRegistryValue,
  variableSetsEqual
} from '../../src/lib/variables.js'

describe('classifyKind', () => {
  it('marks configured names as path-like regardless of case', () => {
    expect(classifyKind('Path')).toBe('path-like')
    expect(classifyKind('psmodulepath')).toBe('path-like')
    expect(classifyKind('JAVA_HOME')).toBe('plain')
  })

  it('uses the given list', () => {
    expect(classifyKind('LIB', ['LIB'])).toBe('path-like')
    expect(classifyKind('PATH', ['LIB'])).toBe('plain')
  })
})

describe('inferValueType', () => {
  it('uses REG_EXPAND_SZ for %VAR% references', () => {
    expect(inferValueType('%USERPROFILE%\\bin')).toBe('REG_EXPAND_SZ')
    expect(inferValueType('C:\\bin')).toBe('REG_SZ')
    expect(inferValueType('50%')).toBe('REG_SZ')
  })
})

describe('VariableSet helpers', () => {
  const set = createVariableSet('user', [
    { name: 'Path', value: 'C:\\A', type: 'REG_EXPAND_SZ' },
    { name: 'FOO', value: 'bar', type: 'REG_SZ' }
  ])

  it('classifies each entry', () => {
    expect(set.variables.map(v => [v.name, v.kind, v.scope])).toEqual([
      ['Path', 'path-like', 'user'],
      ['FOO', 'plain', 'user']
    ])
  })

  it('finds names case-insensitively', () => {
    expect(findVariable(set, 'PATH')?.name).toBe('Path')
    expect(findVariable(set, 'missing')).toBeUndefined()
  })

  it('strips scope and kind for the registry', () => {
    expect(toRegistryValue(set.variables[1])).toEqual({ name: 'FOO', value: 'bar', type: 'REG_SZ' })
  })

  it('sorts by name ignoring case', () => {
    expect(sortVariables(set.variables).map(v => v.name)).toEqual(['FOO', 'Path'])
  })

  it('compares sets regardless of order', () => {
    const reordered = createVariableSet('user', [
      { name: 'FOO', value: 'bar', type: 'REG_SZ' },
      { name: 'Path', value: 'C:\\A', type: 'REG_EXPAND_SZ' }
    ])
    expect(variableSetsEqual(set, reordered)).toBe(true)

    const changed = createVariableSet('user', [
      { name: 'FOO', value: 'baz', type: 'REG_SZ' },
      { name: 'Path', value: 'C:\\A', type: 'REG_EXPAND_SZ' }
    ])
    expect(variableSetsEqual(set, changed)).toBe(false)
    expect(variableSetsEqual(set, { ...reordered, scope: 'system' })).toBe(false)
  })
})
