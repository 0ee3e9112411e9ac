/**
 * Variable and VariableSet helpers
 */

import type {
  RegistryValue,
  RegistryValueType,
  Scope,
  Variable,
  VariableKind,
  VariableSet
} from '../types.js'

export const DEFAULT_PATH_LIKE_NAMES: readonly string[] = ['PATH', 'PSModulePath', 'PYTHONPATH', 'CLASSPATH']

/** Names compare case-insensitively */
export function nameKey(name: string): string {
  return name.toUpperCase()
}

export function classifyKind(name: string, pathLikeNames: readonly string[] = DEFAULT_PATH_LIKE_NAMES): VariableKind {
  const key = nameKey(name)
  return pathLikeNames.some(candidate => nameKey(candidate) === key) ? 'path-like' : 'plain'
}

/**
 * REG_EXPAND_SZ when the value references another variable (%NAME%)
 */
export function inferValueType(value: string): RegistryValueType {
  return /%[^%\s;]+%/.test(value) ? 'REG_EXPAND_SZ' : 'REG_SZ'
}

export function toVariable(
  scope: Scope,
  entry: RegistryValue,
  pathLikeNames: readonly string[] = DEFAULT_PATH_LIKE_NAMES
): Variable {
  return {
    scope,
    name: entry.name,
    value: entry.value,
    type: entry.type,
    kind: classifyKind(entry.name, pathLikeNames)
  }
}

export function createVariableSet(
  scope: Scope,
  entries: RegistryValue[],
  pathLikeNames: readonly string[] = DEFAULT_PATH_LIKE_NAMES
): VariableSet {
  return {
    scope,
    variables: entries.map(entry => toVariable(scope, entry, pathLikeNames))
  }
}

export function findVariable(set: VariableSet, name: string): Variable | undefined {
  const key = nameKey(name)
  return set.variables.find(v => nameKey(v.name) === key)
}

export function toRegistryValue(variable: RegistryValue): RegistryValue {
  return { name: variable.name, value: variable.value, type: variable.type }
}

/**
 * Sort variables by name for stable output
 */
export function sortVariables<T extends { name: string }>(variables: T[]): T[] {
  return [...variables].sort((a, b) => nameKey(a.name).localeCompare(nameKey(b.name)))
}

/**
 * Same scope, same names (case-insensitive), same values and types.
 * Entry order is ignored.
 */
export function variableSetsEqual(a: VariableSet, b: VariableSet): boolean {
  if (a.scope !== b.scope || a.variables.length !== b.variables.length) return false

  const byName = new Map(a.variables.map(v => [nameKey(v.name), v]))
  return b.variables.every(v => {
    const other = byName.get(nameKey(v.name))
    return other !== undefined && other.name === v.name && other.value === v.value && other.type === v.type
  })
}
