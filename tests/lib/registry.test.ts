import { describe, it, expect, beforeEach } from 'vitest'
import { RegistryAccessor } from '../../src/lib/registry.js'
import { MemoryRegistryBackend } from '../../src/lib/memory-registry.js'
import { AccessDeniedError, ValidationError, VariableNotFoundError } from '../../src/lib/errors.js'

describe('MemoryRegistryBackend', () => {
  it('seeds from a name/value record with inferred types', () => {
    const backend = new MemoryRegistryBackend({ user: { FOO: 'bar', TOOLS: '%USERPROFILE%\\tools' } })
    expect(backend.list('user')).toEqual([
      { name: 'FOO', value: 'bar', type: 'REG_SZ' },
      { name: 'TOOLS', value: '%USERPROFILE%\\tools', type: 'REG_EXPAND_SZ' }
    ])
    expect(backend.list('system')).toEqual([])
  })

  it('keeps the stored casing when a name is overwritten', () => {
    const backend = new MemoryRegistryBackend({ user: { Path: 'a' } })
    backend.set('user', { name: 'PATH', value: 'b', type: 'REG_SZ' })
    expect(backend.list('user')).toEqual([{ name: 'Path', value: 'b', type: 'REG_SZ' }])
  })

  it('refuses system writes when not elevated', () => {
    const backend = new MemoryRegistryBackend({ elevated: false })
    expect(() => backend.set('system', { name: 'A', value: '1', type: 'REG_SZ' })).toThrow(AccessDeniedError)
    expect(() => backend.set('user', { name: 'A', value: '1', type: 'REG_SZ' })).not.toThrow()
  })

  it('fails calls chosen by the failure hook', () => {
    const backend = new MemoryRegistryBackend()
    backend.failureHook = (op, _scope, name) => (op === 'set' && name === 'BAD' ? new Error('disk full') : null)
    expect(() => backend.set('user', { name: 'BAD', value: '1', type: 'REG_SZ' })).toThrow('disk full')
    expect(() => backend.set('user', { name: 'GOOD', value: '1', type: 'REG_SZ' })).not.toThrow()
  })

  it('returns copies from list', () => {
    const backend = new MemoryRegistryBackend({ user: { A: '1' } })
    backend.list('user')[0].value = 'changed'
    expect(backend.list('user')[0].value).toBe('1')
  })
})

describe('RegistryAccessor', () => {
  let backend: MemoryRegistryBackend
  let registry: RegistryAccessor

  beforeEach(() => {
    backend = new MemoryRegistryBackend({
      user: { Path: 'C:\\A;C:\\B', FOO: 'bar' },
      system: [{ name: 'ComSpec', value: '%SystemRoot%\\system32\\cmd.exe', type: 'REG_EXPAND_SZ' }]
    })
    registry = new RegistryAccessor(backend)
  })

  it('reads a scope as a classified set', () => {
    const set = registry.read('user')
    expect(set.scope).toBe('user')
    expect(set.variables.map(v => [v.name, v.kind])).toEqual([['Path', 'path-like'], ['FOO', 'plain']])
  })

  it('looks names up case-insensitively', () => {
    expect(registry.get('user', 'path')?.value).toBe('C:\\A;C:\\B')
    expect(registry.get('user', 'nope')).toBeNull()
  })

  it('writes, broadcasts once and returns the stored variable', () => {
    const written = registry.write('user', 'NEW', 'value')
    expect(written).toEqual({ scope: 'user', name: 'NEW', value: 'value', type: 'REG_SZ', kind: 'plain' })
    expect(backend.broadcastCount).toBe(1)
  })

  it('keeps the existing type and casing on overwrite', () => {
    const written = registry.write('system', 'COMSPEC', 'C:\\cmd.exe')
    expect(written.name).toBe('ComSpec')
    expect(written.type).toBe('REG_EXPAND_SZ')
  })

  it('uses an explicit type when given', () => {
    expect(registry.write('user', 'FOO', 'x', 'REG_EXPAND_SZ').type).toBe('REG_EXPAND_SZ')
  })

  it('rejects unusable names before touching the backend', () => {
    expect(() => registry.write('user', 'A=B', 'x')).toThrow(ValidationError)
    expect(backend.broadcastCount).toBe(0)
  })

  it('refuses system writes without elevation', () => {
    backend.elevated = false
    expect(() => registry.write('system', 'X', '1')).toThrow(AccessDeniedError)
    expect(() => registry.assertWritable('user')).not.toThrow()
    expect(backend.broadcastCount).toBe(0)
  })

  it('deletes and returns the removed variable', () => {
    const removed = registry.delete('user', 'foo')
    expect(removed.name).toBe('FOO')
    expect(registry.get('user', 'FOO')).toBeNull()
    expect(backend.broadcastCount).toBe(1)
  })

  it('throws VariableNotFoundError for a missing name', () => {
    expect(() => registry.delete('user', 'MISSING')).toThrow(VariableNotFoundError)
    expect(backend.broadcastCount).toBe(0)
  })

  it('does not fail a write when the broadcast fails', () => {
    backend.broadcastError = new Error('timeout')
    expect(() => registry.write('user', 'X', '1')).not.toThrow()
    expect(registry.get('user', 'X')?.value).toBe('1')
  })

  it('uses the configured path-like names', () => {
    const custom = new RegistryAccessor(backend, ['FOO'])
    expect(custom.get('user', 'FOO')?.kind).toBe('path-like')
    expect(custom.get('user', 'Path')?.kind).toBe('plain')
  })
})
