import { describe, it, expect } from 'vitest'
import os from 'node:os'
import path from 'node:path'
import { InvalidOptionError, buildOptions, parseIndex, requireArg, type CommandContext } from '../../src/cli/context.js'
import { EnvironmentController } from '../../src/controller.js'
import { getDefaultConfig } from '../../src/lib/config-loader.js'
import { MemoryRegistryBackend } from '../../src/lib/memory-registry.js'

describe('buildOptions', () => {
  it('fills defaults for an empty option bag', () => {
    expect(buildOptions({})).toEqual({
      scope: undefined,
      json: false,
      verbose: false,
      dryRun: false,
      format: undefined,
      file: undefined,
      policy: undefined,
      name: undefined,
      type: undefined,
      variable: 'PATH',
      index: undefined,
      field: undefined,
      regex: false,
      caseSensitive: false
    })
  })

  it('maps kebab-case flags and lowercases the scope', () => {
    const options = buildOptions({
      scope: 'User',
      'dry-run': true,
      'case-sensitive': true,
      var: 'PSModulePath',
      index: '2',
      format: 'reg'
    })

    expect(options.scope).toBe('user')
    expect(options.dryRun).toBe(true)
    expect(options.caseSensitive).toBe(true)
    expect(options.variable).toBe('PSModulePath')
    expect(options.index).toBe(2)
    expect(options.format).toBe('reg')
  })

  it('treats empty strings as absent', () => {
    expect(buildOptions({ file: '' }).file).toBeUndefined()
  })

  it('rejects an unknown scope', () => {
    expect(() => buildOptions({ scope: 'machine' })).toThrow(InvalidOptionError)
    expect(() => buildOptions({ scope: 'machine' })).toThrow('Invalid scope: machine')
  })
})

describe('parseIndex', () => {
  it('accepts non-negative integers given as strings or numbers', () => {
    expect(parseIndex('0', 'index')).toBe(0)
    expect(parseIndex(7, 'index')).toBe(7)
    expect(parseIndex(undefined, 'index')).toBeUndefined()
  })

  it('rejects negatives, fractions and words', () => {
    expect(() => parseIndex('-1', '<from>')).toThrow('<from> must be a non-negative integer, got "-1"')
    expect(() => parseIndex('1.5', '<from>')).toThrow(InvalidOptionError)
    expect(() => parseIndex('two', '<from>')).toThrow(InvalidOptionError)
  })
})

describe('requireArg', () => {
  const config = getDefaultConfig(path.join(os.tmpdir(), 'winenv-context-test'))
  const context: CommandContext = {
    command: ['path', 'remove'],
    args: ['3'],
    options: buildOptions({}),
    config,
    controller: new EnvironmentController({ config, backend: new MemoryRegistryBackend() })
  }

  it('returns the positional value', () => {
    expect(requireArg(context, 0, 'index')).toBe('3')
  })

  it('names the missing argument and points at the command help', () => {
    try {
      requireArg(context, 1, 'to')
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidOptionError)
      expect(err instanceof InvalidOptionError && err.message).toBe('Missing argument: <to>')
      expect(err instanceof InvalidOptionError && err.suggestion).toBe('Run "winenv path remove --help" for usage')
    }
  })
})
