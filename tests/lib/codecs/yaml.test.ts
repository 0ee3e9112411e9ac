import { describe, it, expect } from 'vitest'
import { yamlCodec } from '../../../src/lib/codecs/yaml.js'
import { MalformedInputError } from '../../../src/lib/errors.js'
import { flatten, sampleSets } from './fixtures.js'

describe('yamlCodec', () => {
  it('starts with the header and writes one document per scope', () => {
    const text = yamlCodec.encode(sampleSets()).toString('utf-8')
    expect(text.startsWith('# winenv environment export\nscope: system\n')).toBe(true)
    expect(text.split('\n---\n')).toHaveLength(2)
  })

  it('writes path-like values as segment lists', () => {
    const text = yamlCodec.encode(sampleSets()).toString('utf-8')
    expect(text).toContain('kind: path-like')
    const batch = yamlCodec.decode(text)
    const path = batch.records.find(r => r.name === 'Path')
    expect(path?.value).toBe('C:\\A;%USERPROFILE%\\bin')
    expect(path?.kind).toBe('path-like')
  })

  it('round-trips names, values and types', () => {
    const batch = yamlCodec.decode(yamlCodec.encode(sampleSets()))
    expect(batch.format).toBe('yaml')
    expect(batch.records.map(r => ({ scope: r.scope, name: r.name, value: r.value, type: r.type })))
      .toEqual(flatten(sampleSets()))
  })

  it('decodes hand-written input with line numbers', () => {
    const input = [
      'scope: user',
      'variables:',
      '  - name: FOO',
      '    value: bar',
      '  - name: Path',
      '    value:',
      '      - C:\\A',
      '      - C:\\B',
      '    type: REG_EXPAND_SZ',
      '  - name: OLD',
      '    action: delete',
      '---',
      'scope: system',
      'variables:',
      '  - name: PORT',
      '    value: 8080',
      ''
    ].join('\n')

    expect(yamlCodec.decode(input).records).toEqual([
      { scope: 'user', name: 'FOO', value: 'bar', action: 'set', line: 3 },
      { scope: 'user', name: 'Path', value: 'C:\\A;C:\\B', action: 'set', type: 'REG_EXPAND_SZ', line: 5 },
      { scope: 'user', name: 'OLD', value: '', action: 'delete', line: 10 },
      { scope: 'system', name: 'PORT', value: '8080', action: 'set', line: 15 }
    ])
  })

  it('returns no records for empty input', () => {
    expect(yamlCodec.decode('').records).toEqual([])
    expect(yamlCodec.decode('# winenv environment export\n').records).toEqual([])
  })

  it('rejects an unknown scope at the document line', () => {
    expect(() => yamlCodec.decode('scope: galaxy\nvariables: []\n'))
      .toThrow('Malformed yaml input at line 1: "scope" must be "system" or "user", got "galaxy"')
  })

  it('rejects an unknown type at the item line', () => {
    const input = 'scope: user\nvariables:\n  - name: A\n    value: "1"\n  - name: B\n    value: "2"\n    type: REG_DWORD\n'
    expect(() => yamlCodec.decode(input)).toThrow('Malformed yaml input at line 5: "B": unknown type "REG_DWORD"')
  })

  it('rejects a variable without a name', () => {
    expect(() => yamlCodec.decode('scope: user\nvariables:\n  - value: x\n')).toThrow('variable #1 has no name')
  })

  it('rejects YAML syntax errors', () => {
    expect(() => yamlCodec.decode('scope: user\nvariables:\n  - name: [unclosed\n')).toThrow(MalformedInputError)
  })

  it('rejects a non-list "variables"', () => {
    expect(() => yamlCodec.decode('scope: user\nvariables: nope\n')).toThrow('"variables" must be a list')
  })
})
