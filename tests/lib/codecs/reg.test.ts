import { describe, it, expect } from 'vitest'
import { REG_HEADER, encodeValueLine, formatHexValue, regCodec } from '../../../src/lib/codecs/reg.js'
import { createVariableSet } from '../../../src/lib/variables.js'
import { flatten, sampleSets } from './fixtures.js'

describe('encodeValueLine', () => {
  it('writes REG_SZ as an escaped string', () => {
    expect(encodeValueLine('FOO', 'C:\\x "y"', 'REG_SZ')).toBe('"FOO"="C:\\\\x \\"y\\""')
  })

  it('writes REG_EXPAND_SZ as NUL-terminated UTF-16 hex(2)', () => {
    expect(encodeValueLine('P', '%A%', 'REG_EXPAND_SZ')).toBe('"P"=hex(2):25,00,41,00,25,00,00,00')
  })

  it('writes multi-line REG_SZ as hex(1)', () => {
    expect(encodeValueLine('M', 'a\nb', 'REG_SZ')).toBe('"M"=hex(1):61,00,0a,00,62,00,00,00')
  })
})

describe('formatHexValue', () => {
  it('wraps at 80 columns with indented continuation lines', () => {
    const text = formatHexValue('"LONG"=hex(2):', Buffer.alloc(100, 0x41))
    const lines = text.split('\r\n')
    expect(lines.length).toBeGreaterThan(1)
    for (const line of lines) {
      expect(line.length).toBeLessThanOrEqual(80)
    }
    lines.slice(0, -1).forEach(line => expect(line.endsWith('\\')).toBe(true))
    lines.slice(1).forEach(line => expect(line.startsWith('  ')).toBe(true))
    expect(lines[lines.length - 1].endsWith(',')).toBe(false)
  })

  it('breaks after the comma reaching 77 columns even before the last byte', () => {
    const prefix = '"P"=hex(2):'
    expect(formatHexValue(prefix, Buffer.alloc(23, 0x41)).split('\r\n')).toEqual([
      prefix + '41,'.repeat(22) + '\\',
      '  41'
    ])
  })

  it('keeps a value one byte shorter on a single line', () => {
    const prefix = '"P"=hex(2):'
    expect(formatHexValue(prefix, Buffer.alloc(22, 0x41))).toBe(prefix + '41,'.repeat(21) + '41')
  })
})

describe('regCodec', () => {
  it('encodes UTF-16LE with BOM, CRLF and one block per scope', () => {
    const bytes = regCodec.encode([createVariableSet('user', [{ name: 'FOO', value: 'bar', type: 'REG_SZ' }])])
    expect([...bytes.subarray(0, 2)]).toEqual([0xff, 0xfe])
    expect(bytes.subarray(2).toString('utf16le')).toBe(
      `${REG_HEADER}\r\n\r\n[HKEY_CURRENT_USER\\Environment]\r\n"FOO"="bar"\r\n\r\n`
    )
  })

  it('round-trips values and storage types', () => {
    const sets = sampleSets()
    sets[1].variables.push({ scope: 'user', name: 'NOTES', value: 'line1\r\nline2', type: 'REG_SZ', kind: 'plain' })
    sets[1].variables.push({
      scope: 'user',
      name: 'LONG',
      value: '%USERPROFILE%\\' + 'segment;'.repeat(20),
      type: 'REG_EXPAND_SZ',
      kind: 'plain'
    })

    const batch = regCodec.decode(regCodec.encode(sets))
    expect(batch.records.map(r => ({ scope: r.scope, name: r.name, value: r.value, type: r.type })))
      .toEqual(flatten(sets))
  })

  it('decodes a hand-written UTF-8 file with abbreviations, deletes and continuations', () => {
    const input = [
      'Windows Registry Editor Version 5.00',
      '',
      '; exported by hand',
      '[HKCU\\Environment]',
      '"FOO"="bar \\"q\\" C:\\\\x"',
      '"OLD"=-',
      '"P"=hex(2):25,00,41,00,25,00,\\',
      '  00,00',
      '',
      '[HKEY_LOCAL_MACHINE\\SYSTEM\\CurrentControlSet\\Control\\Session Manager\\Environment]',
      '"SYS"="1"',
      ''
    ].join('\r\n')

    expect(regCodec.decode(input).records).toEqual([
      { scope: 'user', name: 'FOO', value: 'bar "q" C:\\x', action: 'set', type: 'REG_SZ', line: 5 },
      { scope: 'user', name: 'OLD', value: '', action: 'delete', line: 6 },
      { scope: 'user', name: 'P', value: '%A%', action: 'set', type: 'REG_EXPAND_SZ', line: 7 },
      { scope: 'system', name: 'SYS', value: '1', action: 'set', type: 'REG_SZ', line: 11 }
    ])
  })

  it('accepts a REGEDIT4 header', () => {
    const input = 'REGEDIT4\n\n[HKEY_CURRENT_USER\\Environment]\n"A"="1"\n'
    expect(regCodec.decode(input).records).toHaveLength(1)
  })

  it('returns no records for empty input', () => {
    expect(regCodec.decode('').records).toEqual([])
  })

  it('rejects a missing header', () => {
    expect(() => regCodec.decode('[HKCU\\Environment]\n"A"="1"\n'))
      .toThrow(`Malformed reg input at line 1: missing "${REG_HEADER}" header`)
  })

  it('rejects keys other than the environment keys', () => {
    expect(() => regCodec.decode(`${REG_HEADER}\n[HKCU\\Software\\Foo]\n"A"="1"\n`))
      .toThrow('key "HKCU\\Software\\Foo" is not an environment key')
  })

  it('rejects key deletions', () => {
    expect(() => regCodec.decode(`${REG_HEADER}\n[-HKCU\\Environment]\n`)).toThrow('key deletions are not supported')
  })

  it('rejects values of other types', () => {
    expect(() => regCodec.decode(`${REG_HEADER}\n[HKCU\\Environment]\n"D"=dword:00000001\n`))
      .toThrow('Malformed reg input at line 3: "D" has a value type other than REG_SZ or REG_EXPAND_SZ')
  })

  it('rejects default values and values outside a key', () => {
    expect(() => regCodec.decode(`${REG_HEADER}\n[HKCU\\Environment]\n@="x"\n`))
      .toThrow('default values are not environment variables')
    expect(() => regCodec.decode(`${REG_HEADER}\n"A"="1"\n`)).toThrow('value outside of a key')
  })
})
