/**
 * Registry editor (.reg) codec
 *
 * Output matches regedit's own exports: UTF-16LE with BOM, CRLF line ends,
 * `hex(2):`/`hex(1):` byte lists wrapped at 80 columns. Input may also be
 * UTF-8 or REGEDIT4 and may use HKCU/HKLM; `"name"=-` is a delete record.
 */

import type { ImportBatch, ImportRecord, RegistryValueType, Scope, VariableSet } from '../../types.js'
import { REGISTRY_KEYS, SCOPES } from '../../types.js'
import { MalformedInputError } from '../errors.js'
import { sortVariables } from '../variables.js'
import type { Codec } from './types.js'
import { UTF16LE_BOM, decodeText } from './text.js'

export const REG_HEADER = 'Windows Registry Editor Version 5.00'
const REGEDIT4_HEADER = 'REGEDIT4'
const EOL = '\r\n'
const MAX_LINE = 80
const WRAP_AT = MAX_LINE - 3

const KEY_ABBREVIATIONS: Record<string, string> = {
  HKCU: 'HKEY_CURRENT_USER',
  HKLM: 'HKEY_LOCAL_MACHINE'
}

function escapeString(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')
}

/**
 * `"name"=hex(N):xx,xx,...` split into lines of at most 80 characters,
 * each continued with a trailing backslash and indented by two spaces.
 * A line breaks after the comma that brings it to 77 characters, even
 * when only the final byte is left, as regedit does.
 */
export function formatHexValue(prefix: string, data: Buffer): string {
  const lines: string[] = []
  let line = prefix

  data.forEach((byte, index) => {
    line += byte.toString(16).padStart(2, '0')
    if (index === data.length - 1) return

    line += ','
    if (line.length >= WRAP_AT) {
      lines.push(line + '\\')
      line = '  '
    }
  })

  lines.push(line)
  return lines.join(EOL)
}

/** UTF-16LE bytes plus the terminating NUL, as regedit stores strings */
function utf16z(value: string): Buffer {
  return Buffer.concat([Buffer.from(value, 'utf16le'), Buffer.from([0, 0])])
}

export function encodeValueLine(name: string, value: string, type: RegistryValueType): string {
  const quotedName = `"${escapeString(name)}"`
  if (type === 'REG_EXPAND_SZ') {
    return formatHexValue(`${quotedName}=hex(2):`, utf16z(value))
  }
  if (/[\r\n]/.test(value)) {
    return formatHexValue(`${quotedName}=hex(1):`, utf16z(value))
  }
  return `${quotedName}="${escapeString(value)}"`
}

// ============================================================================
// Decoding
// ============================================================================

interface LogicalLine {
  text: string
  line: number
}

/**
 * Physical lines joined across `\` continuations of hex values
 */
function logicalLines(text: string): LogicalLine[] {
  const physical = text.split(/\r?\n/)
  const result: LogicalLine[] = []

  for (let i = 0; i < physical.length; i++) {
    const start = i
    let current = physical[i].trimEnd()

    while (/=\s*hex(\([0-9a-f]+\))?:/i.test(current) && current.endsWith('\\') && i + 1 < physical.length) {
      i++
      current = current.slice(0, -1) + physical[i].trim()
    }

    result.push({ text: current, line: start + 1 })
  }

  return result
}

function scopeForKey(key: string, line: number): Scope {
  const [root, ...rest] = key.split('\\')
  const expanded = [KEY_ABBREVIATIONS[root.toUpperCase()] ?? root, ...rest].join('\\').toLowerCase()
  const scope = SCOPES.find(s => REGISTRY_KEYS[s].toLowerCase() === expanded)
  if (!scope) {
    throw new MalformedInputError('reg', `key "${key}" is not an environment key`, line)
  }
  return scope
}

/**
 * Read a `"..."` token starting at `start`; returns the unescaped text and
 * the index after the closing quote
 */
function readQuoted(text: string, start: number, line: number): { value: string; end: number } {
  let value = ''
  for (let i = start + 1; i < text.length; i++) {
    const ch = text[i]
    if (ch === '\\' && i + 1 < text.length) {
      value += text[i + 1]
      i++
    } else if (ch === '"') {
      return { value, end: i + 1 }
    } else {
      value += ch
    }
  }
  throw new MalformedInputError('reg', 'unterminated string', line)
}

function decodeHex(data: string, line: number): string {
  const compact = data.replace(/\s+/g, '')
  if (compact === '') return ''

  const bytes = compact.split(',').filter(b => b !== '').map(b => {
    if (!/^[0-9a-f]{1,2}$/i.test(b)) {
      throw new MalformedInputError('reg', `bad hex byte "${b}"`, line)
    }
    return parseInt(b, 16)
  })
  if (bytes.length % 2 !== 0) {
    throw new MalformedInputError('reg', 'odd number of bytes in a UTF-16 string', line)
  }

  // eslint-disable-next-line no-control-regex
  return Buffer.from(bytes).toString('utf16le').replace(/\u0000+$/, '')
}

function parseValueLine(text: string, scope: Scope, line: number): ImportRecord {
  if (text.startsWith('@')) {
    throw new MalformedInputError('reg', 'default values are not environment variables', line)
  }
  if (!text.startsWith('"')) {
    throw new MalformedInputError('reg', `unexpected line "${text}"`, line)
  }

  const { value: name, end } = readQuoted(text, 0, line)
  const rest = text.slice(end).trimStart()
  if (!rest.startsWith('=')) {
    throw new MalformedInputError('reg', `expected "=" after "${name}"`, line)
  }
  const data = rest.slice(1).trim()

  if (data === '-') {
    return { scope, name, value: '', action: 'delete', line }
  }

  if (data.startsWith('"')) {
    const quoted = readQuoted(data, 0, line)
    if (data.slice(quoted.end).trim() !== '') {
      throw new MalformedInputError('reg', `trailing text after the value of "${name}"`, line)
    }
    return { scope, name, value: quoted.value, action: 'set', type: 'REG_SZ', line }
  }

  const hex = /^hex\((1|2)\):(.*)$/i.exec(data)
  if (hex) {
    const type: RegistryValueType = hex[1] === '2' ? 'REG_EXPAND_SZ' : 'REG_SZ'
    return { scope, name, value: decodeHex(hex[2], line), action: 'set', type, line }
  }

  throw new MalformedInputError('reg', `"${name}" has a value type other than REG_SZ or REG_EXPAND_SZ`, line)
}

export const regCodec: Codec = {
  format: 'reg',
  extensions: ['.reg'],

  encode(sets: VariableSet[]): Buffer {
    const blocks = [REG_HEADER, '']
    for (const set of sets) {
      blocks.push(`[${REGISTRY_KEYS[set.scope]}]`)
      for (const variable of sortVariables(set.variables)) {
        blocks.push(encodeValueLine(variable.name, variable.value, variable.type))
      }
      blocks.push('')
    }
    return Buffer.concat([UTF16LE_BOM, Buffer.from(blocks.join(EOL) + EOL, 'utf16le')])
  },

  decode(bytes: Buffer | string): ImportBatch {
    const lines = logicalLines(decodeText(bytes)).filter(l => l.text.trim() !== '' && !l.text.startsWith(';'))
    const [header, ...body] = lines

    if (!header) {
      return { format: 'reg', records: [] }
    }
    if (header.text.trim() !== REG_HEADER && header.text.trim() !== REGEDIT4_HEADER) {
      throw new MalformedInputError('reg', `missing "${REG_HEADER}" header`, header.line)
    }

    const records: ImportRecord[] = []
    let scope: Scope | null = null

    for (const { text, line } of body) {
      const trimmed = text.trim()

      if (trimmed.startsWith('[')) {
        if (!trimmed.endsWith(']')) {
          throw new MalformedInputError('reg', 'unterminated key', line)
        }
        if (trimmed.startsWith('[-')) {
          throw new MalformedInputError('reg', 'key deletions are not supported', line)
        }
        scope = scopeForKey(trimmed.slice(1, -1).trim(), line)
        continue
      }

      if (!scope) {
        throw new MalformedInputError('reg', 'value outside of a key', line)
      }
      records.push(parseValueLine(trimmed, scope, line))
    }

    return { format: 'reg', records }
  }
}
