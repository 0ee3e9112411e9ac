/**
 * CSV codec (RFC 4180)
 *
 * Header `scope,name,value`, one row per variable. Path-like values keep
 * their ';' separators inline. The file carries no storage type.
 */

import type { ImportBatch, ImportRecord, VariableSet } from '../../types.js'
import { isScope } from '../../types.js'
import { MalformedInputError } from '../errors.js'
import { sortVariables } from '../variables.js'
import type { Codec } from './types.js'
import { decodeText } from './text.js'

const HEADER = ['scope', 'name', 'value']
const EOL = '\r\n'

export function quoteField(field: string): string {
  if (/[",\r\n]/.test(field) || field !== field.trim()) {
    return `"${field.replace(/"/g, '""')}"`
  }
  return field
}

interface CsvRow {
  fields: string[]
  line: number
}

/**
 * Split text into rows of fields. Quoted fields may span lines.
 */
export function parseCsv(text: string): CsvRow[] {
  const rows: CsvRow[] = []
  let fields: string[] = []
  let field = ''
  let quoted = false
  let fieldStarted = false
  let line = 1
  let rowLine = 1

  const endRow = (): void => {
    fields.push(field)
    if (!(fields.length === 1 && fields[0] === '' && !fieldStarted)) {
      rows.push({ fields, line: rowLine })
    }
    fields = []
    field = ''
    fieldStarted = false
  }

  for (let i = 0; i < text.length; i++) {
    const ch = text[i]

    if (quoted) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"'
          i++
        } else {
          quoted = false
        }
      } else {
        if (ch === '\n') line++
        field += ch
      }
      continue
    }

    if (ch === '"') {
      if (field !== '') {
        throw new MalformedInputError('csv', 'quote inside an unquoted field', line)
      }
      quoted = true
      fieldStarted = true
    } else if (ch === ',') {
      fields.push(field)
      field = ''
      fieldStarted = true
    } else if (ch === '\r' && text[i + 1] === '\n') {
      continue
    } else if (ch === '\n') {
      endRow()
      line++
      rowLine = line
    } else {
      field += ch
    }
  }

  if (quoted) {
    throw new MalformedInputError('csv', 'unterminated quoted field', rowLine)
  }
  if (field !== '' || fields.length > 0 || fieldStarted) {
    endRow()
  }

  return rows
}

export const csvCodec: Codec = {
  format: 'csv',
  extensions: ['.csv'],

  encode(sets: VariableSet[]): Buffer {
    const lines = [HEADER.join(',')]
    for (const set of sets) {
      for (const variable of sortVariables(set.variables)) {
        lines.push([set.scope, variable.name, variable.value].map(quoteField).join(','))
      }
    }
    return Buffer.from(lines.join(EOL) + EOL, 'utf-8')
  },

  decode(bytes: Buffer | string): ImportBatch {
    const rows = parseCsv(decodeText(bytes))
    const [header, ...body] = rows

    if (!header) {
      return { format: 'csv', records: [] }
    }

    const columns = header.fields.map(f => f.trim().toLowerCase())
    if (columns.join(',') !== HEADER.join(',')) {
      throw new MalformedInputError('csv', `header must be "${HEADER.join(',')}"`, header.line)
    }

    const records = body.map(({ fields, line }): ImportRecord => {
      if (fields.length !== HEADER.length) {
        throw new MalformedInputError('csv', `expected ${HEADER.length} fields, got ${fields.length}`, line)
      }
      const [scope, name, value] = fields
      const normalizedScope = scope.trim().toLowerCase()
      if (!isScope(normalizedScope)) {
        throw new MalformedInputError('csv', `unknown scope "${scope}"`, line)
      }
      return { scope: normalizedScope, name, value, action: 'set', line }
    })

    return { format: 'csv', records }
  }
}
