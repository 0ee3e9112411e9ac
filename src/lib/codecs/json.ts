/**
 * JSON codec: { "scopes": [ { "scope": ..., "variables": [...] } ] }
 */

import type { ImportBatch, ImportRecord, VariableSet } from '../../types.js'
import { MalformedInputError } from '../errors.js'
import type { Codec } from './types.js'
import { recordsFromScope, toStructuredScope } from './structured.js'
import { decodeText } from './text.js'

export const jsonCodec: Codec = {
  format: 'json',
  extensions: ['.json'],

  encode(sets: VariableSet[]): Buffer {
    const document = { scopes: sets.map(toStructuredScope) }
    return Buffer.from(JSON.stringify(document, null, 2) + '\n', 'utf-8')
  },

  decode(bytes: Buffer | string): ImportBatch {
    let parsed: unknown
    try {
      parsed = JSON.parse(decodeText(bytes))
    } catch (err) {
      throw new MalformedInputError('json', err instanceof Error ? err.message : String(err), undefined,
        err instanceof Error ? err : undefined)
    }

    if (parsed === null || typeof parsed !== 'object' || !('scopes' in parsed) || !Array.isArray(parsed.scopes)) {
      throw new MalformedInputError('json', 'expected an object with a "scopes" list')
    }

    const records: ImportRecord[] = []
    for (const scopeDocument of parsed.scopes) {
      records.push(...recordsFromScope(scopeDocument, 'json'))
    }

    return { format: 'json', records }
  }
}
