/**
 * YAML codec (default export format)
 *
 * One document per scope, separated by `---`.
 */

import { LineCounter, isNode, isSeq, parseAllDocuments, stringify } from 'yaml'
import type { ImportBatch, ImportRecord, VariableSet } from '../../types.js'
import { MalformedInputError } from '../errors.js'
import type { Codec } from './types.js'
import { recordsFromScope, toStructuredScope } from './structured.js'
import { decodeText } from './text.js'

const HEADER = '# winenv environment export\n'

export const yamlCodec: Codec = {
  format: 'yaml',
  extensions: ['.yaml', '.yml'],

  encode(sets: VariableSet[]): Buffer {
    const documents = sets.map(set => stringify(toStructuredScope(set), { lineWidth: 0 }))
    return Buffer.from(HEADER + documents.join('---\n'), 'utf-8')
  },

  decode(bytes: Buffer | string): ImportBatch {
    const lineCounter = new LineCounter()
    const documents = parseAllDocuments(decodeText(bytes), { lineCounter })
    const lineAt = (offset: number): number => lineCounter.linePos(offset).line

    const records: ImportRecord[] = []

    for (const doc of documents) {
      const [error] = doc.errors
      if (error) {
        throw new MalformedInputError('yaml', error.message.split('\n')[0], error.linePos?.[0].line, error)
      }

      if (doc.contents === null) continue

      const docLine = isNode(doc.contents) && doc.contents.range ? lineAt(doc.contents.range[0]) : undefined
      const variables = doc.get('variables', true)
      const lineOf = (index: number): number | undefined => {
        if (!isSeq(variables)) return undefined
        const item = variables.items[index]
        return isNode(item) && item.range ? lineAt(item.range[0]) : undefined
      }

      const content: unknown = doc.toJS()
      records.push(...recordsFromScope(content, 'yaml', lineOf, docLine))
    }

    return { format: 'yaml', records }
  }
}
