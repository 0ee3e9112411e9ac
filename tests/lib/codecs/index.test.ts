import { describe, it, expect } from 'vitest'
import { CODECS, detectFormat, getCodec } from '../../../src/lib/codecs/index.js'
import { decodeText } from '../../../src/lib/codecs/text.js'
import { UnsupportedFormatError } from '../../../src/lib/errors.js'

describe('codec registry', () => {
  it('looks formats up case-insensitively', () => {
    expect(getCodec('JSON')).toBe(CODECS.json)
    expect(getCodec('reg').format).toBe('reg')
  })

  it('rejects unknown formats', () => {
    expect(() => getCodec('xml')).toThrow(UnsupportedFormatError)
  })

  it('detects formats from file extensions', () => {
    expect(detectFormat('backup.YML')).toBe('yaml')
    expect(detectFormat('C:\\exports\\env.reg')).toBe('reg')
    expect(detectFormat('vars.csv')).toBe('csv')
    expect(detectFormat('notes.txt')).toBeNull()
    expect(detectFormat('noextension')).toBeNull()
  })
})

describe('decodeText', () => {
  it('handles UTF-16LE with BOM', () => {
    const bytes = Buffer.concat([Buffer.from([0xff, 0xfe]), Buffer.from('héllo', 'utf16le')])
    expect(decodeText(bytes)).toBe('héllo')
  })

  it('strips a UTF-8 BOM from bytes and strings', () => {
    expect(decodeText(Buffer.from([0xef, 0xbb, 0xbf, 0x61]))).toBe('a')
    expect(decodeText('\uFEFFa')).toBe('a')
  })

  it('reads plain UTF-8', () => {
    expect(decodeText(Buffer.from('ünï', 'utf-8'))).toBe('ünï')
  })
})
