import { describe, it, expect } from 'vitest'
import {
  cleanSegments,
  findDuplicateSegments,
  hasVariableReference,
  insertSegment,
  joinSegments,
  moveSegment,
  normalizeSegment,
  removeDuplicateSegments,
  removeSegment,
  segmentKey,
  splitSegments,
  hasTrailingSeparator,
  withoutTrailingSeparator
} from '../../src/lib/path-segments.js'

describe('splitSegments / joinSegments', () => {
  it('splits on ";" and keeps empty segments', () => {
    expect(splitSegments('C:\\A;;C:\\B')).toEqual(['C:\\A', '', 'C:\\B'])
  })

  it('returns no segments for an empty value', () => {
    expect(splitSegments('')).toEqual([])
  })

  it('joins back to the original value', () => {
    const value = 'C:\\A;%USERPROFILE%\\bin;C:\\B\\'
    expect(joinSegments(splitSegments(value))).toBe(value)
  })
})

describe('trailing separator', () => {
  it('detects the empty piece left by a final ";"', () => {
    expect(hasTrailingSeparator(splitSegments('C:\\A;C:\\B;'))).toBe(true)
    expect(hasTrailingSeparator(splitSegments('C:\\A;;C:\\B'))).toBe(false)
    expect(hasTrailingSeparator([''])).toBe(false)
  })

  it('drops only that final piece', () => {
    expect(withoutTrailingSeparator(['C:\\A', '', 'C:\\B', ''])).toEqual(['C:\\A', '', 'C:\\B'])
    expect(withoutTrailingSeparator(['C:\\A'])).toEqual(['C:\\A'])
  })
})

describe('normalizeSegment', () => {
  it('trims, unquotes and converts slashes', () => {
    expect(normalizeSegment('  "C:/Program Files/Git/"  ')).toBe('C:\\Program Files\\Git')
  })

  it('keeps the backslash of a drive root', () => {
    expect(normalizeSegment('C:\\')).toBe('C:\\')
  })
})

describe('segmentKey', () => {
  it('ignores case and trailing separators', () => {
    expect(segmentKey('C:\\Tools\\')).toBe(segmentKey('c:\\TOOLS'))
    expect(segmentKey('C:\\')).toBe('c:')
  })
})

describe('hasVariableReference', () => {
  it('detects %NAME% references', () => {
    expect(hasVariableReference('%JAVA_HOME%\\bin')).toBe(true)
    expect(hasVariableReference('C:\\100%')).toBe(false)
  })
})

describe('findDuplicateSegments / removeDuplicateSegments', () => {
  it('pairs each repeat with its first occurrence', () => {
    expect(findDuplicateSegments(['a', 'b', 'A', 'b\\', 'c'])).toEqual([
      { index: 2, duplicateOf: 0 },
      { index: 3, duplicateOf: 1 }
    ])
  })

  it('ignores empty segments', () => {
    expect(findDuplicateSegments(['', ' ', 'a'])).toEqual([])
  })

  it('keeps the first occurrence and the order', () => {
    expect(removeDuplicateSegments(['C:\\A', 'C:\\B', 'c:\\a', 'C:\\C'])).toEqual(['C:\\A', 'C:\\B', 'C:\\C'])
  })
})

describe('insert / remove / move', () => {
  const segments = ['a', 'b', 'c']

  it('inserts at an index or at the end', () => {
    expect(insertSegment(segments, 'x', 1)).toEqual(['a', 'x', 'b', 'c'])
    expect(insertSegment(segments, 'x')).toEqual(['a', 'b', 'c', 'x'])
    expect(segments).toEqual(['a', 'b', 'c'])
  })

  it('removes by index', () => {
    expect(removeSegment(segments, 1)).toEqual(['a', 'c'])
  })

  it('moves so the segment lands at the target index', () => {
    expect(moveSegment(segments, 0, 2)).toEqual(['b', 'c', 'a'])
    expect(moveSegment(segments, 2, 0)).toEqual(['c', 'a', 'b'])
  })
})

describe('cleanSegments', () => {
  it('removes empty, duplicate and missing segments with reasons', () => {
    const exists = (p: string) => p !== 'C:\\Gone'
    const result = cleanSegments(['C:\\A', '', 'C:\\Gone', 'c:\\a', '%WINDIR%'], exists)
    expect(result.segments).toEqual(['C:\\A', '%WINDIR%'])
    expect(result.removed).toEqual([
      { index: 1, segment: '', reason: 'empty' },
      { index: 2, segment: 'C:\\Gone', reason: 'missing' },
      { index: 3, segment: 'c:\\a', reason: 'duplicate' }
    ])
  })
})
