import { describe, it, expect } from 'vitest'
import {
  MAX_NAME_LENGTH,
  MAX_VALUE_LENGTH,
  mergeReports,
  validateName,
  validateSegments,
  validateValue,
  validateVariable
} from '../../src/lib/validation.js'

const allDirs = () => true
const noDirs = () => false

describe('validateName', () => {
  it('accepts ordinary names', () => {
    expect(validateName('JAVA_HOME').valid).toBe(true)
    expect(validateName('Path').valid).toBe(true)
  })

  it('rejects an empty name', () => {
    const report = validateName('')
    expect(report.valid).toBe(false)
    expect(report.errors.map(e => e.code)).toEqual(['EMPTY_NAME'])
  })

  it('rejects "=" and control characters', () => {
    expect(validateName('A=B').errors[0].code).toBe('ILLEGAL_CHARACTER')
    expect(validateName('A\tB').errors[0].code).toBe('ILLEGAL_CHARACTER')
  })

  it('rejects surrounding whitespace', () => {
    expect(validateName(' FOO').errors[0].message).toBe('Variable name " FOO" has leading or trailing whitespace')
  })

  it('rejects overly long names', () => {
    expect(validateName('A'.repeat(MAX_NAME_LENGTH + 1)).errors[0].code).toBe('NAME_TOO_LONG')
    expect(validateName('A'.repeat(MAX_NAME_LENGTH)).valid).toBe(true)
  })

  it('rejects reserved dynamic names case-insensitively', () => {
    expect(validateName('errorlevel').errors[0].code).toBe('RESERVED_NAME')
  })
})

describe('validateValue', () => {
  it('accepts an empty value', () => {
    expect(validateValue('plain', '').valid).toBe(true)
  })

  it('rejects values over the limit', () => {
    expect(validateValue('plain', 'x'.repeat(MAX_VALUE_LENGTH + 1)).errors[0].code).toBe('TOO_LONG')
    expect(validateValue('plain', 'x'.repeat(MAX_VALUE_LENGTH)).valid).toBe(true)
  })

  it('rejects NUL characters', () => {
    expect(validateValue('plain', 'a\u0000b').errors[0].code).toBe('ILLEGAL_CHARACTER')
  })
})

describe('validateSegments', () => {
  it('reports one duplicate at the later index', () => {
    const report = validateSegments(['C:\\A', 'C:\\B', 'C:\\A'], { directoryExists: allDirs })
    expect(report.valid).toBe(false)
    expect(report.errors).toHaveLength(1)
    expect(report.errors[0]).toMatchObject({ code: 'DUPLICATE_SEGMENT', index: 2, duplicateOf: 0 })
  })

  it('treats case and trailing separators as the same directory', () => {
    const report = validateSegments(['C:\\Tools\\', 'c:\\tools'], { directoryExists: allDirs })
    expect(report.errors).toHaveLength(1)
    expect(report.errors[0].index).toBe(1)
  })

  it('rejects empty segments', () => {
    const report = validateSegments(['C:\\A', '', 'C:\\B'], { directoryExists: allDirs })
    expect(report.errors).toHaveLength(1)
    expect(report.errors[0]).toMatchObject({ code: 'EMPTY_SEGMENT', index: 1 })
  })

  it('accepts the empty piece a trailing ";" leaves', () => {
    const report = validateSegments(['C:\\A', 'C:\\B', ''], { directoryExists: allDirs })
    expect(report.valid).toBe(true)
    expect(report.errors).toEqual([])
  })

  it('still rejects a value made only of separators', () => {
    const report = validateSegments([' ', ''], { directoryExists: allDirs })
    expect(report.errors.map(e => [e.code, e.index])).toEqual([['EMPTY_SEGMENT', 0]])
  })

  it('rejects illegal path characters', () => {
    expect(validateSegments(['C:\\a|b'], { directoryExists: allDirs }).errors[0].code).toBe('ILLEGAL_CHARACTER')
  })

  it('warns about missing directories without failing', () => {
    const report = validateSegments(['C:\\Missing'], { directoryExists: noDirs })
    expect(report.valid).toBe(true)
    expect(report.warnings).toHaveLength(1)
    expect(report.warnings[0]).toMatchObject({ code: 'NON_EXISTENT_DIRECTORY', index: 0, level: 'warning' })
  })

  it('never checks segments with %VAR% references', () => {
    const checked: string[] = []
    const report = validateSegments(['%SystemRoot%\\system32', 'C:\\X'], {
      directoryExists: p => { checked.push(p); return true }
    })
    expect(report.warnings).toHaveLength(0)
    expect(checked).toEqual(['C:\\X'])
  })

  it('skips the directory check when disabled', () => {
    expect(validateSegments(['C:\\Missing'], { checkDirectories: false, directoryExists: noDirs }).warnings).toHaveLength(0)
  })

  it('orders issues by index', () => {
    const report = validateSegments(['C:\\B', 'C:\\A', '', 'C:\\a'], { directoryExists: noDirs })
    const indexes = [...report.errors, ...report.warnings].map(i => i.index)
    expect(report.errors.map(e => e.index)).toEqual([2, 3])
    expect(indexes).toContain(0)
  })
})

describe('validateVariable', () => {
  it('checks segments only for path-like values', () => {
    expect(validateVariable('plain', 'FOO', 'a;a', { directoryExists: allDirs }).valid).toBe(true)
    expect(validateVariable('path-like', 'PATH', 'a;a', { directoryExists: allDirs }).valid).toBe(false)
  })

  it('combines name and value issues', () => {
    const report = validateVariable('plain', '', 'a\u0000')
    expect(report.errors.map(e => e.code)).toEqual(['EMPTY_NAME', 'ILLEGAL_CHARACTER'])
  })
})

describe('mergeReports', () => {
  it('is valid only when no report has errors', () => {
    const ok = validateName('A')
    const bad = validateName('')
    expect(mergeReports(ok, ok).valid).toBe(true)
    expect(mergeReports(ok, bad).valid).toBe(false)
  })
})
