/**
 * Variable name/value/segment validation
 *
 * Pure checks run identically for interactive edits and batch imports.
 * The only outside input is the directory check used for the
 * non-existent-directory warning, which callers can replace.
 */

import fs from 'node:fs'
import type { VariableKind } from '../types.js'
import {
  MAX_SEGMENT_LENGTH,
  findDuplicateSegments,
  hasVariableReference,
  normalizeSegment,
  splitSegments,
  withoutTrailingSeparator
} from './path-segments.js'

/** Largest value the registry-backed environment block accepts */
export const MAX_VALUE_LENGTH = 32767

/** Registry value names are limited to 255 characters */
export const MAX_NAME_LENGTH = 255

/** Dynamic pseudo-variables cmd.exe computes on the fly; a stored value would shadow them */
export const RESERVED_NAMES: readonly string[] = [
  'CD',
  'DATE',
  'TIME',
  'RANDOM',
  'ERRORLEVEL',
  'CMDEXTVERSION',
  'CMDCMDLINE',
  'HIGHESTNUMANODENUMBER'
]

const ILLEGAL_SEGMENT_CHARS = /[<>"|*?]/

export type ValidationIssueCode =
  | 'EMPTY_NAME'
  | 'ILLEGAL_CHARACTER'
  | 'RESERVED_NAME'
  | 'NAME_TOO_LONG'
  | 'TOO_LONG'
  | 'EMPTY_SEGMENT'
  | 'DUPLICATE_SEGMENT'
  | 'SEGMENT_TOO_LONG'
  | 'NON_EXISTENT_DIRECTORY'
  | 'DUPLICATE_RECORD'
  | 'INDEX_OUT_OF_RANGE'
  | 'NOT_PATH_LIKE'

export interface ValidationIssue {
  code: ValidationIssueCode
  level: 'error' | 'warning'
  subject: 'name' | 'value' | 'segment' | 'record'
  message: string
  /** Segment or record index the issue points at */
  index?: number
  /** For DUPLICATE_SEGMENT: index of the first occurrence */
  duplicateOf?: number
  /** Variable name, for batch validation */
  name?: string
}

export interface ValidationReport {
  valid: boolean
  errors: ValidationIssue[]
  warnings: ValidationIssue[]
}

export type DirectoryCheck = (path: string) => boolean

export const defaultDirectoryCheck: DirectoryCheck = (dirPath) => {
  try {
    return fs.statSync(dirPath).isDirectory()
  } catch {
    return false
  }
}

export interface SegmentValidationOptions {
  /** Warn about segments that do not point at an existing directory (default: true) */
  checkDirectories?: boolean
  directoryExists?: DirectoryCheck
}

function toReport(issues: ValidationIssue[]): ValidationReport {
  const errors = issues.filter(i => i.level === 'error')
  return {
    valid: errors.length === 0,
    errors,
    warnings: issues.filter(i => i.level === 'warning')
  }
}

/**
 * Merge several reports into one
 */
export function mergeReports(...reports: ValidationReport[]): ValidationReport {
  return toReport(reports.flatMap(r => [...r.errors, ...r.warnings]))
}

export function validateName(name: string): ValidationReport {
  const issues: ValidationIssue[] = []

  if (name.length === 0) {
    issues.push({ code: 'EMPTY_NAME', level: 'error', subject: 'name', message: 'Variable name is empty' })
    return toReport(issues)
  }

  if (name.includes('=')) {
    issues.push({
      code: 'ILLEGAL_CHARACTER',
      level: 'error',
      subject: 'name',
      message: `Variable name "${name}" contains "="`
    })
  }

  // eslint-disable-next-line no-control-regex
  if (/[\u0000-\u001f\u007f]/.test(name)) {
    issues.push({
      code: 'ILLEGAL_CHARACTER',
      level: 'error',
      subject: 'name',
      message: 'Variable name contains a control character'
    })
  }

  if (name.trim() !== name) {
    issues.push({
      code: 'ILLEGAL_CHARACTER',
      level: 'error',
      subject: 'name',
      message: `Variable name "${name}" has leading or trailing whitespace`
    })
  }

  if (name.length > MAX_NAME_LENGTH) {
    issues.push({
      code: 'NAME_TOO_LONG',
      level: 'error',
      subject: 'name',
      message: `Variable name is ${name.length} characters (max ${MAX_NAME_LENGTH})`
    })
  }

  if (RESERVED_NAMES.includes(name.toUpperCase())) {
    issues.push({
      code: 'RESERVED_NAME',
      level: 'error',
      subject: 'name',
      message: `"${name}" is a reserved dynamic variable`
    })
  }

  return toReport(issues)
}

export function validateValue(_kind: VariableKind, value: string): ValidationReport {
  const issues: ValidationIssue[] = []

  if (value.length > MAX_VALUE_LENGTH) {
    issues.push({
      code: 'TOO_LONG',
      level: 'error',
      subject: 'value',
      message: `Value is ${value.length} characters (max ${MAX_VALUE_LENGTH})`
    })
  }

  if (value.includes('\u0000')) {
    issues.push({
      code: 'ILLEGAL_CHARACTER',
      level: 'error',
      subject: 'value',
      message: 'Value contains a NUL character'
    })
  }

  return toReport(issues)
}

/**
 * Check the segments of a path-like value.
 *
 * Duplicates are reported at the later index. Missing directories are
 * warnings only and never make the report invalid. A trailing ';' is
 * accepted; empty segments anywhere else are errors.
 */
export function validateSegments(authored: string[], options: SegmentValidationOptions = {}): ValidationReport {
  const { checkDirectories = true, directoryExists = defaultDirectoryCheck } = options
  const segments = withoutTrailingSeparator(authored)
  const issues: ValidationIssue[] = []

  segments.forEach((segment, index) => {
    if (segment.trim() === '') {
      issues.push({
        code: 'EMPTY_SEGMENT',
        level: 'error',
        subject: 'segment',
        index,
        message: `Segment ${index} is empty`
      })
      return
    }

    const normalized = normalizeSegment(segment)

    if (normalized.length > MAX_SEGMENT_LENGTH) {
      issues.push({
        code: 'SEGMENT_TOO_LONG',
        level: 'error',
        subject: 'segment',
        index,
        message: `Segment ${index} is ${normalized.length} characters (max ${MAX_SEGMENT_LENGTH})`
      })
    }

    if (ILLEGAL_SEGMENT_CHARS.test(normalized)) {
      issues.push({
        code: 'ILLEGAL_CHARACTER',
        level: 'error',
        subject: 'segment',
        index,
        message: `Segment ${index} ("${segment}") contains an illegal path character`
      })
    }
  })

  for (const { index, duplicateOf } of findDuplicateSegments(segments)) {
    issues.push({
      code: 'DUPLICATE_SEGMENT',
      level: 'error',
      subject: 'segment',
      index,
      duplicateOf,
      message: `Segment ${index} ("${segments[index]}") duplicates segment ${duplicateOf}`
    })
  }

  if (checkDirectories) {
    segments.forEach((segment, index) => {
      if (segment.trim() === '' || hasVariableReference(segment)) return
      if (!directoryExists(normalizeSegment(segment))) {
        issues.push({
          code: 'NON_EXISTENT_DIRECTORY',
          level: 'warning',
          subject: 'segment',
          index,
          message: `Segment ${index} ("${segment}") does not exist`
        })
      }
    })
  }

  issues.sort((a, b) => (a.index ?? 0) - (b.index ?? 0))
  return toReport(issues)
}

/**
 * Name + value (+ segments for path-like kinds) in one report
 */
export function validateVariable(
  kind: VariableKind,
  name: string,
  value: string,
  options: SegmentValidationOptions = {}
): ValidationReport {
  const reports = [validateName(name), validateValue(kind, value)]
  if (kind === 'path-like') {
    reports.push(validateSegments(splitSegments(value), options))
  }
  return mergeReports(...reports)
}
