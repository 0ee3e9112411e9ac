/**
 * PATH-like value helpers
 *
 * A path-like value is an ordered list of segments joined by ';'.
 * Every helper here returns a new array; segment order is never changed
 * except by an explicit move.
 */

export const PATH_SEPARATOR = ';'

/** Longest single directory path the shell resolves (MAX_PATH) */
export const MAX_SEGMENT_LENGTH = 260

/**
 * Split a value into segments exactly as authored.
 * An empty value has zero segments; empty segments in between are kept.
 */
export function splitSegments(value: string): string[] {
  if (value === '') return []
  return value.split(PATH_SEPARATOR)
}

export function joinSegments(segments: string[]): string {
  return segments.join(PATH_SEPARATOR)
}

/** True when the value ended in ';', leaving a final empty piece */
export function hasTrailingSeparator(segments: string[]): boolean {
  return segments.length > 1 && segments[segments.length - 1].trim() === ''
}

/**
 * Segments without the empty piece a trailing ';' leaves behind.
 * Indexes of the remaining segments are unchanged.
 */
export function withoutTrailingSeparator(segments: string[]): string[] {
  return hasTrailingSeparator(segments) ? segments.slice(0, -1) : [...segments]
}

/**
 * Canonical display form: trimmed, unquoted, backslashes, no trailing
 * separator (a drive root such as "C:\" keeps its backslash).
 */
export function normalizeSegment(segment: string): string {
  let result = segment.trim()

  if (result.length >= 2 && result.startsWith('"') && result.endsWith('"')) {
    result = result.slice(1, -1).trim()
  }

  result = result.replace(/\//g, '\\')

  if (result.length > 3) {
    result = result.replace(/\\+$/, '')
  }

  return result
}

/**
 * Comparison key for duplicate detection: case-insensitive, trailing
 * separators stripped.
 */
export function segmentKey(segment: string): string {
  return normalizeSegment(segment).replace(/\\+$/, '').toLowerCase()
}

/** True when the segment contains a %NAME% reference and cannot be checked on disk as-is */
export function hasVariableReference(segment: string): boolean {
  return /%[^%;]+%/.test(segment)
}

/**
 * Indexes of segments that repeat an earlier one, paired with the first occurrence
 */
export function findDuplicateSegments(segments: string[]): Array<{ index: number; duplicateOf: number }> {
  const seen = new Map<string, number>()
  const duplicates: Array<{ index: number; duplicateOf: number }> = []

  segments.forEach((segment, index) => {
    if (segment.trim() === '') return
    const key = segmentKey(segment)
    const first = seen.get(key)
    if (first === undefined) {
      seen.set(key, index)
    } else {
      duplicates.push({ index, duplicateOf: first })
    }
  })

  return duplicates
}

/**
 * Remove repeated segments, keeping the first occurrence of each
 */
export function removeDuplicateSegments(segments: string[]): string[] {
  const drop = new Set(findDuplicateSegments(segments).map(d => d.index))
  return segments.filter((_, index) => !drop.has(index))
}

export function insertSegment(segments: string[], segment: string, index: number = segments.length): string[] {
  const result = [...segments]
  result.splice(index, 0, segment)
  return result
}

export function removeSegment(segments: string[], index: number): string[] {
  return segments.filter((_, i) => i !== index)
}

/**
 * Move the segment at `from` so that it ends up at index `to`
 */
export function moveSegment(segments: string[], from: number, to: number): string[] {
  const result = [...segments]
  const [moved] = result.splice(from, 1)
  result.splice(to, 0, moved)
  return result
}

export type SegmentRemovalReason = 'empty' | 'duplicate' | 'missing'

export interface CleanSegmentsResult {
  segments: string[]
  removed: Array<{ index: number; segment: string; reason: SegmentRemovalReason }>
}

/**
 * Drop empty, duplicate and non-existent segments.
 * Segments holding a %NAME% reference are never treated as missing.
 */
export function cleanSegments(
  segments: string[],
  isDirectory: (path: string) => boolean
): CleanSegmentsResult {
  const duplicates = new Set(findDuplicateSegments(segments).map(d => d.index))
  const kept: string[] = []
  const removed: CleanSegmentsResult['removed'] = []

  segments.forEach((segment, index) => {
    if (segment.trim() === '') {
      removed.push({ index, segment, reason: 'empty' })
    } else if (duplicates.has(index)) {
      removed.push({ index, segment, reason: 'duplicate' })
    } else if (!hasVariableReference(segment) && !isDirectory(normalizeSegment(segment))) {
      removed.push({ index, segment, reason: 'missing' })
    } else {
      kept.push(segment)
    }
  })

  return { segments: kept, removed }
}
