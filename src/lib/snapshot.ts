/**
 * winenv - Snapshot Storage
 *
 * Compressed (gzip) snapshots with SHA256 verification and manifest metadata.
 * Layout: <backups dir>/<id>/data.jsonl.gz + manifest.json
 *
 * Snapshot directories are created exclusively: an id that already exists
 * gets a numeric suffix instead of being written over.
 */

import fs from 'node:fs'
import path from 'node:path'
import { gzipSync, gunzipSync } from 'node:zlib'
import { createHash } from 'node:crypto'
import type { RegistryValue, Scope } from '../types.js'
import { SCOPES, isRegistryValueType, isScope } from '../types.js'
import { MalformedInputError } from './errors.js'
import { nameKey } from './variables.js'

// ============================================================================
// Types
// ============================================================================

export type SnapshotData = Partial<Record<Scope, RegistryValue[]>>

export interface SnapshotManifest {
  id: string
  /** Monotonic per backups directory; orders snapshots taken in the same millisecond */
  sequence: number
  scopes: Scope[]
  counts: Partial<Record<Scope, number>>
  varsCount: number
  timestamp: string
  checksum: string
  compression: 'gzip'
  name: string | null
  automatic: boolean
  reason: string | null
}

export interface SnapshotInfo extends SnapshotManifest {
  dirPath: string
}

export interface SnapshotCreateOptions {
  name?: string
  automatic?: boolean
  /** Operation that triggered an automatic snapshot */
  reason?: string
  now?: Date
}

export interface SnapshotVerification {
  valid: boolean
  expected: string
  actual: string
}

/**
 * Storage driver for snapshots
 */
export interface SnapshotStore {
  create(data: SnapshotData, options?: SnapshotCreateOptions): SnapshotInfo
  list(): SnapshotInfo[]
  load(id: string): SnapshotData | null
  delete(id: string): boolean
  find(idOrPartial: string): SnapshotInfo | null
  verify(id: string): SnapshotVerification | null
}

/**
 * Filesystem-based snapshot store
 */
export class FilesystemSnapshotStore implements SnapshotStore {
  constructor(private snapshotsDir: string) {}

  get dir(): string {
    return this.snapshotsDir
  }

  create(data: SnapshotData, options?: SnapshotCreateOptions): SnapshotInfo {
    return createSnapshot(this.snapshotsDir, data, options)
  }

  list(): SnapshotInfo[] {
    return listSnapshots(this.snapshotsDir)
  }

  load(id: string): SnapshotData | null {
    return loadSnapshot(this.snapshotsDir, id)
  }

  delete(id: string): boolean {
    return deleteSnapshot(this.snapshotsDir, id)
  }

  find(idOrPartial: string): SnapshotInfo | null {
    return findSnapshot(this.snapshotsDir, idOrPartial)
  }

  verify(id: string): SnapshotVerification | null {
    return verifySnapshot(this.snapshotsDir, id)
  }
}

// ============================================================================
// Helpers
// ============================================================================

/** 2026-10-18T20:18:00.123Z -> 20261018T201800123Z */
function compactTimestamp(date: Date): string {
  return date.toISOString().replace(/[-:.]/g, '')
}

function sanitizeName(name: string): string {
  return name.replace(/[<>:"/\\|?*\s]+/g, '-').replace(/^-+|-+$/g, '')
}

function coveredScopes(data: SnapshotData): Scope[] {
  return SCOPES.filter(scope => data[scope] !== undefined)
}

function serialize(data: SnapshotData): Buffer {
  const lines: string[] = []
  for (const scope of coveredScopes(data)) {
    const entries = [...(data[scope] ?? [])].sort((a, b) => nameKey(a.name).localeCompare(nameKey(b.name)))
    for (const entry of entries) {
      lines.push(JSON.stringify({ scope, name: entry.name, value: entry.value, type: entry.type }))
    }
  }
  return Buffer.from(lines.join('\n') + '\n', 'utf-8')
}

/**
 * Create the snapshot directory without ever reusing an existing one
 */
function claimDirectory(snapshotsDir: string, baseId: string): string {
  for (let attempt = 1; attempt < 1000; attempt++) {
    const id = attempt === 1 ? baseId : `${baseId}-${attempt}`
    try {
      fs.mkdirSync(path.join(snapshotsDir, id))
      return id
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'EEXIST') continue
      throw err
    }
  }
  throw new Error(`Could not allocate a snapshot directory for ${baseId}`)
}

function readManifest(manifestPath: string): SnapshotManifest | null {
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(manifestPath, 'utf-8'))
    if (parsed === null || typeof parsed !== 'object') return null
    if (!('id' in parsed) || typeof parsed.id !== 'string') return null
    if (!('sequence' in parsed) || typeof parsed.sequence !== 'number') return null
    if (!('checksum' in parsed) || typeof parsed.checksum !== 'string') return null
    if (!('timestamp' in parsed) || typeof parsed.timestamp !== 'string') return null
    if (!('scopes' in parsed) || !Array.isArray(parsed.scopes)) return null

    const scopes = parsed.scopes.filter(isScope)
    const counts: Partial<Record<Scope, number>> = {}
    if ('counts' in parsed && parsed.counts !== null && typeof parsed.counts === 'object') {
      for (const scope of scopes) {
        const value: unknown = scope in parsed.counts ? Reflect.get(parsed.counts, scope) : undefined
        if (typeof value === 'number') counts[scope] = value
      }
    }

    return {
      id: parsed.id,
      sequence: parsed.sequence,
      scopes,
      counts,
      varsCount: 'varsCount' in parsed && typeof parsed.varsCount === 'number' ? parsed.varsCount : 0,
      timestamp: parsed.timestamp,
      checksum: parsed.checksum,
      compression: 'gzip',
      name: 'name' in parsed && typeof parsed.name === 'string' ? parsed.name : null,
      automatic: 'automatic' in parsed && parsed.automatic === true,
      reason: 'reason' in parsed && typeof parsed.reason === 'string' ? parsed.reason : null
    }
  } catch {
    // Unreadable manifest: the directory is not a snapshot
    return null
  }
}

function checksumOf(buffer: Buffer): string {
  return 'sha256:' + createHash('sha256').update(buffer).digest('hex')
}

// ============================================================================
// Core Operations
// ============================================================================

/**
 * Serialize to JSONL, gzip, compute SHA256, write data then manifest.
 */
export function createSnapshot(
  snapshotsDir: string,
  data: SnapshotData,
  options: SnapshotCreateOptions = {}
): SnapshotInfo {
  fs.mkdirSync(snapshotsDir, { recursive: true })

  const now = options.now ?? new Date()
  const scopes = coveredScopes(data)
  const jsonl = serialize(data)
  const gzipped = gzipSync(jsonl)
  const checksum = checksumOf(gzipped)

  const contentHash = createHash('sha256').update(jsonl).digest('hex').slice(0, 8)
  const suffix = options.name ? `_${sanitizeName(options.name)}` : ''
  const baseId = `${compactTimestamp(now)}_${scopes.join('-') || 'empty'}_${contentHash}${suffix}`

  const sequence = listSnapshots(snapshotsDir).reduce((max, s) => Math.max(max, s.sequence), 0) + 1
  const id = claimDirectory(snapshotsDir, baseId)
  const snapshotDir = path.join(snapshotsDir, id)

  fs.writeFileSync(path.join(snapshotDir, 'data.jsonl.gz'), gzipped)

  const counts: Partial<Record<Scope, number>> = {}
  for (const scope of scopes) {
    counts[scope] = data[scope]?.length ?? 0
  }

  const manifest: SnapshotManifest = {
    id,
    sequence,
    scopes,
    counts,
    varsCount: Object.values(counts).reduce((sum, n) => sum + n, 0),
    timestamp: now.toISOString(),
    checksum,
    compression: 'gzip',
    name: options.name ?? null,
    automatic: options.automatic ?? false,
    reason: options.reason ?? null
  }
  fs.writeFileSync(
    path.join(snapshotDir, 'manifest.json'),
    JSON.stringify(manifest, null, 2) + '\n',
    'utf-8'
  )

  return { ...manifest, dirPath: snapshotDir }
}

/**
 * All snapshots, newest first
 */
export function listSnapshots(snapshotsDir: string): SnapshotInfo[] {
  if (!fs.existsSync(snapshotsDir)) {
    return []
  }

  const snapshots: SnapshotInfo[] = []

  for (const entry of fs.readdirSync(snapshotsDir, { withFileTypes: true })) {
    if (!entry.isDirectory()) continue
    const dirPath = path.join(snapshotsDir, entry.name)
    const manifestPath = path.join(dirPath, 'manifest.json')
    if (!fs.existsSync(manifestPath)) continue

    const manifest = readManifest(manifestPath)
    if (manifest) {
      snapshots.push({ ...manifest, dirPath })
    }
  }

  return snapshots.sort((a, b) => b.sequence - a.sequence || b.timestamp.localeCompare(a.timestamp))
}

/**
 * Load a snapshot: gunzip -> parse JSONL -> entries per scope
 */
export function loadSnapshot(snapshotsDir: string, id: string): SnapshotData | null {
  const snapshotDir = path.join(snapshotsDir, id)
  const manifest = readManifest(path.join(snapshotDir, 'manifest.json'))
  const dataPath = path.join(snapshotDir, 'data.jsonl.gz')
  if (!manifest || !fs.existsSync(dataPath)) {
    return null
  }

  const jsonl = gunzipSync(fs.readFileSync(dataPath)).toString('utf-8')
  const data: SnapshotData = {}
  for (const scope of manifest.scopes) {
    data[scope] = []
  }

  jsonl.split('\n').forEach((line, index) => {
    if (!line.trim()) return

    const parsed: unknown = JSON.parse(line)
    if (
      parsed === null ||
      typeof parsed !== 'object' ||
      !('scope' in parsed) || !isScope(parsed.scope) ||
      !('name' in parsed) || typeof parsed.name !== 'string' ||
      !('value' in parsed) || typeof parsed.value !== 'string' ||
      !('type' in parsed) || !isRegistryValueType(parsed.type)
    ) {
      throw new MalformedInputError('snapshot', `bad entry in ${id}`, index + 1)
    }

    const entries = data[parsed.scope] ?? []
    entries.push({ name: parsed.name, value: parsed.value, type: parsed.type })
    data[parsed.scope] = entries
  })

  return data
}

/**
 * Delete a snapshot directory by ID.
 */
export function deleteSnapshot(snapshotsDir: string, id: string): boolean {
  const snapshotDir = path.join(snapshotsDir, id)
  if (!id || !fs.existsSync(path.join(snapshotDir, 'manifest.json'))) {
    return false
  }
  fs.rmSync(snapshotDir, { recursive: true, force: true })
  return true
}

/**
 * Find a snapshot by exact or unique partial ID match.
 */
export function findSnapshot(snapshotsDir: string, idOrPartial: string): SnapshotInfo | null {
  if (!idOrPartial) return null
  const all = listSnapshots(snapshotsDir)
  const exact = all.find(s => s.id === idOrPartial)
  if (exact) return exact
  const partial = all.filter(s => s.id.includes(idOrPartial))
  if (partial.length === 1) return partial[0]
  return null
}

/**
 * Verify a snapshot's integrity by recomputing SHA256 and comparing with manifest.
 */
export function verifySnapshot(snapshotsDir: string, id: string): SnapshotVerification | null {
  const snapshotDir = path.join(snapshotsDir, id)
  const manifest = readManifest(path.join(snapshotDir, 'manifest.json'))
  const dataPath = path.join(snapshotDir, 'data.jsonl.gz')

  if (!manifest || !fs.existsSync(dataPath)) {
    return null
  }

  const actual = checksumOf(fs.readFileSync(dataPath))

  return {
    valid: manifest.checksum === actual,
    expected: manifest.checksum,
    actual
  }
}
