/**
 * Native registry backend
 *
 * Reads go through PowerShell (UTF-8 JSON, values left unexpanded); writes
 * and deletes through reg.exe. The change broadcast is
 * WM_SETTINGCHANGE("Environment") sent via SendMessageTimeout.
 */

import { execFileSync } from 'node:child_process'
import type { RegistryValue, Scope } from '../types.js'
import { REGISTRY_KEYS } from '../types.js'
import type { RegistryBackend } from './registry.js'
import { AccessDeniedError, RegistryError, RegistryOperationError, VariableNotFoundError } from './errors.js'

const DEFAULT_TIMEOUT_MS = 10000

/** GetValueKind() names for the two types an environment key holds */
const VALUE_KINDS: Record<string, RegistryValue['type']> = {
  String: 'REG_SZ',
  ExpandString: 'REG_EXPAND_SZ'
}

/**
 * Run a PowerShell script passed as Base64 UTF-16LE (-EncodedCommand)
 */
export function runPowerShell(script: string, timeoutMs = DEFAULT_TIMEOUT_MS): string {
  const encoded = Buffer.from(script, 'utf16le').toString('base64')
  return execFileSync(
    'powershell.exe',
    ['-NoProfile', '-NonInteractive', '-ExecutionPolicy', 'Bypass', '-EncodedCommand', encoded],
    { encoding: 'utf-8', timeout: timeoutMs, windowsHide: true, stdio: ['pipe', 'pipe', 'pipe'] }
  ).trim()
}

function runReg(args: string[], timeoutMs = DEFAULT_TIMEOUT_MS): string {
  return execFileSync('reg', args, {
    encoding: 'utf-8',
    timeout: timeoutMs,
    windowsHide: true,
    stdio: ['pipe', 'pipe', 'pipe']
  })
}

/**
 * Best human-readable detail from a failed child process
 */
export function errorDetail(err: unknown): string {
  if (err instanceof Error) {
    const stderr = 'stderr' in err && err.stderr ? String(err.stderr).trim() : ''
    return stderr || err.message
  }
  return String(err)
}

/**
 * Map a reg.exe failure onto the error taxonomy
 */
export function mapRegError(err: unknown, operation: string, scope: Scope, name?: string): Error {
  const detail = errorDetail(err)
  const cause = err instanceof Error ? err : undefined

  if (/access is denied/i.test(detail)) {
    return new AccessDeniedError(scope, name, cause)
  }
  if (name && /unable to find/i.test(detail)) {
    return new VariableNotFoundError(name, scope)
  }
  return new RegistryOperationError(operation, scope, detail, name, cause)
}

/** PowerShell literal: single quotes doubled */
function psQuote(value: string): string {
  return `'${value.replace(/'/g, "''")}'`
}

export function buildListScript(scope: Scope): string {
  return `
[Console]::OutputEncoding = [System.Text.Encoding]::UTF8
$key = Get-Item -LiteralPath ${psQuote(`Registry::${REGISTRY_KEYS[scope]}`)} -ErrorAction Stop
$values = @(foreach ($name in $key.GetValueNames()) {
  if ($name -eq '') { continue }
  [PSCustomObject]@{
    name  = $name
    value = [string]$key.GetValue($name, '', 'DoNotExpandEnvironmentNames')
    kind  = $key.GetValueKind($name).ToString()
  }
})
ConvertTo-Json -InputObject $values -Compress -Depth 3
`
}

/**
 * Parse the JSON emitted by the list script.
 * Only string and expandable-string values are environment variables;
 * anything else is skipped.
 */
export function parseValueList(json: string): RegistryValue[] {
  if (json.trim() === '') return []

  const parsed: unknown = JSON.parse(json)
  const items: unknown[] = Array.isArray(parsed) ? parsed : [parsed]
  const result: RegistryValue[] = []

  for (const item of items) {
    if (item === null || typeof item !== 'object') continue
    if (!('name' in item) || !('value' in item) || !('kind' in item)) continue

    const { name, value, kind } = item
    if (typeof name !== 'string' || typeof kind !== 'string') continue

    const type = VALUE_KINDS[kind]
    if (!type) continue

    result.push({ name, value: typeof value === 'string' ? value : '', type })
  }

  return result
}

export const ELEVATION_SCRIPT = `
$identity = [Security.Principal.WindowsIdentity]::GetCurrent()
$principal = New-Object Security.Principal.WindowsPrincipal($identity)
$principal.IsInRole([Security.Principal.WindowsBuiltInRole]::Administrator)
`

// HWND_BROADCAST=0xffff, WM_SETTINGCHANGE=0x1A, SMTO_ABORTIFHUNG=2
export const BROADCAST_SCRIPT = `
Add-Type -Namespace WinEnv -Name NativeMethods -MemberDefinition @'
[DllImport("user32.dll", SetLastError = true, CharSet = CharSet.Unicode)]
public static extern IntPtr SendMessageTimeout(IntPtr hWnd, uint Msg, UIntPtr wParam, string lParam, uint fuFlags, uint uTimeout, out UIntPtr lpdwResult);
'@
$result = [UIntPtr]::Zero
[void][WinEnv.NativeMethods]::SendMessageTimeout([IntPtr]0xffff, 0x1A, [UIntPtr]::Zero, 'Environment', 2, 5000, [ref]$result)
`

export interface RegExeBackendOptions {
  timeoutMs?: number
}

export class RegExeBackend implements RegistryBackend {
  readonly name = 'reg.exe'
  private timeoutMs: number

  constructor(options: RegExeBackendOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
  }

  list(scope: Scope): RegistryValue[] {
    let output: string
    try {
      output = runPowerShell(buildListScript(scope), this.timeoutMs)
    } catch (err) {
      throw mapRegError(err, 'read', scope)
    }

    try {
      return parseValueList(output)
    } catch (err) {
      throw new RegistryOperationError(
        'read',
        scope,
        'unexpected output from PowerShell',
        undefined,
        err instanceof Error ? err : undefined
      )
    }
  }

  set(scope: Scope, entry: RegistryValue): void {
    try {
      runReg(['add', REGISTRY_KEYS[scope], '/v', entry.name, '/t', entry.type, '/d', entry.value, '/f'], this.timeoutMs)
    } catch (err) {
      throw mapRegError(err, 'write', scope, entry.name)
    }
  }

  remove(scope: Scope, name: string): boolean {
    try {
      runReg(['delete', REGISTRY_KEYS[scope], '/v', name, '/f'], this.timeoutMs)
      return true
    } catch (err) {
      const mapped = mapRegError(err, 'delete', scope, name)
      if (mapped instanceof VariableNotFoundError) {
        return false
      }
      throw mapped
    }
  }

  isElevated(): boolean {
    try {
      return runPowerShell(ELEVATION_SCRIPT, this.timeoutMs).toLowerCase() === 'true'
    } catch {
      return false
    }
  }

  broadcast(): void {
    try {
      runPowerShell(BROADCAST_SCRIPT, this.timeoutMs)
    } catch (err) {
      throw new RegistryError(`Change broadcast failed: ${errorDetail(err)}`, 'BROADCAST_FAILED', {
        cause: err instanceof Error ? err : undefined
      })
    }
  }
}
