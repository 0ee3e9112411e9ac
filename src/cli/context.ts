/**
 * winenv CLI - command context
 *
 * Parsed options are narrowed here once, so command handlers work with
 * typed values only.
 */

import type { EnvironmentController } from '../controller.js'
import type { Scope, WinEnvConfig } from '../types.js'
import { isScope } from '../types.js'
import { WinEnvError } from '../lib/errors.js'

export interface CliOptions {
  scope?: Scope
  json: boolean
  verbose: boolean
  dryRun: boolean
  format?: string
  file?: string
  policy?: string
  name?: string
  type?: string
  /** Path-like variable edited by `path` subcommands */
  variable: string
  index?: number
  field?: string
  regex: boolean
  caseSensitive: boolean
}

export interface CommandContext {
  /** e.g. ['path', 'add'] */
  command: string[]
  /** Positional values in declaration order */
  args: string[]
  options: CliOptions
  config: WinEnvConfig
  controller: EnvironmentController
}

export class InvalidOptionError extends WinEnvError {
  constructor(message: string, suggestion?: string) {
    super(message, 'INVALID_OPTION', { suggestion })
    this.name = 'InvalidOptionError'
  }
}

function stringOption(raw: Record<string, unknown>, key: string): string | undefined {
  const value = raw[key]
  if (value === undefined || value === null || value === '') return undefined
  return String(value)
}

function booleanOption(raw: Record<string, unknown>, key: string): boolean {
  return raw[key] === true
}

export function parseIndex(value: string | number | undefined, label: string): number | undefined {
  if (value === undefined) return undefined
  const parsed = typeof value === 'number' ? value : Number(value)
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidOptionError(`${label} must be a non-negative integer, got "${value}"`)
  }
  return parsed
}

/**
 * Narrow the parser's option bag into CliOptions
 */
export function buildOptions(raw: Record<string, unknown>): CliOptions {
  const scope = stringOption(raw, 'scope')?.toLowerCase()
  if (scope !== undefined && !isScope(scope)) {
    throw new InvalidOptionError(`Invalid scope: ${scope}`, 'Use --scope system or --scope user')
  }

  const index = raw.index
  return {
    scope,
    json: booleanOption(raw, 'json'),
    verbose: booleanOption(raw, 'verbose'),
    dryRun: booleanOption(raw, 'dry-run'),
    format: stringOption(raw, 'format'),
    file: stringOption(raw, 'file'),
    policy: stringOption(raw, 'policy'),
    name: stringOption(raw, 'name'),
    type: stringOption(raw, 'type'),
    variable: stringOption(raw, 'var') ?? 'PATH',
    index: typeof index === 'number' || typeof index === 'string' ? parseIndex(index, '--index') : undefined,
    field: stringOption(raw, 'field'),
    regex: booleanOption(raw, 'regex'),
    caseSensitive: booleanOption(raw, 'case-sensitive')
  }
}

/**
 * Positional argument `index`, or a usage error naming `label`
 */
export function requireArg(context: CommandContext, index: number, label: string): string {
  const value = context.args[index]
  if (value === undefined) {
    throw new InvalidOptionError(`Missing argument: <${label}>`, `Run "winenv ${context.command.join(' ')} --help" for usage`)
  }
  return value
}
