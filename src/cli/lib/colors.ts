/**
 * winenv CLI - Colors Utility
 *
 * Terminal colors: ANSI 256 palette, plus the help formatter for cli-args-parser.
 * Supports NO_COLOR and FORCE_COLOR.
 */

import type { Formatter } from 'cli-args-parser'

const isColorEnabled = (): boolean => {
  if (process.env.NO_COLOR !== undefined) return false
  if (process.env.FORCE_COLOR !== undefined) return true
  return process.stdout.isTTY ?? false
}

const enabled = isColorEnabled()

/**
 * Palette (ANSI 256)
 * - 37:  Teal        — primary, commands
 * - 44:  Cyan        — names, highlights
 * - 79:  Aquamarine  — values
 * - 109: Slate       — muted descriptions
 */
const ansi = {
  bold: (s: string) => enabled ? `\x1b[1m${s}\x1b[22m` : s,
  dim: (s: string) => enabled ? `\x1b[2m${s}\x1b[22m` : s,

  teal: (s: string) => enabled ? `\x1b[38;5;37m${s}\x1b[39m` : s,
  cyan: (s: string) => enabled ? `\x1b[38;5;44m${s}\x1b[39m` : s,
  aqua: (s: string) => enabled ? `\x1b[38;5;79m${s}\x1b[39m` : s,
  slate: (s: string) => enabled ? `\x1b[38;5;109m${s}\x1b[39m` : s,

  white: (s: string) => enabled ? `\x1b[97m${s}\x1b[39m` : s,
  gray: (s: string) => enabled ? `\x1b[38;5;245m${s}\x1b[39m` : s,
  lightGray: (s: string) => enabled ? `\x1b[38;5;252m${s}\x1b[39m` : s,

  red: (s: string) => enabled ? `\x1b[91m${s}\x1b[39m` : s,
  green: (s: string) => enabled ? `\x1b[92m${s}\x1b[39m` : s,
  yellow: (s: string) => enabled ? `\x1b[93m${s}\x1b[39m` : s,
}

export { ansi }

/**
 * Help/version formatter for cli-args-parser
 */
export const winenvFormatter: Formatter = {
  'section-header': s => ansi.bold(ansi.white(s)),

  'program-name': s => ansi.bold(ansi.teal(s)),
  'version': s => ansi.cyan(s),
  'description': s => ansi.lightGray(s),

  'command-name': s => ansi.teal(s),
  'command-alias': s => ansi.gray(s),
  'command-description': s => ansi.lightGray(s),

  'option-flag': s => ansi.cyan(s),
  'option-type': s => ansi.slate(s),
  'option-default': s => ansi.dim(ansi.slate(s)),
  'option-description': s => ansi.lightGray(s),

  'positional-name': s => ansi.aqua(s),

  'error-header': s => ansi.bold(ansi.red(s)),
  'error-message': s => ansi.red(s),
  'error-option': s => ansi.teal(s),
}

export const c = {
  command: (text: string) => ansi.bold(ansi.teal(text)),
  subcommand: (text: string) => ansi.teal(text),

  name: (text: string) => ansi.cyan(text),
  segment: (text: string) => ansi.aqua(text),

  // System scope is the one that needs elevation
  scopeSystem: (text: string) => ansi.bold(ansi.yellow(text)),
  scopeUser: (text: string) => ansi.green(text),

  success: (text: string) => ansi.green(text),
  error: (text: string) => ansi.red(text),
  warning: (text: string) => ansi.yellow(text),

  added: (text: string) => ansi.green(text),
  removed: (text: string) => ansi.red(text),
  modified: (text: string) => ansi.yellow(text),
  unchanged: (text: string) => ansi.gray(text),

  header: (text: string) => ansi.bold(ansi.white(text)),
  label: (text: string) => ansi.gray(text),
  highlight: (text: string) => ansi.bold(ansi.cyan(text)),
  muted: (text: string) => ansi.dim(text),
}

export function colorScope(scope: string): string {
  if (!enabled) return scope
  return scope === 'system' ? c.scopeSystem(scope) : c.scopeUser(scope)
}

export const symbols = {
  success: enabled ? ansi.green('✓') : '[OK]',
  error: enabled ? ansi.red('✗') : '[ERROR]',
  warning: enabled ? ansi.yellow('⚠') : '[WARN]',
  bullet: enabled ? ansi.slate('•') : '*',
  plus: enabled ? ansi.green('+') : '+',
  minus: enabled ? ansi.red('-') : '-',
  equal: enabled ? ansi.gray('=') : '=',
  tilde: enabled ? ansi.yellow('~') : '~',
}

export const print = {
  success: (msg: string) => console.error(`${symbols.success} ${c.success(msg)}`),
  error: (msg: string) => console.error(`${symbols.error} ${c.error(msg)}`),
  warning: (msg: string) => console.error(`${symbols.warning} ${c.warning(msg)}`),
  item: (text: string) => console.error(`  ${symbols.bullet} ${text}`),
}
