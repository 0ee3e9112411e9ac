/**
 * Engine logger
 *
 * One pino root logger writing to stderr, so stdout stays reserved for
 * command output. Modules take a child scoped with a `module` field:
 *
 *     const log = scopedLogger('registry')
 */

import pino from 'pino'
import type { LogLevel } from '../types.js'

let instance: pino.Logger | null = null

function resolveLevel(level?: LogLevel): LogLevel {
  const fromEnv = process.env.WINENV_LOG_LEVEL
  if (fromEnv && isLogLevel(fromEnv)) return fromEnv
  return level ?? 'info'
}

export function isLogLevel(value: string): value is LogLevel {
  return ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'].includes(value)
}

export function initLogger(level?: LogLevel): pino.Logger {
  const resolved = resolveLevel(level)
  if (instance) {
    instance.level = resolved
    return instance
  }
  instance = pino({ name: 'winenv', level: resolved }, pino.destination(2))
  return instance
}

export function getLogger(): pino.Logger {
  if (!instance) {
    // Early imports before initLogger is called
    instance = pino({ name: 'winenv', level: resolveLevel() }, pino.destination(2))
  }
  return instance
}

/**
 * Child logger scoped to one module. Children keep the level the root had
 * when they were created, so take them after initLogger().
 */
export function scopedLogger(moduleName: string): pino.Logger {
  return getLogger().child({ module: moduleName })
}
