/**
 * winenv Config Loader
 *
 * Loads <home>/config.yaml and merges it over the defaults.
 * <home> is $WINENV_HOME or ~/.winenv; $WINENV_CONFIG points at another file.
 */

import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { parse as parseYaml } from 'yaml'
import { InvalidConfigError } from './errors.js'
import { isLogLevel } from './logger.js'
import { DEFAULT_PATH_LIKE_NAMES } from './variables.js'
import { isExportFormat, type WinEnvConfig } from '../types.js'

const HOME_DIR = '.winenv'
export const CONFIG_FILE = 'config.yaml'

/**
 * Expand environment variables in a string
 * Supports: ${VAR}, ${VAR:-default}, $VAR
 */
function expandEnvVars(str: string): string {
  // Handle ${VAR:-default} syntax
  str = str.replace(/\$\{([^}:]+):-([^}]*)\}/g, (_, varName: string, defaultValue: string) => {
    return process.env[varName] || defaultValue
  })

  // Handle ${VAR} syntax
  str = str.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
    return process.env[varName] || ''
  })

  // Handle $VAR syntax (word boundary)
  str = str.replace(/\$([A-Z_][A-Z0-9_]*)/gi, (_, varName: string) => {
    return process.env[varName] || ''
  })

  return str
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/**
 * Recursively expand env vars in parsed YAML
 */
function expandEnvVarsInObject(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return expandEnvVars(obj)
  }

  if (Array.isArray(obj)) {
    return obj.map(item => expandEnvVarsInObject(item))
  }

  if (isPlainObject(obj)) {
    const result: Record<string, unknown> = {}
    for (const [key, value] of Object.entries(obj)) {
      result[key] = expandEnvVarsInObject(value)
    }
    return result
  }

  return obj
}

/**
 * Deep merge two plain objects; arrays and scalars from source replace target
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target }

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key]

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue)
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue
    }
  }

  return result
}

/**
 * Directory holding config.yaml and, by default, the backups
 */
export function getWinEnvHome(): string {
  return process.env.WINENV_HOME || path.join(os.homedir(), HOME_DIR)
}

export function getConfigPath(home: string = getWinEnvHome()): string {
  return process.env.WINENV_CONFIG || path.join(home, CONFIG_FILE)
}

/**
 * Default configuration for a given home directory
 */
export function getDefaultConfig(home: string = getWinEnvHome()): WinEnvConfig {
  return {
    version: '1',
    backup: {
      dir: path.join(home, 'backups'),
      auto: true,
      retention: {
        max_count: 50,
        max_age_days: 30,
        keep_latest: 5
      }
    },
    history: {
      capacity: 100
    },
    validation: {
      path_like_names: [...DEFAULT_PATH_LIKE_NAMES],
      check_directories: true
    },
    export: {
      default_format: 'yaml'
    },
    logging: {
      level: 'info'
    }
  }
}

// ============================================================================
// Validation of merged config
// ============================================================================

function section(raw: Record<string, unknown>, key: string, configPath?: string): Record<string, unknown> {
  const value = raw[key]
  if (!isPlainObject(value)) {
    throw new InvalidConfigError(`"${key}" must be a mapping`, configPath)
  }
  return value
}

function nullableCount(value: unknown, field: string, configPath?: string): number | null {
  if (value === null) return null
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new InvalidConfigError(`"${field}" must be a non-negative integer or null`, configPath)
  }
  return value
}

function count(value: unknown, field: string, configPath?: string, min = 0): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min) {
    throw new InvalidConfigError(`"${field}" must be an integer >= ${min}`, configPath)
  }
  return value
}

function flag(value: unknown, field: string, configPath?: string): boolean {
  if (typeof value !== 'boolean') {
    throw new InvalidConfigError(`"${field}" must be true or false`, configPath)
  }
  return value
}

function text(value: unknown, field: string, configPath?: string): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new InvalidConfigError(`"${field}" must be a non-empty string`, configPath)
  }
  return value
}

/**
 * Turn a merged raw object into a typed config, rejecting bad values
 */
export function validateConfig(raw: Record<string, unknown>, configPath?: string): WinEnvConfig {
  const backup = section(raw, 'backup', configPath)
  const retention = section(backup, 'retention', configPath)
  const history = section(raw, 'history', configPath)
  const validation = section(raw, 'validation', configPath)
  const exportSection = section(raw, 'export', configPath)
  const logging = section(raw, 'logging', configPath)

  const pathLikeNames = validation.path_like_names
  if (!Array.isArray(pathLikeNames) || !pathLikeNames.every((n): n is string => typeof n === 'string')) {
    throw new InvalidConfigError('"validation.path_like_names" must be a list of names', configPath)
  }

  const defaultFormat = exportSection.default_format
  if (!isExportFormat(defaultFormat)) {
    throw new InvalidConfigError('"export.default_format" must be one of yaml, json, csv, reg', configPath)
  }

  const level = logging.level
  if (typeof level !== 'string' || !isLogLevel(level)) {
    throw new InvalidConfigError('"logging.level" must be a pino level (fatal..trace, silent)', configPath)
  }

  return {
    version: String(raw.version ?? '1'),
    backup: {
      dir: text(backup.dir, 'backup.dir', configPath),
      auto: flag(backup.auto, 'backup.auto', configPath),
      retention: {
        max_count: nullableCount(retention.max_count, 'backup.retention.max_count', configPath),
        max_age_days: nullableCount(retention.max_age_days, 'backup.retention.max_age_days', configPath),
        keep_latest: count(retention.keep_latest, 'backup.retention.keep_latest', configPath)
      }
    },
    history: {
      capacity: count(history.capacity, 'history.capacity', configPath, 1)
    },
    validation: {
      path_like_names: pathLikeNames,
      check_directories: flag(validation.check_directories, 'validation.check_directories', configPath)
    },
    export: {
      default_format: defaultFormat
    },
    logging: {
      level
    }
  }
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Parse one config file; missing file yields an empty object
 */
function loadConfigFile(configPath: string): Record<string, unknown> {
  if (!fs.existsSync(configPath)) {
    return {}
  }

  let parsed: unknown
  try {
    parsed = parseYaml(fs.readFileSync(configPath, 'utf-8'))
  } catch (err) {
    throw new InvalidConfigError('YAML syntax error', configPath, err instanceof Error ? err : undefined)
  }

  if (parsed === null || parsed === undefined) return {}
  if (!isPlainObject(parsed)) {
    throw new InvalidConfigError('top level must be a mapping', configPath)
  }

  // Expand environment variables in all string values
  const expanded = expandEnvVarsInObject(parsed)
  return isPlainObject(expanded) ? expanded : {}
}

export interface LoadConfigOptions {
  home?: string
  configPath?: string
}

/**
 * Load configuration, falling back to defaults when no file exists
 */
export function loadConfig(options: LoadConfigOptions = {}): WinEnvConfig {
  const home = options.home ?? getWinEnvHome()
  const configPath = options.configPath ?? getConfigPath(home)

  const defaults = getDefaultConfig(home)
  const base: Record<string, unknown> = {
    version: defaults.version,
    backup: defaults.backup,
    history: defaults.history,
    validation: defaults.validation,
    export: defaults.export,
    logging: defaults.logging
  }
  const merged = deepMerge(base, loadConfigFile(configPath))

  return validateConfig(merged, configPath)
}

/**
 * Write a commented default config file; an existing file is left alone
 */
export function createDefaultConfig(home: string = getWinEnvHome()): string {
  const configPath = path.join(home, CONFIG_FILE)
  if (fs.existsSync(configPath)) {
    return configPath
  }

  fs.mkdirSync(home, { recursive: true })

  const yamlContent = `# winenv configuration
# Supports: \${VAR}, \${VAR:-default}, $VAR

version: "1"

backup:
  # Where point-in-time snapshots are stored
  dir: ${JSON.stringify(path.join(home, 'backups'))}
  # Snapshot the affected scope before every change
  auto: true
  retention:
    max_count: 50      # null = unlimited
    max_age_days: 30   # null = never expire by age
    keep_latest: 5     # always kept, regardless of age

history:
  capacity: 100        # undo steps kept in memory

validation:
  path_like_names:
    - PATH
    - PSModulePath
    - PYTHONPATH
    - CLASSPATH
  check_directories: true

export:
  default_format: yaml # yaml | json | csv | reg

logging:
  level: info          # fatal | error | warn | info | debug | trace | silent
`

  fs.writeFileSync(configPath, yamlContent)
  return configPath
}
