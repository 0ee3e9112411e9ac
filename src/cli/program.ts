/**
 * winenv CLI - schema and dispatch
 */

import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import type { CLISchema, CommandParseResult } from 'cli-args-parser'
import type { EnvironmentController } from '../controller.js'
import type { WinEnvConfig } from '../types.js'
import { buildOptions, type CommandContext } from './context.js'
import { c, print, winenvFormatter } from './lib/colors.js'
import * as ui from './ui.js'

import { runList } from './commands/list.js'
import { runGet } from './commands/get.js'
import { runSet } from './commands/set.js'
import { runDelete } from './commands/delete.js'
import { runSearch } from './commands/search.js'
import { runExport } from './commands/export.js'
import { runImport } from './commands/import.js'

// Hierarchical command group routers
import { runPathGroup } from './commands/path/index.js'
import { runSnapshotGroup } from './commands/snapshot/index.js'

export const VERSION = process.env.WINENV_VERSION || getPackageVersion() || '0.0.0'

function getPackageVersion(): string | undefined {
  try {
    let dir = path.dirname(fileURLToPath(import.meta.url))
    for (let i = 0; i < 5; i++) {
      const pkgPath = path.join(dir, 'package.json')
      if (fs.existsSync(pkgPath)) {
        const pkg: { version?: string } = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'))
        return pkg.version
      }
      dir = path.dirname(dir)
    }
    return undefined
  } catch {
    return undefined
  }
}

const name = { name: 'name', required: true, description: 'Variable name' }
const snapshotId = { name: 'id', required: true, description: 'Snapshot id (or a unique part of it)' }

export const cliSchema: CLISchema = {
  name: 'winenv',
  version: VERSION,
  description: 'Windows environment variable manager with backups and validation',
  autoShort: false,
  strict: true,
  formatter: winenvFormatter,
  help: {
    includeGlobalOptionsInCommands: true
  },

  // Global options available to all commands
  options: {
    help: {
      short: 'h',
      type: 'boolean',
      default: false,
      description: 'Show help'
    },
    version: {
      type: 'boolean',
      default: false,
      description: 'Show version'
    },
    scope: {
      short: 's',
      type: 'string',
      description: 'Registry scope: user or system (system needs elevation)'
    },
    config: {
      type: 'string',
      description: 'Config file path (default: ~/.winenv/config.yaml)'
    },
    verbose: {
      short: 'v',
      type: 'boolean',
      default: false,
      description: 'Enable verbose output'
    },
    json: {
      type: 'boolean',
      default: false,
      description: 'Output in JSON format'
    },
    'dry-run': {
      type: 'boolean',
      default: false,
      description: 'Show what would be done without making changes'
    }
  },
  commands: {
    init: {
      description: 'Write a default config file'
    },
    list: {
      description: 'List variables',
      aliases: ['ls']
    },
    get: {
      description: 'Print the value of a variable (user scope first, then system)',
      positional: [name]
    },
    set: {
      description: 'Create or update a variable',
      positional: [
        name,
        { name: 'value', required: true, description: 'New value' }
      ],
      options: {
        type: {
          type: 'string',
          description: 'REG_SZ or REG_EXPAND_SZ (default: inferred from %VAR% references)'
        }
      }
    },
    delete: {
      description: 'Delete a variable',
      aliases: ['rm'],
      positional: [name]
    },
    search: {
      description: 'Find variables by name or value',
      positional: [
        { name: 'query', required: true, description: 'Substring, or pattern with --regex' }
      ],
      options: {
        field: {
          type: 'string',
          description: 'name, value or both (default: both)'
        },
        regex: {
          type: 'boolean',
          default: false,
          description: 'Treat the query as a regular expression'
        },
        'case-sensitive': {
          type: 'boolean',
          default: false,
          description: 'Match case exactly'
        }
      }
    },
    path: {
      description: 'Edit the segments of a path-like variable',
      options: {
        var: {
          type: 'string',
          description: 'Variable to edit (default: PATH)'
        }
      },
      commands: {
        list: {
          description: 'Show segments with their index',
          aliases: ['ls']
        },
        add: {
          description: 'Insert a segment',
          positional: [
            { name: 'segment', required: true, description: 'Directory to add' }
          ],
          options: {
            index: {
              type: 'number',
              description: 'Position to insert at (default: end)'
            }
          }
        },
        remove: {
          description: 'Remove the segment at an index',
          aliases: ['rm'],
          positional: [
            { name: 'index', required: true, description: 'Segment index' }
          ]
        },
        move: {
          description: 'Move a segment to another index',
          aliases: ['mv'],
          positional: [
            { name: 'from', required: true, description: 'Current index' },
            { name: 'to', required: true, description: 'New index' }
          ]
        },
        dedupe: {
          description: 'Drop repeated segments, keeping the first'
        },
        clean: {
          description: 'Drop empty, repeated and missing-directory segments'
        }
      }
    },
    export: {
      description: 'Write variables as yaml, json, csv or reg',
      options: {
        format: {
          type: 'string',
          description: 'yaml, json, csv or reg (default: from --file extension, then config)'
        },
        file: {
          short: 'f',
          type: 'string',
          description: 'Output file (default: stdout)'
        }
      }
    },
    import: {
      description: 'Apply variables from a yaml, json, csv or reg file',
      positional: [
        { name: 'file', required: false, description: 'Input file (or --file)' }
      ],
      options: {
        format: {
          type: 'string',
          description: 'yaml, json, csv or reg (default: from the file extension)'
        },
        file: {
          short: 'f',
          type: 'string',
          description: 'Input file'
        },
        policy: {
          type: 'string',
          description: 'When a name already exists: fail, skip or overwrite (default: fail)'
        }
      }
    },
    snapshot: {
      description: 'Backup and restore',
      commands: {
        create: {
          description: 'Save a snapshot of one or both scopes',
          options: {
            name: {
              type: 'string',
              description: 'Label added to the snapshot id'
            }
          }
        },
        list: {
          description: 'List snapshots, newest first',
          aliases: ['ls']
        },
        restore: {
          description: 'Bring the registry back to a snapshot',
          positional: [snapshotId]
        },
        delete: {
          description: 'Remove a snapshot',
          aliases: ['rm'],
          positional: [snapshotId]
        },
        prune: {
          description: 'Apply the configured retention policy'
        },
        verify: {
          description: 'Check a snapshot against its checksum',
          positional: [snapshotId]
        }
      }
    }
  }
}

/**
 * Positional values in declaration order, then the rest
 */
export function collectArgs(result: CommandParseResult): string[] {
  const pos = result.positional as Record<string, unknown>
  const args: string[] = []
  for (const value of Object.values(pos)) {
    if (value !== undefined && value !== null) {
      args.push(String(value))
    }
  }
  args.push(...(result.rest as string[]))
  return args
}

export function buildContext(
  result: CommandParseResult,
  config: WinEnvConfig,
  controller: EnvironmentController
): CommandContext {
  const opts = result.options as Record<string, unknown>
  return {
    command: [...result.command],
    args: collectArgs(result),
    options: buildOptions(opts),
    config,
    controller
  }
}

/**
 * Dispatch on the first command word. Handlers throw; the caller prints.
 */
export async function runCommand(context: CommandContext): Promise<void> {
  const command = context.command[0]

  switch (command) {
    case 'list':
    case 'ls':
      await runList(context)
      break

    case 'get':
      await runGet(context)
      break

    case 'set':
      await runSet(context)
      break

    case 'delete':
    case 'rm':
      await runDelete(context)
      break

    case 'search':
      await runSearch(context)
      break

    case 'path':
      await runPathGroup(context)
      break

    case 'export':
      await runExport(context)
      break

    case 'import':
      await runImport(context)
      break

    case 'snapshot':
      await runSnapshotGroup(context)
      break

    default:
      print.error(`Unknown command: ${c.command(command ?? '')}`)
      ui.log(`Run "${c.command('winenv --help')}" for usage information`)
      process.exitCode = 1
  }
}
