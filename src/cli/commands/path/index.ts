/**
 * winenv CLI - Path Command Group
 *
 * Segment editing for path-like variables (PATH by default, --var to pick
 * another).
 */

import type { CommandContext } from '../../context.js'
import { c, print } from '../../lib/colors.js'
import * as ui from '../../ui.js'

/**
 * Router for path subcommands
 */
export async function runPathGroup(context: CommandContext): Promise<void> {
  const subcommand = context.command[1]

  switch (subcommand) {
    case 'list':
    case 'ls': {
      const { runPathList } = await import('./list.js')
      await runPathList(context)
      break
    }

    case 'add': {
      const { runPathAdd } = await import('./add.js')
      await runPathAdd(context)
      break
    }

    case 'remove':
    case 'rm': {
      const { runPathRemove } = await import('./remove.js')
      await runPathRemove(context)
      break
    }

    case 'move':
    case 'mv': {
      const { runPathMove } = await import('./move.js')
      await runPathMove(context)
      break
    }

    case 'dedupe': {
      const { runPathDedupe } = await import('./dedupe.js')
      await runPathDedupe(context)
      break
    }

    case 'clean': {
      const { runPathClean } = await import('./clean.js')
      await runPathClean(context)
      break
    }

    default:
      if (!subcommand) {
        ui.log(`${c.label('Usage:')} ${c.command('winenv path')} ${c.subcommand('<command>')} [--var NAME] [--scope user|system]`)
        ui.log('')
        ui.log(c.header('Commands:'))
        ui.log(`  ${c.subcommand('list')}      Show segments with their index`)
        ui.log(`  ${c.subcommand('add')}       Insert a segment (at --index, or at the end)`)
        ui.log(`  ${c.subcommand('remove')}    Remove the segment at an index`)
        ui.log(`  ${c.subcommand('move')}      Move a segment to another index`)
        ui.log(`  ${c.subcommand('dedupe')}    Drop repeated segments`)
        ui.log(`  ${c.subcommand('clean')}     Drop empty, repeated and missing segments`)
        process.exit(1)
      } else {
        print.error(`Unknown subcommand: ${c.command('path')} ${c.subcommand(subcommand)}`)
        ui.log(`Run "${c.command('winenv path --help')}" for usage`)
        process.exit(1)
      }
  }
}
