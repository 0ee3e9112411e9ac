/**
 * winenv CLI - Snapshot Command Group
 *
 * Point-in-time backups of one or both scopes.
 */

import type { CommandContext } from '../../context.js'
import { c, print } from '../../lib/colors.js'
import * as ui from '../../ui.js'

/**
 * Router for snapshot subcommands
 */
export async function runSnapshotGroup(context: CommandContext): Promise<void> {
  const subcommand = context.command[1]

  switch (subcommand) {
    case 'create': {
      const { runSnapshotCreate } = await import('./create.js')
      await runSnapshotCreate(context)
      break
    }

    case 'list':
    case 'ls': {
      const { runSnapshotList } = await import('./list.js')
      await runSnapshotList(context)
      break
    }

    case 'restore': {
      const { runSnapshotRestore } = await import('./restore.js')
      await runSnapshotRestore(context)
      break
    }

    case 'delete':
    case 'rm': {
      const { runSnapshotDelete } = await import('./delete.js')
      await runSnapshotDelete(context)
      break
    }

    case 'prune': {
      const { runSnapshotPrune } = await import('./prune.js')
      await runSnapshotPrune(context)
      break
    }

    case 'verify': {
      const { runSnapshotVerify } = await import('./verify.js')
      await runSnapshotVerify(context)
      break
    }

    default:
      if (!subcommand) {
        ui.log(`${c.label('Usage:')} ${c.command('winenv snapshot')} ${c.subcommand('<command>')} [options]`)
        ui.log('')
        ui.log(c.header('Commands:'))
        ui.log(`  ${c.subcommand('create')}    Save a snapshot of one or both scopes`)
        ui.log(`  ${c.subcommand('list')}      List snapshots`)
        ui.log(`  ${c.subcommand('restore')}   Bring the registry back to a snapshot`)
        ui.log(`  ${c.subcommand('delete')}    Remove a snapshot`)
        ui.log(`  ${c.subcommand('prune')}     Apply the retention policy`)
        ui.log(`  ${c.subcommand('verify')}    Check a snapshot against its checksum`)
        process.exit(1)
      } else {
        print.error(`Unknown subcommand: ${c.command('snapshot')} ${c.subcommand(subcommand)}`)
        ui.log(`Run "${c.command('winenv snapshot --help')}" for usage`)
        process.exit(1)
      }
  }
}
