/**
 * winenv import --file PATH [--format F] [--policy fail|skip|overwrite] [--dry-run]
 *
 * The whole file is validated before anything is written. --dry-run
 * prints the plan instead of applying it.
 */

import fs from 'node:fs'
import { unwrap, type ImportPlan } from '../../controller.js'
import { detectFormat } from '../../lib/codecs/index.js'
import { isConflictPolicy, type ConflictPolicy, type ImportReport } from '../../types.js'
import { InvalidOptionError, type CommandContext } from '../context.js'
import { c, print, symbols } from '../lib/colors.js'
import { printWarnings, toJson } from '../lib/report.js'
import * as ui from '../ui.js'

function resolvePolicy(value: string | undefined): ConflictPolicy {
  const policy = value?.toLowerCase() ?? 'fail'
  if (!isConflictPolicy(policy)) {
    throw new InvalidOptionError(`Invalid policy: ${value}`, 'Use --policy fail, skip or overwrite')
  }
  return policy
}

function printPlan(plan: ImportPlan): void {
  for (const name of plan.applied) ui.log(`  ${symbols.plus} ${c.added(name)}`)
  for (const name of plan.deleted) ui.log(`  ${symbols.minus} ${c.removed(name)}`)
  for (const name of plan.skipped) ui.log(`  ${symbols.tilde} ${c.modified(name)} ${c.muted('(skipped, exists)')}`)
  for (const name of plan.unchanged) ui.log(`  ${symbols.equal} ${c.unchanged(name)}`)
  for (const name of plan.conflicts) ui.log(`  ${symbols.error} ${c.error(name)} ${c.muted('(conflict)')}`)
  for (const error of plan.errors) print.error(error.message)
  printWarnings(plan.warnings)
}

function summary(report: Pick<ImportReport, 'applied' | 'deleted' | 'skipped' | 'unchanged'>): string {
  return `${report.applied.length} set, ${report.deleted.length} deleted, ` +
    `${report.skipped.length} skipped, ${report.unchanged.length} unchanged`
}

export async function runImport(context: CommandContext): Promise<void> {
  const { controller, options } = context
  const file = options.file ?? context.args[0]
  if (!file) {
    throw new InvalidOptionError('Missing input file', 'Use --file <path>')
  }

  const format = options.format ?? detectFormat(file)
  if (!format) {
    throw new InvalidOptionError(`Cannot tell the format of ${file}`, 'Use --format yaml, json, csv or reg')
  }
  const policy = resolvePolicy(options.policy)

  const batch = unwrap(await controller.decode(format, fs.readFileSync(file)))

  if (options.dryRun) {
    const plan = unwrap(await controller.previewImport(batch, policy))
    if (options.json) {
      ui.output(toJson(plan))
      return
    }
    printPlan(plan)
    ui.log('')
    ui.log(`${c.label('Dry run:')} ${summary(plan)}${plan.valid ? '' : c.error(' (would be rejected)')}`)
    return
  }

  const report = unwrap(await controller.bulkImport(batch, policy))
  if (options.json) {
    ui.output(toJson(report))
    return
  }
  print.success(`Imported ${file}: ${summary(report)}`)
  if (report.snapshotId) {
    ui.log(`  ${c.label('Backup:')} ${c.muted(report.snapshotId)}`)
  }
}
