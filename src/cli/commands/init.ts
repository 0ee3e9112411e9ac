/**
 * winenv CLI - Init Command
 *
 * Writes a commented default config.yaml under WINENV_HOME (or ~/.winenv).
 * Runs before any config is loaded.
 */

import fs from 'node:fs'
import path from 'node:path'
import { CONFIG_FILE, createDefaultConfig, getWinEnvHome } from '../../lib/config-loader.js'
import type { CliOptions } from '../context.js'
import { c, print } from '../lib/colors.js'
import { toJson } from '../lib/report.js'
import * as ui from '../ui.js'

export interface InitContext {
  options: CliOptions
  /** --config override; its directory becomes the home */
  configPath?: string
}

export async function runInit(context: InitContext): Promise<void> {
  const { options } = context
  const home = context.configPath ? path.dirname(path.resolve(context.configPath)) : getWinEnvHome()
  const target = path.join(home, CONFIG_FILE)
  const exists = fs.existsSync(target)

  if (options.dryRun) {
    ui.log(exists ? `Config already present at ${target}` : `Would create ${target}`)
    return
  }

  const written = createDefaultConfig(home)

  if (options.json) {
    ui.output(toJson({ path: written, created: !exists }))
    return
  }

  if (exists) {
    ui.log(`${c.label('Config already present:')} ${written}`)
    return
  }
  print.success(`Created ${written}`)
  ui.log(`Edit it to change backup retention, path-like names or the default export format.`)
}
