#!/usr/bin/env node
/**
 * winenv CLI
 *
 * Windows environment variable manager
 */

import { createCLI } from 'cli-args-parser'
import { EnvironmentController } from '../controller.js'
import { loadConfig } from '../lib/config-loader.js'
import { formatErrorForCli, isWinEnvError } from '../lib/errors.js'
import { buildOptions } from './context.js'
import { runInit } from './commands/init.js'
import { c, print } from './lib/colors.js'
import { VERSION, buildContext, cliSchema, runCommand } from './program.js'
import * as ui from './ui.js'

// Create CLI instance
const cli = createCLI(cliSchema)

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const result = cli.parse(process.argv.slice(2))
  const opts = result.options as Record<string, unknown>

  // Handle help first (before error check, so `get --help` works)
  if (opts.help || result.command.length === 0) {
    ui.output(cli.help(result.command))
    return
  }

  if (opts.version) {
    ui.output(`winenv v${VERSION}`)
    return
  }

  // Handle errors from parser (after help/version checks)
  if (result.errors.length > 0) {
    for (const error of result.errors) {
      print.error(error)
    }
    process.exit(1)
  }

  const verbose = opts.verbose === true
  const configPath = typeof opts.config === 'string' ? opts.config : undefined

  try {
    if (result.command[0] === 'init') {
      await runInit({ options: buildOptions(opts), configPath })
      return
    }

    const config = loadConfig({ configPath })
    if (verbose && config.logging.level === 'info') {
      config.logging.level = 'debug'
    }
    const controller = new EnvironmentController({ config })
    ui.verbose(`backend: ${controller.backendName}`, verbose)

    await runCommand(buildContext(result, config, controller))
  } catch (err) {
    if (isWinEnvError(err)) {
      print.error(err.message)
      if (err.suggestion) {
        ui.log(`  ${c.muted('Suggestion:')} ${err.suggestion}`)
      }
      if (verbose && err.context) {
        ui.log(`  ${c.muted('Context:')} ${JSON.stringify(err.context)}`)
      }
    } else if (verbose) {
      ui.log(String(err))
    } else {
      print.error(err instanceof Error ? err.message : String(err))
    }
    process.exit(1)
  }
}

// Run
main().catch((err: unknown) => {
  const errorMessage = isWinEnvError(err)
    ? formatErrorForCli(err)
    : `Fatal error: ${err instanceof Error ? err.message : String(err)}`
  print.error(errorMessage)
  process.exit(1)
})
