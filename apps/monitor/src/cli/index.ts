#!/usr/bin/env node

import '../env.js'

import { createRuntime } from '../bootstrap.js'
import { loadSettings } from '../config/settings.js'
import { runRunCommand } from './commands/run.js'
import { runSourceStatusCommand } from './commands/source-status.js'
import { runSourcesCommand } from './commands/sources.js'
import { runStatusCommand } from './commands/status.js'
import { EXIT, type CommandContext } from './context.js'
import { asNumber, asString, parseFlags } from './parse-flags.js'

function printHelp(): void {
  console.log('SanctionWatch CLI')
  console.log('')
  console.log('Commands:')
  console.log('  run --source <OFAC|UN|UK_HMT> [--force] [--dry-run]')
  console.log('  status --run-id <id>')
  console.log('  source-status --source <OFAC|UN|UK_HMT> [--hours 24]')
  console.log('  sources')
}

async function main(): Promise<void> {
  const [, , command, ...rest] = process.argv
  if (!command || command === '--help' || command === '-h') {
    printHelp()
    process.exit(EXIT.OK)
  }

  const flags = parseFlags(rest)
  if (flags.help === true || flags.h === true) {
    printHelp()
    process.exit(EXIT.OK)
  }

  const settings = loadSettings()
  const ctx: CommandContext = {
    settings,
    openRuntime: mode => createRuntime(settings, mode),
    print: line => console.log(line),
    printError: line => console.error(line),
  }

  let exitCode: number

  switch (command) {
    case 'run':
      exitCode = await runRunCommand(ctx, {
        source: asString(flags.source),
        force: flags.force === true,
        dryRun: flags['dry-run'] === true,
      })
      break
    case 'status':
      exitCode = await runStatusCommand(ctx, { runId: asString(flags['run-id']) })
      break
    case 'source-status':
      exitCode = await runSourceStatusCommand(ctx, {
        source: asString(flags.source),
        hours: asNumber(flags.hours),
      })
      break
    case 'sources':
      exitCode = await runSourcesCommand(ctx)
      break
    default:
      console.error(`Unknown command: ${command}`)
      printHelp()
      exitCode = EXIT.USAGE
  }

  process.exit(exitCode)
}

main().catch(error => {
  console.error(error instanceof Error ? error.message : String(error))
  process.exit(EXIT.FAILED)
})
