import { isSanctionSource, SANCTION_SOURCES } from '@sanctionwatch/db'
import { ConflictError, describeError } from '../../domain/errors.js'
import { EXIT, type CommandContext } from '../context.js'
import { formatRun } from '../format.js'

interface RunCommandArgs {
  source: string
  force: boolean
  dryRun: boolean
}

export async function runRunCommand(ctx: CommandContext, args: RunCommandArgs): Promise<number> {
  const source = args.source.toUpperCase()
  if (!isSanctionSource(source)) {
    ctx.printError(`--source must be one of ${SANCTION_SOURCES.join(', ')}`)
    return EXIT.USAGE
  }

  const runtime = ctx.openRuntime(args.dryRun ? 'dry-run' : 'service')
  try {
    const run = await runtime.orchestrator.run(source, { forceRefresh: args.force })
    for (const line of formatRun(run)) {
      ctx.print(line)
    }
    return run.status === 'Failed' ? EXIT.FAILED : EXIT.OK
  } catch (error) {
    if (error instanceof ConflictError) {
      ctx.printError(`${source} is already running`)
      return EXIT.CONFLICT
    }
    ctx.printError(describeError(error))
    return EXIT.FAILED
  } finally {
    await runtime.close()
  }
}
