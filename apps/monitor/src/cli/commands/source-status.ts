import { isSanctionSource, SANCTION_SOURCES } from '@sanctionwatch/db'
import { EXIT, type CommandContext } from '../context.js'
import { formatSourceStatus } from '../format.js'

export async function runSourceStatusCommand(
  ctx: CommandContext,
  args: { source: string; hours: number | undefined }
): Promise<number> {
  const source = args.source.toUpperCase()
  if (!isSanctionSource(source)) {
    ctx.printError(`--source must be one of ${SANCTION_SOURCES.join(', ')}`)
    return EXIT.USAGE
  }
  const hours = args.hours ?? 24
  if (hours <= 0) {
    ctx.printError('--hours must be a positive number')
    return EXIT.USAGE
  }

  const runtime = ctx.openRuntime('service')
  try {
    const status = await runtime.orchestrator.getSourceStatus(source, hours)
    for (const line of formatSourceStatus(status)) {
      ctx.print(line)
    }
    return status.healthy ? EXIT.OK : EXIT.FAILED
  } finally {
    await runtime.close()
  }
}
