import { EXIT, type CommandContext } from '../context.js'
import { formatRun } from '../format.js'

export async function runStatusCommand(ctx: CommandContext, args: { runId: string }): Promise<number> {
  if (!args.runId) {
    ctx.printError('--run-id is required')
    return EXIT.USAGE
  }

  const runtime = ctx.openRuntime('service')
  try {
    const run = await runtime.orchestrator.getRunStatus(args.runId)
    if (!run) {
      ctx.printError(`Run ${args.runId} not found`)
      return EXIT.FAILED
    }
    for (const line of formatRun(run)) {
      ctx.print(line)
    }
    return EXIT.OK
  } finally {
    await runtime.close()
  }
}
