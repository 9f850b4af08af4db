import { nextRunAt } from '../../scheduler/cron.js'
import { createDefaultRegistry } from '../../sources/adapters/index.js'
import { EXIT, type CommandContext } from '../context.js'

export async function runSourcesCommand(ctx: CommandContext): Promise<number> {
  const now = ctx.now?.() ?? new Date()

  for (const adapter of createDefaultRegistry().list()) {
    const override = ctx.settings.sources[adapter.id]
    const schedule = override.schedule ?? adapter.metadata.defaultSchedule
    ctx.print(`${adapter.id}  ${adapter.metadata.displayName}`)
    ctx.print(`  authority:  ${adapter.metadata.authority} (${adapter.metadata.region})`)
    ctx.print(`  format:     ${adapter.metadata.format}, ~${adapter.metadata.expectedEntityCount} entities`)
    ctx.print(`  url:        ${override.url ?? adapter.metadata.defaultUrl}`)
    ctx.print(`  schedule:   ${schedule} (next ${nextRunAt(schedule, now).toISOString()})`)
  }

  return EXIT.OK
}
