import type { RuntimeMode } from '../bootstrap.js'
import type { MonitorSettings } from '../config/settings.js'
import type { RunOrchestrator } from '../orchestrator/orchestrator.js'
import type { SourceRegistry } from '../sources/registry.js'

export const EXIT = {
  OK: 0,
  FAILED: 1,
  USAGE: 2,
  CONFLICT: 3,
} as const

export interface CommandRuntime {
  registry: SourceRegistry
  orchestrator: Pick<RunOrchestrator, 'run' | 'getRunStatus' | 'getSourceStatus'>
  close(): Promise<void>
}

export interface CommandContext {
  settings: MonitorSettings
  openRuntime(mode: RuntimeMode): CommandRuntime
  print(line: string): void
  printError(line: string): void
  now?: () => Date
}
