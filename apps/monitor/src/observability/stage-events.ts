/**
 * Run stage events
 *
 * The orchestrator reports every state transition of a run through a
 * StageObserver. The logging observer writes RUN_STAGE_TRANSITION lines
 * in the same envelope as the rest of the monitor's structured logs, so
 * log shipping can derive counts and durations per stage.
 */

import type { ILogger } from '@sanctionwatch/logger'
import { loggers } from '../config/logger.js'

export const RUN_STAGES = [
  'Idle',
  'Downloading',
  'Deduplicating',
  'Parsing',
  'Diffing',
  'Classifying',
  'Persisting',
  'Notifying',
  'Completed',
  'Failed',
  'Skipped',
] as const
export type RunStage = (typeof RUN_STAGES)[number]

export type StageOutcome = 'entered' | 'succeeded' | 'failed' | 'skipped'

export interface StageEvent {
  source: string
  runId: string
  stage: RunStage
  timestampMs: number
  outcome: StageOutcome
  /** Time spent in the stage; null on entry */
  durationMs: number | null
  detail?: string
}

export interface StageObserver {
  onStage(event: StageEvent): void
}

export class LoggingStageObserver implements StageObserver {
  constructor(private readonly log: ILogger = loggers.orchestrator) {}

  onStage(event: StageEvent): void {
    const meta = { event_name: 'RUN_STAGE_TRANSITION', ...event }
    if (event.outcome === 'failed') {
      this.log.warn('RUN_STAGE_TRANSITION', meta)
    } else if (event.outcome === 'entered') {
      this.log.debug('RUN_STAGE_TRANSITION', meta)
    } else {
      this.log.info('RUN_STAGE_TRANSITION', meta)
    }
  }
}

/**
 * Keeps every event in memory, in arrival order.
 */
export class RecordingStageObserver implements StageObserver {
  readonly events: StageEvent[] = []

  onStage(event: StageEvent): void {
    this.events.push(event)
  }

  stagesFor(runId: string): Array<[RunStage, StageOutcome]> {
    return this.events.filter(event => event.runId === runId).map(event => [event.stage, event.outcome])
  }
}

/**
 * Fan one event out to several observers. An observer that throws is
 * logged and does not stop the others or the run.
 */
export function combineObservers(observers: StageObserver[], log: ILogger = loggers.orchestrator): StageObserver {
  return {
    onStage(event) {
      for (const observer of observers) {
        try {
          observer.onStage(event)
        } catch (error) {
          log.error('Stage observer failed', { stage: event.stage, runId: event.runId }, error)
        }
      }
    },
  }
}
