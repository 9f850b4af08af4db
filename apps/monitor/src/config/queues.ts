import { Queue, type ConnectionOptions } from 'bullmq'
import type { SanctionSource } from '@sanctionwatch/db'

export const QUEUE_NAMES = {
  MONITOR: 'sanctions-monitor',
} as const

export const JOB_NAMES = {
  RUN_SOURCE: 'RUN_SOURCE',
  SWEEP_STALE_RUNS: 'SWEEP_STALE_RUNS',
} as const

export type JobTrigger = 'SCHEDULED' | 'MANUAL'

export interface RunSourceJobData {
  kind: 'run-source'
  source: SanctionSource
  forceRefresh: boolean
  trigger: JobTrigger
}

export interface SweepJobData {
  kind: 'sweep-stale-runs'
}

export type MonitorJobData = RunSourceJobData | SweepJobData

export type MonitorQueue = Queue<MonitorJobData>

export function createMonitorQueue(connection: ConnectionOptions): MonitorQueue {
  return new Queue<MonitorJobData>(QUEUE_NAMES.MONITOR, {
    connection,
    defaultJobOptions: {
      // Runs are not retried by the queue; the next scheduled run picks up
      attempts: 1,
      removeOnComplete: { count: 500 },
      removeOnFail: { count: 1000 },
    },
  })
}
