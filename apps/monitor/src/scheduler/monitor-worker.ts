/**
 * Monitor BullMQ worker
 *
 * Consumes RUN_SOURCE and SWEEP_STALE_RUNS jobs. A trigger for a source
 * that is already running is logged and dropped; the lock holder's run
 * covers it.
 */

import { Worker, type ConnectionOptions, type Job } from 'bullmq'
import type { ILogger } from '@sanctionwatch/logger'
import { loggers } from '../config/logger.js'
import { QUEUE_NAMES, type MonitorJobData } from '../config/queues.js'
import { ConflictError, describeError } from '../domain/errors.js'
import type { RunOrchestrator } from '../orchestrator/orchestrator.js'

export type JobOrchestrator = Pick<RunOrchestrator, 'run' | 'sweepStaleRuns'>

export type MonitorJobResult =
  | { kind: 'run'; runId: string; status: string }
  | { kind: 'rejected'; reason: string }
  | { kind: 'sweep'; failed: string[]; aborted: string[] }

export async function processMonitorJob(
  orchestrator: JobOrchestrator,
  job: Pick<Job<MonitorJobData>, 'id' | 'data'>,
  log: ILogger = loggers.worker
): Promise<MonitorJobResult> {
  const data = job.data

  if (data.kind === 'sweep-stale-runs') {
    const sweep = await orchestrator.sweepStaleRuns()
    if (sweep.failed.length > 0 || sweep.ownedByProcess.length > 0) {
      log.info('STALE_RUN_SWEEP', { event_name: 'STALE_RUN_SWEEP', jobId: job.id, ...sweep })
    }
    return { kind: 'sweep', failed: sweep.failed, aborted: sweep.ownedByProcess }
  }

  log.info('RUN_JOB_RECEIVED', {
    event_name: 'RUN_JOB_RECEIVED',
    jobId: job.id,
    source: data.source,
    trigger: data.trigger,
    forceRefresh: data.forceRefresh,
  })

  try {
    const run = await orchestrator.run(data.source, { forceRefresh: data.forceRefresh })
    return { kind: 'run', runId: run.runId, status: run.status }
  } catch (error) {
    if (error instanceof ConflictError) {
      log.warn('RUN_JOB_REJECTED', { event_name: 'RUN_JOB_REJECTED', jobId: job.id, source: data.source })
      return { kind: 'rejected', reason: describeError(error) }
    }
    throw error
  }
}

export function createMonitorWorker(
  orchestrator: JobOrchestrator,
  connection: ConnectionOptions,
  concurrency: number,
  log: ILogger = loggers.worker
): Worker<MonitorJobData, MonitorJobResult> {
  const worker = new Worker<MonitorJobData, MonitorJobResult>(
    QUEUE_NAMES.MONITOR,
    job => processMonitorJob(orchestrator, job, log),
    { connection, concurrency }
  )

  worker.on('failed', (job, error) => {
    log.error(
      'MONITOR_JOB_FAILED',
      { event_name: 'MONITOR_JOB_FAILED', jobId: job?.id, jobName: job?.name, errorMessage: error.message },
      error
    )
  })

  worker.on('error', error => {
    log.warn('MONITOR_WORKER_ERROR', { event_name: 'MONITOR_WORKER_ERROR', errorMessage: error.message })
  })

  log.info('MONITOR_WORKER_STARTED', {
    event_name: 'MONITOR_WORKER_STARTED',
    queueName: QUEUE_NAMES.MONITOR,
    concurrency,
  })

  return worker
}
