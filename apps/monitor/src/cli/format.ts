import type { ScraperRun } from '@sanctionwatch/db'
import type { SourceStatus } from '../orchestrator/orchestrator.js'

function label(name: string): string {
  return `  ${`${name}:`.padEnd(12)}`
}

function ms(value: number | null): string {
  return value === null ? '-' : `${value}ms`
}

export function formatRun(run: ScraperRun): string[] {
  const lines = [
    `Run ${run.runId}`,
    `${label('source')}${run.source}`,
    `${label('status')}${run.status}`,
    `${label('started')}${run.startedAt.toISOString()}`,
    `${label('completed')}${run.completedAt ? run.completedAt.toISOString() : '-'}`,
    `${label('entities')}${run.entitiesProcessed} processed, ${run.entitiesAdded} added, ` +
      `${run.entitiesModified} modified, ${run.entitiesRemoved} removed, ${run.recordsSkipped} skipped`,
    `${label('risk')}critical ${run.riskCounts.critical}, high ${run.riskCounts.high}, ` +
      `medium ${run.riskCounts.medium}, low ${run.riskCounts.low}`,
    `${label('timings')}download ${ms(run.timings.downloadMs)}, parse ${ms(run.timings.parseMs)}, ` +
      `diff ${ms(run.timings.diffMs)}, store ${ms(run.timings.storeMs)}`,
    `${label('retries')}${run.retryCount}`,
  ]
  if (run.errorMessage) {
    lines.push(`${label('error')}${run.errorMessage}`)
  }
  return lines
}

export function formatSourceStatus(status: SourceStatus): string[] {
  const counts = Object.entries(status.runsByStatus)
    .filter(([, count]) => count > 0)
    .map(([name, count]) => `${name} ${count}`)

  return [
    `Source ${status.source} (last ${status.windowHours}h)`,
    `${label('health')}${status.healthy ? 'healthy' : 'unhealthy'}`,
    `${label('runs')}${status.totalRuns}${counts.length > 0 ? ` (${counts.join(', ')})` : ''}`,
    `${label('last run')}${status.lastRun ? `${status.lastRun.runId} ${status.lastRun.status}` : '-'}`,
    `${label('last ok')}${status.lastSuccessfulRun ? status.lastSuccessfulRun.runId : '-'}`,
    `${label('changes')}${status.changes.added} added, ${status.changes.modified} modified, ${status.changes.removed} removed`,
    `${label('risk')}critical ${status.riskCounts.critical}, high ${status.riskCounts.high}, ` +
      `medium ${status.riskCounts.medium}, low ${status.riskCounts.low}`,
  ]
}
