import { CronExpressionParser } from 'cron-parser'

/**
 * Gap between the next two firings of a cron pattern after `from`, in UTC.
 */
export function scheduleIntervalMs(expression: string, from: Date): number {
  const schedule = CronExpressionParser.parse(expression, { currentDate: from, tz: 'UTC' })
  const first = schedule.next().getTime()
  const second = schedule.next().getTime()
  return second - first
}

export function nextRunAt(expression: string, from: Date): Date {
  return CronExpressionParser.parse(expression, { currentDate: from, tz: 'UTC' }).next().toDate()
}
