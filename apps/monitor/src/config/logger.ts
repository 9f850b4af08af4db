/**
 * Monitor Logger Configuration
 *
 * Pre-configured loggers for pipeline components
 */

import { createLogger } from '@sanctionwatch/logger'

export const logger = createLogger('monitor')

export const loggers = {
  config: logger.child('config'),
  sources: logger.child('sources'),
  download: logger.child('download'),
  dedupe: logger.child('dedupe'),
  changes: logger.child('changes'),
  ledger: logger.child('ledger'),
  notify: logger.child('notify'),
  orchestrator: logger.child('orchestrator'),
  scheduler: logger.child('scheduler'),
  worker: logger.child('worker'),
  cli: logger.child('cli'),
}
