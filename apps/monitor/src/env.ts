/**
 * Environment loader - import first, before any other module.
 *
 * Loads apps/monitor/.env.local outside production. Production
 * deployments inject variables directly.
 */
import { config } from 'dotenv'
import { fileURLToPath } from 'node:url'

if (process.env.NODE_ENV !== 'production') {
  config({ path: fileURLToPath(new URL('../.env.local', import.meta.url)) })
}
