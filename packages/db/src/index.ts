export * from './types.js'
export * from './errors.js'
export type { RunCommit, RunQuery, SanctionsRepository } from './repository.js'
export { PgSanctionsRepository } from './pg-repository.js'
export { InMemorySanctionsRepository } from './memory-repository.js'
export { createPool, getPoolConfig } from './client.js'
