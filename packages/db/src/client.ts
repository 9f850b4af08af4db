import pg from 'pg'

/**
 * Connection pool configuration
 *
 * Environment variables:
 * - DATABASE_URL: Connection string (required)
 * - DB_POOL_MAX: Maximum connections (default: 10)
 * - DB_POOL_MIN: Minimum idle connections (default: 1)
 * - DB_SERVICE_NAME: Application name for pg_stat_activity (default: sanctionwatch)
 */
export function getPoolConfig(connectionString: string, env: NodeJS.ProcessEnv = process.env): pg.PoolConfig {
  return {
    connectionString,

    // === Pool Size ===
    max: parseInt(env.DB_POOL_MAX || '10', 10),
    min: parseInt(env.DB_POOL_MIN || '1', 10),

    // === Timeouts ===
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,

    // === Connection Recycling ===
    maxUses: 7500,
    maxLifetimeSeconds: 1800,

    // === Keep-Alive ===
    keepAlive: true,
    keepAliveInitialDelayMillis: 10000,

    application_name: env.DB_SERVICE_NAME || 'sanctionwatch',
  }
}

export function createPool(connectionString = process.env.DATABASE_URL): pg.Pool {
  if (!connectionString) {
    throw new Error('DATABASE_URL environment variable is not set')
  }
  return new pg.Pool(getPoolConfig(connectionString))
}
