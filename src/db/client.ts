import { Pool, type PoolConfig } from 'pg'
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres'
import * as schema from './schema'

export type Database = NodePgDatabase<typeof schema>

export interface DatabaseHandle {
  pool: Pool
  db: Database
}

/**
 * Pool + drizzle instance. The pool connects lazily on first query.
 */
export function createDatabase(options: PoolConfig): DatabaseHandle {
  const pool = new Pool(options)
  return { pool, db: drizzle(pool, { schema }) }
}
