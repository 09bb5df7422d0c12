import fp from 'fastify-plugin'
import type { Pool } from 'pg'
import type { Database, DatabaseHandle } from '../db/client'
import type { DbLogSink } from '../lib/logger'

declare module 'fastify' {
  interface FastifyInstance {
    db: Database
    pg: Pool
  }
}

export interface DbPluginOptions {
  database: DatabaseHandle
  logSink?: DbLogSink
}

export default fp<DbPluginOptions>(
  async (fastify, opts) => {
    const { pool, db } = opts.database

    try {
      // Check connection
      const result = await pool.query<{ version: string; current_database: string }>(
        'SELECT version(), current_database()'
      )
      const version = result.rows[0]?.version ?? 'Unknown'
      const database = result.rows[0]?.current_database ?? 'Unknown'

      fastify.log.info({
        msg: `[DB] Connected to PostgreSQL`,
        database,
        host: pool.options.host,
        port: pool.options.port,
        version: version.split(' ').slice(0, 2).join(' '), // Just "PostgreSQL 14.x"
      })
    } catch (err) {
      const errorMessage = err instanceof Error ? err.message : 'Unknown error'
      fastify.log.error({ msg: '[DB] Connection failed', error: errorMessage })
      throw err
    }

    fastify.decorate('db', db)
    fastify.decorate('pg', pool)

    fastify.addHook('onClose', async instance => {
      await opts.logSink?.stop()
      await instance.pg.end()
      instance.log.info({ msg: '[DB] Connection closed' })
    })
  },
  { name: 'db' }
)
