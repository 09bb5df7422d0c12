import { Pool } from 'pg'
import { readdir, readFile } from 'fs/promises'
import { join } from 'path'
import pino from 'pino'
import { config } from '../config/env'

const log = pino({ level: config.log.level })

async function runMigrations() {
  if (!config.db.enabled) {
    log.warn({ msg: '[DB] DB_ENABLED is false, nothing to migrate' })
    return
  }

  const pool = new Pool(config.db)
  const client = await pool.connect()

  try {
    // Migration bookkeeping table
    await client.query(`
      CREATE TABLE IF NOT EXISTS drizzle_migrations (
        id SERIAL PRIMARY KEY,
        hash text NOT NULL,
        created_at bigint
      )
    `)

    // From src/scripts/ or dist/scripts/, the drizzle folder is two levels up
    const drizzleDir = join(__dirname, '../../drizzle')
    const files = await readdir(drizzleDir)
    const migrationFiles = files.filter(f => /^\d+_.+\.sql$/.test(f)).sort()

    log.info({ msg: `[DB] ${migrationFiles.length} migration(s) found`, directory: drizzleDir })

    for (const file of migrationFiles) {
      const applied = await client.query('SELECT id FROM drizzle_migrations WHERE hash = $1', [file])
      if (applied.rows.length > 0) {
        log.debug({ msg: `[DB] Migration ${file} already applied` })
        continue
      }

      const sql = await readFile(join(drizzleDir, file), 'utf-8')

      await client.query('BEGIN')
      try {
        await client.query(sql)
        await client.query('INSERT INTO drizzle_migrations (hash, created_at) VALUES ($1, $2)', [file, Date.now()])
        await client.query('COMMIT')
        log.info({ msg: `[DB] Migration ${file} applied` })
      } catch (err) {
        await client.query('ROLLBACK')
        throw err
      }
    }

    log.info({ msg: '[DB] Migrations up to date' })
  } finally {
    client.release()
    await pool.end()
  }
}

runMigrations().catch(err => {
  log.error({ msg: '[DB] Migration failed', error: err instanceof Error ? err.message : String(err) })
  process.exit(1)
})
