import { pgTable, text, integer, timestamp, boolean, index, jsonb, uuid } from 'drizzle-orm/pg-core'
import crypto from 'node:crypto'
import type { DataPoint, RunError } from '../core/types/measurement'

// --- Runs ---

export const runs = pgTable(
  'runs',
  {
    id: uuid('id').primaryKey(),
    measurementId: uuid('measurement_id').notNull(),
    measurementType: text('measurement_type').notNull(),
    state: text('state').notNull(), // completed, failed, cancelled
    config: jsonb('config').$type<Record<string, unknown>>().notNull(),
    createdAt: timestamp('created_at').notNull(),
    startedAt: timestamp('started_at'),
    endedAt: timestamp('ended_at').notNull(),
    cancelRequested: boolean('cancel_requested').notNull().default(false),
    error: jsonb('error').$type<RunError>(),
    dataPointCount: integer('data_point_count').notNull(),
    dataPoints: jsonb('data_points').$type<DataPoint[]>().notNull(),
  },
  table => ({
    typeIdx: index('idx_runs_type').on(table.measurementType),
    endedAtIdx: index('idx_runs_ended_at').on(table.endedAt),
  })
)

// --- Logs ---

export const systemLogs = pgTable('system_logs', {
  id: text('id')
    .primaryKey()
    .$defaultFn(() => crypto.randomUUID()),
  category: text('category').notNull(), // ENGINE, DEVICE, API, DB, WEBSOCKET
  source: text('source').notNull().default('SYSTEM'), // SYSTEM or USER
  level: text('level').notNull(),
  msg: text('msg').notNull(),
  time: timestamp('time').notNull(),
  details: jsonb('details'),
})
