import { eq } from 'drizzle-orm'
import type { Database } from '../../db/client'
import { runs } from '../../db/schema'
import { RUN_STATES, type RunSnapshot, type RunState } from '../../core/types/measurement'

type RunRow = typeof runs.$inferSelect

/**
 * Finished runs in the `runs` table, data points as jsonb
 */
export class RunRepository {
  constructor(private db: Database) {}

  async save(run: RunSnapshot): Promise<void> {
    await this.db
      .insert(runs)
      .values({
        id: run.id,
        measurementId: run.measurementId,
        measurementType: run.measurementType,
        state: run.state,
        config: run.config,
        createdAt: new Date(run.createdAt),
        startedAt: run.startedAt ? new Date(run.startedAt) : null,
        endedAt: new Date(run.endedAt ?? Date.now()),
        cancelRequested: run.cancelRequested,
        error: run.error,
        dataPointCount: run.dataPoints.length,
        dataPoints: run.dataPoints,
      })
      .onConflictDoNothing()
  }

  async findById(runId: string): Promise<RunSnapshot | null> {
    const rows = await this.db.select().from(runs).where(eq(runs.id, runId)).limit(1)
    return rows[0] ? toSnapshot(rows[0]) : null
  }
}

function toState(value: string): RunState {
  // Rows only ever hold terminal states
  return RUN_STATES.find(state => state === value) ?? 'failed'
}

function toSnapshot(row: RunRow): RunSnapshot {
  return {
    id: row.id,
    measurementId: row.measurementId,
    measurementType: row.measurementType,
    config: row.config,
    state: toState(row.state),
    createdAt: row.createdAt.toISOString(),
    startedAt: row.startedAt?.toISOString() ?? null,
    endedAt: row.endedAt.toISOString(),
    cancelRequested: row.cancelRequested,
    error: row.error,
    dataPoints: row.dataPoints,
  }
}
