import { z } from 'zod'
import type { DeviceRegistry } from '../../core/deviceRegistry'
import type { MeasurementEngine } from '../../core/engine'
import type { MeasurementTypeInfo, MeasurementTypeRegistry } from '../../core/measurementTypes'
import type { RunFilter } from '../../core/runRegistry'
import type { RunSnapshot, RunSummary } from '../../core/types/measurement'
import { NotFoundError } from '../../core/errors'

/** Where finished runs are looked up once they have left memory */
export interface RunStore {
  findById(runId: string): Promise<RunSnapshot | null>
}

const RunIdSchema = z.string().uuid()

export class RunService {
  constructor(
    private engine: MeasurementEngine,
    private measurementTypes: MeasurementTypeRegistry,
    private devices: DeviceRegistry,
    private store: RunStore | null = null
  ) {}

  listTypes(): MeasurementTypeInfo[] {
    return this.measurementTypes.list()
  }

  /**
   * Build the measurement from its raw configuration and start it.
   * Returns the pending run.
   */
  start(type: string, config: unknown): RunSummary {
    const measurement = this.measurementTypes.build(type, config, this.devices)
    const { id } = this.engine.start(measurement)
    return this.engine.summary(id)
  }

  list(filter: RunFilter): RunSummary[] {
    return this.engine.list(filter)
  }

  async get(runId: string): Promise<RunSnapshot> {
    try {
      return this.engine.getStatus(runId)
    } catch (err) {
      if (!(err instanceof NotFoundError) || !this.store || !RunIdSchema.safeParse(runId).success) throw err
      const stored = await this.store.findById(runId)
      if (!stored) throw err
      return stored
    }
  }

  cancel(runId: string): RunSnapshot {
    return this.engine.cancel(runId)
  }

  purge(runId: string): void {
    this.engine.purge(runId)
  }
}
