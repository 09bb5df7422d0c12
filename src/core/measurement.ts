/**
 * Measurement abstraction.
 *
 * A measurement is an async generator of steps. Each step drives hardware
 * through the run context and yields the positions and readings it produced;
 * the engine numbers, timestamps and records the resulting data point. The
 * gap between two yields is the only place a run may be cancelled.
 */
import { randomUUID } from 'node:crypto'
import type { Actuator, Detector } from './types/capabilities'
import type { PositionRecord, ReadingRecord } from './types/measurement'

export interface StepResult {
  positions: PositionRecord[]
  readings: ReadingRecord[]
}

/**
 * Hardware access handed to a running measurement by the engine
 */
export interface MeasurementContext {
  /** Aborted as soon as cancellation is requested */
  readonly signal: AbortSignal
  elapsedMs(): number
  read(detector: Detector): Promise<ReadingRecord>
  move(actuator: Actuator, target: number): Promise<PositionRecord>
  /** Resolves true after `ms`, or false early if the run is cancelled */
  wait(ms: number): Promise<boolean>
}

export abstract class Measurement {
  readonly id = randomUUID()
  abstract readonly type: string

  constructor(
    readonly detectors: readonly Detector[],
    readonly actuators: readonly Actuator[]
  ) {}

  /** IDs of every device this measurement touches */
  deviceIds(): string[] {
    const ids = new Set<string>()
    for (const d of this.detectors) ids.add(d.deviceId)
    for (const a of this.actuators) ids.add(a.deviceId)
    return [...ids]
  }

  /**
   * Check the configuration against the capabilities' declared domains.
   * Called by the engine before the run starts.
   */
  validate(): void {}

  /** Serialisable view of the configuration */
  abstract describe(): Record<string, unknown>

  abstract steps(ctx: MeasurementContext): AsyncGenerator<StepResult, void, undefined>
}

/**
 * Read detectors one after another, in order
 */
export async function readAll(ctx: MeasurementContext, detectors: readonly Detector[]): Promise<ReadingRecord[]> {
  const readings: ReadingRecord[] = []
  for (const detector of detectors) {
    readings.push(await ctx.read(detector))
  }
  return readings
}
