import type { Detector } from '../types/capabilities'
import { Measurement, readAll, type MeasurementContext, type StepResult } from '../measurement'
import { ValidationError } from '../errors'

export interface TimeSeriesOptions {
  detectors: Detector[]
  count?: number            // omitted: run until cancelled
  intervalSeconds: number
}

/**
 * Reads a fixed set of detectors at a fixed interval.
 * The first sample is taken immediately; the interval separates samples.
 */
export class TimeSeriesMeasurement extends Measurement {
  readonly type = 'time-series'
  readonly count: number | undefined
  readonly intervalSeconds: number

  constructor(options: TimeSeriesOptions) {
    super(options.detectors, [])
    this.count = options.count
    this.intervalSeconds = options.intervalSeconds
  }

  validate(): void {
    const issues: string[] = []
    if (this.detectors.length === 0) issues.push('at least one detector is required')
    if (this.count !== undefined && (!Number.isInteger(this.count) || this.count < 1)) {
      issues.push('count must be a positive integer')
    }
    if (!Number.isFinite(this.intervalSeconds) || this.intervalSeconds < 0) {
      issues.push('intervalSeconds must be a non-negative number')
    }
    if (issues.length > 0) throw new ValidationError('Invalid time series', issues)
  }

  describe(): Record<string, unknown> {
    return {
      detectors: this.detectors.map(d => ({ deviceId: d.deviceId, detectorId: d.detectorId })),
      count: this.count ?? null,
      intervalSeconds: this.intervalSeconds,
    }
  }

  async *steps(ctx: MeasurementContext): AsyncGenerator<StepResult, void, undefined> {
    const intervalMs = this.intervalSeconds * 1000

    for (let i = 0; this.count === undefined || i < this.count; i++) {
      if (i > 0 && intervalMs > 0) {
        const waited = await ctx.wait(intervalMs)
        if (!waited) return
      }
      yield { positions: [], readings: await readAll(ctx, this.detectors) }
    }
  }
}
