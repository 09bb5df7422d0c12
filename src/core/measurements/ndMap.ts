import type { Actuator, Detector } from '../types/capabilities'
import type { PositionRecord } from '../types/measurement'
import { Measurement, readAll, type MeasurementContext, type StepResult } from '../measurement'
import { InvalidPositionError, ValidationError } from '../errors'
import { withinLimits } from '../readings'

export type AxisTarget = number | string   // string = option label of a discrete actuator

export interface Axis {
  actuator: Actuator
  positions: AxisTarget[]
}

export type MapMode = 'grid' | 'zip'

export interface NdMapOptions {
  detectors: Detector[]
  axes: Axis[]
  mode?: MapMode
}

/**
 * Scans actuators over target positions and reads every detector at each
 * combination.
 *
 * - grid: Cartesian product, row-major (the first axis varies slowest)
 * - zip:  the i-th target of every axis together; axes must be equally long
 */
export class NdMapMeasurement extends Measurement {
  readonly type = 'nd-map'
  readonly axes: readonly Axis[]
  readonly mode: MapMode

  constructor(options: NdMapOptions) {
    super(options.detectors, options.axes.map(axis => axis.actuator))
    this.axes = options.axes
    this.mode = options.mode ?? 'grid'
  }

  /** Number of steps the scan will take */
  get size(): number {
    if (this.axes.length === 0) return 0
    if (this.mode === 'zip') return this.axes[0].positions.length
    return this.axes.reduce((n, axis) => n * axis.positions.length, 1)
  }

  validate(): void {
    const issues: string[] = []
    if (this.detectors.length === 0) issues.push('at least one detector is required')
    if (this.axes.length === 0) issues.push('at least one axis is required')

    this.axes.forEach((axis, i) => {
      if (axis.positions.length === 0) issues.push(`axes.${i}: no target positions`)
    })

    const keys = this.axes.map(axis => `${axis.actuator.deviceId}/${axis.actuator.actuatorId}`)
    if (new Set(keys).size !== keys.length) issues.push('an actuator appears on more than one axis')

    if (this.mode === 'zip' && new Set(this.axes.map(axis => axis.positions.length)).size > 1) {
      issues.push('zip mode needs axes of equal length')
    }
    if (issues.length > 0) throw new ValidationError('Invalid N-dimensional map', issues)

    // Domain checks last: every target must be reachable before anything moves
    this.resolveTargets()
  }

  describe(): Record<string, unknown> {
    return {
      detectors: this.detectors.map(d => ({ deviceId: d.deviceId, detectorId: d.detectorId })),
      axes: this.axes.map(axis => ({
        actuator: { deviceId: axis.actuator.deviceId, actuatorId: axis.actuator.actuatorId },
        positions: axis.positions,
      })),
      mode: this.mode,
    }
  }

  async *steps(ctx: MeasurementContext): AsyncGenerator<StepResult, void, undefined> {
    const targets = this.resolveTargets()

    for (const combination of this.combinations(targets)) {
      const positions: PositionRecord[] = []
      for (let i = 0; i < this.axes.length; i++) {
        positions.push(await ctx.move(this.axes[i].actuator, combination[i]))
      }
      yield { positions, readings: await readAll(ctx, this.detectors) }
    }
  }

  /**
   * Numeric targets per axis. Labels become option indices; every target is
   * checked against the actuator's domain.
   */
  private resolveTargets(): number[][] {
    return this.axes.map(axis => axis.positions.map(target => resolveTarget(axis.actuator, target)))
  }

  private *combinations(targets: number[][]): Generator<number[]> {
    if (this.mode === 'zip') {
      for (let i = 0; i < targets[0].length; i++) {
        yield targets.map(axis => axis[i])
      }
      return
    }

    const counters = targets.map(() => 0)
    const total = targets.reduce((n, axis) => n * axis.length, 1)

    for (let n = 0; n < total; n++) {
      yield counters.map((c, axis) => targets[axis][c])

      // Advance the last axis fastest, carrying into earlier ones
      for (let axis = counters.length - 1; axis >= 0; axis--) {
        counters[axis]++
        if (counters[axis] < targets[axis].length) break
        counters[axis] = 0
      }
    }
  }
}

export function resolveTarget(actuator: Actuator, target: AxisTarget): number {
  if (actuator.kind === 'discrete') {
    const options = actuator.getPositionValues()
    const index = typeof target === 'string' ? options.indexOf(target) : target
    if (!Number.isInteger(index) || index < 0 || index >= options.length) {
      throw new InvalidPositionError(actuator.name, target, 'out_of_range')
    }
    if (actuator.getInvalidOptions().includes(index)) {
      throw new InvalidPositionError(actuator.name, target, 'invalid_option')
    }
    return index
  }

  if (typeof target === 'string' || !Number.isFinite(target)) {
    throw new InvalidPositionError(actuator.name, target, 'not_a_number')
  }
  if (!withinLimits(target, actuator.getHardwareLimits())) {
    throw new InvalidPositionError(actuator.name, target, 'hardware_limit')
  }
  if (!withinLimits(target, actuator.getSoftLimits())) {
    throw new InvalidPositionError(actuator.name, target, 'software_limit')
  }
  return target
}
