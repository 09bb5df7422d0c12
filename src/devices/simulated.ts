/**
 * Simulated Device
 *
 * A software-only device for running the server without hardware. Its
 * capabilities are declared in the constructor arguments:
 *
 * - actuator IDs: stages first (0, 1, ...), then wheels
 * - detector IDs: sensors first, then spectrometers, then cameras
 *
 * Scalar sensors report `(baseline + sum of stage positions + sum of wheel
 * indices) * gain`, so scans over the device produce predictable data.
 *
 * Settings: every sensor has a discrete `gain` (x1, x10, x100) and every
 * camera a continuous `exposure` in ms (1 to 10000, default 10) that scales
 * its image by exposure / 10. Setting IDs follow the same order as detectors.
 */
import { setTimeout as sleep } from 'node:timers/promises'
import { z } from 'zod'
import { AbstractDevice } from '../core/device'
import {
  BaseContinuousActuator,
  BaseContinuousSetting,
  BaseDetector,
  BaseDiscreteActuator,
  BaseDiscreteSetting,
  type CapabilityOwner,
} from '../core/capabilities'
import { ConnectionError } from '../core/errors'
import { imageReading, scalarReading, vectorReading } from '../core/readings'
import type { DeviceType } from '../core/deviceTypes'
import type { Limits, Reading, SettingParent } from '../core/types/capabilities'

// ============================================================================
// Arguments
// ============================================================================

export const SimulatedArgsSchema = z.object({
  moveTimeMs: z.number().nonnegative().default(0),
  acquireTimeMs: z.number().nonnegative().default(0),
  failConnect: z.enum(['timeout', 'not_found', 'in_use']).optional(),
  stages: z
    .array(
      z.object({
        name: z.string(),
        lower: z.number().nullable().default(null),
        upper: z.number().nullable().default(null),
        unit: z.string().nullable().default('mm'),
        initial: z.number().default(0),
      })
    )
    .default([]),
  wheels: z
    .array(
      z.object({
        name: z.string(),
        options: z.array(z.string()).min(1),
        initial: z.number().int().nonnegative().default(0),
      })
    )
    .default([]),
  sensors: z
    .array(
      z.object({
        name: z.string(),
        unit: z.string().nullable().default(null),
        baseline: z.number().default(0),
        noise: z.number().nonnegative().default(0),
      })
    )
    .default([]),
  spectrometers: z
    .array(
      z.object({
        name: z.string(),
        points: z.number().int().positive().default(64),
        unit: z.string().nullable().default('counts'),
      })
    )
    .default([]),
  cameras: z
    .array(
      z.object({
        name: z.string(),
        width: z.number().int().positive().default(16),
        height: z.number().int().positive().default(16),
      })
    )
    .default([]),
})

export type SimulatedArgs = z.infer<typeof SimulatedArgsSchema>

// ============================================================================
// Capabilities
// ============================================================================

class SimulatedStage extends BaseContinuousActuator {
  position: number

  constructor(
    owner: CapabilityOwner,
    actuatorId: number,
    private readonly def: SimulatedArgs['stages'][number],
    private readonly moveTimeMs: number
  ) {
    super(owner, actuatorId, def.name, def.unit)
    this.position = def.initial
  }

  getHardwareLimits(): Limits {
    return [this.def.lower, this.def.upper]
  }

  protected async readPosition(): Promise<number> {
    return this.position
  }

  protected async applyPosition(value: number): Promise<void> {
    if (this.moveTimeMs > 0) await sleep(this.moveTimeMs)
    this.position = value
  }
}

class SimulatedWheel extends BaseDiscreteActuator {
  index: number

  constructor(
    owner: CapabilityOwner,
    actuatorId: number,
    private readonly def: SimulatedArgs['wheels'][number],
    private readonly moveTimeMs: number
  ) {
    super(owner, actuatorId, def.name)
    this.index = Math.min(def.initial, def.options.length - 1)
  }

  getPositionValues(): string[] {
    return [...this.def.options]
  }

  protected async readPosition(): Promise<number> {
    return this.index
  }

  protected async applyPosition(index: number): Promise<void> {
    if (this.moveTimeMs > 0) await sleep(this.moveTimeMs)
    this.index = index
  }
}

type Acquire = () => Reading

class SimulatedDetector extends BaseDetector {
  constructor(
    owner: CapabilityOwner,
    detectorId: number,
    name: string,
    dimensionality: number,
    unit: string | null,
    private readonly produce: Acquire,
    private readonly acquireTimeMs: number
  ) {
    super(owner, detectorId, name, dimensionality, unit)
  }

  protected async acquire(): Promise<Reading> {
    if (this.acquireTimeMs > 0) await sleep(this.acquireTimeMs)
    return this.produce()
  }
}

const GAINS = [1, 10, 100]
const EXPOSURE_LIMITS: Limits = [1, 10000]
const DEFAULT_EXPOSURE_MS = 10

class SimulatedGain extends BaseDiscreteSetting {
  index = 0

  constructor(owner: CapabilityOwner, settingId: number, parent: SettingParent) {
    super(owner, settingId, 'gain', parent)
  }

  get factor(): number {
    return GAINS[this.index]
  }

  getValueOptions(): string[] {
    return GAINS.map(g => `x${g}`)
  }

  protected async readValue(): Promise<number> {
    return this.index
  }

  protected async applyValue(index: number): Promise<void> {
    this.index = index
  }
}

class SimulatedExposure extends BaseContinuousSetting {
  value = DEFAULT_EXPOSURE_MS

  constructor(owner: CapabilityOwner, settingId: number, parent: SettingParent) {
    super(owner, settingId, 'exposure', 'ms', parent)
  }

  getHardwareLimits(): Limits {
    return [...EXPOSURE_LIMITS]
  }

  protected async readValue(): Promise<number> {
    return this.value
  }

  protected async applyValue(value: number): Promise<void> {
    this.value = value
  }
}

// ============================================================================
// Device
// ============================================================================

export class SimulatedDevice extends AbstractDevice {
  private readonly stages: SimulatedStage[] = []
  private readonly wheels: SimulatedWheel[] = []

  constructor(
    id: string,
    name: string,
    private readonly args: SimulatedArgs
  ) {
    super(id, name, 'simulated')

    let actuatorId = 0
    for (const def of args.stages) {
      const stage = new SimulatedStage(this, actuatorId++, def, args.moveTimeMs)
      this.stages.push(stage)
      this.addActuator(stage)
    }
    for (const def of args.wheels) {
      const wheel = new SimulatedWheel(this, actuatorId++, def, args.moveTimeMs)
      this.wheels.push(wheel)
      this.addActuator(wheel)
    }

    let detectorId = 0
    let settingId = 0
    for (const def of args.sensors) {
      const gain = new SimulatedGain(this, settingId++, { kind: 'detector', id: detectorId })
      const produce = () => {
        const noise = def.noise > 0 ? (Math.random() - 0.5) * 2 * def.noise : 0
        return scalarReading((def.baseline + this.signal() + noise) * gain.factor, def.unit)
      }
      this.addDetector(new SimulatedDetector(this, detectorId++, def.name, 0, def.unit, produce, args.acquireTimeMs))
      this.addSetting(gain)
    }
    for (const def of args.spectrometers) {
      const produce = () => vectorReading(this.spectrum(def.points), def.unit)
      this.addDetector(new SimulatedDetector(this, detectorId++, def.name, 1, def.unit, produce, args.acquireTimeMs))
    }
    for (const def of args.cameras) {
      const exposure = new SimulatedExposure(this, settingId++, { kind: 'detector', id: detectorId })
      const produce = () =>
        imageReading(this.image(def.width, def.height, exposure.value / DEFAULT_EXPOSURE_MS), null)
      this.addDetector(new SimulatedDetector(this, detectorId++, def.name, 2, null, produce, args.acquireTimeMs))
      this.addSetting(exposure)
    }
  }

  protected async open(): Promise<void> {
    if (this.args.failConnect) {
      throw new ConnectionError(this.id, this.args.failConnect, 'simulated failure')
    }
  }

  protected async close(): Promise<void> {}

  private signal(): number {
    const stageSum = this.stages.reduce((sum, s) => sum + s.position, 0)
    const wheelSum = this.wheels.reduce((sum, w) => sum + w.index, 0)
    return stageSum + wheelSum
  }

  /** Gaussian peak whose centre follows the signal */
  private spectrum(points: number): number[] {
    const centre = points / 2 + this.signal()
    const width = Math.max(points / 10, 1)
    return Array.from({ length: points }, (_, i) => 1000 * Math.exp(-((i - centre) ** 2) / (2 * width ** 2)))
  }

  private image(width: number, height: number, scale: number): number[][] {
    const level = this.signal()
    return Array.from({ length: height }, (_, y) =>
      Array.from({ length: width }, (_, x) => (level + x + y * width) * scale)
    )
  }
}

export const simulatedDeviceType: DeviceType<SimulatedArgs> = {
  name: 'simulated',
  description: 'Software-only device with configurable stages, wheels, sensors, spectrometers and cameras',
  args: {
    moveTimeMs: 'Time each actuator move takes (ms)',
    acquireTimeMs: 'Time each acquisition takes (ms)',
    failConnect: 'Make connect fail with this code: timeout, not_found or in_use',
    stages: 'Continuous actuators: [{ name, lower, upper, unit, initial }]',
    wheels: 'Discrete actuators: [{ name, options, initial }]',
    sensors: 'Scalar detectors with a gain setting: [{ name, unit, baseline, noise }]',
    spectrometers: '1-D detectors: [{ name, points, unit }]',
    cameras: '2-D detectors with an exposure setting: [{ name, width, height }]',
  },
  argsSchema: SimulatedArgsSchema,
  create: (id, name, args) => new SimulatedDevice(id, name, args),
}
