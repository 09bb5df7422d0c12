/**
 * In-process fake hardware for engine and capability tests.
 *
 * Every fake records `<deviceId>:<op>:start` / `<deviceId>:<op>:end` into a
 * shared call log so tests can check ordering across devices and runs.
 */
import { setTimeout as sleep } from 'node:timers/promises'
import pino from 'pino'
import { AbstractDevice } from '../device'
import {
  BaseContinuousActuator,
  BaseContinuousSetting,
  BaseDetector,
  BaseDiscreteActuator,
  BaseDiscreteSetting,
  type CapabilityOwner,
} from '../capabilities'
import { scalarReading } from '../readings'
import type { Limits, Reading, SettingParent } from '../types/capabilities'

export const silentLogger = pino({ level: 'silent' })

export interface Deferred {
  promise: Promise<void>
  resolve: () => void
}

export function deferred(): Deferred {
  let resolve: () => void = () => {}
  const promise = new Promise<void>(r => {
    resolve = r
  })
  return { promise, resolve }
}

// ============================================================================
// Capabilities
// ============================================================================

export interface FakeDetectorOptions {
  dimensionality?: number
  /** Reading for the n-th call (0-based); defaults to a scalar equal to n */
  produce?: (n: number) => Reading
  delayMs?: number
  /** Every read waits for this before returning */
  gate?: Promise<void>
  /** Throw a driver error on this call index */
  failAt?: number
}

export class FakeDetector extends BaseDetector {
  reads = 0

  constructor(
    owner: CapabilityOwner,
    detectorId: number,
    private readonly log: string[],
    private readonly options: FakeDetectorOptions = {}
  ) {
    super(owner, detectorId, `detector-${detectorId}`, options.dimensionality ?? 0)
  }

  protected async acquire(): Promise<Reading> {
    const n = this.reads++
    this.log.push(`${this.deviceId}:read:start`)
    if (this.options.delayMs) await sleep(this.options.delayMs)
    if (this.options.gate) await this.options.gate
    this.log.push(`${this.deviceId}:read:end`)
    if (this.options.failAt === n) throw new Error('sensor timeout')
    return this.options.produce ? this.options.produce(n) : scalarReading(n)
  }
}

export class FakeContinuous extends BaseContinuousActuator {
  position = 0

  constructor(
    owner: CapabilityOwner,
    actuatorId: number,
    private readonly limits: Limits,
    private readonly log: string[],
    private readonly delayMs = 0
  ) {
    super(owner, actuatorId, `stage-${actuatorId}`, 'mm')
  }

  getHardwareLimits(): Limits {
    return this.limits
  }

  protected async readPosition(): Promise<number> {
    return this.position
  }

  protected async applyPosition(value: number): Promise<void> {
    this.log.push(`${this.deviceId}:move(${value}):start`)
    if (this.delayMs) await sleep(this.delayMs)
    this.position = value
    this.log.push(`${this.deviceId}:move(${value}):end`)
  }
}

export class FakeDiscrete extends BaseDiscreteActuator {
  index = 0

  constructor(
    owner: CapabilityOwner,
    actuatorId: number,
    private readonly options: string[],
    private readonly log: string[]
  ) {
    super(owner, actuatorId, `wheel-${actuatorId}`)
  }

  getPositionValues(): string[] {
    return this.options
  }

  protected async readPosition(): Promise<number> {
    return this.index
  }

  protected async applyPosition(index: number): Promise<void> {
    this.log.push(`${this.deviceId}:move(${index}):start`)
    this.index = index
    this.log.push(`${this.deviceId}:move(${index}):end`)
  }
}

export class FakeDiscreteSetting extends BaseDiscreteSetting {
  index = 0

  constructor(
    owner: CapabilityOwner,
    settingId: number,
    private readonly options: string[],
    private readonly log: string[],
    parent?: SettingParent
  ) {
    super(owner, settingId, `mode-${settingId}`, parent)
  }

  getValueOptions(): string[] {
    return this.options
  }

  protected async readValue(): Promise<number> {
    return this.index
  }

  protected async applyValue(index: number): Promise<void> {
    this.log.push(`${this.deviceId}:set(${index})`)
    this.index = index
  }
}

export class FakeContinuousSetting extends BaseContinuousSetting {
  value = 0

  constructor(
    owner: CapabilityOwner,
    settingId: number,
    private readonly limits: Limits,
    private readonly log: string[],
    parent?: SettingParent
  ) {
    super(owner, settingId, `exposure-${settingId}`, 'ms', parent)
  }

  getHardwareLimits(): Limits {
    return this.limits
  }

  protected async readValue(): Promise<number> {
    return this.value
  }

  protected async applyValue(value: number): Promise<void> {
    this.log.push(`${this.deviceId}:set(${value})`)
    this.value = value
  }
}

// ============================================================================
// Device
// ============================================================================

export class FakeDevice extends AbstractDevice {
  /** Thrown by the transport hooks when set */
  connectError: unknown = null
  disconnectError: unknown = null

  constructor(
    id: string,
    readonly log: string[] = []
  ) {
    super(id, `Fake ${id}`, 'fake')
  }

  withDetector(detectorId: number, options?: FakeDetectorOptions): FakeDetector {
    const detector = new FakeDetector(this, detectorId, this.log, options)
    this.addDetector(detector)
    return detector
  }

  withContinuous(actuatorId: number, limits: Limits, delayMs = 0): FakeContinuous {
    const actuator = new FakeContinuous(this, actuatorId, limits, this.log, delayMs)
    this.addActuator(actuator)
    return actuator
  }

  withDiscrete(actuatorId: number, options: string[]): FakeDiscrete {
    const actuator = new FakeDiscrete(this, actuatorId, options, this.log)
    this.addActuator(actuator)
    return actuator
  }

  withDiscreteSetting(settingId: number, options: string[], parent?: SettingParent): FakeDiscreteSetting {
    const setting = new FakeDiscreteSetting(this, settingId, options, this.log, parent)
    this.addSetting(setting)
    return setting
  }

  withContinuousSetting(settingId: number, limits: Limits, parent?: SettingParent): FakeContinuousSetting {
    const setting = new FakeContinuousSetting(this, settingId, limits, this.log, parent)
    this.addSetting(setting)
    return setting
  }

  protected async open(): Promise<void> {
    if (this.connectError) throw this.connectError
    this.log.push(`${this.id}:connect`)
  }

  protected async close(): Promise<void> {
    if (this.disconnectError) throw this.disconnectError
    this.log.push(`${this.id}:disconnect`)
  }
}
