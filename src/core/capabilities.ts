/**
 * Capability base classes.
 *
 * Hardware drivers extend these and implement the protected hooks. The public
 * methods validate commands against the capability's domain and the owner's
 * connection state before any hook is reached.
 */
import type {
  ContinuousActuator,
  ContinuousActuatorInfo,
  ContinuousSetting,
  ContinuousSettingInfo,
  Detector,
  DetectorInfo,
  DiscreteActuator,
  DiscreteActuatorInfo,
  DiscreteSetting,
  DiscreteSettingInfo,
  Limits,
  Reading,
  SettingParent,
} from './types/capabilities'
import {
  DeviceBusyError,
  HardwareError,
  InvalidPositionError,
  ValidationError,
  toMdaError,
  type PositionSubject,
} from './errors'
import { checkReading, withinLimits } from './readings'

/** What a capability needs to know about the device that owns it */
export interface CapabilityOwner {
  readonly id: string
  isConnected(): boolean
}

function assertConnected(owner: CapabilityOwner): void {
  if (!owner.isConnected()) {
    throw new HardwareError(owner.id, `Device ${owner.id} is not connected`)
  }
}

async function callDriver<T>(owner: CapabilityOwner, op: () => Promise<T>): Promise<T> {
  try {
    return await op()
  } catch (err) {
    throw toMdaError(err, owner.id)
  }
}

// ============================================================================
// Domains
// ============================================================================

/**
 * Indexed options, some of which may be temporarily invalid.
 * Used by discrete actuators and discrete settings.
 */
export class OptionDomain {
  private invalid = new Set<number>()

  constructor(
    private readonly name: string,
    private readonly subject: PositionSubject
  ) {}

  check(index: number, options: string[]): void {
    if (!Number.isInteger(index) || index < 0 || index >= options.length) {
      throw new InvalidPositionError(this.name, index, 'out_of_range', this.subject)
    }
    if (this.invalid.has(index)) {
      throw new InvalidPositionError(this.name, index, 'invalid_option', this.subject)
    }
  }

  markInvalid(index: number): void {
    this.invalid.add(index)
  }

  markValid(index: number): void {
    this.invalid.delete(index)
  }

  invalidOptions(): number[] {
    return [...this.invalid].sort((a, b) => a - b)
  }
}

/**
 * A numeric range bounded by hardware limits and optional soft limits.
 * Used by continuous actuators and continuous settings.
 */
export class RangeDomain {
  private softLimits: Limits = [null, null]

  constructor(
    private readonly name: string,
    private readonly subject: PositionSubject
  ) {}

  check(value: number, hardwareLimits: Limits): void {
    if (!Number.isFinite(value)) {
      throw new InvalidPositionError(this.name, value, 'not_a_number', this.subject)
    }
    if (!withinLimits(value, hardwareLimits)) {
      throw new InvalidPositionError(this.name, value, 'hardware_limit', this.subject)
    }
    if (!withinLimits(value, this.softLimits)) {
      throw new InvalidPositionError(this.name, value, 'software_limit', this.subject)
    }
  }

  getSoftLimits(): Limits {
    return [...this.softLimits]
  }

  setSoftLimits(limits: Limits): void {
    const [lower, upper] = limits
    if (lower !== null && upper !== null && lower > upper) {
      throw new ValidationError(`Soft limits for ${this.name} are inverted`, [`${lower} > ${upper}`])
    }
    this.softLimits = [lower, upper]
  }
}

// ============================================================================
// Detector
// ============================================================================

export abstract class BaseDetector implements Detector {
  constructor(
    protected readonly owner: CapabilityOwner,
    readonly detectorId: number,
    readonly name: string,
    readonly dimensionality: number,
    readonly unit: string | null = null
  ) {}

  get deviceId(): string {
    return this.owner.id
  }

  /** Driver hook: acquire one reading */
  protected abstract acquire(): Promise<Reading>

  /** Driver hook: whether the detector can acquire right now */
  protected canAcquire(): boolean {
    return true
  }

  async read(): Promise<Reading> {
    assertConnected(this.owner)
    if (!this.canAcquire()) throw new DeviceBusyError(this.deviceId)

    const reading = await callDriver(this.owner, () => this.acquire())
    const problem = checkReading(reading, this.dimensionality)
    if (problem) {
      throw new HardwareError(this.deviceId, `Detector ${this.name}: ${problem}`)
    }
    return reading
  }

  info(): DetectorInfo {
    return {
      deviceId: this.deviceId,
      detectorId: this.detectorId,
      name: this.name,
      dimensionality: this.dimensionality,
      unit: this.unit,
    }
  }
}

// ============================================================================
// Discrete actuator
// ============================================================================

export abstract class BaseDiscreteActuator implements DiscreteActuator {
  readonly kind = 'discrete'
  private readonly domain: OptionDomain

  constructor(
    protected readonly owner: CapabilityOwner,
    readonly actuatorId: number,
    readonly name: string
  ) {
    this.domain = new OptionDomain(name, 'actuator')
  }

  get deviceId(): string {
    return this.owner.id
  }

  abstract getPositionValues(): string[]

  /** Driver hook: current option index as reported by the hardware */
  protected abstract readPosition(): Promise<number>

  /** Driver hook: move to a validated option index and resolve when done */
  protected abstract applyPosition(index: number): Promise<void>

  /** Driver hook: whether the actuator accepts commands right now */
  protected canMove(): boolean {
    return true
  }

  async getPosition(): Promise<number> {
    assertConnected(this.owner)
    return callDriver(this.owner, () => this.readPosition())
  }

  async setPosition(index: number): Promise<void> {
    this.domain.check(index, this.getPositionValues())
    assertConnected(this.owner)
    if (!this.canMove()) throw new DeviceBusyError(this.deviceId)

    await callDriver(this.owner, () => this.applyPosition(index))
  }

  markInvalid(index: number): void {
    this.domain.markInvalid(index)
  }

  markValid(index: number): void {
    this.domain.markValid(index)
  }

  getInvalidOptions(): number[] {
    return this.domain.invalidOptions()
  }

  info(): DiscreteActuatorInfo {
    return {
      kind: 'discrete',
      deviceId: this.deviceId,
      actuatorId: this.actuatorId,
      name: this.name,
      options: this.getPositionValues(),
      invalidOptions: this.getInvalidOptions(),
    }
  }
}

// ============================================================================
// Continuous actuator
// ============================================================================

export abstract class BaseContinuousActuator implements ContinuousActuator {
  readonly kind = 'continuous'
  private readonly domain: RangeDomain

  constructor(
    protected readonly owner: CapabilityOwner,
    readonly actuatorId: number,
    readonly name: string,
    readonly unit: string | null = null
  ) {
    this.domain = new RangeDomain(name, 'actuator')
  }

  get deviceId(): string {
    return this.owner.id
  }

  abstract getHardwareLimits(): Limits

  protected abstract readPosition(): Promise<number>

  protected abstract applyPosition(value: number): Promise<void>

  protected canMove(): boolean {
    return true
  }

  async getPosition(): Promise<number> {
    assertConnected(this.owner)
    return callDriver(this.owner, () => this.readPosition())
  }

  async setPosition(value: number): Promise<void> {
    this.domain.check(value, this.getHardwareLimits())
    assertConnected(this.owner)
    if (!this.canMove()) throw new DeviceBusyError(this.deviceId)

    await callDriver(this.owner, () => this.applyPosition(value))
  }

  getSoftLimits(): Limits {
    return this.domain.getSoftLimits()
  }

  setSoftLimits(limits: Limits): void {
    this.domain.setSoftLimits(limits)
  }

  info(): ContinuousActuatorInfo {
    return {
      kind: 'continuous',
      deviceId: this.deviceId,
      actuatorId: this.actuatorId,
      name: this.name,
      unit: this.unit,
      hardwareLimits: this.getHardwareLimits(),
      softwareLimits: this.getSoftLimits(),
    }
  }
}

// ============================================================================
// Settings
// ============================================================================

const DEVICE_PARENT: SettingParent = { kind: 'device' }

export abstract class BaseDiscreteSetting implements DiscreteSetting {
  readonly kind = 'discrete'
  private readonly domain: OptionDomain

  constructor(
    protected readonly owner: CapabilityOwner,
    readonly settingId: number,
    readonly name: string,
    readonly parent: SettingParent = DEVICE_PARENT
  ) {
    this.domain = new OptionDomain(name, 'setting')
  }

  get deviceId(): string {
    return this.owner.id
  }

  abstract getValueOptions(): string[]

  /** Driver hook: current option index */
  protected abstract readValue(): Promise<number>

  /** Driver hook: apply a validated option index */
  protected abstract applyValue(index: number): Promise<void>

  /** Driver hook: whether the parent accepts a new value right now */
  protected canSet(): boolean {
    return true
  }

  async getValue(): Promise<number> {
    assertConnected(this.owner)
    return callDriver(this.owner, () => this.readValue())
  }

  async setValue(index: number): Promise<void> {
    this.domain.check(index, this.getValueOptions())
    assertConnected(this.owner)
    if (!this.canSet()) throw new DeviceBusyError(this.deviceId)

    await callDriver(this.owner, () => this.applyValue(index))
  }

  markInvalid(index: number): void {
    this.domain.markInvalid(index)
  }

  markValid(index: number): void {
    this.domain.markValid(index)
  }

  getInvalidOptions(): number[] {
    return this.domain.invalidOptions()
  }

  info(): DiscreteSettingInfo {
    return {
      kind: 'discrete',
      deviceId: this.deviceId,
      settingId: this.settingId,
      name: this.name,
      parent: this.parent,
      options: this.getValueOptions(),
      invalidOptions: this.getInvalidOptions(),
    }
  }
}

export abstract class BaseContinuousSetting implements ContinuousSetting {
  readonly kind = 'continuous'
  private readonly domain: RangeDomain

  constructor(
    protected readonly owner: CapabilityOwner,
    readonly settingId: number,
    readonly name: string,
    readonly unit: string | null = null,
    readonly parent: SettingParent = DEVICE_PARENT
  ) {
    this.domain = new RangeDomain(name, 'setting')
  }

  get deviceId(): string {
    return this.owner.id
  }

  abstract getHardwareLimits(): Limits

  protected abstract readValue(): Promise<number>

  protected abstract applyValue(value: number): Promise<void>

  protected canSet(): boolean {
    return true
  }

  async getValue(): Promise<number> {
    assertConnected(this.owner)
    return callDriver(this.owner, () => this.readValue())
  }

  async setValue(value: number): Promise<void> {
    this.domain.check(value, this.getHardwareLimits())
    assertConnected(this.owner)
    if (!this.canSet()) throw new DeviceBusyError(this.deviceId)

    await callDriver(this.owner, () => this.applyValue(value))
  }

  getSoftLimits(): Limits {
    return this.domain.getSoftLimits()
  }

  setSoftLimits(limits: Limits): void {
    this.domain.setSoftLimits(limits)
  }

  info(): ContinuousSettingInfo {
    return {
      kind: 'continuous',
      deviceId: this.deviceId,
      settingId: this.settingId,
      name: this.name,
      parent: this.parent,
      unit: this.unit,
      hardwareLimits: this.getHardwareLimits(),
      softwareLimits: this.getSoftLimits(),
    }
  }
}
