/**
 * Capability contracts.
 * Defines what the engine may ask of detectors, actuators and devices.
 */

// ============================================================================
// Readings
// ============================================================================

/** A scalar, or nested arrays of scalars whose depth is the dimensionality */
export type NdValue = number | NdValue[]

export interface Reading {
  dimensionality: number  // 0 = scalar, 1 = spectrum, 2 = image, ...
  shape: number[]         // [] for a scalar, [1024] for a spectrum
  values: NdValue
  unit: string | null
}

// ============================================================================
// Limits
// ============================================================================

/** Lower and upper bound; null means unbounded on that side */
export type Limits = [number | null, number | null]

// ============================================================================
// Capability info (serialisable descriptions)
// ============================================================================

export interface DetectorInfo {
  deviceId: string
  detectorId: number
  name: string
  dimensionality: number
  unit: string | null
}

export interface DiscreteActuatorInfo {
  kind: 'discrete'
  deviceId: string
  actuatorId: number
  name: string
  options: string[]
  invalidOptions: number[]
}

export interface ContinuousActuatorInfo {
  kind: 'continuous'
  deviceId: string
  actuatorId: number
  name: string
  unit: string | null
  hardwareLimits: Limits
  softwareLimits: Limits
}

export type ActuatorInfo = DiscreteActuatorInfo | ContinuousActuatorInfo

/** What a setting configures: the device itself or one of its capabilities */
export type SettingParent =
  | { kind: 'device' }
  | { kind: 'detector'; id: number }
  | { kind: 'actuator'; id: number }

export interface DiscreteSettingInfo {
  kind: 'discrete'
  deviceId: string
  settingId: number
  name: string
  parent: SettingParent
  options: string[]
  invalidOptions: number[]
}

export interface ContinuousSettingInfo {
  kind: 'continuous'
  deviceId: string
  settingId: number
  name: string
  parent: SettingParent
  unit: string | null
  hardwareLimits: Limits
  softwareLimits: Limits
}

export type SettingInfo = DiscreteSettingInfo | ContinuousSettingInfo

// ============================================================================
// Capabilities
// ============================================================================

export interface Detector {
  readonly deviceId: string
  readonly detectorId: number
  readonly name: string
  readonly dimensionality: number
  read(): Promise<Reading>
  info(): DetectorInfo
}

export interface DiscreteActuator {
  readonly kind: 'discrete'
  readonly deviceId: string
  readonly actuatorId: number
  readonly name: string
  getPositionValues(): string[]
  getPosition(): Promise<number>
  setPosition(index: number): Promise<void>
  markInvalid(index: number): void
  markValid(index: number): void
  getInvalidOptions(): number[]
  info(): DiscreteActuatorInfo
}

export interface ContinuousActuator {
  readonly kind: 'continuous'
  readonly deviceId: string
  readonly actuatorId: number
  readonly name: string
  getPosition(): Promise<number>
  setPosition(value: number): Promise<void>
  getHardwareLimits(): Limits
  getSoftLimits(): Limits
  setSoftLimits(limits: Limits): void
  info(): ContinuousActuatorInfo
}

export type Actuator = DiscreteActuator | ContinuousActuator

/**
 * Settings (exposure time, gain, ...) change how a capability behaves
 * without being part of a measurement's positions.
 */
export interface DiscreteSetting {
  readonly kind: 'discrete'
  readonly deviceId: string
  readonly settingId: number
  readonly name: string
  readonly parent: SettingParent
  getValueOptions(): string[]
  getValue(): Promise<number>
  setValue(index: number): Promise<void>
  markInvalid(index: number): void
  markValid(index: number): void
  getInvalidOptions(): number[]
  info(): DiscreteSettingInfo
}

export interface ContinuousSetting {
  readonly kind: 'continuous'
  readonly deviceId: string
  readonly settingId: number
  readonly name: string
  readonly parent: SettingParent
  getValue(): Promise<number>
  setValue(value: number): Promise<void>
  getHardwareLimits(): Limits
  getSoftLimits(): Limits
  setSoftLimits(limits: Limits): void
  info(): ContinuousSettingInfo
}

export type Setting = DiscreteSetting | ContinuousSetting

// ============================================================================
// Device
// ============================================================================

export interface DeviceInfo {
  id: string
  name: string
  deviceType: string
  connected: boolean
  detectors: DetectorInfo[]
  actuators: ActuatorInfo[]
  settings: SettingInfo[]
}

export interface Device {
  readonly id: string
  readonly name: string
  readonly deviceType: string
  connect(): Promise<void>
  disconnect(): Promise<void>
  isConnected(): boolean
  getDetectors(): ReadonlyMap<number, Detector>
  getActuators(): ReadonlyMap<number, Actuator>
  getDetector(detectorId: number): Detector
  getActuator(actuatorId: number): Actuator
  getSettings(): ReadonlyMap<number, Setting>
  getSetting(settingId: number): Setting
  info(): DeviceInfo
}

// ============================================================================
// References (how configurations point at capabilities)
// ============================================================================

export interface DetectorRef {
  deviceId: string
  detectorId: number
}

export interface ActuatorRef {
  deviceId: string
  actuatorId: number
}
