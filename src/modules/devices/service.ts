/**
 * Device Service
 *
 * Manual operations on devices and their capabilities. Every call that
 * touches hardware takes the device lock without waiting: a device held by a
 * run, or waited for by a pending one, answers with DeviceBusyError instead
 * of queueing.
 */
import type { DeviceRegistry } from '../../core/deviceRegistry'
import type { DeviceTypeInfo, DeviceTypeRegistry } from '../../core/deviceTypes'
import type { DeviceLocks } from '../../core/deviceLocks'
import type {
  Actuator,
  ActuatorInfo,
  DetectorInfo,
  DeviceInfo,
  DiscreteActuator,
  ContinuousActuator,
  Reading,
  Setting,
  SettingInfo,
} from '../../core/types/capabilities'
import type { PositionRecord } from '../../core/types/measurement'
import type { Logger } from '../../core/types/logger'
import { DeviceBusyError, InvalidPositionError, ValidationError } from '../../core/errors'
import { resolveTarget } from '../../core/measurements'
import type { AddDeviceBody, SoftLimitsBody } from './schema'

export type ActuatorKind = Actuator['kind']

export interface SettingValue {
  deviceId: string
  settingId: number
  value: number
  label: string | null    // option label for discrete settings
}

export class DeviceService {
  constructor(
    private devices: DeviceRegistry,
    private deviceTypes: DeviceTypeRegistry,
    private locks: DeviceLocks,
    private logger: Logger
  ) {}

  // ==========================================================================
  // Devices
  // ==========================================================================

  list(): DeviceInfo[] {
    return this.devices.list().map(d => d.info())
  }

  listTypes(): DeviceTypeInfo[] {
    return this.deviceTypes.list()
  }

  get(deviceId: string): DeviceInfo {
    return this.devices.get(deviceId).info()
  }

  /**
   * Build and register a device. When asked to connect, a device that fails
   * to connect is not registered.
   */
  async add(entry: AddDeviceBody): Promise<DeviceInfo> {
    if (this.devices.has(entry.id)) {
      throw new ValidationError(`Device '${entry.id}' is already registered`)
    }
    const device = this.deviceTypes.create(entry.deviceType, entry.id, entry.name ?? entry.id, entry.args)
    if (entry.connect) await device.connect()
    this.devices.register(device)
    return device.info()
  }

  async remove(deviceId: string): Promise<void> {
    await this.withDevice(deviceId, () => this.devices.remove(deviceId))
  }

  async connect(deviceId: string): Promise<DeviceInfo> {
    const device = this.devices.get(deviceId)
    await this.withDevice(deviceId, () => device.connect())
    this.logger.info({ msg: `[DEVICE] Connected ${deviceId}`, source: 'USER', deviceId })
    return device.info()
  }

  async disconnect(deviceId: string): Promise<DeviceInfo> {
    const device = this.devices.get(deviceId)
    await this.withDevice(deviceId, () => device.disconnect())
    this.logger.info({ msg: `[DEVICE] Disconnected ${deviceId}`, source: 'USER', deviceId })
    return device.info()
  }

  // ==========================================================================
  // Detectors
  // ==========================================================================

  listDetectors(deviceId: string): DetectorInfo[] {
    return [...this.devices.get(deviceId).getDetectors().values()].map(d => d.info())
  }

  getDetector(deviceId: string, detectorId: number): DetectorInfo {
    return this.devices.getDetector({ deviceId, detectorId }).info()
  }

  async read(deviceId: string, detectorId: number): Promise<Reading> {
    const detector = this.devices.getDetector({ deviceId, detectorId })
    return this.withDevice(deviceId, () => detector.read())
  }

  // ==========================================================================
  // Actuators
  // ==========================================================================

  listActuators(deviceId: string, kind?: ActuatorKind): ActuatorInfo[] {
    return [...this.devices.get(deviceId).getActuators().values()]
      .filter(a => kind === undefined || a.kind === kind)
      .map(a => a.info())
  }

  getActuator(deviceId: string, actuatorId: number): ActuatorInfo {
    return this.devices.getActuator({ deviceId, actuatorId }).info()
  }

  async getPosition(deviceId: string, actuatorId: number): Promise<PositionRecord> {
    const actuator = this.devices.getActuator({ deviceId, actuatorId })
    const position = await this.withDevice(deviceId, () => actuator.getPosition())
    return toPositionRecord(actuator, position)
  }

  /**
   * Move an actuator. Discrete targets may be an option label.
   */
  async setPosition(deviceId: string, actuatorId: number, target: number | string): Promise<PositionRecord> {
    const actuator = this.devices.getActuator({ deviceId, actuatorId })
    const position = resolveTarget(actuator, target)

    await this.withDevice(deviceId, () => actuator.setPosition(position))
    this.logger.info({
      msg: `[DEVICE] Moved ${deviceId}/${actuatorId} to ${JSON.stringify(target)}`,
      source: 'USER',
      deviceId,
      actuatorId,
      position,
    })
    return toPositionRecord(actuator, position)
  }

  setSoftLimits(deviceId: string, actuatorId: number, limits: SoftLimitsBody): ActuatorInfo {
    const actuator = this.continuous(deviceId, actuatorId)
    actuator.setSoftLimits([limits.lower, limits.upper])
    this.logger.info({
      msg: `[DEVICE] Soft limits of ${deviceId}/${actuatorId} set to [${limits.lower}, ${limits.upper}]`,
      source: 'USER',
      deviceId,
      actuatorId,
    })
    return actuator.info()
  }

  /**
   * Replace the set of temporarily invalid options of a discrete actuator
   */
  setInvalidOptions(deviceId: string, actuatorId: number, invalid: number[]): ActuatorInfo {
    const actuator = this.discrete(deviceId, actuatorId)
    const count = actuator.getPositionValues().length
    const outOfRange = invalid.find(index => index >= count)
    if (outOfRange !== undefined) {
      throw new InvalidPositionError(actuator.name, outOfRange, 'out_of_range')
    }

    for (const index of actuator.getInvalidOptions()) actuator.markValid(index)
    for (const index of invalid) actuator.markInvalid(index)
    return actuator.info()
  }

  // ==========================================================================
  // Settings
  // ==========================================================================

  listSettings(deviceId: string): SettingInfo[] {
    return [...this.devices.get(deviceId).getSettings().values()].map(s => s.info())
  }

  getSetting(deviceId: string, settingId: number): SettingInfo {
    return this.devices.get(deviceId).getSetting(settingId).info()
  }

  async getSettingValue(deviceId: string, settingId: number): Promise<SettingValue> {
    const setting = this.devices.get(deviceId).getSetting(settingId)
    const value = await this.withDevice(deviceId, () => setting.getValue())
    return toSettingValue(setting, value)
  }

  /**
   * Change a setting. Discrete targets may be an option label.
   */
  async setSettingValue(deviceId: string, settingId: number, target: number | string): Promise<SettingValue> {
    const setting = this.devices.get(deviceId).getSetting(settingId)
    const value = resolveSettingValue(setting, target)

    await this.withDevice(deviceId, () => setting.setValue(value))
    this.logger.info({
      msg: `[DEVICE] Setting ${setting.name} of ${deviceId} set to ${JSON.stringify(target)}`,
      source: 'USER',
      deviceId,
      settingId,
      value,
    })
    return toSettingValue(setting, value)
  }

  setSettingSoftLimits(deviceId: string, settingId: number, limits: SoftLimitsBody): SettingInfo {
    const setting = this.devices.get(deviceId).getSetting(settingId)
    if (setting.kind !== 'continuous') {
      throw new ValidationError(`Setting ${setting.name} is not continuous`)
    }
    setting.setSoftLimits([limits.lower, limits.upper])
    return setting.info()
  }

  setSettingInvalidOptions(deviceId: string, settingId: number, invalid: number[]): SettingInfo {
    const setting = this.devices.get(deviceId).getSetting(settingId)
    if (setting.kind !== 'discrete') {
      throw new ValidationError(`Setting ${setting.name} is not discrete`)
    }
    const count = setting.getValueOptions().length
    const outOfRange = invalid.find(index => index >= count)
    if (outOfRange !== undefined) {
      throw new InvalidPositionError(setting.name, outOfRange, 'out_of_range', 'setting')
    }

    for (const index of setting.getInvalidOptions()) setting.markValid(index)
    for (const index of invalid) setting.markInvalid(index)
    return setting.info()
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private async withDevice<T>(deviceId: string, op: () => Promise<T>): Promise<T> {
    const release = this.locks.tryAcquire([deviceId])
    if (!release) throw new DeviceBusyError(deviceId)
    try {
      return await op()
    } finally {
      release()
    }
  }

  private continuous(deviceId: string, actuatorId: number): ContinuousActuator {
    const actuator = this.devices.getActuator({ deviceId, actuatorId })
    if (actuator.kind !== 'continuous') {
      throw new ValidationError(`Actuator ${actuator.name} is not continuous`)
    }
    return actuator
  }

  private discrete(deviceId: string, actuatorId: number): DiscreteActuator {
    const actuator = this.devices.getActuator({ deviceId, actuatorId })
    if (actuator.kind !== 'discrete') {
      throw new ValidationError(`Actuator ${actuator.name} is not discrete`)
    }
    return actuator
  }
}

function toPositionRecord(actuator: Actuator, position: number): PositionRecord {
  const label = actuator.kind === 'discrete' ? (actuator.getPositionValues()[position] ?? null) : null
  return { deviceId: actuator.deviceId, actuatorId: actuator.actuatorId, position, label }
}

function resolveSettingValue(setting: Setting, target: number | string): number {
  if (typeof target === 'number') return target
  if (setting.kind === 'continuous') {
    throw new InvalidPositionError(setting.name, target, 'not_a_number', 'setting')
  }
  const index = setting.getValueOptions().indexOf(target)
  if (index < 0) throw new InvalidPositionError(setting.name, target, 'out_of_range', 'setting')
  return index
}

function toSettingValue(setting: Setting, value: number): SettingValue {
  const label = setting.kind === 'discrete' ? (setting.getValueOptions()[value] ?? null) : null
  return { deviceId: setting.deviceId, settingId: setting.settingId, value, label }
}
