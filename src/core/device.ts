import type { Actuator, Detector, Device, DeviceInfo, Setting } from './types/capabilities'
import { ConnectionError, NotFoundError, ValidationError } from './errors'

/** Driver failures during connect or disconnect always surface as ConnectionError */
function toConnectionError(err: unknown, deviceId: string): ConnectionError {
  if (err instanceof ConnectionError) return err
  const message = err instanceof Error ? err.message : String(err)
  return new ConnectionError(deviceId, 'failed', message, { cause: err })
}

/**
 * Base class for devices.
 *
 * Subclasses build their capabilities in the constructor through
 * `addDetector`/`addActuator`/`addSetting` and implement the transport hooks. After
 * construction the capability set is frozen.
 */
export abstract class AbstractDevice implements Device {
  private readonly detectors = new Map<number, Detector>()
  private readonly actuators = new Map<number, Actuator>()
  private readonly settings = new Map<number, Setting>()
  private connected = false

  constructor(
    readonly id: string,
    readonly name: string,
    readonly deviceType: string
  ) {}

  /** Transport hook: open communication, throw ConnectionError on failure */
  protected abstract open(): Promise<void>

  /** Transport hook: release communication */
  protected abstract close(): Promise<void>

  protected addDetector(detector: Detector): void {
    if (this.detectors.has(detector.detectorId)) {
      throw new ValidationError(`Duplicate detector ID ${detector.detectorId} on device ${this.id}`)
    }
    this.detectors.set(detector.detectorId, detector)
  }

  protected addActuator(actuator: Actuator): void {
    if (this.actuators.has(actuator.actuatorId)) {
      throw new ValidationError(`Duplicate actuator ID ${actuator.actuatorId} on device ${this.id}`)
    }
    this.actuators.set(actuator.actuatorId, actuator)
  }

  protected addSetting(setting: Setting): void {
    if (this.settings.has(setting.settingId)) {
      throw new ValidationError(`Duplicate setting ID ${setting.settingId} on device ${this.id}`)
    }
    this.settings.set(setting.settingId, setting)
  }

  async connect(): Promise<void> {
    if (this.connected) return
    try {
      await this.open()
    } catch (err) {
      throw toConnectionError(err, this.id)
    }
    this.connected = true
  }

  async disconnect(): Promise<void> {
    if (!this.connected) return
    try {
      await this.close()
    } catch (err) {
      throw toConnectionError(err, this.id)
    }
    this.connected = false
  }

  isConnected(): boolean {
    return this.connected
  }

  getDetectors(): ReadonlyMap<number, Detector> {
    return this.detectors
  }

  getActuators(): ReadonlyMap<number, Actuator> {
    return this.actuators
  }

  getDetector(detectorId: number): Detector {
    const detector = this.detectors.get(detectorId)
    if (!detector) throw new NotFoundError('detector', `${this.id}/${detectorId}`)
    return detector
  }

  getActuator(actuatorId: number): Actuator {
    const actuator = this.actuators.get(actuatorId)
    if (!actuator) throw new NotFoundError('actuator', `${this.id}/${actuatorId}`)
    return actuator
  }

  getSettings(): ReadonlyMap<number, Setting> {
    return this.settings
  }

  getSetting(settingId: number): Setting {
    const setting = this.settings.get(settingId)
    if (!setting) throw new NotFoundError('setting', `${this.id}/${settingId}`)
    return setting
  }

  info(): DeviceInfo {
    return {
      id: this.id,
      name: this.name,
      deviceType: this.deviceType,
      connected: this.connected,
      detectors: [...this.detectors.values()].map(d => d.info()),
      actuators: [...this.actuators.values()].map(a => a.info()),
      settings: [...this.settings.values()].map(s => s.info()),
    }
  }
}
