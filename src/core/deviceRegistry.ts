/**
 * Device Registry
 *
 * Process-wide mapping from device identity to live device instances.
 * Populated at startup (configuration file) or through the API, torn down
 * at shutdown.
 */
import type { Actuator, ActuatorRef, Detector, DetectorRef, Device } from './types/capabilities'
import type { Logger } from './types/logger'
import { NotFoundError, ValidationError } from './errors'

export class DeviceRegistry {
  private devices = new Map<string, Device>()

  constructor(private logger: Logger) {}

  register(device: Device): void {
    if (this.devices.has(device.id)) {
      throw new ValidationError(`Device '${device.id}' is already registered`)
    }
    this.devices.set(device.id, device)
    this.logger.info({
      msg: `[DEVICE] Registered ${device.id}`,
      deviceId: device.id,
      deviceType: device.deviceType,
      detectors: device.getDetectors().size,
      actuators: device.getActuators().size,
    })
  }

  has(deviceId: string): boolean {
    return this.devices.has(deviceId)
  }

  get(deviceId: string): Device {
    const device = this.devices.get(deviceId)
    if (!device) throw new NotFoundError('device', deviceId)
    return device
  }

  list(): Device[] {
    return [...this.devices.values()]
  }

  getDetector(ref: DetectorRef): Detector {
    return this.get(ref.deviceId).getDetector(ref.detectorId)
  }

  getActuator(ref: ActuatorRef): Actuator {
    return this.get(ref.deviceId).getActuator(ref.actuatorId)
  }

  /**
   * Disconnect and forget a device. ConnectionError from the disconnect
   * propagates and the device stays registered.
   */
  async remove(deviceId: string): Promise<void> {
    const device = this.get(deviceId)
    await device.disconnect()
    this.devices.delete(deviceId)
    this.logger.info({ msg: `[DEVICE] Removed ${deviceId}`, deviceId })
  }

  /**
   * Disconnect every device; failures are logged so one device cannot
   * keep the others connected.
   */
  async shutdown(): Promise<void> {
    for (const device of this.devices.values()) {
      if (!device.isConnected()) continue
      try {
        await device.disconnect()
      } catch (err) {
        const errorMessage = err instanceof Error ? err.message : 'Unknown error'
        this.logger.error({ msg: `[DEVICE] Disconnect failed during shutdown`, deviceId: device.id, error: errorMessage })
      }
    }
    this.devices.clear()
  }
}
