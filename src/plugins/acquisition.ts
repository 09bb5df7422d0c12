import fp from 'fastify-plugin'
import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import { DeviceRegistry } from '../core/deviceRegistry'
import { DeviceTypeRegistry } from '../core/deviceTypes'
import { MeasurementEngine } from '../core/engine'
import { MeasurementTypeRegistry } from '../core/measurementTypes'
import { createMeasurementTypes } from '../core/measurements'
import { formatIssues } from '../core/validation'
import { ValidationError } from '../core/errors'
import { simulatedDeviceType } from '../devices/simulated'
import { AddDeviceSchema, type AddDeviceBody } from '../modules/devices/schema'

declare module 'fastify' {
  interface FastifyInstance {
    devices: DeviceRegistry
    deviceTypes: DeviceTypeRegistry
    measurementTypes: MeasurementTypeRegistry
    engine: MeasurementEngine
  }
}

export interface AcquisitionOptions {
  autoConnect: boolean
  devicesFile?: string
}

// Same entries as POST /api/devices
const DevicesFileSchema = z.array(AddDeviceSchema)

export async function readDevicesFile(path: string): Promise<AddDeviceBody[]> {
  const raw: unknown = JSON.parse(await readFile(path, 'utf-8'))
  const parsed = DevicesFileSchema.safeParse(raw)
  if (!parsed.success) {
    throw new ValidationError(`Invalid device configuration in ${path}`, formatIssues(parsed.error))
  }
  return parsed.data
}

/**
 * Device and measurement registries plus the engine, shared by every route
 */
export default fp<AcquisitionOptions>(
  async (fastify, opts) => {
    const devices = new DeviceRegistry(fastify.log)
    const deviceTypes = new DeviceTypeRegistry()
    deviceTypes.register(simulatedDeviceType)

    const measurementTypes = createMeasurementTypes()
    const engine = new MeasurementEngine({ devices, logger: fastify.log, autoConnect: opts.autoConnect })

    if (opts.devicesFile) {
      const entries = await readDevicesFile(opts.devicesFile)
      for (const entry of entries) {
        devices.register(deviceTypes.create(entry.deviceType, entry.id, entry.name ?? entry.id, entry.args))
        if (!entry.connect) continue
        try {
          await devices.get(entry.id).connect()
          fastify.log.info({ msg: `[DEVICE] Connected ${entry.id} at startup`, deviceId: entry.id })
        } catch (err) {
          // A device that is off at startup can still be connected later through the API
          const errorMessage = err instanceof Error ? err.message : 'Unknown error'
          fastify.log.error({ msg: `[DEVICE] Startup connection failed`, deviceId: entry.id, error: errorMessage })
        }
      }
      fastify.log.info({ msg: `[DEVICE] Loaded ${entries.length} device(s) from ${opts.devicesFile}` })
    }

    fastify.decorate('devices', devices)
    fastify.decorate('deviceTypes', deviceTypes)
    fastify.decorate('measurementTypes', measurementTypes)
    fastify.decorate('engine', engine)

    fastify.addHook('onClose', async instance => {
      await instance.engine.shutdown()
      await instance.devices.shutdown()
      instance.log.info({ msg: '[ENGINE] Acquisition stopped' })
    })
  },
  { name: 'acquisition' }
)
