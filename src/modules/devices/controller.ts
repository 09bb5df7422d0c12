import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify'
import { z } from 'zod'
import { DeviceService } from './service'
import { handleApiError } from '../../lib/httpErrors'
import {
  ActuatorListQuerySchema,
  ActuatorParamsSchema,
  AddDeviceSchema,
  DetectorParamsSchema,
  DeviceParamsSchema,
  InvalidOptionsSchema,
  SetPositionSchema,
  SetSettingValueSchema,
  SettingParamsSchema,
  SoftLimitsSchema,
} from './schema'

type DeviceParams = z.infer<typeof DeviceParamsSchema>
type DetectorParams = z.infer<typeof DetectorParamsSchema>
type ActuatorParams = z.infer<typeof ActuatorParamsSchema>
type SettingParams = z.infer<typeof SettingParamsSchema>
type ActuatorListQuery = z.infer<typeof ActuatorListQuerySchema>
type AddDeviceBody = z.infer<typeof AddDeviceSchema>
type SetPositionBody = z.infer<typeof SetPositionSchema>
type SoftLimitsBody = z.infer<typeof SoftLimitsSchema>
type InvalidOptionsBody = z.infer<typeof InvalidOptionsSchema>
type SetSettingValueBody = z.infer<typeof SetSettingValueSchema>

export class DeviceController {
  private service: DeviceService

  constructor(private fastify: FastifyInstance) {
    this.service = new DeviceService(fastify.devices, fastify.deviceTypes, fastify.engine.locks, fastify.log)
  }

  // ==========================================================================
  // Devices
  // ==========================================================================

  listDevices = async () => {
    return this.service.list()
  }

  listTypes = async () => {
    return this.service.listTypes()
  }

  getDevice = async (req: FastifyRequest<{ Params: DeviceParams }>) => {
    try {
      return this.service.get(req.params.deviceId)
    } catch (err) {
      throw handleApiError(this.fastify, err, 'Get device', { deviceId: req.params.deviceId })
    }
  }

  addDevice = async (req: FastifyRequest<{ Body: AddDeviceBody }>, reply: FastifyReply) => {
    try {
      const device = await this.service.add(req.body)
      this.fastify.log.info({
        msg: `[API] Device ${device.id} added (${device.deviceType})`,
        source: 'USER',
        deviceId: device.id,
      })
      reply.code(201)
      return device
    } catch (err) {
      throw handleApiError(this.fastify, err, 'Add device', { deviceId: req.body.id })
    }
  }

  removeDevice = async (req: FastifyRequest<{ Params: DeviceParams }>, reply: FastifyReply) => {
    const { deviceId } = req.params
    try {
      await this.service.remove(deviceId)
      this.fastify.log.info({ msg: `[API] Device ${deviceId} removed`, source: 'USER', deviceId })
      return reply.code(204).send()
    } catch (err) {
      throw handleApiError(this.fastify, err, 'Remove device', { deviceId })
    }
  }

  connect = async (req: FastifyRequest<{ Params: DeviceParams }>) => {
    try {
      return await this.service.connect(req.params.deviceId)
    } catch (err) {
      throw handleApiError(this.fastify, err, 'Connect', { deviceId: req.params.deviceId })
    }
  }

  disconnect = async (req: FastifyRequest<{ Params: DeviceParams }>) => {
    try {
      return await this.service.disconnect(req.params.deviceId)
    } catch (err) {
      throw handleApiError(this.fastify, err, 'Disconnect', { deviceId: req.params.deviceId })
    }
  }

  // ==========================================================================
  // Detectors
  // ==========================================================================

  listDetectors = async (req: FastifyRequest<{ Params: DeviceParams }>) => {
    try {
      return this.service.listDetectors(req.params.deviceId)
    } catch (err) {
      throw handleApiError(this.fastify, err, 'List detectors', { deviceId: req.params.deviceId })
    }
  }

  getDetector = async (req: FastifyRequest<{ Params: DetectorParams }>) => {
    const { deviceId, detectorId } = req.params
    try {
      return this.service.getDetector(deviceId, detectorId)
    } catch (err) {
      throw handleApiError(this.fastify, err, 'Get detector', { deviceId, detectorId })
    }
  }

  read = async (req: FastifyRequest<{ Params: DetectorParams }>) => {
    const { deviceId, detectorId } = req.params
    try {
      return await this.service.read(deviceId, detectorId)
    } catch (err) {
      throw handleApiError(this.fastify, err, 'Read', { deviceId, detectorId })
    }
  }

  // ==========================================================================
  // Actuators
  // ==========================================================================

  listActuators = async (req: FastifyRequest<{ Params: DeviceParams; Querystring: ActuatorListQuery }>) => {
    try {
      return this.service.listActuators(req.params.deviceId, req.query.kind)
    } catch (err) {
      throw handleApiError(this.fastify, err, 'List actuators', { deviceId: req.params.deviceId })
    }
  }

  getActuator = async (req: FastifyRequest<{ Params: ActuatorParams }>) => {
    const { deviceId, actuatorId } = req.params
    try {
      return this.service.getActuator(deviceId, actuatorId)
    } catch (err) {
      throw handleApiError(this.fastify, err, 'Get actuator', { deviceId, actuatorId })
    }
  }

  getPosition = async (req: FastifyRequest<{ Params: ActuatorParams }>) => {
    const { deviceId, actuatorId } = req.params
    try {
      return await this.service.getPosition(deviceId, actuatorId)
    } catch (err) {
      throw handleApiError(this.fastify, err, 'Get position', { deviceId, actuatorId })
    }
  }

  setPosition = async (req: FastifyRequest<{ Params: ActuatorParams; Body: SetPositionBody }>) => {
    const { deviceId, actuatorId } = req.params
    try {
      return await this.service.setPosition(deviceId, actuatorId, req.body.position)
    } catch (err) {
      throw handleApiError(this.fastify, err, 'Set position', { deviceId, actuatorId, target: req.body.position })
    }
  }

  setSoftLimits = async (req: FastifyRequest<{ Params: ActuatorParams; Body: SoftLimitsBody }>) => {
    const { deviceId, actuatorId } = req.params
    try {
      return this.service.setSoftLimits(deviceId, actuatorId, req.body)
    } catch (err) {
      throw handleApiError(this.fastify, err, 'Set soft limits', { deviceId, actuatorId })
    }
  }

  setInvalidOptions = async (req: FastifyRequest<{ Params: ActuatorParams; Body: InvalidOptionsBody }>) => {
    const { deviceId, actuatorId } = req.params
    try {
      return this.service.setInvalidOptions(deviceId, actuatorId, req.body.invalid)
    } catch (err) {
      throw handleApiError(this.fastify, err, 'Set invalid options', { deviceId, actuatorId })
    }
  }

  // ==========================================================================
  // Settings
  // ==========================================================================

  listSettings = async (req: FastifyRequest<{ Params: DeviceParams }>) => {
    try {
      return this.service.listSettings(req.params.deviceId)
    } catch (err) {
      throw handleApiError(this.fastify, err, 'List settings', { deviceId: req.params.deviceId })
    }
  }

  getSetting = async (req: FastifyRequest<{ Params: SettingParams }>) => {
    const { deviceId, settingId } = req.params
    try {
      return this.service.getSetting(deviceId, settingId)
    } catch (err) {
      throw handleApiError(this.fastify, err, 'Get setting', { deviceId, settingId })
    }
  }

  getSettingValue = async (req: FastifyRequest<{ Params: SettingParams }>) => {
    const { deviceId, settingId } = req.params
    try {
      return await this.service.getSettingValue(deviceId, settingId)
    } catch (err) {
      throw handleApiError(this.fastify, err, 'Get setting value', { deviceId, settingId })
    }
  }

  setSettingValue = async (req: FastifyRequest<{ Params: SettingParams; Body: SetSettingValueBody }>) => {
    const { deviceId, settingId } = req.params
    try {
      return await this.service.setSettingValue(deviceId, settingId, req.body.value)
    } catch (err) {
      throw handleApiError(this.fastify, err, 'Set setting value', { deviceId, settingId, target: req.body.value })
    }
  }

  setSettingSoftLimits = async (req: FastifyRequest<{ Params: SettingParams; Body: SoftLimitsBody }>) => {
    const { deviceId, settingId } = req.params
    try {
      return this.service.setSettingSoftLimits(deviceId, settingId, req.body)
    } catch (err) {
      throw handleApiError(this.fastify, err, 'Set setting soft limits', { deviceId, settingId })
    }
  }

  setSettingInvalidOptions = async (req: FastifyRequest<{ Params: SettingParams; Body: InvalidOptionsBody }>) => {
    const { deviceId, settingId } = req.params
    try {
      return this.service.setSettingInvalidOptions(deviceId, settingId, req.body.invalid)
    } catch (err) {
      throw handleApiError(this.fastify, err, 'Set setting invalid options', { deviceId, settingId })
    }
  }
}
