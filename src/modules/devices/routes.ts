import { FastifyPluginAsync } from 'fastify'
import { ZodTypeProvider } from 'fastify-type-provider-zod'
import { z } from 'zod'
import { DeviceController } from './controller'
import {
  ActuatorInfoSchema,
  ActuatorListQuerySchema,
  ActuatorParamsSchema,
  AddDeviceSchema,
  DetectorInfoSchema,
  DetectorParamsSchema,
  DeviceInfoSchema,
  DeviceListResponseSchema,
  DeviceParamsSchema,
  DeviceTypeListResponseSchema,
  InvalidOptionsSchema,
  PositionResponseSchema,
  ReadingSchema,
  SetPositionSchema,
  SetSettingValueSchema,
  SettingInfoSchema,
  SettingParamsSchema,
  SettingValueResponseSchema,
  SoftLimitsSchema,
} from './schema'

const devicesRoutes: FastifyPluginAsync = async fastify => {
  const app = fastify.withTypeProvider<ZodTypeProvider>()
  const controller = new DeviceController(fastify)

  // ==========================================================================
  // Devices
  // ==========================================================================

  // GET /devices - List registered devices
  app.get(
    '/devices',
    {
      schema: {
        tags: ['Devices'],
        summary: 'List registered devices',
        response: { 200: DeviceListResponseSchema },
      },
    },
    controller.listDevices
  )

  // GET /devices/types - List device types and their arguments
  app.get(
    '/devices/types',
    {
      schema: {
        tags: ['Devices'],
        summary: 'List device types and their constructor arguments',
        response: { 200: DeviceTypeListResponseSchema },
      },
    },
    controller.listTypes
  )

  // POST /devices - Register a device
  app.post(
    '/devices',
    {
      schema: {
        tags: ['Devices'],
        summary: 'Build a device from its type and register it',
        body: AddDeviceSchema,
        response: { 201: DeviceInfoSchema },
      },
    },
    controller.addDevice
  )

  // GET /devices/:deviceId - Device with its capabilities
  app.get(
    '/devices/:deviceId',
    {
      schema: {
        tags: ['Devices'],
        summary: 'Get a device and its capabilities',
        params: DeviceParamsSchema,
        response: { 200: DeviceInfoSchema },
      },
    },
    controller.getDevice
  )

  // DELETE /devices/:deviceId - Disconnect and unregister
  app.delete(
    '/devices/:deviceId',
    {
      schema: {
        tags: ['Devices'],
        summary: 'Disconnect and unregister a device',
        params: DeviceParamsSchema,
        response: { 204: z.null() },
      },
    },
    controller.removeDevice
  )

  // PUT /devices/:deviceId/connect
  app.put(
    '/devices/:deviceId/connect',
    {
      schema: {
        tags: ['Devices'],
        summary: 'Open communication with the device',
        params: DeviceParamsSchema,
        response: { 200: DeviceInfoSchema },
      },
    },
    controller.connect
  )

  // PUT /devices/:deviceId/disconnect
  app.put(
    '/devices/:deviceId/disconnect',
    {
      schema: {
        tags: ['Devices'],
        summary: 'Release communication with the device',
        params: DeviceParamsSchema,
        response: { 200: DeviceInfoSchema },
      },
    },
    controller.disconnect
  )

  // ==========================================================================
  // Detectors
  // ==========================================================================

  app.get(
    '/devices/:deviceId/detectors',
    {
      schema: {
        tags: ['Detectors'],
        summary: 'List the detectors of a device',
        params: DeviceParamsSchema,
        response: { 200: z.array(DetectorInfoSchema) },
      },
    },
    controller.listDetectors
  )

  app.get(
    '/devices/:deviceId/detectors/:detectorId',
    {
      schema: {
        tags: ['Detectors'],
        summary: 'Get a detector',
        params: DetectorParamsSchema,
        response: { 200: DetectorInfoSchema },
      },
    },
    controller.getDetector
  )

  // POST .../read - Acquire one reading outside of any run
  app.post(
    '/devices/:deviceId/detectors/:detectorId/read',
    {
      schema: {
        tags: ['Detectors'],
        summary: 'Acquire one reading',
        params: DetectorParamsSchema,
        response: { 200: ReadingSchema },
      },
    },
    controller.read
  )

  // ==========================================================================
  // Actuators
  // ==========================================================================

  app.get(
    '/devices/:deviceId/actuators',
    {
      schema: {
        tags: ['Actuators'],
        summary: 'List the actuators of a device',
        params: DeviceParamsSchema,
        querystring: ActuatorListQuerySchema,
        response: { 200: z.array(ActuatorInfoSchema) },
      },
    },
    controller.listActuators
  )

  app.get(
    '/devices/:deviceId/actuators/:actuatorId',
    {
      schema: {
        tags: ['Actuators'],
        summary: 'Get an actuator',
        params: ActuatorParamsSchema,
        response: { 200: ActuatorInfoSchema },
      },
    },
    controller.getActuator
  )

  app.get(
    '/devices/:deviceId/actuators/:actuatorId/position',
    {
      schema: {
        tags: ['Actuators'],
        summary: 'Read the current position',
        params: ActuatorParamsSchema,
        response: { 200: PositionResponseSchema },
      },
    },
    controller.getPosition
  )

  app.put(
    '/devices/:deviceId/actuators/:actuatorId/position',
    {
      schema: {
        tags: ['Actuators'],
        summary: 'Move to a position (option index or label for discrete actuators)',
        params: ActuatorParamsSchema,
        body: SetPositionSchema,
        response: { 200: PositionResponseSchema },
      },
    },
    controller.setPosition
  )

  app.put(
    '/devices/:deviceId/actuators/:actuatorId/soft-limits',
    {
      schema: {
        tags: ['Actuators'],
        summary: 'Set the software limits of a continuous actuator',
        params: ActuatorParamsSchema,
        body: SoftLimitsSchema,
        response: { 200: ActuatorInfoSchema },
      },
    },
    controller.setSoftLimits
  )

  app.put(
    '/devices/:deviceId/actuators/:actuatorId/invalid-options',
    {
      schema: {
        tags: ['Actuators'],
        summary: 'Replace the temporarily invalid options of a discrete actuator',
        params: ActuatorParamsSchema,
        body: InvalidOptionsSchema,
        response: { 200: ActuatorInfoSchema },
      },
    },
    controller.setInvalidOptions
  )

  // ==========================================================================
  // Settings
  // ==========================================================================

  app.get(
    '/devices/:deviceId/settings',
    {
      schema: {
        tags: ['Settings'],
        summary: 'List the settings of a device and of its capabilities',
        params: DeviceParamsSchema,
        response: { 200: z.array(SettingInfoSchema) },
      },
    },
    controller.listSettings
  )

  app.get(
    '/devices/:deviceId/settings/:settingId',
    {
      schema: {
        tags: ['Settings'],
        summary: 'Get a setting',
        params: SettingParamsSchema,
        response: { 200: SettingInfoSchema },
      },
    },
    controller.getSetting
  )

  app.get(
    '/devices/:deviceId/settings/:settingId/value',
    {
      schema: {
        tags: ['Settings'],
        summary: 'Read the current value of a setting',
        params: SettingParamsSchema,
        response: { 200: SettingValueResponseSchema },
      },
    },
    controller.getSettingValue
  )

  app.put(
    '/devices/:deviceId/settings/:settingId/value',
    {
      schema: {
        tags: ['Settings'],
        summary: 'Change a setting (option index or label for discrete settings)',
        params: SettingParamsSchema,
        body: SetSettingValueSchema,
        response: { 200: SettingValueResponseSchema },
      },
    },
    controller.setSettingValue
  )

  app.put(
    '/devices/:deviceId/settings/:settingId/soft-limits',
    {
      schema: {
        tags: ['Settings'],
        summary: 'Set the software limits of a continuous setting',
        params: SettingParamsSchema,
        body: SoftLimitsSchema,
        response: { 200: SettingInfoSchema },
      },
    },
    controller.setSettingSoftLimits
  )

  app.put(
    '/devices/:deviceId/settings/:settingId/invalid-options',
    {
      schema: {
        tags: ['Settings'],
        summary: 'Replace the temporarily invalid options of a discrete setting',
        params: SettingParamsSchema,
        body: InvalidOptionsSchema,
        response: { 200: SettingInfoSchema },
      },
    },
    controller.setSettingInvalidOptions
  )
}

export default devicesRoutes
