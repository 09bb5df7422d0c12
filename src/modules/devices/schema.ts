import { z } from 'zod'

// --- Params ---

export const DeviceParamsSchema = z.object({
  deviceId: z.string(),
})

export const DetectorParamsSchema = DeviceParamsSchema.extend({
  detectorId: z.coerce.number().int().nonnegative(),
})

export const ActuatorParamsSchema = DeviceParamsSchema.extend({
  actuatorId: z.coerce.number().int().nonnegative(),
})

export const SettingParamsSchema = DeviceParamsSchema.extend({
  settingId: z.coerce.number().int().nonnegative(),
})

export const ActuatorListQuerySchema = z.object({
  kind: z.enum(['discrete', 'continuous']).optional(),
})

// --- Bodies ---

export const AddDeviceSchema = z.object({
  id: z.string().min(1),
  deviceType: z.string().min(1),
  name: z.string().optional(),
  args: z.record(z.string(), z.unknown()).default({}),
  connect: z.boolean().default(false),
})

export const SetPositionSchema = z.object({
  // Option index or label for discrete actuators, value for continuous ones
  position: z.union([z.number(), z.string()]),
})

export const SetSettingValueSchema = z.object({
  // Option index or label for discrete settings
  value: z.union([z.number(), z.string()]),
})

export const SoftLimitsSchema = z.object({
  lower: z.number().nullable(),
  upper: z.number().nullable(),
})

export const InvalidOptionsSchema = z.object({
  invalid: z.array(z.number().int().nonnegative()),
})

// --- Responses ---

const LimitsSchema = z.tuple([z.number().nullable(), z.number().nullable()])

export const DetectorInfoSchema = z.object({
  deviceId: z.string(),
  detectorId: z.number(),
  name: z.string(),
  dimensionality: z.number(),
  unit: z.string().nullable(),
})

export const ActuatorInfoSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('discrete'),
    deviceId: z.string(),
    actuatorId: z.number(),
    name: z.string(),
    options: z.array(z.string()),
    invalidOptions: z.array(z.number()),
  }),
  z.object({
    kind: z.literal('continuous'),
    deviceId: z.string(),
    actuatorId: z.number(),
    name: z.string(),
    unit: z.string().nullable(),
    hardwareLimits: LimitsSchema,
    softwareLimits: LimitsSchema,
  }),
])

const SettingParentSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('device') }),
  z.object({ kind: z.literal('detector'), id: z.number() }),
  z.object({ kind: z.literal('actuator'), id: z.number() }),
])

export const SettingInfoSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('discrete'),
    deviceId: z.string(),
    settingId: z.number(),
    name: z.string(),
    parent: SettingParentSchema,
    options: z.array(z.string()),
    invalidOptions: z.array(z.number()),
  }),
  z.object({
    kind: z.literal('continuous'),
    deviceId: z.string(),
    settingId: z.number(),
    name: z.string(),
    parent: SettingParentSchema,
    unit: z.string().nullable(),
    hardwareLimits: LimitsSchema,
    softwareLimits: LimitsSchema,
  }),
])

export const DeviceInfoSchema = z.object({
  id: z.string(),
  name: z.string(),
  deviceType: z.string(),
  connected: z.boolean(),
  detectors: z.array(DetectorInfoSchema),
  actuators: z.array(ActuatorInfoSchema),
  settings: z.array(SettingInfoSchema),
})

export const DeviceListResponseSchema = z.array(DeviceInfoSchema)

export const DeviceTypeListResponseSchema = z.array(
  z.object({
    name: z.string(),
    description: z.string(),
    args: z.record(z.string(), z.string()),
  })
)

export const ReadingSchema = z.object({
  dimensionality: z.number(),
  shape: z.array(z.number()),
  values: z.unknown().describe('A number, or nested arrays of numbers as deep as the dimensionality'),
  unit: z.string().nullable(),
})

export const PositionResponseSchema = z.object({
  deviceId: z.string(),
  actuatorId: z.number(),
  position: z.number(),
  label: z.string().nullable(),
})

export const SettingValueResponseSchema = z.object({
  deviceId: z.string(),
  settingId: z.number(),
  value: z.number(),
  label: z.string().nullable(),
})

export type AddDeviceBody = z.infer<typeof AddDeviceSchema>
export type SoftLimitsBody = z.infer<typeof SoftLimitsSchema>
