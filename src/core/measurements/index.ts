import { z } from 'zod'
import { MeasurementTypeRegistry, type MeasurementType } from '../measurementTypes'
import { TimeSeriesMeasurement } from './timeSeries'
import { NdMapMeasurement } from './ndMap'

export { TimeSeriesMeasurement } from './timeSeries'
export { NdMapMeasurement, resolveTarget } from './ndMap'

// ============================================================================
// Configuration schemas
// ============================================================================

export const DetectorRefSchema = z.object({
  deviceId: z.string().min(1),
  detectorId: z.number().int().nonnegative(),
})

export const ActuatorRefSchema = z.object({
  deviceId: z.string().min(1),
  actuatorId: z.number().int().nonnegative(),
})

export const TimeSeriesConfigSchema = z.object({
  detectors: z.array(DetectorRefSchema).min(1),
  count: z.number().int().positive().optional(),
  intervalSeconds: z.number().nonnegative().default(0),
})

export const NdMapConfigSchema = z
  .object({
    detectors: z.array(DetectorRefSchema).min(1),
    axes: z
      .array(
        z.object({
          actuator: ActuatorRefSchema,
          positions: z.array(z.union([z.number(), z.string()])).min(1),
        })
      )
      .min(1),
    mode: z.enum(['grid', 'zip']).default('grid'),
  })
  .refine(c => c.mode === 'grid' || new Set(c.axes.map(a => a.positions.length)).size === 1, {
    message: 'zip mode needs axes of equal length',
    path: ['axes'],
  })

export type TimeSeriesConfig = z.infer<typeof TimeSeriesConfigSchema>
export type NdMapConfig = z.infer<typeof NdMapConfigSchema>

// ============================================================================
// Built-in types
// ============================================================================

export const timeSeriesType: MeasurementType<TimeSeriesConfig> = {
  type: 'time-series',
  description: 'Reads detectors at a fixed interval, for a fixed count or until cancelled',
  schema: TimeSeriesConfigSchema,
  create: (config, devices) =>
    new TimeSeriesMeasurement({
      detectors: config.detectors.map(ref => devices.getDetector(ref)),
      count: config.count,
      intervalSeconds: config.intervalSeconds,
    }),
}

export const ndMapType: MeasurementType<NdMapConfig> = {
  type: 'nd-map',
  description: 'Moves actuators over target positions (grid or zipped) and reads detectors at each step',
  schema: NdMapConfigSchema,
  create: (config, devices) =>
    new NdMapMeasurement({
      detectors: config.detectors.map(ref => devices.getDetector(ref)),
      axes: config.axes.map(axis => ({
        actuator: devices.getActuator(axis.actuator),
        positions: axis.positions,
      })),
      mode: config.mode,
    }),
}

export function createMeasurementTypes(): MeasurementTypeRegistry {
  const types = new MeasurementTypeRegistry()
  types.register(timeSeriesType)
  types.register(ndMapType)
  return types
}
