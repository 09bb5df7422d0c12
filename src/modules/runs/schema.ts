import { z } from 'zod'
import { RUN_STATES } from '../../core/types/measurement'
import { ReadingSchema } from '../devices/schema'

// --- Requests ---

export const RunParamsSchema = z.object({
  runId: z.string(),
})

export const StartRunSchema = z.object({
  type: z.string().min(1),
  // Validated by the measurement type's own schema
  config: z.record(z.string(), z.unknown()),
})

export const RunListQuerySchema = z.object({
  state: z.enum(RUN_STATES).optional(),
  type: z.string().optional(),
})

// --- Responses ---

export const DataPointSchema = z.object({
  step: z.number(),
  timestamp: z.string(),
  elapsedMs: z.number(),
  positions: z.array(
    z.object({
      deviceId: z.string(),
      actuatorId: z.number(),
      position: z.number(),
      label: z.string().nullable(),
    })
  ),
  readings: z.array(
    z.object({
      deviceId: z.string(),
      detectorId: z.number(),
      reading: ReadingSchema,
    })
  ),
})

const RunHeaderSchema = z.object({
  id: z.string(),
  measurementId: z.string(),
  measurementType: z.string(),
  config: z.record(z.string(), z.unknown()),
  state: z.enum(RUN_STATES),
  createdAt: z.string(),
  startedAt: z.string().nullable(),
  endedAt: z.string().nullable(),
  cancelRequested: z.boolean(),
  error: z
    .object({
      kind: z.string(),
      message: z.string(),
      step: z.number().nullable(),
    })
    .nullable(),
})

export const RunSummarySchema = RunHeaderSchema.extend({
  dataPointCount: z.number(),
})

export const RunSnapshotSchema = RunHeaderSchema.extend({
  dataPoints: z.array(DataPointSchema),
})

export const RunListResponseSchema = z.array(RunSummarySchema)

export const MeasurementTypeListResponseSchema = z.array(
  z.object({
    type: z.string(),
    description: z.string(),
  })
)
