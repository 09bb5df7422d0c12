/**
 * Measurement Type Registry
 *
 * Maps a measurement type tag to its configuration schema and factory.
 * User-defined measurements plug in here.
 */
import type { z } from 'zod'
import type { Measurement } from './measurement'
import type { DeviceRegistry } from './deviceRegistry'
import { NotFoundError, ValidationError } from './errors'
import { formatIssues } from './validation'

export interface MeasurementType<TConfig> {
  type: string
  description: string
  schema: z.ZodType<TConfig, z.ZodTypeDef, unknown>
  /** Resolve capability references and build the measurement */
  create(config: TConfig, devices: DeviceRegistry): Measurement
}

export interface MeasurementTypeInfo {
  type: string
  description: string
}

export class MeasurementTypeRegistry {
  private types = new Map<string, MeasurementType<unknown>>()

  register<TConfig>(definition: MeasurementType<TConfig>): void {
    if (this.types.has(definition.type)) {
      throw new ValidationError(`Measurement type '${definition.type}' is already registered`)
    }
    this.types.set(definition.type, definition)
  }

  get(type: string): MeasurementType<unknown> {
    const definition = this.types.get(type)
    if (!definition) throw new NotFoundError('measurement type', type)
    return definition
  }

  list(): MeasurementTypeInfo[] {
    return [...this.types.values()].map(t => ({ type: t.type, description: t.description }))
  }

  build(type: string, rawConfig: unknown, devices: DeviceRegistry): Measurement {
    const definition = this.get(type)
    const parsed = definition.schema.safeParse(rawConfig)
    if (!parsed.success) {
      throw new ValidationError(`Invalid configuration for '${type}'`, formatIssues(parsed.error))
    }
    return definition.create(parsed.data, devices)
  }
}
