/**
 * Device Type Registry
 *
 * Maps a device type name to the factory that builds live devices of that
 * type. Constructor arguments are validated with the type's zod schema.
 */
import type { z } from 'zod'
import type { Device } from './types/capabilities'
import { NotFoundError, ValidationError } from './errors'
import { formatIssues } from './validation'

export interface DeviceType<TArgs> {
  name: string
  description: string
  args: Record<string, string>   // argument name -> human readable description
  argsSchema: z.ZodType<TArgs, z.ZodTypeDef, unknown>
  create(id: string, name: string, args: TArgs): Device
}

export interface DeviceTypeInfo {
  name: string
  description: string
  args: Record<string, string>
}

export class DeviceTypeRegistry {
  private types = new Map<string, DeviceType<unknown>>()

  register<TArgs>(type: DeviceType<TArgs>): void {
    if (this.types.has(type.name)) {
      throw new ValidationError(`Device type '${type.name}' is already registered`)
    }
    this.types.set(type.name, type)
  }

  get(name: string): DeviceType<unknown> {
    const type = this.types.get(name)
    if (!type) throw new NotFoundError('device type', name)
    return type
  }

  list(): DeviceTypeInfo[] {
    return [...this.types.values()].map(t => ({
      name: t.name,
      description: t.description,
      args: t.args,
    }))
  }

  /**
   * Build a device of the given type from raw (unvalidated) arguments
   */
  create(typeName: string, id: string, name: string, rawArgs: unknown): Device {
    const type = this.get(typeName)
    const parsed = type.argsSchema.safeParse(rawArgs ?? {})
    if (!parsed.success) {
      throw new ValidationError(`Invalid arguments for device type '${typeName}'`, formatIssues(parsed.error))
    }
    return type.create(id, name, parsed.data)
  }
}
