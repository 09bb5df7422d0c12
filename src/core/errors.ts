/**
 * Error taxonomy shared by devices, the engine and the API layer.
 *
 * Every error carries a stable `kind` so that runs can record it and the
 * transport can map it to a status code without instanceof chains.
 */

export type ErrorKind =
  | 'ConnectionError'
  | 'HardwareError'
  | 'DeviceBusyError'
  | 'InvalidPositionError'
  | 'NotFoundError'
  | 'ValidationError'
  | 'RunActiveError'

export abstract class MdaError extends Error {
  abstract readonly kind: ErrorKind

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

// ============================================================================
// Device errors
// ============================================================================

export type ConnectionErrorCode = 'timeout' | 'not_found' | 'in_use' | 'failed'

export class ConnectionError extends MdaError {
  readonly kind = 'ConnectionError'

  constructor(
    readonly deviceId: string,
    readonly code: ConnectionErrorCode,
    detail = '',
    options?: { cause?: unknown }
  ) {
    super(`Device ${deviceId} connection failed (${code})${detail ? `: ${detail}` : ''}`, options)
  }
}

export class HardwareError extends MdaError {
  readonly kind: ErrorKind = 'HardwareError'

  constructor(
    readonly deviceId: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
  }
}

export class DeviceBusyError extends HardwareError {
  readonly kind = 'DeviceBusyError'

  constructor(deviceId: string) {
    super(deviceId, `Device ${deviceId} is busy`)
  }
}

export type InvalidPositionReason =
  | 'out_of_range'
  | 'hardware_limit'
  | 'software_limit'
  | 'invalid_option'
  | 'not_a_number'

/** Actuator positions and setting values share the same domain checks */
export type PositionSubject = 'actuator' | 'setting'

export class InvalidPositionError extends MdaError {
  readonly kind = 'InvalidPositionError'

  constructor(
    readonly capability: string,
    readonly target: number | string,
    readonly reason: InvalidPositionReason,
    readonly subject: PositionSubject = 'actuator'
  ) {
    const what = subject === 'setting' ? 'value' : 'position'
    super(`Invalid ${what} ${JSON.stringify(target)} for ${subject} ${capability} (${reason})`)
  }
}

// ============================================================================
// Control errors
// ============================================================================

export type EntityKind = 'device' | 'device type' | 'detector' | 'actuator' | 'setting' | 'run' | 'measurement type'

export class NotFoundError extends MdaError {
  readonly kind = 'NotFoundError'

  constructor(
    readonly entity: EntityKind,
    readonly id: string | number
  ) {
    super(`No ${entity} with ID ${id}`)
  }
}

export class ValidationError extends MdaError {
  readonly kind = 'ValidationError'

  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message)
  }
}

export class RunActiveError extends MdaError {
  readonly kind = 'RunActiveError'

  constructor(readonly runId: string) {
    super(`Run ${runId} is still active`)
  }
}

/**
 * Normalise anything thrown by a driver into a taxonomy error.
 * Foreign exceptions are treated as hardware failures of the given device.
 */
export function toMdaError(err: unknown, deviceId: string): MdaError {
  if (err instanceof MdaError) return err
  const message = err instanceof Error ? err.message : String(err)
  return new HardwareError(deviceId, message, { cause: err })
}
