import type { FastifyInstance } from 'fastify'
import { MdaError } from '../core/errors'

/**
 * Translate a domain error into the matching @fastify/sensible HTTP error
 */
export function toHttpError(fastify: FastifyInstance, err: unknown): Error {
  if (!(err instanceof MdaError)) {
    return fastify.httpErrors.internalServerError('Unexpected error')
  }

  switch (err.kind) {
    case 'NotFoundError':
      return fastify.httpErrors.notFound(err.message)
    case 'ValidationError':
    case 'InvalidPositionError':
      return fastify.httpErrors.badRequest(err.message)
    case 'DeviceBusyError':
    case 'RunActiveError':
      return fastify.httpErrors.conflict(err.message)
    case 'ConnectionError':
    case 'HardwareError':
      return fastify.httpErrors.badGateway(err.message)
  }
}

/**
 * Log a failed API call under [API] and return the HTTP error to throw.
 * Domain errors are expected traffic and log at warn; anything else at error.
 */
export function handleApiError(
  fastify: FastifyInstance,
  err: unknown,
  action: string,
  fields: Record<string, unknown> = {}
): Error {
  const errorMessage = err instanceof Error ? err.message : 'Unknown error'
  if (err instanceof MdaError) {
    fastify.log.warn({ msg: `[API] ${action} failed: ${errorMessage}`, source: 'USER', errorKind: err.kind, ...fields })
  } else {
    fastify.log.error({ msg: `[API] ${action} failed`, source: 'USER', error: errorMessage, ...fields })
  }
  return toHttpError(fastify, err)
}
