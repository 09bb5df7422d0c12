import type { BaseLogger } from 'pino'

/**
 * The slice of the pino logger the core uses. Fastify's `app.log` satisfies it.
 */
export type Logger = Pick<BaseLogger, 'debug' | 'info' | 'warn' | 'error'>
