import 'dotenv/config'
import { z } from 'zod'

const booleanFlag = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false'])
    .default(fallback)
    .transform(v => v === 'true')

const envSchema = z
  .object({
    // Non-sensitive - defaults OK
    API_PORT: z.string().default('3001').transform(Number),
    API_HOST: z.string().default('0.0.0.0'),
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
    DEVICES_FILE: z.string().optional(),
    ENGINE_AUTO_CONNECT: booleanFlag('true'),
    DB_ENABLED: booleanFlag('false'),
    DB_HOST: z.string().default('localhost'),
    DB_PORT: z.string().default('5432').transform(Number),
    // Sensitive - no defaults, required once the database is enabled
    DB_USER: z.string().optional(),
    DB_PASSWORD: z.string().optional(),
    DB_NAME: z.string().optional(),
  })
  .superRefine((env, ctx) => {
    if (!env.DB_ENABLED) return
    for (const key of ['DB_USER', 'DB_PASSWORD', 'DB_NAME'] as const) {
      if (!env[key]) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: `${key} is required when DB_ENABLED=true` })
      }
    }
  })

const env = envSchema.parse(process.env)

export const config = {
  db: {
    enabled: env.DB_ENABLED,
    user: env.DB_USER,
    host: env.DB_HOST,
    password: env.DB_PASSWORD,
    port: env.DB_PORT,
    database: env.DB_NAME,
    ssl: false,
    connectionTimeoutMillis: 10000,
    idleTimeoutMillis: 30000,
    allowExitOnIdle: false,
  },
  api: {
    port: env.API_PORT,
    host: env.API_HOST,
  },
  log: {
    level: env.LOG_LEVEL,
  },
  engine: {
    autoConnect: env.ENGINE_AUTO_CONNECT,
    devicesFile: env.DEVICES_FILE,
  },
}
