import fastify from 'fastify'
import cors from '@fastify/cors'
import swagger from '@fastify/swagger'
import swaggerUi from '@fastify/swagger-ui'
import sensible from '@fastify/sensible'
import {
  serializerCompiler,
  validatorCompiler,
  ZodTypeProvider,
  jsonSchemaTransform,
} from 'fastify-type-provider-zod'
import { z } from 'zod'

import { config } from './config/env'
import { createDatabase, type DatabaseHandle } from './db/client'
import { buildLoggerOptions, createDbLogSink, type LoggerOptions } from './lib/logger'

// Plugins
import acquisitionPlugin from './plugins/acquisition'
import dbPlugin from './plugins/db'
import runPersistencePlugin from './plugins/run-persistence'
import socketPlugin from './plugins/socket'

// Routes
import devicesRoutes from './modules/devices/routes'
import runsRoutes from './modules/runs/routes'

export interface AppOptions {
  /** Defaults to stdout (plus system_logs when the database is enabled) */
  logger?: LoggerOptions | false
  /** null disables persistence; defaults to DB_ENABLED */
  database?: DatabaseHandle | null
  /** Socket.IO broadcasting (default true) */
  realtime?: boolean
  devicesFile?: string
  autoConnect?: boolean
}

const HealthResponseSchema = z.object({
  status: z.literal('ok'),
  devices: z.number(),
  activeRuns: z.number(),
})

export async function buildApp(options: AppOptions = {}) {
  const database =
    options.database !== undefined ? options.database : config.db.enabled ? createDatabase(config.db) : null
  const logSink = database && options.logger === undefined ? createDbLogSink(database.db) : undefined

  const app = fastify({
    logger: options.logger ?? buildLoggerOptions(config.log.level, logSink),
    disableRequestLogging: true, // Disable automatic request logging (too verbose)
  }).withTypeProvider<ZodTypeProvider>()

  // Validation
  app.setValidatorCompiler(validatorCompiler)
  app.setSerializerCompiler(serializerCompiler)

  // Sensible (HTTP Errors)
  await app.register(sensible)

  // CORS
  await app.register(cors, {
    origin: '*',
    methods: ['GET', 'POST', 'PUT', 'DELETE'],
  })

  // Swagger
  await app.register(swagger, {
    openapi: {
      info: {
        title: 'Multidimensional Data Acquisition API',
        description: 'Devices, capabilities and measurement runs',
        version: '1.0.0',
      },
      servers: [],
    },
    transform: jsonSchemaTransform,
  })

  await app.register(swaggerUi, {
    routePrefix: '/documentation',
  })

  // Core Plugins
  await app.register(acquisitionPlugin, {
    autoConnect: options.autoConnect ?? config.engine.autoConnect,
    devicesFile: 'devicesFile' in options ? options.devicesFile : config.engine.devicesFile,
  })
  if (database) {
    await app.register(dbPlugin, { database, logSink })
    await app.register(runPersistencePlugin)
  }
  if (options.realtime ?? true) {
    await app.register(socketPlugin)
  }

  // Routes
  await app.register(devicesRoutes, { prefix: '/api' })
  await app.register(runsRoutes, { prefix: '/api' })

  app.get('/health', { schema: { response: { 200: HealthResponseSchema } } }, async () => {
    return {
      status: 'ok' as const,
      devices: app.devices.list().length,
      activeRuns: app.engine.runs.active().length,
    }
  })

  return app
}
