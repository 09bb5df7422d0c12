import { buildApp } from './app'
import { config } from './config/env'

async function start() {
  const app = await buildApp()

  try {
    await app.listen({ port: config.api.port, host: config.api.host })

    app.log.info({
      msg: `[API] Server listening on ${config.api.host}:${config.api.port}`,
      url: `http://localhost:${config.api.port}`,
      documentation: `http://localhost:${config.api.port}/documentation`,
    })
  } catch (err) {
    app.log.error(err)
    process.exit(1)
  }

  const shutdown = async (signal: string) => {
    app.log.info({ msg: `[API] ${signal} received, stopping` })
    try {
      await app.close()
      process.exit(0)
    } catch (err) {
      app.log.error(err)
      process.exit(1)
    }
  }

  process.once('SIGINT', () => void shutdown('SIGINT'))
  process.once('SIGTERM', () => void shutdown('SIGTERM'))
}

start().catch(err => {
  process.stderr.write(`Failed to start: ${err instanceof Error ? err.message : String(err)}\n`)
  process.exit(1)
})
