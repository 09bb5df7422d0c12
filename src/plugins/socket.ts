import fp from 'fastify-plugin'
import { Server, Socket } from 'socket.io'

declare module 'fastify' {
  interface FastifyInstance {
    io: Server
  }
}

/**
 * Socket.IO server broadcasting engine events to every client:
 * `run:state`, `run:datapoint` and `run:finished`
 */
export default fp(
  async fastify => {
    const io = new Server(fastify.server, {
      cors: {
        origin: '*',
        methods: ['GET', 'POST'],
      },
      pingTimeout: 60000,
      pingInterval: 25000,
    })

    let connectedClients = 0

    io.on('connection', (socket: Socket) => {
      connectedClients++
      const clientInfo = {
        id: socket.id,
        ip: socket.handshake.address,
        userAgent: socket.handshake.headers['user-agent'] || 'unknown',
      }

      fastify.log.info({
        msg: `[WEBSOCKET] Client connected (${clientInfo.ip})`,
        source: 'USER',
        socketId: clientInfo.id,
        userAgent: clientInfo.userAgent,
        totalClients: connectedClients,
      })

      socket.on('disconnect', (reason: string) => {
        connectedClients = Math.max(0, connectedClients - 1)
        fastify.log.info({
          msg: '[WEBSOCKET] Client disconnected',
          source: 'USER',
          socketId: clientInfo.id,
          reason,
          totalClients: connectedClients,
        })
      })

      socket.on('error', (error: Error) => {
        fastify.log.error({ msg: '[WEBSOCKET] Socket error', socketId: clientInfo.id, error: error.message })
      })
    })

    io.engine.on('connection_error', (err: Error) => {
      fastify.log.error({ msg: '[WEBSOCKET] Engine connection error', error: err.message })
    })

    const unsubscribe = [
      fastify.engine.on('run:state', payload => io.emit('run:state', payload)),
      fastify.engine.on('run:datapoint', payload => io.emit('run:datapoint', payload)),
      fastify.engine.on('run:finished', payload => io.emit('run:finished', payload)),
    ]

    fastify.decorate('io', io)

    fastify.addHook('onClose', (instance, done) => {
      fastify.log.info({ msg: '[WEBSOCKET] Closing Socket.IO server', connectedClients })
      for (const off of unsubscribe) off()
      instance.io.close()
      done()
    })
  },
  { name: 'socket', dependencies: ['acquisition'] }
)
