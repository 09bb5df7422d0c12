import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify'
import { z } from 'zod'
import { RunService } from './service'
import { RunRepository } from './runRepository'
import { handleApiError } from '../../lib/httpErrors'
import { RunListQuerySchema, RunParamsSchema, StartRunSchema } from './schema'

type RunParams = z.infer<typeof RunParamsSchema>
type RunListQuery = z.infer<typeof RunListQuerySchema>
type StartRunBody = z.infer<typeof StartRunSchema>

export class RunController {
  private service: RunService

  constructor(private fastify: FastifyInstance) {
    const store = fastify.hasDecorator('db') ? new RunRepository(fastify.db) : null
    this.service = new RunService(fastify.engine, fastify.measurementTypes, fastify.devices, store)
  }

  listTypes = async () => {
    return this.service.listTypes()
  }

  startRun = async (req: FastifyRequest<{ Body: StartRunBody }>, reply: FastifyReply) => {
    const { type, config } = req.body
    try {
      const run = this.service.start(type, config)
      this.fastify.log.info({ msg: `[API] Run ${run.id} started (${type})`, source: 'USER', runId: run.id })
      reply.code(202)
      return run
    } catch (err) {
      throw handleApiError(this.fastify, err, 'Start run', { measurementType: type })
    }
  }

  listRuns = async (req: FastifyRequest<{ Querystring: RunListQuery }>) => {
    return this.service.list({ state: req.query.state, measurementType: req.query.type })
  }

  getRun = async (req: FastifyRequest<{ Params: RunParams }>) => {
    try {
      return await this.service.get(req.params.runId)
    } catch (err) {
      throw handleApiError(this.fastify, err, 'Get run', { runId: req.params.runId })
    }
  }

  cancelRun = async (req: FastifyRequest<{ Params: RunParams }>) => {
    const { runId } = req.params
    try {
      const run = this.service.cancel(runId)
      this.fastify.log.info({ msg: `[API] Cancellation requested for run ${runId}`, source: 'USER', runId })
      return run
    } catch (err) {
      throw handleApiError(this.fastify, err, 'Cancel run', { runId })
    }
  }

  purgeRun = async (req: FastifyRequest<{ Params: RunParams }>, reply: FastifyReply) => {
    const { runId } = req.params
    try {
      this.service.purge(runId)
      return reply.code(204).send()
    } catch (err) {
      throw handleApiError(this.fastify, err, 'Purge run', { runId })
    }
  }
}
