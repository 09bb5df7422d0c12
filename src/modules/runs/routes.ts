import { FastifyPluginAsync } from 'fastify'
import { ZodTypeProvider } from 'fastify-type-provider-zod'
import { z } from 'zod'
import { RunController } from './controller'
import {
  MeasurementTypeListResponseSchema,
  RunListQuerySchema,
  RunListResponseSchema,
  RunParamsSchema,
  RunSnapshotSchema,
  RunSummarySchema,
  StartRunSchema,
} from './schema'

const runsRoutes: FastifyPluginAsync = async fastify => {
  const app = fastify.withTypeProvider<ZodTypeProvider>()
  const controller = new RunController(fastify)

  // GET /measurements/types - Available measurement types
  app.get(
    '/measurements/types',
    {
      schema: {
        tags: ['Measurements'],
        summary: 'List measurement types',
        response: { 200: MeasurementTypeListResponseSchema },
      },
    },
    controller.listTypes
  )

  // POST /runs - Start a measurement; returns while the run is pending
  app.post(
    '/runs',
    {
      schema: {
        tags: ['Runs'],
        summary: 'Start a measurement run',
        body: StartRunSchema,
        response: { 202: RunSummarySchema },
      },
    },
    controller.startRun
  )

  // GET /runs - Runs in creation order
  app.get(
    '/runs',
    {
      schema: {
        tags: ['Runs'],
        summary: 'List runs',
        querystring: RunListQuerySchema,
        response: { 200: RunListResponseSchema },
      },
    },
    controller.listRuns
  )

  // GET /runs/:runId - Status and data points
  app.get(
    '/runs/:runId',
    {
      schema: {
        tags: ['Runs'],
        summary: 'Get the status and data of a run',
        params: RunParamsSchema,
        response: { 200: RunSnapshotSchema },
      },
    },
    controller.getRun
  )

  // POST /runs/:runId/cancel - Stop at the next step boundary
  app.post(
    '/runs/:runId/cancel',
    {
      schema: {
        tags: ['Runs'],
        summary: 'Request cancellation of a run',
        params: RunParamsSchema,
        response: { 200: RunSnapshotSchema },
      },
    },
    controller.cancelRun
  )

  // DELETE /runs/:runId - Forget a finished run
  app.delete(
    '/runs/:runId',
    {
      schema: {
        tags: ['Runs'],
        summary: 'Remove a finished run from memory',
        params: RunParamsSchema,
        response: { 204: z.null() },
      },
    },
    controller.purgeRun
  )
}

export default runsRoutes
