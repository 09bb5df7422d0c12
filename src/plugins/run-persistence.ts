import fp from 'fastify-plugin'
import { RunRepository } from '../modules/runs/runRepository'

/**
 * Stores every finished run in the `runs` table
 */
export default fp(
  async fastify => {
    const repository = new RunRepository(fastify.db)
    const pending = new Set<Promise<void>>()

    const persist = async (runId: string): Promise<void> => {
      try {
        await repository.save(fastify.engine.getStatus(runId))
        fastify.log.debug({ msg: `[DB] Run ${runId} stored`, runId })
      } catch (err) {
        const errorMessage = err instanceof Error ? err.message : 'Unknown error'
        fastify.log.error({ msg: `[DB] Failed to store run ${runId}`, runId, error: errorMessage })
      }
    }

    const unsubscribe = fastify.engine.on('run:finished', summary => {
      const write = persist(summary.id).finally(() => pending.delete(write))
      pending.add(write)
    })

    fastify.addHook('onClose', async instance => {
      // Runs cancelled by the shutdown still need to be written
      await instance.engine.shutdown()
      unsubscribe()
      await Promise.all([...pending])
    })
  },
  { name: 'run-persistence', dependencies: ['acquisition', 'db'] }
)
