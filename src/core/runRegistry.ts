/**
 * Run Registry
 *
 * Tracks in-flight and finished runs for status queries. Finished runs stay
 * until purged.
 */
import type { Run } from './run'
import type { RunState } from './types/measurement'
import { NotFoundError, RunActiveError } from './errors'

export interface RunFilter {
  state?: RunState
  measurementType?: string
}

export class RunRegistry {
  private runs = new Map<string, Run>()

  insert(run: Run): void {
    this.runs.set(run.id, run)
  }

  get(runId: string): Run {
    const run = this.runs.get(runId)
    if (!run) throw new NotFoundError('run', runId)
    return run
  }

  /** Runs in creation order */
  list(filter: RunFilter = {}): Run[] {
    return [...this.runs.values()].filter(
      run =>
        (filter.state === undefined || run.state === filter.state) &&
        (filter.measurementType === undefined || run.measurement.type === filter.measurementType)
    )
  }

  active(): Run[] {
    return [...this.runs.values()].filter(run => !run.isTerminal())
  }

  remove(runId: string): void {
    const run = this.get(runId)
    if (!run.isTerminal()) throw new RunActiveError(runId)
    this.runs.delete(runId)
  }
}
