import { randomUUID } from 'node:crypto'
import type { Measurement } from './measurement'
import {
  TERMINAL_STATES,
  type DataPoint,
  type RunError,
  type RunSnapshot,
  type RunState,
  type RunSummary,
} from './types/measurement'

const TRANSITIONS: Record<RunState, readonly RunState[]> = {
  pending: ['running', 'failed', 'cancelled'],
  running: ['completed', 'failed', 'cancelled'],
  completed: [],
  failed: [],
  cancelled: [],
}

/**
 * Engine-owned execution record of one measurement.
 * Mutated only by the task driving it; everyone else reads snapshots.
 */
export class Run {
  readonly id = randomUUID()
  readonly createdAt = new Date()
  startedAt: Date | null = null
  endedAt: Date | null = null
  error: RunError | null = null
  readonly dataPoints: DataPoint[] = []

  private current: RunState = 'pending'
  private readonly abort = new AbortController()

  constructor(readonly measurement: Measurement) {}

  get state(): RunState {
    return this.current
  }

  get signal(): AbortSignal {
    return this.abort.signal
  }

  get cancelRequested(): boolean {
    return this.abort.signal.aborted
  }

  isTerminal(): boolean {
    return TERMINAL_STATES.has(this.current)
  }

  /** Ask the run to stop at its next safe point; no-op once terminal */
  requestCancel(): void {
    if (!this.isTerminal()) this.abort.abort()
  }

  transition(to: RunState): void {
    if (!TRANSITIONS[this.current].includes(to)) {
      throw new Error(`Illegal run transition ${this.current} -> ${to} (${this.id})`)
    }
    this.current = to
    if (to === 'running') this.startedAt = new Date()
    if (TERMINAL_STATES.has(to)) this.endedAt = new Date()
  }

  summary(): RunSummary {
    return { ...this.header(), dataPointCount: this.dataPoints.length }
  }

  snapshot(): RunSnapshot {
    return { ...this.header(), dataPoints: [...this.dataPoints] }
  }

  private header(): Omit<RunSnapshot, 'dataPoints'> {
    return {
      id: this.id,
      measurementId: this.measurement.id,
      measurementType: this.measurement.type,
      config: this.measurement.describe(),
      state: this.current,
      createdAt: this.createdAt.toISOString(),
      startedAt: this.startedAt?.toISOString() ?? null,
      endedAt: this.endedAt?.toISOString() ?? null,
      cancelRequested: this.cancelRequested,
      error: this.error,
    }
  }
}
