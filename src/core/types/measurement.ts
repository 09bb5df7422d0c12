/**
 * Measurement and run types.
 */
import type { Reading } from './capabilities'
import type { ErrorKind } from '../errors'

// ============================================================================
// Data points
// ============================================================================

export interface PositionRecord {
  deviceId: string
  actuatorId: number
  position: number          // option index (discrete) or value (continuous)
  label: string | null      // option label for discrete actuators
}

export interface ReadingRecord {
  deviceId: string
  detectorId: number
  reading: Reading
}

export interface DataPoint {
  step: number              // 0-based, strictly increasing within a run
  timestamp: string         // ISO time the step completed
  elapsedMs: number         // since the run entered Running
  positions: PositionRecord[]
  readings: ReadingRecord[]
}

// ============================================================================
// Runs
// ============================================================================

export const RUN_STATES = ['pending', 'running', 'completed', 'failed', 'cancelled'] as const

export type RunState = (typeof RUN_STATES)[number]

export const TERMINAL_STATES: ReadonlySet<RunState> = new Set(['completed', 'failed', 'cancelled'])

export interface RunError {
  kind: ErrorKind
  message: string
  step: number | null       // null when the run failed before its first step
}

export interface RunSnapshot {
  id: string
  measurementId: string
  measurementType: string
  config: Record<string, unknown>   // measurement.describe()
  state: RunState
  createdAt: string
  startedAt: string | null
  endedAt: string | null
  cancelRequested: boolean
  error: RunError | null
  dataPoints: DataPoint[]
}

/** A snapshot without its data, for listings and events */
export type RunSummary = Omit<RunSnapshot, 'dataPoints'> & { dataPointCount: number }
