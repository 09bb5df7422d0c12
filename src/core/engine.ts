/**
 * Measurement Engine
 *
 * Runs each measurement as a detached task. A run takes the locks of every
 * device it touches, validates its configuration, makes sure the devices are
 * connected, then pulls steps from the measurement one at a time. Between two
 * steps it yields to the event loop and checks for cancellation. Anything a
 * step throws ends that run (and only that run) in `failed`.
 */
import { setImmediate as yieldToEventLoop, setTimeout as sleep } from 'node:timers/promises'
import type { Device } from './types/capabilities'
import type { DataPoint, RunSnapshot, RunState, RunSummary } from './types/measurement'
import type { Logger } from './types/logger'
import type { Measurement, MeasurementContext, StepResult } from './measurement'
import type { DeviceRegistry } from './deviceRegistry'
import { DeviceLocks, LockWaitAborted, type Release } from './deviceLocks'
import { HardwareError, MdaError, NotFoundError } from './errors'
import { Run } from './run'
import { RunRegistry, type RunFilter } from './runRegistry'
import { TypedEmitter } from './events'

export interface EngineEvents {
  'run:state': { id: string; state: RunState }
  'run:datapoint': { id: string; dataPoint: DataPoint }
  'run:finished': RunSummary
}

export interface EngineOptions {
  devices: DeviceRegistry
  logger: Logger
  runs?: RunRegistry
  locks?: DeviceLocks
  /** Connect disconnected devices before the first step (default true) */
  autoConnect?: boolean
}

export interface RunHandle {
  id: string
  /** Resolves with the terminal snapshot; never rejects */
  finished: Promise<RunSnapshot>
}

export class MeasurementEngine {
  readonly runs: RunRegistry
  readonly locks: DeviceLocks
  private readonly devices: DeviceRegistry
  private readonly logger: Logger
  private readonly autoConnect: boolean
  private readonly tasks = new Map<string, Promise<RunSnapshot>>()
  private readonly events: TypedEmitter<EngineEvents>

  constructor(options: EngineOptions) {
    this.devices = options.devices
    this.logger = options.logger
    this.runs = options.runs ?? new RunRegistry()
    this.locks = options.locks ?? new DeviceLocks()
    this.autoConnect = options.autoConnect ?? true
    this.events = new TypedEmitter<EngineEvents>((event, err) => {
      const errorMessage = err instanceof Error ? err.message : 'Unknown error'
      this.logger.error({ msg: `[ENGINE] Listener for ${String(event)} failed`, error: errorMessage })
    })
  }

  on<E extends keyof EngineEvents>(event: E, listener: (payload: EngineEvents[E]) => void): () => void {
    return this.events.on(event, listener)
  }

  // ==========================================================================
  // Control
  // ==========================================================================

  /**
   * Create a pending run and schedule it. Returns before any hardware is touched.
   * Throws NotFoundError if the measurement references an unregistered device.
   */
  start(measurement: Measurement): RunHandle {
    const devices = measurement.deviceIds().map(id => this.devices.get(id))
    const run = new Run(measurement)

    this.runs.insert(run)
    this.logger.info({
      msg: `[ENGINE] Run ${run.id} created (${measurement.type})`,
      runId: run.id,
      measurementType: measurement.type,
      devices: devices.map(d => d.id),
    })
    this.events.emit('run:state', { id: run.id, state: run.state })

    const finished = this.execute(run, devices)
    this.tasks.set(run.id, finished)
    return { id: run.id, finished }
  }

  /**
   * Request cancellation; observed at the run's next safe point
   */
  cancel(runId: string): RunSnapshot {
    const run = this.runs.get(runId)
    if (!run.isTerminal() && !run.cancelRequested) {
      run.requestCancel()
      this.logger.info({ msg: `[ENGINE] Cancellation requested for run ${runId}`, runId, state: run.state })
    }
    return run.snapshot()
  }

  getStatus(runId: string): RunSnapshot {
    return this.runs.get(runId).snapshot()
  }

  summary(runId: string): RunSummary {
    return this.runs.get(runId).summary()
  }

  list(filter?: RunFilter): RunSummary[] {
    return this.runs.list(filter).map(run => run.summary())
  }

  /** Forget a terminal run; throws RunActiveError while it is live */
  purge(runId: string): void {
    this.runs.remove(runId)
  }

  /** Resolves once the run is terminal */
  async wait(runId: string): Promise<RunSnapshot> {
    const task = this.tasks.get(runId)
    if (task) return task
    return this.getStatus(runId)
  }

  /**
   * Cancel every live run and wait for all of them to stop
   */
  async shutdown(): Promise<void> {
    const live = this.runs.active()
    for (const run of live) run.requestCancel()
    await Promise.all([...this.tasks.values()])
    this.events.removeAllListeners()
    if (live.length > 0) {
      this.logger.info({ msg: `[ENGINE] Stopped ${live.length} live run(s)`, runs: live.map(r => r.id) })
    }
  }

  // ==========================================================================
  // Execution
  // ==========================================================================

  private async execute(run: Run, devices: Device[]): Promise<RunSnapshot> {
    let release: Release | null = null

    try {
      try {
        release = await this.locks.acquire(devices.map(d => d.id), run.signal)
      } catch (err) {
        if (err instanceof LockWaitAborted) {
          this.finish(run, 'cancelled')
          return run.snapshot()
        }
        throw err
      }

      if (run.cancelRequested) {
        this.finish(run, 'cancelled')
        return run.snapshot()
      }

      try {
        this.assertRegistered(devices)
        run.measurement.validate()
        await this.prepareDevices(devices)
      } catch (err) {
        this.fail(run, err, null)
        return run.snapshot()
      }

      this.setState(run, 'running')
      await this.runSteps(run, new Map(devices.map(d => [d.id, d])))
    } catch (err) {
      // Only reached on engine bugs; the run must still end
      if (!run.isTerminal()) this.fail(run, err, run.state === 'running' ? run.dataPoints.length : null)
    } finally {
      release?.()
      this.tasks.delete(run.id)
    }

    return run.snapshot()
  }

  /** A device removed (or replaced) while the run waited must not be driven */
  private assertRegistered(devices: Device[]): void {
    for (const device of devices) {
      if (!this.devices.has(device.id) || this.devices.get(device.id) !== device) {
        throw new NotFoundError('device', device.id)
      }
    }
  }

  private async prepareDevices(devices: Device[]): Promise<void> {
    for (const device of devices) {
      if (device.isConnected()) continue
      if (!this.autoConnect) {
        throw new HardwareError(device.id, `Device ${device.id} is not connected`)
      }
      await device.connect()
      this.logger.info({ msg: `[DEVICE] Connected ${device.id} for run`, deviceId: device.id })
    }
  }

  private async runSteps(run: Run, devices: Map<string, Device>): Promise<void> {
    const steps = run.measurement.steps(this.createContext(run, devices))

    for (;;) {
      if (run.cancelRequested) {
        await this.closeSteps(run, steps)
        this.finish(run, 'cancelled')
        return
      }

      const step = run.dataPoints.length
      let result: IteratorResult<StepResult, void>
      try {
        result = await steps.next()
      } catch (err) {
        this.fail(run, err, step)
        return
      }
      if (result.done) break

      const dataPoint: DataPoint = {
        step,
        timestamp: new Date().toISOString(),
        elapsedMs: this.elapsed(run),
        positions: result.value.positions,
        readings: result.value.readings,
      }
      run.dataPoints.push(dataPoint)
      this.events.emit('run:datapoint', { id: run.id, dataPoint })

      await yieldToEventLoop()
    }

    this.finish(run, run.cancelRequested ? 'cancelled' : 'completed')
  }

  private async closeSteps(run: Run, steps: AsyncGenerator<StepResult, void, undefined>): Promise<void> {
    try {
      await steps.return()
    } catch (err) {
      const errorMessage = err instanceof Error ? err.message : 'Unknown error'
      this.logger.warn({ msg: `[ENGINE] Measurement cleanup failed`, runId: run.id, error: errorMessage })
    }
  }

  private createContext(run: Run, devices: Map<string, Device>): MeasurementContext {
    const ensureConnected = (deviceId: string) => {
      const device = devices.get(deviceId)
      // A capability outside the run's declared set would bypass its locks
      if (!device) throw new NotFoundError('device', deviceId)
      if (!device.isConnected()) {
        throw new HardwareError(deviceId, `Device ${deviceId} is not connected`)
      }
    }

    return {
      signal: run.signal,
      elapsedMs: () => this.elapsed(run),

      read: async detector => {
        ensureConnected(detector.deviceId)
        const reading = await detector.read()
        return { deviceId: detector.deviceId, detectorId: detector.detectorId, reading }
      },

      move: async (actuator, target) => {
        ensureConnected(actuator.deviceId)
        await actuator.setPosition(target)
        const label = actuator.kind === 'discrete' ? (actuator.getPositionValues()[target] ?? null) : null
        return { deviceId: actuator.deviceId, actuatorId: actuator.actuatorId, position: target, label }
      },

      wait: async ms => {
        try {
          await sleep(ms, undefined, { signal: run.signal })
          return true
        } catch (err) {
          if (run.signal.aborted) return false
          throw err
        }
      },
    }
  }

  // ==========================================================================
  // State
  // ==========================================================================

  private elapsed(run: Run): number {
    return run.startedAt ? Date.now() - run.startedAt.getTime() : 0
  }

  private setState(run: Run, state: RunState): void {
    run.transition(state)
    this.logger.debug({ msg: `[ENGINE] Run ${run.id} -> ${state}`, runId: run.id, state })
    this.events.emit('run:state', { id: run.id, state })
  }

  private finish(run: Run, state: 'completed' | 'cancelled'): void {
    this.setState(run, state)
    this.logger.info({
      msg: `[ENGINE] Run ${run.id} ${state} with ${run.dataPoints.length} data point(s)`,
      runId: run.id,
      state,
      dataPoints: run.dataPoints.length,
    })
    this.events.emit('run:finished', run.summary())
  }

  private fail(run: Run, err: unknown, step: number | null): void {
    const kind = err instanceof MdaError ? err.kind : 'HardwareError'
    const message = err instanceof Error ? err.message : String(err)
    run.error = { kind, message, step }
    this.setState(run, 'failed')
    this.logger.warn({
      msg: `[ENGINE] Run ${run.id} failed${step === null ? ' before start' : ` at step ${step}`}: ${message}`,
      runId: run.id,
      errorKind: kind,
      step,
      dataPoints: run.dataPoints.length,
    })
    this.events.emit('run:finished', run.summary())
  }
}
