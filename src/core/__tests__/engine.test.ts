/**
 * Unit tests for the Measurement Engine
 */
import { describe, it, expect, beforeEach } from 'vitest'
import { MeasurementEngine } from '../engine'
import { DeviceRegistry } from '../deviceRegistry'
import { ConnectionError, NotFoundError, RunActiveError } from '../errors'
import { NdMapMeasurement, TimeSeriesMeasurement } from '../measurements'
import type { RunState, RunSummary } from '../types/measurement'
import { FakeDevice, deferred, silentLogger } from './fixtures'

// ============================================================================
// Test Fixtures
// ============================================================================

let devices: DeviceRegistry
let engine: MeasurementEngine

const addDevice = (id: string): FakeDevice => {
    const device = new FakeDevice(id)
    devices.register(device)
    return device
}

beforeEach(() => {
    devices = new DeviceRegistry(silentLogger)
    engine = new MeasurementEngine({ devices, logger: silentLogger })
})

// ============================================================================
// Lifecycle
// ============================================================================

describe('MeasurementEngine.start', () => {
    it('should return a pending run before touching hardware', async () => {
        const device = addDevice('dev-a')
        const detector = device.withDetector(0)

        const handle = engine.start(new TimeSeriesMeasurement({ detectors: [detector], count: 1, intervalSeconds: 0 }))

        expect(engine.getStatus(handle.id).state).toBe('pending')
        expect(device.log).toEqual([])
        await handle.finished
    })

    it('should record a three-point time series', async () => {
        const device = addDevice('dev-a')
        const detector = device.withDetector(0)
        const states: RunState[] = []
        engine.on('run:state', e => states.push(e.state))

        const handle = engine.start(new TimeSeriesMeasurement({ detectors: [detector], count: 3, intervalSeconds: 0 }))
        const result = await handle.finished

        expect(states).toEqual(['pending', 'running', 'completed'])
        expect(result.state).toBe('completed')
        expect(result.error).toBeNull()
        expect(result.dataPoints.map(p => p.step)).toEqual([0, 1, 2])
        expect(result.dataPoints.map(p => p.readings.length)).toEqual([1, 1, 1])
        expect(result.dataPoints.map(p => p.readings[0].reading.values)).toEqual([0, 1, 2])
        expect(result.startedAt).not.toBeNull()
        expect(result.endedAt).not.toBeNull()
    })

    it('should connect devices automatically', async () => {
        const device = addDevice('dev-a')
        const detector = device.withDetector(0)

        await engine.start(new TimeSeriesMeasurement({ detectors: [detector], count: 1, intervalSeconds: 0 })).finished

        expect(device.isConnected()).toBe(true)
        expect(device.log[0]).toBe('dev-a:connect')
    })

    it('should throw NotFoundError for an unregistered device', () => {
        const stray = new FakeDevice('stray')
        const detector = stray.withDetector(0)

        expect(() =>
            engine.start(new TimeSeriesMeasurement({ detectors: [detector], count: 1, intervalSeconds: 0 }))
        ).toThrow(NotFoundError)
        expect(engine.list()).toEqual([])
    })

    it('should emit run:finished with the summary', async () => {
        const device = addDevice('dev-a')
        const detector = device.withDetector(0)
        const finished: RunSummary[] = []
        engine.on('run:finished', summary => finished.push(summary))

        const handle = engine.start(new TimeSeriesMeasurement({ detectors: [detector], count: 2, intervalSeconds: 0 }))
        await handle.finished

        expect(finished).toHaveLength(1)
        expect(finished[0].id).toBe(handle.id)
        expect(finished[0].state).toBe('completed')
        expect(finished[0].dataPointCount).toBe(2)
    })

    it('should keep running when a listener throws', async () => {
        const device = addDevice('dev-a')
        const detector = device.withDetector(0)
        engine.on('run:datapoint', () => {
            throw new Error('listener exploded')
        })

        const result = await engine.start(
            new TimeSeriesMeasurement({ detectors: [detector], count: 2, intervalSeconds: 0 })
        ).finished

        expect(result.state).toBe('completed')
        expect(result.dataPoints).toHaveLength(2)
    })
})

// ============================================================================
// N-dimensional maps
// ============================================================================

describe('MeasurementEngine with nd-map', () => {
    it('should move a discrete actuator through labelled options', async () => {
        const device = addDevice('dev-a')
        const wheel = device.withDiscrete(0, ['A', 'B'])
        const detector = device.withDetector(0)

        const result = await engine.start(
            new NdMapMeasurement({ detectors: [detector], axes: [{ actuator: wheel, positions: ['A', 'B'] }] })
        ).finished

        expect(result.state).toBe('completed')
        expect(result.dataPoints.map(p => p.positions)).toEqual([
            [{ deviceId: 'dev-a', actuatorId: 0, position: 0, label: 'A' }],
            [{ deviceId: 'dev-a', actuatorId: 0, position: 1, label: 'B' }],
        ])
        expect(result.dataPoints[0].readings[0]).toEqual({
            deviceId: 'dev-a',
            detectorId: 0,
            reading: { dimensionality: 0, shape: [], values: 0, unit: null },
        })
        expect(device.log).toEqual([
            'dev-a:connect',
            'dev-a:move(0):start',
            'dev-a:move(0):end',
            'dev-a:read:start',
            'dev-a:read:end',
            'dev-a:move(1):start',
            'dev-a:move(1):end',
            'dev-a:read:start',
            'dev-a:read:end',
        ])
    })

    it('should fail before running when a target is outside the limits', async () => {
        const device = addDevice('dev-a')
        const stage = device.withContinuous(0, [0, 10])
        const detector = device.withDetector(0)
        const states: RunState[] = []
        engine.on('run:state', e => states.push(e.state))

        const result = await engine.start(
            new NdMapMeasurement({ detectors: [detector], axes: [{ actuator: stage, positions: [15] }] })
        ).finished

        expect(states).toEqual(['pending', 'failed'])
        expect(result.error).toEqual({
            kind: 'InvalidPositionError',
            message: 'Invalid position 15 for actuator stage-0 (hardware_limit)',
            step: null,
        })
        expect(result.dataPoints).toEqual([])
        expect(result.startedAt).toBeNull()
        expect(stage.position).toBe(0)
        expect(device.log).toEqual([])
    })

    it('should fail at the step whose target became invalid', async () => {
        const device = addDevice('dev-a')
        const stage = device.withContinuous(0, [0, 10])
        const detector = device.withDetector(0)
        engine.on('run:datapoint', e => {
            if (e.dataPoint.step === 0) stage.setSoftLimits([null, 5])
        })

        const result = await engine.start(
            new NdMapMeasurement({ detectors: [detector], axes: [{ actuator: stage, positions: [2, 8] }] })
        ).finished

        expect(result.state).toBe('failed')
        expect(result.error).toEqual({
            kind: 'InvalidPositionError',
            message: 'Invalid position 8 for actuator stage-0 (software_limit)',
            step: 1,
        })
        expect(result.dataPoints).toHaveLength(1)
        expect(stage.position).toBe(2)
    })
})

// ============================================================================
// Failures
// ============================================================================

describe('MeasurementEngine failures', () => {
    it('should keep partial results when a detector fails mid-run', async () => {
        const device = addDevice('dev-a')
        const detector = device.withDetector(0, { failAt: 2 })

        const result = await engine.start(
            new TimeSeriesMeasurement({ detectors: [detector], count: 5, intervalSeconds: 0 })
        ).finished

        expect(result.state).toBe('failed')
        expect(result.error).toEqual({ kind: 'HardwareError', message: 'sensor timeout', step: 2 })
        expect(result.dataPoints.map(p => p.step)).toEqual([0, 1])
    })

    it('should fail with ConnectionError when auto-connect fails', async () => {
        const device = addDevice('dev-a')
        device.connectError = new ConnectionError('dev-a', 'timeout')
        const detector = device.withDetector(0)

        const result = await engine.start(
            new TimeSeriesMeasurement({ detectors: [detector], count: 1, intervalSeconds: 0 })
        ).finished

        expect(result.state).toBe('failed')
        expect(result.error).toEqual({
            kind: 'ConnectionError',
            message: 'Device dev-a connection failed (timeout)',
            step: null,
        })
    })

    it('should refuse disconnected devices when auto-connect is off', async () => {
        engine = new MeasurementEngine({ devices, logger: silentLogger, autoConnect: false })
        const device = addDevice('dev-a')
        const detector = device.withDetector(0)

        const result = await engine.start(
            new TimeSeriesMeasurement({ detectors: [detector], count: 1, intervalSeconds: 0 })
        ).finished

        expect(result.error).toEqual({ kind: 'HardwareError', message: 'Device dev-a is not connected', step: null })
        expect(device.log).toEqual([])
    })

    it('should not affect a concurrent run on another device', async () => {
        const bad = addDevice('dev-a').withDetector(0, { failAt: 0 })
        const good = addDevice('dev-b').withDetector(0)

        const failing = engine.start(new TimeSeriesMeasurement({ detectors: [bad], count: 3, intervalSeconds: 0 }))
        const healthy = engine.start(new TimeSeriesMeasurement({ detectors: [good], count: 3, intervalSeconds: 0 }))

        const [failed, completed] = await Promise.all([failing.finished, healthy.finished])
        expect(failed.state).toBe('failed')
        expect(failed.error?.step).toBe(0)
        expect(completed.state).toBe('completed')
        expect(completed.dataPoints).toHaveLength(3)
    })
})

// ============================================================================
// Cancellation
// ============================================================================

describe('MeasurementEngine.cancel', () => {
    it('should stop after the step in progress', async () => {
        const device = addDevice('dev-a')
        const stage = device.withContinuous(0, [0, 10])
        const detector = device.withDetector(0)
        engine.on('run:datapoint', e => {
            if (e.dataPoint.step === 1) engine.cancel(e.id)
        })

        const result = await engine.start(
            new NdMapMeasurement({ detectors: [detector], axes: [{ actuator: stage, positions: [1, 2, 3, 4, 5] }] })
        ).finished

        expect(result.state).toBe('cancelled')
        expect(result.cancelRequested).toBe(true)
        expect(result.dataPoints.map(p => p.positions[0].position)).toEqual([1, 2])
        expect(stage.position).toBe(2)
    })

    it('should interrupt the wait between time series samples', async () => {
        const detector = addDevice('dev-a').withDetector(0)
        engine.on('run:datapoint', e => {
            setTimeout(() => engine.cancel(e.id), 10)
        })

        const started = Date.now()
        const result = await engine.start(new TimeSeriesMeasurement({ detectors: [detector], intervalSeconds: 60 }))
            .finished

        expect(result.state).toBe('cancelled')
        expect(result.dataPoints).toHaveLength(1)
        expect(Date.now() - started).toBeLessThan(5000)
    })

    it('should cancel a run still waiting for its devices', async () => {
        const gate = deferred()
        const detector = addDevice('dev-a').withDetector(0, { gate: gate.promise })

        const first = engine.start(new TimeSeriesMeasurement({ detectors: [detector], count: 1, intervalSeconds: 0 }))
        const second = engine.start(new TimeSeriesMeasurement({ detectors: [detector], count: 1, intervalSeconds: 0 }))

        engine.cancel(second.id)
        const cancelled = await second.finished
        expect(cancelled.state).toBe('cancelled')
        expect(cancelled.startedAt).toBeNull()
        expect(cancelled.dataPoints).toEqual([])

        gate.resolve()
        expect((await first.finished).state).toBe('completed')
    })

    it('should leave a terminal run unchanged', async () => {
        const detector = addDevice('dev-a').withDetector(0)
        const handle = engine.start(new TimeSeriesMeasurement({ detectors: [detector], count: 1, intervalSeconds: 0 }))
        await handle.finished

        const snapshot = engine.cancel(handle.id)

        expect(snapshot.state).toBe('completed')
        expect(snapshot.cancelRequested).toBe(false)
    })

    it('should throw NotFoundError for an unknown run', () => {
        expect(() => engine.cancel('missing')).toThrow(NotFoundError)
        expect(() => engine.getStatus('missing')).toThrow(NotFoundError)
    })
})

// ============================================================================
// Concurrency
// ============================================================================

describe('MeasurementEngine concurrency', () => {
    it('should run measurements on disjoint devices in parallel', async () => {
        const gate = deferred()
        const blocked = addDevice('dev-a').withDetector(0, { gate: gate.promise })
        const free = addDevice('dev-b').withDetector(0)

        const first = engine.start(new TimeSeriesMeasurement({ detectors: [blocked], count: 1, intervalSeconds: 0 }))
        const second = engine.start(new TimeSeriesMeasurement({ detectors: [free], count: 3, intervalSeconds: 0 }))

        const done = await second.finished
        expect(done.state).toBe('completed')
        expect(engine.getStatus(first.id).state).toBe('running')

        gate.resolve()
        expect((await first.finished).state).toBe('completed')
    })

    it('should serialise measurements sharing a device', async () => {
        const device = addDevice('dev-a')
        const detector = device.withDetector(0, { delayMs: 2 })
        const secondStates: RunState[] = []

        const first = engine.start(new TimeSeriesMeasurement({ detectors: [detector], count: 3, intervalSeconds: 0 }))
        const second = engine.start(new TimeSeriesMeasurement({ detectors: [detector], count: 3, intervalSeconds: 0 }))
        engine.on('run:datapoint', e => {
            if (e.id === first.id) secondStates.push(engine.getStatus(second.id).state)
        })

        const [a, b] = await Promise.all([first.finished, second.finished])

        expect(secondStates).toEqual(['pending', 'pending', 'pending'])
        expect(a.dataPoints.map(p => p.readings[0].reading.values)).toEqual([0, 1, 2])
        expect(b.dataPoints.map(p => p.readings[0].reading.values)).toEqual([3, 4, 5])
        expect(Date.parse(b.startedAt ?? '')).toBeGreaterThanOrEqual(Date.parse(a.endedAt ?? ''))

        const reads = device.log.filter(entry => entry.includes(':read:'))
        expect(reads).toEqual(Array.from({ length: 12 }, (_, i) => (i % 2 === 0 ? 'dev-a:read:start' : 'dev-a:read:end')))
    })

    it('should fail a queued run whose device was removed while it waited', async () => {
        const gate = deferred()
        const a = addDevice('a')
        const b = addDevice('b')
        const held = a.withDetector(0, { gate: gate.promise })

        const first = engine.start(new TimeSeriesMeasurement({ detectors: [held], count: 1, intervalSeconds: 0 }))
        const second = engine.start(
            new TimeSeriesMeasurement({ detectors: [held, b.withDetector(0)], count: 1, intervalSeconds: 0 })
        )
        expect(engine.locks.tryAcquire(['b'])).toBeNull()

        await devices.remove('b')
        gate.resolve()
        const [done, failed] = await Promise.all([first.finished, second.finished])

        expect(done.state).toBe('completed')
        expect(failed.state).toBe('failed')
        expect(failed.error).toEqual({ kind: 'NotFoundError', message: 'No device with ID b', step: null })
        expect(failed.dataPoints).toEqual([])
        expect(b.log).toEqual([])
    })

    it('should not drive a device replaced under the same ID while the run waited', async () => {
        const gate = deferred()
        const held = addDevice('a').withDetector(0, { gate: gate.promise })
        const original = addDevice('b')

        const first = engine.start(new TimeSeriesMeasurement({ detectors: [held], count: 1, intervalSeconds: 0 }))
        const second = engine.start(
            new TimeSeriesMeasurement({ detectors: [held, original.withDetector(0)], count: 1, intervalSeconds: 0 })
        )

        await devices.remove('b')
        const replacement = addDevice('b')
        gate.resolve()
        const failed = await second.finished
        await first.finished

        expect(failed.error).toEqual({ kind: 'NotFoundError', message: 'No device with ID b', step: null })
        expect(original.log).toEqual([])
        expect(replacement.log).toEqual([])
    })
})

// ============================================================================
// Registry operations
// ============================================================================

describe('MeasurementEngine.list and purge', () => {
    it('should filter runs by state and type', async () => {
        const detector = addDevice('dev-a').withDetector(0, { failAt: 0 })
        const other = addDevice('dev-b').withDetector(0)

        const failed = engine.start(new TimeSeriesMeasurement({ detectors: [detector], count: 1, intervalSeconds: 0 }))
        const completed = engine.start(new TimeSeriesMeasurement({ detectors: [other], count: 1, intervalSeconds: 0 }))
        await Promise.all([failed.finished, completed.finished])

        expect(engine.list({ state: 'completed' }).map(r => r.id)).toEqual([completed.id])
        expect(engine.list({ measurementType: 'time-series' }).map(r => r.id)).toEqual([failed.id, completed.id])
        expect(engine.list({ measurementType: 'nd-map' })).toEqual([])
    })

    it('should refuse to purge a live run', async () => {
        const gate = deferred()
        const detector = addDevice('dev-a').withDetector(0, { gate: gate.promise })
        const handle = engine.start(new TimeSeriesMeasurement({ detectors: [detector], count: 1, intervalSeconds: 0 }))

        expect(() => engine.purge(handle.id)).toThrow(RunActiveError)

        gate.resolve()
        await handle.finished
        engine.purge(handle.id)
        expect(() => engine.getStatus(handle.id)).toThrow(NotFoundError)
    })

    it('should cancel live runs on shutdown', async () => {
        const detector = addDevice('dev-a').withDetector(0)
        const handle = engine.start(new TimeSeriesMeasurement({ detectors: [detector], intervalSeconds: 0 }))

        await engine.shutdown()

        expect(engine.getStatus(handle.id).state).toBe('cancelled')
    })
})
