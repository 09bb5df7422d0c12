/**
 * Unit tests for Run Service
 */
import { describe, it, expect, beforeEach } from 'vitest'
import { RunService, type RunStore } from '../service'
import { MeasurementEngine } from '../../../core/engine'
import { DeviceRegistry } from '../../../core/deviceRegistry'
import { NotFoundError } from '../../../core/errors'
import { createMeasurementTypes } from '../../../core/measurements'
import type { RunSnapshot } from '../../../core/types/measurement'
import { FakeDevice, silentLogger } from '../../../core/__tests__/fixtures'

// ============================================================================
// Test Fixtures
// ============================================================================

const STORED_ID = '3f1c2a9e-5b7d-4c1e-9f0a-2b3c4d5e6f70'

const storedRun: RunSnapshot = {
    id: STORED_ID,
    measurementId: '0b6e3c1d-2a4f-4e8b-9c7d-1a2b3c4d5e6f',
    measurementType: 'time-series',
    config: { detectors: [{ deviceId: 'dev-a', detectorId: 0 }], count: 1, intervalSeconds: 0 },
    state: 'completed',
    createdAt: '2024-01-15T10:30:00.000Z',
    startedAt: '2024-01-15T10:30:00.010Z',
    endedAt: '2024-01-15T10:30:00.020Z',
    cancelRequested: false,
    error: null,
    dataPoints: [],
}

class MemoryRunStore implements RunStore {
    lookups: string[] = []

    constructor(private runs: RunSnapshot[]) {}

    async findById(runId: string): Promise<RunSnapshot | null> {
        this.lookups.push(runId)
        return this.runs.find(run => run.id === runId) ?? null
    }
}

let devices: DeviceRegistry
let engine: MeasurementEngine
let store: MemoryRunStore
let service: RunService

beforeEach(() => {
    devices = new DeviceRegistry(silentLogger)
    const device = new FakeDevice('dev-a')
    device.withDetector(0)
    devices.register(device)
    engine = new MeasurementEngine({ devices, logger: silentLogger })
    store = new MemoryRunStore([storedRun])
    service = new RunService(engine, createMeasurementTypes(), devices, store)
})

// ============================================================================
// start Tests
// ============================================================================

describe('RunService.start', () => {
    it('should build the measurement and return the pending run', async () => {
        const run = service.start('time-series', { detectors: [{ deviceId: 'dev-a', detectorId: 0 }], count: 2 })

        expect(run.state).toBe('pending')
        expect(run.dataPointCount).toBe(0)
        expect(run.config).toEqual({ detectors: [{ deviceId: 'dev-a', detectorId: 0 }], count: 2, intervalSeconds: 0 })

        const finished = await engine.wait(run.id)
        expect(finished.dataPoints).toHaveLength(2)
    })

    it('should throw NotFoundError for an unknown measurement type', () => {
        expect(() => service.start('spiral', {})).toThrow(NotFoundError)
    })

    it('should throw NotFoundError for an unknown detector', () => {
        expect(() => service.start('time-series', { detectors: [{ deviceId: 'dev-a', detectorId: 9 }] })).toThrow(
            'No detector with ID dev-a/9'
        )
    })
})

// ============================================================================
// get Tests
// ============================================================================

describe('RunService.get', () => {
    it('should prefer the live run', async () => {
        const run = service.start('time-series', { detectors: [{ deviceId: 'dev-a', detectorId: 0 }], count: 1 })
        await engine.wait(run.id)

        const snapshot = await service.get(run.id)

        expect(snapshot.id).toBe(run.id)
        expect(store.lookups).toEqual([])
    })

    it('should fall back to the store for runs no longer in memory', async () => {
        await expect(service.get(STORED_ID)).resolves.toEqual(storedRun)
        expect(store.lookups).toEqual([STORED_ID])
    })

    it('should not query the store for IDs that are not UUIDs', async () => {
        await expect(service.get('nope')).rejects.toThrow('No run with ID nope')
        expect(store.lookups).toEqual([])
    })

    it('should throw NotFoundError when the store has no such run', async () => {
        const missing = 'aaaaaaaa-bbbb-4ccc-8ddd-eeeeeeeeeeee'

        await expect(service.get(missing)).rejects.toThrow(NotFoundError)
        expect(store.lookups).toEqual([missing])
    })

    it('should work without a store', async () => {
        const memoryOnly = new RunService(engine, createMeasurementTypes(), devices, null)

        await expect(memoryOnly.get(STORED_ID)).rejects.toThrow(NotFoundError)
    })
})
