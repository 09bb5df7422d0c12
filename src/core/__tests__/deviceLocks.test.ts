import { describe, it, expect } from 'vitest'
import { DeviceLocks, LockWaitAborted } from '../deviceLocks'

describe('DeviceLocks', () => {
    it('should hand out free locks immediately', () => {
        const locks = new DeviceLocks()

        const release = locks.tryAcquire(['a', 'b'])

        expect(release).not.toBeNull()
        expect(locks.isHeld('a')).toBe(true)
        expect(locks.isHeld('b')).toBe(true)
        expect(locks.tryAcquire(['b'])).toBeNull()

        release?.()
        expect(locks.isHeld('a')).toBe(false)
        expect(locks.tryAcquire(['b'])).not.toBeNull()
    })

    it('should take all locks or none', () => {
        const locks = new DeviceLocks()
        locks.tryAcquire(['b'])

        expect(locks.tryAcquire(['a', 'b'])).toBeNull()
        expect(locks.isHeld('a')).toBe(false)
    })

    it('should refuse a free lock that a queued waiter wants', async () => {
        const locks = new DeviceLocks()
        const holdA = await locks.acquire(['a'])
        const queued = locks.acquire(['a', 'b'])

        expect(locks.isHeld('b')).toBe(false)
        expect(locks.isWanted('b')).toBe(true)
        expect(locks.tryAcquire(['b'])).toBeNull()
        expect(locks.tryAcquire(['c'])).not.toBeNull()

        holdA()
        const release = await queued
        expect(locks.isWanted('b')).toBe(false)
        release()

        expect(locks.tryAcquire(['b'])).not.toBeNull()
    })

    it('should grant waiters in arrival order', async () => {
        const locks = new DeviceLocks()
        const order: string[] = []
        const first = await locks.acquire(['a'])

        const second = locks.acquire(['a']).then(release => {
            order.push('second')
            return release
        })
        const third = locks.acquire(['a']).then(release => {
            order.push('third')
            return release
        })

        first()
        const releaseSecond = await second
        releaseSecond()
        const releaseThird = await third
        releaseThird()

        expect(order).toEqual(['second', 'third'])
        expect(locks.isHeld('a')).toBe(false)
    })

    it('should let a disjoint waiter pass a blocked one', async () => {
        const locks = new DeviceLocks()
        const holdA = await locks.acquire(['a'])
        let blockedGranted = false

        const blocked = locks.acquire(['a', 'b']).then(release => {
            blockedGranted = true
            return release
        })
        const disjoint = await locks.acquire(['c'])

        expect(blockedGranted).toBe(false)
        expect(locks.isHeld('c')).toBe(true)
        expect(locks.isHeld('b')).toBe(false)

        disjoint()
        holdA()
        const release = await blocked

        expect(blockedGranted).toBe(true)
        expect(locks.isHeld('b')).toBe(true)
        release()
    })

    it('should drop an aborted waiter and serve the next one', async () => {
        const locks = new DeviceLocks()
        const hold = await locks.acquire(['a'])
        const controller = new AbortController()

        const aborted = locks.acquire(['a'], controller.signal)
        const next = locks.acquire(['a'])
        controller.abort()

        await expect(aborted).rejects.toBeInstanceOf(LockWaitAborted)
        hold()
        const release = await next
        expect(locks.isHeld('a')).toBe(true)
        release()
    })

    it('should reject at once for an already aborted signal', async () => {
        const locks = new DeviceLocks()
        const controller = new AbortController()
        controller.abort()

        await expect(locks.acquire(['a'], controller.signal)).rejects.toBeInstanceOf(LockWaitAborted)
        expect(locks.isHeld('a')).toBe(false)
    })

    it('should ignore a second release', () => {
        const locks = new DeviceLocks()
        const first = locks.tryAcquire(['a'])
        first?.()
        const second = locks.tryAcquire(['a'])

        first?.()

        expect(second).not.toBeNull()
        expect(locks.isHeld('a')).toBe(true)
    })
})
