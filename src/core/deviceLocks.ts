/**
 * Per-device mutual exclusion.
 *
 * A run takes the locks of every device it references in one atomic
 * acquisition, so two runs sharing devices cannot deadlock. Waiters are
 * served in arrival order, except that a waiter whose devices are all free
 * and not wanted by an earlier waiter may go ahead.
 */

export type Release = () => void

export class LockWaitAborted extends Error {
  constructor() {
    super('Lock wait aborted')
    this.name = 'LockWaitAborted'
  }
}

interface Waiter {
  keys: string[]
  grant: (release: Release) => void
}

export class DeviceLocks {
  private held = new Set<string>()
  private waiters: Waiter[] = []

  isHeld(deviceId: string): boolean {
    return this.held.has(deviceId)
  }

  /** Whether a queued waiter wants this device */
  isWanted(deviceId: string): boolean {
    return this.waiters.some(w => w.keys.includes(deviceId))
  }

  /**
   * Take the locks immediately or not at all. A device that is held, or that
   * a queued waiter wants, is refused so manual calls never overtake a run.
   */
  tryAcquire(deviceIds: string[]): Release | null {
    const keys = [...new Set(deviceIds)]
    if (keys.some(k => this.held.has(k) || this.isWanted(k))) return null
    return this.take(keys)
  }

  acquire(deviceIds: string[], signal?: AbortSignal): Promise<Release> {
    const keys = [...new Set(deviceIds)]

    return new Promise<Release>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new LockWaitAborted())
        return
      }

      const onAbort = () => {
        this.waiters = this.waiters.filter(w => w !== waiter)
        reject(new LockWaitAborted())
        // Our departure may unblock waiters queued behind us
        this.pump()
      }

      const waiter: Waiter = {
        keys,
        grant: release => {
          signal?.removeEventListener('abort', onAbort)
          resolve(release)
        },
      }

      this.waiters.push(waiter)
      signal?.addEventListener('abort', onAbort, { once: true })
      this.pump()
    })
  }

  private take(keys: string[]): Release {
    for (const k of keys) this.held.add(k)

    let released = false
    return () => {
      if (released) return
      released = true
      for (const k of keys) this.held.delete(k)
      this.pump()
    }
  }

  private pump(): void {
    const wanted = new Set<string>()

    for (const waiter of [...this.waiters]) {
      const free = waiter.keys.every(k => !this.held.has(k) && !wanted.has(k))
      if (free) {
        this.waiters = this.waiters.filter(w => w !== waiter)
        waiter.grant(this.take(waiter.keys))
      } else {
        for (const k of waiter.keys) wanted.add(k)
      }
    }
  }
}
