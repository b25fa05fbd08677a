/**
 * Tests for the shared serialization lock
 *
 * @module streaming/locks.test
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { ReentrantLock } from './locks.js'

const deferred = (): { promise: Promise<void>; resolve: () => void } => {
  let resolve: () => void = () => undefined
  const promise = new Promise<void>((done) => {
    resolve = done
  })
  return { promise, resolve }
}

describe('ReentrantLock', () => {
  let lock: ReentrantLock

  beforeEach(() => {
    lock = new ReentrantLock({ name: 'test' })
  })

  describe('tryRun', () => {
    it('runs immediately when the lock is free', () => {
      let lockedInside = false

      const ran = lock.tryRun(() => {
        lockedInside = lock.isLocked
      })

      expect(ran).toBe(true)
      expect(lockedInside).toBe(true)
      expect(lock.isLocked).toBe(false)
    })

    it('refuses while another context holds the lock', async () => {
      const gate = deferred()
      const held = lock.withLock(() => gate.promise)

      let ran = false
      expect(lock.tryRun(() => (ran = true))).toBe(false)
      expect(ran).toBe(false)

      gate.resolve()
      await held
      expect(lock.tryRun(() => (ran = true))).toBe(true)
      expect(ran).toBe(true)
    })

    it('re-enters from inside a held section', async () => {
      let inner = false

      await lock.withLock(async () => {
        await Promise.resolve()
        inner = lock.tryRun(() => {
          expect(lock.getStats().depth).toBe(2)
        })
      })

      expect(inner).toBe(true)
      expect(lock.isLocked).toBe(false)
    })

    it('releases the lock when the function throws', () => {
      expect(() =>
        lock.tryRun(() => {
          throw new Error('Test error')
        })
      ).toThrow('Test error')

      expect(lock.isLocked).toBe(false)
    })
  })

  describe('withLock', () => {
    it('should execute function with lock held', async () => {
      const result = await lock.withLock(() => {
        expect(lock.isLocked).toBe(true)
        expect(lock.isHeldByCurrent()).toBe(true)
        return 42
      })

      expect(result).toBe(42)
      expect(lock.isLocked).toBe(false)
    })

    it('should release lock even on error', async () => {
      await expect(
        lock.withLock(() => {
          throw new Error('Test error')
        })
      ).rejects.toThrow('Test error')

      expect(lock.isLocked).toBe(false)
    })

    it('does not deadlock when nested', async () => {
      const result = await lock.withLock(() => lock.withLock(() => lock.withLock(() => 'deep')))

      expect(result).toBe('deep')
      expect(lock.isLocked).toBe(false)
    })

    it('hands the lock to waiters in arrival order', async () => {
      const order: string[] = []
      const gate = deferred()

      const first = lock.withLock(async () => {
        order.push('first:start')
        await gate.promise
        order.push('first:end')
      })
      const second = lock.withLock(() => {
        order.push('second')
      })
      const third = lock.withLock(() => {
        order.push('third')
      })

      expect(lock.getStats().waiters).toBe(2)

      gate.resolve()
      await Promise.all([first, second, third])

      expect(order).toEqual(['first:start', 'first:end', 'second', 'third'])
      expect(lock.getStats().acquisitions).toBe(3)
    })

    it('is not owned by the caller outside the held section', async () => {
      const gate = deferred()
      const held = lock.withLock(() => gate.promise)

      expect(lock.isLocked).toBe(true)
      expect(lock.isHeldByCurrent()).toBe(false)

      gate.resolve()
      await held
    })
  })

  describe('whenFree', () => {
    it('runs immediately when the lock is free', () => {
      const calls: string[] = []
      lock.whenFree(() => calls.push('free'))
      expect(calls).toEqual(['free'])
    })

    it('waits for the holder and every queued waiter', async () => {
      const calls: string[] = []
      const gate = deferred()

      const first = lock.withLock(() => gate.promise)
      const second = lock.withLock(() => {
        calls.push('second')
      })
      lock.whenFree(() => calls.push('free'))

      expect(calls).toEqual([])

      gate.resolve()
      await Promise.all([first, second])

      expect(calls).toEqual(['second', 'free'])
      expect(lock.getStats().deferred).toBe(0)
    })
  })

  describe('detached', () => {
    it('runs outside the owner context', async () => {
      let insideDetached = true

      await lock.withLock(() => {
        insideDetached = lock.detached(() => lock.isHeldByCurrent())
      })

      expect(insideDetached).toBe(false)
    })

    it('makes work started in a held section wait for the lock', async () => {
      const order: string[] = []
      let detachedWork: Promise<void> = Promise.resolve()

      await lock.withLock(async () => {
        detachedWork = lock.detached(() =>
          lock.withLock(() => {
            order.push('detached')
          })
        )
        await Promise.resolve()
        order.push('holder')
      })
      await detachedWork

      expect(order).toEqual(['holder', 'detached'])
    })
  })

  describe('statistics', () => {
    it('should track lock statistics', async () => {
      const stats1 = lock.getStats()
      expect(stats1.locked).toBe(false)
      expect(stats1.acquisitions).toBe(0)
      expect(stats1.name).toBe('test')

      await lock.withLock(() => {
        const stats2 = lock.getStats()
        expect(stats2.locked).toBe(true)
        expect(stats2.depth).toBe(1)
      })

      const stats3 = lock.getStats()
      expect(stats3.locked).toBe(false)
      expect(stats3.acquisitions).toBe(1)
    })
  })
})
