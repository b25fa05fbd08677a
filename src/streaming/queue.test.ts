/**
 * Tests for the bounded-wait block queue
 *
 * @module streaming/queue.test
 */

import { describe, it, expect, beforeEach, vi, afterEach } from 'vitest'
import { BlockQueue } from './queue.js'
import { systemTimers } from './timers.js'

describe('BlockQueue', () => {
  let queue: BlockQueue<string>

  beforeEach(() => {
    vi.useFakeTimers()
    queue = new BlockQueue<string>(systemTimers)
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe('basic operations', () => {
    it('should return queued items in FIFO order', async () => {
      queue.put('a')
      queue.put('b')

      expect(queue.size).toBe(2)
      await expect(queue.take(20)).resolves.toBe('a')
      await expect(queue.take(20)).resolves.toBe('b')
      expect(queue.isEmpty).toBe(true)
    })

    it('should put items back at the head', async () => {
      queue.put('body')
      queue.unshift('header')

      await expect(queue.take(20)).resolves.toBe('header')
      await expect(queue.take(20)).resolves.toBe('body')
    })

    it('should clear pending items', () => {
      queue.put('a')
      queue.put('b')

      expect(queue.clear()).toEqual(['a', 'b'])
      expect(queue.isEmpty).toBe(true)
    })
  })

  describe('bounded wait', () => {
    it('resolves undefined when nothing arrives in time', async () => {
      let result: string | undefined = 'unset'
      const pending = queue.take(20).then((item) => {
        result = item
      })

      await vi.advanceTimersByTimeAsync(19)
      expect(result).toBe('unset')

      await vi.advanceTimersByTimeAsync(1)
      await pending
      expect(result).toBeUndefined()
      expect(queue.getStats().timeouts).toBe(1)
    })

    it('hands an item straight to a waiting taker', async () => {
      const pending = queue.take(20)
      expect(queue.getStats().waiting).toBe(true)

      await vi.advanceTimersByTimeAsync(10)
      queue.put('late')

      await expect(pending).resolves.toBe('late')
      expect(queue.isEmpty).toBe(true)
      expect(queue.getStats().waiting).toBe(false)

      // the cancelled timer must not count a timeout later
      await vi.advanceTimersByTimeAsync(50)
      expect(queue.getStats().timeouts).toBe(0)
    })

    it('rejects a second concurrent taker', async () => {
      const first = queue.take(20)

      await expect(queue.take(20)).rejects.toThrow('BlockQueue supports a single waiting taker')

      queue.put('x')
      await expect(first).resolves.toBe('x')
    })
  })

  describe('statistics', () => {
    it('should track queue statistics', async () => {
      queue.put('a')
      queue.unshift('b')
      await queue.take(20)

      expect(queue.getStats()).toEqual({
        enqueued: 2,
        taken: 1,
        timeouts: 0,
        pending: 1,
        waiting: false
      })
    })
  })
})
