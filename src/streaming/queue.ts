/**
 * FIFO queue with bounded-wait dequeue
 *
 * Holds the raw fragments of an error block. The flushing side takes items
 * one at a time and waits at most one batching interval for the next one;
 * a take that times out marks the block as quiescent.
 *
 * @module streaming/queue
 */

import type { TimerHandle, TimerService } from './timers.js'

/**
 * A pending take waiting for the next item
 */
interface Taker<T> {
  resolve: (item: T | undefined) => void
  timer: TimerHandle
}

/**
 * Queue statistics
 */
export interface QueueStats {
  enqueued: number
  taken: number
  timeouts: number
  pending: number
  waiting: boolean
}

export class BlockQueue<T> {
  private _items: T[] = []
  private _taker: Taker<T> | null = null
  private _stats = {
    enqueued: 0,
    taken: 0,
    timeouts: 0
  }

  constructor(private readonly timers: TimerService) {}

  /**
   * Append an item, handing it straight to a waiting taker if there is one
   */
  put(item: T): void {
    this._stats.enqueued++

    const taker = this._taker
    if (taker) {
      this._taker = null
      taker.timer.cancel()
      this._stats.taken++
      taker.resolve(item)
      return
    }

    this._items.push(item)
  }

  /**
   * Put an item back at the head of the queue
   */
  unshift(item: T): void {
    this._stats.enqueued++
    this._items.unshift(item)
  }

  /**
   * Take the next item, waiting up to timeoutMs for one to arrive.
   * Resolves to undefined when nothing arrived in time.
   */
  take(timeoutMs: number): Promise<T | undefined> {
    if (this._items.length > 0) {
      this._stats.taken++
      return Promise.resolve(this._items.shift())
    }

    if (this._taker) {
      return Promise.reject(new Error('BlockQueue supports a single waiting taker'))
    }

    return new Promise<T | undefined>((resolve) => {
      const taker: Taker<T> = {
        resolve,
        timer: this.timers.schedule(timeoutMs, () => {
          if (this._taker === taker) {
            this._taker = null
            this._stats.timeouts++
            resolve(undefined)
          }
        })
      }
      this._taker = taker
    })
  }

  /**
   * Remove every queued item
   */
  clear(): T[] {
    return this._items.splice(0)
  }

  get isEmpty(): boolean {
    return this._items.length === 0
  }

  get size(): number {
    return this._items.length
  }

  getStats(): QueueStats {
    return {
      ...this._stats,
      pending: this._items.length,
      waiting: this._taker !== null
    }
  }
}
