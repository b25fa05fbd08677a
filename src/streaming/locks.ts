/**
 * Shared serialization lock for the output sinks
 *
 * Both sinks write to the real devices and the log file only while holding
 * this lock. Callers can take it themselves to keep a multi-line sequence of
 * writes contiguous on screen.
 *
 * Ownership follows the asynchronous execution context (AsyncLocalStorage),
 * so code running inside a held section, including its awaited
 * continuations, re-enters without waiting.
 *
 * @module streaming/locks
 */

import { AsyncLocalStorage } from 'node:async_hooks'
import { lockLogger } from '../utils/logger.js'

/**
 * Represents a waiter in the lock queue
 */
interface Waiter {
  token: symbol
  resolve: () => void
  timestamp: number
}

/**
 * Configuration for the lock
 */
export interface LockConfig {
  /** Name for debugging purposes */
  name?: string
}

/**
 * Lock statistics
 */
export interface LockStats {
  locked: boolean
  depth: number
  waiters: number
  deferred: number
  acquisitions: number
  name: string
}

/**
 * Re-entrant mutual exclusion lock without acquisition timeout
 */
export class ReentrantLock {
  private _holder: symbol | null = null
  private _depth = 0
  private _waiters: Waiter[] = []
  private _onFree: (() => void)[] = []
  private _acquisitions = 0
  private readonly _owner = new AsyncLocalStorage<symbol>()
  private readonly _name: string
  private debug = lockLogger()

  constructor(config: LockConfig = {}) {
    this._name = config.name ?? 'console-mux'
  }

  /**
   * Check if the lock is currently held by anyone
   */
  get isLocked(): boolean {
    return this._holder !== null
  }

  /**
   * Check if the calling context owns the lock
   */
  isHeldByCurrent(): boolean {
    return this._holder !== null && this._owner.getStore() === this._holder
  }

  /**
   * Execute a function with the lock held, waiting for it if needed
   * @param fn - Function to execute
   */
  async withLock<T>(fn: () => Promise<T> | T): Promise<T> {
    if (this.isHeldByCurrent()) {
      this._depth++
      try {
        return await fn()
      } finally {
        this.exit()
      }
    }

    const token = Symbol(this._name)
    await this.acquire(token)
    try {
      return await this._owner.run(token, fn)
    } finally {
      this.exit()
    }
  }

  /**
   * Run fn synchronously under the lock if it is free or already ours.
   * @returns false, without running fn, when another context holds the lock
   */
  tryRun(fn: () => void): boolean {
    if (this.isHeldByCurrent()) {
      this._depth++
      try {
        fn()
      } finally {
        this.exit()
      }
      return true
    }

    if (this._holder !== null) {
      return false
    }

    const token = Symbol(this._name)
    this.enter(token)
    try {
      this._owner.run(token, fn)
    } finally {
      this.exit()
    }
    return true
  }

  /**
   * Register a callback for the moment the lock is fully released
   * and no waiter takes it over. Runs immediately when the lock is free.
   */
  whenFree(callback: () => void): void {
    if (this._holder === null) {
      this._owner.exit(callback)
      return
    }
    this._onFree.push(callback)
  }

  /**
   * Run fn outside of any owner context. Work started here competes for
   * the lock instead of inheriting the caller's ownership.
   */
  detached<T>(fn: () => T): T {
    return this._owner.exit(fn)
  }

  /**
   * Get lock statistics for monitoring
   */
  getStats(): LockStats {
    return {
      locked: this._holder !== null,
      depth: this._depth,
      waiters: this._waiters.length,
      deferred: this._onFree.length,
      acquisitions: this._acquisitions,
      name: this._name
    }
  }

  private acquire(token: symbol): Promise<void> {
    if (this._holder === null) {
      this.enter(token)
      return Promise.resolve()
    }

    return new Promise<void>((resolve) => {
      this._waiters.push({ token, resolve, timestamp: Date.now() })
      this.debug('%s: queued waiter (%d waiting)', this._name, this._waiters.length)
    })
  }

  private enter(token: symbol): void {
    this._holder = token
    this._depth = 1
    this._acquisitions++
  }

  private exit(): void {
    if (this._depth <= 0) {
      throw new Error(`Cannot release unlocked lock ${this._name}`)
    }

    this._depth--
    if (this._depth > 0) {
      return
    }

    this._holder = null

    // Hand over to the next waiter
    const next = this._waiters.shift()
    if (next) {
      this.enter(next.token)
      this.debug('%s: handed over after %dms wait', this._name, Date.now() - next.timestamp)
      next.resolve()
      return
    }

    const callbacks = this._onFree.splice(0)
    for (const callback of callbacks) {
      this._owner.exit(callback)
    }
  }
}
