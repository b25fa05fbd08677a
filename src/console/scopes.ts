/**
 * Scoped mode switches
 *
 * Each switch sets one flag or field, runs the body and puts the previous
 * value back on every exit path. Asynchronous bodies keep the switch active
 * until their promise settles.
 *
 * @module console/scopes
 */

import type { KeywordMap } from '../types/sink.js'
import type { ConsoleContext } from './context.js'
import type { OutputSink } from '../streaming/OutputSink.js'
import type { ErrorSink } from '../streaming/ErrorSink.js'

/**
 * Runs a body with a switch applied
 */
export interface Scope {
  <T>(body: () => Promise<T>): Promise<T>
  <T>(body: () => T): T
}

/**
 * Applies a switch and returns the function that undoes it
 */
export type ScopeEntry = () => () => void

const isPromise = (value: unknown): value is Promise<unknown> => value instanceof Promise

/**
 * Run body between enter() and the restore function it returns
 */
export function runScoped<T>(enter: ScopeEntry, body: () => Promise<T>): Promise<T>
export function runScoped<T>(enter: ScopeEntry, body: () => T): T
export function runScoped(enter: ScopeEntry, body: () => unknown): unknown {
  const restore = enter()
  let result: unknown
  try {
    result = body()
  } catch (error) {
    restore()
    throw error
  }

  if (isPromise(result)) {
    return result.finally(restore)
  }

  restore()
  return result
}

export function createScope(enter: ScopeEntry): Scope {
  function scope<T>(body: () => Promise<T>): Promise<T>
  function scope<T>(body: () => T): T
  function scope(body: () => unknown): unknown {
    return runScoped(enter, body)
  }
  return scope
}

/**
 * Scope that sets target[key] to value
 */
export function setting<O extends object, K extends keyof O>(
  target: O,
  key: K,
  value: O[K]
): Scope {
  return createScope(() => {
    const previous = target[key]
    target[key] = value
    return () => {
      target[key] = previous
    }
  })
}

const toDefaultMap = (words: readonly string[]): KeywordMap =>
  Object.fromEntries(words.map((word) => [word, null]))

/**
 * The switches available on a ConsoleMux
 */
export class ScopeSwitches {
  /** Output Sink writes reach the screen even in user mode */
  readonly user: Scope
  /**
   * Error Sink writes reach the screen even in user mode. Visibility is
   * decided when the block flushes, so the body must still be running then:
   * wrap an async body that awaits the flush (e.g. `err.drain()`).
   */
  readonly userErr: Scope
  readonly warn: Scope
  readonly error: Scope
  /** Output Sink writes go to the log only */
  readonly fileOnly: Scope
  /** Runs the body unchanged */
  readonly none: Scope = createScope(() => () => undefined)

  constructor(
    private readonly context: ConsoleContext,
    private readonly out: OutputSink,
    private readonly err: ErrorSink
  ) {
    this.user = setting(out, 'user', true)
    this.userErr = setting(err, 'user', true)
    this.warn = setting(out, 'warn', true)
    this.error = setting(out, 'error', true)
    this.fileOnly = setting(out, 'fileOnly', true)
  }

  /**
   * Highlight words in the default highlight and lowlight colours
   */
  highlight(highWords: readonly string[], lowWords: readonly string[] = []): Scope {
    return this.highmap(toDefaultMap(highWords), toDefaultMap(lowWords))
  }

  /**
   * Highlight words in explicit colours; a null colour uses the default
   */
  highmap(highWords: KeywordMap, lowWords: KeywordMap = {}): Scope {
    return createScope(() => {
      const previous = { high: this.out.highWords, low: this.out.lowWords }
      this.out.highWords = highWords
      this.out.lowWords = lowWords
      return () => {
        this.out.highWords = previous.high
        this.out.lowWords = previous.low
      }
    })
  }

  /**
   * Swap the timestamp prefix
   */
  pre(prefix: string): Scope {
    return setting(this.context, 'prefix', prefix)
  }

  /**
   * Swap the message shown in the next error block header
   */
  errHeader(message: string): Scope {
    return setting(this.err, 'headerMessage', message)
  }
}
