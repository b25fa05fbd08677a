/**
 * Error Handler for Sink Operations
 *
 * Sink failures never propagate into the code that called write(): the trace
 * is dumped straight to the raw error device instead, bypassing both sinks so
 * a broken sink cannot recurse into itself.
 *
 * @module streaming/ErrorHandler
 */

import { errorLogger } from '../utils/logger.js'
import type { OutputDevice } from '../types/sink.js'

/**
 * Error types that can occur in sink operations
 */
export enum SinkErrorType {
  /** Colourising or keyword highlighting failed */
  FORMATTING = 'formatting',
  /** Writing to the real device failed */
  WRITE = 'write',
  /** Writing or flushing the log file failed */
  LOG = 'log',
  /** A delayed flush attempt failed */
  TIMER = 'timer'
}

/**
 * Error context information
 */
export interface SinkErrorContext {
  type: SinkErrorType
  /** Sink or component that failed */
  source: string
  error: Error
  timestamp: number
}

/**
 * Error statistics
 */
export interface SinkErrorStats {
  totalErrors: number
  errorsByType: Record<SinkErrorType, number>
  suppressed: number
  lastError?: SinkErrorContext
}

/**
 * Types reported only once per handler; repeats are counted but not dumped
 */
const REPORT_ONCE: ReadonlySet<SinkErrorType> = new Set([SinkErrorType.LOG])

export const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error))

/**
 * Render an error the way it is dumped to the raw device
 */
export function formatTrace(error: Error): string {
  const trace = error.stack ?? `${error.name}: ${error.message}`
  return trace.endsWith('\n') ? trace : `${trace}\n`
}

/**
 * Reports sink failures directly to the raw error device
 */
export class SinkErrorHandler {
  private debugError = errorLogger()
  private stats: SinkErrorStats = {
    totalErrors: 0,
    errorsByType: {
      [SinkErrorType.FORMATTING]: 0,
      [SinkErrorType.WRITE]: 0,
      [SinkErrorType.LOG]: 0,
      [SinkErrorType.TIMER]: 0
    },
    suppressed: 0
  }

  constructor(private readonly device: OutputDevice) {}

  /**
   * Record a failure and dump its trace to the raw device
   */
  handle(type: SinkErrorType, source: string, error: unknown): SinkErrorContext {
    const context: SinkErrorContext = {
      type,
      source,
      error: toError(error),
      timestamp: Date.now()
    }

    const seen = this.stats.errorsByType[type]
    this.stats.totalErrors++
    this.stats.errorsByType[type] = seen + 1
    this.stats.lastError = context

    this.debugError('%s failure in %s: %s', type, source, context.error.message)

    if (REPORT_ONCE.has(type) && seen > 0) {
      this.stats.suppressed++
      return context
    }

    try {
      this.device.write(formatTrace(context.error))
    } catch (dumpError) {
      // The raw device itself is gone; only the debug channel is left
      this.debugError('Could not dump trace for %s: %s', source, toError(dumpError).message)
    }

    return context
  }

  getStats(): SinkErrorStats {
    return {
      ...this.stats,
      errorsByType: { ...this.stats.errorsByType }
    }
  }
}
