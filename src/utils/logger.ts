import createDebug from 'debug'

/**
 * Internal Debug Logger for console-mux
 *
 * This logger is exclusively for internal diagnostics of the multiplexer itself.
 * It never carries the text written through the sinks: that goes to the screen
 * and the log file only.
 *
 * Usage:
 * - Enable with: DEBUG=console-mux:* node app.js
 * - Logs lock hand-overs, block scheduling, configuration and sink failures
 */

/**
 * Factory for creating debug loggers with consistent namespacing
 */
export class LoggerFactory {
  private static debuggers = new Map<string, createDebug.Debugger>()

  /**
   * Creates a debug logger with the specified namespace
   * @param namespace - The namespace for the logger (will be prefixed with console-mux:)
   * @returns A debug function
   */
  static create(namespace: string): createDebug.Debugger {
    const fullNamespace = `console-mux:${namespace}`

    let logger = this.debuggers.get(fullNamespace)
    if (!logger) {
      logger = createDebug(fullNamespace)
      this.debuggers.set(fullNamespace, logger)
    }

    return logger
  }

  /**
   * Clears all cached debuggers
   */
  static clear(): void {
    this.debuggers.clear()
  }
}

export const createLogger = (namespace: string): createDebug.Debugger =>
  LoggerFactory.create(namespace)

// Pre-defined loggers for common namespaces
export const coreLogger = (): createDebug.Debugger => LoggerFactory.create('core')
export const lockLogger = (): createDebug.Debugger => LoggerFactory.create('lock')
export const errorLogger = (): createDebug.Debugger => LoggerFactory.create('error')
