/**
 * Console Multiplexer
 *
 * Owns the context, both sinks and the optional log file, and exposes the
 * writer interface callers print through.
 *
 * @example
 * ```typescript
 * const mux = ConsoleMux.create({ logPath: 'logs/app.log', prefix: 'app' })
 * mux.print('listening on %d', 8080)
 * mux.scopes.warn(() => mux.logLine('disk almost full', STATUS.WARN))
 * await mux.close()
 * ```
 *
 * @module mux/ConsoleMux
 */

import { format } from 'node:util'
import { normalizeMuxConfig } from '../config/mux-config.js'
import { ConsoleContext } from '../console/context.js'
import { printException } from '../console/exception.js'
import { promptUser, type PromptOptions } from '../console/prompt.js'
import { ScopeSwitches } from '../console/scopes.js'
import { StdioRedirect } from '../console/stdio-redirect.js'
import { ErrorSink } from '../streaming/ErrorSink.js'
import { SinkErrorHandler } from '../streaming/ErrorHandler.js'
import { LogFile } from '../streaming/LogFile.js'
import type { ReentrantLock } from '../streaming/locks.js'
import { OutputSink } from '../streaming/OutputSink.js'
import type { MuxConfig, NormalizedMuxConfig } from '../types/config.js'
import type { OutputDevice, TextWriter } from '../types/sink.js'
import { coreLogger } from '../utils/logger.js'

export class ConsoleMux implements TextWriter {
  readonly context: ConsoleContext
  readonly out: OutputSink
  readonly err: ErrorSink
  readonly scopes: ScopeSwitches
  readonly errors: SinkErrorHandler
  readonly stdoutDevice: OutputDevice
  readonly stderrDevice: OutputDevice
  private readonly log: LogFile | null
  private readonly redirect: StdioRedirect | null
  private closed = false
  private debug = coreLogger()

  /**
   * Build a multiplexer from user configuration
   * @throws MuxConfigError if the configuration is invalid
   */
  static create(config: MuxConfig = {}): ConsoleMux {
    return new ConsoleMux(normalizeMuxConfig(config))
  }

  private constructor(config: NormalizedMuxConfig) {
    this.redirect = config.redirectStdio ? new StdioRedirect() : null
    const originals = this.redirect?.getOriginalDevices()
    this.stdoutDevice = config.stdout ?? originals?.stdout ?? process.stdout
    this.stderrDevice = config.stderr ?? originals?.stderr ?? process.stderr

    this.errors = new SinkErrorHandler(this.stderrDevice)
    this.context = new ConsoleContext({
      colour: config.colour,
      prefix: config.prefix,
      separator: config.separator,
      userMode: config.userMode,
      batchIntervalMs: config.batchIntervalMs,
      timers: config.timers,
      clock: config.clock
    })

    this.log = config.logPath ? new LogFile(config.logPath, this.errors) : null
    this.out = new OutputSink(this.context, this.stdoutDevice, this.log, this.errors)
    this.err = new ErrorSink(
      this.context,
      this.stderrDevice,
      config.logStderr ? this.log : null,
      this.out,
      this.errors,
      { printHeader: config.printStderrHeader }
    )
    this.scopes = new ScopeSwitches(this.context, this.out, this.err)

    this.redirect?.enable({ stdout: this.out, stderr: this.err })

    if (config.logPath && config.announceLog) {
      const logPath = config.logPath
      this.scopes.user(() =>
        this.scopes.highlight([logPath, config.prefix])(() =>
          this.out.write(`${config.prefix}: begin logging to ${logPath}\n`)
        )
      )
    }

    this.debug('Initialised (colour=%s, log=%s)', config.colour, this.log?.path ?? 'none')
  }

  get lock(): ReentrantLock {
    return this.context.lock
  }

  get userMode(): boolean {
    return this.context.userMode
  }

  set userMode(enabled: boolean) {
    this.context.userMode = enabled
  }

  get logPath(): string | undefined {
    return this.log?.path
  }

  /**
   * Write raw text to the Output Sink
   */
  write(text: string): boolean {
    return this.out.write(text)
  }

  /**
   * Write raw text to the Error Sink
   */
  writeErr(text: string): boolean {
    return this.err.write(text)
  }

  /**
   * util.format the arguments and write them as one line
   */
  print(...args: unknown[]): void {
    this.out.write(`${format(...args)}\n`)
  }

  printErr(...args: unknown[]): void {
    this.err.write(`${format(...args)}\n`)
  }

  /**
   * Timestamp prefix for the current time
   */
  stamp(status?: string): string {
    return this.context.stamp(status)
  }

  /**
   * Write a timestamped line, optionally with a status field
   */
  logLine(text: string, status?: string): void {
    this.out.write(`${this.context.stamp(status)}${text}\n`)
  }

  /**
   * Hold the shared lock for fn so its output stays contiguous on screen
   */
  batch<T>(fn: () => Promise<T> | T): Promise<T> {
    return this.context.lock.withLock(fn)
  }

  prompt(message?: string, options?: PromptOptions): Promise<string> {
    return promptUser(this, message, options)
  }

  printException(error: unknown, message?: string): void {
    printException(this, error, message)
  }

  /**
   * Finish the pending error block, reset colours and close the log
   */
  async close(): Promise<void> {
    if (this.closed) {
      return
    }
    this.closed = true

    this.redirect?.disable()
    await this.err.drain()
    // Records parked behind another holder's batch drain before the log closes
    await this.lock.withLock(() => {
      this.out.close()
      this.err.close()
      this.log?.close()
    })
    this.debug('Closed')
  }

  get isClosed(): boolean {
    return this.closed
  }
}
