/**
 * Error Sink
 *
 * Stands in for the error stream. Writes are queued and flushed to the
 * screen as one block: a delimiter header, then every fragment that arrives
 * within the batching interval of the previous one, then a closing line
 * break once the stream has been quiet for a whole interval.
 *
 * A block starts when either
 * - the Output Sink has just completed a line, or
 * - the batching interval has lapsed twice without it doing so.
 *
 * flushIfReady() is the only place that decides when a block starts; the
 * timer and the Output Sink's line signal both go through it.
 *
 * @module streaming/ErrorSink
 */

import { createLogger } from '../utils/logger.js'
import type { ConsoleContext } from '../console/context.js'
import type { BlockState, OutputDevice, SinkFlags, TextWriter } from '../types/sink.js'
import { SinkErrorType, type SinkErrorHandler } from './ErrorHandler.js'
import type { LogFile } from './LogFile.js'
import type { BlockFlusher, OutputSink } from './OutputSink.js'
import { BlockQueue } from './queue.js'
import type { TimerHandle } from './timers.js'

export interface ErrorSinkOptions {
  /** Start every block with a delimiter and timestamp header */
  printHeader: boolean
}

export interface ErrorSinkStats {
  state: BlockState
  pending: number
  blocks: number
  timerPending: boolean
}

export class ErrorSink implements SinkFlags, TextWriter, BlockFlusher {
  user = false
  warn = false
  error = true
  fileOnly = false
  /** Appended to the timestamp in the next block header */
  headerMessage = ''
  private readonly queue: BlockQueue<string>
  private readonly printHeader: boolean
  private timer: TimerHandle | null = null
  private state: BlockState = 'idle'
  private activeFlush: Promise<void> | null = null
  private blocks = 0
  private debug = createLogger('error-sink')

  constructor(
    private readonly context: ConsoleContext,
    private readonly device: OutputDevice,
    private readonly log: LogFile | null,
    private readonly output: OutputSink,
    private readonly errors: SinkErrorHandler,
    options: ErrorSinkOptions
  ) {
    this.printHeader = options.printHeader
    this.queue = new BlockQueue<string>(context.timers)
    output.attach(this)
  }

  write(text: string): boolean {
    try {
      if (this.queue.isEmpty && this.state !== 'flushing' && this.printHeader) {
        this.queue.put(this.header())
      }
      this.queue.put(text)
      if (this.state === 'idle') {
        this.schedule(false)
      }
    } catch (error) {
      this.errors.handle(SinkErrorType.WRITE, 'error', error)
    }
    return true
  }

  /**
   * Start flushing the pending block if the screen is at a line boundary,
   * or unconditionally when forced. Otherwise retry once more, forced,
   * after another batching interval.
   */
  flushIfReady(force: boolean): void {
    if (this.state === 'flushing') {
      return
    }

    this.cancelTimer()

    if (this.queue.isEmpty) {
      this.state = 'idle'
      return
    }

    if (!force && this.output.last !== '\n') {
      this.schedule(true)
      return
    }

    this.state = 'flushing'
    this.activeFlush = this.context.lock.detached(() => this.runFlush())
  }

  /**
   * Colour text for the screen and prefix every line inside the block
   */
  processText(text: string): string {
    const palette = this.context.palette
    const prefixed = text.replaceAll('\n', `\n${palette.stderrPrefix}`)
    if (!palette.enabled) {
      return prefixed
    }

    const colour = this.user ? palette.user : this.error ? palette.error : palette.warn
    return palette.none + colour + prefixed + palette.none
  }

  /**
   * Force out everything pending and wait until the sink is idle
   */
  async drain(): Promise<void> {
    while (!this.queue.isEmpty || this.activeFlush) {
      if (this.activeFlush) {
        await this.activeFlush
        continue
      }
      this.flushIfReady(true)
    }
  }

  flush(): void {
    this.log?.flush()
  }

  close(): void {
    this.cancelTimer()
    this.flush()
    if (this.context.palette.enabled) {
      this.writeDevice(this.context.palette.none)
    }
  }

  get blockState(): BlockState {
    return this.state
  }

  getStats(): ErrorSinkStats {
    return {
      state: this.state,
      pending: this.queue.size,
      blocks: this.blocks,
      timerPending: this.timer !== null
    }
  }

  private header(): string {
    const palette = this.context.palette
    return `${palette.stderrHeader}${this.context.stamp()}${this.headerMessage}${palette.none}\n`
  }

  private schedule(force: boolean): void {
    this.cancelTimer()
    this.state = 'waiting'
    this.timer = this.context.timers.schedule(this.context.batchIntervalMs, () => {
      this.timer = null
      try {
        this.flushIfReady(force)
      } catch (error) {
        this.errors.handle(SinkErrorType.TIMER, 'error', error)
      }
    })
  }

  private cancelTimer(): void {
    if (this.timer) {
      this.timer.cancel()
      this.timer = null
    }
  }

  private async runFlush(): Promise<void> {
    this.blocks++
    this.debug('Flushing block %d (%d queued)', this.blocks, this.queue.size)

    try {
      await this.context.lock.withLock(async () => {
        this.output.suspend()
        try {
          let text = await this.queue.take(this.context.batchIntervalMs)
          while (text !== undefined) {
            this.emit(text)
            text = await this.queue.take(this.context.batchIntervalMs)
          }
          this.closeBlock()
        } finally {
          this.output.allow()
        }
      })
    } catch (error) {
      this.errors.handle(SinkErrorType.WRITE, 'error', error)
    } finally {
      this.state = 'idle'
      this.activeFlush = null
    }

    // Fragments that slipped in after the block closed open the next one
    if (!this.queue.isEmpty) {
      if (this.printHeader) {
        this.queue.unshift(this.header())
      }
      this.schedule(false)
    }

    this.output.resume()
  }

  private isVisible(): boolean {
    const { userMode } = this.context
    return !this.fileOnly && ((this.user && userMode) || !userMode)
  }

  private emit(text: string): void {
    this.log?.write(text)
    if (this.isVisible()) {
      this.writeDevice(this.processText(text))
    }
    if (text.includes('\n')) {
      this.flush()
    }
  }

  private closeBlock(): void {
    if (!this.isVisible()) {
      return
    }
    this.log?.write('\n')
    this.writeDevice('\n')
    this.flush()
  }

  private writeDevice(text: string): void {
    try {
      this.device.write(text)
    } catch (error) {
      this.errors.handle(SinkErrorType.WRITE, 'error', error)
    }
  }
}
