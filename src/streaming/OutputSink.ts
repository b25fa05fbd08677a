/**
 * Output Sink
 *
 * Stands in for the normal output stream. Every write becomes a WriteRecord
 * that is drained, in submission order, to the log file and (when visible)
 * to the real device. Draining pauses while the Error Sink owns the screen
 * and while another context holds the shared lock.
 *
 * @module streaming/OutputSink
 */

import { createLogger } from '../utils/logger.js'
import type { ConsoleContext } from '../console/context.js'
import type {
  KeywordMap,
  OutputDevice,
  SinkFlags,
  TextWriter,
  WriteRecord
} from '../types/sink.js'
import { SinkErrorType, type SinkErrorHandler } from './ErrorHandler.js'
import type { LogFile } from './LogFile.js'

/**
 * Receiver of the line-boundary signal; implemented by the Error Sink
 */
export interface BlockFlusher {
  flushIfReady(force: boolean): void
}

export interface OutputSinkStats {
  written: number
  pending: number
  allowed: boolean
  last: string | undefined
}

export class OutputSink implements SinkFlags, TextWriter {
  user = false
  warn = false
  error = false
  fileOnly = false
  highWords: KeywordMap = {}
  lowWords: KeywordMap = {}
  /** Last character drained, used to detect a completed line */
  last: string | undefined
  private allowed = true
  private pending: WriteRecord[] = []
  private drainDeferred = false
  private written = 0
  private flusher: BlockFlusher | null = null
  private debug = createLogger('output')

  constructor(
    private readonly context: ConsoleContext,
    private readonly device: OutputDevice,
    private readonly log: LogFile | null,
    private readonly errors: SinkErrorHandler
  ) {}

  /**
   * Connect the Error Sink that is signalled on line boundaries
   */
  attach(flusher: BlockFlusher): void {
    this.flusher = flusher
  }

  write(text: string): boolean {
    this.pending.push(this.createRecord(text))
    this.drainWhenAllowed()
    return true
  }

  /**
   * Hand buffered log text to the file
   */
  flush(): void {
    this.log?.flush()
  }

  close(): void {
    this.drainWhenAllowed()
    this.flush()
    if (this.context.palette.enabled) {
      this.writeDevice(this.context.palette.none)
    }
  }

  /**
   * Stop draining to the screen; called by the Error Sink before a block
   */
  suspend(): void {
    this.allowed = false
  }

  allow(): void {
    this.allowed = true
  }

  /**
   * Re-allow draining and write out whatever queued up meanwhile
   */
  resume(): void {
    this.allowed = true
    this.drainWhenAllowed()
  }

  get isAllowed(): boolean {
    return this.allowed
  }

  getStats(): OutputSinkStats {
    return {
      written: this.written,
      pending: this.pending.length,
      allowed: this.allowed,
      last: this.last
    }
  }

  private createRecord(raw: string): WriteRecord {
    const { userMode, highlighter } = this.context
    let formatted = raw
    try {
      formatted = highlighter.format(raw, this)
    } catch (error) {
      this.errors.handle(SinkErrorType.FORMATTING, 'output', error)
    }

    return {
      fileOnly: this.fileOnly,
      raw,
      formatted,
      print: (this.user && userMode) || !userMode
    }
  }

  private drainWhenAllowed(): void {
    if (!this.allowed || this.pending.length === 0) {
      return
    }

    if (this.context.lock.tryRun(() => this.drain())) {
      return
    }

    if (!this.drainDeferred) {
      this.drainDeferred = true
      this.debug('Lock busy, deferring %d record(s)', this.pending.length)
      this.context.lock.whenFree(() => {
        this.drainDeferred = false
        this.drainWhenAllowed()
      })
    }
  }

  private drain(): void {
    let record = this.pending.shift()
    while (record) {
      this.log?.write(record.raw)
      if (!record.fileOnly && record.print) {
        this.writeDevice(record.formatted)
      }
      if (record.raw.includes('\n')) {
        this.flush()
      }
      if (record.raw.length > 0) {
        this.last = record.raw[record.raw.length - 1]
      }
      this.written++
      record = this.pending.shift()
    }

    if (this.last === '\n') {
      this.flusher?.flushIfReady(false)
    }
  }

  private writeDevice(text: string): void {
    try {
      this.device.write(text)
    } catch (error) {
      this.errors.handle(SinkErrorType.WRITE, 'output', error)
    }
  }
}
