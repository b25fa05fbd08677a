/**
 * Log File
 *
 * Append-only mirror of everything written through the sinks. Text is
 * buffered in memory and handed to the file on flush(); the sinks flush on
 * every line boundary.
 *
 * @module streaming/LogFile
 */

import * as fs from 'node:fs'
import * as path from 'node:path'
import { createLogger } from '../utils/logger.js'
import { SinkErrorType, type SinkErrorHandler } from './ErrorHandler.js'

/**
 * Log file configuration
 */
export interface LogFileConfig {
  /** Whether to create the parent directory if it doesn't exist */
  createDirectories?: boolean
}

export const DEFAULT_LOG_FILE_CONFIG: Required<LogFileConfig> = {
  createDirectories: true
}

export class LogFile {
  readonly path: string
  private fd: number | null
  private buffer: string[] = []
  private failed = false
  private bytesWritten = 0
  private debug = createLogger('log-file')

  /**
   * Opens the file in append mode
   * @throws Error if the file cannot be opened
   */
  constructor(
    logPath: string,
    private readonly errors: SinkErrorHandler,
    config: LogFileConfig = {}
  ) {
    const { createDirectories } = { ...DEFAULT_LOG_FILE_CONFIG, ...config }
    this.path = path.resolve(logPath)

    const directory = path.dirname(this.path)
    if (createDirectories && !fs.existsSync(directory)) {
      fs.mkdirSync(directory, { recursive: true })
    }

    this.fd = fs.openSync(this.path, 'a')
    this.debug('Opened %s', this.path)
  }

  /**
   * Buffer text for the next flush
   */
  write(text: string): void {
    if (this.fd === null || this.failed || text.length === 0) {
      return
    }
    this.buffer.push(text)
  }

  /**
   * Hand buffered text to the file. A failure is reported once; the log
   * then stops accepting writes.
   */
  flush(): void {
    if (this.fd === null || this.failed || this.buffer.length === 0) {
      return
    }

    const text = this.buffer.join('')
    this.buffer = []

    try {
      fs.writeSync(this.fd, text)
      this.bytesWritten += Buffer.byteLength(text)
    } catch (error) {
      this.failed = true
      this.errors.handle(SinkErrorType.LOG, this.path, error)
    }
  }

  /**
   * Flush and release the file handle
   */
  close(): void {
    if (this.fd === null) {
      return
    }

    this.flush()
    const fd = this.fd
    this.fd = null

    try {
      fs.closeSync(fd)
    } catch (error) {
      this.errors.handle(SinkErrorType.LOG, this.path, error)
    }
    this.debug('Closed %s after %d bytes', this.path, this.bytesWritten)
  }

  get isOpen(): boolean {
    return this.fd !== null
  }

  get hasFailed(): boolean {
    return this.failed
  }
}
