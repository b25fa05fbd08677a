/**
 * Stdio Redirect
 *
 * Opt-in routing of process.stdout.write and process.stderr.write through
 * the sinks, for code that prints without going through the writer
 * interface. The sinks keep the original write functions as their devices.
 *
 * @module console/stdio-redirect
 */

import type { OutputDevice, TextWriter } from '../types/sink.js'
import { createLogger } from '../utils/logger.js'

/**
 * Stdio write function type
 */
type WriteFunction = typeof process.stdout.write

export interface RedirectTargets {
  stdout: TextWriter
  stderr: TextWriter
}

/**
 * Device that writes through a saved write function
 */
const toDevice = (write: WriteFunction, stream: NodeJS.WriteStream): OutputDevice => ({
  write: (chunk: string) => write.call(stream, chunk)
})

export class StdioRedirect {
  private originalStdoutWrite?: WriteFunction
  private originalStderrWrite?: WriteFunction
  private isEnabled = false
  private debug = createLogger('stdio')

  /**
   * Devices that bypass the redirect. Valid before and after enable().
   */
  getOriginalDevices(): { stdout: OutputDevice; stderr: OutputDevice } {
    return {
      stdout: toDevice(this.originalStdoutWrite ?? process.stdout.write, process.stdout),
      stderr: toDevice(this.originalStderrWrite ?? process.stderr.write, process.stderr)
    }
  }

  /**
   * Patch both streams to write into the given sinks
   */
  enable(targets: RedirectTargets): void {
    if (this.isEnabled) {
      return
    }

    // Save original write functions
    this.originalStdoutWrite = process.stdout.write
    this.originalStderrWrite = process.stderr.write

    process.stdout.write = this.createInterceptor(targets.stdout)
    process.stderr.write = this.createInterceptor(targets.stderr)

    this.isEnabled = true
    this.debug('Redirecting process.stdout and process.stderr')
  }

  /**
   * Restore original writers
   */
  disable(): void {
    if (!this.isEnabled) {
      return
    }

    if (this.originalStdoutWrite) {
      process.stdout.write = this.originalStdoutWrite
    }
    if (this.originalStderrWrite) {
      process.stderr.write = this.originalStderrWrite
    }

    this.isEnabled = false
    this.debug('Restored process.stdout and process.stderr')
  }

  isActive(): boolean {
    return this.isEnabled
  }

  /**
   * Create an interceptor function for a stream
   */
  private createInterceptor(target: TextWriter): WriteFunction {
    function intercept(
      chunk: Uint8Array | string,
      callback?: (error?: Error) => void
    ): boolean
    function intercept(
      chunk: Uint8Array | string,
      encoding?: BufferEncoding,
      callback?: (error?: Error) => void
    ): boolean
    function intercept(
      chunk: Uint8Array | string,
      encoding?: BufferEncoding | ((error?: Error) => void),
      callback?: (error?: Error) => void
    ): boolean {
      if (typeof encoding === 'function') {
        callback = encoding
        encoding = undefined
      }

      const text =
        typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString(encoding ?? 'utf8')
      const ok = target.write(text)

      if (callback) {
        process.nextTick(callback)
      }
      return ok
    }

    return intercept
  }
}
