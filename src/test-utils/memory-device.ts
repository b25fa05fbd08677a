/**
 * In-memory output device for sink tests
 */

import type { OutputDevice } from '../types/sink.js'

export class MemoryDevice implements OutputDevice {
  readonly chunks: string[] = []
  failWith: Error | null = null

  write(chunk: string): boolean {
    if (this.failWith) {
      throw this.failWith
    }
    this.chunks.push(chunk)
    return true
  }

  /** Everything written so far, concatenated */
  text(): string {
    return this.chunks.join('')
  }

  clear(): void {
    this.chunks.length = 0
  }
}
