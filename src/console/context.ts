/**
 * Console context
 *
 * Process-wide state shared by both sinks: the user mode gate, the
 * timestamp prefix, the colour table, global keyword highlights and the
 * serialization lock. One context per ConsoleMux.
 *
 * @module console/context
 */

import { ReentrantLock } from '../streaming/locks.js'
import { systemTimers, type TimerService } from '../streaming/timers.js'
import { createPalette, type Palette } from './palette.js'
import { Highlighter } from './highlighter.js'

export interface ContextOptions {
  colour: boolean
  prefix: string
  separator: string
  userMode: boolean
  batchIntervalMs: number
  timers?: TimerService
  clock?: () => Date
}

const pad = (value: number, width = 2): string => String(value).padStart(width, '0')

/**
 * Local time as yy-mm-dd HH:MM:SS.mmm
 */
export function formatTimestamp(date: Date): string {
  const day = `${pad(date.getFullYear() % 100)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  return `${day} ${time}.${pad(date.getMilliseconds(), 3)}`
}

export class ConsoleContext {
  /** When true only user-scoped writes reach the screen; the log gets everything */
  userMode: boolean
  /** Leading field of every timestamp */
  prefix: string
  readonly separator: string
  readonly palette: Palette
  readonly lock = new ReentrantLock({ name: 'console-mux' })
  /** Keywords highlighted in every Output Sink write */
  readonly highlights = new Map<string, string | null>()
  readonly highlighter: Highlighter
  readonly batchIntervalMs: number
  readonly timers: TimerService
  private readonly clock: () => Date

  constructor(options: ContextOptions) {
    this.userMode = options.userMode
    this.prefix = options.prefix
    this.separator = options.separator
    this.batchIntervalMs = options.batchIntervalMs
    this.timers = options.timers ?? systemTimers
    this.clock = options.clock ?? (() => new Date())
    this.palette = createPalette(options.colour)
    this.highlighter = new Highlighter(this.palette, this.separator, this.highlights)
  }

  /**
   * Timestamp prefix: prefix|time| or prefix|STATUS|time|
   */
  stamp(status?: string): string {
    const sep = this.separator
    const time = formatTimestamp(this.clock())
    return status === undefined
      ? `${this.prefix}${sep}${time}${sep}`
      : `${this.prefix}${sep}${status}${sep}${time}${sep}`
  }
}
