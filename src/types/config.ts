/**
 * Configuration types for the console multiplexer
 *
 * @module types/config
 */

import type { OutputDevice } from './sink.js'
import type { TimerService } from '../streaming/timers.js'

/**
 * Colour selection. 'auto' probes the terminal and honours NO_COLOR / FORCE_COLOR.
 */
export type ColourSetting = boolean | 'auto'

/**
 * Public configuration accepted by init() and ConsoleMux.create()
 */
export interface MuxConfig {
  /** Emit ANSI colour codes (default: true) */
  colour?: ColourSetting
  /** Append every write to this file */
  logPath?: string
  /** Text placed in front of every timestamp (default: 'mux') */
  prefix?: string
  /** Mirror error output to the log file (default: true) */
  logStderr?: boolean
  /** Start every error block with a delimiter and timestamp header (default: true) */
  printStderrHeader?: boolean
  /** Only user-scoped writes reach the screen (default: false) */
  userMode?: boolean
  /** Error batching interval in milliseconds (default: 20) */
  batchIntervalMs?: number
  /** Field separator used in timestamps, dimmed on screen (default: '|') */
  separator?: string
  /** Announce the log destination once the log is opened (default: true) */
  announceLog?: boolean
  /** Route process.stdout.write / process.stderr.write through the sinks (default: false) */
  redirectStdio?: boolean
  /** Real output device (default: process.stdout) */
  stdout?: OutputDevice
  /** Real error device (default: process.stderr) */
  stderr?: OutputDevice
  /** Timer service for the error batching delay */
  timers?: TimerService
  /** Clock used for timestamps */
  clock?: () => Date
}

/**
 * Configuration after defaults have been applied
 */
export interface NormalizedMuxConfig {
  colour: boolean
  logPath: string | undefined
  prefix: string
  logStderr: boolean
  printStderrHeader: boolean
  userMode: boolean
  batchIntervalMs: number
  separator: string
  announceLog: boolean
  redirectStdio: boolean
  stdout: OutputDevice | undefined
  stderr: OutputDevice | undefined
  timers: TimerService | undefined
  clock: () => Date
}
