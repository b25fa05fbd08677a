/**
 * Terminal Capability Detection Utilities
 *
 * Decides whether the sinks should emit ANSI colour codes when the
 * configuration leaves colour on 'auto'.
 *
 * @module terminal-utils
 */

import { createLogger } from './logger.js'

const logger = createLogger('terminal')

/**
 * Terminal color support levels
 */
export enum ColorLevel {
  None = 0, // No color support
  Basic = 1, // 16 colors
  Extended = 2, // 256 colors
  TrueColor = 3 // 16M colors (24-bit)
}

/**
 * Minimal view of a stream used for TTY and colour probing
 */
export interface ColorProbeStream {
  isTTY?: boolean
  hasColors?: (count?: number) => boolean
}

/**
 * Options for terminal capability detection
 */
export interface TerminalDetectionOptions {
  /** Stream to probe, defaults to process.stdout */
  stream?: ColorProbeStream
  /** Environment to read, defaults to process.env */
  env?: NodeJS.ProcessEnv
}

const toColorLevel = (value: number): ColorLevel | undefined => {
  switch (value) {
    case 0:
      return ColorLevel.None
    case 1:
      return ColorLevel.Basic
    case 2:
      return ColorLevel.Extended
    case 3:
      return ColorLevel.TrueColor
    default:
      return undefined
  }
}

/**
 * Detects color support level based on environment variables and capabilities
 */
export function detectColorLevel(options: TerminalDetectionOptions = {}): ColorLevel {
  const env = options.env ?? process.env
  const stream: ColorProbeStream = options.stream ?? process.stdout

  // Check for explicit color disabling
  if (env.NO_COLOR !== undefined || env.NODE_DISABLE_COLORS === '1') {
    logger('Color explicitly disabled via NO_COLOR or NODE_DISABLE_COLORS')
    return ColorLevel.None
  }

  // Check for explicit color forcing
  if (env.FORCE_COLOR !== undefined) {
    const forced =
      env.FORCE_COLOR === '' ? ColorLevel.Basic : toColorLevel(parseInt(env.FORCE_COLOR, 10))
    if (forced !== undefined) {
      logger('Color forced via FORCE_COLOR: %d', forced)
      return forced
    }
  }

  if (stream.isTTY !== true) {
    logger('Not a TTY, no color support')
    return ColorLevel.None
  }

  // Use Node.js built-in color detection if available
  if (typeof stream.hasColors === 'function') {
    try {
      if (stream.hasColors(16777216)) {
        return ColorLevel.TrueColor
      }
      if (stream.hasColors(256)) {
        return ColorLevel.Extended
      }
      if (stream.hasColors(16)) {
        return ColorLevel.Basic
      }
    } catch (error) {
      logger('Error checking hasColors(): %s', error)
    }
  }

  const term = env.TERM?.toLowerCase() ?? ''
  if (term === 'dumb') {
    logger('TERM=dumb, no color support')
    return ColorLevel.None
  }

  // TTY without clear indicators
  logger('TTY detected but unclear color support, defaulting to basic')
  return ColorLevel.Basic
}

/**
 * Checks if the given terminal supports color output
 */
export function supportsColor(options?: TerminalDetectionOptions): boolean {
  return detectColorLevel(options) > ColorLevel.None
}
