/**
 * Configuration defaults, normalization and validation for the multiplexer
 *
 * @module config/mux-config
 */

import type { MuxConfig, NormalizedMuxConfig } from '../types/config.js'
import type { OutputDevice } from '../types/sink.js'
import { supportsColor, type ColorProbeStream } from '../utils/terminal.js'
import { createLogger } from '../utils/logger.js'
import { ErrorMessages, MuxConfigError, describeType } from '../validation/errors.js'

const debug = createLogger('config')

/**
 * Default configuration values
 */
export const DEFAULT_MUX_CONFIG = {
  colour: true,
  prefix: 'mux',
  logStderr: true,
  printStderrHeader: true,
  userMode: false,
  batchIntervalMs: 20,
  separator: '|',
  announceLog: true,
  redirectStdio: false
} as const

/**
 * Validate configuration
 * @throws MuxConfigError listing every invalid field
 */
export function validateMuxConfig(config: MuxConfig): void {
  const issues: string[] = []

  if (
    config.colour !== undefined &&
    typeof config.colour !== 'boolean' &&
    config.colour !== 'auto'
  ) {
    issues.push(ErrorMessages.INVALID_VALUE('colour', 'boolean or "auto"', String(config.colour)))
  }

  const booleanFields = [
    'logStderr',
    'printStderrHeader',
    'userMode',
    'announceLog',
    'redirectStdio'
  ] as const satisfies readonly (keyof MuxConfig)[]

  for (const field of booleanFields) {
    const value: unknown = config[field]
    if (value !== undefined && typeof value !== 'boolean') {
      issues.push(ErrorMessages.TYPE_BOOLEAN(field, describeType(value)))
    }
  }

  const stringFields = ['logPath', 'prefix', 'separator'] as const satisfies readonly (
    keyof MuxConfig
  )[]
  for (const field of stringFields) {
    const value: unknown = config[field]
    if (value !== undefined && typeof value !== 'string') {
      issues.push(ErrorMessages.TYPE_STRING(field, describeType(value)))
    }
  }

  if (config.separator === '') {
    issues.push(ErrorMessages.EMPTY_STRING('separator'))
  }
  if (config.logPath === '') {
    issues.push(ErrorMessages.EMPTY_STRING('logPath'))
  }

  const interval: unknown = config.batchIntervalMs
  if (
    interval !== undefined &&
    (typeof interval !== 'number' || !Number.isFinite(interval) || interval <= 0)
  ) {
    issues.push(ErrorMessages.MUST_BE_POSITIVE('batchIntervalMs', String(interval)))
  }

  for (const field of ['stdout', 'stderr'] as const) {
    const device: unknown = config[field]
    if (device !== undefined && !hasWrite(device)) {
      issues.push(ErrorMessages.MISSING_WRITE(field))
    }
  }

  const clock: unknown = config.clock
  if (clock !== undefined && typeof clock !== 'function') {
    issues.push(ErrorMessages.TYPE_FUNCTION('clock', describeType(clock)))
  }

  if (issues.length > 0) {
    throw new MuxConfigError(issues)
  }
}

const hasWrite = (value: unknown): boolean =>
  typeof value === 'object' &&
  value !== null &&
  'write' in value &&
  typeof value.write === 'function'

/**
 * A custom device counts as a terminal only if it says so
 */
const probeOf = (device: OutputDevice | undefined): ColorProbeStream =>
  device === undefined ? process.stdout : { isTTY: 'isTTY' in device && device.isTTY === true }

/**
 * Apply defaults and resolve colour: 'auto' against the stdout device
 */
export function normalizeMuxConfig(config: MuxConfig = {}): NormalizedMuxConfig {
  validateMuxConfig(config)

  const colourSetting = config.colour ?? DEFAULT_MUX_CONFIG.colour
  const colour =
    colourSetting === 'auto' ? supportsColor({ stream: probeOf(config.stdout) }) : colourSetting

  const normalized: NormalizedMuxConfig = {
    colour,
    logPath: config.logPath,
    prefix: config.prefix ?? DEFAULT_MUX_CONFIG.prefix,
    logStderr: config.logStderr ?? DEFAULT_MUX_CONFIG.logStderr,
    printStderrHeader: config.printStderrHeader ?? DEFAULT_MUX_CONFIG.printStderrHeader,
    userMode: config.userMode ?? DEFAULT_MUX_CONFIG.userMode,
    batchIntervalMs: config.batchIntervalMs ?? DEFAULT_MUX_CONFIG.batchIntervalMs,
    separator: config.separator ?? DEFAULT_MUX_CONFIG.separator,
    announceLog: config.announceLog ?? DEFAULT_MUX_CONFIG.announceLog,
    redirectStdio: config.redirectStdio ?? DEFAULT_MUX_CONFIG.redirectStdio,
    stdout: config.stdout,
    stderr: config.stderr,
    timers: config.timers,
    clock: config.clock ?? (() => new Date())
  }

  debug(
    'Normalized config: colour=%s log=%s prefix=%s',
    colour,
    normalized.logPath,
    normalized.prefix
  )
  return normalized
}
