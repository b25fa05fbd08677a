/**
 * Process-wide multiplexer
 *
 * init() builds a ConsoleMux and installs it; the stdout and stderr
 * writers route through whichever instance is installed.
 *
 * @module mux/installed
 */

import type { MuxConfig } from '../types/config.js'
import type { TextWriter } from '../types/sink.js'
import { ConsoleMux } from './ConsoleMux.js'

let current: ConsoleMux | null = null

/**
 * Create and install the process-wide multiplexer
 * @throws Error if one is already installed
 */
export function init(config: MuxConfig = {}): ConsoleMux {
  if (current) {
    throw new Error('console-mux is already initialised; call close() first')
  }
  current = ConsoleMux.create(config)
  return current
}

/**
 * Close and uninstall the process-wide multiplexer
 */
export async function close(): Promise<void> {
  const mux = current
  current = null
  await mux?.close()
}

/**
 * The installed multiplexer
 * @throws Error if init() has not been called
 */
export function installed(): ConsoleMux {
  if (!current) {
    throw new Error('console-mux is not initialised; call init() first')
  }
  return current
}

export function isInstalled(): boolean {
  return current !== null
}

export const stdout: TextWriter = {
  write: (text: string) => installed().write(text)
}

export const stderr: TextWriter = {
  write: (text: string) => installed().writeErr(text)
}

export function print(...args: unknown[]): void {
  installed().print(...args)
}

export function printErr(...args: unknown[]): void {
  installed().printErr(...args)
}
