/**
 * Test factory functions for creating multiplexers with captured devices
 */

import * as fs from 'node:fs'
import * as os from 'node:os'
import * as path from 'node:path'
import { ConsoleMux } from '../mux/ConsoleMux.js'
import type { MuxConfig } from '../types/config.js'
import { MemoryDevice } from './memory-device.js'

/**
 * Local time every test clock reports: stamps read 24-01-02 03:04:05.678
 */
export const FIXED_TIME = new Date(2024, 0, 2, 3, 4, 5, 678)
export const FIXED_STAMP_TIME = '24-01-02 03:04:05.678'

export interface TestMux {
  mux: ConsoleMux
  stdout: MemoryDevice
  stderr: MemoryDevice
}

/**
 * Creates a multiplexer writing to memory devices, colour off, fixed clock
 * @param overrides - Optional config overrides
 */
export const createTestMux = (overrides: MuxConfig = {}): TestMux => {
  const stdout = new MemoryDevice()
  const stderr = new MemoryDevice()
  const mux = ConsoleMux.create({
    colour: false,
    announceLog: false,
    stdout,
    stderr,
    clock: () => FIXED_TIME,
    ...overrides
  })
  return { mux, stdout, stderr }
}

/**
 * Creates a fresh temporary directory and returns a log path inside it
 */
export const createTempLogPath = (name = 'mux.log'): string => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'console-mux-'))
  return path.join(dir, name)
}

export const readLog = (logPath: string): string => fs.readFileSync(logPath, 'utf8')
