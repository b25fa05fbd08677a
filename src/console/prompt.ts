/**
 * User input
 *
 * Shows a prompt on the screen whatever the user mode, reads one line and
 * records the exchange in the log. Masked input is not echoed and is logged
 * as a placeholder.
 *
 * @module console/prompt
 */

import * as readline from 'node:readline'
import { Writable } from 'node:stream'
import type { OutputDevice } from '../types/sink.js'
import type { OutputSink } from '../streaming/OutputSink.js'
import type { ConsoleContext } from './context.js'
import type { ScopeSwitches } from './scopes.js'

export const DEFAULT_PROMPT = 'Command> '
export const MASKED_PLACEHOLDER = '********'

export type PromptInput = NodeJS.ReadableStream & { isTTY?: boolean }

export interface PromptOptions {
  /** Echo and log what the user types (default: true) */
  visible?: boolean
  /** Stream to read from (default: process.stdin) */
  input?: PromptInput
}

/**
 * The parts of a ConsoleMux a prompt needs
 */
export interface PromptHost {
  readonly context: ConsoleContext
  readonly out: OutputSink
  readonly scopes: ScopeSwitches
  readonly stdoutDevice: OutputDevice
}

const mutedOutput = (): Writable =>
  new Writable({
    write(_chunk, _encoding, callback) {
      callback()
    }
  })

/**
 * Read a single line; resolves to '' if the input ends first
 */
export function readLine(input: PromptInput, masked: boolean): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    const rl = readline.createInterface({
      input,
      output: masked ? mutedOutput() : undefined,
      terminal: masked && input.isTTY === true
    })

    let settled = false
    const onError = (error: Error): void => {
      if (!settled) {
        settled = true
        rl.close()
        reject(error)
      }
    }
    // readline re-emits input errors on the interface
    input.once('error', onError)
    rl.once('error', onError)
    rl.once('line', (line) => {
      settled = true
      rl.close()
      resolve(line)
    })
    rl.once('close', () => {
      input.removeListener('error', onError)
      if (!settled) {
        resolve('')
      }
    })
  })
}

export async function promptUser(
  host: PromptHost,
  message: string = DEFAULT_PROMPT,
  options: PromptOptions = {}
): Promise<string> {
  const { context, out, scopes, stdoutDevice } = host
  const visible = options.visible ?? true
  const palette = context.palette

  return scopes.user(async () => {
    await context.lock.withLock(() => {
      stdoutDevice.write(
        palette.enabled ? palette.none + palette.prompt + message + palette.userInput : message
      )
    })

    const value = await readLine(options.input ?? process.stdin, !visible)

    await context.lock.withLock(() => {
      if (!visible) {
        stdoutDevice.write('\n')
      }
      if (palette.enabled) {
        stdoutDevice.write(palette.none)
      }
    })

    scopes.fileOnly(() => out.write(`${message}${visible ? value : MASKED_PLACEHOLDER}\n`))
    return value
  })
}
