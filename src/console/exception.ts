/**
 * Exception printing
 *
 * @module console/exception
 */

import { formatTrace, toError } from '../streaming/ErrorHandler.js'
import type { ErrorSink } from '../streaming/ErrorSink.js'
import type { ScopeSwitches } from './scopes.js'

export const DEFAULT_EXCEPTION_MESSAGE = 'Exception Details'

export interface ExceptionHost {
  readonly err: ErrorSink
  readonly scopes: ScopeSwitches
}

/**
 * Route an error's stack trace through the Error Sink under its own header
 */
export function printException(
  host: ExceptionHost,
  error: unknown,
  message: string = DEFAULT_EXCEPTION_MESSAGE
): void {
  host.scopes.errHeader(` ${message} `)(() => host.err.write(formatTrace(toError(error))))
}
