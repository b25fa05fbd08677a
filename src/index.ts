/**
 * console-mux
 *
 * Console output multiplexer: colourised stdout/stderr sinks that mirror
 * everything to a log file and keep error output together in blocks.
 */

// Process-wide entry points
export {
  init,
  close,
  installed,
  isInstalled,
  stdout,
  stderr,
  print,
  printErr
} from './mux/installed.js'
export { ConsoleMux } from './mux/ConsoleMux.js'

// Configuration
export type { MuxConfig, NormalizedMuxConfig, ColourSetting } from './types/config.js'
export { DEFAULT_MUX_CONFIG, normalizeMuxConfig, validateMuxConfig } from './config/mux-config.js'
export { MuxConfigError } from './validation/errors.js'

// Sinks and their collaborators
export type {
  OutputDevice,
  KeywordMap,
  SinkFlags,
  WriteRecord,
  TextWriter,
  BlockState
} from './types/sink.js'
export { OutputSink, type BlockFlusher } from './streaming/OutputSink.js'
export { ErrorSink, type ErrorSinkOptions } from './streaming/ErrorSink.js'
export { ReentrantLock, type LockConfig, type LockStats } from './streaming/locks.js'
export { systemTimers, type TimerService, type TimerHandle } from './streaming/timers.js'
export { SinkErrorHandler, SinkErrorType, formatTrace } from './streaming/ErrorHandler.js'
export { LogFile } from './streaming/LogFile.js'

// Console helpers
export { ConsoleContext, formatTimestamp } from './console/context.js'
export { createPalette, genColor, type Palette } from './console/palette.js'
export {
  Highlighter,
  HighlightError,
  STATUS,
  type StatusKeyword,
  type TextStyle
} from './console/highlighter.js'
export { ScopeSwitches, createScope, runScoped, setting, type Scope } from './console/scopes.js'
export {
  promptUser,
  DEFAULT_PROMPT,
  MASKED_PLACEHOLDER,
  type PromptOptions
} from './console/prompt.js'
export { printException, DEFAULT_EXCEPTION_MESSAGE } from './console/exception.js'
export { StdioRedirect } from './console/stdio-redirect.js'
