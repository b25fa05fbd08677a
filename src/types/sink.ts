/**
 * Sink type definitions
 *
 * @module types/sink
 */

/**
 * Anything the sinks can write text to: process.stdout, process.stderr,
 * a file stream or an in-memory capture.
 */
export interface OutputDevice {
  write(chunk: string): unknown
}

/**
 * Word to colour mapping used for keyword highlighting.
 * A null colour selects the default colour of the map it appears in.
 */
export type KeywordMap = Readonly<Record<string, string | null>>

/**
 * Role flags shared by both sinks. They select the colour of a write and,
 * together with the context's user mode, whether it reaches the screen.
 */
export interface SinkFlags {
  user: boolean
  warn: boolean
  error: boolean
  fileOnly: boolean
}

/**
 * One Output Sink write, produced once and consumed once by the drain loop
 */
export type WriteRecord = Readonly<{
  /** Write goes to the log only */
  fileOnly: boolean
  /** Text as submitted; this is what the log receives */
  raw: string
  /** Colourised text for the screen */
  formatted: string
  /** Screen visibility decided at submission time */
  print: boolean
}>

/**
 * Explicit writer interface that callers route output through
 */
export interface TextWriter {
  write(text: string): boolean
}

/**
 * Scheduler states of the Error Sink
 */
export type BlockState = 'idle' | 'waiting' | 'flushing'
