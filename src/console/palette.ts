/**
 * Colour table
 *
 * ANSI escape sequences used by the sinks. Each colour is
 * ESC [ <code> [;1] m: 30-37 foreground, 40-47 background, ;1 for the
 * bright variant. With colour disabled every entry is an empty string and
 * the error decorations fall back to plain text.
 *
 * @module console/palette
 */

/**
 * Generates the escape sequence for an SGR colour code
 */
export function genColor(code: number, bright = false): string {
  return `\u001b[${code}${bright ? ';1m' : 'm'}`
}

export interface Palette {
  /** Whether colour codes are emitted at all */
  enabled: boolean
  prompt: string
  userInput: string
  disabled: string
  /** Reset to the terminal default */
  none: string
  error: string
  warn: string
  stat: string
  dull: string
  user: string
  highlight: string
  lowlight: string
  /** Inserted after every line break inside an error block */
  stderrPrefix: string
  /** Opens an error block header */
  stderrHeader: string
}

export function createPalette(enabled: boolean): Palette {
  if (!enabled) {
    return {
      enabled,
      prompt: '',
      userInput: '',
      disabled: '',
      none: '',
      error: '',
      warn: '',
      stat: '',
      dull: '',
      user: '',
      highlight: '',
      lowlight: '',
      stderrPrefix: '+    ',
      stderrHeader: '\n'
    }
  }

  const none = genColor(0)
  const error = genColor(31, true)
  // black on dark red; the '+' makes error lines easy to grep for in the log
  const redBlock = none + genColor(41) + genColor(30)

  return {
    enabled,
    prompt: genColor(36),
    userInput: genColor(36, true),
    disabled: genColor(30, true),
    none,
    error,
    warn: genColor(33, true),
    stat: genColor(37),
    dull: genColor(32),
    user: genColor(32, true),
    highlight: genColor(35, true),
    lowlight: genColor(30, true),
    stderrPrefix: `${redBlock}+${none}    ${error}`,
    stderrHeader: `\n${redBlock}`
  }
}
