/**
 * Keyword highlighter
 *
 * Colours a piece of output in the colour of its role and picks out
 * keywords: words from the sink's high/low maps, process-wide highlights,
 * the status keywords and the field separator. Longer keywords win over
 * shorter ones they contain.
 *
 * @module console/highlighter
 */

import { createLogger } from '../utils/logger.js'
import type { KeywordMap } from '../types/sink.js'
import type { Palette } from './palette.js'

/**
 * Status keywords written into stamped log lines
 */
export const STATUS = {
  STAT: 'STAT',
  WARN: 'WARN',
  ERRO: 'ERRO'
} as const

export type StatusKeyword = (typeof STATUS)[keyof typeof STATUS]

/**
 * Role and keyword maps of the write being formatted
 */
export interface TextStyle {
  user: boolean
  warn: boolean
  error: boolean
  highWords: KeywordMap
  lowWords: KeywordMap
}

export class HighlightError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'HighlightError'
  }
}

interface Fragment {
  text: string
  colour: string
  /** Matched keyword; shorter keywords do not split it again */
  keyword: boolean
}

export class Highlighter {
  private debug = createLogger('highlighter')
  private readonly statusColours: KeywordMap

  constructor(
    private readonly palette: Palette,
    private readonly separator: string,
    private readonly globalWords: ReadonlyMap<string, string | null>
  ) {
    this.statusColours = {
      [STATUS.STAT]: palette.stat,
      [STATUS.WARN]: palette.warn,
      [STATUS.ERRO]: palette.error
    }
  }

  /**
   * Colour of the write as a whole: error over warn over user
   */
  roleColour(style: Pick<TextStyle, 'user' | 'warn' | 'error'>): string {
    if (style.error) {
      return this.palette.error
    }
    if (style.warn) {
      return this.palette.warn
    }
    return style.user ? this.palette.user : this.palette.dull
  }

  /**
   * Format text for the screen. Returns the text untouched when colour is
   * off; a malformed keyword map degrades to the role colour alone.
   */
  format(text: string, style: TextStyle): string {
    if (!this.palette.enabled) {
      return text
    }

    const roleColour = this.roleColour(style)
    try {
      return this.highlight(text, roleColour, style)
    } catch (error) {
      this.debug('Falling back to role colour: %s', error instanceof Error ? error.message : error)
      return this.palette.none + roleColour + text
    }
  }

  private highlight(text: string, roleColour: string, style: TextStyle): string {
    const wordColours = this.collectKeywords(text.length, style)

    const words = [...wordColours.keys()].sort((a, b) => b.length - a.length)

    let fragments: Fragment[] = [{ text, colour: roleColour, keyword: false }]
    for (const word of words) {
      const wordColour = wordColours.get(word) ?? roleColour
      const next: Fragment[] = []
      for (const fragment of fragments) {
        if (fragment.keyword) {
          next.push(fragment)
          continue
        }
        const parts = fragment.text.split(word)
        parts.forEach((part, index) => {
          next.push({ text: part, colour: fragment.colour, keyword: false })
          if (index < parts.length - 1) {
            next.push({ text: word, colour: wordColour, keyword: true })
          }
        })
      }
      fragments = next
    }

    const { none } = this.palette
    return fragments.map((fragment) => none + fragment.colour + fragment.text).join('')
  }

  private collectKeywords(textLength: number, style: TextStyle): Map<string, string> {
    const sources: [Iterable<[string, string | null]>, string][] = [
      [Object.entries(style.highWords), this.palette.highlight],
      [Object.entries(style.lowWords), this.palette.lowlight],
      [this.globalWords.entries(), this.palette.highlight],
      [Object.entries(this.statusColours), this.palette.highlight]
    ]

    const wordColours = new Map<string, string>()
    for (const [entries, defaultColour] of sources) {
      for (const [word, colour] of entries) {
        if (word.length === 0) {
          throw new HighlightError('Keyword must not be empty')
        }
        if (colour !== null && typeof colour !== 'string') {
          throw new HighlightError(`Colour for "${word}" must be a string or null`)
        }
        if (word.length < textLength && !wordColours.has(word)) {
          wordColours.set(word, colour ?? defaultColour)
        }
      }
    }

    wordColours.set(this.separator, this.palette.disabled)
    return wordColours
  }
}
