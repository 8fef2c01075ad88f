/**
 * StackSection - Pure text functions for the machine-owned part of a review
 * request body.
 *
 * The section lists the review requests of the whole stack and points at the
 * one it is rendered into:
 *
 * ```
 * <!--jj-stack-sync:start-->
 * - #11
 * - 👉 #12
 * - #13
 * <!--jj-stack-sync:end-->
 * ```
 *
 * Everything outside the markers belongs to humans and is left alone.
 */

import { isPlaceholder } from '../../shared/types'
import { CURRENT_POSITION_GLYPH, PENDING_LABEL } from '../shared/constants'

export type SectionMarkers = {
  start: string
  end: string
}

type MarkerSpan = {
  /** Index of the first character of the start marker */
  from: number
  /** Index just past the end marker */
  to: number
}

export class StackSection {
  // Prevent instantiation - use static methods
  private constructor() {}

  public static markers(markerKey: string): SectionMarkers {
    return {
      start: `<!--${markerKey}:start-->`,
      end: `<!--${markerKey}:end-->`
    }
  }

  /**
   * Renders the section for the entry at `currentIndex`.
   * Placeholder numbers (dry-run creates) keep their position but render as pending.
   */
  public static render(
    markerKey: string,
    numbers: readonly number[],
    currentIndex: number
  ): string {
    const { start, end } = StackSection.markers(markerKey)
    const lines = numbers.map((number, index) => {
      const pointer = index === currentIndex ? `${CURRENT_POSITION_GLYPH} ` : ''
      const label = isPlaceholder(number) ? PENDING_LABEL : `#${number}`
      return `- ${pointer}${label}`
    })
    return [start, ...lines, end].join('\n')
  }

  /**
   * Inserts or replaces the section in `body`.
   *
   * With a well-formed marker pair, the pair and everything between it is
   * replaced and the surrounding text is kept, separated from the section by
   * exactly one blank line. Otherwise the section is put in front of the body.
   * Applying the same section twice gives the same result as applying it once.
   */
  public static upsert(body: string, markerKey: string, section: string): string {
    const span = StackSection.locate(body, markerKey)

    if (span) {
      const before = trimTrailingBlankLines(body.slice(0, span.from))
      const after = trimLeadingBlankLines(body.slice(span.to))
      return [before, section, after].filter((part) => part.length > 0).join('\n\n')
    }

    if (body.trim().length === 0) {
      return section
    }
    return `${section}\n\n${trimLeadingBlankLines(body)}`
  }

  /**
   * Returns the section currently in `body`, markers included, or null when
   * there is no well-formed one.
   */
  public static extract(body: string, markerKey: string): string | null {
    const span = StackSection.locate(body, markerKey)
    return span ? body.slice(span.from, span.to) : null
  }

  /**
   * Finds the first start marker and the first end marker after it.
   * A start without a following end, or an end with no start before it,
   * counts as no section.
   */
  private static locate(body: string, markerKey: string): MarkerSpan | null {
    const { start, end } = StackSection.markers(markerKey)
    const from = body.indexOf(start)
    if (from === -1) return null

    const endAt = body.indexOf(end, from + start.length)
    if (endAt === -1) return null

    return { from, to: endAt + end.length }
  }
}

/**
 * Drops blank lines at the end of `text`. Trailing spaces on the last
 * non-blank line are kept.
 */
function trimTrailingBlankLines(text: string): string {
  return text.replace(/(?:\r?\n[ \t]*)+$/, '').replace(/^[ \t]+$/, '')
}

/**
 * Drops blank lines at the start of `text`. Indentation of the first
 * non-blank line is kept.
 */
function trimLeadingBlankLines(text: string): string {
  return text.replace(/^(?:[ \t]*\r?\n)+/, '').replace(/^[ \t]+$/, '')
}
