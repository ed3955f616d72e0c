/**
 * Word-wrapping and pagination of plain text against a width measure.
 *
 * The measure is supplied by the caller (glyph advances of a loaded font), so
 * this module stays pure and testable with any metric.
 *
 * ### Break rules
 * - Explicit newlines always break; blank lines are kept.
 * - Runs of whitespace collapse to one space and never start a line.
 * - Each CJK ideograph / kana / full-width form is its own break opportunity,
 *   since those scripts do not separate words with spaces.
 * - A token wider than the line on its own is split between characters.
 */

/** Returns the advance width of a string, in pixels. */
export type Measure = (text: string) => number

export interface TextLayoutOptions {
  maxWidth: number
  /** Lines that fit on one page; values below 1 are treated as 1. */
  linesPerPage: number
}

const CJK = '\\u3000-\\u303f\\u3040-\\u30ff\\u3400-\\u4dbf\\u4e00-\\u9fff\\uf900-\\ufaff\\uff00-\\uffef'
const TOKEN_RE = new RegExp(`\\s+|[${CJK}]|[^\\s${CJK}]+`, 'gu')
const WHITESPACE_RE = /^\s+$/u

/** Split one paragraph into whitespace runs, CJK characters and words. */
export function tokenize(paragraph: string): string[] {
  return paragraph.match(TOKEN_RE) ?? []
}

/** Wrap a single paragraph (no newlines) into lines no wider than `maxWidth`. */
export function wrapParagraph(paragraph: string, measure: Measure, maxWidth: number): string[] {
  const lines: string[] = []
  let line = ''
  let pendingSpace = false

  for (const token of tokenize(paragraph)) {
    if (WHITESPACE_RE.test(token)) {
      pendingSpace = line.length > 0
      continue
    }

    const candidate = pendingSpace ? `${line} ${token}` : line + token
    pendingSpace = false
    if (measure(candidate) <= maxWidth) {
      line = candidate
      continue
    }

    if (line) {
      lines.push(line)
      line = ''
    }
    if (measure(token) <= maxWidth) {
      line = token
      continue
    }

    // Oversized token: break between code points.
    for (const ch of Array.from(token)) {
      if (line && measure(line + ch) > maxWidth) {
        lines.push(line)
        line = ch
      } else {
        line += ch
      }
    }
  }

  if (line || lines.length === 0) lines.push(line)
  return lines
}

/** Wrap a whole text block. Leading and trailing blank lines are dropped. */
export function wrapText(text: string, measure: Measure, maxWidth: number): string[] {
  const normalized = text.replace(/\r\n?/g, '\n').trim()
  if (!normalized) return []
  return normalized.split('\n').flatMap((paragraph) => wrapParagraph(paragraph, measure, maxWidth))
}

/** Split wrapped lines into pages of at most `linesPerPage` lines. */
export function paginate(lines: string[], linesPerPage: number): string[][] {
  const perPage = Math.max(1, Math.floor(linesPerPage))
  if (lines.length === 0) return [[]]
  const pages: string[][] = []
  for (let i = 0; i < lines.length; i += perPage) {
    pages.push(lines.slice(i, i + perPage))
  }
  return pages
}

/** Wrap then paginate. Always returns at least one (possibly empty) page. */
export function layoutText(text: string, measure: Measure, options: TextLayoutOptions): string[][] {
  return paginate(wrapText(text, measure, options.maxWidth), options.linesPerPage)
}
