// SPDX-License-Identifier: GPL-2.0-or-later
// Repairs relaxed KLE raw data (unquoted keys, trailing commas, bare rows)
// into strict JSON. Rewrites only; validation happens when decoding.

// A line ending in one of these continues on the next line without a separator
const CONTINUATION_ENDINGS = ['[', '{', ':'] as const
const CLOSING_STARTS = [']', '}'] as const

function stripTrailingComma(line: string): string {
  return line.endsWith(',') ? line.slice(0, -1) : line
}

function needsSeparator(previous: string, next: string): boolean {
  if (CONTINUATION_ENDINGS.some((c) => previous.endsWith(c))) return false
  if (CLOSING_STARTS.some((c) => next.startsWith(c))) return false
  return true
}

/** Split into trimmed, non-blank lines with one trailing comma removed from each */
export function normalizeLines(raw: string): string[] {
  return raw
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line !== '')
    .map(stripTrailingComma)
}

/** Join lines with commas and wrap the result in one enclosing array */
export function joinRows(lines: readonly string[]): string {
  let joined = ''
  for (let i = 0; i < lines.length; i++) {
    if (i > 0 && needsSeparator(lines[i - 1], lines[i])) {
      joined += ','
    }
    joined += lines[i]
  }
  return `[${joined}]`
}

function quoteName(candidate: string[]): string[] {
  const text = candidate.join('')
  const name = text.trim()
  const start = text.indexOf(name)
  return [...text.slice(0, start), '"', name, '"', ...text.slice(start + name.length)]
}

/**
 * Wrap unquoted object property names in double quotes.
 *
 * Brackets are tracked as a stack, so a nested object's closing brace
 * returns the scanner to its enclosing object rather than leaving object
 * context altogether.
 */
export function quotePropertyNames(text: string): string {
  const out: string[] = []
  const brackets: string[] = []
  let candidate: string[] = []
  let inString = false
  let escaped = false

  const inObject = (): boolean => brackets[brackets.length - 1] === '{'

  for (const ch of text) {
    if (inString) {
      out.push(ch)
      if (escaped) {
        escaped = false
      } else if (ch === '\\') {
        escaped = true
      } else if (ch === '"') {
        inString = false
      }
      continue
    }

    switch (ch) {
      case '"':
        inString = true
        candidate = []
        out.push(ch)
        break
      case '{':
      case '[':
        brackets.push(ch)
        candidate = []
        out.push(ch)
        break
      case '}':
      case ']':
        brackets.pop()
        candidate = []
        out.push(ch)
        break
      case ':':
        if (inObject() && candidate.join('').trim() !== '') {
          out.length -= candidate.length
          out.push(...quoteName(candidate))
        }
        candidate = []
        out.push(ch)
        break
      case ',':
        candidate = []
        out.push(ch)
        break
      default:
        if (inObject()) candidate.push(ch)
        out.push(ch)
    }
  }

  return out.join('')
}

/** Turn relaxed raw layout text into strict JSON array text */
export function repairRelaxedJson(raw: string): string {
  return quotePropertyNames(joinRows(normalizeLines(raw)))
}
