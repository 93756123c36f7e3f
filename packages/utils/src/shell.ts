// POSIX shell quoting for the commands written into build files.

const BAD_CHARS = /[^\w@%+:,./=-]/

export interface Escaped {
  text: string
  quoted: boolean
}

/** Escapes single quotes in `s` and reports whether it needs quoting. */
export function shellEscape(s: string): Escaped {
  if (s === '') return { text: '', quoted: true }
  if (!BAD_CHARS.test(s)) return { text: s, quoted: false }
  return { text: s.replace(/'/g, `'"'"'`), quoted: true }
}

export function quoteEscaped({ text, quoted }: Escaped): string {
  return quoted ? `'${text}'` : text
}

export function shellQuote(s: string): string {
  return quoteEscaped(shellEscape(s))
}

/**
 * Splits a flags string the way a POSIX shell would for plain words, single
 * and double quotes. Used for CFLAGS-style variables.
 */
export function shellSplit(s: string): string[] {
  const out: string[] = []
  let current = ''
  let inWord = false
  let quote: "'" | '"' | null = null

  for (const ch of s) {
    if (quote) {
      if (ch === quote) {
        quote = null
      } else {
        current += ch
      }
      continue
    }
    if (ch === "'" || ch === '"') {
      quote = ch
      inWord = true
    } else if (/\s/.test(ch)) {
      if (inWord) out.push(current)
      current = ''
      inWord = false
    } else {
      current += ch
      inWord = true
    }
  }
  if (quote) {
    throw new Error(`unterminated ${quote} quote in: ${s}`)
  }
  if (inWord) out.push(current)
  return out
}
