/**
 * Checks a basic glob pattern (no brace alternation left) and returns the
 * reason it is invalid, or null when it can be matched.
 *
 * - `?` matches one character, `*` any run within a path component
 * - `**` must be a whole path component, so `**a`, `a**` and `***` are invalid
 * - `[...]` / `[!...]` classes; a `]` right after `[` or `[!` is a member
 * - `\x` matches `x` literally
 */
export function validateGlobPattern(pattern: string): string | null {
  const chars = [...pattern]
  let i = 0

  while (i < chars.length) {
    const char = chars[i]

    if (char === '\\') {
      if (i + 1 >= chars.length) {
        return `dangling escape at position ${i}`
      }
      i += 2
      continue
    }

    if (char === '[') {
      const end = findClassEnd(chars, i)
      if (end === -1) {
        return `unclosed character class starting at position ${i}`
      }
      i = end + 1
      continue
    }

    if (char === '*') {
      let run = 1
      while (chars[i + run] === '*') run++

      if (run > 2) {
        return `more than two consecutive '*' at position ${i}`
      }
      if (run === 2) {
        const before = i === 0 ? '/' : chars[i - 1]
        const after = i + 2 >= chars.length ? '/' : chars[i + 2]
        if (before !== '/' || after !== '/') {
          return `'**' must form a whole path component at position ${i}`
        }
      }
      i += run
      continue
    }

    i++
  }

  return null
}

function findClassEnd(chars: string[], start: number): number {
  let i = start + 1
  if (chars[i] === '!') i++
  // a leading ']' is part of the set
  if (chars[i] === ']') i++

  while (i < chars.length) {
    if (chars[i] === ']') return i
    i++
  }
  return -1
}
