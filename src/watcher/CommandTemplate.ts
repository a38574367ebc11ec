import type { DetectedChange } from '../contracts/types'

/**
 * `\\` pairs are matched first so they never escape what follows them.
 * A bare name must not run on into another identifier character.
 */
const PLACEHOLDER = /(\\\\)|(\\?)\$(?:\{(path|diff|mtime)\}|(path|diff|mtime)(?![A-Za-z0-9_]))/g

export function formatMtime(mtime: number): string {
  return new Date(mtime).toISOString()
}

/**
 * Substitute the details of a change into the user's command.
 *
 * `$diff`, `$path` and `$mtime` (or their `${...}` forms) are replaced;
 * a preceding backslash keeps the placeholder as literal text and is
 * dropped. Deleted paths have no mtime, so `$mtime` stays as written.
 */
export function buildCommand(template: string, change: DetectedChange): string {
  const values = new Map<string, string>([
    ['diff', change.kind],
    ['path', change.path],
  ])
  if (change.kind !== 'deleted') {
    values.set('mtime', formatMtime(change.mtime))
  }

  return template.replace(
    PLACEHOLDER,
    (
      match: string,
      doubled: string | undefined,
      escape: string | undefined,
      braced: string | undefined,
      bare: string | undefined
    ) => {
      if (doubled) return doubled
      if (escape) return match.slice(1)

      const name = braced ?? bare ?? ''
      return values.get(name) ?? match
    }
  )
}

export function joinCommand(tokens: readonly string[]): string {
  return tokens.join(' ')
}
