import { PatternSyntaxError } from '../contracts/errors'
import { expandPattern } from '../glob/PatternExpander'
import { validateGlobPattern } from '../glob/globSyntax'

/**
 * Watches every path matching an extended glob pattern.
 *
 * The pattern is expanded into basic glob patterns once, here, and each of
 * them is checked before any watching begins:
 *
 * - `?` matches any single character
 * - `*` matches any run of characters except the path separator
 * - `**` matches the current directory and any subdirectories, and must be
 *   a whole path component
 * - `[...]` matches one character of the set, `[!...]` one outside of it
 * - `{a,b}` matches either alternative and may nest, e.g. `config.{yml,yaml}`
 */
export class GlobExplorer {
  readonly kind = 'glob'

  private constructor(
    readonly source: string,
    readonly patterns: readonly string[]
  ) {}

  static fromCliArg(arg: string): GlobExplorer {
    const patterns = [...expandPattern(arg)]

    for (const pattern of patterns) {
      const problem = validateGlobPattern(pattern)
      if (problem !== null) {
        throw new PatternSyntaxError(
          `Glob pattern from '${arg}' is invalid: '${pattern}': ${problem}`,
          pattern
        )
      }
    }

    return new GlobExplorer(arg, patterns)
  }
}
