import { PatternSyntaxError } from '../contracts/errors'

/**
 * A top-level character, or a `{...}` group whose options are already
 * expanded into basic patterns.
 */
type PatternToken =
  | { type: 'literal'; char: string }
  | { type: 'alternatives'; options: string[] }

/**
 * Turns an extended glob pattern (with `{a,b}` alternation, nestable and
 * backslash-escapable) into the set of basic glob patterns it stands for.
 *
 * Only depth-1 groups are split here. Anything nested deeper is collected
 * verbatim into the current option and expanded by a recursive pass when
 * the group closes.
 */
export class PatternExpander {
  private tokens: PatternToken[] = []
  private depth = 0
  private escaped = false
  private position = 0

  private constructor(private readonly pattern: string) {}

  static expand(pattern: string): Set<string> {
    const expander = new PatternExpander(pattern)
    for (const char of pattern) {
      expander.character(char)
      expander.position++
    }
    return expander.build()
  }

  private character(char: string): void {
    if (this.escaped) {
      this.escaped = false
      this.plainCharacter(char)
      return
    }

    switch (char) {
      case '{':
        this.openGroup()
        break
      case '}':
        this.closeGroup()
        break
      case ',':
        this.comma()
        break
      case '\\':
        // the backslash stays in the output so the glob matcher sees the escape too
        this.escaped = true
        this.plainCharacter(char)
        break
      default:
        this.plainCharacter(char)
    }
  }

  private build(): Set<string> {
    if (this.depth > 0) {
      throw new PatternSyntaxError(
        `Unclosed '{' in pattern '${this.pattern}'`,
        this.pattern
      )
    }

    let combinations = ['']
    for (const token of this.tokens) {
      if (token.type === 'literal') {
        combinations = combinations.map((prefix) => prefix + token.char)
      } else {
        combinations = combinations.flatMap((prefix) =>
          token.options.map((option) => prefix + option)
        )
      }
    }

    return new Set(combinations)
  }

  private openGroup(): void {
    this.depth++

    if (this.depth === 1) {
      this.tokens.push({ type: 'alternatives', options: [''] })
    } else {
      this.pushNested('{')
    }
  }

  private closeGroup(): void {
    if (this.depth === 0) {
      throw new PatternSyntaxError(
        `Unmatched '}' at position ${this.position} in pattern '${this.pattern}'`,
        this.pattern
      )
    }

    this.depth--

    if (this.depth > 0) {
      this.pushNested('}')
      return
    }

    const group = this.currentGroup()
    const expanded = new Set<string>()
    for (const option of group.options) {
      for (const basic of PatternExpander.expand(option)) {
        expanded.add(basic)
      }
    }
    group.options = [...expanded]
  }

  private comma(): void {
    if (this.depth === 0) {
      this.tokens.push({ type: 'literal', char: ',' })
    } else if (this.depth === 1) {
      this.currentGroup().options.push('')
    } else {
      this.pushNested(',')
    }
  }

  private plainCharacter(char: string): void {
    if (this.depth === 0) {
      this.tokens.push({ type: 'literal', char })
    } else {
      this.pushNested(char)
    }
  }

  private pushNested(char: string): void {
    const group = this.currentGroup()
    const last = group.options.length - 1
    group.options[last] += char
  }

  private currentGroup(): { type: 'alternatives'; options: string[] } {
    const last = this.tokens[this.tokens.length - 1]
    if (last === undefined || last.type !== 'alternatives') {
      throw new PatternSyntaxError(
        `Malformed group nesting in pattern '${this.pattern}'`,
        this.pattern
      )
    }
    return last
  }
}

export function expandPattern(pattern: string): Set<string> {
  return PatternExpander.expand(pattern)
}
