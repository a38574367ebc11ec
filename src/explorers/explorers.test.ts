import { describe, it, expect } from 'vitest'
import { createExplorers, ExactExplorer, GlobExplorer } from './index'
import { PatternSyntaxError } from '../contracts/errors'

describe('explorers', () => {
  describe('ExactExplorer', () => {
    it('should keep the path as given', () => {
      const explorer = ExactExplorer.fromCliArg('./does/not/exist yet')

      expect(explorer.kind).toBe('exact')
      expect(explorer.path).toBe('./does/not/exist yet')
    })
  })

  describe('GlobExplorer', () => {
    it('should expand the pattern once at construction', () => {
      const explorer = GlobExplorer.fromCliArg('src/**/*.{ts,tsx}')

      expect(explorer.kind).toBe('glob')
      expect(explorer.source).toBe('src/**/*.{ts,tsx}')
      expect([...explorer.patterns].sort()).toEqual(['src/**/*.ts', 'src/**/*.tsx'])
    })

    it('should deduplicate expanded patterns', () => {
      expect(GlobExplorer.fromCliArg('{a,a,b}').patterns).toHaveLength(2)
    })

    it.each(['[', '**a', 'a**', 'x/{b,c**}'])('should refuse the invalid pattern %j', (pattern) => {
      expect(() => GlobExplorer.fromCliArg(pattern)).toThrow(PatternSyntaxError)
    })

    it('should name the offending basic pattern', () => {
      expect(() => GlobExplorer.fromCliArg('{ok,bad**}')).toThrow(
        "Glob pattern from '{ok,bad**}' is invalid: 'bad**': '**' must form a whole path component at position 3"
      )
    })

    it('should refuse malformed braces before any glob check', () => {
      expect(() => GlobExplorer.fromCliArg('a}')).toThrow("Unmatched '}' at position 1 in pattern 'a}'")
    })
  })

  describe('createExplorers', () => {
    it('should build exact explorers before glob explorers', () => {
      const explorers = createExplorers({ exact: ['a', 'b'], glob: ['*.ts'] })

      expect(explorers.map((explorer) => explorer.kind)).toEqual(['exact', 'exact', 'glob'])
    })

    it('should build nothing from empty arguments', () => {
      expect(createExplorers({})).toEqual([])
    })
  })
})
