/**
 * Watches one literal path. The path does not have to exist yet: it stays
 * out of every snapshot until it shows up.
 */
export class ExactExplorer {
  readonly kind = 'exact'

  constructor(readonly path: string) {}

  static fromCliArg(arg: string): ExactExplorer {
    return new ExactExplorer(arg)
  }
}
