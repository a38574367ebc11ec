import { ExactExplorer } from './ExactExplorer'
import { GlobExplorer } from './GlobExplorer'

export { ExactExplorer, GlobExplorer }

export type Explorer = ExactExplorer | GlobExplorer

export interface ExplorerArgs {
  exact?: string[]
  glob?: string[]
}

/**
 * Build explorers from CLI arguments, exact paths first
 */
export function createExplorers(args: ExplorerArgs): Explorer[] {
  return [
    ...(args.exact ?? []).map((arg) => ExactExplorer.fromCliArg(arg)),
    ...(args.glob ?? []).map((arg) => GlobExplorer.fromCliArg(arg)),
  ]
}
