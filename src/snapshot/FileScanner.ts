import fs from 'fs'
import { globSync } from 'glob'
import type { Explorer, ExactExplorer, GlobExplorer } from '../explorers'
import { Logger } from '../logging/logger'
import { Snapshot } from './Snapshot'

export class FileScanner {
  constructor(
    private readonly explorers: readonly Explorer[],
    private readonly logger: Logger = new Logger()
  ) {}

  /**
   * Run every explorer once against a fresh snapshot
   */
  scan(): Snapshot {
    const snapshot = new Snapshot()

    for (const explorer of this.explorers) {
      switch (explorer.kind) {
        case 'exact':
          this.exploreExact(explorer, snapshot)
          break
        case 'glob':
          this.exploreGlob(explorer, snapshot)
          break
      }
    }

    this.logger.trace(`Snapshot ${snapshot.id} taken at ${snapshot.takenAt} holds ${snapshot.size} paths`)
    return snapshot
  }

  private exploreExact(explorer: ExactExplorer, snapshot: Snapshot): void {
    this.record(explorer.path, snapshot)
  }

  private exploreGlob(explorer: GlobExplorer, snapshot: Snapshot): void {
    for (const pattern of explorer.patterns) {
      // braces were expanded already; anything left in the pattern is literal.
      // glob drops a leading './' from matches unless told to keep it
      const matches = globSync(pattern, {
        dot: true,
        nobrace: true,
        dotRelative: pattern.startsWith('./'),
      })
      for (const match of matches) {
        this.record(match, snapshot)
      }
    }
  }

  /**
   * Stat a path and add it to the snapshot. A path that is missing or
   * unreadable right now is left out for this cycle.
   */
  private record(filePath: string, snapshot: Snapshot): void {
    try {
      const stats = fs.statSync(filePath)
      snapshot.found(filePath, stats.mtimeMs)
    } catch (error) {
      this.logger.trace(`Skipping ${filePath}:`, error)
    }
  }
}
