import type { SnapshotDifference } from '../contracts/types'
import { Snapshot } from './Snapshot'

/**
 * Find the first difference between the current snapshot and the previous one.
 *
 * `previous` is consumed: every path seen in `current` is taken out of it, so
 * whatever is left afterwards was deleted. Only one difference is reported
 * even when several paths changed; the rest surface on later cycles.
 */
export function compareSnapshots(current: Snapshot, previous: Snapshot): SnapshotDifference {
  previous.consume()

  for (const [path, mtime] of current.entries()) {
    const previousMtime = previous.take(path)

    if (previousMtime === undefined) {
      return { kind: 'new', path, mtime }
    }
    if (previousMtime !== mtime) {
      return { kind: 'modified', path, mtime }
    }
  }

  for (const path of previous.paths()) {
    return { kind: 'deleted', path }
  }

  return { kind: 'unchanged' }
}
