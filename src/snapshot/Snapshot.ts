import { v4 as uuidv4 } from 'uuid'

/**
 * Every path found during one poll cycle, with its last modification time
 * in epoch milliseconds.
 *
 * A snapshot handed to `compareSnapshots` as the previous state is drained
 * by the comparison and cannot be compared again.
 */
export class Snapshot {
  readonly id: string = uuidv4()
  readonly takenAt: string = new Date().toISOString()
  private files: Map<string, number>
  private consumed = false

  constructor(files?: Iterable<[string, number]>) {
    this.files = new Map(files)
  }

  /**
   * Record a path that exists right now
   */
  found(path: string, mtime: number): void {
    this.files.set(path, mtime)
  }

  get size(): number {
    return this.files.size
  }

  get isConsumed(): boolean {
    return this.consumed
  }

  has(path: string): boolean {
    return this.files.has(path)
  }

  get(path: string): number | undefined {
    return this.files.get(path)
  }

  paths(): IterableIterator<string> {
    return this.files.keys()
  }

  entries(): IterableIterator<[string, number]> {
    return this.files.entries()
  }

  /**
   * Remove a path and hand back its mtime
   */
  take(path: string): number | undefined {
    const mtime = this.files.get(path)
    this.files.delete(path)
    return mtime
  }

  /**
   * Mark this snapshot as drained; any later comparison against it is a bug
   */
  consume(): void {
    if (this.consumed) {
      throw new Error(`Snapshot ${this.id} was already consumed by a comparison`)
    }
    this.consumed = true
  }

  clone(): Snapshot {
    return new Snapshot(this.files)
  }

  toString(): string {
    if (this.files.size === 0) {
      return ''
    }
    return `${Array.from(this.files.keys()).join('\n')}\n`
  }
}
