import { setTimeout as delay } from 'timers/promises'
import { ConfigurationError } from '../contracts/errors'
import { MAX_WAIT_MILLISECONDS, WatchSettingsSchema } from '../contracts/schemas'
import type { WatchSettings } from '../contracts/schemas'
import type { CommandRunner, DetectedChange, SnapshotDifference } from '../contracts/types'
import type { Explorer } from '../explorers'
import { Logger } from '../logging/logger'
import { compareSnapshots } from '../snapshot/diff'
import { FileScanner } from '../snapshot/FileScanner'
import type { Snapshot } from '../snapshot/Snapshot'
import { buildCommand, joinCommand } from './CommandTemplate'
import { ShellCommandRunner } from './ShellCommandRunner'

export interface WatcherOptions {
  explorers: Explorer[]
  command: string[]
  /** Seconds between checks while nothing changes */
  interval: number
  /** Seconds to pause after running the command; defaults to `interval` */
  sleep?: number
  verbose?: boolean
  runner?: CommandRunner
  logger?: Logger
  wait?: (milliseconds: number) => Promise<void>
}

export interface PollResult {
  snapshot: Snapshot
  difference: SnapshotDifference
}

const toMilliseconds = (seconds: number): number =>
  Math.min(Math.round(seconds * 1000), MAX_WAIT_MILLISECONDS)

const CHANGE_MESSAGES: Record<DetectedChange['kind'], string> = {
  new: 'is new',
  modified: 'was modified',
  deleted: 'was deleted',
}

export class Watcher {
  private readonly scanner: FileScanner
  private readonly settings: WatchSettings
  private readonly template: string
  private readonly verbose: boolean
  private readonly runner: CommandRunner
  private readonly logger: Logger
  private readonly wait: (milliseconds: number) => Promise<void>
  private noChangeCount = 0

  constructor(options: WatcherOptions) {
    const parsed = WatchSettingsSchema.safeParse({
      command: options.command,
      interval: options.interval,
      sleep: options.sleep ?? options.interval,
    })
    if (!parsed.success) {
      // stop at the first failed check: command, then interval, then sleep
      throw new ConfigurationError(parsed.error.issues[0].message)
    }
    if (options.explorers.length === 0) {
      throw new ConfigurationError('Empty path discovery list')
    }

    this.settings = parsed.data
    this.template = joinCommand(parsed.data.command)
    this.verbose = options.verbose ?? false
    this.logger = options.logger ?? new Logger()
    this.runner = options.runner ?? new ShellCommandRunner()
    this.wait = options.wait ?? ((milliseconds) => delay(milliseconds))
    this.scanner = new FileScanner(options.explorers, this.logger)
  }

  /**
   * Poll forever. Only ends when the process is stopped from outside.
   */
  async watch(): Promise<never> {
    let previous = this.takeSnapshot()
    this.logger.debug(`Watching ${previous.size} paths, running '${this.template}' on change`)
    await this.wait(toMilliseconds(this.settings.interval))

    for (;;) {
      const { snapshot } = await this.poll(previous)
      previous = snapshot
    }
  }

  takeSnapshot(): Snapshot {
    return this.scanner.scan()
  }

  /**
   * One cycle: scan, compare against `previous` (which is consumed), run the
   * command if anything changed, then pause. The returned snapshot becomes
   * the baseline for the next cycle.
   */
  async poll(previous: Snapshot): Promise<PollResult> {
    const snapshot = this.takeSnapshot()
    const difference = compareSnapshots(snapshot, previous)

    if (difference.kind === 'unchanged') {
      this.reportUnchanged(snapshot)
      await this.wait(toMilliseconds(this.settings.interval))
    } else {
      await this.trigger(difference)
      await this.wait(toMilliseconds(this.settings.sleep))
    }

    return { snapshot, difference }
  }

  private async trigger(change: DetectedChange): Promise<void> {
    if (this.noChangeCount > 0 && this.verbose) {
      this.logger.progress('\n')
    }
    this.noChangeCount = 0
    this.logger.info(`'${change.path}' ${CHANGE_MESSAGES[change.kind]}`)

    const command = buildCommand(this.template, change)
    this.logger.debug(`Running: ${command}`)

    try {
      const result = await this.runner.run(command)
      this.logger.debug(`Command finished with exit code ${result.exitCode}${result.signal ? ` (${result.signal})` : ''}`)
    } catch (error) {
      this.logger.error(error instanceof Error ? error.message : `Failed to launch '${command}'`)
    }
  }

  private reportUnchanged(snapshot: Snapshot): void {
    if (!this.verbose) return

    if (this.noChangeCount === 0) {
      this.logger.info(`No changes in ${snapshot.size} paths`)
    } else {
      this.logger.progress('+')
    }
    this.noChangeCount++
  }
}
