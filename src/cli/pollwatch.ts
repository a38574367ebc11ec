#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander'
import { ConfigLoader } from '../config/ConfigLoader'
import { ConfigurationError } from '../contracts/errors'
import { createExplorers } from '../explorers'
import { createLogger } from '../logging/logger'
import type { Logger } from '../logging/logger'
import { Watcher } from '../watcher/Watcher'
import type { WatcherOptions } from '../watcher/Watcher'

export const VERSION = '0.1.0'

export interface CliOptions {
  exact: string[]
  glob: string[]
  interval?: number
  sleep?: number
  verbose?: boolean
  config?: string
}

export type StartWatching = (watcher: Watcher, options: WatcherOptions) => Promise<void>

const collect = (value: string, previous: string[]): string[] => [...previous, value]

export function parseSeconds(value: string): number {
  const seconds = Number(value)
  if (value.trim() === '' || !Number.isFinite(seconds)) {
    throw new InvalidArgumentError('Not a number of seconds.')
  }
  return seconds
}

/**
 * Merge CLI flags over the config file and build the watcher options.
 * Anything invalid surfaces here as a ConfigurationError.
 */
export function resolveWatcherOptions(
  command: string[],
  options: CliOptions,
  logger: Logger
): WatcherOptions {
  const config = new ConfigLoader(options.config).getConfig()
  const interval = options.interval ?? config.interval

  return {
    explorers: createExplorers({ exact: options.exact, glob: options.glob }),
    command,
    interval,
    sleep: options.sleep ?? config.sleep ?? interval,
    verbose: options.verbose ?? config.verbose,
    logger,
  }
}

export function createProgram(
  start: StartWatching,
  logger: Logger = createLogger()
): Command {
  const program = new Command()

  program
    .name('pollwatch')
    .description(
      'Poll paths on the file system and run a command when one of them is created, modified or deleted'
    )
    .version(VERSION, '-V, --version', 'Output the current version')
    .option('-e, --exact <path>', 'Exact path to watch (repeatable)', collect, [])
    .option('-g, --glob <pattern>', 'Extended glob pattern of paths to watch (repeatable)', collect, [])
    .option('-i, --interval <seconds>', 'Seconds to wait between checks while nothing changes (default: 0.1)', parseSeconds)
    .option('-s, --sleep <seconds>', 'Seconds to pause after running the command (default: interval)', parseSeconds)
    .option('-v, --verbose', 'Report quiet polling cycles')
    .option('-c, --config <path>', 'Config file to read defaults from')
    .argument('<command...>', 'Command to run on change, through $SHELL -c')
    .passThroughOptions()
    .action(async (command: string[], options: CliOptions) => {
      let watcherOptions: WatcherOptions
      let watcher: Watcher
      try {
        watcherOptions = resolveWatcherOptions(command, options, logger)
        watcher = new Watcher(watcherOptions)
      } catch (error) {
        if (error instanceof ConfigurationError) {
          program.error(`error: ${error.message}`, { exitCode: 1, code: 'pollwatch.configuration' })
        }
        throw error
      }

      logger.debug(`Starting with ${watcherOptions.explorers.length} explorers`)
      await start(watcher, watcherOptions)
    })

  program.addHelpText(
    'after',
    `
The command may use these variables, quoted so your shell leaves them alone:
  $diff  or \${diff}   one of: new, modified, deleted
  $path  or \${path}   the path that changed
  $mtime or \${mtime}  last modified time of the path (not set for deleted paths)
Prefix a variable with a backslash to keep it as written.

Environment:
  SHELL            shell used to run the command (default: sh)
  POLLWATCH_LOG    log level: trace, debug, info, warn, error (default: info)
  POLLWATCH_DEBUG  set to 1 or true for debug logging

Examples:
  $ pollwatch --glob 'src/**/*.{ts,json}' 'npm test'
  $ pollwatch -i 0.5 -s 10 -g '/etc/my-program/**' -e /usr/bin/my-program \\
      systemctl restart my-program.service
  $ pollwatch -g 'notes/*.md' 'echo "$path was $diff at $mtime"'
`
  )

  return program
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const logger = createLogger()
  const program = createProgram(async (watcher) => {
    await watcher.watch()
  }, logger)
  await program.parseAsync(argv)
}

// Only run if this is the main module
if (require.main === module) {
  main().catch((error) => {
    console.error('pollwatch: unexpected failure:', error)
    process.exit(1)
  })
}
