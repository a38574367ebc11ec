export * from './contracts'
export { expandPattern, PatternExpander } from './glob/PatternExpander'
export { validateGlobPattern } from './glob/globSyntax'
export { createExplorers, ExactExplorer, GlobExplorer } from './explorers'
export type { Explorer, ExplorerArgs } from './explorers'
export { Snapshot } from './snapshot/Snapshot'
export { compareSnapshots } from './snapshot/diff'
export { FileScanner } from './snapshot/FileScanner'
export { buildCommand, formatMtime, joinCommand } from './watcher/CommandTemplate'
export { ShellCommandRunner, resolveShell } from './watcher/ShellCommandRunner'
export { Watcher } from './watcher/Watcher'
export type { WatcherOptions, PollResult } from './watcher/Watcher'
export { ConfigLoader } from './config/ConfigLoader'
export { Logger, createLogger, resolveLogLevel } from './logging/logger'
export type { LogLevel } from './logging/logger'
