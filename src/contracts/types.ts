export type SnapshotDifference =
  | { kind: 'unchanged' }
  | { kind: 'new'; path: string; mtime: number }
  | { kind: 'modified'; path: string; mtime: number }
  | { kind: 'deleted'; path: string }

export type DetectedChange = Exclude<SnapshotDifference, { kind: 'unchanged' }>

export interface WatchConfig {
  interval: number
  sleep?: number
  verbose: boolean
}

export interface CommandResult {
  exitCode: number | null
  signal: NodeJS.Signals | null
}

export interface CommandRunner {
  run(command: string): Promise<CommandResult>
}
