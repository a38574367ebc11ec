import { spawn } from 'child_process'
import { CommandLaunchError } from '../contracts/errors'
import type { CommandResult, CommandRunner } from '../contracts/types'

export function resolveShell(env: NodeJS.ProcessEnv = process.env): string {
  return env.SHELL || 'sh'
}

/**
 * Runs a command through `<shell> -c`, sharing this process's stdio, and
 * waits for it to finish. No timeout: a hanging command blocks the caller.
 */
export class ShellCommandRunner implements CommandRunner {
  constructor(private readonly shell: string = resolveShell()) {}

  run(command: string): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(this.shell, ['-c', command], {
        stdio: 'inherit',
      })

      child.on('error', (error) => {
        reject(new CommandLaunchError(command, error))
      })

      child.on('close', (exitCode, signal) => {
        resolve({ exitCode, signal })
      })
    })
  }
}
