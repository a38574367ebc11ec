/**
 * Raised for anything that must stop pollwatch before it starts watching:
 * bad CLI values, an invalid config file, a malformed pattern.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

export class PatternSyntaxError extends ConfigurationError {
  constructor(message: string, public readonly pattern: string) {
    super(message)
    this.name = 'PatternSyntaxError'
  }
}

export class CommandLaunchError extends Error {
  constructor(public readonly command: string, cause: Error) {
    super(`Failed to launch '${command}': ${cause.message}`, { cause })
    this.name = 'CommandLaunchError'
  }
}
