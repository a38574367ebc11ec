import fs from 'fs'
import path from 'path'
import { z } from 'zod'
import { ConfigurationError } from '../contracts/errors'
import { WatchConfigSchema } from '../contracts/schemas'
import type { WatchConfig } from '../contracts/types'

export const CONFIG_FILE_NAMES = ['.pollwatch.config.json', 'pollwatch.config.json']

export class ConfigLoader {
  private static DEFAULT_CONFIG: WatchConfig = WatchConfigSchema.parse({})

  private readonly config: WatchConfig
  private loadedFrom: string | null = null

  constructor(private configPath?: string, private cwd: string = process.cwd()) {
    this.config = this.loadConfig()
  }

  private findConfigFile(): string | null {
    // Start from the working directory and walk up
    let currentDir = path.resolve(this.cwd)

    for (;;) {
      for (const configName of CONFIG_FILE_NAMES) {
        const configPath = path.join(currentDir, configName)
        if (fs.existsSync(configPath)) {
          return configPath
        }
      }

      const parentDir = path.dirname(currentDir)
      if (parentDir === currentDir) {
        return null
      }
      currentDir = parentDir
    }
  }

  private loadConfig(): WatchConfig {
    if (this.configPath !== undefined && !fs.existsSync(this.configPath)) {
      throw new ConfigurationError(`Config file ${this.configPath} does not exist`)
    }

    const configPath = this.configPath ?? this.findConfigFile()
    if (!configPath) {
      return ConfigLoader.DEFAULT_CONFIG
    }

    try {
      const rawConfig = fs.readFileSync(configPath, 'utf-8')
      const validated = WatchConfigSchema.parse(JSON.parse(rawConfig))
      this.loadedFrom = configPath
      return validated
    } catch (error) {
      if (error instanceof z.ZodError) {
        const problems = error.issues
          .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
          .join('; ')
        throw new ConfigurationError(`Invalid config at ${configPath}: ${problems}`)
      }
      if (error instanceof SyntaxError) {
        throw new ConfigurationError(`Invalid JSON in config file ${configPath}`)
      }
      throw error
    }
  }

  getConfig(): WatchConfig {
    return this.config
  }

  getConfigPath(): string | null {
    return this.loadedFrom
  }
}
