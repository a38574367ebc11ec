import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import type { Mock } from 'vitest'
import fs from 'fs'
import path from 'path'
import os from 'os'
import { CommanderError } from 'commander'
import { createProgram, parseSeconds, resolveWatcherOptions } from './pollwatch'
import type { StartWatching } from './pollwatch'
import { Logger } from '../logging/logger'
import { Watcher } from '../watcher/Watcher'

describe('pollwatch cli', () => {
  let tempDir: string
  let start: Mock<StartWatching>
  let stderr: string
  const logger = new Logger('error')

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cli-test-'))
    start = vi.fn<StartWatching>().mockResolvedValue(undefined)
    stderr = ''
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  const parse = async (...args: string[]) => {
    const program = createProgram(start, logger)
      .exitOverride()
      .configureOutput({
        writeErr: (text) => { stderr += text },
        writeOut: () => {},
      })
    await program.parseAsync(['node', 'pollwatch', ...args])
  }

  const startedWith = () => {
    expect(start).toHaveBeenCalledTimes(1)
    return start.mock.calls[0]
  }

  it('should start a watcher with the parsed options', async () => {
    await parse('-e', 'a.txt', '--exact', 'b.txt', '-g', 'src/*.ts', '-i', '0.5', '-s', '3', 'echo', '$path')

    const [watcher, options] = startedWith()
    expect(watcher).toBeInstanceOf(Watcher)
    expect(options.explorers.map((explorer) => explorer.kind)).toEqual(['exact', 'exact', 'glob'])
    expect(options.command).toEqual(['echo', '$path'])
    expect(options.interval).toBe(0.5)
    expect(options.sleep).toBe(3)
    expect(options.verbose).toBe(false)
  })

  it('should default sleep to the interval', async () => {
    await parse('-e', 'a.txt', '-i', '2', 'make')

    const [, options] = startedWith()
    expect(options.interval).toBe(2)
    expect(options.sleep).toBe(2)
  })

  it('should hand options after the first command token to the command', async () => {
    await parse('-e', 'a.txt', 'ls', '-l', '--color', '-e')

    const [, options] = startedWith()
    expect(options.command).toEqual(['ls', '-l', '--color', '-e'])
    expect(options.explorers).toHaveLength(1)
  })

  it('should read defaults from a config file', async () => {
    const configPath = path.join(tempDir, 'pollwatch.config.json')
    fs.writeFileSync(configPath, JSON.stringify({ interval: 0.25, sleep: 5, verbose: true }))

    await parse('-c', configPath, '-e', 'a.txt', 'true')

    const [, options] = startedWith()
    expect(options.interval).toBe(0.25)
    expect(options.sleep).toBe(5)
    expect(options.verbose).toBe(true)
  })

  it('should let flags override the config file', async () => {
    const configPath = path.join(tempDir, 'pollwatch.config.json')
    fs.writeFileSync(configPath, JSON.stringify({ interval: 0.25, sleep: 5 }))

    await parse('-c', configPath, '-i', '1', '-v', '-e', 'a.txt', 'true')

    const [, options] = startedWith()
    expect(options.interval).toBe(1)
    expect(options.sleep).toBe(5)
    expect(options.verbose).toBe(true)
  })

  it('should refuse to start without any paths', async () => {
    await expect(parse('echo', 'hi')).rejects.toBeInstanceOf(CommanderError)

    expect(stderr).toBe('error: Empty path discovery list\n')
    expect(start).not.toHaveBeenCalled()
  })

  it('should refuse a non-positive interval', async () => {
    await expect(parse('-e', 'a.txt', '-i', '0', 'true')).rejects.toMatchObject({ exitCode: 1 })

    expect(stderr).toBe('error: Interval must be a positive number of seconds\n')
  })

  it('should refuse a sleep longer than a timer can wait', async () => {
    await expect(parse('-e', 'a.txt', '-s', '3000000', 'true')).rejects.toMatchObject({ exitCode: 1 })

    expect(stderr).toBe('error: Sleep must be at most 2147483.647 seconds\n')
    expect(start).not.toHaveBeenCalled()
  })

  it('should refuse an invalid glob before watching', async () => {
    await expect(parse('-g', '**a', 'true')).rejects.toBeInstanceOf(CommanderError)

    expect(stderr).toContain("Glob pattern from '**a' is invalid")
    expect(start).not.toHaveBeenCalled()
  })

  it('should refuse a missing command', async () => {
    await expect(parse('-e', 'a.txt')).rejects.toBeInstanceOf(CommanderError)

    expect(start).not.toHaveBeenCalled()
  })

  it('should refuse a non-numeric interval', async () => {
    await expect(parse('-e', 'a.txt', '-i', 'soon', 'true')).rejects.toBeInstanceOf(CommanderError)

    expect(stderr).toContain('Not a number of seconds.')
  })

  describe('parseSeconds', () => {
    it('should parse fractional seconds', () => {
      expect(parseSeconds('0.1')).toBe(0.1)
      expect(parseSeconds('-2')).toBe(-2)
    })

    it('should reject text', () => {
      expect(() => parseSeconds('abc')).toThrow('Not a number of seconds.')
      expect(() => parseSeconds(' ')).toThrow('Not a number of seconds.')
      expect(() => parseSeconds('Infinity')).toThrow('Not a number of seconds.')
    })
  })

  describe('resolveWatcherOptions', () => {
    it('should fall back to the config defaults', () => {
      const configPath = path.join(tempDir, 'empty.json')
      fs.writeFileSync(configPath, '{}')

      const options = resolveWatcherOptions(['true'], { exact: ['a'], glob: [], config: configPath }, logger)

      expect(options.interval).toBe(0.1)
      expect(options.sleep).toBe(0.1)
      expect(options.verbose).toBe(false)
      expect(options.logger).toBe(logger)
    })
  })
})
