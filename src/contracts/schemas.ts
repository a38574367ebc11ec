import { z } from 'zod'

export const DEFAULT_INTERVAL_SECONDS = 0.1

// Longest delay a Node timer takes before it fires after 1 ms instead
export const MAX_WAIT_MILLISECONDS = 2_147_483_647
export const MAX_WAIT_SECONDS = MAX_WAIT_MILLISECONDS / 1000

const seconds = (name: string) =>
  z.number({ invalid_type_error: `${name} must be a positive number of seconds` })
    .positive(`${name} must be a positive number of seconds`)
    .max(MAX_WAIT_SECONDS, `${name} must be at most ${MAX_WAIT_SECONDS} seconds`)

// Config file schema
export const WatchConfigSchema = z.object({
  interval: z.number().positive().max(MAX_WAIT_SECONDS).default(DEFAULT_INTERVAL_SECONDS),
  sleep: z.number().positive().max(MAX_WAIT_SECONDS).optional(),
  verbose: z.boolean().default(false),
}).strict()

// Settings the watcher refuses to start without
export const WatchSettingsSchema = z.object({
  command: z.array(z.string())
    .refine((tokens) => tokens.join(' ').trim().length > 0, 'No command was given'),
  interval: seconds('Interval'),
  sleep: seconds('Sleep'),
})

export type WatchSettings = z.infer<typeof WatchSettingsSchema>
