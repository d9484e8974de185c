import * as path from 'node:path'
import { existsSync, readFileSync } from 'node:fs'
import { parse } from 'yaml'
import { z } from 'zod'
import { ConfigError, errorMessage } from './errors.js'
import type { ChannelInstanceConfig } from './channels/types.js'
import { DEFAULT_BACKOFF } from './utils/backoff.js'
import { createLogger } from './logger.js'

const log = createLogger('Config')

const CONFIG_FILENAME = 'config.yaml'
const CREDENTIALS_PATH = path.join('source', 'credentials.json')

export function findAgentDir(): string {
  // Walk up from cwd looking for an existing .herald/ directory
  let dir = process.cwd()
  while (dir !== path.dirname(dir)) {
    const candidate = path.join(dir, '.herald')
    if (existsSync(candidate)) return candidate
    dir = path.dirname(dir)
  }
  return path.resolve('.herald')
}

// ─────────────────────────────────────────────────────────────────
// Schema
// ─────────────────────────────────────────────────────────────────

const destinationSchema = z.object({
  /** Channel instance id from the channels section */
  channel: z.string().min(1),
  /** Platform destination, e.g. a Discord channel id */
  to: z.string().min(1),
})

const backoffSchema = z.object({
  initialMs: z.number().int().positive().default(60_000),
  maxMs: z.number().int().positive().default(30 * 60_000),
  factor: z.number().min(1).default(2),
  jitter: z.number().min(0).max(1).default(0),
})

const remindersSchema = z.object({
  reconcileIntervalMinutes: z.number().positive().default(5),
  scanIntervalSeconds: z.number().positive().default(60),
  leadWindowMinutes: z.number().nonnegative().default(10),
  missingStreakThreshold: z.number().int().min(1).default(3),
  renotifyOnReschedule: z.boolean().default(true),
  timezone: z.string().default('UTC'),
  locale: z.string().default('en'),
  backoff: backoffSchema.default({}),
  destination: destinationSchema,
  alerts: destinationSchema.optional(),
})

const sourceSchema = z.object({
  provider: z.enum(['caldav', 'ics']),
  url: z.string().url(),
  /** CalDAV collection id (last path segment of the calendar URL) */
  calendar: z.string().optional(),
  minIntervalMs: z.number().int().nonnegative().default(1000),
  lookAheadDays: z.number().positive().default(30),
  lookBehindDays: z.number().nonnegative().default(1),
})

const reconnectSchema = z
  .object({
    initialMs: z.number().int().positive(),
    maxMs: z.number().int().positive(),
    factor: z.number().min(1),
    jitter: z.number().min(0).max(1),
    maxAttempts: z.number().int().positive(),
  })
  .partial()

const channelSchema = z
  .object({
    plugin: z.string().min(1),
    processing: z.enum(['immediate', 'on_demand']).default('immediate'),
    reconnect: reconnectSchema.optional(),
  })
  .passthrough()

const configSchema = z.object({
  reminders: remindersSchema,
  source: sourceSchema,
  database: z.object({ path: z.string().default('herald.db') }).default({}),
  channels: z.record(channelSchema).default({}),
  server: z
    .object({
      port: z.number().int().positive().default(4321),
      host: z.string().default('0.0.0.0'),
    })
    .default({}),
})

export type BackoffConfig = z.infer<typeof backoffSchema>
export type RemindersConfig = z.infer<typeof remindersSchema>
export type SourceConfig = z.infer<typeof sourceSchema>
export type Destination = z.infer<typeof destinationSchema>

export interface HeraldConfig {
  agentDir: string
  reminders: RemindersConfig
  source: SourceConfig
  databasePath: string
  channels: Record<string, ChannelInstanceConfig>
  server: { port: number; host: string }
}

export interface SourceCredentials {
  username: string
  password: string
}

// ─────────────────────────────────────────────────────────────────
// Loading
// ─────────────────────────────────────────────────────────────────

/**
 * Parse and validate an already-loaded YAML document.
 */
export function parseConfig(raw: unknown, agentDir: string): HeraldConfig {
  const result = configSchema.safeParse(raw ?? {})
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new ConfigError(`Invalid configuration: ${issues}`)
  }

  const parsed = result.data

  if (parsed.source.provider === 'caldav' && !parsed.source.calendar) {
    throw new ConfigError('Invalid configuration: source.calendar is required for the caldav provider')
  }

  const channels: Record<string, ChannelInstanceConfig> = {}
  for (const [id, entry] of Object.entries(parsed.channels)) {
    channels[id] = {
      ...entry,
      id,
      plugin: entry.plugin,
      processing: entry.processing,
      reconnect: { ...DEFAULT_BACKOFF, ...(entry.reconnect ?? {}) },
    }
  }

  for (const destination of [parsed.reminders.destination, parsed.reminders.alerts]) {
    if (destination && !(destination.channel in channels)) {
      throw new ConfigError(
        `Invalid configuration: destination channel "${destination.channel}" is not declared under channels`,
      )
    }
  }

  return {
    agentDir,
    reminders: parsed.reminders,
    source: parsed.source,
    databasePath: path.resolve(agentDir, parsed.database.path),
    channels,
    server: parsed.server,
  }
}

export function loadConfig(agentDir?: string): HeraldConfig {
  const dir = agentDir ?? process.env.HERALD_DIR ?? findAgentDir()
  const configPath = path.join(dir, CONFIG_FILENAME)

  if (!existsSync(configPath)) {
    throw new ConfigError(`Configuration not found at ${configPath}`)
  }

  let raw: unknown
  try {
    raw = parse(readFileSync(configPath, 'utf-8'))
  } catch (err) {
    throw new ConfigError(`Could not parse ${configPath}: ${errorMessage(err)}`, { cause: err })
  }

  return parseConfig(raw, dir)
}

const credentialsSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
})

/**
 * Load source credentials from the environment, then from credentials.json.
 * Returns null when neither is present (public ICS feeds need none).
 */
export function loadSourceCredentials(agentDir: string): SourceCredentials | null {
  const envUser = process.env.HERALD_SOURCE_USERNAME
  const envPassword = process.env.HERALD_SOURCE_PASSWORD
  if (envUser && envPassword) {
    return { username: envUser, password: envPassword }
  }

  const credentialsPath = path.join(agentDir, CREDENTIALS_PATH)
  if (!existsSync(credentialsPath)) {
    return null
  }

  try {
    const parsed = credentialsSchema.safeParse(JSON.parse(readFileSync(credentialsPath, 'utf-8')))
    if (!parsed.success) {
      log.warn(`[Config] Invalid credentials file at ${credentialsPath}: missing username or password`)
      return null
    }
    return parsed.data
  } catch (err) {
    log.warn({ err }, `[Config] Could not load source credentials from ${credentialsPath}`)
    return null
  }
}
