import dotenv from 'dotenv'
import path from 'path'
import { fileURLToPath } from 'url'
import { SOURCES } from './sources.js'

const __dirname = path.dirname(fileURLToPath(import.meta.url))
export const ENV_PATH = path.resolve(__dirname, '..', '..', '.env')
export const ENV_EXAMPLE_PATH = path.resolve(__dirname, '..', '..', '.env.example')

dotenv.config({ path: ENV_PATH })

export const DEFAULT_CAPTION_FOOTER = '🍁 | @TheAnimeTimes_acn'
export const POSTED_IDS_FILENAME = 'posted_tweets.json'
export const POSTED_CONTENT_FILENAME = 'posted_content.json'

type Env = Record<string, string | undefined>

export interface RelayConfig {
  // Required
  botToken: string
  channelId: string

  // Sources
  sources: readonly string[]
  lookbackHours: number

  // Relay settings
  relayDelayMs: number
  scrapeTimeoutMs: number
  sendTimeoutMs: number
  captionFooter: string

  // Persistence
  postedIdsPath: string
  postedContentPath: string
}

function getEnvVar(env: Env, name: string): string {
  return env[name] || ''
}

function getEnvInt(env: Env, name: string, defaultValue: number): number {
  const value = env[name]
  if (!value) return defaultValue
  const parsed = parseInt(value, 10)
  return Number.isNaN(parsed) ? defaultValue : parsed
}

export function loadConfigFromEnv(env: Env = process.env): RelayConfig {
  const dataDir = path.resolve(env.DATA_DIR || process.cwd())

  return {
    // Required
    botToken: getEnvVar(env, 'TELEGRAM_BOT_TOKEN'),
    channelId: getEnvVar(env, 'TELEGRAM_CHANNEL_ID'),

    // Sources
    sources: SOURCES,
    lookbackHours: getEnvInt(env, 'LOOKBACK_HOURS', 24),

    // Relay settings
    relayDelayMs: getEnvInt(env, 'RELAY_DELAY_MS', 10_000),
    scrapeTimeoutMs: 30_000,
    sendTimeoutMs: 15_000,
    captionFooter: env.CAPTION_FOOTER || DEFAULT_CAPTION_FOOTER,

    // Persistence
    postedIdsPath: path.join(dataDir, POSTED_IDS_FILENAME),
    postedContentPath: path.join(dataDir, POSTED_CONTENT_FILENAME),
  }
}

export function getMissingRequiredConfig(config: RelayConfig): string[] {
  const required = ['botToken', 'channelId'] as const
  return required.filter(key => !config[key])
}

export function validateConfig(config: RelayConfig): void {
  const missing = getMissingRequiredConfig(config)
  if (missing.length > 0) {
    throw new Error(`Missing required config: ${missing.join(', ')}`)
  }
}
