import pino from 'pino'

const LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const satisfies readonly pino.Level[]

function isLevel(value: string): value is pino.Level {
  return (LEVELS as readonly string[]).includes(value)
}

const requestedLevel = (process.env.LOG_LEVEL || 'info').toLowerCase()
const level: pino.Level = isLevel(requestedLevel) ? requestedLevel : 'info'
const logFile = process.env.LOG_FILE || 'anime_news_relay.log'

// Vitest sets VITEST; nothing is written to disk or stdout during tests
const isTestEnv = Boolean(process.env.VITEST) || process.env.NODE_ENV === 'test'

function createStreams(): pino.StreamEntry[] {
  if (isTestEnv) return []
  return [
    { level, stream: process.stdout },
    { level, stream: pino.destination({ dest: logFile, mkdir: true, sync: false }) },
  ]
}

export const logger = pino(
  {
    level,
    enabled: !isTestEnv,
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.multistream(createStreams())
)
