import dotenv from 'dotenv'
import { existsSync } from 'fs'
import { readFile, writeFile } from 'fs/promises'
import readline from 'readline/promises'
import { stdin as input, stdout as output } from 'process'
import { ENV_EXAMPLE_PATH, ENV_PATH, getMissingRequiredConfig, loadConfigFromEnv } from './index.js'

type EnvMap = Record<string, string>
type ReadlineInterface = ReturnType<typeof readline.createInterface>

interface EnsureConfigOptions {
  force?: boolean
}

const ENV_LINE = /^\s*([A-Z0-9_]+)\s*=\s*(.*?)\s*$/
const QUOTED_VALUE = /^(["'])(.*)\1$/

export function parseEnvFile(content: string): EnvMap {
  const values: EnvMap = {}
  for (const line of content.split(/\r?\n/)) {
    if (line.trimStart().startsWith('#')) continue
    const match = ENV_LINE.exec(line)
    if (!match) continue
    values[match[1]] = match[2].replace(QUOTED_VALUE, '$2')
  }
  return values
}

function quoteEnvValue(value: string): string {
  return /[\s#"]/.test(value) ? JSON.stringify(value) : value
}

// Replaces the KEY= line in place, or appends one
export function setEnvValue(content: string, key: string, value: string): string {
  const line = `${key}=${quoteEnvValue(value)}`
  const existing = new RegExp(`^${key}=.*$`, 'm')
  if (existing.test(content)) {
    return content.replace(existing, () => line)
  }

  const head = content.trimEnd()
  return head ? `${head}\n${line}\n` : `${line}\n`
}

async function askRequired(rl: ReadlineInterface, label: string, current: string): Promise<string> {
  const prompt = current ? `${label} [${current}]: ` : `${label}: `
  let answer = ''
  while (!answer) {
    answer = (await rl.question(prompt)).trim() || current
  }
  return answer
}

// Prompts for the Telegram credentials when attached to a terminal, then reloads .env
export async function ensureConfigInteractive(options: EnsureConfigOptions = {}): Promise<void> {
  if (!process.stdin.isTTY) return

  const current = loadConfigFromEnv()
  const envExists = existsSync(ENV_PATH)
  if (!options.force && envExists && getMissingRequiredConfig(current).length === 0) {
    return
  }

  console.log('Missing configuration detected. Starting interactive setup...')

  const values: EnvMap = envExists ? parseEnvFile(await readFile(ENV_PATH, 'utf8')) : {}
  const rl = readline.createInterface({ input, output })

  try {
    values.TELEGRAM_BOT_TOKEN = await askRequired(
      rl,
      'TELEGRAM_BOT_TOKEN (from @BotFather)',
      values.TELEGRAM_BOT_TOKEN || current.botToken
    )
    values.TELEGRAM_CHANNEL_ID = await askRequired(
      rl,
      'TELEGRAM_CHANNEL_ID (e.g. @mychannel or -100...)',
      values.TELEGRAM_CHANNEL_ID || current.channelId
    )
  } finally {
    rl.close()
  }

  const template = existsSync(ENV_EXAMPLE_PATH) ? await readFile(ENV_EXAMPLE_PATH, 'utf8') : ''
  const content = Object.entries(values).reduce(
    (env, [key, value]) => setEnvValue(env, key, value),
    template
  )
  await writeFile(ENV_PATH, content)
  dotenv.config({ path: ENV_PATH, override: true })
}
