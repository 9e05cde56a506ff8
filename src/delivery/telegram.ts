import { fetchWithTimeout } from '../scrapers/http.js'
import { logger } from '../utils/logger.js'
import type { OutboundMessage } from './formatter.js'

const TELEGRAM_API_BASE_URL = 'https://api.telegram.org'
const DEFAULT_TIMEOUT_MS = 15000

export interface RelayChannel {
  name: string
  send(message: OutboundMessage): Promise<boolean>
}

export interface TelegramRelayOptions {
  botToken: string
  channelId: string
  timeoutMs?: number
  apiBaseUrl?: string
}

interface SendResult {
  ok: boolean
  status: number
  description?: string
}

async function readErrorDescription(response: Response): Promise<string | undefined> {
  try {
    const body: unknown = await response.json()
    if (typeof body === 'object' && body !== null && 'description' in body && typeof body.description === 'string') {
      return body.description
    }
    return undefined
  } catch {
    return undefined
  }
}

export class TelegramRelay implements RelayChannel {
  name = 'telegram'

  private readonly endpoint: string
  private readonly channelId: string
  private readonly timeoutMs: number

  constructor(options: TelegramRelayOptions) {
    const baseUrl = options.apiBaseUrl ?? TELEGRAM_API_BASE_URL
    this.endpoint = `${baseUrl}/bot${options.botToken}/sendPhoto`
    this.channelId = options.channelId
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
  }

  async send(message: OutboundMessage): Promise<boolean> {
    const body = new URLSearchParams({
      chat_id: this.channelId,
      photo: message.mediaUrl,
      caption: message.caption,
      parse_mode: 'HTML',
    })

    try {
      const result = await fetchWithTimeout(this.endpoint, {
        method: 'POST',
        body,
        timeoutMs: this.timeoutMs,
      }, async (response): Promise<SendResult> => ({
        ok: response.ok,
        status: response.status,
        description: response.ok ? undefined : await readErrorDescription(response),
      }))

      if (!result.ok) {
        // The endpoint URL carries the bot token, so only the status is logged
        logger.error({
          status: result.status,
          description: result.description,
          mediaUrl: message.mediaUrl,
        }, 'Failed to send to Telegram')
        return false
      }

      return true
    } catch (error) {
      logger.error({ err: error, mediaUrl: message.mediaUrl }, 'Failed to send to Telegram')
      return false
    }
  }
}
