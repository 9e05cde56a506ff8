import * as cheerio from 'cheerio'
import { fetchHtml } from './http.js'
import { logger } from '../utils/logger.js'
import { MEDIA_HOST_MARKERS } from '../config/sources.js'
import type { RawPostRecord, SourceFetcher } from './types.js'

const TWITTER_BASE_URL = 'https://twitter.com'
const DEFAULT_TIMEOUT_MS = 30000

export interface TwitterFetcherOptions {
  baseUrl?: string
  timeoutMs?: number
}

export function profileUrl(source: string, baseUrl: string = TWITTER_BASE_URL): string {
  return `${baseUrl}/${source.replace(/^@/, '')}`
}

function isMediaUrl(src: string): boolean {
  return MEDIA_HOST_MARKERS.some(marker => src.includes(marker))
}

/**
 * Extracts one record per `<article>` in a profile page.
 *
 * Only reads what is on the page; recency, media upgrades and required-field
 * checks happen in the scanner. An article that throws while being read is
 * logged and left out.
 */
export function parseProfileHtml(html: string, source: string = ''): RawPostRecord[] {
  const $ = cheerio.load(html)
  const records: RawPostRecord[] = []

  for (const element of $('article').toArray()) {
    try {
      const article = $(element)

      const textBlock = article.find('div[data-testid="tweetText"]').first()
      let text: string | undefined
      if (textBlock.length > 0) {
        const paragraphs = textBlock.find('p').toArray().map(p => $(p).text())
        text = paragraphs.length > 0 ? paragraphs.join(' ') : textBlock.text()
      }

      const mediaUrls = article
        .find('img[src]')
        .toArray()
        .map(img => $(img).attr('src') ?? '')
        .filter(src => src !== '' && isMediaUrl(src))

      records.push({
        id: article.attr('data-tweet-id'),
        timestamp: article.find('time[datetime]').first().attr('datetime'),
        text,
        mediaUrls,
      })
    } catch (error) {
      logger.warn({ err: error, source }, 'Skipping post - parsing error')
    }
  }

  return records
}

export class TwitterProfileFetcher implements SourceFetcher {
  name = 'twitter'

  private readonly baseUrl: string
  private readonly timeoutMs: number

  constructor(options: TwitterFetcherOptions = {}) {
    this.baseUrl = options.baseUrl ?? TWITTER_BASE_URL
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
  }

  async fetch(source: string): Promise<RawPostRecord[]> {
    const url = profileUrl(source, this.baseUrl)
    logger.debug({ source, url }, 'Fetching profile page')

    const html = await fetchHtml(url, { timeoutMs: this.timeoutMs })
    return parseProfileHtml(html, source)
  }
}
