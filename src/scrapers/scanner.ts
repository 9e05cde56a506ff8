import { createHash } from 'crypto'
import { logger } from '../utils/logger.js'
import type { CandidatePost, RawPostRecord, SourceFetcher } from './types.js'

const HOUR_MS = 60 * 60 * 1000

export interface ScannerOptions {
  lookbackHours: number
  now?: () => Date
}

export function fingerprintText(text: string): string {
  return createHash('md5').update(text, 'utf8').digest('hex')
}

export function parseTimestamp(value: string): Date | null {
  const ms = Date.parse(value)
  return Number.isNaN(ms) ? null : new Date(ms)
}

// Unparseable timestamps count as recent
export function isRecent(timestamp: string, now: Date, lookbackHours: number): boolean {
  const publishedAt = parseTimestamp(timestamp)
  if (!publishedAt) return true
  return publishedAt.getTime() > now.getTime() - lookbackHours * HOUR_MS
}

// pbs.twimg.com serves variants through the `name` query param
export function upgradeMediaUrl(url: string): string {
  return url.replace(/([?&])name=small(?=&|#|$)/, '$1name=large')
}

export function normalizeMediaUrls(urls: string[]): string[] {
  return Array.from(new Set(urls.map(upgradeMediaUrl)))
}

export function toCandidatePost(
  record: RawPostRecord,
  source: string,
  now: Date,
  lookbackHours: number
): CandidatePost | null {
  if (!record.id || !record.timestamp) {
    return null
  }

  if (!isRecent(record.timestamp, now, lookbackHours)) {
    return null
  }

  const text = record.text ?? ''
  const mediaUrls = normalizeMediaUrls(record.mediaUrls)

  if (!text || mediaUrls.length === 0) {
    return null
  }

  return {
    id: record.id,
    source,
    text,
    mediaUrls,
    publishedAt: parseTimestamp(record.timestamp),
    fingerprint: fingerprintText(text),
  }
}

export class SourceScanner {
  private readonly lookbackHours: number
  private readonly now: () => Date

  constructor(
    private readonly fetcher: SourceFetcher,
    options: ScannerOptions
  ) {
    this.lookbackHours = options.lookbackHours
    this.now = options.now ?? (() => new Date())
  }

  async scan(source: string): Promise<CandidatePost[]> {
    let records: RawPostRecord[]

    try {
      records = await this.fetcher.fetch(source)
    } catch (error) {
      logger.error({ err: error, source, fetcher: this.fetcher.name }, 'Failed to scan source')
      return []
    }

    const now = this.now()
    const posts: CandidatePost[] = []

    for (const record of records) {
      try {
        const post = toCandidatePost(record, source, now, this.lookbackHours)
        if (post) {
          posts.push(post)
        }
      } catch (error) {
        logger.warn({ err: error, source, id: record.id }, 'Skipping post - parsing error')
      }
    }

    logger.info({ source, records: records.length, candidates: posts.length }, 'Scanned source')

    return posts
  }
}
