import { describe, it, expect, vi } from 'vitest'
import {
  SourceScanner,
  fingerprintText,
  isRecent,
  normalizeMediaUrls,
  toCandidatePost,
  upgradeMediaUrl,
} from '../../src/scrapers/scanner.js'
import type { RawPostRecord, SourceFetcher } from '../../src/scrapers/types.js'

const NOW = new Date('2026-03-01T12:00:00.000Z')
const MEDIA = 'https://pbs.twimg.com/media/Gx1?format=jpg&name=small'

const createRecord = (overrides: Partial<RawPostRecord> = {}): RawPostRecord => ({
  id: '1900000000000000001',
  timestamp: '2026-03-01T10:00:00.000Z',
  text: 'Season 2 announced. Airs in July.',
  mediaUrls: [MEDIA],
  ...overrides,
})

const createFetcher = (fetch: SourceFetcher['fetch']): SourceFetcher => ({
  name: 'fake',
  fetch,
})

describe('isRecent', () => {
  it('accepts a post published 23 hours ago', () => {
    expect(isRecent('2026-02-28T13:00:00.000Z', NOW, 24)).toBe(true)
  })

  it('rejects a post published 25 hours ago', () => {
    expect(isRecent('2026-02-28T11:00:00.000Z', NOW, 24)).toBe(false)
  })

  it('rejects a post exactly at the window edge', () => {
    expect(isRecent('2026-02-28T12:00:00.000Z', NOW, 24)).toBe(false)
  })

  it('treats a malformed timestamp as recent', () => {
    expect(isRecent('yesterday-ish', NOW, 24)).toBe(true)
  })

  it('honours a custom window', () => {
    expect(isRecent('2026-03-01T09:00:00.000Z', NOW, 2)).toBe(false)
  })
})

describe('upgradeMediaUrl', () => {
  it('swaps the small variant for the large one', () => {
    expect(upgradeMediaUrl(MEDIA)).toBe('https://pbs.twimg.com/media/Gx1?format=jpg&name=large')
  })

  it('handles the variant as the first query param', () => {
    expect(upgradeMediaUrl('https://pbs.twimg.com/media/Gx1?name=small&format=png'))
      .toBe('https://pbs.twimg.com/media/Gx1?name=large&format=png')
  })

  it('leaves other variants untouched', () => {
    expect(upgradeMediaUrl('https://pbs.twimg.com/media/Gx1?format=jpg&name=smaller'))
      .toBe('https://pbs.twimg.com/media/Gx1?format=jpg&name=smaller')
  })
})

describe('normalizeMediaUrls', () => {
  it('dedupes after upgrading and keeps first-seen order', () => {
    expect(normalizeMediaUrls([
      'https://pbs.twimg.com/media/B?format=jpg&name=small',
      'https://pbs.twimg.com/media/A.jpg',
      'https://pbs.twimg.com/media/B?format=jpg&name=large',
      'https://pbs.twimg.com/media/A.jpg',
    ])).toEqual([
      'https://pbs.twimg.com/media/B?format=jpg&name=large',
      'https://pbs.twimg.com/media/A.jpg',
    ])
  })
})

describe('fingerprintText', () => {
  it('is the MD5 hex digest of the text', () => {
    expect(fingerprintText('hello')).toBe('5d41402abc4b2a76b9719d911017c592')
  })
})

describe('toCandidatePost', () => {
  it('builds a candidate from a complete record', () => {
    expect(toCandidatePost(createRecord(), '@Anime', NOW, 24)).toEqual({
      id: '1900000000000000001',
      source: '@Anime',
      text: 'Season 2 announced. Airs in July.',
      mediaUrls: ['https://pbs.twimg.com/media/Gx1?format=jpg&name=large'],
      publishedAt: new Date('2026-03-01T10:00:00.000Z'),
      fingerprint: fingerprintText('Season 2 announced. Airs in July.'),
    })
  })

  it('keeps a post with a malformed timestamp and no parsed date', () => {
    const post = toCandidatePost(createRecord({ timestamp: 'garbled' }), '@Anime', NOW, 24)

    expect(post).not.toBeNull()
    expect(post?.publishedAt).toBeNull()
  })

  const incomplete: Array<[string, Partial<RawPostRecord>]> = [
    ['an ID', { id: undefined }],
    ['a timestamp', { timestamp: undefined }],
    ['text', { text: undefined }],
    ['non-empty text', { text: '' }],
    ['media', { mediaUrls: [] }],
  ]

  it.each(incomplete)('skips a record without %s', (_, overrides) => {
    expect(toCandidatePost(createRecord(overrides), '@Anime', NOW, 24)).toBeNull()
  })

  it('skips a record outside the window', () => {
    const record = createRecord({ timestamp: '2026-02-28T11:00:00.000Z' })
    expect(toCandidatePost(record, '@Anime', NOW, 24)).toBeNull()
  })
})

describe('SourceScanner', () => {
  it('returns candidates for the records that qualify', async () => {
    const fetch = vi.fn<SourceFetcher['fetch']>().mockResolvedValue([
      createRecord({ id: '1' }),
      createRecord({ id: '2', timestamp: '2026-02-27T12:00:00.000Z' }),
      createRecord({ id: '3', mediaUrls: [] }),
    ])
    const scanner = new SourceScanner(createFetcher(fetch), { lookbackHours: 24, now: () => NOW })

    const posts = await scanner.scan('@AniTrendz')

    expect(fetch).toHaveBeenCalledWith('@AniTrendz')
    expect(posts.map(p => p.id)).toEqual(['1'])
    expect(posts[0].source).toBe('@AniTrendz')
  })

  it('returns an empty list when the fetch fails', async () => {
    const fetch = vi.fn<SourceFetcher['fetch']>().mockRejectedValue(new Error('HTTP 503: Service Unavailable'))
    const scanner = new SourceScanner(createFetcher(fetch), { lookbackHours: 24, now: () => NOW })

    await expect(scanner.scan('@AniTrendz')).resolves.toEqual([])
  })

  it('skips a record that throws while being read', async () => {
    const broken: RawPostRecord = {
      id: '2',
      timestamp: '2026-03-01T10:00:00.000Z',
      get text(): string {
        throw new Error('detached node')
      },
      mediaUrls: [MEDIA],
    }
    const fetch = vi.fn<SourceFetcher['fetch']>().mockResolvedValue([
      createRecord({ id: '1' }),
      broken,
      createRecord({ id: '3', text: 'Different text.' }),
    ])
    const scanner = new SourceScanner(createFetcher(fetch), { lookbackHours: 24, now: () => NOW })

    const posts = await scanner.scan('@Anime')

    expect(posts.map(p => p.id)).toEqual(['1', '3'])
  })
})
