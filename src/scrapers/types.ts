// Whatever a fetcher could read off a single post; any field may be missing
export interface RawPostRecord {
  id?: string
  timestamp?: string         // As published, e.g. ISO 8601
  text?: string
  mediaUrls: string[]
}

export interface CandidatePost {
  id: string                 // Source-unique post ID
  source: string             // Account the post was scanned from
  text: string
  mediaUrls: string[]        // Upgraded and deduplicated, first-seen order
  publishedAt: Date | null   // null when the timestamp could not be parsed
  fingerprint: string        // MD5 of text
}

export interface SourceFetcher {
  name: string
  fetch(source: string): Promise<RawPostRecord[]>
}
