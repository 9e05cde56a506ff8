import type { CandidatePost } from '../scrapers/types.js'

export interface OutboundMessage {
  caption: string
  mediaUrl: string
}

export const CAPTION_LIMIT = 1000
// Includes a closing </b> added by the cut. Dropping a split entity or tag leaves the head shorter.
export const TRUNCATED_LENGTH = 950
export const CONTINUED_MARKER = '...\n\n[CONTINUED]'

const TITLE_WORD_COUNT = 7
const TOP_RULE = '﹏'.repeat(17)
const BOTTOM_RULE = '﹋'.repeat(17)
const CLOSE_BOLD = '</b>'

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
}

// First sentence, or the first seven words when the text has no period
export function extractTitle(text: string): string {
  const sentences = text.split('.')
  if (sentences.length > 1) {
    return sentences[0].trim()
  }

  const words = text.split(/\s+/).filter(Boolean)
  return `${words.slice(0, TITLE_WORD_COUNT).join(' ').trim()}...`
}

function cutHead(chars: string[], length: number): string {
  return chars.slice(0, length).join('')
    .replace(/<[^>]*$/, '')
    .replace(/&[#a-z0-9]*$/i, '')
}

function leavesBoldOpen(head: string): boolean {
  return head.split('<b>').length > head.split(CLOSE_BOLD).length
}

/**
 * Cuts captions longer than {@link CAPTION_LIMIT} code points down to
 * {@link TRUNCATED_LENGTH} and appends {@link CONTINUED_MARKER}.
 *
 * The cut ignores word boundaries, so it may fall mid-word. A tag or entity
 * it splits is dropped, and a headline it leaves open is closed.
 */
export function truncateCaption(caption: string): string {
  const chars = Array.from(caption)
  if (chars.length <= CAPTION_LIMIT) {
    return caption
  }

  const head = cutHead(chars, TRUNCATED_LENGTH)
  if (!leavesBoldOpen(head)) {
    return head + CONTINUED_MARKER
  }

  return cutHead(chars, TRUNCATED_LENGTH - CLOSE_BOLD.length) + CLOSE_BOLD + CONTINUED_MARKER
}

export function buildCaption(text: string, footer: string): string {
  const title = extractTitle(text)

  let caption = `<b>⚡ ${escapeHtml(title)}</b>\n`
  caption += `${TOP_RULE}\n\n`
  caption += `${escapeHtml(text)}\n\n`
  caption += `${BOTTOM_RULE}\n`
  caption += footer

  return truncateCaption(caption)
}

export function formatMessage(post: CandidatePost, footer: string): OutboundMessage {
  const [mediaUrl] = post.mediaUrls
  if (!mediaUrl) {
    throw new Error(`Post ${post.id} has no media to attach`)
  }

  return {
    caption: buildCaption(post.text, footer),
    mediaUrl,
  }
}
