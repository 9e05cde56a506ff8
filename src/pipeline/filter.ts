import type { CandidatePost } from '../scrapers/types.js'
import type { DedupState } from '../storage/dedup-store.js'

// New only when neither the ID nor the text has been relayed before
export function isNewPost(post: CandidatePost, state: DedupState): boolean {
  return !state.seenIds.has(post.id) && !state.seenFingerprints.has(post.fingerprint)
}
