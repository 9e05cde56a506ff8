import type { RelayConfig } from '../config/index.js'
import { formatMessage } from '../delivery/formatter.js'
import { TelegramRelay, type RelayChannel } from '../delivery/telegram.js'
import { SourceScanner } from '../scrapers/scanner.js'
import { TwitterProfileFetcher } from '../scrapers/twitter.js'
import type { CandidatePost } from '../scrapers/types.js'
import { DedupStore, type DedupState } from '../storage/dedup-store.js'
import { delay, type Sleep } from '../utils/delay.js'
import { logger } from '../utils/logger.js'
import { isNewPost } from './filter.js'

export interface RelayPipelineDeps {
  scanner: SourceScanner
  store: DedupStore
  relay: RelayChannel
  sleep?: Sleep
}

export interface RelayPipelineOptions {
  captionFooter: string
  relayDelayMs: number
  // Format and log only: nothing is sent, saved or waited on
  dryRun?: boolean
}

export interface RelayRunSummary {
  sources: number
  candidates: number
  relayed: number
  duplicates: number
  failed: number
  durationMs: number
}

export class RelayPipeline {
  private readonly sleep: Sleep

  constructor(
    private readonly deps: RelayPipelineDeps,
    private readonly options: RelayPipelineOptions
  ) {
    this.sleep = deps.sleep ?? delay
  }

  async run(sources: readonly string[]): Promise<RelayRunSummary> {
    const startTime = Date.now()
    const state = await this.deps.store.load()

    const summary: RelayRunSummary = {
      sources: sources.length,
      candidates: 0,
      relayed: 0,
      duplicates: 0,
      failed: 0,
      durationMs: 0,
    }

    logger.info({
      sources: sources.length,
      seenIds: state.seenIds.size,
      seenFingerprints: state.seenFingerprints.size,
      dryRun: this.options.dryRun ?? false,
    }, 'Starting relay run')

    for (const source of sources) {
      logger.info({ source }, 'Checking source')

      try {
        await this.processSource(source, state, summary)
      } catch (error) {
        logger.error({ err: error, source }, 'Error processing source')
      }
    }

    summary.durationMs = Date.now() - startTime
    logger.info(summary, 'Relay run completed')

    return summary
  }

  private async processSource(
    source: string,
    state: DedupState,
    summary: RelayRunSummary
  ): Promise<void> {
    const posts = await this.deps.scanner.scan(source)
    summary.candidates += posts.length

    for (const post of posts) {
      if (!isNewPost(post, state)) {
        summary.duplicates++
        logger.debug({ source, id: post.id }, 'Already relayed')
        continue
      }

      const message = formatMessage(post, this.options.captionFooter)

      if (this.options.dryRun) {
        logger.info({ source, id: post.id, mediaUrl: message.mediaUrl, caption: message.caption }, 'Dry run - would relay')
        this.remember(post, state)
        continue
      }

      if (!(await this.deps.relay.send(message))) {
        summary.failed++
        continue
      }

      await this.deps.store.save(post.id, post.fingerprint)
      this.remember(post, state)
      summary.relayed++
      logger.info({ source, id: post.id, channel: this.deps.relay.name }, 'Posted new content')

      await this.sleep(this.options.relayDelayMs)
    }
  }

  // Later posts in the same run are checked against what was just relayed
  private remember(post: CandidatePost, state: DedupState): void {
    state.seenIds.add(post.id)
    state.seenFingerprints.add(post.fingerprint)
  }
}

export function createRelayPipeline(
  config: RelayConfig,
  options: { dryRun?: boolean } = {}
): RelayPipeline {
  const fetcher = new TwitterProfileFetcher({ timeoutMs: config.scrapeTimeoutMs })

  return new RelayPipeline(
    {
      scanner: new SourceScanner(fetcher, { lookbackHours: config.lookbackHours }),
      store: new DedupStore({
        idsPath: config.postedIdsPath,
        fingerprintsPath: config.postedContentPath,
      }),
      relay: new TelegramRelay({
        botToken: config.botToken,
        channelId: config.channelId,
        timeoutMs: config.sendTimeoutMs,
      }),
    },
    {
      captionFooter: config.captionFooter,
      relayDelayMs: config.relayDelayMs,
      dryRun: options.dryRun,
    }
  )
}
