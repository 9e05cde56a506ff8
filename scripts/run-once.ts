/**
 * Run a single relay pass, optionally without sending anything.
 *
 * Usage:
 *   npm run run:once -- --dry-run
 *   npm run run:once -- --source @AniTrendz --source @myanimelist
 */

import { Command } from 'commander'
import { loadConfigFromEnv, validateConfig } from '../src/config/index.js'
import { createRelayPipeline } from '../src/pipeline/relay.js'
import { logger } from '../src/utils/logger.js'

type RunOnceOptions = {
  dryRun: boolean
  source: string[]
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value]
}

async function main(): Promise<void> {
  const program = new Command()
    .name('run-once')
    .description('Scan the configured sources once and relay new posts')
    .option('--dry-run', 'format and log new posts without sending or saving them', false)
    .option('-s, --source <handle>', 'only scan this source (repeatable)', collect, [])
    .parse(process.argv)

  const options = program.opts<RunOnceOptions>()
  const config = loadConfigFromEnv()

  if (!options.dryRun) {
    try {
      validateConfig(config)
    } catch (error) {
      logger.error({ err: error }, 'Configuration validation failed')
      process.exit(1)
    }
  }

  const sources = options.source.length > 0 ? options.source : config.sources
  logger.info({ sources, dryRun: options.dryRun }, 'Running single relay pass')

  const summary = await createRelayPipeline(config, { dryRun: options.dryRun }).run(sources)
  console.log(`\nRelayed ${summary.relayed}, skipped ${summary.duplicates} duplicates, ${summary.failed} failed (${summary.candidates} candidates)`)
}

main().catch(error => {
  logger.error({ err: error }, 'Fatal error')
  process.exit(1)
})
