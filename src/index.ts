import { loadConfigFromEnv, validateConfig } from './config/index.js'
import { ensureConfigInteractive } from './config/interactive-setup.js'
import { createRelayPipeline } from './pipeline/relay.js'
import { logger } from './utils/logger.js'

async function main(): Promise<void> {
  await ensureConfigInteractive()

  const config = loadConfigFromEnv()

  try {
    validateConfig(config)
  } catch (error) {
    logger.error({ err: error }, 'Configuration validation failed')
    process.exit(1)
  }

  logger.info({
    lookback: `${config.lookbackHours} hours`,
    sources: config.sources.length,
  }, 'Anime news relay starting')

  const pipeline = createRelayPipeline(config)
  await pipeline.run(config.sources)
}

main().catch(error => {
  logger.error({ err: error }, 'Fatal error')
  process.exit(1)
})
