/**
 * Interactive setup to create/update .env with the Telegram credentials.
 *
 * Usage:
 *   npm run setup
 */

import { ensureConfigInteractive } from '../src/config/interactive-setup.js'
import { loadConfigFromEnv, validateConfig } from '../src/config/index.js'

async function main(): Promise<void> {
  await ensureConfigInteractive({ force: true })
  validateConfig(loadConfigFromEnv())
  console.log('Setup complete.')
}

main().catch(error => {
  console.error('Setup failed:', error)
  process.exit(1)
})
