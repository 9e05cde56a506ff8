import { existsSync } from 'fs'
import { mkdir, readFile, rename, writeFile } from 'fs/promises'
import path from 'path'
import { logger } from '../utils/logger.js'

export interface DedupState {
  seenIds: Set<string>
  seenFingerprints: Set<string>
}

export interface DedupStorePaths {
  idsPath: string
  fingerprintsPath: string
}

export function emptyDedupState(): DedupState {
  return { seenIds: new Set(), seenFingerprints: new Set() }
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(entry => typeof entry === 'string')
}

async function readStringSet(filePath: string): Promise<Set<string>> {
  if (!existsSync(filePath)) {
    return new Set()
  }

  const parsed: unknown = JSON.parse(await readFile(filePath, 'utf8'))
  if (!isStringArray(parsed)) {
    throw new Error(`Expected a JSON array of strings in ${filePath}`)
  }

  return new Set(parsed)
}

// Written beside the target, then renamed over it
async function writeStringSet(filePath: string, values: Set<string>): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true })
  const tempPath = `${filePath}.${process.pid}.tmp`
  await writeFile(tempPath, JSON.stringify(Array.from(values)))
  await rename(tempPath, filePath)
}

/**
 * Flat-file record of relayed post IDs and content fingerprints.
 *
 * Both operations swallow and log their errors. `save` is a read-modify-write
 * with no lock, so the store must only be used by one process at a time.
 */
export class DedupStore {
  constructor(private readonly paths: DedupStorePaths) {}

  async load(): Promise<DedupState> {
    try {
      return {
        seenIds: await readStringSet(this.paths.idsPath),
        seenFingerprints: await readStringSet(this.paths.fingerprintsPath),
      }
    } catch (error) {
      logger.error({ err: error, ...this.paths }, 'Error loading posted data')
      return emptyDedupState()
    }
  }

  async save(id: string, fingerprint: string): Promise<void> {
    try {
      const state = await this.load()
      state.seenIds.add(id)
      state.seenFingerprints.add(fingerprint)

      await writeStringSet(this.paths.idsPath, state.seenIds)
      await writeStringSet(this.paths.fingerprintsPath, state.seenFingerprints)
    } catch (error) {
      logger.error({ err: error, id, fingerprint }, 'Error saving posted data')
    }
  }
}
