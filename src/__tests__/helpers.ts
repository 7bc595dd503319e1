import { mkdtempSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { createLogger } from '../core/logger.js'
import { initializeVault } from '../core/vault.js'

export const silentLogger = createLogger('silent')

export function createTempDir(prefix = 'vclerk-test-'): string {
  return mkdtempSync(join(tmpdir(), prefix))
}

/** A fully initialized vault in a fresh temp directory. */
export function createTempVault(): string {
  const root = join(createTempDir(), 'vault')
  initializeVault(root)
  return root
}
