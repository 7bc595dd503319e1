import { destination } from 'pino'

import { loadConfig, type AppConfig } from '../core/config.js'
import { errorMessage } from '../core/errors.js'
import { createLogger, type Logger } from '../core/logger.js'
import { createRuntime, type Runtime } from '../core/service.js'
import { validateOrExit } from '../core/vault.js'

/** Logs go to stderr so command output on stdout stays machine-readable. */
export function cliLogger(config: Pick<AppConfig, 'logLevel'>): Logger {
  return createLogger(config.logLevel, destination(2))
}

export interface OpenRuntimeOptions {
  /** Resolve moves a crash left half done before handing the runtime out. Defaults to true. */
  recover?: boolean
}

/**
 * Loads config, refuses to continue on a broken vault, wires the runtime and
 * finishes any task move a previous process died in the middle of.
 */
export function openRuntime(
  config: AppConfig = loadConfig(),
  { recover = true }: OpenRuntimeOptions = {},
): Runtime {
  const logger = cliLogger(config)
  validateOrExit(config.vault.path, { logger })
  const runtime = createRuntime(config, { logger })
  if (recover) {
    const report = runtime.store.recover()
    if (report.promoted.length > 0 || report.discarded.length > 0) {
      logger.warn(report, 'Resolved task moves interrupted by a crash')
    }
  }
  return runtime
}

export function reportError(err: unknown): void {
  console.error(`Error: ${errorMessage(err)}`)
  process.exitCode = 1
}
