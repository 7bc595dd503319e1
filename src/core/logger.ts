import { pino, type DestinationStream, type Logger, type LoggerOptions } from 'pino'

import { sanitizeObject } from './sanitize.js'

export type { Logger }

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value)
}

function levelFromEnv(fallback: LogLevel): LogLevel {
  const fromEnv = process.env.VAULT_CLERK_LOG_LEVEL
  return isLogLevel(fromEnv) ? fromEnv : fallback
}

/** Logs to stdout unless a destination is given; the CLI sends its logs to stderr. */
export function createLogger(level: LogLevel = 'info', destination?: DestinationStream): Logger {
  const options: LoggerOptions = {
    name: 'vault-clerk',
    level: levelFromEnv(level),
    formatters: {
      // Every structured field is scrubbed before it reaches a transport.
      log: (object) => sanitizeObject(object),
    },
  }
  return destination !== undefined ? pino(options, destination) : pino(options)
}

export const logger = createLogger()
