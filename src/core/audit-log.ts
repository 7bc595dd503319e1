import { existsSync, mkdirSync, readFileSync } from 'node:fs'
import { join } from 'node:path'

import { writeDurable } from './durable.js'
import { errorMessage } from './errors.js'
import { logger as rootLogger, type Logger } from './logger.js'
import { sanitizeObject, sanitizeText } from './sanitize.js'
import type { JsonObject } from './types.js'

export type AuditEventName =
  | 'task.created'
  | 'task.transitioned'
  | 'task.executed'
  | 'task.failed'
  | 'queue.enqueued'
  | 'queue.enqueue_failed'
  | 'queue.replayed'
  | 'queue.dropped'

export interface AuditEvent {
  event: AuditEventName
  taskId?: string
  source?: string
  details?: JsonObject
}

export interface AuditEntry extends AuditEvent {
  timestamp: string
  details: JsonObject
}

function dayOf(date: Date): string {
  return date.toISOString().slice(0, 10)
}

/**
 * Append-only audit trail, one file per UTC day under `Logs/`. Every entry is
 * sanitized before it is written. A failed write is logged; it never undoes the
 * transition it describes.
 */
export class AuditLog {
  private readonly logsDir: string
  private readonly log: Logger

  constructor(logsDir: string, logger: Logger = rootLogger) {
    this.logsDir = logsDir
    this.log = logger.child({ component: 'audit' })
  }

  fileFor(date: Date): string {
    return join(this.logsDir, `${dayOf(date)}.jsonl`)
  }

  record(event: AuditEvent): void {
    const now = new Date()
    const entry: AuditEntry = {
      timestamp: now.toISOString(),
      event: event.event,
      taskId: event.taskId,
      source: event.source !== undefined ? sanitizeText(event.source) : undefined,
      details: sanitizeObject(event.details ?? {}),
    }
    try {
      mkdirSync(this.logsDir, { recursive: true })
      writeDurable(this.fileFor(now), JSON.stringify(entry) + '\n', 'a')
    } catch (err: unknown) {
      this.log.error({ event: event.event, taskId: event.taskId, err: errorMessage(err) }, 'Failed to write audit entry')
    }
  }

  entries(date: Date = new Date()): AuditEntry[] {
    const file = this.fileFor(date)
    if (!existsSync(file)) return []
    return readFileSync(file, 'utf-8')
      .split('\n')
      .filter((line) => line.trim() !== '')
      .map((line) => JSON.parse(line) as AuditEntry)
  }
}
