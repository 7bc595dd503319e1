import { existsSync, mkdirSync, readFileSync, rmSync } from 'node:fs'
import { dirname, join } from 'node:path'

import { replaceDurable, writeDurable } from './durable.js'
import { errorMessage } from './errors.js'
import { logger as rootLogger, type Logger } from './logger.js'
import type { OperationInput, QueuedOperation } from './types.js'

const INTEGRATION_NAME = /^[a-z0-9]([a-z0-9-]*[a-z0-9])?$/

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isQueuedOperation(value: unknown): value is QueuedOperation {
  return (
    isRecord(value) &&
    typeof value.operationType === 'string' &&
    typeof value.queuedAt === 'string' &&
    isRecord(value.payload)
  )
}

export function queuePath(queueDir: string, integration: string): string {
  return join(queueDir, `${integration}.jsonl`)
}

/**
 * Durable FIFO of operations awaiting resubmission to one integration, stored as
 * newline-delimited JSON. Assumes a single consumer process per queue file.
 *
 * I/O failures never escape: they are logged and reported as `null` / `false`.
 */
export class OperationQueue {
  readonly integration: string
  private readonly filePath: string
  private readonly log: Logger

  constructor(queueDir: string, integration: string, logger: Logger = rootLogger) {
    if (!INTEGRATION_NAME.test(integration)) {
      throw new Error(
        `Invalid integration name "${integration}". Must be a lowercase slug (a-z, 0-9, hyphens).`,
      )
    }
    this.integration = integration
    this.filePath = queuePath(queueDir, integration)
    this.log = logger.child({ component: 'queue', integration })
  }

  get path(): string {
    return this.filePath
  }

  private load(): QueuedOperation[] {
    if (!existsSync(this.filePath)) return []
    const operations: QueuedOperation[] = []
    const lines = readFileSync(this.filePath, 'utf-8').split('\n')
    lines.forEach((line, index) => {
      if (line.trim() === '') return
      let parsed: unknown
      try {
        parsed = JSON.parse(line)
      } catch {
        parsed = undefined
      }
      if (isQueuedOperation(parsed)) {
        operations.push(parsed)
      } else {
        this.log.error({ line: index + 1 }, 'Skipping malformed queue entry')
      }
    })
    return operations
  }

  enqueue(operation: OperationInput): boolean {
    const entry: QueuedOperation = {
      operationType: operation.operationType,
      payload: operation.payload,
      queuedAt: new Date().toISOString(),
    }
    try {
      mkdirSync(dirname(this.filePath), { recursive: true })
      writeDurable(this.filePath, JSON.stringify(entry) + '\n', 'a')
      this.log.info({ operationType: entry.operationType }, 'Operation queued')
      return true
    } catch (err: unknown) {
      this.log.error({ err: errorMessage(err) }, 'Failed to enqueue operation')
      return false
    }
  }

  /** Removes and returns the oldest operation; rewrites the remainder of the file. */
  dequeue(): QueuedOperation | null {
    try {
      const operations = this.load()
      if (operations.length === 0) return null
      const [head, ...rest] = operations
      replaceDurable(this.filePath, rest.map((op) => JSON.stringify(op) + '\n').join(''))
      return head
    } catch (err: unknown) {
      this.log.error({ err: errorMessage(err) }, 'Failed to dequeue operation')
      return null
    }
  }

  peek(): QueuedOperation | null {
    try {
      const operations = this.load()
      return operations.length > 0 ? operations[0] : null
    } catch (err: unknown) {
      this.log.error({ err: errorMessage(err) }, 'Failed to read queue')
      return null
    }
  }

  /** Every queued operation in order, or `null` when the queue file cannot be read. */
  entries(): QueuedOperation[] | null {
    try {
      return this.load()
    } catch (err: unknown) {
      this.log.error({ err: errorMessage(err) }, 'Failed to read queue')
      return null
    }
  }

  size(): number {
    try {
      return this.load().length
    } catch (err: unknown) {
      this.log.error({ err: errorMessage(err) }, 'Failed to read queue')
      return 0
    }
  }

  clear(): boolean {
    try {
      rmSync(this.filePath, { force: true })
      this.log.info('Queue cleared')
      return true
    } catch (err: unknown) {
      this.log.error({ err: errorMessage(err) }, 'Failed to clear queue')
      return false
    }
  }
}
