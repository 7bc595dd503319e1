import { existsSync, mkdirSync, readFileSync } from 'node:fs'
import { dirname } from 'node:path'

import { replaceDurable } from './durable.js'
import { errorMessage } from './errors.js'
import { logger as rootLogger, type Logger } from './logger.js'

interface DedupeFile {
  processed: string[]
}

function isDedupeFile(value: unknown): value is DedupeFile {
  return (
    typeof value === 'object' &&
    value !== null &&
    'processed' in value &&
    Array.isArray(value.processed) &&
    value.processed.every((entry) => typeof entry === 'string')
  )
}

/**
 * Remembers which source references a watcher has already turned into tasks.
 * Kept outside the vault; an unreadable state file starts the tracker empty.
 */
export class DedupeTracker {
  readonly stateFile: string
  private readonly processed: Set<string>
  private readonly log: Logger

  constructor(stateFile: string, logger: Logger = rootLogger) {
    this.stateFile = stateFile
    this.log = logger.child({ component: 'dedupe' })
    this.processed = new Set(this.load())
  }

  private load(): string[] {
    if (!existsSync(this.stateFile)) return []
    try {
      const data: unknown = JSON.parse(readFileSync(this.stateFile, 'utf-8'))
      if (isDedupeFile(data)) return data.processed
      this.log.warn({ file: this.stateFile }, 'Unrecognized dedupe state; starting empty')
    } catch (err: unknown) {
      this.log.warn({ file: this.stateFile, err: errorMessage(err) }, 'Could not load dedupe state; starting empty')
    }
    return []
  }

  private save(): void {
    const data: DedupeFile = { processed: [...this.processed].sort() }
    mkdirSync(dirname(this.stateFile), { recursive: true })
    replaceDurable(this.stateFile, JSON.stringify(data, null, 2) + '\n')
  }

  isProcessed(sourceRef: string): boolean {
    return this.processed.has(sourceRef)
  }

  markProcessed(sourceRef: string): void {
    if (this.processed.has(sourceRef)) return
    this.processed.add(sourceRef)
    this.save()
  }

  clear(): void {
    this.processed.clear()
    this.save()
  }

  count(): number {
    return this.processed.size
  }
}
