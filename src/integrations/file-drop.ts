import { createHash } from 'node:crypto'
import { existsSync, mkdirSync, readdirSync, statSync } from 'node:fs'
import { join } from 'node:path'

import { writeDurable } from '../core/durable.js'
import type { ExecutionOutcome, Task } from '../core/types.js'
import type { Detection, Integration } from './integration.js'

export const FILE_DROP_TYPE = 'file_drop'

const TEMPORARY_SUFFIXES = ['.tmp', '.temp', '.swp', '.swo', '~']

function isIgnored(name: string): boolean {
  return (
    name.startsWith('.') ||
    name.startsWith('~') ||
    TEMPORARY_SUFFIXES.some((suffix) => name.endsWith(suffix))
  )
}

export function fileDropRef(name: string, size: number, mtimeMs: number): string {
  return createHash('sha256').update(`${name}:${size}:${mtimeMs}`).digest('hex')
}

function describe(task: Task): string {
  const fileName = typeof task.payload.fileName === 'string' ? task.payload.fileName : 'unknown file'
  const path = typeof task.payload.path === 'string' ? task.payload.path : ''
  const size = typeof task.payload.size === 'number' ? `${task.payload.size} bytes` : 'unknown size'

  return [
    `# Plan: ${fileName}`,
    '',
    '## Summary',
    `A file was dropped into the inbox and approved for processing (task \`${task.id}\`).`,
    '',
    '## Action Items',
    `- [ ] Review \`${fileName}\``,
    '- [ ] File it in the right place',
    '- [ ] Follow up on anything it asks for',
    '',
    '## Context',
    `- **Path**: \`${path}\``,
    `- **Size**: ${size}`,
    `- **Detected**: ${task.createdAt}`,
    '',
    '## Done Condition',
    'All action items are checked off.',
    '',
  ].join('\n')
}

export interface FileDropIntegrationOptions {
  name: string
  inbox: string
  plansDir: string
}

/** Turns files dropped into an inbox folder into triage tasks, and approved ones into plan notes. */
export class FileDropIntegration implements Integration {
  readonly name: string
  private readonly inbox: string
  private readonly plansDir: string

  constructor(options: FileDropIntegrationOptions) {
    this.name = options.name
    this.inbox = options.inbox
    this.plansDir = options.plansDir
  }

  async poll(): Promise<Detection[]> {
    if (!existsSync(this.inbox)) {
      mkdirSync(this.inbox, { recursive: true })
      return []
    }

    const detections: Detection[] = []
    for (const name of readdirSync(this.inbox).sort()) {
      if (isIgnored(name)) continue
      const path = join(this.inbox, name)
      const stats = statSync(path)
      if (!stats.isFile()) continue
      detections.push({
        sourceRef: fileDropRef(name, stats.size, stats.mtimeMs),
        type: FILE_DROP_TYPE,
        payload: {
          fileName: name,
          path,
          size: stats.size,
          modifiedAt: stats.mtime.toISOString(),
        },
        triage: true,
      })
    }
    return detections
  }

  async execute(task: Task): Promise<ExecutionOutcome> {
    mkdirSync(this.plansDir, { recursive: true })
    const planPath = join(this.plansDir, `${task.id}.md`)
    writeDurable(planPath, describe(task))
    return { details: { planPath } }
  }
}
