import { existsSync, readFileSync } from 'node:fs'
import { join } from 'node:path'

import { replaceDurable } from './durable.js'
import { errorMessage } from './errors.js'
import { logger as rootLogger, type Logger } from './logger.js'
import { sanitizeText } from './sanitize.js'
import type { TaskStore } from './task-store.js'
import { STATE_FOLDERS, TASK_STATES, type TaskState } from './types.js'
import { DASHBOARD_DOCUMENT } from './vault.js'

export const RECENT_ACTIVITY_LIMIT = 10
const NOTE_LIMIT = 100

type Block = 'counts' | 'activity'

const BLOCK_HEADINGS: Record<Block, string> = {
  counts: 'Task Counts',
  activity: 'Recent Activity',
}

export interface DashboardActivity {
  taskId: string
  type: string
  state: TaskState
  note?: string
}

function openMarker(block: Block): string {
  return `<!-- vclerk:${block} -->`
}

function closeMarker(block: Block): string {
  return `<!-- /vclerk:${block} -->`
}

function findBlock(content: string, block: Block): { start: number; end: number } | null {
  const open = content.indexOf(openMarker(block))
  if (open === -1) return null
  const start = open + openMarker(block).length
  const end = content.indexOf(closeMarker(block), start)
  return end === -1 ? null : { start, end }
}

function readBlock(content: string, block: Block): string | null {
  const found = findBlock(content, block)
  return found !== null ? content.slice(found.start, found.end).trim() : null
}

/** Replaces the text between a block's markers, appending the section when it is absent. */
function writeBlock(content: string, block: Block, body: string): string {
  const found = findBlock(content, block)
  if (found === null) {
    return `${content.trimEnd()}\n\n## ${BLOCK_HEADINGS[block]}\n\n${openMarker(block)}\n${body}\n${closeMarker(block)}\n`
  }
  return `${content.slice(0, found.start)}\n${body}\n${content.slice(found.end)}`
}

function activityLine(activity: DashboardActivity, at: string): string {
  const line = `- ${at} \`${activity.taskId}\` ${activity.type} -> ${STATE_FOLDERS[activity.state]}`
  if (activity.note === undefined || activity.note.trim() === '') return line
  const note = sanitizeText(activity.note).replace(/\s+/g, ' ').trim()
  return `${line}: ${note.length > NOTE_LIMIT ? note.slice(0, NOTE_LIMIT) + '...' : note}`
}

/**
 * Keeps the marked sections of `Dashboard.md` current: a task count per state folder
 * and the most recent transitions. Text outside the markers is left untouched.
 */
export class Dashboard {
  private readonly path: string
  private readonly store: Pick<TaskStore, 'count'>
  private readonly log: Logger

  constructor(vaultRoot: string, store: Pick<TaskStore, 'count'>, logger: Logger = rootLogger) {
    this.path = join(vaultRoot, DASHBOARD_DOCUMENT)
    this.store = store
    this.log = logger.child({ component: 'dashboard' })
  }

  /** Never throws: a dashboard that cannot be written must not fail the transition. */
  record(activity: DashboardActivity): void {
    try {
      const now = new Date().toISOString()
      const existing = existsSync(this.path) ? readFileSync(this.path, 'utf-8') : '# Dashboard\n'

      const previous = (readBlock(existing, 'activity') ?? '')
        .split('\n')
        .filter((line) => line.startsWith('- '))
      const recent = [activityLine(activity, now), ...previous].slice(0, RECENT_ACTIVITY_LIMIT)

      let content = writeBlock(existing, 'counts', this.countsTable(now))
      content = writeBlock(content, 'activity', recent.join('\n'))
      replaceDurable(this.path, content)
    } catch (err: unknown) {
      this.log.warn({ taskId: activity.taskId, err: errorMessage(err) }, 'Failed to update dashboard')
    }
  }

  private countsTable(now: string): string {
    const rows = TASK_STATES.map((state) => `| ${STATE_FOLDERS[state]} | ${this.store.count(state)} |`)
    return [`Last updated: ${now}`, '', '| Folder | Tasks |', '|---|---|', ...rows].join('\n')
  }
}
