import { existsSync, readFileSync, readdirSync, renameSync, rmSync, statSync } from 'node:fs'
import { join } from 'node:path'
import { v4 as uuidv4 } from 'uuid'

import { writeDurable } from './durable.js'
import {
  InvalidStateError,
  InvalidTransitionError,
  StateConflictError,
  isErrnoException,
} from './errors.js'
import {
  STATE_FOLDERS,
  TASK_STATES,
  TRANSITIONS,
  type Task,
  type TaskAnnotations,
  type TaskDraft,
  type TaskRecord,
  type TaskState,
} from './types.js'

const TASK_FILE = /^([0-9a-f-]{36})\.json$/i
const STAGED_FILE = /^\.([0-9a-f-]{36})\.[0-9a-f-]{36}\.staged$/i

// Furthest-along state first, so a reader never resolves to a stale location.
const LOOKUP_ORDER: readonly TaskState[] = [
  'done',
  'failed',
  'rejected',
  'approved',
  'pending_approval',
  'needs_action',
]

export interface RecoveryReport {
  promoted: string[]
  discarded: string[]
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isTaskRecord(value: unknown): value is TaskRecord {
  return (
    isRecord(value) &&
    typeof value.id === 'string' &&
    typeof value.source === 'string' &&
    typeof value.type === 'string' &&
    typeof value.createdAt === 'string' &&
    isRecord(value.payload) &&
    Array.isArray(value.history)
  )
}

function serialize(record: TaskRecord): string {
  return JSON.stringify(record, null, 2) + '\n'
}

/** Sorts entry names by modification time, oldest first, dropping entries that vanished. */
function byModifiedTime(dir: string, names: string[]): string[] {
  const stamped: { name: string; mtimeMs: number }[] = []
  for (const name of names) {
    try {
      stamped.push({ name, mtimeMs: statSync(join(dir, name)).mtimeMs })
    } catch (err: unknown) {
      if (isErrnoException(err) && err.code === 'ENOENT') continue
      throw err
    }
  }
  return stamped
    .sort((a, b) => a.mtimeMs - b.mtimeMs || a.name.localeCompare(b.name))
    .map((s) => s.name)
}

/**
 * Persists tasks as `<id>.json` files inside one folder per state. The folder that
 * holds the file is the task's state; nothing in the file can disagree with it.
 */
export class TaskStore {
  private readonly root: string

  constructor(vaultRoot: string) {
    this.root = vaultRoot
  }

  folderPath(state: TaskState): string {
    return join(this.root, STATE_FOLDERS[state])
  }

  private taskPath(state: TaskState, id: string): string {
    return join(this.folderPath(state), `${id}.json`)
  }

  private stagedPath(dir: string, id: string): string {
    return join(dir, `.${id}.${uuidv4()}.staged`)
  }

  private requireFolder(state: TaskState): string {
    const dir = this.folderPath(state)
    if (!existsSync(dir)) {
      throw new InvalidStateError(`State folder missing: ${STATE_FOLDERS[state]} (in ${this.root})`)
    }
    return dir
  }

  private readRecord(filePath: string): TaskRecord | null {
    let data: string
    try {
      data = readFileSync(filePath, 'utf-8')
    } catch (err: unknown) {
      if (isErrnoException(err) && err.code === 'ENOENT') return null
      throw err
    }
    let parsed: unknown
    try {
      parsed = JSON.parse(data)
    } catch {
      throw new Error(`Failed to parse task file at ${filePath}. File may be corrupted.`)
    }
    if (!isTaskRecord(parsed)) {
      throw new Error(`Task file at ${filePath} is missing required fields`)
    }
    return parsed
  }

  private taskNames(dir: string): string[] {
    return readdirSync(dir).filter((name) => TASK_FILE.test(name))
  }

  create(draft: TaskDraft, state: TaskState): string {
    const dir = this.requireFolder(state)
    const now = new Date().toISOString()
    const record: TaskRecord = {
      id: uuidv4(),
      source: draft.source,
      type: draft.type,
      payload: draft.payload,
      sourceRef: draft.sourceRef,
      createdAt: now,
      decision: draft.decision,
      resubmittedFrom: draft.resubmittedFrom,
      history: [{ from: null, to: state, at: now }],
    }
    const staged = this.stagedPath(dir, record.id)
    writeDurable(staged, serialize(record))
    renameSync(staged, join(dir, `${record.id}.json`))
    return record.id
  }

  /**
   * Relocates a task and appends annotations. The rename of the task file into the
   * destination folder is the commit point; the annotated copy is staged beside it
   * beforehand and swapped in afterwards, so a crash at any step leaves the task in
   * exactly one folder. `recover()` finishes or discards interrupted moves.
   */
  move(id: string, from: TaskState, to: TaskState, annotations: TaskAnnotations = {}): Task {
    if (!TRANSITIONS[from].includes(to)) {
      throw new InvalidTransitionError(from, to)
    }
    const fromDir = this.requireFolder(from)
    const toDir = this.requireFolder(to)
    const source = join(fromDir, `${id}.json`)
    const target = join(toDir, `${id}.json`)

    const record = this.readRecord(source)
    if (record === null) {
      throw new StateConflictError(id, from, this.locate(id))
    }

    const updated: TaskRecord = {
      ...record,
      decision: annotations.decision ?? record.decision,
      result: annotations.result ?? record.result,
      history: [...record.history, { from, to, at: new Date().toISOString() }],
    }

    const staged = this.stagedPath(toDir, id)
    writeDurable(staged, serialize(updated))
    try {
      renameSync(source, target)
    } catch (err: unknown) {
      rmSync(staged, { force: true })
      if (isErrnoException(err) && err.code === 'ENOENT') {
        throw new StateConflictError(id, from, this.locate(id))
      }
      throw err
    }
    renameSync(staged, target)

    return { ...updated, state: to }
  }

  locate(id: string): TaskState | null {
    for (const state of LOOKUP_ORDER) {
      if (existsSync(this.taskPath(state, id))) return state
    }
    return null
  }

  read(id: string): Task | null {
    for (const state of LOOKUP_ORDER) {
      const record = this.readRecord(this.taskPath(state, id))
      if (record !== null) return { ...record, state }
    }
    return null
  }

  /** Lazily yields the tasks in one state, in the order they entered it. */
  list(state: TaskState): IterableIterator<Task> {
    const dir = this.requireFolder(state)
    const names = byModifiedTime(dir, this.taskNames(dir))
    return this.iterate(state, dir, names)
  }

  private *iterate(state: TaskState, dir: string, names: string[]): IterableIterator<Task> {
    for (const name of names) {
      // Moved away by another writer since the listing was taken.
      const record = this.readRecord(join(dir, name))
      if (record !== null) yield { ...record, state }
    }
  }

  count(state: TaskState): number {
    return this.taskNames(this.requireFolder(state)).length
  }

  /**
   * Completes moves that passed their commit point and discards staged files whose
   * move or create never committed. Run only while no other writer is active.
   */
  recover(): RecoveryReport {
    const report: RecoveryReport = { promoted: [], discarded: [] }
    for (const state of TASK_STATES) {
      const dir = this.folderPath(state)
      if (!existsSync(dir)) continue

      const staged = byModifiedTime(
        dir,
        readdirSync(dir).filter((name) => STAGED_FILE.test(name)),
      )
      for (const name of staged) {
        const match = STAGED_FILE.exec(name)
        if (match === null) continue
        const id = match[1]
        const stagedPath = join(dir, name)
        const target = join(dir, `${id}.json`)
        if (existsSync(target)) {
          renameSync(stagedPath, target)
          report.promoted.push(id)
        } else {
          rmSync(stagedPath, { force: true })
          report.discarded.push(id)
        }
      }
    }
    return report
  }
}
