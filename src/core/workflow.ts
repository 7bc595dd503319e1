import type { NotificationChannel } from '../channels/channel.js'
import type { AuditEventName, AuditLog } from './audit-log.js'
import type { AppConfig } from './config.js'
import type { Dashboard } from './dashboard.js'
import {
  PermanentExecutionError,
  StateConflictError,
  TaskNotFoundError,
  TransientExecutionError,
  errorMessage,
  isErrnoException,
} from './errors.js'
import { logger as rootLogger, type Logger } from './logger.js'
import type { OperationQueue } from './operation-queue.js'
import { classify, type ClassificationResult, type PolicyRules } from './policy.js'
import { sanitizeObject, sanitizeText } from './sanitize.js'
import type { TaskStore } from './task-store.js'
import type {
  Decision,
  DecisionRecord,
  ExecutionOutcome,
  ExecutionRecord,
  FailureKind,
  JsonObject,
  JsonValue,
  QueuedOperation,
  Task,
  TaskAnnotations,
  TaskExecutor,
  TaskProposal,
  TaskState,
} from './types.js'

export const POLICY_ACTOR = 'policy'
export const EXECUTE_OPERATION = 'execute'

const TRANSIENT_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'ENETUNREACH',
  'EHOSTUNREACH',
])

export interface WorkflowDeps {
  store: TaskStore
  audit: AuditLog
  policy: PolicyRules
  executors: ReadonlyMap<string, TaskExecutor>
  queueFor: (source: string) => OperationQueue
  channel?: NotificationChannel
  dashboard?: Dashboard
  /** Without `retry` every execution is attempted once. */
  config: Pick<AppConfig, 'dryRun'> & Partial<Pick<AppConfig, 'retry'>>
  logger?: Logger
}

export interface ExecutionSummary {
  done: number
  failed: number
  skipped: number
}

export interface ReplayReport {
  replayed: number
  dropped: number
  remaining: number
  /** True when replay stopped at a head operation that is still failing transiently. */
  blocked: boolean
}

export function classifyFailure(err: unknown, depth = 0): FailureKind {
  if (err instanceof TransientExecutionError) return 'transient'
  if (err instanceof PermanentExecutionError) return 'permanent'
  if (!(err instanceof Error)) return 'permanent'
  if (err.name === 'AbortError' || err.name === 'TimeoutError') return 'transient'
  if (isErrnoException(err) && err.code !== undefined && TRANSIENT_ERROR_CODES.has(err.code)) {
    return 'transient'
  }
  if (err instanceof TypeError && err.message === 'fetch failed') return 'transient'
  if (err.cause !== undefined && depth < 5) return classifyFailure(err.cause, depth + 1)
  return 'permanent'
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

function compact(fields: Record<string, JsonValue | undefined>): JsonObject {
  const result: JsonObject = {}
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) result[key] = value
  }
  return result
}

function annotationDetails(annotations: TaskAnnotations): JsonObject {
  const { decision, result } = annotations
  return compact({
    decision: decision?.decision,
    actor: decision?.actor,
    reason: decision?.reason,
    status: result?.status,
    failure: result?.failure,
    error: result?.error,
    replayed: result?.replayed,
  })
}

/**
 * Drives tasks through the folder state machine: classification on submit, human or
 * policy decisions, execution through the originating integration, and ordered
 * replay of operations parked while an integration was unreachable.
 */
export class WorkflowEngine {
  private readonly store: TaskStore
  private readonly audit: AuditLog
  private readonly policy: PolicyRules
  private readonly executors: ReadonlyMap<string, TaskExecutor>
  private readonly queueFor: (source: string) => OperationQueue
  private readonly channel: NotificationChannel | undefined
  private readonly dashboard: Dashboard | undefined
  private readonly config: WorkflowDeps['config']
  private readonly log: Logger

  constructor(deps: WorkflowDeps) {
    this.store = deps.store
    this.audit = deps.audit
    this.policy = deps.policy
    this.executors = deps.executors
    this.queueFor = deps.queueFor
    this.channel = deps.channel
    this.dashboard = deps.dashboard
    this.config = deps.config
    this.log = (deps.logger ?? rootLogger).child({ component: 'workflow' })
  }

  classify(task: { type: string; payload: JsonObject }): ClassificationResult {
    return classify(task, this.policy)
  }

  async submit(proposal: TaskProposal): Promise<Task> {
    return this.propose(proposal, {})
  }

  /** Records a detection that needs triage before the approval policy applies. */
  intake(proposal: TaskProposal): Task {
    return this.createTask(proposal, 'needs_action', undefined, {})
  }

  async triage(id: string): Promise<Task> {
    const task = this.requireState(id, 'needs_action')
    const verdict = this.classify(task)
    if (verdict.classification === 'auto_approve') {
      return this.transition(id, 'needs_action', 'approved', {
        decision: this.decisionRecord('approve', POLICY_ACTOR, verdict.reason),
      })
    }
    const pending = this.transition(id, 'needs_action', 'pending_approval', {})
    await this.notify(pending)
    return pending
  }

  dismiss(id: string, actor: string, reason?: string): Task {
    this.requireState(id, 'needs_action')
    return this.transition(id, 'needs_action', 'rejected', {
      decision: this.decisionRecord('reject', actor, reason),
    })
  }

  decide(id: string, decision: Decision, actor: string, reason?: string): Task {
    this.requireState(id, 'pending_approval')
    const to: TaskState = decision === 'approve' ? 'approved' : 'rejected'
    return this.transition(id, 'pending_approval', to, {
      decision: this.decisionRecord(decision, actor, reason),
    })
  }

  async execute(id: string): Promise<Task> {
    const task = this.requireState(id, 'approved')

    if (this.config.dryRun) {
      this.log.info({ taskId: id, type: task.type }, 'Dry run: skipping execution')
      return this.transition(
        id,
        'approved',
        'done',
        { result: { status: 'dry_run', executedAt: new Date().toISOString() } },
        'task.executed',
      )
    }

    const executor = this.executors.get(task.source)
    if (executor === undefined) {
      const failed = this.fail(task, 'permanent', `No executor registered for source "${task.source}"`)
      await this.announceFailure(failed)
      return failed
    }

    let outcome: ExecutionOutcome
    try {
      outcome = await this.attempt(executor, task)
    } catch (err: unknown) {
      const kind = classifyFailure(err)
      const failed = this.fail(task, kind, errorMessage(err))
      // A transient failure the queue could not take needs a human, like a permanent one.
      if (kind !== 'transient' || !this.enqueueRetry(failed)) {
        await this.announceFailure(failed)
      }
      return failed
    }

    return this.transition(
      id,
      'approved',
      'done',
      { result: this.successRecord(outcome, false) },
      'task.executed',
    )
  }

  /** Executes every approved task, optionally only those from one source. */
  async executeApproved(source?: string): Promise<ExecutionSummary> {
    const summary: ExecutionSummary = { done: 0, failed: 0, skipped: 0 }
    for (const task of this.store.list('approved')) {
      if (source !== undefined && task.source !== source) continue
      try {
        const result = await this.execute(task.id)
        if (result.state === 'done') summary.done++
        else summary.failed++
      } catch (err: unknown) {
        if (!(err instanceof StateConflictError) && !(err instanceof TaskNotFoundError)) throw err
        this.log.warn({ taskId: task.id, err: err.message }, 'Task moved by another writer; skipping')
        summary.skipped++
      }
    }
    return summary
  }

  /**
   * Replays one integration's queue in order. Stops at the first transient failure
   * so later operations never overtake earlier ones; a successful replay moves the
   * original task from Failed to Done.
   */
  async replay(source: string): Promise<ReplayReport> {
    const queue = this.queueFor(source)
    const report: ReplayReport = { replayed: 0, dropped: 0, remaining: 0, blocked: false }

    if (this.config.dryRun) {
      report.remaining = queue.size()
      return report
    }

    for (let op = queue.peek(); op !== null; op = queue.peek()) {
      const taskId = typeof op.payload.taskId === 'string' ? op.payload.taskId : null
      const task = taskId !== null ? this.store.read(taskId) : null
      const executor = task !== null ? this.executors.get(task.source) : undefined

      if (op.operationType !== EXECUTE_OPERATION || task === null || task.state !== 'failed') {
        if (!this.drop(queue, taskId, 'task is no longer waiting for a retry')) break
        report.dropped++
        continue
      }
      if (executor === undefined) {
        if (!this.drop(queue, taskId, `no executor registered for source "${task.source}"`)) break
        report.dropped++
        continue
      }

      let outcome: ExecutionOutcome
      try {
        outcome = await executor.execute(task)
      } catch (err: unknown) {
        if (classifyFailure(err) === 'transient') {
          this.log.warn({ source, taskId: task.id, err: errorMessage(err) }, 'Integration still unavailable')
          report.blocked = true
          break
        }
        if (!this.drop(queue, task.id, `permanent failure on replay: ${errorMessage(err)}`)) break
        report.dropped++
        continue
      }

      // Transition before dequeue: a crash in between leaves an operation that the
      // next replay drops, never a succeeded task stuck in Failed.
      this.transition(
        task.id,
        'failed',
        'done',
        { result: this.successRecord(outcome, true) },
        'queue.replayed',
      )
      if (queue.dequeue() === null) {
        report.blocked = true
        break
      }
      report.replayed++
    }

    report.remaining = queue.size()
    return report
  }

  /** Re-creates a failed task as a new proposal, unless a retry for it is still queued. */
  async resubmit(id: string, actor: string): Promise<Task> {
    const task = this.requireState(id, 'failed')
    if (task.result?.failure === 'transient' && this.hasQueuedRetry(task)) {
      throw new Error(`Task ${id} failed transiently and is queued for retry; it cannot be resubmitted`)
    }
    return this.propose(
      {
        source: task.source,
        type: task.type,
        payload: task.payload,
        sourceRef: task.sourceRef,
        resubmittedFrom: id,
      },
      { resubmittedBy: sanitizeText(actor) },
    )
  }

  private async propose(proposal: TaskProposal, details: JsonObject): Promise<Task> {
    const verdict = this.classify(proposal)
    const audit: JsonObject = {
      ...details,
      classification: verdict.classification,
      reason: verdict.reason,
    }
    if (verdict.classification === 'auto_approve') {
      const decision = this.decisionRecord('approve', POLICY_ACTOR, verdict.reason)
      return this.createTask(proposal, 'approved', decision, audit)
    }
    const task = this.createTask(proposal, 'pending_approval', undefined, audit)
    await this.notify(task)
    return task
  }

  private createTask(
    proposal: TaskProposal,
    state: TaskState,
    decision: DecisionRecord | undefined,
    details: JsonObject,
  ): Task {
    const id = this.store.create({ ...proposal, decision }, state)
    const task = this.requireTask(id)
    this.audit.record({
      event: 'task.created',
      taskId: id,
      source: task.source,
      details: { ...details, state, type: task.type, payload: task.payload },
    })
    this.log.info({ taskId: id, source: task.source, type: task.type, state }, 'Task created')
    this.dashboard?.record({ taskId: id, type: task.type, state })
    return task
  }

  private transition(
    id: string,
    from: TaskState,
    to: TaskState,
    annotations: TaskAnnotations,
    event: AuditEventName = 'task.transitioned',
  ): Task {
    const task = this.store.move(id, from, to, annotations)
    this.audit.record({
      event,
      taskId: id,
      source: task.source,
      details: { from, to, ...annotationDetails(annotations) },
    })
    this.log.info({ taskId: id, from, to }, 'Task transitioned')
    this.dashboard?.record({
      taskId: id,
      type: task.type,
      state: to,
      note: annotations.result?.error ?? annotations.decision?.reason,
    })
    return task
  }

  private fail(task: Task, kind: FailureKind, message: string): Task {
    this.log.warn({ taskId: task.id, source: task.source, failure: kind, err: message }, 'Execution failed')
    const result: ExecutionRecord = {
      status: 'failed',
      executedAt: new Date().toISOString(),
      failure: kind,
      error: sanitizeText(message),
    }
    return this.transition(task.id, 'approved', 'failed', { result }, 'task.failed')
  }

  /** Runs the executor, retrying transient failures in place with the configured backoff. */
  private async attempt(executor: TaskExecutor, task: Task): Promise<ExecutionOutcome> {
    const retry = this.config.retry
    const maxAttempts = retry?.maxAttempts ?? 1
    for (let attempt = 1; ; attempt++) {
      try {
        return await executor.execute(task)
      } catch (err: unknown) {
        if (retry === undefined || attempt >= maxAttempts || classifyFailure(err) !== 'transient') {
          throw err
        }
        const delayMs = retry.backoffMs[Math.min(attempt - 1, retry.backoffMs.length - 1)]
        this.log.warn(
          { taskId: task.id, attempt, maxAttempts, delayMs, err: errorMessage(err) },
          'Transient failure; retrying',
        )
        await sleep(delayMs)
      }
    }
  }

  private enqueueRetry(task: Task): boolean {
    let queued = false
    try {
      queued = this.queueFor(task.source).enqueue({
        operationType: EXECUTE_OPERATION,
        payload: { taskId: task.id, type: task.type, payload: task.payload },
      })
    } catch (err: unknown) {
      this.log.error({ taskId: task.id, source: task.source, err: errorMessage(err) }, 'No queue for source')
    }
    this.audit.record({
      event: queued ? 'queue.enqueued' : 'queue.enqueue_failed',
      taskId: task.id,
      source: task.source,
      details: { operationType: EXECUTE_OPERATION },
    })
    return queued
  }

  private hasQueuedRetry(task: Task): boolean {
    let entries: QueuedOperation[] | null
    try {
      entries = this.queueFor(task.source).entries()
    } catch (err: unknown) {
      this.log.warn({ taskId: task.id, source: task.source, err: errorMessage(err) }, 'No queue for source')
      return false
    }
    if (entries === null) {
      throw new Error(`Cannot read the retry queue for "${task.source}"; try again later`)
    }
    return entries.some((op) => op.operationType === EXECUTE_OPERATION && op.payload.taskId === task.id)
  }

  private drop(queue: OperationQueue, taskId: string | null, reason: string): boolean {
    const removed = queue.dequeue()
    if (removed === null) return false
    this.log.warn({ source: queue.integration, taskId, reason }, 'Dropped queued operation')
    this.audit.record({
      event: 'queue.dropped',
      taskId: taskId ?? undefined,
      source: queue.integration,
      details: { operationType: removed.operationType, reason },
    })
    return true
  }

  private async notify(task: Task): Promise<void> {
    if (this.channel === undefined) return
    try {
      await this.channel.notifyPendingApproval(task)
    } catch (err: unknown) {
      this.log.warn({ taskId: task.id, err: errorMessage(err) }, 'Approval notification failed')
    }
  }

  private async announceFailure(task: Task): Promise<void> {
    if (this.channel === undefined) return
    const reason = task.result?.error ?? 'unknown error'
    try {
      await this.channel.sendNotification(
        `Task ${task.id} (${task.type} from ${task.source}) failed: ${reason}. Resubmit with: vclerk tasks resubmit ${task.id} --actor <name>`,
      )
    } catch (err: unknown) {
      this.log.warn({ taskId: task.id, err: errorMessage(err) }, 'Failure notification failed')
    }
  }

  private decisionRecord(decision: Decision, actor: string, reason?: string): DecisionRecord {
    if (actor.trim() === '') {
      throw new Error('actor is required and must not be empty')
    }
    return {
      decision,
      actor: sanitizeText(actor),
      decidedAt: new Date().toISOString(),
      reason: reason !== undefined ? sanitizeText(reason) : undefined,
    }
  }

  private successRecord(outcome: ExecutionOutcome, replayed: boolean): ExecutionRecord {
    return {
      status: 'success',
      executedAt: new Date().toISOString(),
      details: outcome.details !== undefined ? sanitizeObject(outcome.details) : undefined,
      replayed: replayed ? true : undefined,
    }
  }

  private requireTask(id: string): Task {
    const task = this.store.read(id)
    if (task === null) {
      throw new TaskNotFoundError(id)
    }
    return task
  }

  private requireState(id: string, state: TaskState): Task {
    const task = this.requireTask(id)
    if (task.state !== state) {
      throw new StateConflictError(id, state, task.state)
    }
    return task
  }
}
