export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject

export interface JsonObject {
  [key: string]: JsonValue
}

export const TASK_STATES = [
  'needs_action',
  'pending_approval',
  'approved',
  'rejected',
  'done',
  'failed',
] as const

export type TaskState = (typeof TASK_STATES)[number]

export const STATE_FOLDERS: Record<TaskState, string> = {
  needs_action: 'Needs_Action',
  pending_approval: 'Pending_Approval',
  approved: 'Approved',
  rejected: 'Rejected',
  done: 'Done',
  failed: 'Failed',
}

/** Lifecycle edges. `failed -> done` is used only when a queued retry succeeds. */
export const TRANSITIONS: Record<TaskState, readonly TaskState[]> = {
  needs_action: ['pending_approval', 'approved', 'rejected'],
  pending_approval: ['approved', 'rejected'],
  approved: ['done', 'failed'],
  failed: ['done'],
  rejected: [],
  done: [],
}

export function isTaskState(value: unknown): value is TaskState {
  return typeof value === 'string' && (TASK_STATES as readonly string[]).includes(value)
}

export type Decision = 'approve' | 'reject'

export interface DecisionRecord {
  decision: Decision
  actor: string
  decidedAt: string
  reason?: string
}

export type ExecutionStatus = 'success' | 'dry_run' | 'failed'

export type FailureKind = 'transient' | 'permanent'

export interface ExecutionRecord {
  status: ExecutionStatus
  executedAt: string
  failure?: FailureKind
  error?: string
  details?: JsonObject
  replayed?: boolean
}

export interface TransitionRecord {
  from: TaskState | null
  to: TaskState
  at: string
}

/** What is persisted in a task file. The state is never written; it is the folder. */
export interface TaskRecord {
  id: string
  source: string
  type: string
  payload: JsonObject
  sourceRef?: string
  createdAt: string
  decision?: DecisionRecord
  result?: ExecutionRecord
  resubmittedFrom?: string
  history: TransitionRecord[]
}

export interface Task extends TaskRecord {
  state: TaskState
}

export interface TaskProposal {
  source: string
  type: string
  payload: JsonObject
  sourceRef?: string
  resubmittedFrom?: string
}

export interface TaskDraft extends TaskProposal {
  decision?: DecisionRecord
}

export interface TaskAnnotations {
  decision?: DecisionRecord
  result?: ExecutionRecord
}

export interface QueuedOperation {
  operationType: string
  payload: JsonObject
  queuedAt: string
}

export type OperationInput = Omit<QueuedOperation, 'queuedAt'>

export interface ExecutionOutcome {
  details?: JsonObject
}

/** Execution collaborator invoked once a task reaches Approved. */
export interface TaskExecutor {
  execute(task: Task): Promise<ExecutionOutcome>
}
