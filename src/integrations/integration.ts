import type { ExecutionOutcome, JsonObject, Task, TaskExecutor } from '../core/types.js'

/** Something an integration noticed that should become a task. */
export interface Detection {
  /** Stable identity of the underlying item, used for dedupe. */
  sourceRef: string
  type: string
  payload: JsonObject
  /** Route through Needs_Action instead of classifying immediately. */
  triage?: boolean
}

export interface Integration extends TaskExecutor {
  readonly name: string
  poll?(): Promise<Detection[]>
  execute(task: Task): Promise<ExecutionOutcome>
}
