import type { TaskState } from './types.js'

export class StateConflictError extends Error {
  readonly taskId: string
  readonly expected: TaskState
  readonly actual: TaskState | null

  constructor(taskId: string, expected: TaskState, actual: TaskState | null) {
    super(
      actual === null
        ? `Task ${taskId} is not in ${expected}: task not found`
        : `Task ${taskId} is not in ${expected}: currently in ${actual}`,
    )
    this.name = 'StateConflictError'
    this.taskId = taskId
    this.expected = expected
    this.actual = actual
  }
}

export class InvalidTransitionError extends Error {
  constructor(from: TaskState, to: TaskState) {
    super(`Invalid transition: ${from} -> ${to}`)
    this.name = 'InvalidTransitionError'
  }
}

export class TaskNotFoundError extends Error {
  readonly taskId: string

  constructor(taskId: string) {
    super(`Task ${taskId} not found`)
    this.name = 'TaskNotFoundError'
    this.taskId = taskId
  }
}

export class InvalidStateError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidStateError'
  }
}

/** Downstream unreachable; a later retry may succeed. */
export class TransientExecutionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'TransientExecutionError'
  }
}

/** Downstream rejected the action; retrying will not change the outcome. */
export class PermanentExecutionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'PermanentExecutionError'
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err
}
