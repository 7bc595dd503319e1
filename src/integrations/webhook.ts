import type { CredentialStore } from '../core/credential-store.js'
import { PermanentExecutionError, TransientExecutionError } from '../core/errors.js'
import type { ExecutionOutcome, Task } from '../core/types.js'
import type { Integration } from './integration.js'

const REQUEST_TIMEOUT_MS = 30_000

export interface WebhookIntegrationOptions {
  name: string
  url: string
  credentials: CredentialStore
  timeoutMs?: number
}

function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500
}

/** Executes approved tasks by POSTing them to an HTTP endpoint. */
export class WebhookIntegration implements Integration {
  readonly name: string
  private readonly url: string
  private readonly credentials: CredentialStore
  private readonly timeoutMs: number

  constructor(options: WebhookIntegrationOptions) {
    this.name = options.name
    this.url = options.url
    this.credentials = options.credentials
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS
  }

  async execute(task: Task): Promise<ExecutionOutcome> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' }
    const token = this.credentials.retrieve(`${this.name}_token`)
    if (token !== null) {
      headers.Authorization = `Bearer ${token}`
    }

    let response: Response
    try {
      response = await fetch(this.url, {
        method: 'POST',
        headers,
        body: JSON.stringify({ taskId: task.id, type: task.type, payload: task.payload }),
        signal: AbortSignal.timeout(this.timeoutMs),
      })
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err)
      throw new TransientExecutionError(`${this.name} unreachable: ${reason}`, { cause: err })
    }

    if (response.ok) {
      return { details: { status: response.status } }
    }

    const message = `${this.name} responded ${response.status} ${response.statusText}`
    if (isTransientStatus(response.status)) {
      throw new TransientExecutionError(message)
    }
    throw new PermanentExecutionError(message)
  }
}
