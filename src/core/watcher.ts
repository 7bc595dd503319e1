import { setTimeout as sleep } from 'node:timers/promises'

import type { Integration } from '../integrations/integration.js'
import type { DedupeTracker } from './dedupe.js'
import { errorMessage } from './errors.js'
import { logger as rootLogger, type Logger } from './logger.js'
import type { ExecutionSummary, ReplayReport, WorkflowEngine } from './workflow.js'

export interface WatcherLoopOptions {
  integration: Integration
  engine: WorkflowEngine
  dedupe: DedupeTracker
  intervalMs: number
  logger?: Logger
}

export interface CycleReport {
  integration: string
  created: number
  duplicates: number
  replay: ReplayReport
  execution: ExecutionSummary | null
}

function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError'
}

/** Polls one integration, replays its queue, then executes its approved tasks. */
export class WatcherLoop {
  readonly integration: Integration
  private readonly engine: WorkflowEngine
  private readonly dedupe: DedupeTracker
  private readonly intervalMs: number
  private readonly log: Logger

  constructor(options: WatcherLoopOptions) {
    this.integration = options.integration
    this.engine = options.engine
    this.dedupe = options.dedupe
    this.intervalMs = options.intervalMs
    this.log = (options.logger ?? rootLogger).child({
      component: 'watcher',
      integration: options.integration.name,
    })
  }

  async runCycle(): Promise<CycleReport> {
    let created = 0
    let duplicates = 0

    const detections = this.integration.poll ? await this.integration.poll() : []
    for (const detection of detections) {
      if (this.dedupe.isProcessed(detection.sourceRef)) {
        duplicates++
        continue
      }
      const proposal = {
        source: this.integration.name,
        type: detection.type,
        payload: detection.payload,
        sourceRef: detection.sourceRef,
      }
      if (detection.triage === true) {
        this.engine.intake(proposal)
      } else {
        await this.engine.submit(proposal)
      }
      this.dedupe.markProcessed(detection.sourceRef)
      created++
    }

    const replay = await this.engine.replay(this.integration.name)
    // A blocked queue means the integration is still down; new work waits behind it.
    const execution = replay.blocked ? null : await this.engine.executeApproved(this.integration.name)

    const report: CycleReport = {
      integration: this.integration.name,
      created,
      duplicates,
      replay,
      execution,
    }
    this.log.debug({ created, duplicates, replay, execution }, 'Cycle complete')
    return report
  }

  async run(signal: AbortSignal): Promise<void> {
    this.log.info({ intervalMs: this.intervalMs }, 'Watcher started')
    while (!signal.aborted) {
      try {
        await this.runCycle()
      } catch (err: unknown) {
        this.log.error({ err: errorMessage(err) }, 'Watcher cycle failed')
      }
      try {
        await sleep(this.intervalMs, undefined, { signal })
      } catch (err: unknown) {
        if (!isAbortError(err)) throw err
      }
    }
    this.log.info('Watcher stopped')
  }
}

export async function runWatchers(loops: WatcherLoop[], signal: AbortSignal): Promise<void> {
  await Promise.all(loops.map((loop) => loop.run(signal)))
}
