import { Command } from 'commander'

import { loadConfig } from '../core/config.js'
import { TaskNotFoundError } from '../core/errors.js'
import { TASK_STATES, isTaskState, type Task } from '../core/types.js'
import { openRuntime, reportError } from './runtime.js'

function summarize(task: Task): string {
  return `${task.id}  ${task.source}  ${task.type}  ${task.createdAt}`
}

const tasks = new Command('tasks').description('Inspect and move tasks through the workflow')

tasks
  .command('list')
  .description('List tasks in a state')
  .argument('<state>', `One of: ${TASK_STATES.join(', ')}`)
  .option('--json', 'Print full task records as JSON', false)
  .action((state: string, opts: { json: boolean }) => {
    try {
      if (!isTaskState(state)) {
        throw new Error(`Unknown state "${state}". Expected one of: ${TASK_STATES.join(', ')}`)
      }
      const list = [...openRuntime().store.list(state)]
      if (opts.json) {
        console.log(JSON.stringify(list, null, 2))
      } else if (list.length === 0) {
        console.log(`No tasks in ${state}`)
      } else {
        for (const task of list) console.log(summarize(task))
      }
    } catch (err: unknown) {
      reportError(err)
    }
  })

tasks
  .command('show')
  .description('Show one task')
  .argument('<id>', 'Task id')
  .action((id: string) => {
    try {
      const task = openRuntime().store.read(id)
      if (task === null) throw new TaskNotFoundError(id)
      console.log(JSON.stringify(task, null, 2))
    } catch (err: unknown) {
      reportError(err)
    }
  })

tasks
  .command('approve')
  .description('Approve a task waiting in Pending_Approval')
  .argument('<id>', 'Task id')
  .requiredOption('--actor <name>', 'Who is deciding')
  .option('--reason <text>', 'Why')
  .action((id: string, opts: { actor: string; reason?: string }) => {
    try {
      const task = openRuntime().engine.decide(id, 'approve', opts.actor, opts.reason)
      console.log(`Task ${task.id} approved`)
    } catch (err: unknown) {
      reportError(err)
    }
  })

tasks
  .command('reject')
  .description('Reject a task waiting in Pending_Approval')
  .argument('<id>', 'Task id')
  .requiredOption('--actor <name>', 'Who is deciding')
  .option('--reason <text>', 'Why')
  .action((id: string, opts: { actor: string; reason?: string }) => {
    try {
      const task = openRuntime().engine.decide(id, 'reject', opts.actor, opts.reason)
      console.log(`Task ${task.id} rejected`)
    } catch (err: unknown) {
      reportError(err)
    }
  })

tasks
  .command('triage')
  .description('Classify a task from Needs_Action against the approval policy')
  .argument('<id>', 'Task id')
  .action(async (id: string) => {
    try {
      const task = await openRuntime().engine.triage(id)
      console.log(`Task ${task.id} moved to ${task.state}`)
    } catch (err: unknown) {
      reportError(err)
    }
  })

tasks
  .command('dismiss')
  .description('Reject a task from Needs_Action without triage')
  .argument('<id>', 'Task id')
  .requiredOption('--actor <name>', 'Who is dismissing')
  .option('--reason <text>', 'Why')
  .action((id: string, opts: { actor: string; reason?: string }) => {
    try {
      const task = openRuntime().engine.dismiss(id, opts.actor, opts.reason)
      console.log(`Task ${task.id} dismissed`)
    } catch (err: unknown) {
      reportError(err)
    }
  })

tasks
  .command('execute')
  .description('Execute an approved task now')
  .argument('<id>', 'Task id')
  .action(async (id: string) => {
    try {
      const task = await openRuntime().engine.execute(id)
      const error = task.result?.error !== undefined ? `: ${task.result.error}` : ''
      console.log(`Task ${task.id} moved to ${task.state}${error}`)
      if (task.state === 'failed') process.exitCode = 1
    } catch (err: unknown) {
      reportError(err)
    }
  })

tasks
  .command('resubmit')
  .description('Propose a permanently failed task again as a new task')
  .argument('<id>', 'Task id')
  .requiredOption('--actor <name>', 'Who is resubmitting')
  .action(async (id: string, opts: { actor: string }) => {
    try {
      const task = await openRuntime().engine.resubmit(id, opts.actor)
      console.log(`Task ${id} resubmitted as ${task.id} (${task.state})`)
    } catch (err: unknown) {
      reportError(err)
    }
  })

tasks
  .command('recover')
  .description('Resolve moves interrupted by a crash')
  .action(() => {
    try {
      const report = openRuntime(loadConfig(), { recover: false }).store.recover()
      console.log(`Promoted ${report.promoted.length}, discarded ${report.discarded.length}`)
    } catch (err: unknown) {
      reportError(err)
    }
  })

export { tasks as tasksCommand }
