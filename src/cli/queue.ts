import { Command } from 'commander'

import { openRuntime, reportError } from './runtime.js'

const queue = new Command('queue').description('Inspect and replay per-integration operation queues')

queue
  .command('status')
  .description('Show queue depth for every configured integration')
  .action(() => {
    try {
      const runtime = openRuntime()
      if (runtime.integrations.size === 0) {
        console.log('No integrations configured')
        return
      }
      for (const name of runtime.integrations.keys()) {
        console.log(`${name}: ${runtime.queueFor(name).size()}`)
      }
    } catch (err: unknown) {
      reportError(err)
    }
  })

queue
  .command('replay')
  .description('Replay queued operations for one integration, oldest first')
  .argument('<integration>', 'Integration name')
  .action(async (integration: string) => {
    try {
      const report = await openRuntime().engine.replay(integration)
      console.log(
        `Replayed ${report.replayed}, dropped ${report.dropped}, remaining ${report.remaining}`,
      )
      if (report.blocked) {
        console.error(`${integration} is still unavailable; replay stopped at the oldest operation`)
        process.exitCode = 1
      }
    } catch (err: unknown) {
      reportError(err)
    }
  })

queue
  .command('clear')
  .description('Discard every queued operation for one integration')
  .argument('<integration>', 'Integration name')
  .action((integration: string) => {
    try {
      if (!openRuntime().queueFor(integration).clear()) {
        throw new Error(`Could not clear queue for ${integration}`)
      }
      console.log(`Queue for ${integration} cleared`)
    } catch (err: unknown) {
      reportError(err)
    }
  })

export { queue as queueCommand }
