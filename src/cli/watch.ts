import { Command } from 'commander'

import { runWatchers } from '../core/watcher.js'
import { openRuntime, reportError } from './runtime.js'

const watch = new Command('watch')
  .description('Poll every integration, replay queues and execute approved tasks')
  .option('--once', 'Run a single cycle per integration and exit', false)
  .action(async (opts: { once: boolean }) => {
    try {
      const runtime = openRuntime()
      const loops = runtime.watchers()
      if (loops.length === 0) {
        console.error('No integrations configured. Add one under "integrations" in the config file.')
        process.exitCode = 1
        return
      }

      if (opts.once) {
        for (const loop of loops) {
          const report = await loop.runCycle()
          console.log(JSON.stringify(report))
        }
        return
      }

      const controller = new AbortController()
      const stop = () => controller.abort()
      process.once('SIGINT', stop)
      process.once('SIGTERM', stop)
      try {
        await runWatchers(loops, controller.signal)
      } finally {
        process.removeListener('SIGINT', stop)
        process.removeListener('SIGTERM', stop)
      }
    } catch (err: unknown) {
      reportError(err)
    }
  })

export { watch as watchCommand }
