import { Command } from 'commander'

import { CONFIG_PATH, loadConfig, saveConfig } from '../core/config.js'
import { startServer } from '../server/app.js'
import { generateAuthToken } from '../server/auth.js'
import { openRuntime, reportError } from './runtime.js'

const serve = new Command('serve')
  .description('Start the HTTP decision API in the foreground')
  .action(async () => {
    try {
      const runtime = openRuntime()
      if (runtime.config.server.authToken === undefined) {
        throw new Error('server.authToken must be configured. Run `vclerk token generate` to create one.')
      }
      const server = await startServer(runtime)
      server.log.info(`Listening on ${runtime.config.server.host}:${runtime.config.server.port}`)
    } catch (err: unknown) {
      reportError(err)
    }
  })

export { serve as serveCommand }

const token = new Command('token').description('Manage the HTTP API authentication token')

token
  .command('generate')
  .description('Generate a random 32-byte hex token for the HTTP API')
  .option('--save', 'Store the token as server.authToken in the config file', false)
  .action((opts: { save: boolean }) => {
    try {
      const value = generateAuthToken()
      if (opts.save) {
        const config = loadConfig()
        saveConfig({ ...config, server: { ...config.server, authToken: value } })
        console.error(`Token saved to ${CONFIG_PATH}`)
      }
      console.log(value)
    } catch (err: unknown) {
      reportError(err)
    }
  })

export { token as tokenCommand }
