import { Command } from 'commander'
import { createInterface } from 'node:readline'

import {
  loadConfig,
  saveConfig,
  defaultConfig,
  resolveTilde,
  CONFIG_PATH,
  type AppConfig,
} from '../core/config.js'
import { errorMessage } from '../core/errors.js'

function promptForInput(question: string): Promise<string> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stderr,
  })
  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close()
      resolve(answer)
    })
  })
}

/** Flag value, else an interactive answer, else the default. */
async function resolveField(
  flagValue: string | undefined,
  promptQuestion: string,
  fallback: string,
): Promise<string> {
  if (flagValue !== undefined) {
    return flagValue
  }
  if (process.stdin.isTTY) {
    const answer = (await promptForInput(`${promptQuestion} [${fallback}]: `)).trim()
    return answer === '' ? fallback : answer
  }
  return fallback
}

function mask(value: string, keep: number): string {
  return value.length > keep ? value.slice(0, keep) + '...' : value
}

const config = new Command('config').description('Manage vault-clerk configuration')

config
  .command('init')
  .description('Create the configuration file')
  .option('--vault <path>', 'Vault root folder')
  .option('--state-dir <path>', 'Folder for queues and dedupe state')
  .option('--webhook-url <url>', 'Discord webhook URL for approval notifications')
  .option('--no-default-require-approval', 'Auto-approve action types the policy does not mention')
  .option('--dry-run', 'Record executions without calling integrations', false)
  .option('--poll-interval <ms>', 'Watcher poll interval in ms', '60000')
  .action(
    async (opts: {
      vault?: string
      stateDir?: string
      webhookUrl?: string
      defaultRequireApproval: boolean
      dryRun: boolean
      pollInterval: string
    }) => {
      const defaults = defaultConfig()
      const pollIntervalMs = parseInt(opts.pollInterval, 10)
      if (Number.isNaN(pollIntervalMs) || pollIntervalMs <= 0) {
        console.error('Invalid --poll-interval: must be a positive integer (milliseconds)')
        process.exitCode = 1
        return
      }

      const vaultPath = await resolveField(opts.vault, 'Vault path', defaults.vault.path)
      const appConfig: AppConfig = {
        ...defaults,
        vault: { path: resolveTilde(vaultPath) },
        stateDir: opts.stateDir !== undefined ? resolveTilde(opts.stateDir) : defaults.stateDir,
        dryRun: opts.dryRun,
        pollIntervalMs,
        discord: opts.webhookUrl !== undefined ? { webhookUrl: opts.webhookUrl } : undefined,
        defaultRequireApproval: opts.defaultRequireApproval,
      }

      saveConfig(appConfig)
      console.log(`Config saved to ${CONFIG_PATH}`)
    },
  )

config
  .command('show')
  .description('Display current configuration (sensitive values redacted)')
  .action(() => {
    let appConfig: AppConfig
    try {
      appConfig = loadConfig()
    } catch (err: unknown) {
      console.error(`Error: ${errorMessage(err)}`)
      process.exitCode = 1
      return
    }

    const redacted = {
      ...appConfig,
      server: {
        ...appConfig.server,
        authToken:
          appConfig.server.authToken !== undefined ? mask(appConfig.server.authToken, 4) : undefined,
      },
      discord:
        appConfig.discord !== undefined
          ? { webhookUrl: mask(appConfig.discord.webhookUrl, 20) }
          : undefined,
    }

    console.log(JSON.stringify(redacted, null, 2))
  })

export { config as configCommand }
