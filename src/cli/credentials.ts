import { Command } from 'commander'
import { createInterface } from 'node:readline'

import { loadConfig, type AppConfig } from '../core/config.js'
import { CredentialStore, FileSecretsProvider } from '../core/credential-store.js'
import { cliLogger, reportError } from './runtime.js'

function readStdin(): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = ''
    process.stdin.setEncoding('utf-8')
    process.stdin.on('data', (chunk: string) => {
      data += chunk
    })
    process.stdin.on('end', () => {
      resolve(data.trim())
    })
    process.stdin.on('error', reject)
  })
}

function promptForValue(): Promise<string> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stderr,
  })
  return new Promise((resolve) => {
    rl.question('Enter credential value: ', (answer) => {
      rl.close()
      resolve(answer)
    })
  })
}

async function resolveValue(optValue?: string): Promise<string> {
  if (optValue !== undefined) {
    return optValue
  }
  if (!process.stdin.isTTY) {
    return readStdin()
  }
  return promptForValue()
}

function openStore(service: string, appConfig: AppConfig): CredentialStore {
  const file = appConfig.credentials.file
  if (file === undefined) {
    throw new Error(
      'credentials.file is not configured; set it in the config file or export the variables instead',
    )
  }
  return new CredentialStore(service, new FileSecretsProvider(file), cliLogger(appConfig))
}

const credentials = new Command('credentials').description('Manage integration credentials')

credentials
  .command('set')
  .description('Store a credential in the credentials file')
  .argument('<service>', 'Service the credential belongs to')
  .argument('<key>', 'Credential key, e.g. "billing_token"')
  .option('--value <value>', 'Credential value (reads from stdin if omitted)')
  .action(async (service: string, key: string, opts: { value?: string }) => {
    try {
      const store = openStore(service, loadConfig())
      const value = await resolveValue(opts.value)
      if (!value) {
        throw new Error('credential value must not be empty')
      }
      if (!store.store(key, value)) {
        throw new Error(`Could not store ${key}`)
      }
      console.log(`Stored ${key} for ${service}`)
    } catch (err: unknown) {
      reportError(err)
    }
  })

credentials
  .command('delete')
  .description('Remove a credential from the credentials file')
  .argument('<service>', 'Service the credential belongs to')
  .argument('<key>', 'Credential key')
  .action((service: string, key: string) => {
    try {
      if (!openStore(service, loadConfig()).delete(key)) {
        throw new Error(`No credential ${key} for ${service}`)
      }
      console.log(`Deleted ${key} for ${service}`)
    } catch (err: unknown) {
      reportError(err)
    }
  })

export { credentials as credentialsCommand }
