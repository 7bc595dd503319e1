import { Command } from 'commander'

import { loadConfig } from '../core/config.js'
import { initializeVault, validateVault } from '../core/vault.js'
import { reportError } from './runtime.js'

const init = new Command('init')
  .description('Create the vault folders, handbook and dashboard')
  .option('--vault <path>', 'Vault root (defaults to the configured vault)')
  .action((opts: { vault?: string }) => {
    try {
      const root = opts.vault ?? loadConfig().vault.path
      const created = initializeVault(root)
      if (created.length === 0) {
        console.log(`Vault at ${root} is already initialized`)
        return
      }
      console.log(`Initialized vault at ${root}`)
      for (const entry of created) console.log(`  + ${entry}`)
    } catch (err: unknown) {
      reportError(err)
    }
  })

const validate = new Command('validate')
  .description('Check the vault structure')
  .option('--vault <path>', 'Vault root (defaults to the configured vault)')
  .action((opts: { vault?: string }) => {
    try {
      const root = opts.vault ?? loadConfig().vault.path
      const result = validateVault(root)
      for (const warning of result.warnings) console.warn(`Warning: ${warning}`)
      if (!result.ok) {
        for (const problem of result.problems) console.error(`  - ${problem}`)
        console.error('Run: vclerk init')
        process.exitCode = 1
        return
      }
      console.log(`Vault at ${root} is valid`)
    } catch (err: unknown) {
      reportError(err)
    }
  })

export { init as initCommand, validate as validateCommand }
