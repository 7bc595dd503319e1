#!/usr/bin/env node
import { Command } from 'commander'

import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'

import { configCommand } from './config.js'
import { credentialsCommand } from './credentials.js'
import { queueCommand } from './queue.js'
import { serveCommand, tokenCommand } from './serve.js'
import { tasksCommand } from './tasks.js'
import { initCommand, validateCommand } from './vault.js'
import { watchCommand } from './watch.js'

const pkg = JSON.parse(
  readFileSync(fileURLToPath(new URL('../../package.json', import.meta.url)), 'utf-8'),
) as { version: string }

const program = new Command()

program
  .name('vclerk')
  .description('A folder-based task workflow with approval gates and offline retry queues')
  .version(pkg.version)

program.addCommand(initCommand)
program.addCommand(validateCommand)
program.addCommand(tasksCommand)
program.addCommand(queueCommand)
program.addCommand(watchCommand)
program.addCommand(serveCommand)
program.addCommand(configCommand)
program.addCommand(credentialsCommand)
program.addCommand(tokenCommand)

await program.parseAsync()
