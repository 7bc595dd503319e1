import { copyFileSync, existsSync, mkdirSync, statSync } from 'node:fs'
import { join } from 'node:path'
import { fileURLToPath } from 'node:url'

import { logger as rootLogger, type Logger } from './logger.js'
import { STATE_FOLDERS, TASK_STATES } from './types.js'

export const SUPPORT_FOLDERS = ['Logs', 'Plans'] as const

export const REQUIRED_FOLDERS: readonly string[] = [
  ...TASK_STATES.map((state) => STATE_FOLDERS[state]),
  ...SUPPORT_FOLDERS,
]

export const POLICY_DOCUMENT = 'Company_Handbook.md'
export const DASHBOARD_DOCUMENT = 'Dashboard.md'

const TEMPLATES_DIR = fileURLToPath(new URL('../../templates/', import.meta.url))

export interface VaultValidation {
  ok: boolean
  problems: string[]
  warnings: string[]
}

function isDirectory(path: string): boolean {
  return existsSync(path) && statSync(path).isDirectory()
}

export function validateVault(root: string): VaultValidation {
  const problems: string[] = []
  const warnings: string[] = []

  if (!isDirectory(root)) {
    return { ok: false, problems: [`Vault root does not exist: ${root}`], warnings }
  }

  for (const folder of REQUIRED_FOLDERS) {
    if (!isDirectory(join(root, folder))) {
      problems.push(`Required folder missing: ${folder}`)
    }
  }

  if (!existsSync(join(root, POLICY_DOCUMENT))) {
    problems.push(`Policy document missing: ${POLICY_DOCUMENT}`)
  }

  if (!existsSync(join(root, DASHBOARD_DOCUMENT))) {
    warnings.push(`${DASHBOARD_DOCUMENT} not found in vault root (optional)`)
  }

  return { ok: problems.length === 0, problems, warnings }
}

export interface ValidateOrExitOptions {
  logger?: Logger
  exit?: (code: number) => never
}

/** Startup gate: logs every problem and terminates the process if the vault is unusable. */
export function validateOrExit(root: string, options: ValidateOrExitOptions = {}): void {
  const log = (options.logger ?? rootLogger).child({ component: 'vault' })
  const exit = options.exit ?? ((code: number) => process.exit(code))

  const result = validateVault(root)
  for (const warning of result.warnings) {
    log.warn(warning)
  }

  if (!result.ok) {
    log.error({ root }, 'Vault structure validation failed')
    for (const problem of result.problems) {
      log.error(`  - ${problem}`)
    }
    log.error('Run: vclerk init')
    exit(1)
  }

  log.info({ root }, 'Vault structure validation passed')
}

/** Creates missing folders and seeds the handbook and dashboard. Returns what was created. */
export function initializeVault(root: string): string[] {
  const created: string[] = []
  if (!existsSync(root)) {
    mkdirSync(root, { recursive: true })
  }

  for (const folder of REQUIRED_FOLDERS) {
    const path = join(root, folder)
    if (!existsSync(path)) {
      mkdirSync(path, { recursive: true })
      created.push(folder)
    }
  }

  for (const document of [POLICY_DOCUMENT, DASHBOARD_DOCUMENT]) {
    const path = join(root, document)
    if (!existsSync(path)) {
      copyFileSync(join(TEMPLATES_DIR, document), path)
      created.push(document)
    }
  }

  return created
}
