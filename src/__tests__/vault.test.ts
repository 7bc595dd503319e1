/// <reference types="vitest/globals" />

import { existsSync, readFileSync, rmSync, unlinkSync, writeFileSync } from 'node:fs'
import { dirname, join } from 'node:path'

import {
  REQUIRED_FOLDERS,
  initializeVault,
  validateOrExit,
  validateVault,
} from '../core/vault.js'
import { createTempDir, createTempVault, silentLogger } from './helpers.js'

describe('validateVault', () => {
  let root: string

  beforeEach(() => {
    root = createTempVault()
  })

  afterEach(() => {
    rmSync(dirname(root), { recursive: true, force: true })
  })

  it('accepts an initialized vault', () => {
    expect(validateVault(root)).toEqual({ ok: true, problems: [], warnings: [] })
  })

  it('names a missing state folder', () => {
    rmSync(join(root, 'Rejected'), { recursive: true })

    const result = validateVault(root)

    expect(result.ok).toBe(false)
    expect(result.problems).toEqual(['Required folder missing: Rejected'])
  })

  it('requires the policy document', () => {
    unlinkSync(join(root, 'Company_Handbook.md'))
    expect(validateVault(root).problems).toEqual(['Policy document missing: Company_Handbook.md'])
  })

  it('only warns about a missing dashboard', () => {
    unlinkSync(join(root, 'Dashboard.md'))

    const result = validateVault(root)

    expect(result.ok).toBe(true)
    expect(result.warnings).toEqual(['Dashboard.md not found in vault root (optional)'])
  })

  it('treats a file where a folder belongs as missing', () => {
    rmSync(join(root, 'Logs'), { recursive: true })
    writeFileSync(join(root, 'Logs'), '')
    expect(validateVault(root).problems).toEqual(['Required folder missing: Logs'])
  })

  it('reports a missing root on its own', () => {
    const missing = join(root, 'nope')
    expect(validateVault(missing)).toEqual({
      ok: false,
      problems: [`Vault root does not exist: ${missing}`],
      warnings: [],
    })
  })
})

describe('validateOrExit', () => {
  let root: string

  beforeEach(() => {
    root = createTempVault()
  })

  afterEach(() => {
    rmSync(dirname(root), { recursive: true, force: true })
  })

  it('does not exit for a valid vault', () => {
    const exit = vi.fn<(code: number) => never>()
    validateOrExit(root, { logger: silentLogger, exit })
    expect(exit).not.toHaveBeenCalled()
  })

  it('exits with code 1 for an invalid vault', () => {
    rmSync(join(root, 'Pending_Approval'), { recursive: true })
    const exit = vi.fn<(code: number) => never>()

    validateOrExit(root, { logger: silentLogger, exit })

    expect(exit).toHaveBeenCalledWith(1)
  })
})

describe('initializeVault', () => {
  let tmpDir: string

  beforeEach(() => {
    tmpDir = createTempDir()
  })

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true })
  })

  it('creates every folder and seeds the documents', () => {
    const root = join(tmpDir, 'vault')

    const created = initializeVault(root)

    expect(created).toEqual([...REQUIRED_FOLDERS, 'Company_Handbook.md', 'Dashboard.md'])
    for (const folder of REQUIRED_FOLDERS) {
      expect(existsSync(join(root, folder))).toBe(true)
    }
    expect(readFileSync(join(root, 'Company_Handbook.md'), 'utf-8')).toContain('## Approval Thresholds')
  })

  it('keeps an existing handbook and only adds what is missing', () => {
    const root = join(tmpDir, 'vault')
    initializeVault(root)
    writeFileSync(join(root, 'Company_Handbook.md'), '# Custom\n')
    rmSync(join(root, 'Plans'), { recursive: true })

    expect(initializeVault(root)).toEqual(['Plans'])
    expect(readFileSync(join(root, 'Company_Handbook.md'), 'utf-8')).toBe('# Custom\n')
  })
})
