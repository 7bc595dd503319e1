/// <reference types="vitest/globals" />

import { join } from 'node:path'

vi.mock('node:fs', () => ({
  readFileSync: vi.fn(),
}))

vi.mock('node:os', () => ({
  homedir: vi.fn(() => '/tmp/test-home'),
}))

import { readFileSync } from 'node:fs'
import {
  applyEnvOverrides,
  defaultConfig,
  loadConfig,
  parseConfig,
  resolveTilde,
} from '../core/config.js'

const mockReadFileSync = vi.mocked(readFileSync)

describe('resolveTilde', () => {
  it('replaces leading ~ with homedir', () => {
    expect(resolveTilde('~/.vault-clerk/secrets.json')).toBe(
      join('/tmp/test-home', '.vault-clerk', 'secrets.json'),
    )
  })

  it('leaves absolute paths unchanged', () => {
    expect(resolveTilde('/absolute/path')).toBe('/absolute/path')
  })

  it('resolves bare ~ to homedir', () => {
    expect(resolveTilde('~')).toBe('/tmp/test-home')
  })
})

describe('loadConfig', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should load and parse config from ~/.vault-clerk/config.json', () => {
    mockReadFileSync.mockReturnValue(
      JSON.stringify({ vault: { path: '/srv/vault' }, discord: { webhookUrl: 'https://example.test/hook' } }),
    )

    const config = loadConfig()

    expect(mockReadFileSync).toHaveBeenCalledWith(
      join('/tmp/test-home', '.vault-clerk', 'config.json'),
      'utf-8',
    )
    expect(config.vault.path).toBe('/srv/vault')
    expect(config.discord).toEqual({ webhookUrl: 'https://example.test/hook' })
  })

  it('should return defaults when the file is missing', () => {
    const err = new Error('ENOENT') as NodeJS.ErrnoException
    err.code = 'ENOENT'
    mockReadFileSync.mockImplementation(() => {
      throw err
    })

    const config = loadConfig()

    expect(config.vault.path).toBe(join('/tmp/test-home', 'vault'))
    expect(config.stateDir).toBe(join('/tmp/test-home', '.vault-clerk'))
    expect(config.defaultRequireApproval).toBe(true)
    expect(config.integrations).toEqual([])
  })

  it('should rethrow errors other than ENOENT', () => {
    const err = new Error('EACCES') as NodeJS.ErrnoException
    err.code = 'EACCES'
    mockReadFileSync.mockImplementation(() => {
      throw err
    })

    expect(() => loadConfig()).toThrow('EACCES')
  })

  it('should report invalid JSON with the file path', () => {
    mockReadFileSync.mockReturnValue('{ not json')

    expect(() => loadConfig('/tmp/test-home/broken.json')).toThrow(
      'Invalid JSON in config file: /tmp/test-home/broken.json',
    )
  })
})

describe('parseConfig', () => {
  it('fills every default for an empty object', () => {
    expect(parseConfig({})).toEqual(defaultConfig())
  })

  it('rejects non-object input', () => {
    expect(() => parseConfig('nope')).toThrow('Config must be a JSON object')
  })

  it('expands ~ in the vault path and state dir', () => {
    const config = parseConfig({ vault: { path: '~/notes' }, stateDir: '~/state' })
    expect(config.vault.path).toBe(join('/tmp/test-home', 'notes'))
    expect(config.stateDir).toBe(join('/tmp/test-home', 'state'))
  })

  it('rejects an unknown log level', () => {
    expect(() => parseConfig({ logLevel: 'loud' })).toThrow(
      'logLevel must be one of fatal, error, warn, info, debug, trace, silent',
    )
  })

  it('rejects a server port out of range', () => {
    expect(() => parseConfig({ server: { port: 70000 } })).toThrow(
      'server.port must be an integer between 1 and 65535',
    )
  })

  it('retries three times with doubling backoff by default', () => {
    expect(parseConfig({}).retry).toEqual({ maxAttempts: 3, backoffMs: [1000, 2000, 4000] })
  })

  it('reads custom retry settings', () => {
    expect(parseConfig({ retry: { maxAttempts: 5, backoffMs: [0, 250] } }).retry).toEqual({
      maxAttempts: 5,
      backoffMs: [0, 250],
    })
    expect(parseConfig({ retry: { maxAttempts: 1 } }).retry).toEqual({
      maxAttempts: 1,
      backoffMs: [1000, 2000, 4000],
    })
  })

  it('rejects invalid retry settings', () => {
    expect(() => parseConfig({ retry: 3 })).toThrow('retry must be an object')
    expect(() => parseConfig({ retry: { maxAttempts: 0 } })).toThrow(
      'retry.maxAttempts must be an integer of at least 1',
    )
    expect(() => parseConfig({ retry: { backoffMs: [] } })).toThrow(
      'retry.backoffMs must be a non-empty array of non-negative integers (milliseconds)',
    )
    expect(() => parseConfig({ retry: { backoffMs: [100, -1] } })).toThrow(
      'retry.backoffMs must be a non-empty array of non-negative integers (milliseconds)',
    )
  })

  it('keeps only boolean requireApproval entries', () => {
    const config = parseConfig({ requireApproval: { payment: true, expense: 'yes', vault_update: false } })
    expect(config.requireApproval).toEqual({ payment: true, vault_update: false })
  })

  it('parses webhook and file-drop integrations', () => {
    const config = parseConfig({
      integrations: [
        { kind: 'webhook', name: 'billing', url: 'https://billing.example.test/tasks' },
        { kind: 'file-drop', name: 'inbox', inbox: '~/Drop', pollIntervalMs: 5000 },
      ],
    })

    expect(config.integrations).toEqual([
      { kind: 'webhook', name: 'billing', url: 'https://billing.example.test/tasks', pollIntervalMs: undefined },
      { kind: 'file-drop', name: 'inbox', inbox: join('/tmp/test-home', 'Drop'), pollIntervalMs: 5000 },
    ])
  })

  it('rejects an integration name that is not a slug', () => {
    expect(() =>
      parseConfig({ integrations: [{ kind: 'webhook', name: 'Billing API', url: 'https://x.test' }] }),
    ).toThrow('integrations[0].name must be a lowercase slug (a-z, 0-9, hyphens)')
  })

  it('rejects duplicate integration names', () => {
    expect(() =>
      parseConfig({
        integrations: [
          { kind: 'webhook', name: 'billing', url: 'https://a.test' },
          { kind: 'webhook', name: 'billing', url: 'https://b.test' },
        ],
      }),
    ).toThrow('Duplicate integration name "billing"')
  })

  it('rejects an unknown integration kind', () => {
    expect(() => parseConfig({ integrations: [{ kind: 'ftp', name: 'files' }] })).toThrow(
      'integrations[0].kind must be "webhook" or "file-drop"',
    )
  })
})

describe('applyEnvOverrides', () => {
  it('overrides the vault path and dry run flag', () => {
    const config = applyEnvOverrides(defaultConfig(), {
      VAULT_CLERK_VAULT: '/override/vault',
      VAULT_CLERK_DRY_RUN: '1',
    })
    expect(config.vault.path).toBe('/override/vault')
    expect(config.dryRun).toBe(true)
  })

  it('treats other dry run values as false', () => {
    const config = applyEnvOverrides({ ...defaultConfig(), dryRun: true }, { VAULT_CLERK_DRY_RUN: 'no' })
    expect(config.dryRun).toBe(false)
  })

  it('leaves the config alone when nothing is set', () => {
    expect(applyEnvOverrides(defaultConfig(), {})).toEqual(defaultConfig())
  })
})
