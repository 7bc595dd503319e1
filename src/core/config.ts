import { readFileSync, writeFileSync, mkdirSync, chmodSync } from 'node:fs'
import { resolve, dirname } from 'node:path'
import { homedir } from 'node:os'

import { isErrnoException } from './errors.js'
import { isLogLevel, type LogLevel } from './logger.js'

export interface VaultConfig {
  path: string
}

export interface ServerConfig {
  host: string
  port: number
  authToken?: string
}

export interface DiscordConfig {
  webhookUrl: string
}

export interface CredentialsConfig {
  file?: string
}

export interface WebhookIntegrationConfig {
  kind: 'webhook'
  name: string
  url: string
  pollIntervalMs?: number
}

export interface FileDropIntegrationConfig {
  kind: 'file-drop'
  name: string
  inbox: string
  pollIntervalMs?: number
}

export type IntegrationConfig = WebhookIntegrationConfig | FileDropIntegrationConfig

/** In-place retries for transient execution failures before a task is parked in Failed. */
export interface RetryConfig {
  maxAttempts: number
  /** Delay before each retry; the last entry repeats once the list runs out. */
  backoffMs: number[]
}

export interface AppConfig {
  vault: VaultConfig
  stateDir: string
  dryRun: boolean
  logLevel: LogLevel
  pollIntervalMs: number
  retry: RetryConfig
  server: ServerConfig
  discord?: DiscordConfig
  requireApproval: Record<string, boolean>
  defaultRequireApproval: boolean
  credentials: CredentialsConfig
  integrations: IntegrationConfig[]
}

export const CONFIG_PATH = resolve(homedir(), '.vault-clerk', 'config.json')

const DEFAULT_VAULT_PATH = '~/vault'
const DEFAULT_STATE_DIR = '~/.vault-clerk'
const DEFAULT_POLL_INTERVAL_MS = 60_000
const DEFAULT_RETRY: RetryConfig = { maxAttempts: 3, backoffMs: [1000, 2000, 4000] }
const INTEGRATION_NAME = /^[a-z0-9]([a-z0-9-]*[a-z0-9])?$/

export function resolveTilde(p: string): string {
  if (p.startsWith('~/') || p === '~') {
    return resolve(homedir(), p.slice(2))
  }
  return p
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function parsePath(raw: unknown, fallback: string, field: string): string {
  const value = raw !== undefined ? raw : fallback
  if (typeof value !== 'string' || value === '') {
    throw new Error(`${field} must be a non-empty string`)
  }
  return resolveTilde(value)
}

function parseInterval(raw: unknown, field: string): number | undefined {
  if (raw === undefined) return undefined
  if (typeof raw !== 'number' || !Number.isInteger(raw) || raw <= 0) {
    throw new Error(`${field} must be a positive integer (milliseconds)`)
  }
  return raw
}

function parseRequireApproval(raw: unknown): Record<string, boolean> {
  if (!isRecord(raw)) return {}
  const result: Record<string, boolean> = {}
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === 'boolean') {
      result[key] = value
    }
  }
  return result
}

function isDelayList(value: unknown): value is number[] {
  return (
    Array.isArray(value) &&
    value.length > 0 &&
    value.every((delay: unknown) => typeof delay === 'number' && Number.isInteger(delay) && delay >= 0)
  )
}

function parseRetryConfig(raw: unknown): RetryConfig {
  if (raw === undefined || raw === null) return { ...DEFAULT_RETRY, backoffMs: [...DEFAULT_RETRY.backoffMs] }
  if (!isRecord(raw)) {
    throw new Error('retry must be an object')
  }

  const maxAttempts = raw.maxAttempts !== undefined ? raw.maxAttempts : DEFAULT_RETRY.maxAttempts
  if (typeof maxAttempts !== 'number' || !Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new Error('retry.maxAttempts must be an integer of at least 1')
  }

  const backoffMs: unknown = raw.backoffMs !== undefined ? raw.backoffMs : DEFAULT_RETRY.backoffMs
  if (!isDelayList(backoffMs)) {
    throw new Error('retry.backoffMs must be a non-empty array of non-negative integers (milliseconds)')
  }

  return { maxAttempts, backoffMs: [...backoffMs] }
}

function parseVaultConfig(raw: unknown): VaultConfig {
  if (raw === undefined || raw === null) return { path: resolveTilde(DEFAULT_VAULT_PATH) }
  if (!isRecord(raw)) {
    throw new Error('vault must be an object')
  }
  return { path: parsePath(raw.path, DEFAULT_VAULT_PATH, 'vault.path') }
}

function parseDiscordConfig(raw: unknown): DiscordConfig | undefined {
  if (raw === undefined || raw === null) return undefined
  if (!isRecord(raw)) {
    throw new Error('discord must be an object')
  }

  const webhookUrl = raw.webhookUrl
  if (typeof webhookUrl !== 'string' || webhookUrl === '') {
    throw new Error('discord.webhookUrl must be a non-empty string')
  }

  return { webhookUrl }
}

function parseServerConfig(raw: unknown): ServerConfig {
  const defaults: ServerConfig = { host: '127.0.0.1', port: 2275 }
  if (raw === undefined || raw === null) return defaults
  if (!isRecord(raw)) {
    throw new Error('server must be an object')
  }

  const host = raw.host !== undefined ? raw.host : defaults.host
  if (typeof host !== 'string' || host === '') {
    throw new Error('server.host must be a non-empty string')
  }

  const port = raw.port !== undefined ? raw.port : defaults.port
  if (typeof port !== 'number' || !Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error('server.port must be an integer between 1 and 65535')
  }

  const result: ServerConfig = { host, port }

  if (raw.authToken !== undefined) {
    if (typeof raw.authToken !== 'string' || raw.authToken === '') {
      throw new Error('server.authToken must be a non-empty string when provided')
    }
    result.authToken = raw.authToken
  }

  return result
}

function parseCredentialsConfig(raw: unknown): CredentialsConfig {
  if (raw === undefined || raw === null) return {}
  if (!isRecord(raw)) {
    throw new Error('credentials must be an object')
  }
  if (raw.file === undefined) return {}
  return { file: parsePath(raw.file, '', 'credentials.file') }
}

function parseIntegration(raw: unknown, index: number): IntegrationConfig {
  const at = `integrations[${index}]`
  if (!isRecord(raw)) {
    throw new Error(`${at} must be an object`)
  }

  const name = raw.name
  if (typeof name !== 'string' || !INTEGRATION_NAME.test(name)) {
    throw new Error(`${at}.name must be a lowercase slug (a-z, 0-9, hyphens)`)
  }
  const pollIntervalMs = parseInterval(raw.pollIntervalMs, `${at}.pollIntervalMs`)

  if (raw.kind === 'webhook') {
    const url = raw.url
    if (typeof url !== 'string' || !/^https?:\/\//.test(url)) {
      throw new Error(`${at}.url must be an http(s) URL`)
    }
    return { kind: 'webhook', name, url, pollIntervalMs }
  }

  if (raw.kind === 'file-drop') {
    return { kind: 'file-drop', name, inbox: parsePath(raw.inbox, '', `${at}.inbox`), pollIntervalMs }
  }

  throw new Error(`${at}.kind must be "webhook" or "file-drop"`)
}

function parseIntegrations(raw: unknown): IntegrationConfig[] {
  if (raw === undefined || raw === null) return []
  if (!Array.isArray(raw)) {
    throw new Error('integrations must be an array')
  }
  const integrations = raw.map((entry: unknown, index) => parseIntegration(entry, index))
  const seen = new Set<string>()
  for (const integration of integrations) {
    if (seen.has(integration.name)) {
      throw new Error(`Duplicate integration name "${integration.name}"`)
    }
    seen.add(integration.name)
  }
  return integrations
}

export function defaultConfig(): AppConfig {
  return {
    vault: { path: resolveTilde(DEFAULT_VAULT_PATH) },
    stateDir: resolveTilde(DEFAULT_STATE_DIR),
    dryRun: false,
    logLevel: 'info',
    pollIntervalMs: DEFAULT_POLL_INTERVAL_MS,
    retry: { ...DEFAULT_RETRY, backoffMs: [...DEFAULT_RETRY.backoffMs] },
    server: { host: '127.0.0.1', port: 2275 },
    discord: undefined,
    requireApproval: {},
    defaultRequireApproval: true,
    credentials: {},
    integrations: [],
  }
}

export function parseConfig(raw: unknown): AppConfig {
  if (!isRecord(raw)) {
    throw new Error('Config must be a JSON object')
  }

  const logLevel = raw.logLevel !== undefined ? raw.logLevel : 'info'
  if (!isLogLevel(logLevel)) {
    throw new Error('logLevel must be one of fatal, error, warn, info, debug, trace, silent')
  }

  return {
    vault: parseVaultConfig(raw.vault),
    stateDir: parsePath(raw.stateDir, DEFAULT_STATE_DIR, 'stateDir'),
    dryRun: typeof raw.dryRun === 'boolean' ? raw.dryRun : false,
    logLevel,
    pollIntervalMs: parseInterval(raw.pollIntervalMs, 'pollIntervalMs') ?? DEFAULT_POLL_INTERVAL_MS,
    retry: parseRetryConfig(raw.retry),
    server: parseServerConfig(raw.server),
    discord: parseDiscordConfig(raw.discord),
    requireApproval: parseRequireApproval(raw.requireApproval),
    defaultRequireApproval:
      typeof raw.defaultRequireApproval === 'boolean' ? raw.defaultRequireApproval : true,
    credentials: parseCredentialsConfig(raw.credentials),
    integrations: parseIntegrations(raw.integrations),
  }
}

export function applyEnvOverrides(config: AppConfig, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result: AppConfig = { ...config }
  const vaultPath = env.VAULT_CLERK_VAULT
  if (vaultPath !== undefined && vaultPath !== '') {
    result.vault = { path: resolveTilde(vaultPath) }
  }
  const dryRun = env.VAULT_CLERK_DRY_RUN
  if (dryRun !== undefined && dryRun !== '') {
    result.dryRun = dryRun === 'true' || dryRun === '1'
  }
  return result
}

export function loadConfig(configPath: string = CONFIG_PATH): AppConfig {
  let raw: string
  try {
    raw = readFileSync(configPath, 'utf-8')
  } catch (err: unknown) {
    if (isErrnoException(err) && err.code === 'ENOENT') {
      return applyEnvOverrides(defaultConfig())
    }
    throw err
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch {
    throw new Error(`Invalid JSON in config file: ${configPath}`)
  }

  return applyEnvOverrides(parseConfig(parsed))
}

export function saveConfig(config: AppConfig, configPath: string = CONFIG_PATH): void {
  const dir = dirname(configPath)
  mkdirSync(dir, { recursive: true })
  writeFileSync(configPath, JSON.stringify(config, null, 2), 'utf-8')
  chmodSync(configPath, 0o600)
}
