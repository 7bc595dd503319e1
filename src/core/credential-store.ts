import { readFileSync, writeFileSync, mkdirSync, chmodSync, existsSync } from 'node:fs'
import { dirname } from 'node:path'

import { errorMessage } from './errors.js'
import { logger as rootLogger, type Logger } from './logger.js'

/** Backing store for named secrets. Injected so tests never touch `process.env`. */
export interface SecretsProvider {
  get(name: string): string | undefined
  set(name: string, value: string): void
  delete(name: string): boolean
}

export class EnvSecretsProvider implements SecretsProvider {
  private readonly env: NodeJS.ProcessEnv

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.env = env
  }

  get(name: string): string | undefined {
    return this.env[name]
  }

  set(name: string, value: string): void {
    this.env[name] = value
  }

  delete(name: string): boolean {
    if (!(name in this.env)) return false
    delete this.env[name]
    return true
  }
}

interface SecretEntry {
  name: string
  value: string
  updatedAt: string
}

interface SecretsFile {
  secrets: SecretEntry[]
}

/** JSON file of secrets, readable by the owner only. */
export class FileSecretsProvider implements SecretsProvider {
  private readonly filePath: string

  constructor(filePath: string) {
    this.filePath = filePath
  }

  private load(): SecretEntry[] {
    if (!existsSync(this.filePath)) {
      return []
    }
    const data = readFileSync(this.filePath, 'utf-8')
    try {
      const file = JSON.parse(data) as SecretsFile
      return file.secrets
    } catch {
      throw new Error(`Failed to parse secrets file at ${this.filePath}. File may be corrupted.`)
    }
  }

  private save(secrets: SecretEntry[]): void {
    mkdirSync(dirname(this.filePath), { recursive: true })
    const file: SecretsFile = { secrets }
    writeFileSync(this.filePath, JSON.stringify(file, null, 2), 'utf-8')
    chmodSync(this.filePath, 0o600)
  }

  get(name: string): string | undefined {
    return this.load().find((s) => s.name === name)?.value
  }

  set(name: string, value: string): void {
    const secrets = this.load().filter((s) => s.name !== name)
    secrets.push({ name, value, updatedAt: new Date().toISOString() })
    this.save(secrets)
  }

  delete(name: string): boolean {
    const secrets = this.load()
    const remaining = secrets.filter((s) => s.name !== name)
    if (remaining.length === secrets.length) return false
    this.save(remaining)
    return true
  }
}

function envName(...parts: string[]): string {
  return parts
    .join('_')
    .toUpperCase()
    .replace(/[^A-Z0-9]+/g, '_')
}

/**
 * Service-scoped credential lookup. Values are never logged; only key names and
 * outcomes are.
 */
export class CredentialStore {
  readonly serviceName: string
  private readonly provider: SecretsProvider
  private readonly log: Logger

  constructor(
    serviceName: string,
    provider: SecretsProvider = new EnvSecretsProvider(),
    logger: Logger = rootLogger,
  ) {
    this.serviceName = serviceName
    this.provider = provider
    this.log = logger.child({ component: 'credentials', service: serviceName })
  }

  store(key: string, value: string): boolean {
    try {
      this.provider.set(envName(this.serviceName, key), value)
      this.log.info({ key }, 'Credential stored')
      return true
    } catch (err: unknown) {
      this.log.error({ key, err: errorMessage(err) }, 'Failed to store credential')
      return false
    }
  }

  /** Service-prefixed key first, then the bare key for older setups. */
  retrieve(key: string): string | null {
    for (const name of [envName(this.serviceName, key), envName(key)]) {
      const value = this.provider.get(name)
      if (value !== undefined && value !== '') return value
    }
    this.log.warn({ key }, 'Credential not found')
    return null
  }

  delete(key: string): boolean {
    try {
      const deleted = this.provider.delete(envName(this.serviceName, key))
      if (deleted) this.log.info({ key }, 'Credential deleted')
      return deleted
    } catch (err: unknown) {
      this.log.error({ key, err: errorMessage(err) }, 'Failed to delete credential')
      return false
    }
  }
}
