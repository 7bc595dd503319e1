import { join } from 'node:path'

import { DiscordChannel } from '../channels/discord.js'
import type { NotificationChannel } from '../channels/channel.js'
import { FileDropIntegration } from '../integrations/file-drop.js'
import type { Integration } from '../integrations/integration.js'
import { WebhookIntegration } from '../integrations/webhook.js'
import { AuditLog } from './audit-log.js'
import type { AppConfig, IntegrationConfig } from './config.js'
import {
  CredentialStore,
  EnvSecretsProvider,
  FileSecretsProvider,
  type SecretsProvider,
} from './credential-store.js'
import { Dashboard } from './dashboard.js'
import { DedupeTracker } from './dedupe.js'
import { createLogger, type Logger } from './logger.js'
import { OperationQueue } from './operation-queue.js'
import { buildPolicyRules, loadPolicyDocument } from './policy.js'
import { TaskStore } from './task-store.js'
import { WatcherLoop } from './watcher.js'
import { WorkflowEngine } from './workflow.js'

export const CREDENTIAL_SERVICE = 'vault-clerk'

export interface Runtime {
  config: AppConfig
  logger: Logger
  store: TaskStore
  audit: AuditLog
  credentials: CredentialStore
  integrations: Map<string, Integration>
  engine: WorkflowEngine
  queueFor(source: string): OperationQueue
  watchers(): WatcherLoop[]
}

export interface RuntimeOverrides {
  logger?: Logger
  secrets?: SecretsProvider
  channel?: NotificationChannel
  integrations?: Integration[]
}

export function queueDir(config: Pick<AppConfig, 'stateDir'>): string {
  return join(config.stateDir, 'queues')
}

export function dedupeFile(config: Pick<AppConfig, 'stateDir'>, integration: string): string {
  return join(config.stateDir, 'dedupe', `${integration}.json`)
}

export function resolveSecretsProvider(config: Pick<AppConfig, 'credentials'>): SecretsProvider {
  return config.credentials.file !== undefined
    ? new FileSecretsProvider(config.credentials.file)
    : new EnvSecretsProvider()
}

function buildIntegration(
  entry: IntegrationConfig,
  vaultPath: string,
  credentials: CredentialStore,
): Integration {
  switch (entry.kind) {
    case 'webhook':
      return new WebhookIntegration({ name: entry.name, url: entry.url, credentials })
    case 'file-drop':
      return new FileDropIntegration({
        name: entry.name,
        inbox: entry.inbox,
        plansDir: join(vaultPath, 'Plans'),
      })
  }
}

/** Builds every component from the loaded config. The vault must already be valid. */
export function createRuntime(config: AppConfig, overrides: RuntimeOverrides = {}): Runtime {
  const logger = overrides.logger ?? createLogger(config.logLevel)
  const store = new TaskStore(config.vault.path)
  const audit = new AuditLog(join(config.vault.path, 'Logs'), logger)
  const credentials = new CredentialStore(
    CREDENTIAL_SERVICE,
    overrides.secrets ?? resolveSecretsProvider(config),
    logger,
  )

  const integrations = new Map<string, Integration>()
  for (const entry of config.integrations) {
    integrations.set(entry.name, buildIntegration(entry, config.vault.path, credentials))
  }
  for (const integration of overrides.integrations ?? []) {
    integrations.set(integration.name, integration)
  }

  const queues = new Map<string, OperationQueue>()
  const queueFor = (source: string): OperationQueue => {
    let queue = queues.get(source)
    if (queue === undefined) {
      queue = new OperationQueue(queueDir(config), source, logger)
      queues.set(source, queue)
    }
    return queue
  }

  const channel =
    overrides.channel ??
    (config.discord !== undefined ? new DiscordChannel(config.discord) : undefined)

  const engine = new WorkflowEngine({
    store,
    audit,
    policy: buildPolicyRules(loadPolicyDocument(config.vault.path), config),
    executors: integrations,
    queueFor,
    channel,
    dashboard: new Dashboard(config.vault.path, store, logger),
    config,
    logger,
  })

  const intervalFor = (name: string): number =>
    config.integrations.find((entry) => entry.name === name)?.pollIntervalMs ?? config.pollIntervalMs

  return {
    config,
    logger,
    store,
    audit,
    credentials,
    integrations,
    engine,
    queueFor,
    watchers: () =>
      [...integrations.values()].map(
        (integration) =>
          new WatcherLoop({
            integration,
            engine,
            dedupe: new DedupeTracker(dedupeFile(config, integration.name), logger),
            intervalMs: intervalFor(integration.name),
            logger,
          }),
      ),
  }
}
