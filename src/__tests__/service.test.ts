/// <reference types="vitest/globals" />

import { rmSync, unlinkSync } from 'node:fs'
import { dirname, join } from 'node:path'

import type { NotificationChannel } from '../channels/channel.js'
import { defaultConfig, type AppConfig } from '../core/config.js'
import { EnvSecretsProvider, FileSecretsProvider } from '../core/credential-store.js'
import { InvalidStateError } from '../core/errors.js'
import {
  createRuntime,
  dedupeFile,
  queueDir,
  resolveSecretsProvider,
} from '../core/service.js'
import { POLICY_DOCUMENT } from '../core/vault.js'
import { FileDropIntegration } from '../integrations/file-drop.js'
import { WebhookIntegration } from '../integrations/webhook.js'
import { createTempVault, silentLogger } from './helpers.js'

describe('service wiring', () => {
  let root: string
  let config: AppConfig

  beforeEach(() => {
    root = createTempVault()
    config = {
      ...defaultConfig(),
      vault: { path: root },
      stateDir: join(dirname(root), 'state'),
      logLevel: 'silent',
      integrations: [
        { kind: 'webhook', name: 'billing', url: 'http://127.0.0.1:9/hook' },
        { kind: 'file-drop', name: 'inbox', inbox: join(dirname(root), 'Drop'), pollIntervalMs: 5_000 },
      ],
    }
  })

  afterEach(() => {
    rmSync(dirname(root), { recursive: true, force: true })
  })

  describe('path helpers', () => {
    it('keeps queues and dedupe state under the state dir', () => {
      expect(queueDir({ stateDir: '/var/vclerk' })).toBe(join('/var/vclerk', 'queues'))
      expect(dedupeFile({ stateDir: '/var/vclerk' }, 'inbox')).toBe(
        join('/var/vclerk', 'dedupe', 'inbox.json'),
      )
    })
  })

  describe('resolveSecretsProvider', () => {
    it('uses the environment when no credentials file is configured', () => {
      expect(resolveSecretsProvider({ credentials: {} })).toBeInstanceOf(EnvSecretsProvider)
    })

    it('uses the credentials file when configured', () => {
      expect(resolveSecretsProvider({ credentials: { file: '/tmp/creds.json' } })).toBeInstanceOf(
        FileSecretsProvider,
      )
    })
  })

  describe('createRuntime', () => {
    it('builds one integration per config entry', () => {
      const runtime = createRuntime(config, { logger: silentLogger })

      expect([...runtime.integrations.keys()]).toEqual(['billing', 'inbox'])
      expect(runtime.integrations.get('billing')).toBeInstanceOf(WebhookIntegration)
      expect(runtime.integrations.get('inbox')).toBeInstanceOf(FileDropIntegration)
    })

    it('lets an override replace a configured integration', () => {
      const execute = vi.fn(async () => ({}))
      const runtime = createRuntime(config, {
        logger: silentLogger,
        integrations: [{ name: 'billing', execute }],
      })

      expect(runtime.integrations.get('billing')).not.toBeInstanceOf(WebhookIntegration)
      expect(runtime.integrations.size).toBe(2)
    })

    it('returns the same queue for the same integration', () => {
      const runtime = createRuntime(config, { logger: silentLogger })

      expect(runtime.queueFor('billing')).toBe(runtime.queueFor('billing'))
      expect(runtime.queueFor('billing')).not.toBe(runtime.queueFor('inbox'))
      expect(runtime.queueFor('billing').integration).toBe('billing')
    })

    it('creates one watcher per integration', () => {
      const runtime = createRuntime(config, { logger: silentLogger })

      const watchers = runtime.watchers()

      expect(watchers.map((watcher) => watcher.integration.name)).toEqual(['billing', 'inbox'])
    })

    it('notifies through the supplied channel', async () => {
      const channel: NotificationChannel = {
        notifyPendingApproval: vi.fn(async () => {}),
        sendNotification: vi.fn(async () => {}),
      }
      const runtime = createRuntime(config, { logger: silentLogger, channel })

      const task = await runtime.engine.submit({ source: 'billing', type: 'send_email', payload: {} })

      expect(task.state).toBe('pending_approval')
      expect(channel.notifyPendingApproval).toHaveBeenCalledWith(task)
    })

    it('refuses to start without the policy document', () => {
      unlinkSync(join(root, POLICY_DOCUMENT))

      expect(() => createRuntime(config, { logger: silentLogger })).toThrow(InvalidStateError)
    })
  })
})
