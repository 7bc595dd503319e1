import { readFileSync } from 'node:fs'
import { join } from 'node:path'

import type { AppConfig } from './config.js'
import { InvalidStateError, isErrnoException } from './errors.js'
import type { JsonObject } from './types.js'
import { POLICY_DOCUMENT } from './vault.js'

export type Classification = 'auto_approve' | 'require_approval'

export interface ClassificationResult {
  classification: Classification
  reason: string
}

export interface PolicyDocument {
  thresholds: Record<string, number>
  autoApprove: string[]
  requireApproval: string[]
}

export interface PolicyRules {
  requireApproval: Record<string, boolean>
  defaultRequireApproval: boolean
  thresholds: Record<string, number>
}

type Section = 'thresholds' | 'autoApprove' | 'requireApproval'

const HEADING = /^#{1,6}\s+(.+?)\s*$/
const BULLET = /^\s*[-*]\s+(.+?)\s*$/
const THRESHOLD_ENTRY = /^([\w\s-]+?)\s*:\s*\$?\s*([\d,]+(?:\.\d+)?)\b/

export function normalizeActionType(name: string): string {
  return name.trim().toLowerCase().replace(/[\s-]+/g, '_')
}

function sectionFor(heading: string): Section | null {
  const normalized = normalizeActionType(heading)
  if (normalized.startsWith('approval_thresholds')) return 'thresholds'
  if (normalized.startsWith('auto_approve_actions')) return 'autoApprove'
  if (normalized.startsWith('require_approval_actions')) return 'requireApproval'
  return null
}

/**
 * Reads the "Approval Thresholds", "Auto-Approve Actions" and "Require-Approval Actions"
 * sections of the handbook. Anything else in the document is ignored.
 */
export function parsePolicyDocument(markdown: string): PolicyDocument {
  const document: PolicyDocument = { thresholds: {}, autoApprove: [], requireApproval: [] }
  let section: Section | null = null

  for (const line of markdown.split(/\r?\n/)) {
    const heading = HEADING.exec(line)
    if (heading) {
      section = sectionFor(heading[1])
      continue
    }
    const bullet = BULLET.exec(line)
    if (!bullet || section === null) continue

    if (section === 'thresholds') {
      const entry = THRESHOLD_ENTRY.exec(bullet[1])
      if (!entry) continue
      const value = Number(entry[2].replace(/,/g, ''))
      if (Number.isFinite(value)) {
        document.thresholds[normalizeActionType(entry[1])] = value
      }
    } else {
      document[section].push(normalizeActionType(bullet[1]))
    }
  }

  return document
}

export function loadPolicyDocument(vaultRoot: string): PolicyDocument {
  const path = join(vaultRoot, POLICY_DOCUMENT)
  let markdown: string
  try {
    markdown = readFileSync(path, 'utf-8')
  } catch (err: unknown) {
    if (isErrnoException(err) && err.code === 'ENOENT') {
      throw new InvalidStateError(`Policy document missing: ${POLICY_DOCUMENT}`)
    }
    throw err
  }
  return parsePolicyDocument(markdown)
}

/** Config entries override what the handbook says for the same action type. */
export function buildPolicyRules(
  document: PolicyDocument,
  config: Pick<AppConfig, 'requireApproval' | 'defaultRequireApproval'>,
): PolicyRules {
  const requireApproval: Record<string, boolean> = {}
  for (const action of document.autoApprove) requireApproval[action] = false
  for (const action of document.requireApproval) requireApproval[action] = true
  for (const [action, value] of Object.entries(config.requireApproval)) {
    requireApproval[normalizeActionType(action)] = value
  }
  return {
    requireApproval,
    defaultRequireApproval: config.defaultRequireApproval,
    thresholds: { ...document.thresholds },
  }
}

function amountOf(payload: JsonObject): number | null {
  const raw = payload.amount
  if (typeof raw === 'number') return Number.isFinite(raw) ? raw : null
  if (typeof raw === 'string') {
    const cleaned = raw.replace(/[$,\s]/g, '')
    if (cleaned === '') return null
    const value = Number(cleaned)
    return Number.isFinite(value) ? value : null
  }
  return null
}

export function classify(
  task: { type: string; payload: JsonObject },
  rules: PolicyRules,
): ClassificationResult {
  const type = normalizeActionType(task.type)
  const explicit = Object.hasOwn(rules.requireApproval, type)
    ? rules.requireApproval[type]
    : undefined

  if (explicit === true) {
    return { classification: 'require_approval', reason: `${type} always requires approval` }
  }

  const amount = amountOf(task.payload)
  const thresholdName = Object.hasOwn(rules.thresholds, type) ? type : 'default'
  const threshold = Object.hasOwn(rules.thresholds, thresholdName)
    ? rules.thresholds[thresholdName]
    : undefined
  if (amount !== null && threshold !== undefined) {
    if (amount > threshold) {
      return {
        classification: 'require_approval',
        reason: `amount ${amount} exceeds ${thresholdName} threshold ${threshold}`,
      }
    }
    return {
      classification: 'auto_approve',
      reason: `amount ${amount} within ${thresholdName} threshold ${threshold}`,
    }
  }

  if (explicit === false) {
    return { classification: 'auto_approve', reason: `${type} is auto-approved` }
  }

  return rules.defaultRequireApproval
    ? { classification: 'require_approval', reason: 'approval required by default' }
    : { classification: 'auto_approve', reason: 'auto-approved by default' }
}
