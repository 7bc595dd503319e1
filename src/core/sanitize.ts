import type { JsonObject, JsonValue } from './types.js'

export const REDACTED = '[REDACTED]'

interface SensitivePattern {
  pattern: RegExp
  replacement: string
}

// Bearer runs first so that `token: Bearer abc` loses both the scheme value and the token.
const SENSITIVE_PATTERNS: readonly SensitivePattern[] = [
  { pattern: /\b(bearer\s+)[\w.~+/-]+=*/gi, replacement: `$1${REDACTED}` },
  {
    pattern: /\b([\w-]*api[_-]?key['"]?\s*[:=]\s*['"]?)[^\s'",;&]+/gi,
    replacement: `$1${REDACTED}`,
  },
  {
    pattern: /\b([\w-]*(?:password|passwd|secret)['"]?\s*[:=]\s*['"]?)[^\s'",;&]+/gi,
    replacement: `$1${REDACTED}`,
  },
  {
    pattern: /\b([\w-]*token['"]?\s*[:=]\s*['"]?)[^\s'",;&]+/gi,
    replacement: `$1${REDACTED}`,
  },
]

const SENSITIVE_KEY = /(?:password|passwd|secret|token|api[_-]?key|authorization)$/i

export function sanitizeText(text: string): string {
  let result = text
  for (const { pattern, replacement } of SENSITIVE_PATTERNS) {
    result = result.replace(pattern, replacement)
  }
  return result
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/** Anything held under a secret-named key is replaced whole, whatever its shape. */
function sanitizeEntry(key: string, value: unknown): unknown {
  if (value !== null && value !== undefined && SENSITIVE_KEY.test(key)) {
    return REDACTED
  }
  return sanitize(value)
}

/**
 * Rebuilds `value` with every string leaf scrubbed of credential-shaped substrings.
 * Mappings and sequences are copied; other scalars are returned as-is.
 */
export function sanitize(value: JsonValue): JsonValue
export function sanitize(value: unknown): unknown
export function sanitize(value: unknown): unknown {
  if (typeof value === 'string') return sanitizeText(value)
  if (Array.isArray(value)) return value.map((item: unknown) => sanitize(item))
  if (isPlainObject(value)) return sanitizeObject(value)
  return value
}

export function sanitizeObject(value: JsonObject): JsonObject
export function sanitizeObject(value: Record<string, unknown>): Record<string, unknown>
export function sanitizeObject(value: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {}
  for (const [key, entry] of Object.entries(value)) {
    result[key] = sanitizeEntry(key, entry)
  }
  return result
}
