/// <reference types="vitest/globals" />

import { REDACTED, sanitize, sanitizeObject, sanitizeText } from '../core/sanitize.js'

describe('sanitizeText', () => {
  it('redacts bearer tokens and keeps the scheme', () => {
    expect(sanitizeText('Authorization: Bearer abc.def-123')).toBe('Authorization: Bearer [REDACTED]')
  })

  it('redacts api keys in query strings and keeps the key name', () => {
    expect(sanitizeText('GET /v1/items?api_key=test-secret&page=2')).toBe(
      'GET /v1/items?api_key=[REDACTED]&page=2',
    )
  })

  it('redacts api-key headers written with a colon', () => {
    expect(sanitizeText('x-api-key: test-secret')).toBe('x-api-key: [REDACTED]')
  })

  it('redacts passwords and secrets', () => {
    expect(sanitizeText('password=hunter2 secret=test-secret')).toBe(
      'password=[REDACTED] secret=[REDACTED]',
    )
  })

  it('redacts quoted token values and leaves the closing quote', () => {
    expect(sanitizeText('{"access_token": "test-secret"}')).toBe('{"access_token": "[REDACTED]"}')
  })

  it('matches case-insensitively', () => {
    expect(sanitizeText('PASSWORD=hunter2')).toBe('PASSWORD=[REDACTED]')
  })

  it('leaves ordinary text alone', () => {
    expect(sanitizeText('Paid invoice 42 for $500')).toBe('Paid invoice 42 for $500')
  })
})

describe('sanitize', () => {
  it('rebuilds nested objects and arrays', () => {
    const input = {
      note: 'call with token=test-secret',
      items: ['ok', 'password=hunter2'],
      amount: 50,
      paid: false,
      memo: null,
    }

    expect(sanitize(input)).toEqual({
      note: 'call with token=[REDACTED]',
      items: ['ok', 'password=[REDACTED]'],
      amount: 50,
      paid: false,
      memo: null,
    })
  })

  it('does not mutate its input', () => {
    const input = { nested: { text: 'secret=test-secret' } }
    sanitize(input)
    expect(input.nested.text).toBe('secret=test-secret')
  })

  it('redacts string values under secret-named keys', () => {
    expect(
      sanitizeObject({ password: 'hunter2', apiKey: 'plain', refreshToken: 'abc', count: 3 }),
    ).toEqual({ password: REDACTED, apiKey: REDACTED, refreshToken: REDACTED, count: 3 })
  })

  it('redacts numbers and nested values under secret-named keys', () => {
    expect(
      sanitizeObject({
        password: 12345,
        token: { value: 'abc' },
        apiKeys: ['kept'],
        secret: ['abc', 'def'],
        authorization: null,
      }),
    ).toEqual({
      password: REDACTED,
      token: REDACTED,
      apiKeys: ['kept'],
      secret: REDACTED,
      authorization: null,
    })
  })

  it('passes non-string scalars through', () => {
    expect(sanitize(42)).toBe(42)
    expect(sanitize(true)).toBe(true)
    expect(sanitize(null)).toBe(null)
  })

  it('is idempotent', () => {
    const input = {
      header: 'Bearer abc123',
      url: 'https://api.example.test/?api_key=test-secret',
      list: [{ secret: 'x' }, 'token: test-secret'],
    }
    const once = sanitize(input)
    expect(sanitize(once)).toEqual(once)
  })
})
