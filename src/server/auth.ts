import { createHash, randomBytes, timingSafeEqual } from 'node:crypto'

import fp from 'fastify-plugin'
import type { FastifyInstance } from 'fastify'

declare module 'fastify' {
  interface FastifyContextConfig {
    /** Served without a bearer token. */
    public?: boolean
  }
}

const BEARER = /^Bearer +(\S+)$/

export function generateAuthToken(): string {
  return randomBytes(32).toString('hex')
}

/** Compares SHA-256 digests in constant time, so neither content nor length leaks. */
export function tokensMatch(expected: string, provided: string): boolean {
  const digest = (value: string) => createHash('sha256').update(value, 'utf-8').digest()
  return timingSafeEqual(digest(expected), digest(provided))
}

export interface BearerAuthOptions {
  token: string
}

export const bearerAuth = fp(
  async (app: FastifyInstance, { token }: BearerAuthOptions) => {
    if (token === '') {
      throw new Error('server.authToken must be configured. Run `vclerk token generate` to create one.')
    }

    app.addHook('onRequest', async (request, reply) => {
      if (request.routeOptions.config.public === true) return

      const provided = BEARER.exec(request.headers.authorization ?? '')?.[1]
      if (provided === undefined || !tokensMatch(token, provided)) {
        return reply.code(401).send({ error: 'Invalid or missing auth token', statusCode: 401 })
      }
    })
  },
  { name: 'vclerk-bearer-auth' },
)
