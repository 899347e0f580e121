import type { FastifyReply, FastifyRequest } from 'fastify'
import type { SessionService } from './session.js'
import type { Logger } from '../lib/logger.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Identity attached to authenticated requests. */
export interface RequestUser {
  id: number
  handle: string
  sid: string
}

export interface AuthMiddleware {
  requireAuth: (request: FastifyRequest, reply: FastifyReply) => Promise<void>
  optionalAuth: (request: FastifyRequest, reply: FastifyReply) => Promise<void>
}

declare module 'fastify' {
  interface FastifyRequest {
    /** Set by requireAuth / optionalAuth when a valid access token is presented. */
    user?: RequestUser
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Bearer token from the Authorization header, or undefined if absent or empty. */
function extractBearerToken(request: FastifyRequest): string | undefined {
  const authHeader = request.headers.authorization
  if (!authHeader?.startsWith('Bearer ')) {
    return undefined
  }

  const token = authHeader.slice('Bearer '.length).trim()
  return token.length > 0 ? token : undefined
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Create the preHandler hooks that resolve the viewer from a bearer token.
 *
 * `requireAuth` answers 401 for a missing or unknown token and 502 when the
 * session store is unreachable. `optionalAuth` never rejects: any failure
 * leaves the request anonymous.
 */
export function createAuthMiddleware(
  sessionService: SessionService,
  logger: Logger
): AuthMiddleware {
  async function resolveUser(token: string): Promise<RequestUser | undefined> {
    const session = await sessionService.validateAccessToken(token)
    if (!session) {
      return undefined
    }
    return { id: session.userId, handle: session.handle, sid: session.sid }
  }

  async function requireAuth(request: FastifyRequest, reply: FastifyReply): Promise<void> {
    const token = extractBearerToken(request)
    if (token === undefined) {
      await reply.status(401).send({ error: 'Authentication required' })
      return
    }

    try {
      const user = await resolveUser(token)
      if (!user) {
        await reply.status(401).send({ error: 'Invalid or expired token' })
        return
      }
      request.user = user
    } catch (err: unknown) {
      logger.error({ err }, 'Token validation failed in requireAuth')
      await reply.status(502).send({ error: 'Service temporarily unavailable' })
    }
  }

  async function optionalAuth(request: FastifyRequest, _reply: FastifyReply): Promise<void> {
    const token = extractBearerToken(request)
    if (token === undefined) {
      return
    }

    try {
      const user = await resolveUser(token)
      if (user) {
        request.user = user
      }
    } catch (err: unknown) {
      logger.warn({ err }, 'Token validation failed in optionalAuth, continuing anonymously')
    }
  }

  return { requireAuth, optionalAuth }
}
