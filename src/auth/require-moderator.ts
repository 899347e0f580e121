import type { FastifyReply, FastifyRequest } from 'fastify'
import { eq } from 'drizzle-orm'
import type { AuthMiddleware } from './middleware.js'
import type { Database } from '../db/index.js'
import type { Logger } from '../lib/logger.js'
import { users } from '../db/schema/users.js'
import { isModerator } from '../lib/viewer.js'

export type RequireModerator = (request: FastifyRequest, reply: FastifyReply) => Promise<void>

/**
 * Create a preHandler that admits moderators and admins only.
 *
 * Runs requireAuth first, then reads the caller's role from the database.
 * Answers 403 for any other role or a user row that no longer exists.
 */
export function createRequireModerator(
  db: Database,
  authMiddleware: AuthMiddleware,
  logger?: Logger
): RequireModerator {
  return async (request, reply) => {
    await authMiddleware.requireAuth(request, reply)
    if (reply.sent) {
      return
    }

    const user = request.user
    if (!user) {
      logger?.warn({ url: request.url, method: request.method }, 'Moderator access denied: no user after auth')
      await reply.status(403).send({ error: 'Moderator access required' })
      return
    }

    const rows = await db.select({ role: users.role }).from(users).where(eq(users.id, user.id))
    const row = rows[0]
    if (!row || !isModerator(row)) {
      logger?.warn(
        { userId: user.id, role: row?.role, url: request.url, method: request.method },
        'Moderator access denied: insufficient role'
      )
      await reply.status(403).send({ error: 'Moderator access required' })
      return
    }

    logger?.info(
      { userId: user.id, role: row.role, url: request.url, method: request.method },
      'Moderator access granted'
    )
  }
}
