import { eq } from 'drizzle-orm'
import type { Database } from '../db/index.js'
import type { RequestUser } from '../auth/middleware.js'
import { users } from '../db/schema/users.js'
import type { UserRole } from '../db/schema/users.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * The signed-in user a request acts for, with the state the visibility and
 * read-status rules need. Passed explicitly down the listing pipeline.
 */
export interface Viewer {
  id: number
  role: UserRole
  discussionsReadSince: Date | null
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function isModerator(viewer: Pick<Viewer, 'role'>): boolean {
  return viewer.role === 'moderator' || viewer.role === 'admin'
}

/**
 * Load the viewer for an authenticated request.
 *
 * Returns undefined when the request is anonymous, or when the session
 * points at a user row that no longer exists.
 */
export async function loadViewer(
  db: Database,
  requestUser: RequestUser | undefined
): Promise<Viewer | undefined> {
  if (!requestUser) {
    return undefined
  }

  const rows = await db
    .select({
      id: users.id,
      role: users.role,
      discussionsReadSince: users.discussionsReadSince,
    })
    .from(users)
    .where(eq(users.id, requestUser.id))

  return rows[0]
}
