import { pgTable, integer, timestamp, primaryKey, index } from 'drizzle-orm/pg-core'
import { users } from './users.js'
import { discussions } from './discussions.js'

/** Explicit "user has seen this discussion up to read_at" marks. */
export const discussionReads = pgTable(
  'discussion_reads',
  {
    userId: integer('user_id')
      .notNull()
      .references(() => users.id),
    discussionId: integer('discussion_id')
      .notNull()
      .references(() => discussions.id),
    readAt: timestamp('read_at', { withTimezone: true }).notNull(),
  },
  (table) => [
    primaryKey({ columns: [table.userId, table.discussionId] }),
    index('discussion_reads_discussion_id_idx').on(table.discussionId),
  ]
)
