import { pgTable, integer, timestamp, primaryKey } from 'drizzle-orm/pg-core'
import { users } from './users.js'
import { discussions } from './discussions.js'

export const discussionSubscriptions = pgTable(
  'discussion_subscriptions',
  {
    userId: integer('user_id')
      .notNull()
      .references(() => users.id),
    discussionId: integer('discussion_id')
      .notNull()
      .references(() => discussions.id),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [primaryKey({ columns: [table.userId, table.discussionId] })]
)
