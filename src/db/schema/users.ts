import { pgTable, serial, text, timestamp, index } from 'drizzle-orm/pg-core'
import { sql } from 'drizzle-orm'

export const users = pgTable(
  'users',
  {
    id: serial('id').primaryKey(),
    name: text('name').notNull(),
    role: text('role', { enum: ['user', 'moderator', 'admin'] })
      .notNull()
      .default('user'),
    /**
     * Read watermark: every discussion whose last activity is at or before
     * this instant counts as read, whatever the per-discussion read marks say.
     */
    discussionsReadSince: timestamp('discussions_read_since', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('users_role_elevated_idx')
      .on(table.role)
      .where(sql`role IN ('moderator', 'admin')`),
  ]
)

export type UserRole = (typeof users.$inferSelect)['role']
