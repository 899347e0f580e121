import { pgTable, serial, text, integer, boolean, timestamp, index } from 'drizzle-orm/pg-core'
import { users } from './users.js'

export const scripts = pgTable(
  'scripts',
  {
    id: serial('id').primaryKey(),
    name: text('name').notNull(),
    authorId: integer('author_id')
      .notNull()
      .references(() => users.id),
    sensitive: boolean('sensitive').notNull().default(false),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    /** Set when the author deletes the script; its discussions are no longer served. */
    deletedAt: timestamp('deleted_at', { withTimezone: true }),
  },
  (table) => [
    index('scripts_author_id_idx').on(table.authorId),
    index('scripts_sensitive_idx').on(table.sensitive),
  ]
)
