import { pgTable, serial, text, boolean, uniqueIndex } from 'drizzle-orm/pg-core'

export const discussionCategories = pgTable(
  'discussion_categories',
  {
    id: serial('id').primaryKey(),
    categoryKey: text('category_key').notNull(),
    name: text('name').notNull(),
    /** Category for discussions that are not about a particular script. */
    scriptless: boolean('scriptless').notNull().default(false),
  },
  (table) => [uniqueIndex('discussion_categories_category_key_idx').on(table.categoryKey)]
)
