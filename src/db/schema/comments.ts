import { pgTable, serial, text, integer, boolean, timestamp, index } from "drizzle-orm/pg-core";
import { users } from "./users.js";
import { discussions } from "./discussions.js";

export const comments = pgTable(
  "comments",
  {
    id: serial("id").primaryKey(),
    discussionId: integer("discussion_id")
      .notNull()
      .references(() => discussions.id),
    posterId: integer("poster_id")
      .notNull()
      .references(() => users.id),
    text: text("text").notNull(),
    firstComment: boolean("first_comment").notNull().default(false),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    deletedAt: timestamp("deleted_at", { withTimezone: true }),
  },
  (table) => [
    index("comments_discussion_id_idx").on(table.discussionId),
    index("comments_poster_id_discussion_id_idx").on(table.posterId, table.discussionId),
  ],
);
