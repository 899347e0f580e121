import { pgTable, serial, text, integer, timestamp, index } from "drizzle-orm/pg-core";
import { users } from "./users.js";
import { scripts } from "./scripts.js";
import { discussionCategories } from "./discussion-categories.js";

export const MODERATION_STATES = ["visible", "under_review", "removed"] as const;

export type ModerationState = (typeof MODERATION_STATES)[number];

export const discussions = pgTable(
  "discussions",
  {
    id: serial("id").primaryKey(),
    title: text("title").notNull(),
    posterId: integer("poster_id")
      .notNull()
      .references(() => users.id),
    scriptId: integer("script_id").references(() => scripts.id),
    discussionCategoryId: integer("discussion_category_id")
      .notNull()
      .references(() => discussionCategories.id),
    moderationState: text("moderation_state", { enum: MODERATION_STATES })
      .notNull()
      .default("visible"),
    /** Bumped by every new comment; drives ordering and read status. */
    lastActivityAt: timestamp("last_activity_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    removedAt: timestamp("removed_at", { withTimezone: true }),
  },
  (table) => [
    index("discussions_last_activity_at_idx").on(table.lastActivityAt, table.id),
    index("discussions_poster_id_idx").on(table.posterId),
    index("discussions_script_id_idx").on(table.scriptId),
    index("discussions_category_id_idx").on(table.discussionCategoryId),
    index("discussions_moderation_state_idx").on(table.moderationState),
  ],
);
