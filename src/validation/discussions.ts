import { z } from "zod/v4";

// ---------------------------------------------------------------------------
// Shared pieces
// ---------------------------------------------------------------------------

/**
 * Filter parameters never fail validation: anything that is not a single
 * string (e.g. a repeated query key) is dropped and the filter is skipped.
 */
const filterParam = z.string().optional().catch(undefined);

/** Largest value of a Postgres integer column. */
export const MAX_ID = 2147483647;

const idFromString = z
  .string()
  .regex(/^\d+$/, "Id must be a positive integer")
  .transform((val) => Number(val))
  .pipe(z.number().int().positive().max(MAX_ID));

// ---------------------------------------------------------------------------
// Query schemas
// ---------------------------------------------------------------------------

/** Filters shared by listing and mark-all-read. */
export const discussionFilterQuerySchema = z.object({
  category: filterParam,
  me: filterParam,
  user: filterParam,
  read: filterParam,
});

export type DiscussionFilterQuery = z.infer<typeof discussionFilterQuerySchema>;

/** Schema for listing discussions with cursor pagination. */
export const discussionQuerySchema = discussionFilterQuerySchema.extend({
  cursor: z.string().optional(),
  limit: z
    .string()
    .transform((val) => Number(val))
    .pipe(z.number().int().min(1).max(100))
    .optional()
    .default(25),
});

export type DiscussionQueryInput = z.infer<typeof discussionQuerySchema>;

// ---------------------------------------------------------------------------
// Params and bodies
// ---------------------------------------------------------------------------

export const discussionParamsSchema = z.object({
  id: idFromString,
});

export const scriptParamsSchema = z.object({
  scriptId: idFromString,
});

/** Moderators move discussions in and out of review; removal has its own route. */
export const moderationUpdateSchema = z.object({
  state: z.enum(["visible", "under_review"]),
});

export type ModerationUpdateInput = z.infer<typeof moderationUpdateSchema>;
