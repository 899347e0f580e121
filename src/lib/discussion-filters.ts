import { and, eq, isNull, sql } from "drizzle-orm";
import type { SQL } from "drizzle-orm";
import type { Database } from "../db/index.js";
import { discussions } from "../db/schema/discussions.js";
import { discussionCategories } from "../db/schema/discussion-categories.js";
import { comments } from "../db/schema/comments.js";
import { scripts } from "../db/schema/scripts.js";
import { discussionSubscriptions } from "../db/schema/discussion-subscriptions.js";
import { users } from "../db/schema/users.js";
import { MAX_ID } from "../validation/discussions.js";
import { readCondition, unreadCondition } from "./read-state.js";
import type { Viewer } from "./viewer.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Category parameter selecting every category not tied to a script. */
export const NO_SCRIPTS_CATEGORY = "no-scripts";

export const RELATION_FILTERS = ["started", "comment", "script", "subscribed"] as const;
export const READ_STATUS_FILTERS = ["read", "unread"] as const;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type RelationFilter = (typeof RELATION_FILTERS)[number];
export type ReadStatusFilter = (typeof READ_STATUS_FILTERS)[number];

/** Outcome of one filter: either applied with the value it used, or not. */
export type FilterState<T> = { applied: true; value: T } | { applied: false };

export interface AppliedFilters {
  category: FilterState<string>;
  relation: FilterState<RelationFilter>;
  byUser: FilterState<number>;
  readStatus: FilterState<ReadStatusFilter>;
}

/** Raw filter parameters as they arrive on the query string. */
export interface DiscussionFilterParams {
  category?: string | undefined;
  me?: string | undefined;
  user?: string | undefined;
  read?: string | undefined;
}

export interface FilterResult {
  /** Conditions over `discussions`: the base set plus every applied filter. */
  conditions: SQL[];
  applied: AppliedFilters;
}

export interface FilterDeps {
  db: Database;
}

const NOT_APPLIED = { applied: false } as const;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isRelationFilter(value: string): value is RelationFilter {
  return RELATION_FILTERS.some((filter) => filter === value);
}

function isReadStatusFilter(value: string): value is ReadStatusFilter {
  return READ_STATUS_FILTERS.some((filter) => filter === value);
}

/** Parse a user id parameter. Only plain integers in the id column's range are accepted. */
export function parseUserId(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value)) return undefined;
  const id = Number(value);
  return Number.isSafeInteger(id) && id > 0 && id <= MAX_ID ? id : undefined;
}

/** Discussions with at least one live comment by the given user. */
function commentedBy(userId: number): SQL {
  return sql`EXISTS (SELECT 1 FROM ${comments} WHERE ${comments.discussionId} = ${discussions.id} AND ${comments.posterId} = ${userId} AND ${isNull(comments.deletedAt)})`;
}

function relationCondition(relation: RelationFilter, viewer: Viewer): SQL {
  switch (relation) {
    case "started":
      return eq(discussions.posterId, viewer.id);
    case "comment":
      return commentedBy(viewer.id);
    case "script":
      return sql`${discussions.scriptId} IN (SELECT ${scripts.id} FROM ${scripts} WHERE ${scripts.authorId} = ${viewer.id})`;
    case "subscribed":
      return sql`EXISTS (SELECT 1 FROM ${discussionSubscriptions} WHERE ${discussionSubscriptions.discussionId} = ${discussions.id} AND ${discussionSubscriptions.userId} = ${viewer.id})`;
  }
}

/**
 * True when mark-all-read should be scoped to the filtered discussions
 * rather than move the viewer's watermark. Read status does not count: it
 * narrows by read state, not by which part of the board is in view.
 */
export function hasNarrowingFilter(applied: AppliedFilters): boolean {
  return applied.category.applied || applied.relation.applied || applied.byUser.applied;
}

/** Combine a condition list into a single WHERE clause. */
export function whereOf(conditions: SQL[]): SQL | undefined {
  return conditions.length > 0 ? and(...conditions) : undefined;
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

/**
 * Narrow a base set of discussions by the optional listing filters.
 *
 * Filters run in a fixed order: category, relation to the viewer, commenter,
 * then read status. Unknown or malformed parameter values are skipped and
 * reported as not applied; relation and read-status filters need a viewer.
 *
 * @param base - Visibility conditions the result must keep.
 */
export async function applyDiscussionFilters(
  deps: FilterDeps,
  viewer: Viewer | undefined,
  params: DiscussionFilterParams,
  base: SQL[],
): Promise<FilterResult> {
  const { db } = deps;
  const conditions = [...base];

  let category: FilterState<string> = NOT_APPLIED;
  if (params.category === NO_SCRIPTS_CATEGORY) {
    conditions.push(
      sql`${discussions.discussionCategoryId} IN (SELECT ${discussionCategories.id} FROM ${discussionCategories} WHERE ${discussionCategories.scriptless} = true)`,
    );
    category = { applied: true, value: NO_SCRIPTS_CATEGORY };
  } else if (params.category) {
    const rows = await db
      .select({ id: discussionCategories.id })
      .from(discussionCategories)
      .where(eq(discussionCategories.categoryKey, params.category));
    const found = rows[0];
    if (found) {
      conditions.push(eq(discussions.discussionCategoryId, found.id));
      category = { applied: true, value: params.category };
    }
  }

  let relation: FilterState<RelationFilter> = NOT_APPLIED;
  if (viewer && params.me !== undefined && isRelationFilter(params.me)) {
    conditions.push(relationCondition(params.me, viewer));
    relation = { applied: true, value: params.me };
  }

  let byUser: FilterState<number> = NOT_APPLIED;
  const userId = parseUserId(params.user);
  if (userId !== undefined) {
    const rows = await db.select({ id: users.id }).from(users).where(eq(users.id, userId));
    if (rows[0]) {
      conditions.push(commentedBy(userId));
      byUser = { applied: true, value: userId };
    }
  }

  let readStatusFilter: FilterState<ReadStatusFilter> = NOT_APPLIED;
  if (viewer && params.read !== undefined && isReadStatusFilter(params.read)) {
    conditions.push(
      params.read === "read"
        ? readCondition(viewer.id, viewer.discussionsReadSince)
        : unreadCondition(viewer.id, viewer.discussionsReadSince),
    );
    readStatusFilter = { applied: true, value: params.read };
  }

  return {
    conditions,
    applied: { category, relation, byUser, readStatus: readStatusFilter },
  };
}
