// ---------------------------------------------------------------------------
// Discussion visibility
// ---------------------------------------------------------------------------
// Decides which discussions a viewer may list or open. Two independent rules
// combine: the moderation state of the discussion, and the deployment's
// content partition, which splits discussions by the sensitivity of the
// script they are about. Discussions without a script pass every partition.
// ---------------------------------------------------------------------------

import { and, eq, inArray, isNull, or, sql } from "drizzle-orm";
import type { SQL } from "drizzle-orm";
import { discussions } from "../db/schema/discussions.js";
import type { ModerationState } from "../db/schema/discussions.js";
import { scripts } from "../db/schema/scripts.js";
import { isModerator } from "./viewer.js";
import type { Viewer } from "./viewer.js";

export const CONTENT_PARTITIONS = ["sensitive", "non-sensitive", "all"] as const;

export type ContentPartition = (typeof CONTENT_PARTITIONS)[number];

/** Which moderation states a resolved rule lets through. */
export type ModerationScope =
  | { kind: "visible-only" }
  | { kind: "include-under-review" }
  | { kind: "include-own-under-review"; posterId: number };

export interface DiscussionVisibility {
  partition: ContentPartition;
  moderation: ModerationScope;
}

/** The fields of a discussion row the visibility rule looks at. */
export interface VisibilitySubject {
  moderationState: ModerationState;
  posterId: number;
  /** Sensitivity of the discussion's script, or null if it has none. */
  scriptSensitive: boolean | null;
}

function isContentPartition(value: string): value is ContentPartition {
  return CONTENT_PARTITIONS.some((partition) => partition === value);
}

/**
 * Resolve the visibility rule for a viewer.
 *
 * With `permissive`, moderators also see every discussion under review and
 * other signed-in viewers see the ones they posted. Removed discussions are
 * never visible.
 *
 * @throws Error when `partition` is not a known partition. This is a
 *   configuration fault, not a client error.
 */
export function resolveVisibility(
  viewer: Viewer | undefined,
  partition: ContentPartition,
  permissive = false,
): DiscussionVisibility {
  if (!isContentPartition(partition)) {
    throw new Error(`Unknown content partition: ${String(partition)}`);
  }

  if (!permissive || !viewer) {
    return { partition, moderation: { kind: "visible-only" } };
  }
  if (isModerator(viewer)) {
    return { partition, moderation: { kind: "include-under-review" } };
  }
  return { partition, moderation: { kind: "include-own-under-review", posterId: viewer.id } };
}

function moderationCondition(scope: ModerationScope): SQL {
  switch (scope.kind) {
    case "visible-only":
      return eq(discussions.moderationState, "visible");
    case "include-under-review":
      return inArray(discussions.moderationState, ["visible", "under_review"]);
    case "include-own-under-review":
      return or(
        eq(discussions.moderationState, "visible"),
        and(
          eq(discussions.moderationState, "under_review"),
          eq(discussions.posterId, scope.posterId),
        ),
      ) ?? sql`false`;
  }
}

function partitionCondition(partition: ContentPartition): SQL | undefined {
  switch (partition) {
    case "all":
      return undefined;
    case "sensitive":
      return or(
        isNull(discussions.scriptId),
        sql`EXISTS (SELECT 1 FROM ${scripts} WHERE ${scripts.id} = ${discussions.scriptId} AND ${scripts.sensitive} = true)`,
      );
    case "non-sensitive":
      return or(
        isNull(discussions.scriptId),
        sql`EXISTS (SELECT 1 FROM ${scripts} WHERE ${scripts.id} = ${discussions.scriptId} AND ${scripts.sensitive} = false)`,
      );
  }
}

/** SQL conditions over `discussions` implementing a resolved rule. */
export function visibilityConditions(visibility: DiscussionVisibility): SQL[] {
  const conditions = [moderationCondition(visibility.moderation)];
  const partition = partitionCondition(visibility.partition);
  if (partition) {
    conditions.push(partition);
  }
  return conditions;
}

/** In-memory check of a single, already loaded discussion. */
export function isVisibleTo(visibility: DiscussionVisibility, subject: VisibilitySubject): boolean {
  const { moderation, partition } = visibility;

  switch (subject.moderationState) {
    case "removed":
      return false;
    case "under_review":
      if (moderation.kind === "visible-only") return false;
      if (moderation.kind === "include-own-under-review" && moderation.posterId !== subject.posterId) {
        return false;
      }
      break;
    case "visible":
      break;
  }

  if (subject.scriptSensitive === null) return true;
  switch (partition) {
    case "all":
      return true;
    case "sensitive":
      return subject.scriptSensitive;
    case "non-sensitive":
      return !subject.scriptSensitive;
  }
}
