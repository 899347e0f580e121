// ---------------------------------------------------------------------------
// Read-state comparison
// ---------------------------------------------------------------------------
// A discussion is read when either the viewer's explicit read mark or their
// board-wide watermark is at or after the discussion's last activity. Missing
// marks and watermarks count as "never". In-memory decisions go through
// isDiscussionRead; queries that filter on read state use readCondition,
// which states the same rule in SQL.
// ---------------------------------------------------------------------------

import { lte, not, or, sql } from "drizzle-orm";
import type { SQL } from "drizzle-orm";
import { discussions } from "../db/schema/discussions.js";
import { discussionReads } from "../db/schema/discussion-reads.js";

export interface ReadStateInput {
  lastActivityAt: Date;
  /** When the viewer last opened the discussion, or null if never. */
  markReadAt: Date | null;
  /** The viewer's watermark, or null if they never marked everything read. */
  watermark: Date | null;
}

export function isDiscussionRead({ lastActivityAt, markReadAt, watermark }: ReadStateInput): boolean {
  const activity = lastActivityAt.getTime();
  if (markReadAt !== null && markReadAt.getTime() >= activity) {
    return true;
  }
  return watermark !== null && watermark.getTime() >= activity;
}

/**
 * Condition over `discussions` matching the ones the user has read. Binds
 * the user id and the watermark only, whatever the number of read rows.
 */
export function readCondition(userId: number, watermark: Date | null): SQL {
  const marked = sql`EXISTS (SELECT 1 FROM ${discussionReads} WHERE ${discussionReads.discussionId} = ${discussions.id} AND ${discussionReads.userId} = ${userId} AND ${discussionReads.readAt} >= ${discussions.lastActivityAt})`;
  if (watermark === null) {
    return marked;
  }
  return or(marked, lte(discussions.lastActivityAt, watermark)) ?? marked;
}

export function unreadCondition(userId: number, watermark: Date | null): SQL {
  return not(readCondition(userId, watermark));
}
