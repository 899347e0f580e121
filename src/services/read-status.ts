import { and, eq, isNotNull, lte, or, sql } from "drizzle-orm";
import type { SQL } from "drizzle-orm";
import type { Database } from "../db/index.js";
import type { Logger } from "../lib/logger.js";
import { discussions } from "../db/schema/discussions.js";
import { discussionReads } from "../db/schema/discussion-reads.js";
import { users } from "../db/schema/users.js";
import { isDiscussionRead } from "../lib/read-state.js";
import { hasNarrowingFilter, whereOf } from "../lib/discussion-filters.js";
import type { FilterResult } from "../lib/discussion-filters.js";
import type { Viewer } from "../lib/viewer.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Rows per INSERT when materialising read marks (3 bind params per row). */
const READ_MARK_BATCH_SIZE = 5000;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** The part of a viewer the read rules look at. */
export type ReadStateViewer = Pick<Viewer, "id" | "discussionsReadSince">;

export type MarkAllReadResult =
  | { strategy: "read-marks"; marked: number }
  | { strategy: "watermark"; readSince: Date };

export interface ReadStatusService {
  /** Upsert the viewer's read mark for one discussion. */
  recordView(userId: number, discussionId: number, now: Date): Promise<void>;

  /**
   * Ids of the read discussions among the candidates selected by `candidates`
   * (a WHERE clause over `discussions`; undefined means every discussion).
   */
  readIds(candidates: SQL | undefined, viewer: ReadStateViewer): Promise<Set<number>>;

  /**
   * Mark the filtered discussions as read. Scoped filters write one read mark
   * per matching discussion; an unfiltered request moves the viewer's
   * watermark instead.
   */
  markAllRead(viewer: ReadStateViewer, filter: FilterResult, now: Date): Promise<MarkAllReadResult>;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

// Keeps the later of the stored and incoming read_at, so a slow writer with
// an older timestamp cannot make a discussion unread again.
const LATEST_READ_AT = sql`GREATEST(${discussionReads.readAt}, excluded.read_at)`;

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createReadStatusService(db: Database, logger: Logger): ReadStatusService {
  async function recordView(userId: number, discussionId: number, now: Date): Promise<void> {
    await db
      .insert(discussionReads)
      .values({ userId, discussionId, readAt: now })
      .onConflictDoUpdate({
        target: [discussionReads.userId, discussionReads.discussionId],
        set: { readAt: LATEST_READ_AT },
      });

    logger.debug({ userId, discussionId }, "Discussion view recorded");
  }

  async function readIds(candidates: SQL | undefined, viewer: ReadStateViewer): Promise<Set<number>> {
    const watermark = viewer.discussionsReadSince;

    // Only rows that could be read: a mark exists, or activity is under the watermark.
    const possiblyRead = watermark
      ? or(isNotNull(discussionReads.readAt), lte(discussions.lastActivityAt, watermark))
      : isNotNull(discussionReads.readAt);

    const rows = await db
      .select({
        id: discussions.id,
        lastActivityAt: discussions.lastActivityAt,
        readAt: discussionReads.readAt,
      })
      .from(discussions)
      .leftJoin(
        discussionReads,
        and(
          eq(discussionReads.discussionId, discussions.id),
          eq(discussionReads.userId, viewer.id),
        ),
      )
      .where(candidates ? and(candidates, possiblyRead) : possiblyRead);

    const read = new Set<number>();
    for (const row of rows) {
      if (isDiscussionRead({ lastActivityAt: row.lastActivityAt, markReadAt: row.readAt, watermark })) {
        read.add(row.id);
      }
    }
    return read;
  }

  async function markAllRead(
    viewer: ReadStateViewer,
    filter: FilterResult,
    now: Date,
  ): Promise<MarkAllReadResult> {
    if (!hasNarrowingFilter(filter.applied)) {
      await db
        .update(users)
        .set({
          discussionsReadSince: sql`GREATEST(${users.discussionsReadSince}, ${now.toISOString()}::timestamptz)`,
        })
        .where(eq(users.id, viewer.id));

      logger.info({ userId: viewer.id, readSince: now.toISOString() }, "Read watermark advanced");
      return { strategy: "watermark", readSince: now };
    }

    const rows = await db
      .select({ id: discussions.id })
      .from(discussions)
      .where(whereOf(filter.conditions));

    if (rows.length > 0) {
      const marks = rows.map((row) => ({ userId: viewer.id, discussionId: row.id, readAt: now }));
      await db.transaction(async (tx) => {
        for (const batch of chunk(marks, READ_MARK_BATCH_SIZE)) {
          await tx
            .insert(discussionReads)
            .values(batch)
            .onConflictDoUpdate({
              target: [discussionReads.userId, discussionReads.discussionId],
              set: { readAt: LATEST_READ_AT },
            });
        }
      });
    }

    logger.info({ userId: viewer.id, marked: rows.length }, "Filtered discussions marked as read");
    return { strategy: "read-marks", marked: rows.length };
  }

  return { recordView, readIds, markAllRead };
}
