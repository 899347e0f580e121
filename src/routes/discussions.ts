import { and, desc, eq, inArray, isNull, ne, sql } from "drizzle-orm";
import type { SQL } from "drizzle-orm";
import type { FastifyPluginCallback, FastifyRequest } from "fastify";
import { badRequest, notFound, serviceUnavailable, unauthorized } from "../lib/api-errors.js";
import { loadViewer } from "../lib/viewer.js";
import type { RequestUser } from "../auth/middleware.js";
import type { Viewer } from "../lib/viewer.js";
import { resolveVisibility, visibilityConditions, isVisibleTo } from "../lib/visibility.js";
import { applyDiscussionFilters, whereOf } from "../lib/discussion-filters.js";
import type { AppliedFilters, FilterResult, FilterState } from "../lib/discussion-filters.js";
import { createReadStatusService } from "../services/read-status.js";
import type { MarkAllReadResult } from "../services/read-status.js";
import type { DiscussionQueryInput } from "../validation/discussions.js";
import {
  MAX_ID,
  discussionFilterQuerySchema,
  discussionParamsSchema,
  discussionQuerySchema,
  moderationUpdateSchema,
  scriptParamsSchema,
} from "../validation/discussions.js";
import { discussions } from "../db/schema/discussions.js";
import { discussionSubscriptions } from "../db/schema/discussion-subscriptions.js";
import { scripts } from "../db/schema/scripts.js";

// ---------------------------------------------------------------------------
// OpenAPI JSON Schema definitions
// ---------------------------------------------------------------------------

const discussionJsonSchema = {
  type: "object" as const,
  properties: {
    id: { type: "integer" as const },
    title: { type: "string" as const },
    posterId: { type: "integer" as const },
    scriptId: { type: ["integer", "null"] as const },
    discussionCategoryId: { type: "integer" as const },
    moderationState: { type: "string" as const, enum: ["visible", "under_review", "removed"] },
    isRead: { type: ["boolean", "null"] as const },
    lastActivityAt: { type: "string" as const, format: "date-time" as const },
    createdAt: { type: "string" as const, format: "date-time" as const },
  },
};

const activeFiltersJsonSchema = {
  type: "object" as const,
  properties: {
    category: { type: ["string", "null"] as const },
    me: { type: ["string", "null"] as const },
    user: { type: ["integer", "null"] as const },
    read: { type: ["string", "null"] as const },
  },
};

// Filter values carry no type: malformed values are skipped, not rejected.
const filterQueryProperties = {
  category: { description: "Category key, or 'no-scripts'" },
  me: { description: "started | comment | script | subscribed" },
  user: { description: "Id of a user who commented" },
  read: { description: "read | unread" },
};

const idParamsJsonSchema = {
  type: "object" as const,
  required: ["id"],
  properties: {
    id: { type: "string" as const },
  },
};

const scriptParamsJsonSchema = {
  type: "object" as const,
  required: ["scriptId"],
  properties: {
    scriptId: { type: "string" as const },
  },
};

const listQueryJsonSchema = {
  type: "object" as const,
  properties: {
    cursor: { type: "string" as const },
    limit: { type: "string" as const },
    ...filterQueryProperties,
  },
};

const listResponseJsonSchema = {
  type: "object" as const,
  properties: {
    discussions: { type: "array" as const, items: discussionJsonSchema },
    filters: activeFiltersJsonSchema,
    cursor: { type: ["string", "null"] as const },
  },
};

const errorJsonSchema = {
  type: "object" as const,
  properties: {
    error: { type: "string" as const },
  },
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function serializeDiscussion(row: typeof discussions.$inferSelect, isRead: boolean | null) {
  return {
    id: row.id,
    title: row.title,
    posterId: row.posterId,
    scriptId: row.scriptId ?? null,
    discussionCategoryId: row.discussionCategoryId,
    moderationState: row.moderationState,
    isRead,
    lastActivityAt: row.lastActivityAt.toISOString(),
    createdAt: row.createdAt.toISOString(),
  };
}

function filterValue<T>(state: FilterState<T>): T | null {
  return state.applied ? state.value : null;
}

/** Active filter values, for rendering the filter UI. */
function describeFilters(applied: AppliedFilters) {
  return {
    category: filterValue(applied.category),
    me: filterValue(applied.relation),
    user: filterValue(applied.byUser),
    read: filterValue(applied.readStatus),
  };
}

/**
 * Encode a pagination cursor from lastActivityAt + id.
 */
function encodeCursor(lastActivityAt: string, id: number): string {
  return Buffer.from(JSON.stringify({ lastActivityAt, id })).toString("base64");
}

/**
 * Decode a pagination cursor. Returns null if invalid.
 */
function decodeCursor(cursor: string): { lastActivityAt: string; id: number } | null {
  try {
    const decoded = JSON.parse(Buffer.from(cursor, "base64").toString("utf-8")) as Record<string, unknown>;
    const { lastActivityAt, id } = decoded;
    if (
      typeof lastActivityAt === "string" &&
      !Number.isNaN(Date.parse(lastActivityAt)) &&
      typeof id === "number" &&
      Number.isInteger(id) &&
      id > 0 &&
      id <= MAX_ID
    ) {
      return { lastActivityAt, id };
    }
    return null;
  } catch {
    return null;
  }
}

function parseId(request: FastifyRequest): number {
  const parsed = discussionParamsSchema.safeParse(request.params);
  if (!parsed.success) {
    throw badRequest("Invalid discussion id");
  }
  return parsed.data.id;
}

function parseScriptId(request: FastifyRequest): number {
  const parsed = scriptParamsSchema.safeParse(request.params);
  if (!parsed.success) {
    throw badRequest("Invalid script id");
  }
  return parsed.data.scriptId;
}

// ---------------------------------------------------------------------------
// Discussion routes plugin
// ---------------------------------------------------------------------------

/**
 * Discussion listing and read tracking.
 *
 * - GET    /api/discussions                      -- List discussions (filtered, paginated)
 * - GET    /api/scripts/:scriptId/discussions    -- List the discussions about one script
 * - GET    /api/discussions/:id                  -- Get a discussion and record the view
 * - POST   /api/discussions/mark-read            -- Mark listed discussions as read
 * - PUT    /api/discussions/:id/subscription     -- Subscribe
 * - DELETE /api/discussions/:id/subscription     -- Unsubscribe
 * - PUT    /api/discussions/:id/moderation       -- Put in or take out of review (moderator)
 * - DELETE /api/discussions/:id                  -- Soft delete (moderator)
 */
export function discussionRoutes(): FastifyPluginCallback {
  return (app, _opts, done) => {
    const { db, env, authMiddleware, requireModerator } = app;
    const readStatus = createReadStatusService(db, app.log);

    /** Viewer for a route behind requireAuth; a session for a deleted user is rejected. */
    async function requireViewer(request: FastifyRequest): Promise<Viewer> {
      const viewer = await loadViewer(db, request.user);
      if (!viewer) {
        throw unauthorized("Authentication required");
      }
      return viewer;
    }

    /** Id of a discussion the viewer may see in listings, or a 404. */
    async function findListedDiscussion(id: number, viewer: Viewer): Promise<number> {
      const visibility = resolveVisibility(viewer, env.CONTENT_PARTITION);
      const rows = await db
        .select({ id: discussions.id })
        .from(discussions)
        .where(and(eq(discussions.id, id), ...visibilityConditions(visibility)));
      const row = rows[0];
      if (!row) {
        throw notFound("Discussion not found");
      }
      return row.id;
    }

    function parseListQuery(request: FastifyRequest): DiscussionQueryInput {
      const parsed = discussionQuerySchema.safeParse(request.query);
      if (!parsed.success) {
        throw badRequest("Invalid query parameters");
      }
      return parsed.data;
    }

    /** One page of visible, filtered discussions within `scope`. */
    async function listDiscussions(user: RequestUser | undefined, query: DiscussionQueryInput, scope: SQL[]) {
      const { cursor, limit, ...filterParams } = query;
      const viewer = await loadViewer(db, user);
      const visibility = resolveVisibility(viewer, env.CONTENT_PARTITION);

      const filter = await applyDiscussionFilters(
        { db },
        viewer,
        filterParams,
        [...visibilityConditions(visibility), ...scope],
      );

      const conditions = [...filter.conditions];
      if (cursor) {
        const decoded = decodeCursor(cursor);
        if (decoded) {
          conditions.push(
            sql`(${discussions.lastActivityAt}, ${discussions.id}) < (${decoded.lastActivityAt}::timestamptz, ${decoded.id})`,
          );
        }
      }

      // Fetch limit + 1 to detect if there are more pages
      const rows = await db
        .select()
        .from(discussions)
        .where(whereOf(conditions))
        .orderBy(desc(discussions.lastActivityAt), desc(discussions.id))
        .limit(limit + 1);

      const hasMore = rows.length > limit;
      const page = hasMore ? rows.slice(0, limit) : rows;

      let readSet: Set<number> | undefined;
      if (viewer && page.length > 0) {
        readSet = await readStatus.readIds(
          inArray(discussions.id, page.map((row) => row.id)),
          viewer,
        );
      }

      let nextCursor: string | null = null;
      const lastRow = page[page.length - 1];
      if (hasMore && lastRow) {
        nextCursor = encodeCursor(lastRow.lastActivityAt.toISOString(), lastRow.id);
      }

      return {
        discussions: page.map((row) => serializeDiscussion(row, readSet ? readSet.has(row.id) : null)),
        filters: describeFilters(filter.applied),
        cursor: nextCursor,
      };
    }

    // -------------------------------------------------------------------
    // GET /api/discussions (public, optionalAuth)
    // -------------------------------------------------------------------

    app.get("/api/discussions", {
      preHandler: [authMiddleware.optionalAuth],
      schema: {
        tags: ["Discussions"],
        summary: "List discussions, most recently active first",
        querystring: listQueryJsonSchema,
        response: {
          200: listResponseJsonSchema,
          400: errorJsonSchema,
        },
      },
    }, async (request, reply) => {
      const query = parseListQuery(request);
      return reply.status(200).send(await listDiscussions(request.user, query, []));
    });

    // -------------------------------------------------------------------
    // GET /api/scripts/:scriptId/discussions (public, optionalAuth)
    // -------------------------------------------------------------------

    app.get("/api/scripts/:scriptId/discussions", {
      preHandler: [authMiddleware.optionalAuth],
      schema: {
        tags: ["Discussions"],
        summary: "List the discussions about one script",
        params: scriptParamsJsonSchema,
        querystring: listQueryJsonSchema,
        response: {
          200: listResponseJsonSchema,
          400: errorJsonSchema,
          404: errorJsonSchema,
        },
      },
    }, async (request, reply) => {
      const scriptId = parseScriptId(request);
      const query = parseListQuery(request);

      const found = await db
        .select({ id: scripts.id })
        .from(scripts)
        .where(and(eq(scripts.id, scriptId), isNull(scripts.deletedAt)));
      const script = found[0];
      if (!script) {
        throw notFound("Script not found");
      }

      return reply
        .status(200)
        .send(await listDiscussions(request.user, query, [eq(discussions.scriptId, script.id)]));
    });

    // -------------------------------------------------------------------
    // POST /api/discussions/mark-read (auth required)
    // -------------------------------------------------------------------

    app.post("/api/discussions/mark-read", {
      preHandler: [authMiddleware.requireAuth],
      schema: {
        tags: ["Discussions"],
        summary: "Mark every discussion matching the listing filters as read",
        security: [{ bearerAuth: [] }],
        querystring: {
          type: "object",
          properties: filterQueryProperties,
        },
        response: {
          200: {
            type: "object",
            properties: {
              strategy: { type: "string", enum: ["read-marks", "watermark"] },
              marked: { type: ["integer", "null"] },
              readSince: { type: ["string", "null"], format: "date-time" },
              filters: activeFiltersJsonSchema,
            },
          },
          401: errorJsonSchema,
          503: errorJsonSchema,
        },
      },
    }, async (request, reply) => {
      const viewer = await requireViewer(request);
      const filterParams = discussionFilterQuerySchema.parse(request.query);
      const visibility = resolveVisibility(viewer, env.CONTENT_PARTITION);

      // Every write is an idempotent upsert or a single-row update, so a
      // failed attempt can be retried as is.
      let filter: FilterResult;
      let result: MarkAllReadResult;
      try {
        filter = await applyDiscussionFilters({ db }, viewer, filterParams, visibilityConditions(visibility));
        result = await readStatus.markAllRead(viewer, filter, new Date());
      } catch (err: unknown) {
        app.log.error({ err, userId: viewer.id }, "Failed to mark discussions as read");
        throw serviceUnavailable("Failed to mark discussions as read");
      }

      return reply.status(200).send({
        strategy: result.strategy,
        marked: result.strategy === "read-marks" ? result.marked : null,
        readSince: result.strategy === "watermark" ? result.readSince.toISOString() : null,
        filters: describeFilters(filter.applied),
      });
    });

    // -------------------------------------------------------------------
    // GET /api/discussions/:id (public, optionalAuth)
    // -------------------------------------------------------------------

    app.get("/api/discussions/:id", {
      preHandler: [authMiddleware.optionalAuth],
      schema: {
        tags: ["Discussions"],
        summary: "Get a discussion; records the view for signed-in users",
        params: idParamsJsonSchema,
        response: {
          200: {
            type: "object",
            properties: {
              ...discussionJsonSchema.properties,
              isSubscribed: { type: "boolean" },
            },
          },
          400: errorJsonSchema,
          404: errorJsonSchema,
        },
      },
    }, async (request, reply) => {
      const id = parseId(request);
      const viewer = await loadViewer(db, request.user);
      // Posters and moderators may open discussions that are under review.
      const visibility = resolveVisibility(viewer, env.CONTENT_PARTITION, true);

      const rows = await db
        .select({
          discussion: discussions,
          scriptSensitive: scripts.sensitive,
          scriptDeletedAt: scripts.deletedAt,
        })
        .from(discussions)
        .leftJoin(scripts, eq(scripts.id, discussions.scriptId))
        .where(eq(discussions.id, id));

      const row = rows[0];
      if (
        !row ||
        row.scriptDeletedAt ||
        !isVisibleTo(visibility, {
          moderationState: row.discussion.moderationState,
          posterId: row.discussion.posterId,
          scriptSensitive: row.scriptSensitive,
        })
      ) {
        throw notFound("Discussion not found");
      }

      if (!viewer) {
        return reply.status(200).send({
          ...serializeDiscussion(row.discussion, null),
          isSubscribed: false,
        });
      }

      await readStatus.recordView(viewer.id, id, new Date());

      const subscriptions = await db
        .select({ userId: discussionSubscriptions.userId })
        .from(discussionSubscriptions)
        .where(
          and(
            eq(discussionSubscriptions.userId, viewer.id),
            eq(discussionSubscriptions.discussionId, id),
          ),
        );

      return reply.status(200).send({
        ...serializeDiscussion(row.discussion, true),
        isSubscribed: subscriptions.length > 0,
      });
    });

    // -------------------------------------------------------------------
    // PUT /api/discussions/:id/subscription (auth required)
    // -------------------------------------------------------------------

    app.put("/api/discussions/:id/subscription", {
      preHandler: [authMiddleware.requireAuth],
      schema: {
        tags: ["Discussions"],
        summary: "Subscribe to a discussion (idempotent)",
        security: [{ bearerAuth: [] }],
        params: idParamsJsonSchema,
        response: {
          204: { type: "null" },
          400: errorJsonSchema,
          401: errorJsonSchema,
          404: errorJsonSchema,
        },
      },
    }, async (request, reply) => {
      const id = parseId(request);
      const viewer = await requireViewer(request);
      const discussionId = await findListedDiscussion(id, viewer);

      await db
        .insert(discussionSubscriptions)
        .values({ userId: viewer.id, discussionId })
        .onConflictDoNothing();

      return reply.status(204).send();
    });

    // -------------------------------------------------------------------
    // DELETE /api/discussions/:id/subscription (auth required)
    // -------------------------------------------------------------------

    app.delete("/api/discussions/:id/subscription", {
      preHandler: [authMiddleware.requireAuth],
      schema: {
        tags: ["Discussions"],
        summary: "Unsubscribe from a discussion (idempotent)",
        security: [{ bearerAuth: [] }],
        params: idParamsJsonSchema,
        response: {
          204: { type: "null" },
          400: errorJsonSchema,
          401: errorJsonSchema,
          404: errorJsonSchema,
        },
      },
    }, async (request, reply) => {
      const id = parseId(request);
      const viewer = await requireViewer(request);
      const discussionId = await findListedDiscussion(id, viewer);

      await db
        .delete(discussionSubscriptions)
        .where(
          and(
            eq(discussionSubscriptions.userId, viewer.id),
            eq(discussionSubscriptions.discussionId, discussionId),
          ),
        );

      return reply.status(204).send();
    });

    // -------------------------------------------------------------------
    // PUT /api/discussions/:id/moderation (moderator)
    // -------------------------------------------------------------------

    app.put("/api/discussions/:id/moderation", {
      preHandler: [requireModerator],
      schema: {
        tags: ["Discussions"],
        summary: "Put a discussion under review or make it visible again",
        security: [{ bearerAuth: [] }],
        params: idParamsJsonSchema,
        body: {
          type: "object",
          required: ["state"],
          properties: {
            state: { type: "string", enum: ["visible", "under_review"] },
          },
        },
        response: {
          200: discussionJsonSchema,
          400: errorJsonSchema,
          401: errorJsonSchema,
          403: errorJsonSchema,
          404: errorJsonSchema,
        },
      },
    }, async (request, reply) => {
      const id = parseId(request);
      const parsed = moderationUpdateSchema.safeParse(request.body);
      if (!parsed.success) {
        throw badRequest("Invalid moderation state");
      }

      const updated = await db
        .update(discussions)
        .set({ moderationState: parsed.data.state })
        .where(and(eq(discussions.id, id), ne(discussions.moderationState, "removed")))
        .returning();

      const row = updated[0];
      if (!row) {
        throw notFound("Discussion not found");
      }

      app.log.info(
        { discussionId: id, state: parsed.data.state, moderatorId: request.user?.id },
        "Discussion moderation state changed",
      );
      return reply.status(200).send(serializeDiscussion(row, null));
    });

    // -------------------------------------------------------------------
    // DELETE /api/discussions/:id (moderator)
    // -------------------------------------------------------------------

    app.delete("/api/discussions/:id", {
      preHandler: [requireModerator],
      schema: {
        tags: ["Discussions"],
        summary: "Soft delete a discussion",
        security: [{ bearerAuth: [] }],
        params: idParamsJsonSchema,
        response: {
          204: { type: "null" },
          400: errorJsonSchema,
          401: errorJsonSchema,
          403: errorJsonSchema,
          404: errorJsonSchema,
        },
      },
    }, async (request, reply) => {
      const id = parseId(request);

      const removed = await db
        .update(discussions)
        .set({ moderationState: "removed", removedAt: new Date() })
        .where(and(eq(discussions.id, id), ne(discussions.moderationState, "removed")))
        .returning({ id: discussions.id });

      if (removed.length === 0) {
        throw notFound("Discussion not found");
      }

      app.log.info({ discussionId: id, moderatorId: request.user?.id }, "Discussion removed");
      return reply.status(204).send();
    });

    done();
  };
}
