import crypto from "node:crypto";
import { z } from "zod/v4";
import type { Cache } from "../cache/index.js";
import type { Logger } from "../lib/logger.js";

// ---------------------------------------------------------------------------
// Key prefixes
// ---------------------------------------------------------------------------

const SESSION_DATA_PREFIX = "board:session:data:";
const ACCESS_TOKEN_PREFIX = "board:session:access:";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

const sessionSchema = z.object({
  sid: z.string(),
  userId: z.number().int().positive(),
  handle: z.string(),
  /** SHA-256 of the access token; the raw token is never stored. */
  accessTokenHash: z.string(),
  accessTokenExpiresAt: z.number(),
  createdAt: z.number(),
});

/** Session record as persisted in Valkey. */
export type Session = z.infer<typeof sessionSchema>;

/**
 * Read side of the session store. Sessions are written and revoked by the
 * login flow, which runs outside this API and shares the key layout below.
 */
export interface SessionService {
  /** Resolve an access token to its session, or undefined if unknown or expired. */
  validateAccessToken(accessToken: string): Promise<Session | undefined>;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function sha256(value: string): string {
  return crypto.createHash("sha256").update(value).digest("hex");
}

/** First 8 characters only, for logs. */
function truncateForLog(value: string): string {
  return value.slice(0, 8);
}

function parseSession(data: string): Session | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(data);
  } catch {
    return undefined;
  }
  const parsed = sessionSchema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createSessionService(cache: Cache, logger: Logger): SessionService {
  async function validateAccessToken(accessToken: string): Promise<Session | undefined> {
    const tokenHash = sha256(accessToken);

    try {
      const sid = await cache.get(`${ACCESS_TOKEN_PREFIX}${tokenHash}`);
      if (sid === null) {
        logger.debug({ tokenHash: truncateForLog(tokenHash) }, "Access token not found");
        return undefined;
      }

      const data = await cache.get(`${SESSION_DATA_PREFIX}${sid}`);
      if (data === null) {
        logger.debug(
          { sid: truncateForLog(sid), tokenHash: truncateForLog(tokenHash) },
          "Session data not found (orphaned token)",
        );
        return undefined;
      }

      const session = parseSession(data);
      if (!session) {
        logger.warn({ sid: truncateForLog(sid) }, "Discarding malformed session data");
        return undefined;
      }
      return session;
    } catch (err: unknown) {
      logger.error({ err, tokenHash: truncateForLog(tokenHash) }, "Failed to validate access token");
      throw err;
    }
  }

  return { validateAccessToken };
}
