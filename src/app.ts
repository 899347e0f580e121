import Fastify from "fastify";
import helmet from "@fastify/helmet";
import cors from "@fastify/cors";
import rateLimit from "@fastify/rate-limit";
import swagger from "@fastify/swagger";
import scalarApiReference from "@scalar/fastify-api-reference";
import * as Sentry from "@sentry/node";
import type { FastifyError } from "fastify";
import { isVerbose } from "./config/env.js";
import type { Env } from "./config/env.js";
import { createDb } from "./db/index.js";
import type { Database } from "./db/index.js";
import { createCache } from "./cache/index.js";
import type { Cache } from "./cache/index.js";
import { createSessionService } from "./auth/session.js";
import type { SessionService } from "./auth/session.js";
import { createAuthMiddleware } from "./auth/middleware.js";
import type { AuthMiddleware, RequestUser } from "./auth/middleware.js";
import { createRequireModerator } from "./auth/require-moderator.js";
import type { RequireModerator } from "./auth/require-moderator.js";
import healthRoutes from "./routes/health.js";
import { discussionRoutes } from "./routes/discussions.js";

// Extend Fastify types with decorated properties
declare module "fastify" {
  interface FastifyInstance {
    db: Database;
    cache: Cache;
    env: Env;
    sessionService: SessionService;
    authMiddleware: AuthMiddleware;
    requireModerator: RequireModerator;
  }
}

export async function buildApp(env: Env) {
  if (env.GLITCHTIP_DSN) {
    Sentry.init({
      dsn: env.GLITCHTIP_DSN,
      environment: isVerbose(env) ? "development" : "production",
    });
  }

  const app = Fastify({
    logger: {
      level: env.LOG_LEVEL,
      ...(isVerbose(env) ? { transport: { target: "pino-pretty" } } : {}),
    },
    trustProxy: true,
  });

  // Database
  const { db, client: dbClient } = createDb(env.DATABASE_URL, { poolSize: env.DATABASE_POOL_SIZE });
  app.decorate("db", db);
  app.decorate("env", env);

  // Cache (session store)
  const cache = createCache(env.VALKEY_URL, app.log);
  app.decorate("cache", cache);

  await app.register(helmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        scriptSrc: ["'self'", "'unsafe-inline'", "https://cdn.jsdelivr.net"],
        styleSrc: ["'self'", "'unsafe-inline'", "https://cdn.jsdelivr.net"],
        imgSrc: ["'self'", "data:", "https:"],
        connectSrc: ["'self'"],
        fontSrc: ["'self'", "https://cdn.jsdelivr.net"],
        objectSrc: ["'none'"],
        frameSrc: ["'none'"],
      },
    },
  });

  await app.register(cors, {
    origin: env.CORS_ORIGINS.split(",").map((o) => o.trim()),
    credentials: true,
    methods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization"],
  });

  await app.register(rateLimit, {
    max: env.RATE_LIMIT_READ_ANON,
    timeWindow: "1 minute",
  });

  // Identity
  const sessionService = createSessionService(cache, app.log);
  app.decorate("sessionService", sessionService);

  // Request decoration must happen before hooks can set the property
  app.decorateRequest("user", undefined as RequestUser | undefined);
  const authMiddleware = createAuthMiddleware(sessionService, app.log);
  app.decorate("authMiddleware", authMiddleware);
  app.decorate("requireModerator", createRequireModerator(db, authMiddleware, app.log));

  // OpenAPI documentation (register before routes so schemas are collected)
  await app.register(swagger, {
    openapi: {
      openapi: "3.1.0",
      info: {
        title: "Discussion Board API",
        description: "Discussion listings, visibility and read tracking.",
        version: "0.1.0",
      },
      servers: [{ url: env.PUBLIC_URL, description: "Primary server" }],
      components: {
        securitySchemes: {
          bearerAuth: {
            type: "http",
            scheme: "bearer",
            description: "Session access token",
          },
        },
      },
    },
  });

  await app.register(scalarApiReference, {
    routePrefix: "/docs",
  });

  // Routes
  await app.register(healthRoutes);
  await app.register(discussionRoutes());

  app.get("/api/openapi.json", { schema: { hide: true } }, async (_request, reply) => {
    return reply.header("Content-Type", "application/json").send(app.swagger());
  });

  app.addHook("onClose", async () => {
    app.log.info("Shutting down...");
    // A lazily connected client that never ran a command has nothing to flush.
    if (cache.status === "ready") {
      await cache.quit();
    } else {
      cache.disconnect();
    }
    await dbClient.end();
    app.log.info("Connections closed");
  });

  app.setErrorHandler((error: FastifyError, request, reply) => {
    const statusCode = error.statusCode ?? 500;

    // Client errors (ApiError, schema validation) carry their own message.
    if (statusCode < 500) {
      return reply.status(statusCode).send({ error: error.message, statusCode });
    }

    if (env.GLITCHTIP_DSN) {
      Sentry.captureException(error);
    }
    app.log.error({ err: error, requestId: request.id }, "Unhandled error");
    return reply.status(statusCode).send({
      error: "Internal Server Error",
      message: isVerbose(env) ? error.message : "An unexpected error occurred",
      statusCode,
    });
  });

  return app;
}
