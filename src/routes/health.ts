import type { FastifyPluginCallback } from "fastify";
import { sql } from "drizzle-orm";

type CheckResult = { status: "healthy"; latency: number } | { status: "unhealthy" };

async function timed(check: () => Promise<unknown>): Promise<CheckResult> {
  const start = performance.now();
  try {
    await check();
    return { status: "healthy", latency: Math.round(performance.now() - start) };
  } catch {
    return { status: "unhealthy" };
  }
}

const healthRoutes: FastifyPluginCallback = (fastify, _opts, done) => {
  fastify.get("/api/health", async (_request, reply) => {
    return reply.send({
      status: "healthy",
      version: "0.1.0",
      uptime: process.uptime(),
    });
  });

  // Readiness: database and session store both answer.
  fastify.get("/api/health/ready", async (_request, reply) => {
    const checks = {
      database: await timed(() => fastify.db.execute(sql`SELECT 1`)),
      cache: await timed(() => fastify.cache.ping()),
    };

    const allHealthy = Object.values(checks).every((c) => c.status === "healthy");

    return reply.status(allHealthy ? 200 : 503).send({
      status: allHealthy ? "ready" : "degraded",
      checks,
    });
  });

  done();
};

export default healthRoutes;
