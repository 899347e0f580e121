import { z } from "zod/v4";
import { CONTENT_PARTITIONS } from "../lib/visibility.js";

const portSchema = z
  .string()
  .default("3000")
  .transform((val) => Number(val))
  .pipe(z.number().int().min(1).max(65535));

const intFromString = (defaultVal: string) =>
  z
    .string()
    .default(defaultVal)
    .transform((val) => Number(val))
    .pipe(z.number().int().min(0));

const positiveIntFromString = (defaultVal: string) =>
  z
    .string()
    .default(defaultVal)
    .transform((val) => Number(val))
    .pipe(z.number().int().positive());

export const envSchema = z.object({
  // Required
  DATABASE_URL: z.url(),
  VALKEY_URL: z.url(),

  // Server
  HOST: z.string().default("0.0.0.0"),
  PORT: portSchema,
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  PUBLIC_URL: z.string().default("http://localhost:3000"),

  // Database
  DATABASE_POOL_SIZE: positiveIntFromString("20"),

  // CORS
  CORS_ORIGINS: z.string().default("http://localhost:3001"),

  // Which discussions this installation lists, by script sensitivity
  CONTENT_PARTITION: z.enum(CONTENT_PARTITIONS).default("all"),

  // Rate Limiting (requests per minute)
  RATE_LIMIT_READ_ANON: intFromString("100"),

  // Monitoring (GlitchTip - Sentry SDK compatible)
  GLITCHTIP_DSN: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(env: Record<string, unknown>): Env {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const formatted = z.prettifyError(result.error);
    throw new Error(`Invalid environment configuration:\n${formatted}`);
  }
  return result.data;
}

/** Debug and trace levels switch on pretty logs and verbose error bodies. */
export function isVerbose(env: Pick<Env, "LOG_LEVEL">): boolean {
  return env.LOG_LEVEL === "debug" || env.LOG_LEVEL === "trace";
}
