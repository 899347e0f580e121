// Fastify owns the Pino instance; services receive it (or a child) as this type.
export type { FastifyBaseLogger as Logger } from "fastify";
