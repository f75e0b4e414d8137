import type { FastifyServerOptions } from "fastify";
import type { Env } from "./env.js";

/**
 * Fastify logger settings for the running environment.
 * Tests run silent. Production also redacts authorization and cookie headers.
 */
export function loggerOptions(
  env: Pick<Env, "NODE_ENV" | "LOG_LEVEL">
): FastifyServerOptions["logger"] {
  switch (env.NODE_ENV) {
    case "test":
      return false;
    case "production":
      return {
        level: env.LOG_LEVEL,
        redact: ["req.headers.authorization", "req.headers.cookie"],
      };
    default:
      return { level: env.LOG_LEVEL };
  }
}
