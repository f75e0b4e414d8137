import { describe, expect, it } from "vitest";
import { loadEnv } from "../src/config/env.js";
import { loggerOptions } from "../src/config/logger.js";

describe("loggerOptions", () => {
  it("silences logging under test", () => {
    expect(loggerOptions(loadEnv({ NODE_ENV: "test", LOG_LEVEL: "debug" }))).toBe(false);
  });

  it("logs at LOG_LEVEL in development", () => {
    expect(loggerOptions(loadEnv({ LOG_LEVEL: "debug" }))).toEqual({ level: "debug" });
  });

  it("redacts credential headers in production", () => {
    expect(loggerOptions(loadEnv({ NODE_ENV: "production", LOG_LEVEL: "warn" }))).toEqual({
      level: "warn",
      redact: ["req.headers.authorization", "req.headers.cookie"],
    });
  });
});
