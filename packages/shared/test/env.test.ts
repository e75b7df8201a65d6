import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { envSchema, getEnv, resetEnv } from "../src/env.ts";

describe("getEnv", () => {
  beforeEach(() => {
    resetEnv();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    resetEnv();
  });

  test("applies defaults", () => {
    expect(envSchema.parse({})).toEqual({ LOG_LEVEL: "info", NODE_ENV: "development" });
  });

  test("reads configured values", () => {
    vi.stubEnv("LOG_LEVEL", "debug");
    vi.stubEnv("NODE_ENV", "production");
    expect(getEnv()).toEqual({ LOG_LEVEL: "debug", NODE_ENV: "production" });
  });

  test("caches the first result", () => {
    vi.stubEnv("LOG_LEVEL", "warn");
    const first = getEnv();
    vi.stubEnv("LOG_LEVEL", "error");
    expect(getEnv()).toBe(first);
  });

  test("rejects an unknown log level", () => {
    vi.stubEnv("LOG_LEVEL", "verbose");
    expect(() => getEnv()).toThrow(/^Invalid environment configuration: LOG_LEVEL: /);
  });
});
