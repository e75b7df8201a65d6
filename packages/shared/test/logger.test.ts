import { afterEach, describe, expect, test, vi } from "vitest";
import { Logger } from "../src/logger.ts";
import { resetEnv } from "../src/env.ts";

describe("Logger", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    resetEnv();
  });

  test("skips messages below the configured level", () => {
    vi.stubEnv("LOG_LEVEL", "warn");
    vi.stubEnv("NODE_ENV", "test");
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const logger = new Logger();
    logger.debug("hidden");
    logger.warn("shown");

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[0]).toMatch(/^\[.+\] WARN: shown$/);
  });

  test("writes JSON lines in production", () => {
    vi.stubEnv("LOG_LEVEL", "info");
    vi.stubEnv("NODE_ENV", "production");

    const line = new Logger().formatMessage("info", "loaded", { entries: 3 });

    expect(JSON.parse(line)).toMatchObject({ level: "info", message: "loaded", entries: 3 });
  });

  test("falls back to info on an invalid environment", () => {
    vi.stubEnv("LOG_LEVEL", "loud");
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const info = vi.spyOn(console, "info").mockImplementation(() => {});

    const logger = new Logger();
    logger.debug("hidden");
    logger.info("shown", { file: "abi.json" });

    expect(debug).not.toHaveBeenCalled();
    expect(info.mock.calls[0]?.[0]).toMatch(/INFO: shown \{"file":"abi.json"\}$/);
  });
});
