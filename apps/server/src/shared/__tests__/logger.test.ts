import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger, getLogger, toErrorPayload } from "../logger";

describe("logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes enriched metadata to the console", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const logger = createLogger({ module: "test-module", minLevel: "debug" });

    logger.info("Session reset", { sessionId: "abc" });

    expect(info).toHaveBeenCalledTimes(1);
    const [line, metadata] = info.mock.calls[0];
    expect(line).toMatch(/^\[.+\] \[INFO\] Session reset$/);
    expect(metadata).toEqual({
      sessionId: "abc",
      module: "test-module",
      environment: expect.any(String),
      level: "info",
    });
  });

  it("routes fatal logs to console.error", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = createLogger({ module: "test-module", minLevel: "debug" });

    logger.fatal("Gesture server failed to start");

    expect(error).toHaveBeenCalledTimes(1);
    expect(error.mock.calls[0][0]).toMatch(/\[FATAL\] Gesture server failed to start$/);
  });

  it("drops messages below the minimum level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const logger = createLogger({ module: "test-module", minLevel: "warn" });

    logger.debug("noise");
    logger.warn("signal");

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("caches loggers per module", () => {
    expect(getLogger("cached")).toBe(getLogger("cached"));
  });
});

describe("toErrorPayload", () => {
  it("describes Error instances", () => {
    const payload = toErrorPayload(new TypeError("bad frame"));

    expect(payload).toMatchObject({ error: "bad frame", name: "TypeError" });
    expect(payload.stack).toEqual(expect.any(String));
  });

  it("serialises other values", () => {
    expect(toErrorPayload("plain")).toEqual({ error: "plain" });
    expect(toErrorPayload({ code: 7 })).toEqual({ error: '{"code":7}' });
  });
});
