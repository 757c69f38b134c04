import { describe, expect, it } from "vitest";
import {
  type SentryEvent,
  createMonitoringConfig,
  sanitizeSentryEvent,
  scrubRecord,
} from "../config/monitoring";

describe("createMonitoringConfig", () => {
  it("keeps Sentry and Better Stack off in development by default", () => {
    const config = createMonitoringConfig({
      SENTRY_DSN: "https://public@sentry.invalid/1",
      BETTER_STACK_TOKEN: "test-token",
    });

    expect(config.environment).toBe("development");
    expect(config.sentry.enabled).toBe(false);
    expect(config.logtail.enabled).toBe(false);
  });

  it("enables reporting in production when credentials exist", () => {
    const config = createMonitoringConfig({
      NODE_ENV: "production",
      SENTRY_DSN: "https://public@sentry.invalid/1",
      BETTER_STACK_TOKEN: "test-token",
      SENTRY_TRACES_SAMPLE_RATE: "0.5",
    });

    expect(config.sentry.enabled).toBe(true);
    expect(config.sentry.tracesSampleRate).toBe(0.5);
    expect(config.logtail.enabled).toBe(true);
  });

  it("prefers APP_ENV and honours the development opt-in", () => {
    const config = createMonitoringConfig({
      APP_ENV: "qa",
      NODE_ENV: "production",
      SENTRY_DSN: "https://public@sentry.invalid/1",
      ENABLE_SENTRY_IN_DEV: "true",
      SENTRY_TRACES_SAMPLE_RATE: "7",
    });

    expect(config.environment).toBe("qa");
    expect(config.sentry.enabled).toBe(true);
    expect(config.sentry.tracesSampleRate).toBe(0.1);
  });
});

describe("sanitizeSentryEvent", () => {
  it("redacts image data and landmarks from extras", () => {
    expect(
      scrubRecord({
        sessionId: "abc",
        payload: { image: "aGVsbG8=", landmarks: [{ x: 1, y: 2 }], count: 3 },
      }),
    ).toEqual({
      sessionId: "abc",
      payload: { image: "[redacted]", landmarks: "[redacted]", count: 3 },
    });
  });

  it("drops the request and keeps only the user id", () => {
    const event: SentryEvent = {
      type: undefined,
      request: { url: "http://localhost/ws" },
      user: { id: 42, email: "someone@example.invalid" },
      extra: { authToken: "test-secret" },
      breadcrumbs: [{ message: "frame", data: { landmarks: [] } }],
    };

    const sanitized = sanitizeSentryEvent(event);

    expect(sanitized.request).toBeUndefined();
    expect(sanitized.user).toEqual({ id: "42" });
    expect(sanitized.extra).toEqual({ authToken: "[redacted]" });
    expect(sanitized.breadcrumbs).toEqual([
      { message: "frame", data: { landmarks: "[redacted]" } },
    ]);
  });
});
