import { DEFAULT_GESTURE_CONFIG, mergeGestureConfig } from "@facecue/gesture-core";
import { describe, expect, it } from "vitest";
import { type HttpRouteContext, routeHttpRequest } from "../httpRoutes";

const context: HttpRouteContext = {
  getSessionCount: () => 2,
  getConfig: () =>
    mergeGestureConfig(DEFAULT_GESTURE_CONFIG, { gesture: { cooldownSeconds: 1 } }),
};

describe("routeHttpRequest", () => {
  it("reports health with the live session count", () => {
    expect(routeHttpRequest("GET", "/api/health", context)).toEqual({
      status: 200,
      body: { status: "healthy", sessions: 2 },
    });
  });

  it("serves the effective thresholds", () => {
    const response = routeHttpRequest("GET", "/api/thresholds?format=json", context);

    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({
      gesture: { cooldown_s: 1 },
      head_tilt: { angle_threshold: 15, deadzone: 7, confirm_frames: 5 },
    });
  });

  it("answers preflight requests without a body", () => {
    expect(routeHttpRequest("OPTIONS", "/api/health", context)).toEqual({
      status: 204,
    });
  });

  it("rejects other methods and unknown paths", () => {
    expect(routeHttpRequest("POST", "/api/health", context)).toEqual({
      status: 405,
      body: { error: "Method not allowed" },
    });
    expect(routeHttpRequest("GET", "/api/sessions", context)).toEqual({
      status: 404,
      body: { error: "Not found" },
    });
    expect(routeHttpRequest("GET", undefined, context)).toEqual({
      status: 400,
      body: { error: "Missing request URL" },
    });
  });
});
