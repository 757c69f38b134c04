import { describe, expect, it, vi } from "vitest";
import {
  DEFAULT_GESTURE_CONFIG,
  mergeGestureConfig,
} from "../../config/gesture-config";
import type { FaceFeatureFrame } from "../../types/features";
import { SessionRegistry } from "../session-registry";

const openMouthFrame = (timestamp: number): FaceFeatureFrame => ({
  faceDetected: true,
  leftEyeAr: 0.3,
  rightEyeAr: 0.3,
  mouthAr: 0.5,
  eyebrowPosition: 0.05,
  headTiltAngle: 180,
  timestamp,
});

const config = mergeGestureConfig(DEFAULT_GESTURE_CONFIG, {
  mouth: { confirmFrames: 2 },
});

describe("SessionRegistry", () => {
  it("refuses to open the same session twice", () => {
    const registry = new SessionRegistry({ config });

    registry.open("a");

    expect(() => registry.open("a")).toThrow("Session a is already open");
    expect(registry.size).toBe(1);
  });

  it("throws for frames on an unknown session", () => {
    const registry = new SessionRegistry({ config });

    expect(() => registry.process("missing", openMouthFrame(0))).toThrow(
      "Unknown session missing",
    );
    expect(() => registry.reset("missing")).toThrow("Unknown session missing");
  });

  it("keeps detector state separate per session", () => {
    const registry = new SessionRegistry({ config });
    registry.open("a");
    registry.open("b");

    registry.process("a", openMouthFrame(0));
    const fromB = registry.process("b", openMouthFrame(10));
    const fromA = registry.process("a", openMouthFrame(20));

    expect(fromB.event).toBeNull();
    expect(fromA.event?.type).toBe("MOUTH_OPEN");
  });

  it("tags forwarded events with their session id", () => {
    const onGesture = vi.fn();
    const registry = new SessionRegistry({ config, onGesture });
    registry.open("client-1");

    registry.process("client-1", openMouthFrame(0));
    registry.process("client-1", openMouthFrame(33));

    expect(onGesture).toHaveBeenCalledTimes(1);
    expect(onGesture).toHaveBeenCalledWith(
      "client-1",
      expect.objectContaining({ type: "MOUTH_OPEN", timestamp: 33 }),
    );
  });

  it("drops sessions on close", () => {
    const registry = new SessionRegistry({ config });
    registry.open("a");
    registry.open("b");

    expect(registry.close("a")).toBe(true);
    expect(registry.close("a")).toBe(false);
    expect(registry.has("a")).toBe(false);

    registry.closeAll();
    expect(registry.size).toBe(0);
  });

  it("starts a reopened session from a clean state", () => {
    const registry = new SessionRegistry({ config });
    registry.open("a");
    registry.process("a", openMouthFrame(0));
    registry.close("a");

    const detector = registry.open("a");

    expect(detector.getState().mouth.confirmFrameCount).toBe(0);
  });
});
