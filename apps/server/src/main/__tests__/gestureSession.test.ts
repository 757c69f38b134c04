import {
  DEFAULT_GESTURE_CONFIG,
  type FrameResult,
  type Landmark,
  SessionRegistry,
  mergeGestureConfig,
} from "@facecue/gesture-core";
import { describe, expect, it, vi } from "vitest";
import type { Logger } from "../../shared/logger";
import type { ServerMessage } from "../../shared/types/messages";
import type { DecodedFrame } from "../frameDecoder";
import { GestureSession, toFaceStatePayload } from "../gestureSession";
import {
  type LandmarkExtractor,
  UnavailableLandmarkExtractor,
} from "../landmarkExtractor";

const JPEG_BASE64 = Buffer.from([0xff, 0xd8, 0xff, 0xe0, 0x00, 0x10]).toString(
  "base64",
);

const NEUTRAL_FACE: Record<number, Landmark> = {
  159: { x: 0.4, y: 0.4 },
  145: { x: 0.4, y: 0.43 },
  33: { x: 0.35, y: 0.415 },
  133: { x: 0.45, y: 0.415 },
  386: { x: 0.6, y: 0.4 },
  374: { x: 0.6, y: 0.43 },
  362: { x: 0.55, y: 0.415 },
  263: { x: 0.65, y: 0.415 },
  13: { x: 0.5, y: 0.7 },
  14: { x: 0.5, y: 0.71 },
  78: { x: 0.45, y: 0.705 },
  308: { x: 0.55, y: 0.705 },
  70: { x: 0.4, y: 0.35 },
  300: { x: 0.6, y: 0.35 },
  10: { x: 0.5, y: 0.2 },
  4: { x: 0.5, y: 0.6 },
  152: { x: 0.5, y: 0.8 },
};

const createFace = (overrides: Record<number, Landmark> = {}): Landmark[] => {
  const placed = { ...NEUTRAL_FACE, ...overrides };
  return Array.from({ length: 468 }, (_, index) => placed[index] ?? { x: 0.5, y: 0.5 });
};

const OPEN_MOUTH = {
  13: { x: 0.5, y: 0.68 },
  14: { x: 0.5, y: 0.73 },
};

const createTestLogger = () => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  fatal: vi.fn(),
  flush: vi.fn(async () => undefined),
}) satisfies Logger;

class FakeExtractor implements LandmarkExtractor {
  readonly name = "fake";

  readonly frames: DecodedFrame[] = [];

  constructor(
    private readonly result: (frame: DecodedFrame) => Promise<Landmark[] | null>,
  ) {}

  isAvailable(): boolean {
    return true;
  }

  extract(frame: DecodedFrame): Promise<Landmark[] | null> {
    this.frames.push(frame);
    return this.result(frame);
  }
}

const setup = (
  options: {
    extractor?: LandmarkExtractor;
    config?: Parameters<typeof mergeGestureConfig>[1];
  } = {},
) => {
  const registry = new SessionRegistry({
    config: mergeGestureConfig(DEFAULT_GESTURE_CONFIG, options.config),
  });
  const sent: ServerMessage[] = [];
  const reportError = vi.fn();
  const session = new GestureSession({
    sessionId: "session-1",
    registry,
    extractor: options.extractor ?? new UnavailableLandmarkExtractor(),
    send: (message) => {
      sent.push(message);
    },
    reportError,
    now: () => 1000,
    frameClock: () => 500,
    logger: createTestLogger(),
  });
  return { registry, sent, reportError, session };
};

const frameMessage = (payload: Record<string, unknown>) =>
  JSON.stringify({ type: "frame", payload });

describe("GestureSession", () => {
  it("opens its session and greets the client", () => {
    const { registry, sent, session } = setup();

    session.start();

    expect(registry.has("session-1")).toBe(true);
    expect(sent).toEqual([
      {
        type: "connected",
        payload: {
          sessionId: "session-1",
          message: "Connected to gesture detection server",
        },
        timestamp: 1000,
      },
    ]);
  });

  it("answers ping with pong", async () => {
    const { sent, session } = setup();

    await session.enqueue('{"type":"ping"}');

    expect(sent).toEqual([{ type: "pong", timestamp: 1000 }]);
  });

  it("reports protocol errors without touching session state", async () => {
    const { registry, sent, session } = setup();
    const before = registry.get("session-1")?.getState();

    await session.enqueue("not json");
    await session.enqueue('{"type":"wave"}');

    expect(sent).toEqual([
      {
        type: "error",
        payload: { code: "INVALID_JSON", message: "Message is not valid JSON" },
        timestamp: 1000,
      },
      {
        type: "error",
        payload: {
          code: "UNSUPPORTED_MESSAGE",
          message: "Unsupported message type: wave",
        },
        timestamp: 1000,
      },
    ]);
    expect(registry.get("session-1")?.getState()).toEqual(before);
  });

  it("publishes face state for client-side landmarks", async () => {
    const { sent, session } = setup();

    await session.enqueue(frameMessage({ landmarks: createFace(), timestamp: 0 }));

    expect(sent).toEqual([
      {
        type: "face_state",
        payload: {
          face_detected: true,
          eyes_closed: false,
          mouth_open: false,
          eyebrows_raised: false,
          head_tilt_left: false,
          head_tilt_right: false,
          head_tilt_center: true,
          left_eye_ar: 0.3,
          right_eye_ar: 0.3,
          mouth_ar: 0.1,
          eyebrow_position: -0.15,
          head_tilt_angle: 180,
        },
        timestamp: 1000,
      },
    ]);
  });

  it("attaches the gesture to the frame that produced it", async () => {
    const { sent, session } = setup({ config: { mouth: { confirmFrames: 2 } } });

    await session.enqueue(
      frameMessage({ landmarks: createFace(OPEN_MOUTH), timestamp: 0 }),
    );
    await session.enqueue(
      frameMessage({ landmarks: createFace(OPEN_MOUTH), timestamp: 33 }),
    );

    expect(sent[0]).not.toHaveProperty("gesture");
    expect(sent[1]).toMatchObject({
      type: "face_state",
      payload: { mouth_open: true, mouth_ar: 0.5 },
      gesture: { type: "MOUTH_OPEN", label: "Mouth open", intent: "select" },
    });
  });

  it("reports a missing face without advancing detectors", async () => {
    const { registry, sent, session } = setup();
    const before = registry.get("session-1")?.getState();

    await session.enqueue(frameMessage({ landmarks: [] }));

    expect(sent[0]).toEqual({
      type: "face_state",
      payload: {
        face_detected: false,
        eyes_closed: false,
        mouth_open: false,
        eyebrows_raised: false,
        head_tilt_left: false,
        head_tilt_right: false,
        head_tilt_center: false,
        left_eye_ar: null,
        right_eye_ar: null,
        mouth_ar: null,
        eyebrow_position: null,
        head_tilt_angle: null,
      },
      timestamp: 1000,
    });
    expect(registry.get("session-1")?.getState()).toEqual(before);
  });

  it("rejects undecodable image data", async () => {
    const { sent, session } = setup();

    await session.enqueue(frameMessage({ data: "%%%" }));

    expect(sent).toEqual([
      {
        type: "error",
        payload: { code: "DECODE_ERROR", message: "Frame data is not valid base64" },
        timestamp: 1000,
      },
    ]);
  });

  it("tells the client when no extractor is configured", async () => {
    const { sent, session } = setup();

    await session.enqueue(frameMessage({ data: JPEG_BASE64 }));

    expect(sent).toEqual([
      {
        type: "error",
        payload: {
          code: "EXTRACTOR_UNAVAILABLE",
          message:
            "Server-side landmark extraction is not available; send payload.landmarks",
        },
        timestamp: 1000,
      },
    ]);
  });

  it("runs image frames through the extractor", async () => {
    const extractor = new FakeExtractor(async () => createFace());
    const { sent, session } = setup({ extractor });

    await session.enqueue(frameMessage({ data: `data:image/jpeg;base64,${JPEG_BASE64}` }));

    expect(extractor.frames).toHaveLength(1);
    expect(extractor.frames[0].mimeType).toBe("image/jpeg");
    expect(sent[0]).toMatchObject({
      type: "face_state",
      payload: { face_detected: true },
    });
  });

  it("reports extractor failures and keeps going", async () => {
    const extractor = new FakeExtractor(async () => {
      throw new Error("model crashed");
    });
    const { registry, sent, reportError, session } = setup({ extractor });
    const before = registry.get("session-1")?.getState();

    await session.enqueue(frameMessage({ data: JPEG_BASE64 }));
    await session.enqueue('{"type":"ping"}');

    expect(sent.map((message) => message.type)).toEqual(["error", "pong"]);
    expect(sent[0]).toMatchObject({
      payload: { code: "EXTRACTION_FAILED", message: "Landmark extraction failed" },
    });
    expect(reportError).toHaveBeenCalledWith(expect.any(Error), {
      sessionId: "session-1",
      extractor: "fake",
    });
    expect(registry.get("session-1")?.getState()).toEqual(before);
  });

  it("handles messages in arrival order across slow extractions", async () => {
    let release: (landmarks: Landmark[]) => void = () => undefined;
    const extractor = new FakeExtractor(
      () =>
        new Promise<Landmark[]>((resolve) => {
          release = resolve;
        }),
    );
    const { sent, session } = setup({ extractor });

    const first = session.enqueue(frameMessage({ data: JPEG_BASE64 }));
    const second = session.enqueue('{"type":"ping"}');
    await vi.waitFor(() => {
      expect(extractor.frames).toHaveLength(1);
    });
    expect(sent).toEqual([]);

    release(createFace());
    await Promise.all([first, second]);

    expect(sent.map((message) => message.type)).toEqual(["face_state", "pong"]);
  });

  it("uses the frame clock when the client sends no capture time", async () => {
    const { registry, session } = setup({ config: { mouth: { confirmFrames: 1 } } });

    await session.enqueue(frameMessage({ landmarks: createFace(OPEN_MOUTH) }));

    expect(registry.get("session-1")?.getState().cooldownUntil).toBe(1000);
  });

  it("clears detector state on reset", async () => {
    const { registry, sent, session } = setup();
    await session.enqueue(
      frameMessage({ landmarks: createFace(OPEN_MOUTH), timestamp: 0 }),
    );

    await session.enqueue('{"type":"reset"}');

    expect(sent.at(-1)).toEqual({ type: "reset_complete", timestamp: 1000 });
    expect(registry.get("session-1")?.getState().mouth.confirmFrameCount).toBe(0);
  });

  it("drops its session and ignores late messages once closed", async () => {
    const { registry, sent, session } = setup();

    session.close();
    await session.enqueue('{"type":"ping"}');

    expect(registry.has("session-1")).toBe(false);
    expect(sent).toEqual([]);
  });

  it("discards a frame whose extraction finishes after close", async () => {
    let release: (landmarks: Landmark[]) => void = () => undefined;
    const extractor = new FakeExtractor(
      () =>
        new Promise<Landmark[]>((resolve) => {
          release = resolve;
        }),
    );
    const { sent, session } = setup({ extractor });

    const pending = session.enqueue(frameMessage({ data: JPEG_BASE64 }));
    await vi.waitFor(() => {
      expect(extractor.frames).toHaveLength(1);
    });
    session.close();
    release(createFace());
    await pending;

    expect(sent).toEqual([]);
  });
});

describe("toFaceStatePayload", () => {
  it("reports the confirmed head-tilt zone rather than the raw angle", () => {
    const result: FrameResult = {
      timestamp: 0,
      event: null,
      suppressed: null,
      discarded: [],
      cooldownActive: false,
      metrics: {
        faceDetected: true,
        eyesClosed: false,
        mouthOpen: false,
        eyebrowsRaised: false,
        headTiltZone: "CENTER",
        headDeviation: -20,
        leftEyeAr: 0.3,
        rightEyeAr: 0.3,
        mouthAr: 0.1,
        eyebrowPosition: -0.15,
        headTiltAngle: -160,
      },
    };

    expect(toFaceStatePayload(result)).toMatchObject({
      head_tilt_left: false,
      head_tilt_right: false,
      head_tilt_center: true,
      head_tilt_angle: -160,
    });
  });
});
