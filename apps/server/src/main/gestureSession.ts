import {
  type FrameResult,
  GESTURE_DESCRIPTORS,
  type Landmark,
  type SessionRegistry,
  computeFeatureFrame,
} from "@facecue/gesture-core";
import { ERROR_CODES, type ErrorCode, SERVER_MESSAGES } from "../shared/protocol";
import { type Logger, getLogger, toErrorPayload } from "../shared/logger";
import { getMonotonicTime, resolveTimestamp } from "../shared/time";
import type {
  FaceStatePayload,
  FramePayload,
  GestureNotice,
  ServerMessage,
} from "../shared/types/messages";
import { parseClientMessage } from "../shared/validation/clientMessages";
import { decodeFrameData } from "./frameDecoder";
import type { LandmarkExtractor } from "./landmarkExtractor";

export type SendMessage = (message: ServerMessage) => void;

export type ErrorReporter = (
  error: unknown,
  context: Record<string, unknown>,
) => void;

export type GestureSessionOptions = {
  sessionId: string;
  registry: SessionRegistry;
  extractor: LandmarkExtractor;
  send: SendMessage;
  reportError?: ErrorReporter;
  /** Wall clock for outgoing message timestamps. */
  now?: () => number;
  /** Frame clock used when the client sends no capture time. */
  frameClock?: () => number;
  logger?: Logger;
};

const roundTo = (value: number | null, digits: number): number | null => {
  if (value === null) {
    return null;
  }
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

/**
 * The head_tilt_* flags report the confirmed zone, not the zone seen on this
 * frame: a tilt only shows up once it has held for `confirm_frames`.
 */
export const toFaceStatePayload = (result: FrameResult): FaceStatePayload => {
  const { metrics } = result;
  const zone = metrics.faceDetected ? metrics.headTiltZone : null;

  return {
    face_detected: metrics.faceDetected,
    eyes_closed: metrics.eyesClosed,
    mouth_open: metrics.mouthOpen,
    eyebrows_raised: metrics.eyebrowsRaised,
    head_tilt_left: zone === "LEFT",
    head_tilt_right: zone === "RIGHT",
    head_tilt_center: zone === "CENTER",
    left_eye_ar: roundTo(metrics.leftEyeAr, 3),
    right_eye_ar: roundTo(metrics.rightEyeAr, 3),
    mouth_ar: roundTo(metrics.mouthAr, 3),
    eyebrow_position: roundTo(metrics.eyebrowPosition, 4),
    head_tilt_angle: roundTo(metrics.headTiltAngle, 1),
  };
};

export const toGestureNotice = (result: FrameResult): GestureNotice | undefined => {
  if (!result.event) {
    return undefined;
  }
  const descriptor = GESTURE_DESCRIPTORS[result.event.type];
  return {
    type: result.event.type,
    label: descriptor.label,
    intent: descriptor.intent,
  };
};

/**
 * One client connection. Messages are handled strictly in arrival order:
 * each waits for the previous one, including its landmark extraction.
 */
export class GestureSession {
  readonly sessionId: string;

  private readonly registry: SessionRegistry;

  private readonly extractor: LandmarkExtractor;

  private readonly send: SendMessage;

  private readonly reportError: ErrorReporter;

  private readonly now: () => number;

  private readonly frameClock: () => number;

  private readonly logger: Logger;

  private queue: Promise<void> = Promise.resolve();

  private closed = false;

  constructor(options: GestureSessionOptions) {
    this.sessionId = options.sessionId;
    this.registry = options.registry;
    this.extractor = options.extractor;
    this.send = options.send;
    this.reportError = options.reportError ?? (() => undefined);
    this.now = options.now ?? Date.now;
    this.frameClock = options.frameClock ?? getMonotonicTime;
    this.logger = options.logger ?? getLogger("gesture-session");

    this.registry.open(this.sessionId);
  }

  start(): void {
    this.send({
      type: SERVER_MESSAGES.connected,
      payload: {
        sessionId: this.sessionId,
        message: "Connected to gesture detection server",
      },
      timestamp: this.now(),
    });
  }

  /** Resolves once this message and every earlier one has been handled. */
  enqueue(raw: string): Promise<void> {
    const next = this.queue.then(() => this.handle(raw));
    this.queue = next;
    return next;
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.registry.close(this.sessionId);
  }

  isClosed(): boolean {
    return this.closed;
  }

  private async handle(raw: string): Promise<void> {
    if (this.closed) {
      return;
    }

    try {
      await this.dispatch(raw);
    } catch (error) {
      this.logger.error("Failed to handle client message", {
        sessionId: this.sessionId,
        ...toErrorPayload(error),
      });
      this.reportError(error, { sessionId: this.sessionId });
      this.sendError(ERROR_CODES.internalError, "Internal server error");
    }
  }

  private async dispatch(raw: string): Promise<void> {
    const parsed = parseClientMessage(raw);
    if (!parsed.ok) {
      this.logger.debug("Rejected client message", {
        sessionId: this.sessionId,
        code: parsed.code,
        reason: parsed.reason,
      });
      this.sendError(parsed.code, parsed.reason);
      return;
    }

    const { message } = parsed;
    switch (message.type) {
      case "ping":
        this.send({ type: SERVER_MESSAGES.pong, timestamp: this.now() });
        return;
      case "reset":
        this.registry.reset(this.sessionId);
        this.logger.info("Session reset", { sessionId: this.sessionId });
        this.send({ type: SERVER_MESSAGES.resetComplete, timestamp: this.now() });
        return;
      case "frame":
        await this.processFrame(message.payload);
    }
  }

  private async processFrame(payload: FramePayload): Promise<void> {
    const timestamp = resolveTimestamp(payload.timestamp, this.frameClock);

    let landmarks: Landmark[] | null;
    if (payload.landmarks !== undefined) {
      landmarks = payload.landmarks;
    } else {
      const extracted = await this.extractLandmarks(payload.data ?? "");
      if (extracted === undefined) {
        return;
      }
      landmarks = extracted;
    }

    if (this.closed) {
      return;
    }

    const result = this.registry.process(
      this.sessionId,
      computeFeatureFrame(landmarks, timestamp),
    );

    if (result.suppressed) {
      this.logger.debug("Gesture suppressed by cooldown", {
        sessionId: this.sessionId,
        gesture: result.suppressed.type,
      });
    }
    if (result.discarded.length > 0) {
      this.logger.debug("Simultaneous gestures discarded", {
        sessionId: this.sessionId,
        kept: result.event?.type ?? result.suppressed?.type,
        discarded: result.discarded,
      });
    }

    const gesture = toGestureNotice(result);
    this.send({
      type: SERVER_MESSAGES.faceState,
      payload: toFaceStatePayload(result),
      ...(gesture ? { gesture } : {}),
      timestamp: this.now(),
    });
  }

  /** Undefined when an error was already sent to the client. */
  private async extractLandmarks(
    data: string,
  ): Promise<Landmark[] | null | undefined> {
    const decoded = decodeFrameData(data);
    if (!decoded.ok) {
      this.sendError(ERROR_CODES.decodeError, decoded.reason);
      return undefined;
    }

    if (!this.extractor.isAvailable()) {
      this.sendError(
        ERROR_CODES.extractorUnavailable,
        "Server-side landmark extraction is not available; send payload.landmarks",
      );
      return undefined;
    }

    try {
      return await this.extractor.extract(decoded.frame);
    } catch (error) {
      this.logger.error("Landmark extraction failed", {
        sessionId: this.sessionId,
        extractor: this.extractor.name,
        ...toErrorPayload(error),
      });
      this.reportError(error, {
        sessionId: this.sessionId,
        extractor: this.extractor.name,
      });
      this.sendError(ERROR_CODES.extractionFailed, "Landmark extraction failed");
      return undefined;
    }
  }

  private sendError(code: ErrorCode, message: string): void {
    this.send({
      type: SERVER_MESSAGES.error,
      payload: { code, message },
      timestamp: this.now(),
    });
  }
}
