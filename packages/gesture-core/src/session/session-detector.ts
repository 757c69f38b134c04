import {
  type GestureConfig,
  assertValidGestureConfig,
  cloneGestureConfig,
} from "../config/gesture-config";
import { EyeDetector, type EyeState } from "../detectors/eye-detector";
import {
  EyebrowDetector,
  type EyebrowState,
} from "../detectors/eyebrow-detector";
import {
  HeadTiltDetector,
  type HeadTiltState,
  normalizeHeadTiltAngle,
} from "../detectors/head-tilt-detector";
import { MouthDetector, type MouthState } from "../detectors/mouth-detector";
import type { FeatureFrame } from "../types/features";
import type {
  GestureDebugPayload,
  GestureEvent,
  GestureType,
  HeadTiltZone,
} from "../types/gesture";

export type SessionDetectorOptions = {
  config: GestureConfig;
  /** Called once per emitted event, after the session state is committed. */
  onGesture?: (event: GestureEvent) => void;
};

export type SessionState = {
  eye: EyeState;
  mouth: MouthState;
  eyebrow: EyebrowState;
  headTilt: HeadTiltState;
  cooldownUntil: number | null;
};

export type FrameMetrics = {
  faceDetected: boolean;
  eyesClosed: boolean;
  mouthOpen: boolean;
  eyebrowsRaised: boolean;
  headTiltZone: HeadTiltZone;
  headDeviation: number | null;
  leftEyeAr: number | null;
  rightEyeAr: number | null;
  mouthAr: number | null;
  eyebrowPosition: number | null;
  headTiltAngle: number | null;
};

export type FrameResult = {
  timestamp: number;
  /** The event to deliver, null when nothing fired or the cooldown held it back. */
  event: GestureEvent | null;
  /** A confirmed event that the cooldown swallowed. */
  suppressed: GestureEvent | null;
  /** Candidates that lost the fixed-priority tie-break this frame. */
  discarded: GestureType[];
  cooldownActive: boolean;
  metrics: FrameMetrics;
};

export class SessionDetector {
  private readonly config: GestureConfig;

  private readonly eye: EyeDetector;

  private readonly mouth: MouthDetector;

  private readonly eyebrow: EyebrowDetector;

  private readonly headTilt: HeadTiltDetector;

  private readonly onGesture?: (event: GestureEvent) => void;

  private cooldownUntil: number | null = null;

  private lastTimestamp: number | null = null;

  constructor(options: SessionDetectorOptions) {
    assertValidGestureConfig(options.config);
    this.config = cloneGestureConfig(options.config);
    this.eye = new EyeDetector(this.config.eye);
    this.mouth = new MouthDetector(this.config.mouth);
    this.eyebrow = new EyebrowDetector(this.config.eyebrow);
    this.headTilt = new HeadTiltDetector(this.config.headTilt);
    this.onGesture = options.onGesture;
  }

  process(frame: FeatureFrame): FrameResult {
    const timestamp = this.resolveTimestamp(frame.timestamp);
    const cooldownActive =
      this.cooldownUntil !== null && timestamp < this.cooldownUntil;

    if (!frame.faceDetected) {
      return {
        timestamp,
        event: null,
        suppressed: null,
        discarded: [],
        cooldownActive,
        metrics: {
          faceDetected: false,
          eyesClosed: false,
          mouthOpen: false,
          eyebrowsRaised: false,
          headTiltZone: this.headTilt.getState().confirmedZone,
          headDeviation: null,
          leftEyeAr: null,
          rightEyeAr: null,
          mouthAr: null,
          eyebrowPosition: null,
          headTiltAngle: null,
        },
      };
    }

    const headDeviation = normalizeHeadTiltAngle(frame.headTiltAngle);

    const eye = this.eye.update(frame.leftEyeAr, frame.rightEyeAr, timestamp);
    const mouth = this.mouth.update(frame.mouthAr);
    const eyebrow = this.eyebrow.update(frame.eyebrowPosition, headDeviation);
    const headTilt = this.headTilt.update(headDeviation);

    const candidates: GestureType[] = [
      eye.event,
      mouth.event,
      eyebrow.event,
      headTilt.event,
    ].filter((candidate): candidate is GestureType => candidate !== null);

    const [winner, ...discarded] = candidates;
    let event: GestureEvent | null = null;
    let suppressed: GestureEvent | null = null;

    if (winner !== undefined) {
      const debug: GestureDebugPayload = {
        leftEyeAr: frame.leftEyeAr,
        rightEyeAr: frame.rightEyeAr,
        mouthAr: frame.mouthAr,
        eyebrowPosition: frame.eyebrowPosition,
        headTiltAngle: frame.headTiltAngle,
        headDeviation,
      };
      const candidate: GestureEvent = { type: winner, timestamp, debug };
      if (cooldownActive) {
        suppressed = candidate;
      } else {
        event = candidate;
        this.cooldownUntil = timestamp + this.config.gesture.cooldownSeconds * 1000;
      }
    }

    const result: FrameResult = {
      timestamp,
      event,
      suppressed,
      discarded,
      cooldownActive,
      metrics: {
        faceDetected: true,
        eyesClosed: eye.eyesClosed,
        mouthOpen: mouth.mouthOpen,
        eyebrowsRaised: eyebrow.eyebrowsRaised,
        headTiltZone: headTilt.confirmedZone,
        headDeviation,
        leftEyeAr: frame.leftEyeAr,
        rightEyeAr: frame.rightEyeAr,
        mouthAr: frame.mouthAr,
        eyebrowPosition: frame.eyebrowPosition,
        headTiltAngle: frame.headTiltAngle,
      },
    };

    if (event) {
      this.onGesture?.(event);
    }

    return result;
  }

  reset(): void {
    this.eye.reset();
    this.mouth.reset();
    this.eyebrow.reset();
    this.headTilt.reset();
    this.cooldownUntil = null;
    this.lastTimestamp = null;
  }

  getState(): SessionState {
    return {
      eye: this.eye.getState(),
      mouth: this.mouth.getState(),
      eyebrow: this.eyebrow.getState(),
      headTilt: this.headTilt.getState(),
      cooldownUntil: this.cooldownUntil,
    };
  }

  getConfig(): GestureConfig {
    return cloneGestureConfig(this.config);
  }

  // Frames are processed in arrival order; a clock that steps backwards is
  // held at the last seen time so interval and cooldown checks stay monotonic.
  private resolveTimestamp(raw: number): number {
    const previous = this.lastTimestamp;
    let timestamp = raw;
    if (!Number.isFinite(timestamp)) {
      timestamp = previous ?? 0;
    } else if (previous !== null && timestamp < previous) {
      timestamp = previous;
    }
    this.lastTimestamp = timestamp;
    return timestamp;
  }
}
