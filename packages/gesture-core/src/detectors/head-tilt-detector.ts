import type { HeadTiltConfig } from "../config/gesture-config";
import type { HeadTiltZone } from "../types/gesture";

export type HeadTiltState = {
  confirmedZone: HeadTiltZone;
  candidateZone: HeadTiltZone | null;
  candidateFrameCount: number;
};

export type HeadTiltGesture = "HEAD_TILT_LEFT" | "HEAD_TILT_RIGHT";

export type HeadTiltObservation = {
  /** Zone seen this frame, null inside the transition band. */
  observedZone: HeadTiltZone | null;
  confirmedZone: HeadTiltZone;
  event: HeadTiltGesture | null;
};

export const createInitialHeadTiltState = (): HeadTiltState => ({
  confirmedZone: "CENTER",
  candidateZone: null,
  candidateFrameCount: 0,
});

/**
 * Converts the raw chin→nose angle, where upright sits on the ±180° seam,
 * into a signed deviation from upright in degrees. Negative values are tilts
 * to the left, positive to the right.
 */
export const normalizeHeadTiltAngle = (angle: number): number => {
  let wrapped = angle % 360;
  if (wrapped > 180) {
    wrapped -= 360;
  } else if (wrapped <= -180) {
    wrapped += 360;
  }
  return wrapped >= 0 ? 180 - wrapped : -(180 + wrapped);
};

export const classifyHeadTilt = (
  deviation: number,
  config: Pick<HeadTiltConfig, "angleThreshold" | "deadzone">,
): HeadTiltZone | null => {
  if (Math.abs(deviation) <= config.deadzone) {
    return "CENTER";
  }
  if (deviation < -config.angleThreshold) {
    return "LEFT";
  }
  if (deviation > config.angleThreshold) {
    return "RIGHT";
  }
  return null;
};

const EDGE_EVENTS: Record<HeadTiltZone, HeadTiltGesture | null> = {
  LEFT: "HEAD_TILT_LEFT",
  RIGHT: "HEAD_TILT_RIGHT",
  CENTER: null,
};

export class HeadTiltDetector {
  private readonly config: HeadTiltConfig;

  private state: HeadTiltState = createInitialHeadTiltState();

  constructor(config: HeadTiltConfig) {
    this.config = { ...config };
  }

  /** Takes the already-normalised deviation, see {@link normalizeHeadTiltAngle}. */
  update(deviation: number): HeadTiltObservation {
    const observedZone = classifyHeadTilt(deviation, this.config);

    // Band frames break the run but keep the candidate.
    if (observedZone === null) {
      this.state = { ...this.state, candidateFrameCount: 0 };
      return {
        observedZone,
        confirmedZone: this.state.confirmedZone,
        event: null,
      };
    }

    if (observedZone === this.state.confirmedZone) {
      this.state = {
        confirmedZone: observedZone,
        candidateZone: null,
        candidateFrameCount: 0,
      };
      return { observedZone, confirmedZone: observedZone, event: null };
    }

    const candidateFrameCount =
      observedZone === this.state.candidateZone
        ? this.state.candidateFrameCount + 1
        : 1;

    if (candidateFrameCount < this.config.confirmFrames) {
      this.state = {
        ...this.state,
        candidateZone: observedZone,
        candidateFrameCount,
      };
      return {
        observedZone,
        confirmedZone: this.state.confirmedZone,
        event: null,
      };
    }

    const previousZone = this.state.confirmedZone;
    this.state = {
      confirmedZone: observedZone,
      candidateZone: null,
      candidateFrameCount: 0,
    };

    return {
      observedZone,
      confirmedZone: observedZone,
      event: previousZone === "CENTER" ? EDGE_EVENTS[observedZone] : null,
    };
  }

  getState(): HeadTiltState {
    return { ...this.state };
  }

  reset(): void {
    this.state = createInitialHeadTiltState();
  }
}
