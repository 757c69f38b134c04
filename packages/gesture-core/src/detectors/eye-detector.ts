import type { EyeConfig } from "../config/gesture-config";

export type EyeState = {
  closed: boolean;
  closedFrameCount: number;
  /** Time of the last unpaired blink edge, in ms. */
  pendingBlinkTime: number | null;
  longCloseFired: boolean;
};

export type EyeGesture = "DOUBLE_BLINK" | "LONG_CLOSE";

export type EyeObservation = {
  meanEar: number;
  eyesClosed: boolean;
  /** True on the open frame that completes a confirmed blink. */
  blinkEdge: boolean;
  event: EyeGesture | null;
};

export const createInitialEyeState = (): EyeState => ({
  closed: false,
  closedFrameCount: 0,
  pendingBlinkTime: null,
  longCloseFired: false,
});

/**
 * Blink / double-blink / long-close state machine.
 *
 * Any reopening after at least `minBlinkFrames` closed frames is a blink
 * edge, including the one that ends a long close.
 */
export class EyeDetector {
  private readonly config: EyeConfig;

  private state: EyeState = createInitialEyeState();

  constructor(config: EyeConfig) {
    this.config = { ...config };
  }

  update(leftEyeAr: number, rightEyeAr: number, timestamp: number): EyeObservation {
    const meanEar = (leftEyeAr + rightEyeAr) / 2;
    const eyesClosed = meanEar < this.config.aspectRatioThreshold;

    if (eyesClosed) {
      const closedFrameCount = this.state.closedFrameCount + 1;
      let { longCloseFired } = this.state;
      let event: EyeGesture | null = null;

      if (closedFrameCount >= this.config.longCloseFrames && !longCloseFired) {
        event = "LONG_CLOSE";
        longCloseFired = true;
      }

      this.state = {
        ...this.state,
        closed: true,
        closedFrameCount,
        longCloseFired,
      };

      return { meanEar, eyesClosed, blinkEdge: false, event };
    }

    const blinkEdge =
      this.state.closed &&
      this.state.closedFrameCount >= this.config.minBlinkFrames;

    let { pendingBlinkTime } = this.state;
    let event: EyeGesture | null = null;

    if (blinkEdge) {
      const intervalMs = this.config.doubleBlinkIntervalSeconds * 1000;
      if (pendingBlinkTime !== null && timestamp - pendingBlinkTime <= intervalMs) {
        event = "DOUBLE_BLINK";
        pendingBlinkTime = null;
      } else {
        pendingBlinkTime = timestamp;
      }
    }

    this.state = {
      closed: false,
      closedFrameCount: 0,
      pendingBlinkTime,
      longCloseFired: false,
    };

    return { meanEar, eyesClosed, blinkEdge, event };
  }

  getState(): EyeState {
    return { ...this.state };
  }

  reset(): void {
    this.state = createInitialEyeState();
  }
}
