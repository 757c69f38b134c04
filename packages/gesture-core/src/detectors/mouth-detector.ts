import type { MouthConfig } from "../config/gesture-config";

export type MouthState = {
  confirmFrameCount: number;
  /** Latched after MOUTH_OPEN until the mouth closes again. */
  fired: boolean;
};

export type MouthObservation = {
  mouthOpen: boolean;
  event: "MOUTH_OPEN" | null;
};

export const createInitialMouthState = (): MouthState => ({
  confirmFrameCount: 0,
  fired: false,
});

export class MouthDetector {
  private readonly config: MouthConfig;

  private state: MouthState = createInitialMouthState();

  constructor(config: MouthConfig) {
    this.config = { ...config };
  }

  update(mouthAr: number): MouthObservation {
    const mouthOpen = mouthAr > this.config.aspectRatioThreshold;

    if (!mouthOpen) {
      this.state = createInitialMouthState();
      return { mouthOpen, event: null };
    }

    const confirmFrameCount = this.state.confirmFrameCount + 1;
    const shouldFire =
      confirmFrameCount >= this.config.confirmFrames && !this.state.fired;

    this.state = {
      confirmFrameCount,
      fired: this.state.fired || shouldFire,
    };

    return { mouthOpen, event: shouldFire ? "MOUTH_OPEN" : null };
  }

  getState(): MouthState {
    return { ...this.state };
  }

  reset(): void {
    this.state = createInitialMouthState();
  }
}
