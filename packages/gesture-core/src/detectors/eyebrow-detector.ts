import type { EyebrowConfig } from "../config/gesture-config";

export type EyebrowState = {
  /** Mean of the baseline window, null until enough samples were seen. */
  baseline: number | null;
  baselineSamples: number[];
  confirmFrameCount: number;
  /** Latched after EYEBROWS_RAISED until the brows drop back. */
  fired: boolean;
};

export type EyebrowObservation = {
  eyebrowsRaised: boolean;
  /** Head was outside the near-centre band; nothing was evaluated. */
  suppressed: boolean;
  /** Position minus baseline, null while suppressed or without a baseline. */
  rise: number | null;
  event: "EYEBROWS_RAISED" | null;
};

export const createInitialEyebrowState = (): EyebrowState => ({
  baseline: null,
  baselineSamples: [],
  confirmFrameCount: 0,
  fired: false,
});

const calculateMean = (values: readonly number[]): number => {
  if (values.length === 0) {
    return 0;
  }
  const sum = values.reduce((acc, value) => acc + value, 0);
  return sum / values.length;
};

/**
 * Eyebrow raise detection against a moving baseline.
 *
 * Head tilt shifts the apparent brow landmarks, so outside the near-centre
 * band the detector is frozen: the baseline, counter and latch keep their
 * values until the head returns.
 */
export class EyebrowDetector {
  private readonly config: EyebrowConfig;

  private state: EyebrowState = createInitialEyebrowState();

  constructor(config: EyebrowConfig) {
    this.config = { ...config };
  }

  update(eyebrowPosition: number, headDeviation: number): EyebrowObservation {
    if (!(Math.abs(headDeviation) <= this.config.headTiltTolerance)) {
      return { eyebrowsRaised: false, suppressed: true, rise: null, event: null };
    }

    const { baseline } = this.state;
    const rise = baseline === null ? null : eyebrowPosition - baseline;
    const eyebrowsRaised = rise !== null && rise > this.config.raiseThreshold;

    if (!eyebrowsRaised) {
      const baselineSamples = [...this.state.baselineSamples, eyebrowPosition];
      while (baselineSamples.length > this.config.baselineWindow) {
        baselineSamples.shift();
      }
      this.state = {
        baseline:
          baselineSamples.length >= this.config.baselineMinSamples
            ? calculateMean(baselineSamples)
            : null,
        baselineSamples,
        confirmFrameCount: 0,
        fired: false,
      };
      return { eyebrowsRaised, suppressed: false, rise, event: null };
    }

    const confirmFrameCount = this.state.confirmFrameCount + 1;
    const shouldFire =
      confirmFrameCount >= this.config.confirmFrames && !this.state.fired;

    this.state = {
      ...this.state,
      confirmFrameCount,
      fired: this.state.fired || shouldFire,
    };

    return {
      eyebrowsRaised,
      suppressed: false,
      rise,
      event: shouldFire ? "EYEBROWS_RAISED" : null,
    };
  }

  getState(): EyebrowState {
    return {
      ...this.state,
      baselineSamples: [...this.state.baselineSamples],
    };
  }

  reset(): void {
    this.state = createInitialEyebrowState();
  }
}
