export type EyeConfig = {
  /** Mean eye aspect ratio strictly below this counts as closed. */
  aspectRatioThreshold: number;
  /** Consecutive closed frames required before reopening counts as a blink. */
  minBlinkFrames: number;
  /** Maximum seconds between two blink edges that form a double blink. */
  doubleBlinkIntervalSeconds: number;
  /** Consecutive closed frames that fire a long close. */
  longCloseFrames: number;
};

export type MouthConfig = {
  /** Mouth aspect ratio strictly above this counts as open. */
  aspectRatioThreshold: number;
  confirmFrames: number;
};

export type EyebrowConfig = {
  /** Rise above the moving baseline (normalised units) that counts as raised. */
  raiseThreshold: number;
  confirmFrames: number;
  /** Largest head deviation (degrees) at which eyebrow detection runs. */
  headTiltTolerance: number;
  /** Number of samples kept for the moving baseline. */
  baselineWindow: number;
  /** Samples required before a baseline exists. */
  baselineMinSamples: number;
};

export type HeadTiltConfig = {
  /** Deviation (degrees) beyond which a tilt is observed. */
  angleThreshold: number;
  /** Deviation (degrees) at or under which the head is centred. */
  deadzone: number;
  confirmFrames: number;
};

export type CooldownConfig = {
  /** Seconds after an emitted event during which no other event is emitted. */
  cooldownSeconds: number;
};

export type GestureConfig = {
  eye: EyeConfig;
  mouth: MouthConfig;
  eyebrow: EyebrowConfig;
  headTilt: HeadTiltConfig;
  gesture: CooldownConfig;
};

export type GestureConfigOverrides = Partial<{
  [Section in keyof GestureConfig]: Partial<GestureConfig[Section]>;
}>;

export const DEFAULT_GESTURE_CONFIG: GestureConfig = {
  eye: {
    aspectRatioThreshold: 0.2,
    minBlinkFrames: 2,
    doubleBlinkIntervalSeconds: 0.8,
    longCloseFrames: 30,
  },
  mouth: {
    aspectRatioThreshold: 0.3,
    confirmFrames: 5,
  },
  eyebrow: {
    raiseThreshold: 0.02,
    confirmFrames: 5,
    headTiltTolerance: 15,
    baselineWindow: 30,
    baselineMinSamples: 10,
  },
  headTilt: {
    angleThreshold: 15,
    deadzone: 7,
    confirmFrames: 5,
  },
  gesture: {
    cooldownSeconds: 0.5,
  },
};

export const cloneGestureConfig = (config: GestureConfig): GestureConfig => {
  return {
    eye: { ...config.eye },
    mouth: { ...config.mouth },
    eyebrow: { ...config.eyebrow },
    headTilt: { ...config.headTilt },
    gesture: { ...config.gesture },
  };
};

export const mergeGestureConfig = (
  current: GestureConfig,
  overrides?: GestureConfigOverrides,
): GestureConfig => {
  if (!overrides) {
    return cloneGestureConfig(current);
  }

  return {
    eye: { ...current.eye, ...(overrides.eye ?? {}) },
    mouth: { ...current.mouth, ...(overrides.mouth ?? {}) },
    eyebrow: { ...current.eyebrow, ...(overrides.eyebrow ?? {}) },
    headTilt: { ...current.headTilt, ...(overrides.headTilt ?? {}) },
    gesture: { ...current.gesture, ...(overrides.gesture ?? {}) },
  };
};

const isNonNegative = (value: number): boolean => {
  return Number.isFinite(value) && value >= 0;
};

const isFrameCount = (value: number): boolean => {
  return Number.isInteger(value) && value >= 1;
};

/**
 * Lists every constraint the config breaks, using the document key names
 * (`head_tilt.deadzone`, ...). An empty list means the config is usable.
 */
export const collectGestureConfigIssues = (config: GestureConfig): string[] => {
  const issues: string[] = [];

  const ratio = (key: string, value: number) => {
    if (!isNonNegative(value)) {
      issues.push(`${key} must be a finite number >= 0 (got ${value})`);
    }
  };
  const frames = (key: string, value: number) => {
    if (!isFrameCount(value)) {
      issues.push(`${key} must be an integer >= 1 (got ${value})`);
    }
  };

  ratio("eye.aspect_ratio_threshold", config.eye.aspectRatioThreshold);
  frames("eye.min_blink_frames", config.eye.minBlinkFrames);
  ratio("eye.double_blink_interval_s", config.eye.doubleBlinkIntervalSeconds);
  frames("eye.long_close_frames", config.eye.longCloseFrames);

  ratio("mouth.aspect_ratio_threshold", config.mouth.aspectRatioThreshold);
  frames("mouth.confirm_frames", config.mouth.confirmFrames);

  ratio("eyebrow.raise_threshold", config.eyebrow.raiseThreshold);
  frames("eyebrow.confirm_frames", config.eyebrow.confirmFrames);
  ratio("eyebrow.head_tilt_tolerance", config.eyebrow.headTiltTolerance);
  frames("eyebrow.baseline_window", config.eyebrow.baselineWindow);
  frames("eyebrow.baseline_min_samples", config.eyebrow.baselineMinSamples);
  if (config.eyebrow.baselineMinSamples > config.eyebrow.baselineWindow) {
    issues.push(
      "eyebrow.baseline_min_samples must not exceed eyebrow.baseline_window",
    );
  }

  ratio("head_tilt.angle_threshold", config.headTilt.angleThreshold);
  ratio("head_tilt.deadzone", config.headTilt.deadzone);
  frames("head_tilt.confirm_frames", config.headTilt.confirmFrames);
  if (config.headTilt.deadzone >= config.headTilt.angleThreshold) {
    issues.push(
      "head_tilt.deadzone must be smaller than head_tilt.angle_threshold",
    );
  }

  ratio("gesture.cooldown_s", config.gesture.cooldownSeconds);

  return issues;
};

export const assertValidGestureConfig = (config: GestureConfig): void => {
  const issues = collectGestureConfigIssues(config);
  if (issues.length > 0) {
    throw new Error(`Invalid gesture configuration: ${issues.join("; ")}`);
  }
};
