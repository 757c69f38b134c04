export type Landmark = {
  x: number;
  y: number;
  z?: number;
};

export type FaceFeatureFrame = {
  faceDetected: true;
  leftEyeAr: number;
  rightEyeAr: number;
  mouthAr: number;
  /** Forehead reference minus mean eyebrow height; grows as the brows rise. */
  eyebrowPosition: number;
  /** Degrees; upright sits near ±180, 0 is maximal tilt. */
  headTiltAngle: number;
  timestamp: number;
};

export type NoFaceFrame = {
  faceDetected: false;
  timestamp: number;
};

export type FeatureFrame = FaceFeatureFrame | NoFaceFrame;
