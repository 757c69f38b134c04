/**
 * Face-mesh landmark indices used for feature extraction (468/478 point
 * topology, refined landmarks optional).
 */
export const FACE_LANDMARKS = {
  rightEye: { top: 159, bottom: 145, left: 33, right: 133 },
  leftEye: { top: 386, bottom: 374, left: 362, right: 263 },
  mouth: { top: 13, bottom: 14, left: 78, right: 308 },
  rightEyebrow: 70,
  leftEyebrow: 300,
  foreheadCenter: 10,
  noseTip: 4,
  chin: 152,
} as const;

export type AspectRatioIndices = {
  top: number;
  bottom: number;
  left: number;
  right: number;
};

export const REQUIRED_LANDMARK_COUNT =
  Math.max(
    ...Object.values(FACE_LANDMARKS).flatMap((entry) =>
      typeof entry === "number" ? [entry] : Object.values(entry),
    ),
  ) + 1;
