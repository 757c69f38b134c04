import type { FeatureFrame, Landmark } from "../types/features";
import {
  type AspectRatioIndices,
  FACE_LANDMARKS,
  REQUIRED_LANDMARK_COUNT,
} from "./face-landmarks";

const distance2d = (a: Landmark, b: Landmark): number => {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  return Math.sqrt(dx * dx + dy * dy);
};

/** Vertical opening over horizontal width; 0 when the width collapses. */
export const computeAspectRatio = (
  landmarks: readonly Landmark[],
  indices: AspectRatioIndices,
): number => {
  const vertical = distance2d(landmarks[indices.top], landmarks[indices.bottom]);
  const horizontal = distance2d(
    landmarks[indices.left],
    landmarks[indices.right],
  );
  return horizontal > 0 ? vertical / horizontal : 0;
};

export const computeEyebrowPosition = (landmarks: readonly Landmark[]): number => {
  const rightBrow = landmarks[FACE_LANDMARKS.rightEyebrow];
  const leftBrow = landmarks[FACE_LANDMARKS.leftEyebrow];
  const forehead = landmarks[FACE_LANDMARKS.foreheadCenter];
  const meanBrowY = (rightBrow.y + leftBrow.y) / 2;
  return forehead.y - meanBrowY;
};

/**
 * Angle of the chin→nose vector in degrees. Image y grows downwards, so an
 * upright face lands on the ±180° seam.
 */
export const computeHeadTiltAngle = (landmarks: readonly Landmark[]): number => {
  const nose = landmarks[FACE_LANDMARKS.noseTip];
  const chin = landmarks[FACE_LANDMARKS.chin];
  const radians = Math.atan2(nose.x - chin.x, nose.y - chin.y);
  return (radians * 180) / Math.PI;
};

const isUsableLandmarkSet = (
  landmarks: readonly Landmark[] | null | undefined,
): landmarks is readonly Landmark[] => {
  return (
    Array.isArray(landmarks) && landmarks.length >= REQUIRED_LANDMARK_COUNT
  );
};

export const computeFeatureFrame = (
  landmarks: readonly Landmark[] | null | undefined,
  timestamp: number,
): FeatureFrame => {
  if (!isUsableLandmarkSet(landmarks)) {
    return { faceDetected: false, timestamp };
  }

  return {
    faceDetected: true,
    leftEyeAr: computeAspectRatio(landmarks, FACE_LANDMARKS.leftEye),
    rightEyeAr: computeAspectRatio(landmarks, FACE_LANDMARKS.rightEye),
    mouthAr: computeAspectRatio(landmarks, FACE_LANDMARKS.mouth),
    eyebrowPosition: computeEyebrowPosition(landmarks),
    headTiltAngle: computeHeadTiltAngle(landmarks),
    timestamp,
  };
};
