export {
  DEFAULT_GESTURE_CONFIG,
  assertValidGestureConfig,
  cloneGestureConfig,
  collectGestureConfigIssues,
  mergeGestureConfig,
} from "./config/gesture-config";
export type {
  CooldownConfig,
  EyeConfig,
  EyebrowConfig,
  GestureConfig,
  GestureConfigOverrides,
  HeadTiltConfig,
  MouthConfig,
} from "./config/gesture-config";

export { EyeDetector } from "./detectors/eye-detector";
export type { EyeObservation, EyeState } from "./detectors/eye-detector";
export { MouthDetector } from "./detectors/mouth-detector";
export type { MouthObservation, MouthState } from "./detectors/mouth-detector";
export { EyebrowDetector } from "./detectors/eyebrow-detector";
export type {
  EyebrowObservation,
  EyebrowState,
} from "./detectors/eyebrow-detector";
export {
  HeadTiltDetector,
  classifyHeadTilt,
  normalizeHeadTiltAngle,
} from "./detectors/head-tilt-detector";
export type {
  HeadTiltObservation,
  HeadTiltState,
} from "./detectors/head-tilt-detector";

export { SessionDetector } from "./session/session-detector";
export type {
  FrameMetrics,
  FrameResult,
  SessionDetectorOptions,
  SessionState,
} from "./session/session-detector";
export { SessionRegistry } from "./session/session-registry";
export type { SessionRegistryOptions } from "./session/session-registry";

export { FACE_LANDMARKS, REQUIRED_LANDMARK_COUNT } from "./features/face-landmarks";
export {
  computeAspectRatio,
  computeEyebrowPosition,
  computeFeatureFrame,
  computeHeadTiltAngle,
} from "./features/landmark-features";

export { GESTURE_DESCRIPTORS } from "./types/gesture";
export type {
  GestureDebugPayload,
  GestureDescriptor,
  GestureEvent,
  GestureIntent,
  GestureType,
  HeadTiltZone,
} from "./types/gesture";
export type {
  FaceFeatureFrame,
  FeatureFrame,
  Landmark,
  NoFaceFrame,
} from "./types/features";
