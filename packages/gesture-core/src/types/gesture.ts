export type GestureType =
  | "DOUBLE_BLINK"
  | "LONG_CLOSE"
  | "MOUTH_OPEN"
  | "EYEBROWS_RAISED"
  | "HEAD_TILT_LEFT"
  | "HEAD_TILT_RIGHT";

/** What a presentation layer should do with each gesture. */
export type GestureIntent =
  | "yes"
  | "no"
  | "select"
  | "menu"
  | "previous"
  | "next";

export type GestureDescriptor = {
  label: string;
  intent: GestureIntent;
};

export const GESTURE_DESCRIPTORS: Record<GestureType, GestureDescriptor> = {
  DOUBLE_BLINK: { label: "Double blink", intent: "yes" },
  LONG_CLOSE: { label: "Long eye close", intent: "no" },
  MOUTH_OPEN: { label: "Mouth open", intent: "select" },
  EYEBROWS_RAISED: { label: "Eyebrows raised", intent: "menu" },
  HEAD_TILT_LEFT: { label: "Head tilt left", intent: "previous" },
  HEAD_TILT_RIGHT: { label: "Head tilt right", intent: "next" },
};

export type HeadTiltZone = "LEFT" | "CENTER" | "RIGHT";

/** Raw feature values captured on the frame that produced an event. */
export type GestureDebugPayload = {
  leftEyeAr: number;
  rightEyeAr: number;
  mouthAr: number;
  eyebrowPosition: number;
  headTiltAngle: number;
  headDeviation: number;
};

export type GestureEvent = {
  type: GestureType;
  timestamp: number;
  debug?: GestureDebugPayload;
};
