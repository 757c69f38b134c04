import type {
  GestureIntent,
  GestureType,
  Landmark,
} from "@facecue/gesture-core";
import type { CLIENT_MESSAGES, ErrorCode, SERVER_MESSAGES } from "../protocol";

export type FramePayload = {
  /** Base64 image, optionally wrapped in a `data:` URL. */
  data?: string;
  landmarks?: Landmark[];
  /** Client capture time in ms. */
  timestamp?: number;
};

export type ClientMessage =
  | { type: typeof CLIENT_MESSAGES.frame; payload: FramePayload }
  | { type: typeof CLIENT_MESSAGES.ping }
  | { type: typeof CLIENT_MESSAGES.reset };

export type FaceStatePayload = {
  face_detected: boolean;
  eyes_closed: boolean;
  mouth_open: boolean;
  eyebrows_raised: boolean;
  head_tilt_left: boolean;
  head_tilt_right: boolean;
  head_tilt_center: boolean;
  left_eye_ar: number | null;
  right_eye_ar: number | null;
  mouth_ar: number | null;
  eyebrow_position: number | null;
  head_tilt_angle: number | null;
};

export type GestureNotice = {
  type: GestureType;
  label: string;
  intent: GestureIntent;
};

export type ConnectedPayload = {
  sessionId: string;
  message: string;
};

export type ErrorPayload = {
  code: ErrorCode;
  message: string;
};

export type ServerMessage =
  | {
      type: typeof SERVER_MESSAGES.connected;
      payload: ConnectedPayload;
      timestamp: number;
    }
  | {
      type: typeof SERVER_MESSAGES.faceState;
      payload: FaceStatePayload;
      gesture?: GestureNotice;
      timestamp: number;
    }
  | { type: typeof SERVER_MESSAGES.pong; timestamp: number }
  | { type: typeof SERVER_MESSAGES.resetComplete; timestamp: number }
  | {
      type: typeof SERVER_MESSAGES.error;
      payload: ErrorPayload;
      timestamp: number;
    };
