export const CLIENT_MESSAGES = {
  frame: "frame",
  ping: "ping",
  reset: "reset",
} as const;

export const SERVER_MESSAGES = {
  connected: "connected",
  faceState: "face_state",
  pong: "pong",
  resetComplete: "reset_complete",
  error: "error",
} as const;

export const ERROR_CODES = {
  invalidJson: "INVALID_JSON",
  invalidMessage: "INVALID_MESSAGE",
  unsupportedMessage: "UNSUPPORTED_MESSAGE",
  decodeError: "DECODE_ERROR",
  extractorUnavailable: "EXTRACTOR_UNAVAILABLE",
  extractionFailed: "EXTRACTION_FAILED",
  internalError: "INTERNAL_ERROR",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export const WEBSOCKET_PATH = "/ws";
