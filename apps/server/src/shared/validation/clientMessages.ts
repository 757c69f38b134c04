import type { Landmark } from "@facecue/gesture-core";
import { CLIENT_MESSAGES, ERROR_CODES, type ErrorCode } from "../protocol";
import type { ClientMessage, FramePayload } from "../types/messages";

export type ClientMessageParseResult =
  | { ok: true; message: ClientMessage }
  | { ok: false; code: ErrorCode; reason: string };

export const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === "object" && value !== null && !Array.isArray(value);
};

export const isFiniteNumber = (value: unknown): value is number => {
  return typeof value === "number" && Number.isFinite(value);
};

export const isLandmark = (value: unknown): value is Landmark => {
  if (!isRecord(value)) {
    return false;
  }

  const { x, y, z } = value;
  return isFiniteNumber(x) && isFiniteNumber(y) && (z === undefined || isFiniteNumber(z));
};

export const isLandmarkList = (value: unknown): value is Landmark[] => {
  return Array.isArray(value) && value.every((point) => isLandmark(point));
};

const invalid = (reason: string): ClientMessageParseResult => ({
  ok: false,
  code: ERROR_CODES.invalidMessage,
  reason,
});

const parseFramePayload = (
  payload: unknown,
): FramePayload | { reason: string } => {
  if (!isRecord(payload)) {
    return { reason: "Frame message requires a payload object" };
  }

  const { data, landmarks, timestamp } = payload;

  if (data !== undefined && typeof data !== "string") {
    return { reason: "Frame data must be a base64 string" };
  }
  if (landmarks !== undefined && !isLandmarkList(landmarks)) {
    return { reason: "Frame landmarks must be a list of {x, y, z?} points" };
  }
  if (timestamp !== undefined && !isFiniteNumber(timestamp)) {
    return { reason: "Frame timestamp must be a finite number" };
  }
  if (data === undefined && landmarks === undefined) {
    return { reason: "Frame payload requires data or landmarks" };
  }

  return {
    data,
    landmarks: landmarks?.map(({ x, y, z }) => (z === undefined ? { x, y } : { x, y, z })),
    timestamp,
  };
};

export const parseClientMessage = (raw: string): ClientMessageParseResult => {
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch {
    return {
      ok: false,
      code: ERROR_CODES.invalidJson,
      reason: "Message is not valid JSON",
    };
  }

  if (!isRecord(decoded)) {
    return invalid("Message must be an object with a string type");
  }

  const { type } = decoded;
  if (typeof type !== "string") {
    return invalid("Message must be an object with a string type");
  }

  switch (type) {
    case CLIENT_MESSAGES.ping:
      return { ok: true, message: { type: CLIENT_MESSAGES.ping } };
    case CLIENT_MESSAGES.reset:
      return { ok: true, message: { type: CLIENT_MESSAGES.reset } };
    case CLIENT_MESSAGES.frame: {
      const payload = parseFramePayload(decoded.payload);
      if ("reason" in payload) {
        return invalid(payload.reason);
      }
      return { ok: true, message: { type: CLIENT_MESSAGES.frame, payload } };
    }
    default:
      return {
        ok: false,
        code: ERROR_CODES.unsupportedMessage,
        reason: `Unsupported message type: ${type}`,
      };
  }
};
