export type ImageMimeType = "image/jpeg" | "image/png" | "image/webp";

export type DecodedFrame = {
  image: Buffer;
  mimeType: ImageMimeType;
};

export type FrameDecodeResult =
  | { ok: true; frame: DecodedFrame }
  | { ok: false; reason: string };

const DATA_URL_PATTERN = /^data:([^;,]*)(;[^,]*)?,/;

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

const startsWith = (buffer: Buffer, bytes: readonly number[], offset = 0) => {
  return (
    buffer.length >= offset + bytes.length &&
    bytes.every((byte, index) => buffer[offset + index] === byte)
  );
};

const asciiAt = (buffer: Buffer, offset: number, text: string) => {
  return buffer.toString("latin1", offset, offset + text.length) === text;
};

export const sniffImageType = (buffer: Buffer): ImageMimeType | null => {
  if (startsWith(buffer, [0xff, 0xd8, 0xff])) {
    return "image/jpeg";
  }
  if (startsWith(buffer, PNG_SIGNATURE)) {
    return "image/png";
  }
  if (buffer.length >= 12 && asciiAt(buffer, 0, "RIFF") && asciiAt(buffer, 8, "WEBP")) {
    return "image/webp";
  }
  return null;
};

/** Strips an optional `data:` URL prefix; non-base64 data URLs are rejected. */
const extractBase64 = (data: string): string | null => {
  const match = DATA_URL_PATTERN.exec(data);
  if (!match) {
    return data;
  }
  const parameters = match[2] ?? "";
  if (!parameters.split(";").includes("base64")) {
    return null;
  }
  return data.slice(match[0].length);
};

export const decodeFrameData = (data: string): FrameDecodeResult => {
  const base64 = extractBase64(data.trim());
  if (base64 === null) {
    return { ok: false, reason: "Data URL is not base64 encoded" };
  }

  const compact = base64.replace(/\s+/g, "");
  if (compact.length === 0) {
    return { ok: false, reason: "Frame data is empty" };
  }
  if (compact.length % 4 === 1 || !BASE64_PATTERN.test(compact)) {
    return { ok: false, reason: "Frame data is not valid base64" };
  }

  const image = Buffer.from(compact, "base64");
  const mimeType = sniffImageType(image);
  if (!mimeType) {
    return { ok: false, reason: "Frame data is not a JPEG, PNG or WebP image" };
  }

  return { ok: true, frame: { image, mimeType } };
};
