import { readFile } from "node:fs/promises";
import {
  DEFAULT_GESTURE_CONFIG,
  type GestureConfig,
  assertValidGestureConfig,
  cloneGestureConfig,
} from "@facecue/gesture-core";
import { type RuntimeEnv, parseNumericEnv } from "../shared/env";
import { type Logger, getLogger, toErrorPayload } from "../shared/logger";
import { isRecord } from "../shared/validation/clientMessages";

type ThresholdKey = {
  [Section in keyof GestureConfig]: {
    section: Section;
    field: keyof GestureConfig[Section];
    documentKey: string;
  };
}[keyof GestureConfig];

const DOCUMENT_SECTIONS: Record<keyof GestureConfig, string> = {
  eye: "eye",
  mouth: "mouth",
  eyebrow: "eyebrow",
  headTilt: "head_tilt",
  gesture: "gesture",
};

/** Document layout of every tunable, in the order it is reported. */
export const THRESHOLD_KEYS: readonly ThresholdKey[] = [
  { section: "eye", field: "aspectRatioThreshold", documentKey: "aspect_ratio_threshold" },
  { section: "eye", field: "minBlinkFrames", documentKey: "min_blink_frames" },
  { section: "eye", field: "doubleBlinkIntervalSeconds", documentKey: "double_blink_interval_s" },
  { section: "eye", field: "longCloseFrames", documentKey: "long_close_frames" },
  { section: "mouth", field: "aspectRatioThreshold", documentKey: "aspect_ratio_threshold" },
  { section: "mouth", field: "confirmFrames", documentKey: "confirm_frames" },
  { section: "eyebrow", field: "raiseThreshold", documentKey: "raise_threshold" },
  { section: "eyebrow", field: "confirmFrames", documentKey: "confirm_frames" },
  { section: "eyebrow", field: "headTiltTolerance", documentKey: "head_tilt_tolerance" },
  { section: "eyebrow", field: "baselineWindow", documentKey: "baseline_window" },
  { section: "eyebrow", field: "baselineMinSamples", documentKey: "baseline_min_samples" },
  { section: "headTilt", field: "angleThreshold", documentKey: "angle_threshold" },
  { section: "headTilt", field: "deadzone", documentKey: "deadzone" },
  { section: "headTilt", field: "confirmFrames", documentKey: "confirm_frames" },
  { section: "gesture", field: "cooldownSeconds", documentKey: "cooldown_s" },
];

export type ThresholdsDocument = Record<string, Record<string, number>>;

const documentSection = (entry: ThresholdKey) => DOCUMENT_SECTIONS[entry.section];

const documentPath = (entry: ThresholdKey) =>
  `${documentSection(entry)}.${entry.documentKey}`;

/** `head_tilt.deadzone` is overridden by `FACECUE_HEAD_TILT_DEADZONE`. */
export const toEnvKey = (entry: ThresholdKey) =>
  `FACECUE_${documentSection(entry)}_${entry.documentKey}`.toUpperCase();

const readValue = (config: GestureConfig, entry: ThresholdKey): number => {
  switch (entry.section) {
    case "eye":
      return config.eye[entry.field];
    case "mouth":
      return config.mouth[entry.field];
    case "eyebrow":
      return config.eyebrow[entry.field];
    case "headTilt":
      return config.headTilt[entry.field];
    case "gesture":
      return config.gesture[entry.field];
  }
};

const writeValue = (config: GestureConfig, entry: ThresholdKey, value: number) => {
  switch (entry.section) {
    case "eye":
      config.eye[entry.field] = value;
      return;
    case "mouth":
      config.mouth[entry.field] = value;
      return;
    case "eyebrow":
      config.eyebrow[entry.field] = value;
      return;
    case "headTilt":
      config.headTilt[entry.field] = value;
      return;
    case "gesture":
      config.gesture[entry.field] = value;
  }
};

export const toThresholdsDocument = (config: GestureConfig): ThresholdsDocument => {
  const document: ThresholdsDocument = {};
  for (const entry of THRESHOLD_KEYS) {
    const sectionName = documentSection(entry);
    const section = document[sectionName] ?? {};
    section[entry.documentKey] = readValue(config, entry);
    document[sectionName] = section;
  }
  return document;
};

/**
 * Layers a parsed thresholds document over `base`. Missing or non-numeric
 * values keep the base value and are reported through `logger`.
 */
export const applyThresholdsDocument = (
  base: GestureConfig,
  document: unknown,
  logger: Logger = getLogger("thresholds"),
): GestureConfig => {
  const config = cloneGestureConfig(base);

  if (!isRecord(document)) {
    logger.warn("Thresholds document is not an object, using defaults");
    return config;
  }

  const missing: string[] = [];
  for (const entry of THRESHOLD_KEYS) {
    const section = document[documentSection(entry)];
    const value = isRecord(section) ? section[entry.documentKey] : undefined;

    if (value === undefined) {
      missing.push(documentPath(entry));
      continue;
    }
    if (typeof value !== "number" || !Number.isFinite(value)) {
      logger.warn("Ignoring non-numeric threshold value", {
        key: documentPath(entry),
        value: String(value),
      });
      continue;
    }
    writeValue(config, entry, value);
  }

  if (missing.length > 0) {
    logger.warn("Thresholds document is missing keys, using defaults", {
      keys: missing,
    });
  }

  const known = new Set(THRESHOLD_KEYS.map((entry) => documentPath(entry)));
  const unknown: string[] = [];
  for (const [sectionName, section] of Object.entries(document)) {
    if (!isRecord(section)) {
      unknown.push(sectionName);
      continue;
    }
    for (const name of Object.keys(section)) {
      if (!known.has(`${sectionName}.${name}`)) {
        unknown.push(`${sectionName}.${name}`);
      }
    }
  }
  if (unknown.length > 0) {
    logger.warn("Ignoring unknown thresholds entries", { keys: unknown });
  }

  return config;
};

export const applyThresholdEnvOverrides = (
  base: GestureConfig,
  env: RuntimeEnv,
  logger: Logger = getLogger("thresholds"),
): GestureConfig => {
  const config = cloneGestureConfig(base);

  for (const entry of THRESHOLD_KEYS) {
    const envKey = toEnvKey(entry);
    const raw = env[envKey];
    if (raw === undefined || raw.trim().length === 0) {
      continue;
    }

    const value = parseNumericEnv(raw);
    if (value === null) {
      logger.warn("Ignoring non-numeric threshold override", {
        key: envKey,
        value: raw,
      });
      continue;
    }
    writeValue(config, entry, value);
  }

  return config;
};

const isMissingFileError = (error: unknown): boolean => {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
};

export const readThresholdsDocument = async (
  path: string,
  logger: Logger = getLogger("thresholds"),
): Promise<unknown> => {
  let contents: string;
  try {
    contents = await readFile(path, "utf8");
  } catch (error) {
    if (isMissingFileError(error)) {
      logger.warn("Thresholds file not found, using defaults", { path });
      return null;
    }
    throw error;
  }

  try {
    return JSON.parse(contents);
  } catch (error) {
    throw new Error(
      `Thresholds file ${path} is not valid JSON: ${String(toErrorPayload(error).error)}`,
    );
  }
};

export type LoadGestureConfigOptions = {
  path: string;
  env?: RuntimeEnv;
  logger?: Logger;
};

/** Defaults, then the thresholds file, then FACECUE_* overrides; validated last. */
export const loadGestureConfig = async ({
  path,
  env = process.env,
  logger = getLogger("thresholds"),
}: LoadGestureConfigOptions): Promise<GestureConfig> => {
  const document = await readThresholdsDocument(path, logger);
  const fromFile =
    document === null
      ? cloneGestureConfig(DEFAULT_GESTURE_CONFIG)
      : applyThresholdsDocument(DEFAULT_GESTURE_CONFIG, document, logger);
  const config = applyThresholdEnvOverrides(fromFile, env, logger);

  assertValidGestureConfig(config);
  logger.info("Gesture thresholds loaded", { path, thresholds: toThresholdsDocument(config) });
  return config;
};
