export type RuntimeEnv = Record<string, string | undefined>;

const TRUE_FLAGS = new Set(["1", "true", "yes", "on"]);
const FALSE_FLAGS = new Set(["0", "false", "no", "off"]);

export const parseOptionalBoolean = (value?: string | null): boolean | null => {
  if (typeof value !== "string") {
    return null;
  }
  const normalised = value.trim().toLowerCase();
  if (TRUE_FLAGS.has(normalised)) {
    return true;
  }
  if (FALSE_FLAGS.has(normalised)) {
    return false;
  }
  return null;
};

export const parseBooleanFlag = (
  value?: string | null,
  defaultValue = false,
): boolean => {
  return parseOptionalBoolean(value) ?? defaultValue;
};

type NumericOptions = {
  integer?: boolean;
  min?: number;
  max?: number;
};

/**
 * Strict numeric parse: the whole trimmed string must be a number. Returns
 * null for blank, malformed or out-of-range input so callers can fall back.
 */
export const parseNumericEnv = (
  value: string | null | undefined,
  options: NumericOptions = {},
): number | null => {
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return null;
  }
  const parsed = Number(trimmed);
  if (!Number.isFinite(parsed)) {
    return null;
  }
  if (options.integer && !Number.isInteger(parsed)) {
    return null;
  }
  if (options.min !== undefined && parsed < options.min) {
    return null;
  }
  if (options.max !== undefined && parsed > options.max) {
    return null;
  }
  return parsed;
};

export const getEnvVar = (
  key: string,
  env: RuntimeEnv = process.env,
): string | undefined => {
  const value = env[key];
  return value === undefined || value.trim().length === 0 ? undefined : value;
};
