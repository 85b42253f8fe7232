export type NumericRange = {
  min: number;
  max: number;
  integer?: boolean;
};

const TRUTHY_FLAGS = new Set(["1", "true", "yes", "on"]);
const FALSY_FLAGS = new Set(["0", "false", "no", "off"]);

// Non-finite input collapses to the lower bound.
export const clamp = (value: number, min: number, max: number): number => {
  if (!Number.isFinite(value)) {
    return min;
  }
  return Math.min(max, Math.max(min, value));
};

export const parseBooleanFlag = (
  value?: string | null,
  defaultValue = false,
): boolean => {
  const normalised = value?.trim().toLowerCase();
  if (normalised === undefined) {
    return defaultValue;
  }
  if (TRUTHY_FLAGS.has(normalised)) {
    return true;
  }
  if (FALSY_FLAGS.has(normalised)) {
    return false;
  }
  return defaultValue;
};

/** Parses and clamps a numeric setting; null when absent or unparsable. */
export const parseNumericEnv = (
  value: string | null | undefined,
  range: NumericRange,
): number | null => {
  const trimmed = value?.trim();
  if (!trimmed) {
    return null;
  }
  const parsed = range.integer
    ? Number.parseInt(trimmed, 10)
    : Number.parseFloat(trimmed);
  return Number.isFinite(parsed) ? clamp(parsed, range.min, range.max) : null;
};

/**
 * Parses a comma-separated list of numbers. Returns null when the value is
 * missing or any entry fails to parse.
 */
export const parseNumberListEnv = (
  value: string | null | undefined,
): number[] | null => {
  const trimmed = value?.trim();
  if (!trimmed) {
    return null;
  }
  const entries = trimmed.split(",").map((entry) => Number.parseFloat(entry));
  return entries.every(Number.isFinite) ? entries : null;
};

export const getEnvVar = (
  key: string,
  env: NodeJS.ProcessEnv = process.env,
): string | undefined => env[key];

export const readNumericEnv = (
  key: string,
  range: NumericRange,
): number | null => parseNumericEnv(getEnvVar(key), range);
