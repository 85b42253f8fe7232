import {
  clamp,
  getEnvVar,
  parseNumberListEnv,
  readNumericEnv,
} from "../shared/env";
import { getLogger } from "../shared/logger";
import type { BandThresholds, Rgb, ScorePalette } from "../shared/types/score";

const logger = getLogger("score-config", "scoring");

export type ResolvedScoreConfig = {
  repairWindowSeconds: number;
  fullScaleMinutes: number;
  bandThresholds: BandThresholds;
  gamma: number;
  palette: ScorePalette;
};

export type ScoreConfigOverrides = Partial<{
  repairWindowSeconds: number;
  fullScaleMinutes: number;
  bandThresholds: readonly number[];
  gamma: number;
  palette: Partial<ScorePalette>;
}>;

const PALETTE_KEYS = [
  "fresh",
  "browning",
  "rotten",
  "bruised",
  "critical",
] as const satisfies readonly (keyof ScorePalette)[];

export const REPAIR_WINDOW_RANGE = { min: 1, max: 365 * 24 * 60 * 60 };
export const FULL_SCALE_RANGE = { min: 0, max: 1_000_000 };
export const GAMMA_RANGE = { min: 0.01, max: 10 };

export const DEFAULT_SCORE_CONFIG: ResolvedScoreConfig = {
  repairWindowSeconds: 24 * 60 * 60,
  fullScaleMinutes: 120,
  bandThresholds: [0.35, 0.65, 0.85],
  gamma: 0.88,
  palette: {
    fresh: { r: 0.38, g: 0.74, b: 0.46 },
    browning: { r: 0.6, g: 0.52, b: 0.24 },
    rotten: { r: 0.62, g: 0.2, b: 0.18 },
    bruised: { r: 0.42, g: 0.22, b: 0.5 },
    critical: { r: 0.03, g: 0.03, b: 0.04 },
  },
};

const clampRepairWindow = (value: number, fallback: number): number => {
  if (!Number.isFinite(value)) {
    return fallback;
  }
  return clamp(value, REPAIR_WINDOW_RANGE.min, REPAIR_WINDOW_RANGE.max);
};

const clampFullScale = (value: number, fallback: number): number => {
  if (!Number.isFinite(value)) {
    return fallback;
  }
  return clamp(value, FULL_SCALE_RANGE.min, FULL_SCALE_RANGE.max);
};

const clampGamma = (value: number, fallback: number): number => {
  if (!Number.isFinite(value)) {
    return fallback;
  }
  return clamp(value, GAMMA_RANGE.min, GAMMA_RANGE.max);
};

/**
 * Thresholds must be three strictly ascending values inside (0, 1).
 */
export const toBandThresholds = (
  values: readonly number[],
): BandThresholds | null => {
  if (values.length !== 3) {
    return null;
  }
  const [s1, s2, s3] = values;
  const ordered = 0 < s1 && s1 < s2 && s2 < s3 && s3 < 1;
  return ordered ? [s1, s2, s3] : null;
};

const isUnitChannel = (value: number): boolean => {
  return Number.isFinite(value) && value >= 0 && value <= 1;
};

const isValidRgb = (color: Rgb): boolean => {
  return isUnitChannel(color.r) && isUnitChannel(color.g) && isUnitChannel(color.b);
};

const clonePalette = (palette: ScorePalette): ScorePalette => ({
  fresh: { ...palette.fresh },
  browning: { ...palette.browning },
  rotten: { ...palette.rotten },
  bruised: { ...palette.bruised },
  critical: { ...palette.critical },
});

export const cloneScoreConfig = (
  config: ResolvedScoreConfig,
): ResolvedScoreConfig => {
  const [s1, s2, s3] = config.bandThresholds;
  return {
    repairWindowSeconds: config.repairWindowSeconds,
    fullScaleMinutes: config.fullScaleMinutes,
    bandThresholds: [s1, s2, s3],
    gamma: config.gamma,
    palette: clonePalette(config.palette),
  };
};

export const mergeScoreConfig = (
  config: ResolvedScoreConfig,
  overrides?: ScoreConfigOverrides | null,
): ResolvedScoreConfig => {
  const next = cloneScoreConfig(config);
  if (!overrides) {
    return next;
  }

  if (overrides.repairWindowSeconds !== undefined) {
    next.repairWindowSeconds = clampRepairWindow(
      overrides.repairWindowSeconds,
      next.repairWindowSeconds,
    );
  }
  if (overrides.fullScaleMinutes !== undefined) {
    next.fullScaleMinutes = clampFullScale(
      overrides.fullScaleMinutes,
      next.fullScaleMinutes,
    );
  }
  if (overrides.gamma !== undefined) {
    next.gamma = clampGamma(overrides.gamma, next.gamma);
  }
  if (overrides.bandThresholds !== undefined) {
    const thresholds = toBandThresholds(overrides.bandThresholds);
    if (thresholds) {
      next.bandThresholds = thresholds;
    } else {
      logger.warn("Ignoring band thresholds that are not ascending in (0, 1)", {
        bandThresholds: [...overrides.bandThresholds],
      });
    }
  }
  if (overrides.palette) {
    for (const name of PALETTE_KEYS) {
      const color = overrides.palette[name];
      if (!color) {
        continue;
      }
      if (!isValidRgb(color)) {
        logger.warn(`Ignoring palette colour "${name}" outside [0, 1]`);
        continue;
      }
      next.palette[name] = { ...color };
    }
  }

  return next;
};

const createEnvOverrides = (): ScoreConfigOverrides | null => {
  const repairWindowSeconds = readNumericEnv(
    "TAPMETER_REPAIR_WINDOW_SECONDS",
    REPAIR_WINDOW_RANGE,
  );
  const fullScaleMinutes = readNumericEnv(
    "TAPMETER_FULL_SCALE_MINUTES",
    FULL_SCALE_RANGE,
  );
  const gamma = readNumericEnv("TAPMETER_GAMMA", GAMMA_RANGE);
  const bandThresholds = parseNumberListEnv(
    getEnvVar("TAPMETER_BAND_THRESHOLDS"),
  );

  const overrides: ScoreConfigOverrides = {};
  if (repairWindowSeconds !== null) {
    overrides.repairWindowSeconds = repairWindowSeconds;
  }
  if (fullScaleMinutes !== null) {
    overrides.fullScaleMinutes = fullScaleMinutes;
  }
  if (gamma !== null) {
    overrides.gamma = gamma;
  }
  if (bandThresholds !== null) {
    overrides.bandThresholds = bandThresholds;
  }

  return Object.keys(overrides).length > 0 ? overrides : null;
};

// Programmatic overrides are kept apart from the environment so that
// re-reading the environment does not discard them.
let runtimeOverrides: ScoreConfigOverrides[] = [];
let activeScoreConfig: ResolvedScoreConfig | null = null;

const resolveActive = (): ResolvedScoreConfig => {
  if (!activeScoreConfig) {
    activeScoreConfig = runtimeOverrides.reduce(
      mergeScoreConfig,
      mergeScoreConfig(DEFAULT_SCORE_CONFIG, createEnvOverrides()),
    );
  }
  return activeScoreConfig;
};

export const getScoreConfig = (): ResolvedScoreConfig => {
  return cloneScoreConfig(resolveActive());
};

export const updateScoreConfig = (
  overrides: ScoreConfigOverrides,
): ResolvedScoreConfig => {
  runtimeOverrides = [...runtimeOverrides, overrides];
  activeScoreConfig = mergeScoreConfig(resolveActive(), overrides);
  return getScoreConfig();
};

/** Re-reads the environment on next use, keeping programmatic overrides. */
export const refreshScoreConfigFromEnv = (): ResolvedScoreConfig => {
  activeScoreConfig = null;
  return getScoreConfig();
};

/** Drops programmatic overrides and re-reads the environment. */
export const resetScoreConfig = (): ResolvedScoreConfig => {
  runtimeOverrides = [];
  activeScoreConfig = null;
  return getScoreConfig();
};
