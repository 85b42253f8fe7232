import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  DEFAULT_SCORE_CONFIG,
  getScoreConfig,
  mergeScoreConfig,
  refreshScoreConfigFromEnv,
  resetScoreConfig,
  toBandThresholds,
  updateScoreConfig,
} from "../score-config";

vi.mock("../../shared/logger", () => ({
  getLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    flush: vi.fn(),
  }),
}));

const SCORE_ENV_KEYS = [
  "TAPMETER_REPAIR_WINDOW_SECONDS",
  "TAPMETER_FULL_SCALE_MINUTES",
  "TAPMETER_BAND_THRESHOLDS",
  "TAPMETER_GAMMA",
];

describe("score config", () => {
  beforeEach(() => {
    for (const key of SCORE_ENV_KEYS) {
      vi.stubEnv(key, "");
    }
    resetScoreConfig();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    resetScoreConfig();
  });

  it("uses the defaults without overrides", () => {
    expect(getScoreConfig()).toEqual(DEFAULT_SCORE_CONFIG);
  });

  it("reads overrides from the environment", () => {
    vi.stubEnv("TAPMETER_REPAIR_WINDOW_SECONDS", "3600");
    vi.stubEnv("TAPMETER_FULL_SCALE_MINUTES", "90");
    vi.stubEnv("TAPMETER_BAND_THRESHOLDS", "0.2, 0.5, 0.8");
    vi.stubEnv("TAPMETER_GAMMA", "0.5");

    const config = resetScoreConfig();

    expect(config.repairWindowSeconds).toBe(3600);
    expect(config.fullScaleMinutes).toBe(90);
    expect(config.bandThresholds).toEqual([0.2, 0.5, 0.8]);
    expect(config.gamma).toBe(0.5);
    expect(config.palette).toEqual(DEFAULT_SCORE_CONFIG.palette);
  });

  it("clamps numeric environment values into range", () => {
    vi.stubEnv("TAPMETER_GAMMA", "50");
    vi.stubEnv("TAPMETER_REPAIR_WINDOW_SECONDS", "0");

    const config = resetScoreConfig();

    expect(config.gamma).toBe(10);
    expect(config.repairWindowSeconds).toBe(1);
  });

  it.each(["0.5,0.4,0.9", "0.2,abc,0.8", "0.2,0.5", "0,0.5,0.8"])(
    "ignores band thresholds %j",
    (value) => {
      vi.stubEnv("TAPMETER_BAND_THRESHOLDS", value);

      expect(resetScoreConfig().bandThresholds).toEqual([0.35, 0.65, 0.85]);
    },
  );

  it("applies runtime updates until reset", () => {
    const updated = updateScoreConfig({ gamma: 1.2, fullScaleMinutes: 60 });

    expect(updated.gamma).toBe(1.2);
    expect(updated.fullScaleMinutes).toBe(60);
    expect(getScoreConfig().repairWindowSeconds).toBe(86_400);

    expect(resetScoreConfig().gamma).toBe(0.88);
  });

  it("keeps runtime updates when the environment is re-read", () => {
    updateScoreConfig({ gamma: 1.2 });
    vi.stubEnv("TAPMETER_FULL_SCALE_MINUTES", "90");

    const refreshed = refreshScoreConfigFromEnv();

    expect(refreshed.gamma).toBe(1.2);
    expect(refreshed.fullScaleMinutes).toBe(90);
  });

  it("hands out copies of the active config", () => {
    const config = getScoreConfig();
    config.palette.fresh.r = 0;

    expect(getScoreConfig().palette.fresh.r).toBe(0.38);
  });
});

describe("mergeScoreConfig", () => {
  it("keeps the base value for non-finite overrides", () => {
    const merged = mergeScoreConfig(DEFAULT_SCORE_CONFIG, {
      repairWindowSeconds: Number.NaN,
      gamma: Number.POSITIVE_INFINITY,
    });

    expect(merged.repairWindowSeconds).toBe(86_400);
    expect(merged.gamma).toBe(0.88);
  });

  it("replaces valid palette colours and ignores out-of-range ones", () => {
    const merged = mergeScoreConfig(DEFAULT_SCORE_CONFIG, {
      palette: {
        fresh: { r: 2, g: 0, b: 0 },
        browning: { r: 0.5, g: 0.5, b: 0.5 },
      },
    });

    expect(merged.palette.fresh).toEqual({ r: 0.38, g: 0.74, b: 0.46 });
    expect(merged.palette.browning).toEqual({ r: 0.5, g: 0.5, b: 0.5 });
  });

  it("does not mutate the base config", () => {
    mergeScoreConfig(DEFAULT_SCORE_CONFIG, { fullScaleMinutes: 10 });

    expect(DEFAULT_SCORE_CONFIG.fullScaleMinutes).toBe(120);
  });
});

describe("toBandThresholds", () => {
  it("accepts three ascending values inside (0, 1)", () => {
    expect(toBandThresholds([0.1, 0.2, 0.3])).toEqual([0.1, 0.2, 0.3]);
  });

  it.each([[[0.1, 0.1, 0.3]], [[0.1, 0.2, 1]], [[0.3, 0.2, 0.1]], [[0.5]]])(
    "rejects %j",
    (values) => {
      expect(toBandThresholds(values)).toBeNull();
    },
  );
});
