import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  resetScoreConfig,
  updateScoreConfig,
} from "../../config/score-config";
import { IN_MEMORY_DATABASE } from "../../store/client";
import { type TrackerRuntime, createTrackerRuntime } from "../runtime";

vi.mock("../../shared/logger", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../../shared/logger")>();
  return {
    ...actual,
    getLogger: () => ({
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      fatal: vi.fn(),
      flush: vi.fn(),
    }),
  };
});

const NOW = new Date("2025-06-01T12:00:00.000Z");

describe("createTrackerRuntime", () => {
  let runtime: TrackerRuntime;

  const startRuntime = () =>
    createTrackerRuntime({
      databasePath: IN_MEMORY_DATABASE,
      refreshIntervalMs: 1_000,
      clock: () => new Date(NOW.getTime()),
    });

  beforeEach(() => {
    vi.stubEnv("SENTRY_DSN", "");
    vi.stubEnv("TAPMETER_GAMMA", "");
    vi.stubEnv("TAPMETER_FULL_SCALE_MINUTES", "");
    vi.stubEnv("TAPMETER_REPAIR_WINDOW_SECONDS", "");
    vi.stubEnv("TAPMETER_BAND_THRESHOLDS", "");
    runtime = startRuntime();
  });

  afterEach(async () => {
    await runtime.dispose();
    vi.unstubAllEnvs();
    resetScoreConfig();
  });

  it("wires storage, preferences and scoring together", () => {
    const { store, preferences, eventStore } = runtime;

    expect(store.getState().events).toEqual([]);

    store.getState().addTap();
    preferences.setDefaultTapMinutes(45);
    store.getState().addTap();

    expect(eventStore.list().map((event) => event.minutesWasted)).toEqual([
      30, 45,
    ]);
    expect(store.getState().snapshot.decayedTotal).toBe(75);
    expect(store.getState().snapshot.progress).toBe(0.625);
  });

  it("uses the default score configuration", () => {
    expect(runtime.scoreModel.getConfig().fullScaleMinutes).toBe(120);
  });

  it("keeps score overrides applied before start-up", async () => {
    await runtime.dispose();
    updateScoreConfig({ fullScaleMinutes: 60 });

    runtime = startRuntime();
    runtime.store.getState().addTap(30);

    expect(runtime.scoreModel.getConfig().fullScaleMinutes).toBe(60);
    expect(runtime.store.getState().snapshot.progress).toBe(0.5);
  });

  it("starts and stops the refresh ticker", async () => {
    runtime.start();
    expect(runtime.ticker.isRunning()).toBe(true);
    expect(runtime.ticker.getLastSnapshot()?.computedAt).toEqual(NOW);

    await runtime.dispose();
    expect(runtime.ticker.isRunning()).toBe(false);
  });
});
