export {
  DEFAULT_SCORE_CONFIG,
  getScoreConfig,
  refreshScoreConfigFromEnv,
  resetScoreConfig,
  updateScoreConfig,
} from "./config/score-config";
export type {
  ResolvedScoreConfig,
  ScoreConfigOverrides,
} from "./config/score-config";
export { DecayTicker, DEFAULT_REFRESH_INTERVAL_MS } from "./host/decayTicker";
export { createTrackerRuntime } from "./host/runtime";
export type { TrackerRuntime, TrackerRuntimeOptions } from "./host/runtime";
export { createTrackerStore } from "./host/trackerStore";
export type { TrackerState, TrackerStore } from "./host/trackerStore";
export { bandColor, lerp, lerpRgb, toHex } from "./scoring/color-bands";
export { decayWeight, decayedTotal, progressFor } from "./scoring/decay";
export { ScoreModel } from "./scoring/score-model";
export { minuteTotals } from "./scoring/totals";
export { getLogger } from "./shared/logger";
export type { Logger } from "./shared/logger";
export { formatTimestamp } from "./shared/time";
export type { EventOrder, TallyEvent } from "./shared/types/event";
export type {
  BandThresholds,
  MinuteTotals,
  Rgb,
  ScoreBand,
  ScorePalette,
  ScoreSnapshot,
} from "./shared/types/score";
export { MemoryBlobStore, SqliteBlobStore } from "./store/blobStore";
export type { BlobStore } from "./store/blobStore";
export { openDatabase } from "./store/client";
export { EventStore } from "./store/eventStore";
export type { EventStoreOptions } from "./store/eventStore";
export { sortEvents } from "./store/eventCodec";
export { TapPreferences, commitMinutesInput } from "./store/preferences";
