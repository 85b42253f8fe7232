import { refreshScoreConfigFromEnv } from "../config/score-config";
import { ScoreModel } from "../scoring/score-model";
import { readNumericEnv } from "../shared/env";
import { loadEnvironment } from "../shared/loadEnv";
import { getLogger } from "../shared/logger";
import { flushSentry, initSentry } from "../shared/sentry";
import { SqliteBlobStore } from "../store/blobStore";
import { openDatabase, resolveDatabasePath } from "../store/client";
import { EventStore } from "../store/eventStore";
import { TapPreferences } from "../store/preferences";
import { DEFAULT_REFRESH_INTERVAL_MS, DecayTicker } from "./decayTicker";
import { type TrackerStore, createTrackerStore } from "./trackerStore";

const logger = getLogger("runtime", "host");

export type TrackerRuntimeOptions = {
  databasePath?: string;
  envFile?: string;
  refreshIntervalMs?: number;
  clock?: () => Date;
};

export type TrackerRuntime = {
  eventStore: EventStore;
  scoreModel: ScoreModel;
  preferences: TapPreferences;
  store: TrackerStore;
  ticker: DecayTicker;
  start: () => void;
  dispose: () => Promise<void>;
};

const resolveRefreshInterval = (explicit?: number): number => {
  if (explicit !== undefined) {
    return explicit;
  }
  return (
    readNumericEnv("TAPMETER_REFRESH_INTERVAL_MS", {
      min: 1000,
      max: 24 * 60 * 60 * 1000,
      integer: true,
    }) ?? DEFAULT_REFRESH_INTERVAL_MS
  );
};

/**
 * Wires the tracker for a host process: environment, error reporting,
 * SQLite-backed storage, the score model, the reactive store and the
 * refresh ticker.
 */
export const createTrackerRuntime = (
  options: TrackerRuntimeOptions = {},
): TrackerRuntime => {
  loadEnvironment(options.envFile);
  initSentry();

  const clock = options.clock ?? (() => new Date());
  const databasePath = resolveDatabasePath(options.databasePath);
  const database = openDatabase(databasePath);
  const blobStore = new SqliteBlobStore(database.db, clock);

  const eventStore = new EventStore({ blobStore, clock });
  const scoreModel = new ScoreModel(refreshScoreConfigFromEnv());
  const preferences = new TapPreferences(blobStore);
  const store = createTrackerStore({
    eventStore,
    scoreModel,
    preferences,
    clock,
  });

  const ticker = new DecayTicker({
    compute: (now) => store.getState().refresh(now),
    onTick: (snapshot) => {
      if (snapshot.isCritical) {
        logger.debug("Score is in the critical stage", {
          progress: snapshot.progress,
        });
      }
    },
    intervalMs: resolveRefreshInterval(options.refreshIntervalMs),
    clock,
  });

  logger.info("Tracker runtime ready", {
    databasePath,
    events: eventStore.count,
  });

  return {
    eventStore,
    scoreModel,
    preferences,
    store,
    ticker,
    start: () => ticker.start(),
    dispose: async () => {
      ticker.stop();
      database.close();
      await flushSentry();
    },
  };
};
