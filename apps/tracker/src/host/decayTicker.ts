import { describeError, getLogger } from "../shared/logger";
import type { ScoreSnapshot } from "../shared/types/score";

type IntervalHandle = ReturnType<typeof setInterval>;

type SnapshotListener = (snapshot: ScoreSnapshot) => void;

export const DEFAULT_REFRESH_INTERVAL_MS = 60_000;

const logger = getLogger("decay-ticker", "host");

const unrefIfPossible = (handle: unknown): void => {
  if (
    typeof handle === "object" &&
    handle !== null &&
    "unref" in handle &&
    typeof handle.unref === "function"
  ) {
    handle.unref();
  }
};

/**
 * Re-runs the score computation on a fixed interval so the colour keeps
 * healing while nothing is logged. Holds no resources besides its timer.
 */
export class DecayTicker {
  private readonly compute: (now: Date) => ScoreSnapshot;

  private readonly onTick: SnapshotListener;

  private readonly intervalMs: number;

  private readonly clock: () => Date;

  private timer: IntervalHandle | null = null;

  private lastSnapshot: ScoreSnapshot | null = null;

  constructor({
    compute,
    onTick,
    intervalMs = DEFAULT_REFRESH_INTERVAL_MS,
    clock = () => new Date(),
  }: {
    compute: (now: Date) => ScoreSnapshot;
    onTick: SnapshotListener;
    intervalMs?: number;
    clock?: () => Date;
  }) {
    this.compute = compute;
    this.onTick = onTick;
    this.intervalMs = intervalMs > 0 ? intervalMs : DEFAULT_REFRESH_INTERVAL_MS;
    this.clock = clock;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.tick();
    this.timer = setInterval(() => this.tick(), this.intervalMs);
    unrefIfPossible(this.timer);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  getLastSnapshot(): ScoreSnapshot | null {
    return this.lastSnapshot;
  }

  tick(): ScoreSnapshot | null {
    try {
      const snapshot = this.compute(this.clock());
      this.lastSnapshot = snapshot;
      this.onTick(snapshot);
      return snapshot;
    } catch (error) {
      logger.error(`Decay tick failed: ${describeError(error)}`);
      return null;
    }
  }
}
