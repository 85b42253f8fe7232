import {
  type ResolvedScoreConfig,
  type ScoreConfigOverrides,
  cloneScoreConfig,
  getScoreConfig,
  mergeScoreConfig,
} from "../config/score-config";
import type { TallyEvent } from "../shared/types/event";
import type { ScoreSnapshot } from "../shared/types/score";
import { bandColor, toHex } from "./color-bands";
import { decayedTotal, progressFor } from "./decay";
import { minuteTotals } from "./totals";

/**
 * Stateless scorer: every call derives the display state from `now`, the
 * events and the config fixed at construction.
 */
export class ScoreModel {
  private readonly config: ResolvedScoreConfig;

  // A full ResolvedScoreConfig is accepted too and replaces every field.
  constructor(overrides?: ScoreConfigOverrides | null) {
    this.config = mergeScoreConfig(getScoreConfig(), overrides);
  }

  getConfig(): ResolvedScoreConfig {
    return cloneScoreConfig(this.config);
  }

  decayedTotal(now: Date, events: readonly TallyEvent[]): number {
    return decayedTotal(events, now, this.config.repairWindowSeconds);
  }

  progress(now: Date, events: readonly TallyEvent[]): number {
    return progressFor(
      this.decayedTotal(now, events),
      this.config.fullScaleMinutes,
    );
  }

  // Driven by linear progress; gamma only shapes the colour curve.
  isCritical(progress: number): boolean {
    return progress >= this.config.bandThresholds[2];
  }

  recompute(now: Date, events: readonly TallyEvent[]): ScoreSnapshot {
    const total = this.decayedTotal(now, events);
    const progress = progressFor(total, this.config.fullScaleMinutes);
    const biasedProgress = progress ** this.config.gamma;
    const { band, color } = bandColor(
      biasedProgress,
      this.config.bandThresholds,
      this.config.palette,
    );

    let lastEventAt: Date | null = null;
    for (const event of events) {
      if (!lastEventAt || event.timestamp.getTime() > lastEventAt.getTime()) {
        lastEventAt = event.timestamp;
      }
    }

    return {
      computedAt: new Date(now.getTime()),
      decayedTotal: total,
      progress,
      biasedProgress,
      band,
      color,
      hex: toHex(color),
      isCritical: this.isCritical(progress),
      totals: minuteTotals(events, now),
      eventCount: events.length,
      lastEventAt: lastEventAt ? new Date(lastEventAt.getTime()) : null,
    };
  }
}
