export type Rgb = {
  r: number;
  g: number;
  b: number;
};

export type ScoreBand = "fresh" | "browning" | "rotten" | "critical";

export type ScorePalette = {
  fresh: Rgb;
  browning: Rgb;
  rotten: Rgb;
  bruised: Rgb;
  critical: Rgb;
};

export type BandThresholds = readonly [number, number, number];

export type MinuteTotals = {
  allTime: number;
  last7Days: number;
};

export type ScoreSnapshot = {
  computedAt: Date;
  decayedTotal: number;
  progress: number;
  biasedProgress: number;
  band: ScoreBand;
  color: Rgb;
  hex: string;
  isCritical: boolean;
  totals: MinuteTotals;
  eventCount: number;
  lastEventAt: Date | null;
};
