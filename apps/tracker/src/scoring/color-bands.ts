import type {
  BandThresholds,
  Rgb,
  ScoreBand,
  ScorePalette,
} from "../shared/types/score";

export type BandPosition = {
  band: ScoreBand;
  from: Rgb;
  to: Rgb;
  t: number;
};

export const lerp = (a: number, b: number, t: number): number => a + (b - a) * t;

export const lerpRgb = (from: Rgb, to: Rgb, t: number): Rgb => ({
  r: lerp(from.r, to.r, t),
  g: lerp(from.g, to.g, t),
  b: lerp(from.b, to.b, t),
});

/**
 * Locates `p` in [0, s1), [s1, s2), [s2, s3), [s3, 1]. A value on a
 * threshold opens the next band.
 */
export const locateBand = (
  p: number,
  [s1, s2, s3]: BandThresholds,
  palette: ScorePalette,
): BandPosition => {
  if (p < s1) {
    return { band: "fresh", from: palette.fresh, to: palette.browning, t: p / s1 };
  }
  if (p < s2) {
    return {
      band: "browning",
      from: palette.browning,
      to: palette.rotten,
      t: (p - s1) / (s2 - s1),
    };
  }
  if (p < s3) {
    return {
      band: "rotten",
      from: palette.rotten,
      to: palette.bruised,
      t: (p - s2) / (s3 - s2),
    };
  }
  return {
    band: "critical",
    from: palette.bruised,
    to: palette.critical,
    t: (p - s3) / (1 - s3),
  };
};

export const bandColor = (
  p: number,
  thresholds: BandThresholds,
  palette: ScorePalette,
): { band: ScoreBand; color: Rgb } => {
  const { band, from, to, t } = locateBand(p, thresholds, palette);
  return { band, color: lerpRgb(from, to, t) };
};

const toHexChannel = (value: number): string => {
  const scaled = Math.round(Math.min(1, Math.max(0, value)) * 255);
  return scaled.toString(16).padStart(2, "0");
};

export const toHex = ({ r, g, b }: Rgb): string => {
  return `#${toHexChannel(r)}${toHexChannel(g)}${toHexChannel(b)}`;
};
