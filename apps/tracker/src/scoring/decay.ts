import { secondsBetween } from "../shared/time";
import type { TallyEvent } from "../shared/types/event";

/**
 * Linear weight of an event of the given age. Exactly 0 from the repair
 * window onwards, exactly 1 at age 0 and for future-dated events.
 */
export const decayWeight = (
  ageSeconds: number,
  repairWindowSeconds: number,
): number => {
  if (ageSeconds >= repairWindowSeconds) {
    return 0;
  }
  if (ageSeconds <= 0) {
    return 1;
  }
  const weight = 1 - ageSeconds / repairWindowSeconds;
  return Math.min(1, Math.max(0, weight));
};

export const decayedContribution = (
  event: TallyEvent,
  now: Date,
  repairWindowSeconds: number,
): number => {
  const age = secondsBetween(event.timestamp, now);
  const weight = decayWeight(age, repairWindowSeconds);
  return weight === 0 ? 0 : event.minutesWasted * weight;
};

export const decayedTotal = (
  events: readonly TallyEvent[],
  now: Date,
  repairWindowSeconds: number,
): number => {
  return events.reduce(
    (total, event) =>
      total + decayedContribution(event, now, repairWindowSeconds),
    0,
  );
};

export const progressFor = (
  total: number,
  fullScaleMinutes: number,
): number => {
  if (!(fullScaleMinutes > 0) || !Number.isFinite(total) || total <= 0) {
    return 0;
  }
  return Math.min(total / fullScaleMinutes, 1);
};
