import { SECONDS_PER_WEEK, secondsBetween } from "../shared/time";
import type { TallyEvent } from "../shared/types/event";
import type { MinuteTotals } from "../shared/types/score";

// Undecayed sums; the repair window plays no part here.
export const minuteTotals = (
  events: readonly TallyEvent[],
  now: Date,
): MinuteTotals => {
  let allTime = 0;
  let last7Days = 0;

  for (const event of events) {
    allTime += event.minutesWasted;
    if (secondsBetween(event.timestamp, now) <= SECONDS_PER_WEEK) {
      last7Days += event.minutesWasted;
    }
  }

  return { allTime, last7Days };
};
