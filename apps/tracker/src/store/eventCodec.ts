import {
  fromEpochSeconds,
  fromReferenceSeconds,
  isValidDate,
} from "../shared/time";
import type {
  EventOrder,
  PersistedEventRecord,
  TallyEvent,
} from "../shared/types/event";
import {
  isLegacyTimestampList,
  isPersistedEventList,
} from "../shared/validation/eventRecords";

/**
 * `dropped` counts entries whose date lies outside the range a Date can
 * hold; they are left out of `events`.
 */
export type DecodeResult =
  | { format: "current"; events: TallyEvent[]; dropped: number }
  | { format: "legacy"; events: TallyEvent[]; dropped: number }
  | { format: "invalid"; events: []; dropped: 0 };

/**
 * Non-finite input becomes 0, fractions are truncated and negatives floored
 * to 0.
 */
export const sanitizeMinutes = (value: unknown): number => {
  const numeric = typeof value === "string" ? Number(value) : value;
  if (typeof numeric !== "number" || !Number.isFinite(numeric)) {
    return 0;
  }
  return Math.max(0, Math.trunc(numeric));
};

export const compareByTimestamp = (a: TallyEvent, b: TallyEvent): number => {
  return a.timestamp.getTime() - b.timestamp.getTime();
};

export const sortEvents = (
  events: readonly TallyEvent[],
  order: EventOrder = "ascending",
): TallyEvent[] => {
  const comparator =
    order === "ascending"
      ? compareByTimestamp
      : (a: TallyEvent, b: TallyEvent) => compareByTimestamp(b, a);
  return [...events].sort(comparator);
};

export const cloneEvent = (event: TallyEvent): TallyEvent => ({
  id: event.id,
  timestamp: new Date(event.timestamp.getTime()),
  minutesWasted: event.minutesWasted,
});

export const toPersistedRecord = (event: TallyEvent): PersistedEventRecord => ({
  id: event.id,
  date: event.timestamp.toISOString(),
  minutes: event.minutesWasted,
});

const fromPersistedRecord = (record: PersistedEventRecord): TallyEvent => ({
  id: record.id,
  timestamp:
    typeof record.date === "number"
      ? fromReferenceSeconds(record.date)
      : new Date(record.date),
  minutesWasted: sanitizeMinutes(record.minutes),
});

export const decodeEvents = (
  payload: unknown,
  generateId: () => string,
): DecodeResult => {
  if (isPersistedEventList(payload)) {
    const events = payload
      .map(fromPersistedRecord)
      .filter((event) => isValidDate(event.timestamp));
    return {
      format: "current",
      events: sortEvents(events),
      dropped: payload.length - events.length,
    };
  }

  if (isLegacyTimestampList(payload)) {
    const migrated = payload
      .map(fromEpochSeconds)
      .filter(isValidDate)
      .map((timestamp) => ({
        id: generateId(),
        timestamp,
        minutesWasted: 0,
      }));
    return {
      format: "legacy",
      events: sortEvents(migrated),
      dropped: payload.length - migrated.length,
    };
  }

  return { format: "invalid", events: [], dropped: 0 };
};
