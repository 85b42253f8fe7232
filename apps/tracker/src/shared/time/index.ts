export const MS_PER_SECOND = 1000;
export const SECONDS_PER_DAY = 24 * 60 * 60;
export const SECONDS_PER_WEEK = 7 * SECONDS_PER_DAY;

// 2001-01-01T00:00:00Z, origin of numeric dates in the persisted format.
export const REFERENCE_EPOCH_MS = Date.UTC(2001, 0, 1);

export const isValidDate = (value: unknown): value is Date => {
  return value instanceof Date && Number.isFinite(value.getTime());
};

export const secondsBetween = (start: Date, end: Date): number => {
  return (end.getTime() - start.getTime()) / MS_PER_SECOND;
};

export const fromEpochSeconds = (seconds: number): Date => {
  return new Date(seconds * MS_PER_SECOND);
};

export const fromReferenceSeconds = (seconds: number): Date => {
  return new Date(REFERENCE_EPOCH_MS + seconds * MS_PER_SECOND);
};

const timestampFormatter = new Intl.DateTimeFormat(undefined, {
  dateStyle: "medium",
  timeStyle: "medium",
});

export const formatTimestamp = (
  date: Date,
  formatter: Intl.DateTimeFormat = timestampFormatter,
): string => {
  return formatter.format(date);
};
