export type TallyEvent = {
  id: string;
  timestamp: Date;
  minutesWasted: number; // non-negative integer
};

export type EventOrder = "ascending" | "descending";

/**
 * Record shape of the current persisted format. `date` is written as an
 * ISO-8601 string; numeric values are seconds since the reference epoch.
 */
export type PersistedEventRecord = {
  id: string;
  date: string | number;
  minutes: number;
};
