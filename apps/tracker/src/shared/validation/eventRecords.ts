import type { PersistedEventRecord } from "../types/event";

export const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === "object" && value !== null && !Array.isArray(value);
};

export const isFiniteNumber = (value: unknown): value is number => {
  return typeof value === "number" && Number.isFinite(value);
};

const isPersistedDate = (value: unknown): value is string | number => {
  if (isFiniteNumber(value)) {
    return true;
  }
  return typeof value === "string" && Number.isFinite(Date.parse(value));
};

export const isPersistedEventRecord = (
  value: unknown,
): value is PersistedEventRecord => {
  if (!isRecord(value)) {
    return false;
  }

  return (
    typeof value.id === "string" &&
    value.id.length > 0 &&
    isPersistedDate(value.date) &&
    isFiniteNumber(value.minutes) &&
    Number.isInteger(value.minutes)
  );
};

export const isPersistedEventList = (
  value: unknown,
): value is PersistedEventRecord[] => {
  return Array.isArray(value) && value.every(isPersistedEventRecord);
};

export const isLegacyTimestampList = (value: unknown): value is number[] => {
  return Array.isArray(value) && value.every(isFiniteNumber);
};
