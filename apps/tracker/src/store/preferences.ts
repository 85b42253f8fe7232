import { clamp } from "../shared/env";
import { describeError, getLogger } from "../shared/logger";
import { isFiniteNumber } from "../shared/validation/eventRecords";
import { type BlobStore, decodeJson, encodeJson } from "./blobStore";
import {
  DEFAULT_TAP_MINUTES,
  MAX_TAP_MINUTES,
  MIN_TAP_MINUTES,
  TAP_MINUTES_STORAGE_KEY,
} from "./constants";

const logger = getLogger("tap-preferences", "store");

const clampTapMinutes = (value: number): number => {
  return clamp(Math.trunc(value), MIN_TAP_MINUTES, MAX_TAP_MINUTES);
};

/**
 * Resolves free-text minutes input. Non-digits are dropped, an empty result
 * keeps `current`, anything else is clamped to the allowed range.
 */
export const commitMinutesInput = (raw: string, current: number): number => {
  const digits = raw.replace(/\D/g, "");
  if (digits.length === 0) {
    return current;
  }
  return clampTapMinutes(Number.parseInt(digits, 10));
};

/** Persisted "minutes per tap" used by quick taps. */
export class TapPreferences {
  private readonly blobStore: BlobStore;

  constructor(blobStore: BlobStore) {
    this.blobStore = blobStore;
  }

  getDefaultTapMinutes(): number {
    try {
      const raw = this.blobStore.get(TAP_MINUTES_STORAGE_KEY);
      if (!raw) {
        return DEFAULT_TAP_MINUTES;
      }
      const value = decodeJson(raw);
      return isFiniteNumber(value) ? clampTapMinutes(value) : DEFAULT_TAP_MINUTES;
    } catch (error) {
      logger.warn(`Failed to read tap minutes: ${describeError(error)}`);
      return DEFAULT_TAP_MINUTES;
    }
  }

  setDefaultTapMinutes(minutes: number): number {
    const next = Number.isFinite(minutes)
      ? clampTapMinutes(minutes)
      : this.getDefaultTapMinutes();
    try {
      this.blobStore.set(TAP_MINUTES_STORAGE_KEY, encodeJson(next));
    } catch (error) {
      logger.error(`Failed to persist tap minutes: ${describeError(error)}`);
    }
    return next;
  }
}
