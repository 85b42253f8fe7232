/**
 * Blob store keys and persistence limits
 */

/**
 * Key under which the whole event collection is stored
 */
export const EVENTS_STORAGE_KEY = "tapmeter.events";

/**
 * Key of the "minutes per tap" preference
 */
export const TAP_MINUTES_STORAGE_KEY = "tapmeter.defaultTapMinutes";

export const DEFAULT_TAP_MINUTES = 30;
export const MIN_TAP_MINUTES = 1;
export const MAX_TAP_MINUTES = 600;

export const BLOBS_TABLE = "blobs" as const;

export const DATABASE_FILE_NAME = "tapmeter.sqlite";
