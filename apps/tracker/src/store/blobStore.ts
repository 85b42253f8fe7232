import { eq } from "drizzle-orm";
import type { TrackerDatabase } from "./client";
import { blobs } from "./schema";

/**
 * Minimal synchronous key/value store for opaque byte payloads. Any host
 * (SQLite file, embedded KV, browser storage) can satisfy it.
 */
export interface BlobStore {
  get(key: string): Uint8Array | null;
  set(key: string, value: Uint8Array): void;
}

export class SqliteBlobStore implements BlobStore {
  private readonly db: TrackerDatabase;

  private readonly clock: () => Date;

  constructor(db: TrackerDatabase, clock: () => Date = () => new Date()) {
    this.db = db;
    this.clock = clock;
  }

  get(key: string): Uint8Array | null {
    const row = this.db.select().from(blobs).where(eq(blobs.key, key)).get();
    return row ? new Uint8Array(row.value) : null;
  }

  set(key: string, value: Uint8Array): void {
    const payload = Buffer.from(value);
    const updatedAt = this.clock().getTime();
    this.db
      .insert(blobs)
      .values({ key, value: payload, updatedAt })
      .onConflictDoUpdate({
        target: blobs.key,
        set: { value: payload, updatedAt },
      })
      .run();
  }
}

export class MemoryBlobStore implements BlobStore {
  private readonly entries = new Map<string, Uint8Array>();

  get(key: string): Uint8Array | null {
    const value = this.entries.get(key);
    return value ? new Uint8Array(value) : null;
  }

  set(key: string, value: Uint8Array): void {
    this.entries.set(key, new Uint8Array(value));
  }
}

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: true });

export const encodeJson = (value: unknown): Uint8Array => {
  return encoder.encode(JSON.stringify(value));
};

/**
 * Throws on malformed UTF-8 or JSON; callers decide how to recover.
 */
export const decodeJson = (bytes: Uint8Array): unknown => {
  return JSON.parse(decoder.decode(bytes));
};
