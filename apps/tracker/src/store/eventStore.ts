import { randomUUID } from "node:crypto";
import { describeError, getLogger } from "../shared/logger";
import { captureException } from "../shared/sentry";
import { isValidDate } from "../shared/time";
import type { EventOrder, TallyEvent } from "../shared/types/event";
import { type BlobStore, decodeJson, encodeJson } from "./blobStore";
import { EVENTS_STORAGE_KEY } from "./constants";
import {
  cloneEvent,
  decodeEvents,
  sanitizeMinutes,
  sortEvents,
  toPersistedRecord,
} from "./eventCodec";

const logger = getLogger("event-store", "store");

export type EventStoreOptions = {
  blobStore: BlobStore;
  storageKey?: string;
  clock?: () => Date;
  generateId?: () => string;
};

/**
 * Owns the event collection. The collection stays sorted ascending by
 * timestamp and every mutation writes a full snapshot to the blob store.
 * Nothing here throws: bad input is sanitised and storage failures are
 * logged.
 */
export class EventStore {
  private readonly blobStore: BlobStore;

  private readonly storageKey: string;

  private readonly clock: () => Date;

  private readonly generateId: () => string;

  private events: TallyEvent[] = [];

  constructor({
    blobStore,
    storageKey = EVENTS_STORAGE_KEY,
    clock = () => new Date(),
    generateId = randomUUID,
  }: EventStoreOptions) {
    this.blobStore = blobStore;
    this.storageKey = storageKey;
    this.clock = clock;
    this.generateId = generateId;
    this.load();
  }

  get count(): number {
    return this.events.length;
  }

  get lastEvent(): TallyEvent | null {
    const last = this.events[this.events.length - 1];
    return last ? cloneEvent(last) : null;
  }

  list(): TallyEvent[] {
    return this.events.map(cloneEvent);
  }

  add(minutes: number, at?: Date): TallyEvent {
    const timestamp = new Date(
      at && isValidDate(at) ? at.getTime() : this.clock().getTime(),
    );
    const event: TallyEvent = {
      id: this.generateId(),
      timestamp,
      minutesWasted: sanitizeMinutes(minutes),
    };

    this.events.push(event);
    this.sortInPlace();
    this.persist();
    return cloneEvent(event);
  }

  update(event: TallyEvent): boolean {
    const index = this.events.findIndex((entry) => entry.id === event.id);
    if (index < 0) {
      return false;
    }

    const previous = this.events[index];
    this.events[index] = {
      id: previous.id,
      timestamp: isValidDate(event.timestamp)
        ? new Date(event.timestamp.getTime())
        : previous.timestamp,
      minutesWasted: sanitizeMinutes(event.minutesWasted),
    };
    this.sortInPlace();
    this.persist();
    return true;
  }

  deleteById(id: string): void {
    this.events = this.events.filter((entry) => entry.id !== id);
    this.persist();
  }

  /**
   * Removes the entries at `positions` of the collection as seen in `order`.
   */
  deleteByPositions(
    positions: Iterable<number>,
    order: EventOrder = "ascending",
  ): void {
    const view = sortEvents(this.events, order);
    const doomed = new Set<string>();

    for (const position of positions) {
      if (!Number.isInteger(position)) {
        continue;
      }
      const target = view[position];
      if (target) {
        doomed.add(target.id);
      }
    }

    this.events = this.events.filter((entry) => !doomed.has(entry.id));
    this.persist();
  }

  clearAll(): void {
    this.events = [];
    this.persist();
  }

  persist(): void {
    try {
      const payload = encodeJson(this.events.map(toPersistedRecord));
      this.blobStore.set(this.storageKey, payload);
    } catch (error) {
      logger.error(`Failed to persist events: ${describeError(error)}`, {
        count: this.events.length,
      });
      captureException(error, { scope: "event-store:persist" });
    }
  }

  private load(): void {
    let raw: Uint8Array | null;
    try {
      raw = this.blobStore.get(this.storageKey);
    } catch (error) {
      logger.warn(`Failed to read stored events: ${describeError(error)}`);
      return;
    }

    if (!raw) {
      return;
    }

    let payload: unknown;
    try {
      payload = decodeJson(raw);
    } catch (error) {
      logger.warn(`Stored events are not valid JSON: ${describeError(error)}`);
      return;
    }

    const decoded = decodeEvents(payload, this.generateId);
    if (decoded.dropped > 0) {
      logger.warn("Skipped stored events with out-of-range dates", {
        dropped: decoded.dropped,
      });
    }
    switch (decoded.format) {
      case "current":
        this.events = decoded.events;
        return;
      case "legacy":
        this.events = decoded.events;
        logger.info("Migrating legacy timestamp list to current format", {
          count: decoded.events.length,
        });
        this.persist();
        return;
      default:
        logger.warn("Stored events matched no known format; starting empty");
    }
  }

  private sortInPlace(): void {
    this.events = sortEvents(this.events);
  }
}
