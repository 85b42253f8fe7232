import { describe, expect, it } from "vitest";
import type { TallyEvent } from "../../shared/types/event";
import {
  decodeEvents,
  sanitizeMinutes,
  sortEvents,
  toPersistedRecord,
} from "../eventCodec";

const event = (id: string, iso: string, minutesWasted = 0): TallyEvent => ({
  id,
  timestamp: new Date(iso),
  minutesWasted,
});

const fixedIds = () => {
  const ids = ["gen-a", "gen-b", "gen-c"];
  let index = 0;
  return () => {
    const id = ids[index] ?? `gen-${index}`;
    index += 1;
    return id;
  };
};

describe("sanitizeMinutes", () => {
  it.each([
    [30, 30],
    [0, 0],
    [-4, 0],
    [7.8, 7],
    ["12", 12],
    ["abc", 0],
    [Number.NaN, 0],
    [Number.POSITIVE_INFINITY, 0],
    [null, 0],
  ])("maps %s to %s", (input, expected) => {
    expect(sanitizeMinutes(input)).toBe(expected);
  });
});

describe("sortEvents", () => {
  const events = [
    event("b", "2025-03-02T00:00:00.000Z"),
    event("a", "2025-03-01T00:00:00.000Z"),
    event("c", "2025-03-03T00:00:00.000Z"),
  ];

  it("orders oldest first by default", () => {
    expect(sortEvents(events).map((item) => item.id)).toEqual(["a", "b", "c"]);
  });

  it("orders newest first on request without touching the input", () => {
    expect(sortEvents(events, "descending").map((item) => item.id)).toEqual([
      "c",
      "b",
      "a",
    ]);
    expect(events.map((item) => item.id)).toEqual(["b", "a", "c"]);
  });

  it("keeps the original order of equal timestamps in both directions", () => {
    const tied = [
      event("first", "2025-03-02T00:00:00.000Z"),
      event("second", "2025-03-02T00:00:00.000Z"),
      event("older", "2025-03-01T00:00:00.000Z"),
    ];

    expect(sortEvents(tied).map((item) => item.id)).toEqual([
      "older",
      "first",
      "second",
    ]);
    expect(sortEvents(tied, "descending").map((item) => item.id)).toEqual([
      "first",
      "second",
      "older",
    ]);
  });
});

describe("toPersistedRecord", () => {
  it("writes dates as ISO strings", () => {
    expect(
      toPersistedRecord(event("x", "2025-03-01T08:30:00.000Z", 15)),
    ).toEqual({ id: "x", date: "2025-03-01T08:30:00.000Z", minutes: 15 });
  });
});

describe("decodeEvents", () => {
  it("treats an empty array as the current format", () => {
    expect(decodeEvents([], fixedIds())).toEqual({
      format: "current",
      events: [],
      dropped: 0,
    });
  });

  it("decodes current records and clamps stored minutes", () => {
    const result = decodeEvents(
      [
        { id: "late", date: "2025-03-02T00:00:00.000Z", minutes: -5 },
        { id: "early", date: 0, minutes: 20 },
      ],
      fixedIds(),
    );

    expect(result).toEqual({
      format: "current",
      events: [
        event("early", "2001-01-01T00:00:00.000Z", 20),
        event("late", "2025-03-02T00:00:00.000Z", 0),
      ],
      dropped: 0,
    });
  });

  it("migrates legacy timestamps with generated ids and zero minutes", () => {
    const result = decodeEvents([1700000000, 1699990000], fixedIds());

    expect(result).toEqual({
      format: "legacy",
      events: [
        {
          id: "gen-b",
          timestamp: new Date(1699990000 * 1000),
          minutesWasted: 0,
        },
        {
          id: "gen-a",
          timestamp: new Date(1700000000 * 1000),
          minutesWasted: 0,
        },
      ],
      dropped: 0,
    });
  });

  it("skips legacy timestamps beyond the range of a Date", () => {
    const result = decodeEvents([1700000000, 1e13], fixedIds());

    expect(result).toEqual({
      format: "legacy",
      events: [
        {
          id: "gen-a",
          timestamp: new Date(1700000000 * 1000),
          minutesWasted: 0,
        },
      ],
      dropped: 1,
    });
  });

  it("skips current records whose numeric date is beyond the range of a Date", () => {
    const result = decodeEvents(
      [
        { id: "far", date: 1e13, minutes: 5 },
        { id: "ok", date: "2025-03-01T00:00:00.000Z", minutes: 2 },
      ],
      fixedIds(),
    );

    expect(result).toEqual({
      format: "current",
      events: [event("ok", "2025-03-01T00:00:00.000Z", 2)],
      dropped: 1,
    });
  });

  it.each([
    ["an object", { events: [] }],
    ["a string", "hello"],
    ["a mixed list", [1700000000, "1700000000"]],
    ["records missing an id", [{ date: 0, minutes: 1 }]],
    ["records with fractional minutes", [{ id: "a", date: 0, minutes: 1.5 }]],
  ])("rejects %s", (_label, payload) => {
    expect(decodeEvents(payload, fixedIds())).toEqual({
      format: "invalid",
      events: [],
      dropped: 0,
    });
  });
});
