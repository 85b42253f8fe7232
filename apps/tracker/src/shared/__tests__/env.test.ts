import { describe, expect, it } from "vitest";
import {
  clamp,
  parseBooleanFlag,
  parseNumberListEnv,
  parseNumericEnv,
} from "../env";

describe("clamp", () => {
  it("bounds values and maps non-finite input to the minimum", () => {
    expect(clamp(5, 0, 10)).toBe(5);
    expect(clamp(-1, 0, 10)).toBe(0);
    expect(clamp(11, 0, 10)).toBe(10);
    expect(clamp(Number.NaN, 2, 10)).toBe(2);
  });
});

describe("parseBooleanFlag", () => {
  it.each([
    ["1", true],
    ["TRUE", true],
    [" on ", true],
    ["no", false],
    ["0", false],
  ])("parses %j as %s", (value, expected) => {
    expect(parseBooleanFlag(value, !expected)).toBe(expected);
  });

  it("returns the default for missing or unknown values", () => {
    expect(parseBooleanFlag(undefined, true)).toBe(true);
    expect(parseBooleanFlag("maybe", false)).toBe(false);
  });
});

describe("parseNumericEnv", () => {
  const range = { min: 1, max: 100 };

  it("parses and clamps", () => {
    expect(parseNumericEnv("42.5", range)).toBe(42.5);
    expect(parseNumericEnv("500", range)).toBe(100);
    expect(parseNumericEnv("42.5", { ...range, integer: true })).toBe(42);
  });

  it("returns null for missing or unparsable values", () => {
    expect(parseNumericEnv(undefined, range)).toBeNull();
    expect(parseNumericEnv("  ", range)).toBeNull();
    expect(parseNumericEnv("lots", range)).toBeNull();
  });
});

describe("parseNumberListEnv", () => {
  it("parses comma separated numbers", () => {
    expect(parseNumberListEnv("0.2, 0.5,0.8")).toEqual([0.2, 0.5, 0.8]);
  });

  it("rejects the whole list when one entry is not a number", () => {
    expect(parseNumberListEnv("0.2,x,0.8")).toBeNull();
    expect(parseNumberListEnv("")).toBeNull();
  });
});
