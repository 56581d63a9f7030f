import { describe, expect, it } from "vitest";
import { InvalidOffsetError } from "../errors.js";
import {
  assertUtcOffset,
  formatUtcOffset,
  isValidUtcOffset,
  parseUtcOffset,
  tryParseUtcOffset,
} from "../offset.js";

describe("parseUtcOffset", () => {
  it.each([
    ["Z", 0],
    ["z", 0],
    ["UTC", 0],
    ["GMT", 0],
    ["+02:00", 120],
    ["+0200", 120],
    ["+02", 120],
    ["-07:00", -420],
    ["-0530", -330],
    ["+05:45", 345],
    ["+23:59", 1439],
    [" +01:00 ", 60],
  ])("%s -> %d", (text, minutes) => {
    expect(parseUtcOffset(text)).toBe(minutes);
  });

  it("normalizes a negative zero", () => {
    expect(Object.is(parseUtcOffset("-00:00"), 0)).toBe(true);
  });

  it.each(["+24:00", "+02:60", "0200", "+2:00", "", "CEST", "+02:00:00"])(
    "rejects %j",
    (text) => {
      expect(() => parseUtcOffset(text)).toThrow(InvalidOffsetError);
    }
  );

  it("names the rejected value", () => {
    expect(() => parseUtcOffset("+24:00")).toThrow("invalid UTC offset: +24:00");
  });
});

describe("tryParseUtcOffset", () => {
  it("returns undefined instead of throwing", () => {
    expect(tryParseUtcOffset("+99:00")).toBeUndefined();
    expect(tryParseUtcOffset(undefined)).toBeUndefined();
    expect(tryParseUtcOffset("-03:30")).toBe(-210);
  });
});

describe("isValidUtcOffset", () => {
  it("bounds offsets to just under a day", () => {
    expect(isValidUtcOffset(1439)).toBe(true);
    expect(isValidUtcOffset(-1439)).toBe(true);
    expect(isValidUtcOffset(1440)).toBe(false);
    expect(isValidUtcOffset(1.5)).toBe(false);
    expect(isValidUtcOffset(Number.NaN)).toBe(false);
  });

  it("assertUtcOffset returns valid values and throws otherwise", () => {
    expect(assertUtcOffset(-60)).toBe(-60);
    expect(() => assertUtcOffset(-1440)).toThrow(InvalidOffsetError);
  });
});

describe("formatUtcOffset", () => {
  it.each([
    [0, "+00:00"],
    [120, "+02:00"],
    [-420, "-07:00"],
    [-330, "-05:30"],
    [345, "+05:45"],
  ])("%d -> %s", (minutes, text) => {
    expect(formatUtcOffset(minutes)).toBe(text);
  });
});
