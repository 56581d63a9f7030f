import { describe, expect, it } from "vitest";
import { parseReferenceTime } from "./parse.js";

describe("parseReferenceTime", () => {
  it("accepts ISO 8601 instants", () => {
    expect(parseReferenceTime("2024-06-02T00:00:00Z")).toBe(
      Date.UTC(2024, 5, 2, 0, 0, 0)
    );
    expect(parseReferenceTime("2024-06-02T02:00:00+02:00")).toBe(
      Date.UTC(2024, 5, 2, 0, 0, 0)
    );
  });

  it("rejects text that is not a date", () => {
    expect(parseReferenceTime("yesterday-ish")).toBeUndefined();
  });
});
