import { describe, expect, it } from "vitest";

import { formatDuration, parseDuration } from "./duration.js";

describe("durations", () => {
  it.each([
    ["24h", 86_400_000],
    ["1h30m", 5_400_000],
    ["90m", 5_400_000],
    ["1.5h", 5_400_000],
    ["500ms", 500],
    ["0", 0],
  ])("parses %s", (raw, expected) => {
    expect(parseDuration(raw)).toBe(expected);
  });

  it.each(["abc", "10", "h", "-1h"])("rejects %s", raw => {
    expect(() => parseDuration(raw)).toThrow(`invalid duration: ${raw}`);
  });

  it.each([
    [0, "0s"],
    [500, "500ms"],
    [1_500, "1.5s"],
    [60_000, "1m0s"],
    [5_400_000, "1h30m0s"],
    [86_400_000, "24h0m0s"],
  ])("formats %i", (ms, expected) => {
    expect(formatDuration(ms)).toBe(expected);
  });
});
