import { describe, expect, it } from "vitest";
import { dayKey, formatDuration, minutesToMs } from "./dates";

describe("dayKey", () => {
  it("uses the local calendar day", () => {
    expect(dayKey(new Date(2024, 0, 5, 23, 59).getTime())).toBe("2024-01-05");
    expect(dayKey(new Date(2024, 10, 30, 0, 1).getTime())).toBe("2024-11-30");
  });
});

describe("minutesToMs", () => {
  it("converts and clamps", () => {
    expect(minutesToMs(2)).toBe(120_000);
    expect(minutesToMs(-3)).toBe(0);
    expect(minutesToMs(Number.NaN)).toBe(0);
  });
});

describe("formatDuration", () => {
  it("labels short and long spans", () => {
    expect(formatDuration(20_000)).toBe("just now");
    expect(formatDuration(-5)).toBe("just now");
    expect(formatDuration(12 * 60_000)).toBe("12m");
    expect(formatDuration(60 * 60_000)).toBe("1h");
    expect(formatDuration(125 * 60_000)).toBe("2h 5m");
  });
});
