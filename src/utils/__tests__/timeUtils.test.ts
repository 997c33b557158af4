import { describe, it, expect } from "vitest";
import { isClockTime, parseClockTime, tradingDayKey, wallClock } from "../timeUtils";

const NY = "America/New_York";

describe("timeUtils", () => {
  it("parses HH:MM clock times", () => {
    expect(parseClockTime("09:30")).toBe(570);
    expect(parseClockTime("17:00")).toBe(1020);
    expect(isClockTime("24:00")).toBe(false);
    expect(() => parseClockTime("9:30")).toThrow(RangeError);
  });

  it("reads wall-clock time in a zone", () => {
    expect(wallClock(new Date("2026-01-15T15:00:00Z"), NY)).toEqual({
      year: 2026,
      month: 1,
      day: 15,
      minutesOfDay: 600,
    });
  });

  it("rolls the trading day at the local boundary", () => {
    const fivePm = parseClockTime("17:00");
    expect(tradingDayKey(new Date("2026-01-15T21:59:00Z"), NY, fivePm)).toBe("2026-01-15");
    expect(tradingDayKey(new Date("2026-01-15T22:00:00Z"), NY, fivePm)).toBe("2026-01-16");
  });

  it("follows daylight saving time", () => {
    // 17:00 EDT is 21:00Z in July
    const fivePm = parseClockTime("17:00");
    expect(tradingDayKey(new Date("2026-07-15T20:59:00Z"), NY, fivePm)).toBe("2026-07-15");
    expect(tradingDayKey(new Date("2026-07-15T21:00:00Z"), NY, fivePm)).toBe("2026-07-16");
  });

  it("rolls across month ends", () => {
    expect(tradingDayKey(new Date("2026-01-31T23:00:00Z"), NY, 1020)).toBe("2026-02-01");
  });
});
