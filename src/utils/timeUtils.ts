export interface IWallClock {
  year: number;
  month: number; // 1-12
  day: number;
  minutesOfDay: number;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let fmt = formatters.get(timeZone);
  if (!fmt) {
    fmt = new Intl.DateTimeFormat("en-US", {
      timeZone,
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      hourCycle: "h23",
    });
    formatters.set(timeZone, fmt);
  }
  return fmt;
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    formatterFor(timeZone);
    return true;
  } catch {
    return false;
  }
}

/**
 * Calendar date and minute-of-day of `date` as seen in `timeZone`.
 */
export function wallClock(date: Date, timeZone: string): IWallClock {
  const parts = formatterFor(timeZone).formatToParts(date);
  const pick = (type: Intl.DateTimeFormatPartTypes): number => {
    const part = parts.find((p) => p.type === type);
    return part ? parseInt(part.value, 10) : 0;
  };
  return {
    year: pick("year"),
    month: pick("month"),
    day: pick("day"),
    minutesOfDay: pick("hour") * 60 + pick("minute"),
  };
}

const HH_MM = /^([01]\d|2[0-3]):([0-5]\d)$/;

export function isClockTime(value: string): boolean {
  return HH_MM.test(value);
}

/** "09:30" -> 570 */
export function parseClockTime(value: string): number {
  const match = HH_MM.exec(value);
  if (!match) {
    throw new RangeError(`Expected HH:MM, got "${value}"`);
  }
  return parseInt(match[1], 10) * 60 + parseInt(match[2], 10);
}

/**
 * Identifies the trading day `date` belongs to when days roll over at
 * `boundaryMinutes` local time: anything at or after the boundary counts
 * toward the next calendar day.
 */
export function tradingDayKey(
  date: Date,
  timeZone: string,
  boundaryMinutes: number
): string {
  const clock = wallClock(date, timeZone);
  const offset = clock.minutesOfDay >= boundaryMinutes ? 1 : 0;
  const day = new Date(Date.UTC(clock.year, clock.month - 1, clock.day + offset));
  return day.toISOString().slice(0, 10);
}
