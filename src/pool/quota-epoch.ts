/**
 * Quota epoch policies. An epoch is an opaque string; usage counters reset
 * lazily whenever the current epoch differs from the one a counter was charged in.
 *
 *   calendar_day   : "2026-10-19", the local date in the configured IANA timezone
 *   rolling_window : "w<index>", fixed windows of `windowHours` counted from the Unix epoch
 */

export interface QuotaEpochPolicy {
  readonly name: string;
  /** Longest span a single epoch can cover. */
  readonly durationMs: number;
  current(now: number): string;
}

const DAY_MS = 24 * 3600 * 1000;

export function calendarDayEpoch(timeZone: string): QuotaEpochPolicy {
  // en-CA formats dates as YYYY-MM-DD; throws RangeError on an unknown zone
  const formatter = new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
  });
  return {
    name: `calendar_day(${timeZone})`,
    // A DST day runs 25h
    durationMs: DAY_MS + 3600 * 1000,
    current: (now) => formatter.format(new Date(now)),
  };
}

export function rollingWindowEpoch(windowHours: number): QuotaEpochPolicy {
  const windowMs = windowHours * 3600 * 1000;
  return {
    name: `rolling_window(${windowHours}h)`,
    durationMs: windowMs,
    current: (now) => `w${Math.floor(now / windowMs)}`,
  };
}

export function createEpochPolicy(options: {
  epoch: "calendar_day" | "rolling_window";
  timezone: string;
  window_hours: number;
}): QuotaEpochPolicy {
  return options.epoch === "calendar_day"
    ? calendarDayEpoch(options.timezone)
    : rollingWindowEpoch(options.window_hours);
}
