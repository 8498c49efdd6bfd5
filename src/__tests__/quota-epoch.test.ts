import { describe, it, expect } from "vitest";
import { calendarDayEpoch, createEpochPolicy, rollingWindowEpoch } from "../pool/quota-epoch.js";

describe("calendarDayEpoch", () => {
  it("formats the local date in the configured timezone", () => {
    const instant = Date.UTC(2026, 9, 19, 22, 30); // 22:30 UTC
    expect(calendarDayEpoch("UTC").current(instant)).toBe("2026-10-19");
    expect(calendarDayEpoch("Asia/Shanghai").current(instant)).toBe("2026-10-20");
  });

  it("changes exactly at local midnight", () => {
    const policy = calendarDayEpoch("UTC");
    const midnight = Date.UTC(2026, 9, 20);
    expect(policy.current(midnight - 1)).toBe("2026-10-19");
    expect(policy.current(midnight)).toBe("2026-10-20");
  });

  it("rejects an unknown timezone", () => {
    expect(() => calendarDayEpoch("Not/AZone")).toThrow(RangeError);
  });
});

describe("rollingWindowEpoch", () => {
  it("numbers fixed windows from the Unix epoch", () => {
    const policy = rollingWindowEpoch(6);
    const sixHours = 6 * 3600 * 1000;
    expect(policy.current(0)).toBe("w0");
    expect(policy.current(sixHours - 1)).toBe("w0");
    expect(policy.current(sixHours)).toBe("w1");
  });

  it("reports the window length", () => {
    expect(rollingWindowEpoch(168).durationMs).toBe(168 * 3600 * 1000);
    expect(calendarDayEpoch("UTC").durationMs).toBe(25 * 3600 * 1000);
  });
});

describe("createEpochPolicy", () => {
  it("builds the configured policy", () => {
    expect(createEpochPolicy({ epoch: "calendar_day", timezone: "UTC", window_hours: 24 }).name).toBe("calendar_day(UTC)");
    expect(createEpochPolicy({ epoch: "rolling_window", timezone: "UTC", window_hours: 12 }).name).toBe("rolling_window(12h)");
  });
});
