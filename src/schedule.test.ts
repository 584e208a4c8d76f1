import { describe, expect, it } from "vitest";
import { InvalidArgumentError } from "./errors";
import {
  DEFAULT_SCHEDULE,
  formatTimeOfDay,
  isNightTime,
  parseTimeOfDay,
  resolveEffectiveTarget,
  resolveTarget,
  scheduleSchema,
  timeOfDayIn,
  type Schedule,
} from "./schedule";

const hms = (hours: number, minutes = 0, seconds = 0) => hours * 3600 + minutes * 60 + seconds;

describe("parseTimeOfDay", () => {
  it("parses HH:MM and HH:MM:SS", () => {
    expect(parseTimeOfDay("22:00")).toBe(79200);
    expect(parseTimeOfDay("06:00:00")).toBe(21600);
    expect(parseTimeOfDay("7:05")).toBe(25500);
    expect(parseTimeOfDay("23:59:59")).toBe(86399);
  });

  it("rejects out-of-range or malformed values", () => {
    expect(parseTimeOfDay("24:00")).toBeNull();
    expect(parseTimeOfDay("12:60")).toBeNull();
    expect(parseTimeOfDay("12:00:60")).toBeNull();
    expect(parseTimeOfDay("noon")).toBeNull();
    expect(parseTimeOfDay("")).toBeNull();
  });
});

describe("formatTimeOfDay", () => {
  it("pads every component", () => {
    expect(formatTimeOfDay(79200)).toBe("22:00:00");
    expect(formatTimeOfDay(3661)).toBe("01:01:01");
    expect(formatTimeOfDay(0)).toBe("00:00:00");
  });
});

describe("isNightTime", () => {
  describe("window within one day (01:00-05:00)", () => {
    const start = hms(1);
    const end = hms(5);

    it("includes the start and everything before the end", () => {
      expect(isNightTime(hms(1), start, end)).toBe(true);
      expect(isNightTime(hms(3, 30), start, end)).toBe(true);
      expect(isNightTime(hms(4, 59, 59), start, end)).toBe(true);
    });

    it("excludes the end and times outside the window", () => {
      expect(isNightTime(hms(5), start, end)).toBe(false);
      expect(isNightTime(hms(0, 59, 59), start, end)).toBe(false);
      expect(isNightTime(hms(23), start, end)).toBe(false);
    });
  });

  describe("window across midnight (22:00-06:00)", () => {
    const start = hms(22);
    const end = hms(6);

    it("is night from the start until midnight and after midnight until the end", () => {
      expect(isNightTime(hms(22), start, end)).toBe(true);
      expect(isNightTime(hms(23, 30), start, end)).toBe(true);
      expect(isNightTime(hms(0), start, end)).toBe(true);
      expect(isNightTime(hms(5, 59, 59), start, end)).toBe(true);
    });

    it("is day from the end until the start", () => {
      expect(isNightTime(hms(6), start, end)).toBe(false);
      expect(isNightTime(hms(7), start, end)).toBe(false);
      expect(isNightTime(hms(21, 59, 59), start, end)).toBe(false);
    });
  });

  it("treats equal boundaries as night all day", () => {
    for (const time of [hms(0), hms(8), hms(8, 0, 1), hms(23, 59, 59)]) {
      expect(isNightTime(time, hms(8), hms(8))).toBe(true);
    }
  });
});

describe("timeOfDayIn", () => {
  it("reads the wall clock of the instant in the given zone", () => {
    const instant = new Date("2026-01-15T22:30:15.900Z");
    expect(timeOfDayIn(instant, "UTC")).toBe(hms(22, 30, 15));
    expect(timeOfDayIn(instant, "Europe/Berlin")).toBe(hms(23, 30, 15));
    expect(timeOfDayIn(instant, "America/New_York")).toBe(hms(17, 30, 15));
  });

  it("follows daylight saving time", () => {
    expect(timeOfDayIn(new Date("2026-07-01T20:30:00Z"), "Europe/Berlin")).toBe(hms(22, 30));
  });

  it("throws for an unknown zone", () => {
    expect(() => timeOfDayIn(new Date("2026-01-15T12:00:00Z"), "Mars/Olympus_Mons")).toThrow(InvalidArgumentError);
  });
});

describe("resolveTarget", () => {
  const schedule: Schedule = { ...DEFAULT_SCHEDULE };

  it("returns the night target at 23:30 local time", () => {
    // 22:30 UTC is 23:30 in Berlin in winter
    expect(resolveTarget(schedule, new Date("2026-01-15T22:30:00Z"))).toBe(18.0);
  });

  it("returns the day target at 07:00 local time", () => {
    expect(resolveTarget(schedule, new Date("2026-01-15T06:00:00Z"))).toBe(21.0);
  });

  it("uses the schedule's timezone rather than UTC", () => {
    const newYork: Schedule = { ...schedule, timezone: "America/New_York" };
    const instant = new Date("2026-01-15T22:30:00Z");

    expect(resolveTarget(schedule, instant)).toBe(18.0);
    expect(resolveTarget(newYork, instant)).toBe(21.0);
  });

  it("reports which period applies", () => {
    expect(resolveEffectiveTarget(schedule, new Date("2026-01-15T04:59:59Z"))).toEqual({
      temperature: 18.0,
      period: "night",
    });
    expect(resolveEffectiveTarget(schedule, new Date("2026-01-15T05:00:00Z"))).toEqual({
      temperature: 21.0,
      period: "day",
    });
  });

  it("handles a window that does not wrap", () => {
    const siesta: Schedule = { ...schedule, timezone: "UTC", nightStart: "13:00", nightEnd: "15:00" };

    expect(resolveTarget(siesta, new Date("2026-01-15T13:00:00Z"))).toBe(18.0);
    expect(resolveTarget(siesta, new Date("2026-01-15T15:00:00Z"))).toBe(21.0);
    expect(resolveTarget(siesta, new Date("2026-01-15T23:30:00Z"))).toBe(21.0);
  });

  it("rejects a schedule with an unparseable boundary", () => {
    const broken: Schedule = { ...schedule, nightEnd: "6 o'clock" };
    expect(() => resolveTarget(broken, new Date("2026-01-15T12:00:00Z"))).toThrow(InvalidArgumentError);
  });
});

describe("scheduleSchema", () => {
  it("normalises boundaries to HH:MM:SS", () => {
    const parsed = scheduleSchema.parse({
      timezone: "Europe/Vienna",
      targetDay: 20.5,
      targetNight: 17,
      nightStart: "23:00",
      nightEnd: "6:30",
    });

    expect(parsed).toEqual({
      timezone: "Europe/Vienna",
      targetDay: 20.5,
      targetNight: 17,
      nightStart: "23:00:00",
      nightEnd: "06:30:00",
    });
  });

  it("rejects unknown timezones and malformed times", () => {
    const base = { ...DEFAULT_SCHEDULE };

    expect(scheduleSchema.safeParse({ ...base, timezone: "Nowhere/City" }).success).toBe(false);
    expect(scheduleSchema.safeParse({ ...base, nightStart: "25:00" }).success).toBe(false);
    expect(scheduleSchema.safeParse({ ...base, targetDay: "21" }).success).toBe(false);
  });
});
