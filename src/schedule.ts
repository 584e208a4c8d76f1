import { DateTime, IANAZone } from "luxon";
import { z } from "zod";
import { InvalidArgumentError } from "./errors";

export type Schedule = {
  timezone: string;
  targetDay: number;
  targetNight: number;
  nightStart: string; // wall clock, "HH:MM:SS"
  nightEnd: string; // wall clock, "HH:MM:SS"
};

export const DEFAULT_SCHEDULE: Readonly<Schedule> = {
  timezone: "Europe/Berlin",
  targetDay: 21.0,
  targetNight: 18.0,
  nightStart: "22:00:00",
  nightEnd: "06:00:00",
};

export type Period = "day" | "night";

export type EffectiveTarget = {
  temperature: number;
  period: Period;
};

// Parses "H:MM", "HH:MM" or "HH:MM:SS" into seconds after midnight
export function parseTimeOfDay(value: string): number | null {
  const match = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/.exec(value);
  if (!match) return null;
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  const seconds = match[3] === undefined ? 0 : Number(match[3]);
  if (hours > 23 || minutes > 59 || seconds > 59) return null;
  return hours * 3600 + minutes * 60 + seconds;
}

export function formatTimeOfDay(secondsAfterMidnight: number): string {
  const hours = Math.floor(secondsAfterMidnight / 3600);
  const minutes = Math.floor((secondsAfterMidnight % 3600) / 60);
  const seconds = secondsAfterMidnight % 60;
  return [hours, minutes, seconds].map((part) => String(part).padStart(2, "0")).join(":");
}

export function isValidTimezone(zone: string): boolean {
  return IANAZone.isValidZone(zone);
}

/**
 * Night window membership. The window includes `nightStart` and excludes
 * `nightEnd`. When `nightStart >= nightEnd` the window wraps past midnight,
 * so equal boundaries mean the whole day is night.
 */
export function isNightTime(timeOfDay: number, nightStart: number, nightEnd: number): boolean {
  if (nightStart < nightEnd) {
    return nightStart <= timeOfDay && timeOfDay < nightEnd;
  }
  return timeOfDay >= nightStart || timeOfDay < nightEnd;
}

/** Seconds after local midnight of `instant` in `timezone`. */
export function timeOfDayIn(instant: Date, timezone: string): number {
  const local = DateTime.fromJSDate(instant, { zone: timezone });
  if (!local.isValid) {
    throw new InvalidArgumentError(`Unknown timezone "${timezone}"`);
  }
  return local.hour * 3600 + local.minute * 60 + local.second;
}

function boundary(value: string, field: string): number {
  const seconds = parseTimeOfDay(value);
  if (seconds === null) {
    throw new InvalidArgumentError(`${field} must be a time of day (HH:MM[:SS]), got "${value}"`);
  }
  return seconds;
}

export function resolveEffectiveTarget(schedule: Schedule, now: Date): EffectiveTarget {
  const night = isNightTime(
    timeOfDayIn(now, schedule.timezone),
    boundary(schedule.nightStart, "nightStart"),
    boundary(schedule.nightEnd, "nightEnd"),
  );

  return night
    ? { temperature: schedule.targetNight, period: "night" }
    : { temperature: schedule.targetDay, period: "day" };
}

export function resolveTarget(schedule: Schedule, now: Date): number {
  return resolveEffectiveTarget(schedule, now).temperature;
}

const timeOfDaySchema = z.string().transform((value, ctx) => {
  const seconds = parseTimeOfDay(value);
  if (seconds === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be a time of day in HH:MM or HH:MM:SS format" });
    return z.NEVER;
  }
  return formatTimeOfDay(seconds);
});

// Incoming schedule payloads; boundaries come out normalised to "HH:MM:SS"
export const scheduleSchema = z.object({
  timezone: z.string().refine(isValidTimezone, { message: "must be a valid IANA timezone" }),
  targetDay: z.number().finite(),
  targetNight: z.number().finite(),
  nightStart: timeOfDaySchema,
  nightEnd: timeOfDaySchema,
});
