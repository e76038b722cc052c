import type { ScheduleConfig, ScheduleSlot } from "./types.js";

const HOUR_MS = 3_600_000;
const DAY_MS = 24 * HOUR_MS;

type WallClock = {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
};

const formatterCache = new Map<string, Intl.DateTimeFormat>();

const formatterFor = (timeZone: string): Intl.DateTimeFormat => {
  const cached = formatterCache.get(timeZone);
  if (cached) {
    return cached;
  }

  const formatter = new Intl.DateTimeFormat("en-US", {
    timeZone,
    hourCycle: "h23",
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit"
  });
  formatterCache.set(timeZone, formatter);
  return formatter;
};

export const isValidTimeZone = (timeZone: string): boolean => {
  try {
    formatterFor(timeZone);
    return true;
  } catch (_error) {
    return false;
  }
};

export const toWallClock = (instant: Date, timeZone: string): WallClock => {
  const parts = formatterFor(timeZone).formatToParts(instant);
  const read = (type: Intl.DateTimeFormatPartTypes): number => {
    const part = parts.find((entry) => entry.type === type);
    return part ? Number.parseInt(part.value, 10) : 0;
  };

  return {
    year: read("year"),
    month: read("month"),
    day: read("day"),
    hour: read("hour"),
    minute: read("minute"),
    second: read("second")
  };
};

const offsetMsAt = (instantMs: number, timeZone: string): number => {
  const wall = toWallClock(new Date(instantMs), timeZone);
  const asUtc = Date.UTC(wall.year, wall.month - 1, wall.day, wall.hour, wall.minute, wall.second);
  return asUtc - (instantMs - (instantMs % 1000));
};

/**
 * Resolves a local wall-clock time in `timeZone` to an instant. Times that
 * fall into a DST gap resolve to the instant after the jump.
 */
export const wallClockToInstant = (
  year: number,
  month: number,
  day: number,
  hour: number,
  timeZone: string
): Date => {
  const guess = Date.UTC(year, month - 1, day, hour);
  const firstOffset = offsetMsAt(guess, timeZone);
  const candidate = guess - firstOffset;
  const secondOffset = offsetMsAt(candidate, timeZone);

  if (secondOffset === firstOffset) {
    return new Date(candidate);
  }

  const adjusted = guess - secondOffset;
  if (toWallClock(new Date(adjusted), timeZone).hour === hour) {
    return new Date(adjusted);
  }

  return new Date(candidate);
};

export const nextFixedActivation = (
  hours: readonly number[],
  timeZone: string,
  reference: Date
): Date => {
  if (hours.length === 0) {
    throw new Error("Fixed schedule requires at least one start hour");
  }

  const sorted = [...hours].sort((a, b) => a - b);
  const today = toWallClock(reference, timeZone);
  const todayUtcMidnight = Date.UTC(today.year, today.month - 1, today.day);

  // Two days ahead covers "no slot left today" plus a DST-shortened day.
  for (let dayOffset = 0; dayOffset <= 2; dayOffset += 1) {
    const day = new Date(todayUtcMidnight + dayOffset * DAY_MS);

    for (const hour of sorted) {
      const candidate = wallClockToInstant(
        day.getUTCFullYear(),
        day.getUTCMonth() + 1,
        day.getUTCDate(),
        hour,
        timeZone
      );

      if (candidate.getTime() > reference.getTime()) {
        return candidate;
      }
    }
  }

  throw new Error(`No fixed start hour found after ${reference.toISOString()}`);
};

export type SlotOptions = {
  timeZone: string;
  rotationHours: number;
};

export const nextSlot = (
  schedule: ScheduleConfig,
  options: SlotOptions,
  reference: Date
): ScheduleSlot => {
  if (schedule.mode === "rolling") {
    return {
      mode: "rolling",
      activation: new Date(reference.getTime()),
      deadline: new Date(reference.getTime() + options.rotationHours * HOUR_MS)
    };
  }

  const activation = nextFixedActivation(schedule.hours, options.timeZone, reference);
  const deadline = nextFixedActivation(
    schedule.hours,
    options.timeZone,
    new Date(activation.getTime() + 1000)
  );

  return { mode: "fixed", activation, deadline };
};

export const parseFixedHours = (csv: string): number[] => {
  const tokens = csv
    .split(",")
    .map((token) => token.trim())
    .filter((token) => token.length > 0);

  const hours = tokens.map((token) => {
    if (!/^\d{1,2}$/.test(token)) {
      throw new Error(`Invalid start hour "${token}"`);
    }

    const hour = Number.parseInt(token, 10);
    if (hour > 23) {
      throw new Error(`Start hour ${hour} is outside 0-23`);
    }

    return hour;
  });

  return [...new Set(hours)].sort((a, b) => a - b);
};
