import { toWallClock } from "./schedule.js";

const pad = (value: number): string => value.toString().padStart(2, "0");

export const buildBroadcastTitle = (prefix: string, timeZone: string, at: Date): string => {
  const wall = toWallClock(at, timeZone);
  const period = wall.hour < 12 ? "Morning" : "Afternoon";
  const stamp = `${pad(wall.month)}/${pad(wall.day)}/${pad(wall.year % 100)}`;

  return `${prefix} – ${stamp} (${period})`;
};
