/** Calendar day in the process's local civil time, formatted `YYYY-MM-DD`. */
export type DayKey = string;

const dayKeyPattern = /^(\d{4})-(\d{2})-(\d{2})$/;

const weekdays = [
  "Sunday",
  "Monday",
  "Tuesday",
  "Wednesday",
  "Thursday",
  "Friday",
  "Saturday"
];

export function toDayKey(date: Date): DayKey {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

export function parseDayKey(value: string): DayKey {
  const match = dayKeyPattern.exec(value);
  if (!match) {
    throw new Error(`Invalid date: ${value} (expected YYYY-MM-DD).`);
  }
  const [, year, month, day] = match;
  const date = new Date(Number(year), Number(month) - 1, Number(day));
  if (toDayKey(date) !== value) {
    throw new Error(`Invalid date: ${value} (no such calendar day).`);
  }
  return value;
}

/** Local midnight at the start of `day`. */
export function startOfDay(day: DayKey): Date {
  const [year, month, date] = day.split("-").map(Number);
  return new Date(year, month - 1, date);
}

export function atLocalTime(day: DayKey, hour: number, minute: number, second = 0) {
  const [year, month, date] = day.split("-").map(Number);
  return new Date(year, month - 1, date, hour, minute, second);
}

/** `YYYYMMDD`, the day part of frame and video file names. */
export function compactDay(day: DayKey) {
  return day.replaceAll("-", "");
}

/** `YYYYMMDDHHMMSS` in local time. */
export function compactTimestamp(date: Date) {
  return (
    compactDay(toDayKey(date)) +
    pad(date.getHours()) +
    pad(date.getMinutes()) +
    pad(date.getSeconds())
  );
}

export function weekdayName(day: DayKey) {
  return weekdays[startOfDay(day).getDay()];
}

export function formatLocalTime(date: Date) {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

function pad(value: number) {
  return value.toString().padStart(2, "0");
}
