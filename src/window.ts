import SunCalc from "suncalc";
import type { WindowPolicy } from "./config.js";
import { atLocalTime, startOfDay, toDayKey, type DayKey } from "./dates.js";

export type CaptureWindow = {
  day: DayKey;
  start: Date;
  /** Exclusive. */
  end: Date;
  source: "fixed" | "sun" | "polar_day" | "polar_night";
};

export type WindowOracle = {
  windowFor: (date: Date) => CaptureWindow;
};

const MINUTE_MS = 60 * 1000;

export function createWindowOracle(policy: WindowPolicy): WindowOracle {
  if (policy.mode === "fixed") {
    return {
      windowFor(date) {
        const day = toDayKey(date);
        return {
          day,
          start: atLocalTime(day, policy.start.hour, policy.start.minute),
          end: atLocalTime(day, policy.end.hour, policy.end.minute),
          source: "fixed"
        };
      }
    };
  }

  const { latitude, longitude, marginMinutes } = policy;
  const marginMs = marginMinutes * MINUTE_MS;

  return {
    windowFor(date) {
      const day = toDayKey(date);
      const midnight = startOfDay(day);
      const latest = atLocalTime(day, 23, 59);
      const noon = atLocalTime(day, 12, 0);
      const times = SunCalc.getTimes(noon, latitude, longitude);

      if (!isValidDate(times.sunrise) || !isValidDate(times.sunset)) {
        const altitude = SunCalc.getPosition(noon, latitude, longitude).altitude;
        return altitude > 0
          ? { day, start: midnight, end: latest, source: "polar_day" }
          : { day, start: midnight, end: midnight, source: "polar_night" };
      }

      const start = new Date(times.sunrise.getTime() - marginMs);
      const end = new Date(times.sunset.getTime() + marginMs);
      return {
        day,
        start: start < midnight ? midnight : start,
        end: end > latest ? latest : end,
        source: "sun"
      };
    }
  };
}

export function isInWindow(now: Date, window: CaptureWindow) {
  return window.start.getTime() <= now.getTime() && now.getTime() < window.end.getTime();
}

function isValidDate(value: Date) {
  return !Number.isNaN(value.getTime());
}
