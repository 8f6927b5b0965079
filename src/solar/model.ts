// ─── Solar Model ─────────────────────────────────────────────────────────────
//
// Derives a day/night sine and sunrise/sunset flags from a timestamp.
//
//   day   (dayStart ≤ h ≤ dayEnd):   sin(π · (h − dayStart) / dayLength)
//   night (otherwise):              −sin(π · hoursSinceDayEnd / nightLength)
//
// so the signal rises from 0 at sunrise to +1 mid-day, returns to 0 at
// sunset and bottoms out at −1 in the middle of the night.
// ─────────────────────────────────────────────────────────────────────────────

import type { ConversionConfig } from "../config/schema.js";
import type { DayCycle, DayWindow, SolarSample, SolarTimes, Timestamp } from "../types.js";
import { epochMinutesAtHour } from "../time.js";

export type SolarConfig = Pick<
  ConversionConfig,
  "dayStart" | "dayEnd" | "sineRange" | "toleranceMinutes" | "useRealisticTiming"
>;

// ─── Day Window ─────────────────────────────────────────────────────────────

/**
 * Pick the day window for a row.
 *
 * With realistic timing on, a row that carries its day's sunrise and sunset
 * uses them (seasonal day length). Otherwise, or when the embedded times do
 * not describe a day inside the calendar date, the configured hours apply.
 */
export function resolveDayWindow(
  useRealisticTiming: boolean,
  configured: { dayStart: number; dayEnd: number },
  solar?: SolarTimes,
): DayWindow {
  if (useRealisticTiming && solar) {
    const dayStart = solar.sunrise.hourOfDay;
    const dayEnd = dayStart + (solar.sunset.epochMinutes - solar.sunrise.epochMinutes) / 60;
    if (dayEnd > dayStart && dayEnd <= 24 && dayEnd - dayStart < 24) {
      return { dayStart, dayEnd, source: "embedded" };
    }
  }
  return { dayStart: configured.dayStart, dayEnd: configured.dayEnd, source: "configured" };
}

// ─── Phase ──────────────────────────────────────────────────────────────────

/** Unit solar phase in [-1, 1] for a fractional hour of day. */
export function solarPhase(hourOfDay: number, window: DayWindow): number {
  const { dayStart, dayEnd } = window;
  const dayLength = dayEnd - dayStart;

  let raw: number;
  if (hourOfDay >= dayStart && hourOfDay <= dayEnd) {
    raw = Math.sin((Math.PI * (hourOfDay - dayStart)) / dayLength);
  } else {
    const nightLength = 24 - dayLength;
    const sinceDayEnd = (((hourOfDay - dayEnd) % 24) + 24) % 24;
    raw = -Math.sin((Math.PI * sinceDayEnd) / nightLength);
  }

  return Math.max(-1, Math.min(1, raw));
}

/** Day/night label from the configured whole hours. */
export function dayCycle(hour: number, dayStart: number, dayEnd: number): DayCycle {
  return hour >= dayStart && hour < dayEnd ? "day" : "night";
}

// ─── Events ─────────────────────────────────────────────────────────────────

/**
 * Flag rows within `toleranceMinutes` of sunrise or sunset.
 * Embedded times win; otherwise dayStart/dayEnd on the row's date.
 * Rows are judged one by one, so several rows can share one sunrise.
 */
export function detectSolarEvents(
  timestamp: Timestamp,
  config: Pick<SolarConfig, "dayStart" | "dayEnd" | "toleranceMinutes">,
  solar?: SolarTimes,
): { isSunriseEvent: boolean; isSunsetEvent: boolean } {
  const sunrise = solar ? solar.sunrise.epochMinutes : epochMinutesAtHour(timestamp, config.dayStart);
  const sunset = solar ? solar.sunset.epochMinutes : epochMinutesAtHour(timestamp, config.dayEnd);

  return {
    isSunriseEvent: Math.abs(timestamp.epochMinutes - sunrise) <= config.toleranceMinutes,
    isSunsetEvent: Math.abs(timestamp.epochMinutes - sunset) <= config.toleranceMinutes,
  };
}

// ─── Public API ─────────────────────────────────────────────────────────────

export function deriveSolarSample(
  timestamp: Timestamp,
  config: SolarConfig,
  solar?: SolarTimes,
): SolarSample {
  const window = resolveDayWindow(config.useRealisticTiming, config, solar);
  const phase = solarPhase(timestamp.hourOfDay, window);
  const events = detectSolarEvents(timestamp, config, solar);

  return {
    phase,
    sine: phase * config.sineRange,
    ...events,
    cycle: dayCycle(timestamp.hour, config.dayStart, config.dayEnd),
    window,
  };
}
