import { formatInTimeZone } from "date-fns-tz";
import { format } from "date-fns";

/**
 * Formats an instant as "YYYY-MM-DD" in a specific timezone.
 *
 * Forecast samples are bucketed by the calendar day of their provider
 * timestamp, which is UTC unless a timezone is passed explicitly.
 *
 * @example
 * toCalendarDate(new Date("2024-01-01T23:00:00Z")) // "2024-01-01"
 * toCalendarDate(new Date("2024-01-01T23:00:00Z"), "Europe/Berlin") // "2024-01-02"
 */
export function toCalendarDate(date: Date, timezone = "UTC"): string {
  return formatInTimeZone(date, timezone, "yyyy-MM-dd");
}

/**
 * Converts a unix timestamp in seconds (OpenWeather `dt`) to ISO 8601.
 */
export function unixToIso(seconds: number): string {
  return new Date(seconds * 1000).toISOString();
}

/**
 * Formats a local calendar date as "YYYY-MM-DD".
 */
export function toIsoDate(date: Date): string {
  return format(date, "yyyy-MM-dd");
}
