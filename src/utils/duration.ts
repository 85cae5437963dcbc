import { DurationParseError } from "../errors.js";

const DIGITS_ONLY_RE = /^\d+$/;
const HOURS_RE = /(\d+)\s*h(?:ours?)?/;
const MINUTES_RE = /(\d+)\s*m(?:in(?:utes?)?)?/;
const ANY_NUMBER_RE = /(\d+)/;

function checkedMinutes(minutes: number, input: string): number {
  if (!Number.isSafeInteger(minutes)) {
    throw new DurationParseError(input);
  }
  return minutes;
}

/**
 * Parses a free-form duration such as "1h", "30m", "2h 15m", "90 minutes" or "90"
 * into a minute count.
 *
 * Hour and minute components are additive. When neither is present the first run of
 * digits anywhere in the string is taken as minutes, so "v2" yields 2.
 *
 * @throws {DurationParseError} when the input contains no digits at all, or the
 * result is too large to be represented exactly.
 */
export function parseDuration(input: string): number {
  const normalized = input.trim().toLowerCase();

  if (DIGITS_ONLY_RE.test(normalized)) {
    return checkedMinutes(Number.parseInt(normalized, 10), input);
  }

  let totalMinutes = 0;

  const hours = HOURS_RE.exec(normalized);
  if (hours) {
    totalMinutes += Number.parseInt(hours[1], 10) * 60;
  }

  const minutes = MINUTES_RE.exec(normalized);
  if (minutes) {
    totalMinutes += Number.parseInt(minutes[1], 10);
  }

  if (totalMinutes === 0) {
    const anyNumber = ANY_NUMBER_RE.exec(normalized);
    if (anyNumber) {
      totalMinutes = Number.parseInt(anyNumber[1], 10);
    }
  }

  if (totalMinutes === 0) {
    throw new DurationParseError(input);
  }

  return checkedMinutes(totalMinutes, input);
}
