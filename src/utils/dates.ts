import { InvalidWorkDateError } from "../errors.js";

const WORK_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

/** Converts a "YYYY-MM-DD" work date into epoch milliseconds at midnight UTC. */
export function parseWorkDate(input: string): number {
  const match = WORK_DATE_RE.exec(input);
  if (!match) {
    throw new InvalidWorkDateError(input);
  }

  const year = Number(match[1]);
  const monthIndex = Number(match[2]) - 1;
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, monthIndex, day));

  // Date.UTC rolls 2024-02-30 over into March
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== monthIndex ||
    date.getUTCDate() !== day
  ) {
    throw new InvalidWorkDateError(input);
  }

  return date.getTime();
}
