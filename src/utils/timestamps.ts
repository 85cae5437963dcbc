/** Fields YouTrack reports as epoch milliseconds. */
export const TIMESTAMP_FIELDS = ["created", "updated"] as const;

export const ISO8601_SUFFIX = "_iso8601";

const MIN_YEAR = 1;
const MAX_YEAR = 9999;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value);
}

function toUtcIso8601(timestampMs: number): string {
  if (!Number.isSafeInteger(timestampMs)) {
    throw new RangeError(`Timestamp out of range: ${timestampMs}`);
  }
  const date = new Date(timestampMs);
  const year = date.getUTCFullYear();
  if (Number.isNaN(year) || year < MIN_YEAR || year > MAX_YEAR) {
    throw new RangeError(`Timestamp out of range: ${timestampMs}`);
  }
  // Whole seconds carry no fraction; otherwise microsecond precision: ".500" -> ".500000"
  return date
    .toISOString()
    .replace(/\.(\d{3})Z$/, (_match, millis: string) => (millis === "000" ? "+00:00" : `.${millis}000+00:00`));
}

/**
 * Renders epoch milliseconds as an ISO8601 string in UTC.
 * Returns the decimal string of the input when it cannot be represented.
 */
export function convertTimestampToIso8601(timestampMs: number): string {
  try {
    return toUtcIso8601(timestampMs);
  } catch {
    return String(timestampMs);
  }
}

/**
 * Returns a copy of `data` in which every object holding an integer `created` or
 * `updated` field also carries a `<field>_iso8601` sibling. Arrays and nested objects
 * are walked to any depth; other values are returned unchanged.
 */
export function addIso8601Timestamps(data: unknown): unknown {
  if (Array.isArray(data)) {
    return data.map((item) => addIso8601Timestamps(item));
  }

  if (!isRecord(data)) {
    return data;
  }

  const result: Record<string, unknown> = { ...data };

  for (const field of TIMESTAMP_FIELDS) {
    const value = result[field];
    if (isInteger(value)) {
      result[`${field}${ISO8601_SUFFIX}`] = convertTimestampToIso8601(value);
    }
  }

  for (const [key, value] of Object.entries(result)) {
    if (Array.isArray(value) || isRecord(value)) {
      result[key] = addIso8601Timestamps(value);
    }
  }

  return result;
}

export function formatJsonResponse(data: unknown): string {
  return JSON.stringify(addIso8601Timestamps(data), null, 2);
}
