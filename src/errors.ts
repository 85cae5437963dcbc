export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export const ACCEPTED_DURATION_FORMATS = ["1h", "30m", "2h 15m", "plain minutes"] as const;

export class DurationParseError extends Error {
  readonly input: string;
  readonly acceptedFormats: readonly string[] = ACCEPTED_DURATION_FORMATS;

  constructor(input: string) {
    super(
      `Could not parse time string: '${input}'. Use formats like '1h', '30m', '2h 15m', or plain minutes.`,
    );
    this.name = "DurationParseError";
    this.input = input;
  }
}

export class InvalidWorkDateError extends Error {
  readonly input: string;

  constructor(input: string) {
    super(`Invalid date format '${input}'. Use YYYY-MM-DD format.`);
    this.name = "InvalidWorkDateError";
    this.input = input;
  }
}

export class YouTrackApiError extends Error {
  readonly status: number;
  readonly body: string;

  constructor(status: number, statusText: string, body: string) {
    super(`YouTrack API error ${status}: ${body || statusText}`);
    this.name = "YouTrackApiError";
    this.status = status;
    this.body = body;
  }
}
