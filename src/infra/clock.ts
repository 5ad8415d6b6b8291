export interface ClockPort {
  /** Current instant as an ISO-8601 UTC timestamp. */
  nowIso(): string;
}

export class SystemClock implements ClockPort {
  nowIso(): string {
    return new Date().toISOString();
  }
}
