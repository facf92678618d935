export interface ClockPort {
  nowIso(): string;
}

export class SystemClock implements ClockPort {
  nowIso(): string {
    return new Date().toISOString();
  }
}

/** Deterministic clock for tests and replays; advances only when told to. */
export class ManualClock implements ClockPort {
  private currentMs: number;

  constructor(startIso = "2026-01-01T00:00:00.000Z") {
    this.currentMs = Date.parse(startIso);
  }

  nowIso(): string {
    return new Date(this.currentMs).toISOString();
  }

  advance(milliseconds: number): void {
    this.currentMs += milliseconds;
  }
}
