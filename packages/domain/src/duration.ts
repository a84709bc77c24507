const SECONDS_PER_HOUR = 3600;

export class Duration {
  private readonly _seconds: number;

  private constructor(seconds: number) {
    if (!Number.isFinite(seconds)) {
      throw new TypeError("Duration requires a finite numeric value in seconds");
    }
    if (seconds < 0) {
      throw new RangeError("Duration cannot be negative");
    }
    this._seconds = seconds;
  }

  static fromSeconds(value: number): Duration {
    return new Duration(value);
  }

  static fromHours(value: number): Duration {
    return new Duration(value * SECONDS_PER_HOUR);
  }

  static between(startSeconds: number, endSeconds: number): Duration {
    return new Duration(endSeconds - startSeconds);
  }

  get seconds(): number {
    return this._seconds;
  }

  get hours(): number {
    return this._seconds / SECONDS_PER_HOUR;
  }

  toJSON(): number {
    return this._seconds;
  }
}
