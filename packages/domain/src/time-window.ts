import type { Duration } from "./duration";

/** Closed interval `[start, end]` on the simulation clock, in seconds. */
export class TimeWindow {
  private readonly _startSeconds: number;
  private readonly _endSeconds: number;

  private constructor(startSeconds: number, endSeconds: number) {
    if (!Number.isFinite(startSeconds) || !Number.isFinite(endSeconds)) {
      throw new TypeError("Time window bounds must be finite seconds");
    }
    if (endSeconds < startSeconds) {
      throw new RangeError("Time window end must not precede its start");
    }
    this._startSeconds = startSeconds;
    this._endSeconds = endSeconds;
  }

  static fromBounds(startSeconds: number, endSeconds: number): TimeWindow {
    return new TimeWindow(startSeconds, endSeconds);
  }

  static fromStartAndDuration(startSeconds: number, duration: Duration): TimeWindow {
    return new TimeWindow(startSeconds, startSeconds + duration.seconds);
  }

  get startSeconds(): number {
    return this._startSeconds;
  }

  get endSeconds(): number {
    return this._endSeconds;
  }

  hasStarted(timeSeconds: number): boolean {
    return timeSeconds >= this._startSeconds;
  }

  contains(timeSeconds: number): boolean {
    return timeSeconds >= this._startSeconds && timeSeconds <= this._endSeconds;
  }

  hasElapsed(timeSeconds: number): boolean {
    return timeSeconds > this._endSeconds;
  }

  toJSON(): { start_s: number; end_s: number } {
    return {start_s: this._startSeconds, end_s: this._endSeconds};
  }
}
