import type { Duration } from "./duration";
import { Energy } from "./energy";

export class Power {
  private readonly _megawatts: number;

  private constructor(megawatts: number) {
    if (!Number.isFinite(megawatts)) {
      throw new TypeError("Power requires a finite numeric value in megawatts");
    }
    this._megawatts = megawatts;
  }

  static fromMegawatts(value: number): Power {
    return new Power(value);
  }

  get megawatts(): number {
    return this._megawatts;
  }

  get isNegative(): boolean {
    return this._megawatts < 0;
  }

  toJSON(): number {
    return this._megawatts;
  }

  add(other: Power): Power {
    return new Power(this._megawatts + other._megawatts);
  }

  multiply(factor: number): Power {
    return new Power(this._megawatts * factor);
  }

  divide(divisor: number): Power {
    if (divisor === 0) {
      throw new RangeError("Cannot divide power by zero");
    }
    return new Power(this._megawatts / divisor);
  }

  forDuration(duration: Duration): Energy {
    return Energy.fromPowerAndDuration(this, duration);
  }
}
