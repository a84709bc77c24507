import type { Duration } from "./duration";
import type { Power } from "./power";

export class Energy {
  private readonly _megawattHours: number;

  private constructor(megawattHours: number) {
    if (!Number.isFinite(megawattHours)) {
      throw new TypeError("Energy requires a finite numeric value in megawatt-hours");
    }
    this._megawattHours = megawattHours;
  }

  static fromMegawattHours(value: number): Energy {
    return new Energy(value);
  }

  static fromPowerAndDuration(power: Power, duration: Duration): Energy {
    return new Energy(power.megawatts * duration.seconds / 3600);
  }

  static zero(): Energy {
    return new Energy(0);
  }

  get megawattHours(): number {
    return this._megawattHours;
  }

  toJSON(): number {
    return this._megawattHours;
  }

  negate(): Energy {
    return new Energy(-this._megawattHours);
  }

  multiply(factor: number): Energy {
    return new Energy(this._megawattHours * factor);
  }

  divide(divisor: number): Energy {
    if (divisor === 0) {
      throw new RangeError("Cannot divide energy by zero");
    }
    return new Energy(this._megawattHours / divisor);
  }

  clamp(min: Energy, max: Energy): Energy {
    const lower = Math.min(min._megawattHours, max._megawattHours);
    const upper = Math.max(min._megawattHours, max._megawattHours);
    const bounded = Math.min(Math.max(this._megawattHours, lower), upper);
    return new Energy(bounded);
  }
}
