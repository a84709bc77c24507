export class Percentage {
  private readonly _percent: number;

  private constructor(percent: number) {
    this._percent = Percentage.normalize(percent);
  }

  static fromPercent(value: number): Percentage {
    return new Percentage(value);
  }

  static fromRatio(value: number): Percentage {
    return new Percentage(value * 100);
  }

  get percent(): number {
    return this._percent;
  }

  isAtMost(percent: number): boolean {
    return this._percent <= percent;
  }

  isAtLeast(percent: number): boolean {
    return this._percent >= percent;
  }

  toJSON(): number {
    return this._percent;
  }

  private static normalize(value: number): number {
    if (!Number.isFinite(value)) {
      throw new TypeError("Percentage requires a finite numeric value");
    }
    if (value < 0) {
      return 0;
    }
    if (value > 100) {
      return 100;
    }
    return value;
  }
}
