export class Frequency {
  private readonly _hertz: number;

  private constructor(hertz: number) {
    if (!Number.isFinite(hertz)) {
      throw new TypeError("Frequency requires a finite numeric value in hertz");
    }
    this._hertz = hertz;
  }

  static fromHertz(value: number): Frequency {
    return new Frequency(value);
  }

  get hertz(): number {
    return this._hertz;
  }

  /** Signed shortfall against `nominal`: positive when the grid runs slow. */
  shortfallFrom(nominal: Frequency): number {
    return nominal._hertz - this._hertz;
  }

  isAbove(other: Frequency): boolean {
    return this._hertz > other._hertz;
  }

  isBelow(other: Frequency): boolean {
    return this._hertz < other._hertz;
  }

  isWithinBand(center: Frequency, halfWidthHz: number): boolean {
    return this._hertz >= center._hertz - halfWidthHz && this._hertz <= center._hertz + halfWidthHz;
  }

  toJSON(): number {
    return this._hertz;
  }
}
