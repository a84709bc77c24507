import type { FrequencySeries } from "@pcr-bess/domain";
import { ConfigurationError, DEFAULT_SAMPLING_RATE_HZ, DEFAULT_SIMULATION_HOURS } from "@pcr-bess/domain";

/**
 * Mulberry32. Small, fast and reproducible from a 32-bit seed; not meant for
 * anything beyond generating test and demo series.
 */
export class SeededRandom {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /** Next value in [0, 1). */
  next(): number {
    let t = (this.state += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /** Standard normal sample (Box-Muller). */
  gaussian(): number {
    const u1 = 1 - this.next();
    const u2 = this.next();
    return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  }
}

export interface SyntheticFrequencyOptions {
  nominalHz: number;
  durationHours: number;
  samplingRateHz: number;
  seed: number;
  /** Diffusion of the walk, Hz per square-root second. */
  volatilityHz: number;
  /** Pull back towards nominal, per second. */
  reversionPerSecond: number;
  maxDeviationHz: number;
}

export const DEFAULT_SYNTHETIC_OPTIONS: Omit<SyntheticFrequencyOptions, "nominalHz"> = {
  durationHours: DEFAULT_SIMULATION_HOURS,
  samplingRateHz: DEFAULT_SAMPLING_RATE_HZ,
  seed: 1,
  volatilityHz: 0.01,
  reversionPerSecond: 0.01,
  maxDeviationHz: 0.2,
};

function requirePositive(value: number, name: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`synthetic.${name} must be a positive number`, name);
  }
}

/**
 * Mean-reverting random walk around the nominal frequency, starting at
 * nominal and bounded to `nominal ± maxDeviationHz`.
 */
export function synthesizeFrequencySeries(options: SyntheticFrequencyOptions): FrequencySeries {
  requirePositive(options.nominalHz, "nominal_hz");
  requirePositive(options.durationHours, "duration_hours");
  requirePositive(options.samplingRateHz, "sampling_rate_hz");
  if (!Number.isFinite(options.volatilityHz) || options.volatilityHz < 0) {
    throw new ConfigurationError("synthetic.volatility_hz must be a non-negative number", "volatility_hz");
  }
  if (!Number.isFinite(options.reversionPerSecond) || options.reversionPerSecond < 0) {
    throw new ConfigurationError("synthetic.reversion_per_s must be a non-negative number", "reversion_per_s");
  }
  if (!Number.isFinite(options.maxDeviationHz) || options.maxDeviationHz < 0) {
    throw new ConfigurationError("synthetic.max_deviation_hz must be a non-negative number", "max_deviation_hz");
  }

  const stepSeconds = 1 / options.samplingRateHz;
  const count = Math.floor(options.durationHours * 3600 * options.samplingRateHz) + 1;
  if (count < 2) {
    throw new ConfigurationError("synthetic series must cover at least two samples", "duration_hours");
  }
  const rng = new SeededRandom(options.seed);
  const lower = options.nominalHz - options.maxDeviationHz;
  const upper = options.nominalHz + options.maxDeviationHz;
  const diffusion = options.volatilityHz * Math.sqrt(stepSeconds);

  const time_s = new Array<number>(count);
  const frequency_hz = new Array<number>(count);
  let current = options.nominalHz;
  for (let index = 0; index < count; index += 1) {
    if (index > 0) {
      const drift = options.reversionPerSecond * (options.nominalHz - current) * stepSeconds;
      current = Math.min(upper, Math.max(lower, current + drift + diffusion * rng.gaussian()));
    }
    time_s[index] = index * stepSeconds;
    frequency_hz[index] = current;
  }
  return {time_s, frequency_hz};
}
