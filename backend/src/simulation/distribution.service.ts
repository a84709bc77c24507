import { Injectable, Logger } from "@nestjs/common";
import type { Distribution, RunDistributions, SimulationResult } from "@pcr-bess/domain";

export interface DistributionOptions {
  bins: number;
  /** Fixed lower edge; defaults to the smallest value. */
  min?: number;
  /** Fixed upper edge; defaults to the largest value. */
  max?: number;
}

const SOC_BINS = 20;
const E_RATE_BINS = 20;
const FREQUENCY_BINS = 50;

/**
 * Histogram normalised to probabilities. The last bin includes its upper
 * edge; values outside a fixed range are not counted.
 */
export function buildDistribution(values: readonly number[], options: DistributionOptions): Distribution {
  if (!Number.isInteger(options.bins) || options.bins < 1) {
    throw new RangeError("Distribution needs at least one bin");
  }
  if (values.length === 0) {
    return {bin_edges: [], counts: [], probabilities: []};
  }
  const min = options.min ?? values.reduce((acc, value) => Math.min(acc, value), Infinity);
  const max = options.max ?? values.reduce((acc, value) => Math.max(acc, value), -Infinity);
  if (max < min) {
    throw new RangeError("Distribution range is inverted");
  }

  if (max === min) {
    const count = values.filter((value) => value === min).length;
    return {bin_edges: [min, max], counts: [count], probabilities: [count > 0 ? 1 : 0]};
  }

  const width = (max - min) / options.bins;
  const bin_edges = Array.from({length: options.bins + 1}, (_, index) => min + index * width);
  const counts = new Array<number>(options.bins).fill(0);
  let counted = 0;
  for (const value of values) {
    if (value < min || value > max) {
      continue;
    }
    const index = Math.min(options.bins - 1, Math.floor((value - min) / width));
    counts[index] += 1;
    counted += 1;
  }
  const probabilities = counts.map((count) => (counted > 0 ? count / counted : 0));
  return {bin_edges, counts, probabilities};
}

@Injectable()
export class DistributionService {
  private readonly logger = new Logger(DistributionService.name);

  build(result: SimulationResult, frequencyHz: readonly number[]): RunDistributions {
    this.logger.verbose(`Building distributions for ${result.steps} steps`);
    const maxERate = result.e_rate.reduce((acc, value) => Math.max(acc, value), 0);
    return {
      soc_percent: buildDistribution(result.soc_percent, {bins: SOC_BINS, min: 0, max: 100}),
      e_rate: buildDistribution(result.e_rate, {bins: E_RATE_BINS, min: 0, max: maxERate}),
      frequency_hz: buildDistribution(frequencyHz, {bins: FREQUENCY_BINS}),
    };
  }
}
