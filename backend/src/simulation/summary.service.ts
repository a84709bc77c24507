import { Injectable, Logger } from "@nestjs/common";
import type { RunSummary, SimulationResult } from "@pcr-bess/domain";
import { Duration } from "@pcr-bess/domain";

function extremes(values: readonly number[]): { min: number; max: number; mean: number } {
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  let total = 0;
  for (const value of values) {
    min = Math.min(min, value);
    max = Math.max(max, value);
    total += value;
  }
  return {min, max, mean: total / values.length};
}

@Injectable()
export class SummaryService {
  private readonly logger = new Logger(SummaryService.name);

  toSummary(result: SimulationResult, timeSeconds: readonly number[]): RunSummary {
    const steps = result.steps;
    const soc = extremes(result.soc_percent);
    const eRate = extremes(result.e_rate);
    const duration = Duration.between(timeSeconds[0], timeSeconds[steps - 1]);
    this.logger.verbose(`Building summary for ${steps} steps over ${duration.hours.toFixed(2)} h`);

    return {
      steps,
      duration_hours: duration.hours,
      initial_soc_percent: result.soc_percent[0],
      final_soc_percent: result.soc_percent[steps - 1],
      min_soc_percent: soc.min,
      max_soc_percent: soc.max,
      mean_soc_percent: soc.mean,
      max_e_rate: eRate.max,
      fce: result.fce,
      schedule_tx_energy_mwh: {...result.schedule_tx_energy},
      total_energy_mwh: {...result.total_energy},
      energy_shares: {...result.energy_shares},
      transactions: {
        charge: result.transactions.filter((entry) => entry.type === 1).length,
        discharge: result.transactions.filter((entry) => entry.type === -1).length,
        completed: result.transactions.filter((entry) => entry.completed_at_s !== null).length,
      },
    };
  }
}
