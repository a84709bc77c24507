import type { PerformanceMetrics } from "@pcr-bess/domain";
import { Percentage } from "@pcr-bess/domain";

import type { FlowHistory } from "./energy-balance";

function sumWhere(values: Float64Array, predicate: (value: number) => boolean): number {
  let total = 0;
  for (const value of values) {
    if (predicate(value)) {
      total += value;
    }
  }
  return total;
}

function magnitudeWhere(values: Float64Array, predicate: (value: number) => boolean): number {
  let total = 0;
  for (const value of values) {
    if (predicate(value)) {
      total -= value;
    }
  }
  return total;
}

function sumAbsolute(values: Float64Array): number {
  let total = 0;
  for (const value of values) {
    total += Math.abs(value);
  }
  return total;
}

const isPositive = (value: number) => value > 0;
const isNegative = (value: number) => value < 0;

function shareOf(part: number, total: number): number {
  return total > 0 ? Percentage.fromRatio(part / total).percent : 0;
}

/**
 * Post-run aggregation over the whole flow history. Self-consumption counts
 * towards neither throughput nor the charged/discharged totals, and
 * deadband utilization only towards throughput.
 */
export function calculatePerformanceMetrics(history: FlowHistory, capacityMwh: number): PerformanceMetrics {
  const primaryControl = history.series("primary_control");
  const overfulfillment = history.series("overfulfillment");
  const deadbandUtil = history.series("deadband_util");
  const scheduleTx = history.series("schedule_tx");

  const throughput = sumAbsolute(primaryControl) + sumAbsolute(overfulfillment) +
    sumAbsolute(deadbandUtil) + sumAbsolute(scheduleTx);
  const fce = throughput / (2 * capacityMwh);

  const scheduleCharged = sumWhere(scheduleTx, isPositive);
  const scheduleDischarged = magnitudeWhere(scheduleTx, isNegative);

  const totalCharged = sumWhere(primaryControl, isPositive) + sumWhere(overfulfillment, isPositive) + scheduleCharged;
  const totalDischarged = magnitudeWhere(primaryControl, isNegative) + magnitudeWhere(overfulfillment, isNegative) +
    scheduleDischarged;

  return {
    fce,
    schedule_tx_energy: {charged: scheduleCharged, discharged: scheduleDischarged},
    total_energy: {charged: totalCharged, discharged: totalDischarged},
    energy_shares: {
      pct_charged_via_st: shareOf(scheduleCharged, totalCharged),
      pct_discharged_via_st: shareOf(scheduleDischarged, totalDischarged),
    },
  };
}
