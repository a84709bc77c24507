import type { EnergyFlowKey, EnergyFlowSeries, StepFlows } from "@pcr-bess/domain";
import { ENERGY_FLOW_KEYS, Energy } from "@pcr-bess/domain";

/**
 * Commits one step: adds every flow to the stored energy and clamps the
 * result to `[0, capacity]`. Energy beyond either bound is discarded.
 */
export function applyEnergyBalance(energyMwh: number, flows: StepFlows, capacityMwh: number): number {
  const unclamped = Energy.fromMegawattHours(
    energyMwh + flows.primary_control + flows.overfulfillment +
    flows.deadband_util + flows.schedule_tx + flows.self_consumption,
  );
  return unclamped.clamp(Energy.zero(), Energy.fromMegawattHours(capacityMwh)).megawattHours;
}

/** Fixed-length per-step flow buffers; index 0 is the initial sample and stays zero. */
export class FlowHistory {
  private readonly buffers: Record<EnergyFlowKey, Float64Array>;

  constructor(readonly length: number) {
    this.buffers = {
      primary_control: new Float64Array(length),
      overfulfillment: new Float64Array(length),
      deadband_util: new Float64Array(length),
      schedule_tx: new Float64Array(length),
      self_consumption: new Float64Array(length),
    };
  }

  record(index: number, flows: StepFlows): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.length) {
      throw new RangeError(`Flow index ${index} outside history of length ${this.length}`);
    }
    for (const key of ENERGY_FLOW_KEYS) {
      this.buffers[key][index] = flows[key];
    }
  }

  series(key: EnergyFlowKey): Float64Array {
    return this.buffers[key];
  }

  toJSON(): EnergyFlowSeries {
    return {
      primary_control: Array.from(this.buffers.primary_control),
      overfulfillment: Array.from(this.buffers.overfulfillment),
      deadband_util: Array.from(this.buffers.deadband_util),
      schedule_tx: Array.from(this.buffers.schedule_tx),
      self_consumption: Array.from(this.buffers.self_consumption),
    };
  }
}
